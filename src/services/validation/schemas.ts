import { z } from 'zod';
import { isValidDateString } from '../../utils/dates';
import { parseAmount } from '../../utils/money';
import { ValidationError } from '../../utils/errors';
import { ReceiptUpload } from '../../types/expense';

const MAX_AMOUNT = 999999n * 100n;

/**
 * Decimal amount (12.5, "12,50") converted to cents
 */
export const AmountSchema = z
  .union([z.number(), z.string()])
  .transform((val, ctx) => {
    const cents = parseAmount(val);
    if (cents === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a valid amount (e.g., 100 or 99.99)' });
      return z.NEVER;
    }
    return cents;
  })
  .refine((val) => val > 0n, 'Amount must be greater than 0')
  .refine((val) => val <= MAX_AMOUNT, 'Amount too large (max 999999)');

export const CategorySchema = z
  .string()
  .trim()
  .min(1, 'Category name required')
  .max(50, 'Category name too long')
  .regex(/^[\p{L}0-9\s&\-_]+$/u, 'Invalid characters in category name');

export const DateStringSchema = z
  .string()
  .refine(isValidDateString, 'Invalid date format (YYYY-MM-DD)');

export const DescriptionSchema = z
  .string()
  .trim()
  .min(1, 'Description required')
  .max(200, 'Description too long');

export const ExpenseCreateSchema = z.object({
  amount: AmountSchema,
  description: DescriptionSchema,
  category: CategorySchema.optional(),
  date: DateStringSchema.optional(),
  currency: z.string().length(3, 'Currency must be a 3-letter code').toUpperCase().optional(),
});

export const ExpenseUpdateSchema = z
  .object({
    amount: AmountSchema.optional(),
    description: DescriptionSchema.optional(),
    category: CategorySchema.optional(),
    date: DateStringSchema.optional(),
  })
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), 'Nothing to update');

export const CategoryOverrideSchema = z.object({ category: CategorySchema });

export const BudgetCreateSchema = z.object({
  category: CategorySchema,
  amount: AmountSchema,
  startDate: DateStringSchema.optional(),
  endDate: DateStringSchema.optional(),
  alertThreshold: z.number().gt(0, 'Alert threshold must be between 0 and 1').max(1, 'Alert threshold must be between 0 and 1').optional(),
});

export const BudgetUpdateSchema = BudgetCreateSchema.partial().refine(
  (patch) => Object.values(patch).some((v) => v !== undefined),
  'Nothing to update'
);

/**
 * A receipt sent as base64 file content or as plain text
 */
export const ReceiptUploadSchema = z.union([
  z
    .object({ text: z.string().trim().min(1, 'Receipt text required'), fileName: z.string().max(100).optional() })
    .transform((val): ReceiptUpload => ({
      content: Buffer.from(val.text, 'utf8'),
      mimeType: 'text/plain',
      fileName: val.fileName,
    })),
  z
    .object({
      mimeType: z.string().min(1),
      contentBase64: z.string().min(1, 'Receipt content required'),
      fileName: z.string().max(100).optional(),
    })
    .transform((val): ReceiptUpload => ({
      content: Buffer.from(val.contentBase64, 'base64'),
      mimeType: val.mimeType,
      fileName: val.fileName,
    })),
]);

export const ChatRequestSchema = z.object({
  message: z.string().max(2000, 'Message too long').default(''),
  receipt: ReceiptUploadSchema.optional(),
});

export const CategorizeRequestSchema = z.object({
  description: DescriptionSchema,
  amount: AmountSchema.optional(),
  date: DateStringSchema.optional(),
});

export const DateRangeQuerySchema = z.object({
  startDate: DateStringSchema.optional(),
  endDate: DateStringSchema.optional(),
});

export const ExportQuerySchema = DateRangeQuerySchema.extend({
  format: z.enum(['csv', 'json', 'pdf'], {
    errorMap: () => ({ message: 'Format must be: csv, json, or pdf' }),
  }).default('csv'),
});

export const BudgetStatusQuerySchema = z.object({
  alerts: z
    .enum(['true', 'false'], { errorMap: () => ({ message: 'alerts must be true or false' }) })
    .default('false')
    .transform((value) => value === 'true'),
});

export const PageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

/**
 * Validate and parse user input safely
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): { valid: true; data: T } | { valid: false; error: string } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { valid: true, data: result.data };
  }
  return { valid: false, error: result.error.errors[0]?.message || 'Invalid input' };
}

/**
 * Like validateInput, but throws a ValidationError for the API layer
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = validateInput(schema, input);
  if (!result.valid) {
    throw new ValidationError(result.error);
  }
  return result.data;
}
