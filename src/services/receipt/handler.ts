import fs from 'fs';
import path from 'path';
import { getDatabase } from '../database/db';
import { insertExpense } from '../expense/repository';
import { evaluateExpense } from '../budget';
import { categorizeItems } from '../ai/categorizer';
import { extractReceiptText, parseReceiptText } from './vision';
import { env } from '../../config/env';
import { MAX_UPLOAD_BYTES } from '../../config/constants';
import { generateId } from '../../utils/id';
import { toDateString } from '../../utils/dates';
import { formatAmount } from '../../utils/money';
import { getErrorMessage, ReceiptUnreadableError, ValidationError } from '../../utils/errors';
import { CategorizedReceiptItem, Expense, ParsedReceipt, Receipt, ReceiptUpload } from '../../types/expense';
import { BudgetAlert } from '../../types/budget';

export interface RecordedReceipt {
  receipt: Receipt;
  items: CategorizedReceiptItem[];
  expenses: Expense[];
  alerts: BudgetAlert[];
}

interface CategoryGroup {
  category: string;
  items: CategorizedReceiptItem[];
  total: bigint;
}

const EXTENSIONS: Record<string, string> = {
  'text/plain': '.txt',
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/webp': '.webp',
  'application/pdf': '.pdf',
};

export function isSupportedReceiptType(mimeType: string): boolean {
  return mimeType in EXTENSIONS;
}

/**
 * Get receipt file path for storage
 */
export function getReceiptPath(userId: string, filename: string): string {
  const safeUser = userId.replace(/[^a-zA-Z0-9_-]/g, '_');
  const receiptDir = path.resolve(env.RECEIPTS_DIR, safeUser);

  if (!fs.existsSync(receiptDir)) {
    fs.mkdirSync(receiptDir, { recursive: true });
  }

  return path.join(receiptDir, filename);
}

function storeReceiptFile(userId: string, upload: ReceiptUpload): string {
  const base = upload.fileName ? path.basename(upload.fileName).replace(/[^a-zA-Z0-9._-]/g, '_') : '';
  const fileName = `${Date.now()}-${base || `receipt${EXTENSIONS[upload.mimeType]}`}`;
  const filePath = getReceiptPath(userId, fileName);

  fs.writeFileSync(filePath, upload.content);
  return filePath;
}

async function readReceiptText(upload: ReceiptUpload): Promise<string> {
  if (upload.mimeType === 'text/plain') {
    return upload.content.toString('utf8');
  }
  return extractReceiptText(upload.content);
}

/**
 * Fill in whichever of items and total the receipt left out.
 */
export function completeReceipt(parsed: ParsedReceipt): ParsedReceipt {
  if (parsed.items.length === 0 && parsed.totalAmount > 0n) {
    return {
      ...parsed,
      items: [{ name: parsed.storeName, amount: parsed.totalAmount, quantity: 1 }],
    };
  }

  if (parsed.totalAmount <= 0n && parsed.items.length > 0) {
    return {
      ...parsed,
      totalAmount: parsed.items.reduce((sum, item) => sum + item.amount, 0n),
    };
  }

  return parsed;
}

export function groupByCategory(items: CategorizedReceiptItem[]): CategoryGroup[] {
  const groups = new Map<string, CategoryGroup>();

  for (const item of items) {
    const group = groups.get(item.category) ?? { category: item.category, items: [], total: 0n };
    group.items.push(item);
    group.total += item.amount;
    groups.set(item.category, group);
  }

  return [...groups.values()];
}

/**
 * Read, categorize, store and record a receipt. One expense is written per
 * category on the receipt.
 */
export async function recordReceipt(userId: string, upload: ReceiptUpload, now: Date = new Date()): Promise<RecordedReceipt> {
  if (upload.content.length === 0) {
    throw new ValidationError('The receipt is empty.');
  }
  if (upload.content.length > MAX_UPLOAD_BYTES) {
    throw new ValidationError('The receipt is larger than 10 MB.');
  }
  if (!isSupportedReceiptType(upload.mimeType)) {
    throw new ValidationError(`Unsupported receipt type: ${upload.mimeType}`);
  }

  const rawText = (await readReceiptText(upload)).trim();
  if (!rawText) {
    throw new ReceiptUnreadableError();
  }

  const parsed = completeReceipt(await parseReceiptText(rawText));
  if (parsed.items.length === 0) {
    throw new ReceiptUnreadableError();
  }

  const categories = await categorizeItems(parsed.items.map((i) => i.name));
  const items: CategorizedReceiptItem[] = parsed.items.map((item, idx) => ({
    ...item,
    category: categories[idx] ?? 'Other',
  }));
  console.log('[ReceiptHandler] Categorized items:', items.length, 'Store:', parsed.storeName);

  // Only receipts that are recorded keep their file
  const filePath = storeReceiptFile(userId, upload);

  const receipt: Receipt = {
    id: generateId(),
    userId,
    storeName: parsed.storeName,
    totalAmount: parsed.totalAmount,
    confidence: parsed.confidence,
    rawText,
    filePath,
    uploadedAt: now.toISOString(),
  };
  const date = toDateString(now);

  const db = getDatabase();
  const receiptStmt = db.prepare(`
    INSERT INTO receipts (id, user_id, store_name, total_amount, confidence, raw_text, file_path, uploaded_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const itemStmt = db.prepare(`
    INSERT INTO receipt_items (id, receipt_id, user_id, expense_id, item_name, normalized_name, quantity, amount, category)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const save = db.transaction((groups: CategoryGroup[]): Expense[] => {
    receiptStmt.run(
      receipt.id,
      userId,
      receipt.storeName,
      receipt.totalAmount,
      receipt.confidence,
      receipt.rawText,
      receipt.filePath ?? null,
      receipt.uploadedAt
    );

    const expenses: Expense[] = [];
    for (const group of groups) {
      const expense =
        group.total > 0n
          ? insertExpense(userId, {
              amount: group.total,
              description: `${receipt.storeName} - ${group.category}`,
              category: group.category,
              date,
              currency: env.DEFAULT_CURRENCY,
              source: 'receipt',
              receiptId: receipt.id,
            })
          : null;
      if (expense) expenses.push(expense);

      for (const item of group.items) {
        itemStmt.run(
          generateId(),
          receipt.id,
          userId,
          expense?.id ?? null,
          item.name,
          item.name.toLowerCase().trim(),
          item.quantity,
          item.amount,
          item.category
        );
      }
    }
    return expenses;
  });

  let expenses: Expense[];
  try {
    expenses = save(groupByCategory(items));
  } catch (error) {
    fs.rmSync(filePath, { force: true });
    throw error;
  }
  console.log(
    `[ReceiptHandler] Saved receipt ${receipt.id} (${formatAmount(receipt.totalAmount, env.DEFAULT_CURRENCY)}) as ${expenses.length} expenses`
  );

  const alerts = expenses.flatMap((expense) => evaluateExpense(expense));
  return { receipt, items, expenses, alerts };
}

/**
 * Delete stored receipt files older than the retention period.
 */
export function cleanupOldReceipts(retentionDays: number = env.RECEIPT_RETENTION_DAYS, now: number = Date.now()): number {
  const receiptDir = path.resolve(env.RECEIPTS_DIR);
  let deleted = 0;

  try {
    if (!fs.existsSync(receiptDir)) {
      return 0;
    }

    const maxAge = retentionDays * 24 * 60 * 60 * 1000;

    for (const userDir of fs.readdirSync(receiptDir)) {
      const userPath = path.join(receiptDir, userDir);

      if (!fs.statSync(userPath).isDirectory()) {
        continue;
      }

      for (const file of fs.readdirSync(userPath)) {
        const filePath = path.join(userPath, file);
        if (now - fs.statSync(filePath).mtimeMs > maxAge) {
          fs.unlinkSync(filePath);
          deleted++;
          console.log(`[ReceiptCleanup] Deleted old receipt: ${file}`);
        }
      }

      if (fs.readdirSync(userPath).length === 0) {
        fs.rmdirSync(userPath);
      }
    }
  } catch (error) {
    console.error('[ReceiptCleanup] Cleanup failed:', getErrorMessage(error));
  }

  return deleted;
}
