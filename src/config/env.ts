import dotenv from 'dotenv';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  GOOGLE_VISION_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  DB_PATH: z.string().default('./data/expenses.db'),
  RECEIPTS_DIR: z.string().default('./data/receipts'),
  DEFAULT_CURRENCY: z.string().length(3).default('EUR'),
  RECEIPT_RETENTION_DAYS: z.string().default('90').transform(Number),
  API_PORT: z.string().default('5000').transform(Number),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  dotenv.config();

  return envSchema.parse(process.env);
}

export const env = loadEnv();
