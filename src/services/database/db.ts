import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { env } from '../../config/env';

let db: Database.Database | undefined;

export function initializeDatabase(dbPath: string = env.DB_PATH): Database.Database {
  const location = dbPath === ':memory:' ? dbPath : path.resolve(dbPath);
  if (location !== ':memory:') {
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  db = new Database(location);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  createSchema(db);

  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return db;
}

function createSchema(database: Database.Database): void {
  const statements = [
    `CREATE TABLE IF NOT EXISTS receipts (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      store_name TEXT NOT NULL,
      total_amount INTEGER NOT NULL,
      confidence REAL NOT NULL DEFAULT 0,
      raw_text TEXT NOT NULL DEFAULT '',
      file_path TEXT,
      uploaded_at TEXT NOT NULL
    )`,

    `CREATE TABLE IF NOT EXISTS expenses (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      amount INTEGER NOT NULL CHECK (amount > 0),
      currency TEXT NOT NULL DEFAULT 'EUR',
      description TEXT NOT NULL,
      category TEXT NOT NULL,
      expense_date TEXT NOT NULL,
      source TEXT NOT NULL,
      receipt_id TEXT,
      created_at TEXT NOT NULL,
      FOREIGN KEY (receipt_id) REFERENCES receipts(id) ON DELETE SET NULL
    )`,

    `CREATE TABLE IF NOT EXISTS receipt_items (
      id TEXT PRIMARY KEY,
      receipt_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      expense_id TEXT,
      item_name TEXT NOT NULL,
      normalized_name TEXT NOT NULL,
      quantity REAL NOT NULL DEFAULT 1,
      amount INTEGER NOT NULL,
      category TEXT NOT NULL,
      FOREIGN KEY (receipt_id) REFERENCES receipts(id) ON DELETE CASCADE,
      FOREIGN KEY (expense_id) REFERENCES expenses(id) ON DELETE SET NULL
    )`,

    `CREATE TABLE IF NOT EXISTS budgets (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      category TEXT NOT NULL COLLATE NOCASE,
      amount INTEGER NOT NULL CHECK (amount > 0),
      start_date TEXT NOT NULL,
      end_date TEXT NOT NULL,
      alert_threshold REAL NOT NULL DEFAULT 0.8,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,

    `CREATE INDEX IF NOT EXISTS idx_expenses_user_date ON expenses(user_id, expense_date)`,
    `CREATE INDEX IF NOT EXISTS idx_expenses_receipt ON expenses(receipt_id)`,
    `CREATE INDEX IF NOT EXISTS idx_receipt_items_receipt ON receipt_items(receipt_id)`,
    `CREATE INDEX IF NOT EXISTS idx_budgets_user_category ON budgets(user_id, category)`,
  ];

  for (const stmt of statements) {
    database.exec(stmt);
  }
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = undefined;
  }
}
