import { getDatabase } from '../database/db';
import { generateId } from '../../utils/id';
import { DateRange, Expense, ExpenseSource } from '../../types/expense';

interface ExpenseRow {
  id: string;
  user_id: string;
  amount: number | bigint;
  currency: string;
  description: string;
  category: string;
  expense_date: string;
  source: string;
  receipt_id: string | null;
  created_at: string;
}

export interface ExpenseInsert {
  amount: bigint;
  description: string;
  category: string;
  date: string;
  currency: string;
  source: ExpenseSource;
  receiptId?: string;
}

export interface ExpenseFilter {
  category?: string;
  search?: string;
}

export interface ExpenseUpdateFields {
  amount?: bigint;
  description?: string;
  category?: string;
  date?: string;
}

function toSource(value: string): ExpenseSource {
  return value === 'chat' || value === 'receipt' ? value : 'manual';
}

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    userId: row.user_id,
    amount: BigInt(row.amount),
    currency: row.currency,
    description: row.description,
    category: row.category,
    date: row.expense_date,
    source: toSource(row.source),
    receiptId: row.receipt_id ?? undefined,
    createdAt: row.created_at,
  };
}

export function insertExpense(userId: string, data: ExpenseInsert): Expense {
  const db = getDatabase();
  const id = generateId();
  const createdAt = new Date().toISOString();

  db.prepare(`
    INSERT INTO expenses (id, user_id, amount, currency, description, category, expense_date, source, receipt_id, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    userId,
    data.amount,
    data.currency,
    data.description,
    data.category,
    data.date,
    data.source,
    data.receiptId ?? null,
    createdAt
  );

  return {
    id,
    userId,
    amount: data.amount,
    currency: data.currency,
    description: data.description,
    category: data.category,
    date: data.date,
    source: data.source,
    receiptId: data.receiptId,
    createdAt,
  };
}

export function findExpense(id: string): Expense | null {
  const db = getDatabase();
  const row = db.prepare<[string], ExpenseRow>('SELECT * FROM expenses WHERE id = ?').get(id);
  return row ? toExpense(row) : null;
}

export function listExpenses(userId: string, skip: number, limit: number): Expense[] {
  const db = getDatabase();
  const rows = db.prepare<[string, number, number], ExpenseRow>(`
    SELECT * FROM expenses
    WHERE user_id = ?
    ORDER BY expense_date DESC, created_at DESC
    LIMIT ? OFFSET ?
  `).all(userId, limit, skip);
  return rows.map(toExpense);
}

export function listExpensesInRange(userId: string, range: DateRange, filter: ExpenseFilter = {}): Expense[] {
  const db = getDatabase();
  let query = `
    SELECT * FROM expenses
    WHERE user_id = ?
      AND expense_date >= ?
      AND expense_date <= ?
  `;
  const params: string[] = [userId, range.startDate, range.endDate];

  if (filter.category) {
    query += ` AND category = ? COLLATE NOCASE`;
    params.push(filter.category);
  }

  if (filter.search) {
    query += ` AND description LIKE ? ESCAPE '\\'`;
    params.push(`%${escapeLike(filter.search)}%`);
  }

  query += ` ORDER BY expense_date DESC, created_at DESC`;

  return db.prepare<string[], ExpenseRow>(query).all(...params).map(toExpense);
}

export function updateExpenseRow(id: string, fields: ExpenseUpdateFields): Expense | null {
  const db = getDatabase();
  const current = findExpense(id);
  if (!current) return null;

  const next = {
    amount: fields.amount ?? current.amount,
    description: fields.description ?? current.description,
    category: fields.category ?? current.category,
    date: fields.date ?? current.date,
  };

  db.prepare(`
    UPDATE expenses
    SET amount = ?, description = ?, category = ?, expense_date = ?
    WHERE id = ?
  `).run(next.amount, next.description, next.category, next.date, id);

  return { ...current, ...next };
}

export function deleteExpenseRow(id: string): boolean {
  const db = getDatabase();
  const result = db.prepare('DELETE FROM expenses WHERE id = ?').run(id);
  return result.changes > 0;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export function findExtremeExpense(userId: string, range: DateRange, order: 'highest' | 'lowest'): Expense | null {
  const db = getDatabase();
  const direction = order === 'highest' ? 'DESC' : 'ASC';
  const row = db.prepare<[string, string, string], ExpenseRow>(`
    SELECT * FROM expenses
    WHERE user_id = ?
      AND expense_date >= ?
      AND expense_date <= ?
    ORDER BY amount ${direction}, expense_date DESC
    LIMIT 1
  `).get(userId, range.startDate, range.endDate);
  return row ? toExpense(row) : null;
}
