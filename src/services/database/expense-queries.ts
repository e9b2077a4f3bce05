import { getDatabase } from './db';
import { DateRange } from '../../types/expense';
import { CategoryTotal } from '../../types/analytics';

export interface MonthlyTotal {
  month: string;
  totalAmount: bigint;
  expenseCount: number;
}

interface CategoryTotalRow {
  category: string;
  total: number | bigint;
  count: number;
}

interface SumRow {
  total: number | bigint | null;
}

interface MonthlyTotalRow {
  month: string;
  total: number | bigint;
  count: number;
}

export function sumExpenses(userId: string, range: DateRange, category?: string): bigint {
  const db = getDatabase();
  let query = `
    SELECT SUM(amount) as total
    FROM expenses
    WHERE user_id = ?
      AND expense_date >= ?
      AND expense_date <= ?
  `;
  const params: string[] = [userId, range.startDate, range.endDate];

  if (category) {
    query += ` AND category = ? COLLATE NOCASE`;
    params.push(category);
  }

  const row = db.prepare<string[], SumRow>(query).get(...params);
  return BigInt(row?.total ?? 0);
}

export function getTotalsByCategory(userId: string, range: DateRange, limit?: number): CategoryTotal[] {
  const db = getDatabase();
  const rows = db.prepare<[string, string, string, number], CategoryTotalRow>(`
    SELECT
      category,
      SUM(amount) as total,
      COUNT(*) as count
    FROM expenses
    WHERE user_id = ?
      AND expense_date >= ?
      AND expense_date <= ?
    GROUP BY category COLLATE NOCASE
    ORDER BY total DESC, category ASC
    LIMIT ?
  `).all(userId, range.startDate, range.endDate, limit ?? -1);

  return rows.map((row) => ({
    category: row.category,
    amount: BigInt(row.total),
    count: row.count,
  }));
}

export function getMonthlyTotals(userId: string, range: DateRange): MonthlyTotal[] {
  const db = getDatabase();
  const rows = db.prepare<[string, string, string], MonthlyTotalRow>(`
    SELECT
      substr(expense_date, 1, 7) as month,
      SUM(amount) as total,
      COUNT(*) as count
    FROM expenses
    WHERE user_id = ?
      AND expense_date >= ?
      AND expense_date <= ?
    GROUP BY substr(expense_date, 1, 7)
    ORDER BY month ASC
  `).all(userId, range.startDate, range.endDate);

  return rows.map((row) => ({
    month: row.month,
    totalAmount: BigInt(row.total),
    expenseCount: row.count,
  }));
}
