import { formatDecimal } from '../../utils/money';
import { DateRange, Expense } from '../../types/expense';

export interface ExportedExpense {
  id: string;
  date: string;
  description: string;
  amount: string;
  currency: string;
  category: string;
  source: string;
  receiptId: string | null;
}

export interface JSONExport {
  exportDate: string;
  userId: string;
  period: Partial<DateRange>;
  summary: {
    totalSpent: string;
    expenseCount: number;
    averageExpense: string;
    topCategory: string | null;
  };
  expenses: ExportedExpense[];
}

function topCategory(expenses: Expense[]): string | null {
  const totals = new Map<string, bigint>();
  for (const e of expenses) {
    totals.set(e.category, (totals.get(e.category) ?? 0n) + e.amount);
  }

  let best: [string, bigint] | null = null;
  for (const entry of totals) {
    if (!best || entry[1] > best[1]) best = entry;
  }
  return best ? best[0] : null;
}

/**
 * Export expenses as JSON
 */
export function generateJSON(userId: string, expenses: Expense[], period: Partial<DateRange>, now: Date = new Date()): string {
  const total = expenses.reduce((sum, e) => sum + e.amount, 0n);
  const average = expenses.length > 0 ? total / BigInt(expenses.length) : 0n;

  const jsonExport: JSONExport = {
    exportDate: now.toISOString(),
    userId,
    period,
    summary: {
      totalSpent: formatDecimal(total),
      expenseCount: expenses.length,
      averageExpense: formatDecimal(average),
      topCategory: topCategory(expenses),
    },
    expenses: expenses.map((e) => ({
      id: e.id,
      date: e.date,
      description: e.description,
      amount: formatDecimal(e.amount),
      currency: e.currency,
      category: e.category,
      source: e.source,
      receiptId: e.receiptId ?? null,
    })),
  };

  return JSON.stringify(jsonExport, null, 2);
}
