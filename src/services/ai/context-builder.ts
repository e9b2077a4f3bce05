import { getTotalsByCategory, getMonthlyTotals } from '../database/expense-queries';
import { getDatabase } from '../database/db';
import { listExpensesInRange } from '../expense/repository';
import { env } from '../../config/env';
import { DEFAULT_RANGE_DAYS } from '../../config/constants';
import { addDays, toDateString } from '../../utils/dates';
import { formatAmount } from '../../utils/money';

interface ItemRow {
  name: string;
  price: number | bigint;
  date: string;
}

function getReceiptItems(userId: string, since: string): ItemRow[] {
  const db = getDatabase();
  return db.prepare<[string, string], ItemRow>(`
    SELECT
      i.item_name as name,
      i.amount as price,
      substr(r.uploaded_at, 1, 10) as date
    FROM receipt_items i
    JOIN receipts r ON i.receipt_id = r.id
    WHERE i.user_id = ?
      AND substr(r.uploaded_at, 1, 10) >= ?
    ORDER BY r.uploaded_at DESC
  `).all(userId, since);
}

function getPriceHistory(userId: string): { name: string; prices: { price: bigint; date: string }[] }[] {
  const db = getDatabase();
  const rows = db.prepare<[string], ItemRow>(`
    SELECT
      i.normalized_name as name,
      i.amount as price,
      substr(r.uploaded_at, 1, 10) as date
    FROM receipt_items i
    JOIN receipts r ON i.receipt_id = r.id
    WHERE i.user_id = ?
    ORDER BY i.normalized_name, r.uploaded_at DESC
  `).all(userId);

  const grouped = new Map<string, { price: bigint; date: string }[]>();
  for (const row of rows) {
    const prices = grouped.get(row.name) ?? [];
    prices.push({ price: BigInt(row.price), date: row.date });
    grouped.set(row.name, prices);
  }

  return [...grouped.entries()]
    .filter(([, prices]) => prices.length >= 2)
    .map(([name, prices]) => ({ name, prices }));
}

/**
 * Plain-text summary of the user's recent spending, handed to the model
 * alongside free-form questions.
 */
export function buildExpenseContext(userId: string, now: Date = new Date()): string {
  const today = toDateString(now);
  const recentRange = { startDate: addDays(today, -(DEFAULT_RANGE_DAYS - 1)), endDate: today };
  const recent = listExpensesInRange(userId, recentRange);
  const currency = env.DEFAULT_CURRENCY;

  if (recent.length === 0) {
    return 'No expense records found. Start tracking by sending receipt photos or typing amounts.';
  }

  const categories = getTotalsByCategory(userId, recentRange, 5);
  const monthly = getMonthlyTotals(userId, { startDate: addDays(today, -180), endDate: today });
  const items = getReceiptItems(userId, recentRange.startDate);
  const priceHistory = getPriceHistory(userId);

  let context = 'USER EXPENSE CONTEXT:\n\n';

  context += `Recent Activity (Last ${DEFAULT_RANGE_DAYS} Days):\n`;
  const totalRecent = recent.reduce((sum, e) => sum + e.amount, 0n);
  context += `- Total spent: ${formatAmount(totalRecent, currency)}\n`;
  context += `- Number of transactions: ${recent.length}\n\n`;

  context += 'Category Breakdown:\n';
  for (const cat of categories) {
    const pct = totalRecent > 0n ? (cat.amount * 100n) / totalRecent : 0n;
    context += `- ${cat.category}: ${formatAmount(cat.amount, currency)} (${pct}%, ${cat.count} expenses)\n`;
  }
  context += '\n';

  context += 'Transactions:\n';
  for (const e of recent.slice(0, 50)) {
    context += `- ${e.date} ${e.description} [${e.category}]: ${formatAmount(e.amount, e.currency)}\n`;
  }
  context += '\n';

  context += 'Monthly Trends (Last 6 Months):\n';
  for (const m of monthly) {
    context += `- ${m.month}: ${formatAmount(m.totalAmount, currency)}\n`;
  }

  if (items.length > 0) {
    context += '\nIndividual Items Purchased:\n';
    for (const item of items.slice(0, 50)) {
      context += `- ${item.name}: ${formatAmount(BigInt(item.price), currency)} (${item.date})\n`;
    }
    if (items.length > 50) {
      context += `... and ${items.length - 50} more items\n`;
    }
  }

  // Items bought more than once, newest price first
  if (priceHistory.length > 0) {
    context += '\nPrice History (items bought multiple times):\n';
    for (const item of priceHistory.slice(0, 10)) {
      const prices = item.prices.slice(0, 3);
      const priceStr = prices.map((p) => `${formatAmount(p.price, currency)} (${p.date})`).join(' -> ');
      context += `- ${item.name}: ${priceStr}\n`;
    }
  }

  return context;
}
