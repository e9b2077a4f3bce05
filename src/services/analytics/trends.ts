import { getMonthlyTotals } from '../database/expense-queries';
import { TREND_MONTHS } from '../../config/constants';
import { toDateString } from '../../utils/dates';
import { MonthlyTrendPoint } from '../../types/analytics';

export function monthKey(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}

export function getPreviousMonth(month: string): string {
  const [year, monthNum] = month.split('-').map(Number);
  let prevMonth = monthNum - 1;
  let prevYear = year;

  if (prevMonth === 0) {
    prevMonth = 12;
    prevYear -= 1;
  }

  return monthKey(prevYear, prevMonth);
}

/**
 * Spending per calendar month for the last TREND_MONTHS months, oldest
 * first. The current month is the last point; empty months report zero.
 */
export function getMonthlySpendingTrend(userId: string, now: Date = new Date()): MonthlyTrendPoint[] {
  const months: string[] = [monthKey(now.getUTCFullYear(), now.getUTCMonth() + 1)];
  while (months.length < TREND_MONTHS) {
    months.unshift(getPreviousMonth(months[0]));
  }

  const totals = new Map(
    getMonthlyTotals(userId, { startDate: `${months[0]}-01`, endDate: toDateString(now) }).map((m) => [
      m.month,
      m.totalAmount,
    ])
  );

  return months.map((key) => {
    const [year, month] = key.split('-').map(Number);
    return { year, month, totalSpent: totals.get(key) ?? 0n };
  });
}
