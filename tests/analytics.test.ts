import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initializeDatabase, closeDatabase } from '../src/services/database/db';
import { insertExpense } from '../src/services/expense/repository';
import { findAnomalies, computeInsights, describeInsights, getSpendingSummary } from '../src/services/analytics/insights';
import { getComparisonPeriods, getSuggestions } from '../src/services/analytics/suggestions';
import { getMonthlySpendingTrend, getPreviousMonth } from '../src/services/analytics/trends';

const NOW = new Date('2024-05-15T10:00:00Z');
const USER = 'analyst';

function add(amount: bigint, description: string, category: string, date: string) {
  return insertExpense(USER, { amount, description, category, date, currency: 'EUR', source: 'manual' });
}

describe('Analytics', () => {
  beforeEach(() => {
    initializeDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('flags expenses far above the average', () => {
    const usual = [1, 2, 3, 4, 5].map((d) => add(1000n, `lunch ${d}`, 'Restaurants', `2024-05-0${d}`));
    const phone = add(10000n, 'new phone', 'Shopping', '2024-05-06');

    const anomalies = findAnomalies([...usual, phone]);
    expect(anomalies).toHaveLength(1);
    expect(anomalies[0].reason).toBe('100.00 EUR is far above your average of 25.00 EUR');
    expect(findAnomalies(usual.slice(0, 3))).toEqual([]);

    const range = { startDate: '2024-05-01', endDate: '2024-05-31' };
    expect(describeInsights(computeInsights(USER, range))).toBe(
      "In that period, you've spent a total of 150.00 EUR. Your top spending category was 'Shopping'.\n" +
        "Unusual expenses:\n- 'new phone': 100.00 EUR is far above your average of 25.00 EUR"
    );
  });

  it('summarizes extremes and categories', () => {
    add(1200n, 'dinner', 'Restaurants', '2024-05-02');
    add(300n, 'bus', 'Transportation', '2024-05-03');
    add(4500n, 'shoes', 'Shopping', '2024-05-04');

    const summary = getSpendingSummary(USER, { startDate: '2024-05-01', endDate: '2024-05-31' });
    expect(summary.totalSpent).toBe(6000n);
    expect(summary.expenseCount).toBe(3);
    expect(summary.mostExpensive?.description).toBe('shoes');
    expect(summary.cheapest?.description).toBe('bus');
    expect(summary.topCategory?.category).toBe('Shopping');
    expect(summary.lowestCategory?.category).toBe('Transportation');
  });

  it('builds a twelve month trend with empty months', () => {
    add(500n, 'book', 'Entertainment', '2023-07-10');
    add(1000n, 'train', 'Transportation', '2024-05-02');
    add(9900n, 'too old', 'Other', '2023-05-31');

    const trend = getMonthlySpendingTrend(USER, NOW);
    expect(trend).toHaveLength(12);
    expect(trend[0]).toEqual({ year: 2023, month: 6, totalSpent: 0n });
    expect(trend[1]).toEqual({ year: 2023, month: 7, totalSpent: 500n });
    expect(trend[11]).toEqual({ year: 2024, month: 5, totalSpent: 1000n });
    expect(getPreviousMonth('2024-01')).toBe('2023-12');
  });

  it('compares the last 30 days with the 30 before', async () => {
    expect(getComparisonPeriods(NOW)).toEqual({
      current: { startDate: '2024-04-15', endDate: '2024-05-15' },
      previous: { startDate: '2024-03-15', endDate: '2024-04-14' },
    });

    expect(await getSuggestions(USER, NOW)).toBe(
      "I don't have enough recent spending data to provide suggestions."
    );

    add(5000n, 'dinner', 'Restaurants', '2024-05-01');
    add(2000n, 'dinner', 'Restaurants', '2024-04-01');
    add(1000n, 'market', 'Groceries', '2024-05-02');
    add(3000n, 'market', 'Groceries', '2024-04-10');

    expect(await getSuggestions(USER, NOW)).toBe(
      'Compared with the previous 30 days:\n' +
        '- Restaurants went up by 30.00 EUR (20.00 EUR -> 50.00 EUR). Look for cheaper options there.'
    );
  });
});
