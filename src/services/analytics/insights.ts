import { getTotalsByCategory, sumExpenses } from '../database/expense-queries';
import { findExtremeExpense, listExpensesInRange } from '../expense/repository';
import { env } from '../../config/env';
import { formatAmount } from '../../utils/money';
import { Anomaly, CategoryTotal, Insights } from '../../types/analytics';
import { DateRange, Expense } from '../../types/expense';

const MIN_EXPENSES_FOR_ANOMALIES = 4;

export interface SpendingSummary {
  totalSpent: bigint;
  expenseCount: number;
  mostExpensive: Expense | null;
  cheapest: Expense | null;
  topCategory: CategoryTotal | null;
  lowestCategory: CategoryTotal | null;
}

/**
 * Expenses more than two standard deviations above the mean of the set.
 */
export function findAnomalies(expenses: Expense[]): Anomaly[] {
  if (expenses.length < MIN_EXPENSES_FOR_ANOMALIES) {
    return [];
  }

  const amounts = expenses.map((e) => Number(e.amount));
  const mean = amounts.reduce((sum, a) => sum + a, 0) / amounts.length;
  const variance = amounts.reduce((sum, a) => sum + (a - mean) ** 2, 0) / amounts.length;
  const cutoff = mean + 2 * Math.sqrt(variance);
  const usual = BigInt(Math.round(mean));

  return expenses
    .filter((e) => Number(e.amount) > cutoff)
    .map((e) => ({
      expenseId: e.id,
      description: e.description,
      amount: e.amount,
      category: e.category,
      reason: `${formatAmount(e.amount, e.currency)} is far above your average of ${formatAmount(usual, e.currency)}`,
    }));
}

export function computeInsights(userId: string, range: DateRange, topLimit: number = 3): Insights {
  return {
    totalSpent: sumExpenses(userId, range),
    topCategories: getTotalsByCategory(userId, range, topLimit),
    anomalies: findAnomalies(listExpensesInRange(userId, range)),
  };
}

export function getSpendingSummary(userId: string, range: DateRange): SpendingSummary {
  const categories = getTotalsByCategory(userId, range);

  return {
    totalSpent: sumExpenses(userId, range),
    expenseCount: categories.reduce((sum, c) => sum + c.count, 0),
    mostExpensive: findExtremeExpense(userId, range, 'highest'),
    cheapest: findExtremeExpense(userId, range, 'lowest'),
    topCategory: categories[0] ?? null,
    lowestCategory: categories.length > 1 ? categories[categories.length - 1] : null,
  };
}

export function describeInsights(insights: Insights): string {
  const currency = env.DEFAULT_CURRENCY;
  let response = `In that period, you've spent a total of ${formatAmount(insights.totalSpent, currency)}.`;

  if (insights.topCategories.length > 0) {
    response += ` Your top spending category was '${insights.topCategories[0].category}'.`;
  }

  if (insights.anomalies.length > 0) {
    response += '\nUnusual expenses:';
    for (const anomaly of insights.anomalies) {
      response += `\n- '${anomaly.description}': ${anomaly.reason}`;
    }
  }

  return response;
}
