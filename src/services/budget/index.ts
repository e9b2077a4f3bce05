import { getDatabase } from '../database/db';
import { sumExpenses } from '../database/expense-queries';
import { normalizeCategory } from '../ai/categorizer';
import { env } from '../../config/env';
import { BUDGET_ALERT_THRESHOLD } from '../../config/constants';
import { generateId } from '../../utils/id';
import { daysBetween, isValidDateString, monthRange, rangesOverlap, toDateString } from '../../utils/dates';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { formatAmount } from '../../utils/money';
import { Budget, BudgetAlert, BudgetLevel, BudgetPatch, BudgetStatus, NewBudget } from '../../types/budget';
import { Expense } from '../../types/expense';

interface BudgetRow {
  id: string;
  user_id: string;
  category: string;
  amount: number | bigint;
  start_date: string;
  end_date: string;
  alert_threshold: number;
  created_at: string;
  updated_at: string;
}

const LEVEL_RANK: Record<BudgetLevel, number> = { ok: 0, warning: 1, exceeded: 2 };

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    userId: row.user_id,
    category: row.category,
    amount: BigInt(row.amount),
    startDate: row.start_date,
    endDate: row.end_date,
    alertThreshold: row.alert_threshold,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function validateBudget(userId: string, budget: Omit<Budget, 'id' | 'userId' | 'createdAt' | 'updatedAt'>, ignoreId?: string): void {
  if (!budget.category) {
    throw new ValidationError('Category name required');
  }
  if (budget.amount <= 0n) {
    throw new ValidationError('Budget amount must be positive.');
  }
  if (!isValidDateString(budget.startDate) || !isValidDateString(budget.endDate)) {
    throw new ValidationError('Invalid date format (YYYY-MM-DD)');
  }
  if (budget.startDate >= budget.endDate) {
    throw new ValidationError('Start date must be before end date.');
  }
  if (!(budget.alertThreshold > 0 && budget.alertThreshold <= 1)) {
    throw new ValidationError('Alert threshold must be between 0 and 1.');
  }

  const overlapping = listBudgets(userId).find(
    (b) =>
      b.id !== ignoreId &&
      b.category.toLowerCase() === budget.category.toLowerCase() &&
      rangesOverlap(b, budget)
  );
  if (overlapping) {
    throw new ConflictError(
      `A ${overlapping.category} budget already covers ${overlapping.startDate} to ${overlapping.endDate}`
    );
  }
}

export function createBudget(userId: string, input: NewBudget, now: Date = new Date()): Budget {
  const month = monthRange(now);
  const timestamp = new Date().toISOString();
  const budget: Budget = {
    id: generateId(),
    userId,
    category: normalizeCategory(input.category),
    amount: input.amount,
    startDate: input.startDate ?? month.startDate,
    endDate: input.endDate ?? month.endDate,
    alertThreshold: input.alertThreshold ?? BUDGET_ALERT_THRESHOLD,
    createdAt: timestamp,
    updatedAt: timestamp,
  };

  validateBudget(userId, budget);

  const db = getDatabase();
  db.prepare(`
    INSERT INTO budgets (id, user_id, category, amount, start_date, end_date, alert_threshold, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    budget.id,
    userId,
    budget.category,
    budget.amount,
    budget.startDate,
    budget.endDate,
    budget.alertThreshold,
    budget.createdAt,
    budget.updatedAt
  );

  console.log(`[Budget] Created budget for user ${userId} in category '${budget.category}'`);
  return budget;
}

export function listBudgets(userId: string): Budget[] {
  const db = getDatabase();
  return db
    .prepare<[string], BudgetRow>(`
      SELECT * FROM budgets
      WHERE user_id = ?
      ORDER BY start_date DESC, category ASC
    `)
    .all(userId)
    .map(toBudget);
}

export function getBudget(userId: string, budgetId: string): Budget {
  const db = getDatabase();
  const row = db
    .prepare<[string, string], BudgetRow>('SELECT * FROM budgets WHERE id = ? AND user_id = ?')
    .get(budgetId, userId);

  if (!row) {
    throw new NotFoundError('Budget not found');
  }
  return toBudget(row);
}

export function updateBudget(userId: string, budgetId: string, patch: BudgetPatch): Budget {
  const current = getBudget(userId, budgetId);
  const next: Budget = {
    ...current,
    category: patch.category === undefined ? current.category : normalizeCategory(patch.category),
    amount: patch.amount ?? current.amount,
    startDate: patch.startDate ?? current.startDate,
    endDate: patch.endDate ?? current.endDate,
    alertThreshold: patch.alertThreshold ?? current.alertThreshold,
    updatedAt: new Date().toISOString(),
  };

  validateBudget(userId, next, budgetId);

  const db = getDatabase();
  db.prepare(`
    UPDATE budgets
    SET category = ?, amount = ?, start_date = ?, end_date = ?, alert_threshold = ?, updated_at = ?
    WHERE id = ? AND user_id = ?
  `).run(next.category, next.amount, next.startDate, next.endDate, next.alertThreshold, next.updatedAt, budgetId, userId);

  console.log(`[Budget] Updated budget ${budgetId} for user ${userId}`);
  return next;
}

export function deleteBudget(userId: string, budgetId: string): void {
  const db = getDatabase();
  const result = db.prepare('DELETE FROM budgets WHERE id = ? AND user_id = ?').run(budgetId, userId);

  if (result.changes === 0) {
    throw new NotFoundError('Budget not found');
  }
  console.log(`[Budget] Deleted budget ${budgetId} for user ${userId}`);
}

// 0.855 -> [855n, 1000n], so the threshold compares without float error
function thresholdFraction(alertThreshold: number): [bigint, bigint] {
  const match = String(alertThreshold).match(/^(\d+)(?:\.(\d+))?$/);
  if (match) {
    const decimals = match[2] ?? '';
    return [BigInt(`${match[1]}${decimals}`), 10n ** BigInt(decimals.length)];
  }
  const scale = 1_000_000;
  return [BigInt(Math.round(alertThreshold * scale)), BigInt(scale)];
}

export function budgetLevel(spent: bigint, limit: bigint, alertThreshold: number): BudgetLevel {
  if (spent > limit) return 'exceeded';
  const [numerator, denominator] = thresholdFraction(alertThreshold);
  if (spent * denominator >= numerator * limit) return 'warning';
  return 'ok';
}

export function getBudgetStatus(budget: Budget, today: string = toDateString(new Date())): BudgetStatus {
  const spent = sumExpenses(budget.userId, budget, budget.category);
  const remaining = budget.amount > spent ? budget.amount - spent : 0n;
  const from = today > budget.startDate ? today : budget.startDate;

  return {
    budget,
    spent,
    remaining,
    percentage: Number((spent * 100n) / budget.amount),
    level: budgetLevel(spent, budget.amount, budget.alertThreshold),
    daysRemaining: Math.max(0, daysBetween(from, budget.endDate)),
  };
}

/**
 * Statuses of every budget, or only of those whose period contains `on`.
 */
export function getBudgetStatuses(userId: string, on?: string): BudgetStatus[] {
  const today = on ?? toDateString(new Date());
  return listBudgets(userId)
    .filter((b) => on === undefined || (b.startDate <= on && on <= b.endDate))
    .map((b) => getBudgetStatus(b, today));
}

export function getBudgetAlerts(userId: string, on: string = toDateString(new Date())): BudgetStatus[] {
  return getBudgetStatuses(userId, on)
    .filter((status) => status.level !== 'ok')
    .sort((a, b) => b.percentage - a.percentage);
}

export function describeBudgetLevel(category: string, level: Exclude<BudgetLevel, 'ok'>, spent: bigint, limit: bigint): string {
  const currency = env.DEFAULT_CURRENCY;
  if (level === 'exceeded') {
    return `You've exceeded your ${category} budget: ${formatAmount(spent, currency)} spent of ${formatAmount(limit, currency)}.`;
  }
  const percentage = Number((spent * 100n) / limit);
  return `Heads up: you've used ${percentage}% of your ${category} budget (${formatAmount(spent, currency)} of ${formatAmount(limit, currency)}).`;
}

/**
 * Re-evaluate the budgets an expense was recorded against. An alert is
 * emitted only when the expense moves a budget to a higher level.
 */
export function evaluateExpense(expense: Expense): BudgetAlert[] {
  const db = getDatabase();
  const budgets = db
    .prepare<[string, string, string, string], BudgetRow>(`
      SELECT * FROM budgets
      WHERE user_id = ?
        AND category = ?
        AND start_date <= ?
        AND end_date >= ?
    `)
    .all(expense.userId, expense.category, expense.date, expense.date)
    .map(toBudget);

  const alerts: BudgetAlert[] = [];

  for (const budget of budgets) {
    const spentAfter = sumExpenses(budget.userId, budget, budget.category);
    const spentBefore = spentAfter - expense.amount;
    const before = budgetLevel(spentBefore, budget.amount, budget.alertThreshold);
    const after = budgetLevel(spentAfter, budget.amount, budget.alertThreshold);

    if (after === 'ok' || LEVEL_RANK[after] <= LEVEL_RANK[before]) {
      continue;
    }

    console.log(`[Budget] ${budget.category} budget for user ${budget.userId} is now ${after}`);
    alerts.push({
      budgetId: budget.id,
      category: budget.category,
      level: after,
      spent: spentAfter,
      limit: budget.amount,
      percentage: Number((spentAfter * 100n) / budget.amount),
      message: describeBudgetLevel(budget.category, after, spentAfter, budget.amount),
    });
  }

  return alerts;
}
