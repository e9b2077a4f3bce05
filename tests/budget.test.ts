import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initializeDatabase, closeDatabase } from '../src/services/database/db';
import { recordExpense } from '../src/services/expense/recorder';
import {
  budgetLevel,
  createBudget,
  deleteBudget,
  getBudgetAlerts,
  getBudgetStatus,
  getBudgetStatuses,
  listBudgets,
  updateBudget,
} from '../src/services/budget';
import { ConflictError, NotFoundError, ValidationError } from '../src/utils/errors';

const USER = 'user-1';
const MARCH = { startDate: '2024-03-01', endDate: '2024-03-31' };

async function spend(amount: bigint, category = 'Groceries', date = '2024-03-05') {
  return recordExpense(USER, { amount, description: 'shopping', category, date, source: 'manual' });
}

describe('budgetLevel', () => {
  it('warns at the threshold and exceeds only above the limit', () => {
    expect(budgetLevel(79n, 100n, 0.8)).toBe('ok');
    expect(budgetLevel(80n, 100n, 0.8)).toBe('warning');
    expect(budgetLevel(100n, 100n, 0.8)).toBe('warning');
    expect(budgetLevel(101n, 100n, 0.8)).toBe('exceeded');
  });

  it('compares fractional thresholds exactly', () => {
    expect(budgetLevel(855n, 1000n, 0.855)).toBe('warning');
    expect(budgetLevel(8550n, 10000n, 0.855)).toBe('warning');
    expect(budgetLevel(854n, 1000n, 0.855)).toBe('ok');
    expect(budgetLevel(85n, 100n, 0.855)).toBe('ok');
  });
});

describe('Budgets', () => {
  beforeEach(() => {
    initializeDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('normalizes the category and defaults to the current month', () => {
    const budget = createBudget(USER, { category: 'groceries', amount: 30000n }, new Date('2024-02-10T09:00:00Z'));
    expect(budget.category).toBe('Groceries');
    expect(budget.startDate).toBe('2024-02-01');
    expect(budget.endDate).toBe('2024-02-29');
    expect(budget.alertThreshold).toBe(0.8);
    expect(listBudgets(USER).map((b) => b.id)).toEqual([budget.id]);
  });

  it('rejects overlapping budgets for the same category', () => {
    createBudget(USER, { category: 'Groceries', amount: 10000n, ...MARCH });

    expect(() =>
      createBudget(USER, { category: 'GROCERIES', amount: 5000n, startDate: '2024-03-15', endDate: '2024-04-15' })
    ).toThrow(ConflictError);
    expect(() =>
      createBudget(USER, { category: 'Restaurants', amount: 5000n, startDate: '2024-03-15', endDate: '2024-04-15' })
    ).not.toThrow();
  });

  it('validates amount and period', () => {
    expect(() => createBudget(USER, { category: 'Bills', amount: 0n, ...MARCH })).toThrow(ValidationError);
    expect(() =>
      createBudget(USER, { category: 'Bills', amount: 100n, startDate: '2024-03-31', endDate: '2024-03-01' })
    ).toThrow('Start date must be before end date.');
    expect(() => createBudget(USER, { category: 'Bills', amount: 100n, alertThreshold: 1.5, ...MARCH })).toThrow(
      'Alert threshold must be between 0 and 1.'
    );
  });

  it('alerts once when a budget crosses into warning and again when exceeded', async () => {
    createBudget(USER, { category: 'Groceries', amount: 10000n, ...MARCH });

    expect((await spend(7000n)).alerts).toEqual([]);

    const warning = (await spend(1500n)).alerts;
    expect(warning).toHaveLength(1);
    expect(warning[0].level).toBe('warning');
    expect(warning[0].percentage).toBe(85);
    expect(warning[0].message).toBe("Heads up: you've used 85% of your Groceries budget (85.00 EUR of 100.00 EUR).");

    expect((await spend(500n)).alerts).toEqual([]);

    const exceeded = (await spend(2000n)).alerts;
    expect(exceeded).toHaveLength(1);
    expect(exceeded[0].level).toBe('exceeded');
    expect(exceeded[0].message).toBe("You've exceeded your Groceries budget: 110.00 EUR spent of 100.00 EUR.");
  });

  it('ignores expenses outside the category or period', async () => {
    createBudget(USER, { category: 'Groceries', amount: 1000n, ...MARCH });

    expect((await spend(5000n, 'Restaurants')).alerts).toEqual([]);
    expect((await spend(5000n, 'Groceries', '2024-04-02')).alerts).toEqual([]);
  });

  it('derives status from recorded expenses', async () => {
    const budget = createBudget(USER, { category: 'Groceries', amount: 10000n, ...MARCH });
    await spend(11000n);

    const status = getBudgetStatus(budget, '2024-03-21');
    expect(status.spent).toBe(11000n);
    expect(status.remaining).toBe(0n);
    expect(status.percentage).toBe(110);
    expect(status.level).toBe('exceeded');
    expect(status.daysRemaining).toBe(10);

    expect(getBudgetStatuses(USER, '2024-04-01')).toEqual([]);
    expect(getBudgetAlerts(USER, '2024-03-21').map((s) => s.budget.id)).toEqual([budget.id]);
  });

  it('updates and deletes budgets', async () => {
    const budget = createBudget(USER, { category: 'Groceries', amount: 10000n, ...MARCH });
    await spend(9000n);

    const raised = updateBudget(USER, budget.id, { amount: 20000n });
    expect(getBudgetStatus(raised, '2024-03-10').level).toBe('ok');

    deleteBudget(USER, budget.id);
    expect(listBudgets(USER)).toEqual([]);
    expect(() => deleteBudget(USER, budget.id)).toThrow(NotFoundError);
  });
});
