import { env } from '../../config/env';
import { categorizeExpense, normalizeCategory } from '../ai/categorizer';
import { evaluateExpense } from '../budget';
import { insertExpense } from './repository';
import { isValidDateString, toDateString } from '../../utils/dates';
import { ValidationError } from '../../utils/errors';
import { formatAmount } from '../../utils/money';
import { Expense, NewExpense } from '../../types/expense';
import { BudgetAlert } from '../../types/budget';

export interface RecordedExpense {
  expense: Expense;
  alerts: BudgetAlert[];
}

export function validateNewExpense(input: Pick<NewExpense, 'amount' | 'description'>): void {
  if (input.amount <= 0n) {
    throw new ValidationError('The expense amount must be a positive number.');
  }
  if (!input.description.trim()) {
    throw new ValidationError('An expense needs a description.');
  }
}

export function resolveExpenseDate(date: string | undefined, now: Date = new Date()): string {
  if (date && isValidDateString(date)) {
    return date;
  }
  if (date) {
    console.warn(`[Recorder] Failed to parse date '${date}', using today`);
  }
  return toDateString(now);
}

/**
 * Persist one expense and evaluate the budgets it falls into.
 */
export async function recordExpense(userId: string, input: NewExpense): Promise<RecordedExpense> {
  validateNewExpense(input);

  const description = input.description.trim();
  const category = input.category?.trim()
    ? normalizeCategory(input.category)
    : await categorizeExpense(description);

  const expense = insertExpense(userId, {
    amount: input.amount,
    description,
    category,
    date: resolveExpenseDate(input.date),
    currency: input.currency ?? env.DEFAULT_CURRENCY,
    source: input.source,
    receiptId: input.receiptId,
  });

  console.log(`[Recorder] ${input.source} expense ${formatAmount(expense.amount, expense.currency)} -> ${category}`);

  const alerts = evaluateExpense(expense);
  return { expense, alerts };
}
