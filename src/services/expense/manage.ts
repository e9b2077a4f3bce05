import { EXPENSE_MAX_PAGE_SIZE, EXPENSE_PAGE_SIZE } from '../../config/constants';
import { normalizeCategory } from '../ai/categorizer';
import { deleteExpenseRow, findExpense, listExpenses, updateExpenseRow } from './repository';
import { isValidDateString } from '../../utils/dates';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../utils/errors';
import { Expense, ExpensePatch } from '../../types/expense';

export interface Page {
  skip?: number;
  limit?: number;
}

export function getExpensesPage(userId: string, page: Page = {}): Expense[] {
  const skip = Math.max(0, page.skip ?? 0);
  const limit = Math.min(Math.max(1, page.limit ?? EXPENSE_PAGE_SIZE), EXPENSE_MAX_PAGE_SIZE);
  return listExpenses(userId, skip, limit);
}

export function getUserExpense(userId: string, expenseId: string): Expense {
  const expense = findExpense(expenseId);
  if (!expense) {
    throw new NotFoundError('Expense not found');
  }
  if (expense.userId !== userId) {
    throw new ForbiddenError('You do not have permission to access this expense');
  }
  return expense;
}

export function updateExpense(userId: string, expenseId: string, patch: ExpensePatch): Expense {
  const expense = getUserExpense(userId, expenseId);

  if (expense.source === 'receipt' && (patch.amount !== undefined || patch.date !== undefined)) {
    throw new ConflictError('Expenses recorded from a receipt cannot change amount or date');
  }
  if (patch.amount !== undefined && patch.amount <= 0n) {
    throw new ValidationError('The expense amount must be a positive number.');
  }
  if (patch.description !== undefined && !patch.description.trim()) {
    throw new ValidationError('An expense needs a description.');
  }
  if (patch.date !== undefined && !isValidDateString(patch.date)) {
    throw new ValidationError('Invalid date format (YYYY-MM-DD)');
  }
  if (patch.category !== undefined && !patch.category.trim()) {
    throw new ValidationError('Category name required');
  }

  const updated = updateExpenseRow(expenseId, {
    amount: patch.amount,
    description: patch.description?.trim(),
    category: patch.category === undefined ? undefined : normalizeCategory(patch.category),
    date: patch.date,
  });
  if (!updated) {
    throw new NotFoundError('Expense not found or could not be updated');
  }

  console.log(`[Expenses] Updated expense ${expenseId} for user ${userId}`);
  return updated;
}

export function overrideExpenseCategory(userId: string, expenseId: string, category: string): Expense {
  return updateExpense(userId, expenseId, { category });
}

export function deleteExpense(userId: string, expenseId: string): void {
  getUserExpense(userId, expenseId);

  if (!deleteExpenseRow(expenseId)) {
    throw new NotFoundError('Expense not found or could not be deleted');
  }
  console.log(`[Expenses] Deleted expense ${expenseId} for user ${userId}`);
}
