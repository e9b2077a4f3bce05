import { getTotalsByCategory } from '../database/expense-queries';
import { listExpensesInRange } from '../expense/repository';
import { generateResponse, isAIConfigured } from '../ai/gemini';
import { stripMarkdown } from '../ai/json';
import { buildSuggestionsPrompt } from '../ai/prompt-templates';
import { env } from '../../config/env';
import { DEFAULT_RANGE_DAYS } from '../../config/constants';
import { addDays, toDateString } from '../../utils/dates';
import { getErrorMessage } from '../../utils/errors';
import { formatAmount } from '../../utils/money';
import { CategoryChange } from '../../types/analytics';
import { DateRange, Expense } from '../../types/expense';

export interface ComparisonPeriods {
  current: DateRange;
  previous: DateRange;
}

export function getComparisonPeriods(now: Date = new Date()): ComparisonPeriods {
  const today = toDateString(now);
  const currentStart = addDays(today, -DEFAULT_RANGE_DAYS);
  return {
    current: { startDate: currentStart, endDate: today },
    previous: { startDate: addDays(currentStart, -(DEFAULT_RANGE_DAYS + 1)), endDate: addDays(currentStart, -1) },
  };
}

/**
 * Per-category spending of both periods, largest increase first.
 */
export function getCategoryChanges(userId: string, periods: ComparisonPeriods): CategoryChange[] {
  const changes = new Map<string, CategoryChange>();

  for (const total of getTotalsByCategory(userId, periods.current)) {
    changes.set(total.category.toLowerCase(), {
      category: total.category,
      current: total.amount,
      previous: 0n,
      change: total.amount,
    });
  }

  for (const total of getTotalsByCategory(userId, periods.previous)) {
    const key = total.category.toLowerCase();
    const entry = changes.get(key) ?? { category: total.category, current: 0n, previous: 0n, change: 0n };
    entry.previous = total.amount;
    entry.change = entry.current - total.amount;
    changes.set(key, entry);
  }

  return [...changes.values()].sort((a, b) => (b.change > a.change ? 1 : b.change < a.change ? -1 : 0));
}

export function describeCategoryChanges(changes: CategoryChange[]): string {
  const currency = env.DEFAULT_CURRENCY;
  const increases = changes.filter((c) => c.change > 0n).slice(0, 3);

  if (increases.length === 0) {
    return 'Your spending is flat or lower than in the previous 30 days. Keep it up!';
  }

  const lines = increases.map(
    (c) =>
      `- ${c.category} went up by ${formatAmount(c.change, currency)} (${formatAmount(c.previous, currency)} -> ${formatAmount(c.current, currency)}). Look for cheaper options there.`
  );
  return ['Compared with the previous 30 days:', ...lines].join('\n');
}

function toPromptRows(expenses: Expense[]): { description: string; amount: string; category: string }[] {
  return expenses.map((e) => ({
    description: e.description,
    amount: formatAmount(e.amount, e.currency),
    category: e.category,
  }));
}

/**
 * Advice from comparing the last 30 days with the 30 before. The model
 * writes it when configured; otherwise the biggest increases are listed.
 */
export async function getSuggestions(userId: string, now: Date = new Date()): Promise<string> {
  const periods = getComparisonPeriods(now);
  const current = listExpensesInRange(userId, periods.current);

  if (current.length === 0) {
    return "I don't have enough recent spending data to provide suggestions.";
  }

  const fallback = describeCategoryChanges(getCategoryChanges(userId, periods));
  if (!isAIConfigured()) {
    return fallback;
  }

  try {
    const previous = listExpensesInRange(userId, periods.previous);
    const response = await generateResponse({
      systemPrompt: 'You are a concise personal finance assistant.',
      userMessage: buildSuggestionsPrompt(
        toPromptRows(current),
        toPromptRows(previous),
        `${periods.current.startDate} to ${periods.current.endDate}`,
        `${periods.previous.startDate} to ${periods.previous.endDate}`
      ),
    });
    return stripMarkdown(response.text) || fallback;
  } catch (error) {
    console.error('[Suggestions] AI suggestions failed:', getErrorMessage(error));
    return fallback;
  }
}
