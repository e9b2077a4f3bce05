import { recordExpense } from '../expense/recorder';
import { findExtremeExpense, listExpensesInRange } from '../expense/repository';
import { getTotalsByCategory, sumExpenses } from '../database/expense-queries';
import { createBudget, getBudgetStatuses } from '../budget';
import { computeInsights, describeInsights, getSpendingSummary } from '../analytics/insights';
import { getSuggestions } from '../analytics/suggestions';
import { getMonthlySpendingTrend } from '../analytics/trends';
import { handleAIMessage } from '../ai/message-handler';
import { parseTimeRange, TimeRange } from './time-range';
import { env } from '../../config/env';
import { DEFAULT_MESSAGES, DEFAULT_QUERY_LIMIT } from '../../config/constants';
import { toDateString } from '../../utils/dates';
import { ValidationError } from '../../utils/errors';
import { formatAmount, parseAmount } from '../../utils/money';
import { ChatReply, Entities, Intent } from '../../types/chat';

export interface HandlerContext {
  userId: string;
  text: string;
  entities: Entities;
  now: Date;
}

export type IntentHandler = (ctx: HandlerContext) => Promise<ChatReply> | ChatReply;

function money(cents: bigint): string {
  return formatAmount(cents, env.DEFAULT_CURRENCY);
}

function resolveRange(entities: Entities, now: Date): TimeRange {
  const range = parseTimeRange(entities.timeRange, now);
  if (!range) {
    throw new ValidationError(
      `I couldn't understand the time period '${entities.timeRange}'. Try "last month" or a date like 2026-03-01.`
    );
  }
  return range;
}

function withAlerts(message: string, alerts: { message: string }[]): string {
  return alerts.length > 0 ? [message, ...alerts.map((a) => a.message)].join('\n') : message;
}

async function addExpense({ userId, entities, now }: HandlerContext): Promise<ChatReply> {
  const description = entities.description?.trim();
  if (!entities.amount || !description) {
    return { message: "I'm missing the amount or description." };
  }

  const amount = parseAmount(entities.amount);
  if (amount === null || amount <= 0n) {
    return { message: 'The expense amount must be a positive number.' };
  }

  // Only a single-day phrase ("yesterday", "2026-03-01") can date an expense
  let date = toDateString(now);
  if (entities.timeRange) {
    const range = resolveRange(entities, now);
    if (range.startDate !== range.endDate) {
      throw new ValidationError(
        `An expense needs a single day, not '${entities.timeRange}'. Try "yesterday" or a date like 2026-03-01.`
      );
    }
    date = range.startDate;
  }

  const currency = entities.currency?.toUpperCase();
  const { expense, alerts } = await recordExpense(userId, {
    amount,
    description,
    category: entities.category,
    date,
    source: 'chat',
    currency: currency && /^[A-Z]{3}$/.test(currency) ? currency : undefined,
  });

  return {
    message: withAlerts(
      `Got it. I've added an expense of ${formatAmount(expense.amount, expense.currency)} for '${expense.description}' (${expense.category}).`,
      alerts
    ),
    expenses: [expense],
    alerts,
  };
}

function handleQuery({ userId, entities, now }: HandlerContext): ChatReply {
  const range = resolveRange(entities, now);
  const timeDesc = `in ${range.label}`;
  const { target, operation } = entities;
  const limit = entities.limit ?? DEFAULT_QUERY_LIMIT;

  if (operation === 'search' && target) {
    const results = listExpensesInRange(userId, range, { search: target });
    if (results.length === 0) {
      return { message: `No, I couldn't find any expenses for '${target}' ${timeDesc}.` };
    }

    const total = results.reduce((sum, e) => sum + e.amount, 0n);
    const lines = [
      `Yes, you spent a total of ${money(total)} on '${target}' ${timeDesc}. Here are the transactions I found:`,
      ...results.map((e) => `- ${money(e.amount)} on ${e.date}`),
    ];
    return { message: lines.join('\n'), expenses: results };
  }

  if (operation === 'highest' || operation === 'lowest') {
    const result = findExtremeExpense(userId, range, operation);
    if (!result) {
      return { message: `I found no expenses ${timeDesc}.` };
    }
    const kind = operation === 'highest' ? 'most expensive' : 'cheapest';
    return {
      message: `Your ${kind} purchase ${timeDesc} was '${result.description}' for ${money(result.amount)}.`,
      expenses: [result],
    };
  }

  if (operation === 'list') {
    const results = listExpensesInRange(userId, range).slice(0, limit);
    if (results.length === 0) {
      return { message: `I found no expenses ${timeDesc}.` };
    }
    const lines = [
      `Here are your last ${results.length} transactions:`,
      ...results.map((e) => `- ${money(e.amount)} for '${e.description}' on ${e.date}`),
    ];
    return { message: lines.join('\n'), expenses: results };
  }

  if (operation === 'top' || target === 'category') {
    const categories = getTotalsByCategory(userId, range, limit);
    if (categories.length === 0) {
      return { message: `I found no spending to categorize ${timeDesc}.` };
    }
    const lines = [
      `Here are your top ${categories.length} spending categories ${timeDesc}:`,
      ...categories.map((c) => `- ${c.category}: ${money(c.amount)}`),
    ];
    return { message: lines.join('\n') };
  }

  if (operation === 'total' && target) {
    const total = sumExpenses(userId, range, target);
    return { message: `You spent ${money(total)} on '${target}' ${timeDesc}.` };
  }

  return { message: `Your total spending ${timeDesc} was ${money(sumExpenses(userId, range))}.` };
}

function handleInsights({ userId, entities, now }: HandlerContext): ChatReply {
  const range = resolveRange(entities, now);
  if (listExpensesInRange(userId, range).length === 0) {
    return { message: "I couldn't find any expenses for that period to analyze." };
  }
  return { message: describeInsights(computeInsights(userId, range)) };
}

function handleSummary({ userId, entities, now }: HandlerContext): ChatReply {
  const range = resolveRange(entities, now);
  const timeDesc = `in ${range.label}`;
  const summary = getSpendingSummary(userId, range);

  if (summary.expenseCount === 0) {
    return { message: `I couldn't find any expenses to summarize for ${timeDesc}.` };
  }

  const lines = [
    `Here is a summary of your spending ${timeDesc}:`,
    `- You spent a total of ${money(summary.totalSpent)}.`,
  ];
  if (summary.mostExpensive) {
    lines.push(`- Your most expensive purchase was '${summary.mostExpensive.description}' for ${money(summary.mostExpensive.amount)}.`);
  }
  if (summary.cheapest) {
    lines.push(`- Your cheapest purchase was '${summary.cheapest.description}' for ${money(summary.cheapest.amount)}.`);
  }
  if (summary.topCategory) {
    lines.push(`- Your top spending category was '${summary.topCategory.category}' with a total of ${money(summary.topCategory.amount)}.`);
  }
  if (summary.lowestCategory) {
    lines.push(`- Your lowest spending category was '${summary.lowestCategory.category}' with a total of ${money(summary.lowestCategory.amount)}.`);
  }
  return { message: lines.join('\n') };
}

async function handleSuggestions({ userId, now }: HandlerContext): Promise<ChatReply> {
  return { message: await getSuggestions(userId, now) };
}

function handleBudgetStatus({ userId, now }: HandlerContext): ChatReply {
  const statuses = getBudgetStatuses(userId, toDateString(now));
  if (statuses.length === 0) {
    return { message: 'You have no active budgets. Try "set budget Groceries 300".' };
  }

  const lines = ['Your budgets:'];
  for (const s of statuses) {
    const flag = s.level === 'exceeded' ? ' (exceeded)' : s.level === 'warning' ? ' (warning)' : '';
    lines.push(
      `- ${s.budget.category}: ${money(s.spent)} of ${money(s.budget.amount)} (${s.percentage}%)${flag}, ${s.daysRemaining} days left`
    );
  }
  return { message: lines.join('\n') };
}

function handleSetBudget({ userId, entities, now }: HandlerContext): ChatReply {
  const amount = entities.amount ? parseAmount(entities.amount) : null;
  if (!entities.category || amount === null) {
    return { message: 'Tell me the category and the amount, for example "set budget Groceries 300".' };
  }

  const budget = createBudget(userId, { category: entities.category, amount }, now);
  return {
    message: `Budget set: ${budget.category} ${money(budget.amount)} from ${budget.startDate} to ${budget.endDate}.`,
  };
}

function handleMonthlyTrend({ userId, now }: HandlerContext): ChatReply {
  const trend = getMonthlySpendingTrend(userId, now);
  const lines = [
    'Your spending over the last 12 months:',
    ...trend.map((p) => `- ${p.year}-${String(p.month).padStart(2, '0')}: ${money(p.totalSpent)}`),
  ];
  return { message: lines.join('\n') };
}

async function handleUnknown({ userId, text }: HandlerContext): Promise<ChatReply> {
  return { message: await handleAIMessage(userId, text) };
}

export const INTENT_HANDLERS: Record<Exclude<Intent, 'upload_receipt'>, IntentHandler> = {
  add_expense: addExpense,
  query: handleQuery,
  get_insights: handleInsights,
  get_comprehensive_summary: handleSummary,
  get_suggestions: handleSuggestions,
  budget_status: handleBudgetStatus,
  set_budget: handleSetBudget,
  monthly_trend: handleMonthlyTrend,
  greeting: () => ({ message: DEFAULT_MESSAGES.GREETING }),
  help: () => ({ message: DEFAULT_MESSAGES.HELP }),
  clarification_needed: () => ({ message: DEFAULT_MESSAGES.CLARIFY }),
  unknown: handleUnknown,
};
