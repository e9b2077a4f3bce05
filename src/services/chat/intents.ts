import { parseQuickEntry } from '../expense/quick-entry';
import { isSystemCategory, normalizeCategory } from '../ai/categorizer';
import { TIME_PHRASE } from './time-range';
import { formatDecimal } from '../../utils/money';
import { ClassifiedMessage, Entities } from '../../types/chat';

const GREETING = /^(?:hi|hello|hey|hiya|good (?:morning|afternoon|evening))\b[\s!.,]*(?:there)?[\s!.]*$/i;
const HELP = /^\/?(?:help|start)\b|\bwhat can you do\b|\bhow does this work\b/i;
const SET_BUDGET = /\b(?:set|create|add|make)\s+(?:a\s+|my\s+)?budget\b/i;
const BUDGET = /\bbudgets?\b/i;
const TREND = /\b(?:trend|trends|month by month|monthly spending|per month)\b/i;
const SUGGESTIONS = /\b(?:suggest|suggestions?|advice|advise|save money|saving tips|tips)\b/i;
const INSIGHTS = /\b(?:insights?|unusual|anomal(?:y|ies)|analy[sz]e)\b/i;
const SUMMARY = /\b(?:summary|summari[sz]e|overview|recap)\b/i;
const QUESTION =
  /\?\s*$|^(?:how|what|which|when|where|did|do|show|list|give|tell)\b|\b(?:how much|total|top|highest|lowest|most expensive|cheapest|biggest|smallest|transactions)\b/i;
const QUERY_HINT =
  /\b(?:how much|total|top|highest|lowest|most expensive|cheapest|biggest|smallest|transactions?|purchases?|spen[dt]|spending|expenses?|categor(?:y|ies)|buy|bought|paid)\b/i;
const MONEY_TALK = /\b(?:spen[dt]|spending|expenses?|money|cost|paid|pay|bought|receipt)\b/i;

const BUDGET_AMOUNT_FIRST = /budget\s+(?:of\s+)?(\d+(?:[.,]\d{1,2})?)\s*(?:€|eur|euros?|\$)?\s+(?:for|on)\s+([a-z][a-z &-]*)/i;
const BUDGET_CATEGORY_FIRST = /budget\s+(?:for\s+)?([a-z][a-z &-]*?)\s+(?:to\s+|at\s+|of\s+)?[€$]?(\d+(?:[.,]\d{1,2})?)/i;

const HIGHEST = /\b(?:most expensive|highest|biggest|largest)\b/i;
const LOWEST = /\b(?:cheapest|lowest|smallest)\b/i;
const LIST = /\b(?:last|recent|latest)\s+(\d+)\s+(?:transactions|expenses|purchases)\b|\blist\b|\b(?:transactions|purchases)\b/i;
const TOP = /\btop\s*(\d+)?\b|\bcategor(?:y|ies)\b/i;
const TARGET = /\b(?:on|for|at|buy|bought)\s+(.+)$/i;

function extractTimeRange(text: string): { timeRange?: string; rest: string } {
  const match = text.match(TIME_PHRASE);
  if (!match || match.index === undefined) {
    return { rest: text };
  }
  const rest = `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`.replace(/\s+/g, ' ').trim();
  return { timeRange: match[0], rest };
}

function cleanTarget(value: string): string {
  return value
    .replace(/[?!.]+$/, '')
    .replace(/^(?:the|my)\s+/i, '')
    .replace(/\b(?:in|during)\s*$/i, '')
    .trim();
}

function parseBudget(text: string): Entities {
  const amountFirst = text.match(BUDGET_AMOUNT_FIRST);
  if (amountFirst) {
    return { amount: amountFirst[1].replace(',', '.'), category: normalizeCategory(amountFirst[2].trim()) };
  }

  const categoryFirst = text.match(BUDGET_CATEGORY_FIRST);
  if (categoryFirst) {
    return { category: normalizeCategory(categoryFirst[1].trim()), amount: categoryFirst[2].replace(',', '.') };
  }

  return {};
}

/**
 * Query entities for questions about recorded expenses.
 */
export function parseQuery(text: string): Entities {
  const { timeRange, rest } = extractTimeRange(text);
  const entities: Entities = timeRange ? { timeRange } : {};

  if (HIGHEST.test(rest)) {
    return { ...entities, operation: 'highest', target: 'item' };
  }
  if (LOWEST.test(rest)) {
    return { ...entities, operation: 'lowest', target: 'item' };
  }

  const top = rest.match(TOP);
  if (top) {
    return { ...entities, operation: 'top', target: 'category', ...(top[1] ? { limit: Number(top[1]) } : {}) };
  }

  const list = rest.match(LIST);
  if (list) {
    return { ...entities, operation: 'list', target: 'transaction', ...(list[1] ? { limit: Number(list[1]) } : {}) };
  }

  const target = rest.match(TARGET);
  const cleaned = target ? cleanTarget(target[1]) : '';
  if (cleaned) {
    return isSystemCategory(cleaned)
      ? { ...entities, operation: 'total', target: normalizeCategory(cleaned) }
      : { ...entities, operation: 'search', target: cleaned };
  }

  return entities;
}

/**
 * Deterministic keyword classifier. Used on its own when no language model
 * is configured and as the fallback when the model's answer is unusable.
 */
export function classifyByRules(message: string): ClassifiedMessage {
  const text = message.trim();

  if (GREETING.test(text)) return { intent: 'greeting', entities: {} };
  if (HELP.test(text)) return { intent: 'help', entities: {} };
  if (SET_BUDGET.test(text)) return { intent: 'set_budget', entities: parseBudget(text) };
  if (BUDGET.test(text)) return { intent: 'budget_status', entities: {} };
  if (TREND.test(text)) return { intent: 'monthly_trend', entities: {} };
  if (SUGGESTIONS.test(text)) return { intent: 'get_suggestions', entities: {} };

  const { timeRange, rest } = extractTimeRange(text);
  const withRange: Entities = timeRange ? { timeRange } : {};

  if (INSIGHTS.test(text)) return { intent: 'get_insights', entities: withRange };
  if (SUMMARY.test(text)) return { intent: 'get_comprehensive_summary', entities: withRange };
  if (QUESTION.test(text) && QUERY_HINT.test(text)) return { intent: 'query', entities: parseQuery(text) };

  const entry = parseQuickEntry(rest);
  if (entry) {
    return {
      intent: 'add_expense',
      entities: {
        ...withRange,
        amount: formatDecimal(entry.amount),
        description: entry.description,
        ...(entry.currency ? { currency: entry.currency } : {}),
      },
    };
  }

  if (MONEY_TALK.test(text)) return { intent: 'clarification_needed', entities: {} };
  return { intent: 'unknown', entities: {} };
}
