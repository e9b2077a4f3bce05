import { DEFAULT_RANGE_DAYS } from '../../config/constants';
import { addDays, isValidDateString, toDateString } from '../../utils/dates';
import { DateRange } from '../../types/expense';

export interface TimeRange extends DateRange {
  label: string;
}

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const DAY_MONTH_YEAR = /^(\d{1,2}) ([a-z]+),? (\d{4})$/;
const MONTH_DAY_YEAR = /^([a-z]+) (\d{1,2}),? (\d{4})$/;
const LAST_N_DAYS = /\blast (\d+) days?\b/;

/**
 * Phrases the time-range parser understands, for pulling them out of a
 * free-form message.
 */
export const TIME_PHRASE =
  /\b(today|yesterday|this week|last week|this month|last month|this year|last year|last \d+ days?|\d{4}-\d{2}-\d{2}|\d{1,2}(?:st|nd|rd|th)? [a-z]+,? \d{4}|[a-z]+ \d{1,2}(?:st|nd|rd|th)?,? \d{4})\b/i;

function monthIndex(name: string): number {
  return MONTHS.findIndex((m) => m === name || (name.length >= 3 && m.startsWith(name)));
}

function buildDate(year: number, monthIdx: number, day: number): string | null {
  if (monthIdx < 0) return null;
  const value = `${year}-${String(monthIdx + 1).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  return isValidDateString(value) ? value : null;
}

/**
 * "2026-03-01", "1 March 2026", "March 1st 2026"
 */
export function parseSpecificDate(phrase: string): string | null {
  const value = phrase
    .split('T')[0]
    .trim()
    .toLowerCase()
    .replace(/(\d+)(st|nd|rd|th)\b/g, '$1');

  if (isValidDateString(value)) {
    return value;
  }

  const dayFirst = value.match(DAY_MONTH_YEAR);
  if (dayFirst) {
    return buildDate(Number(dayFirst[3]), monthIndex(dayFirst[2]), Number(dayFirst[1]));
  }

  const monthFirst = value.match(MONTH_DAY_YEAR);
  if (monthFirst) {
    return buildDate(Number(monthFirst[3]), monthIndex(monthFirst[1]), Number(monthFirst[2]));
  }

  return null;
}

export function defaultTimeRange(now: Date = new Date()): TimeRange {
  const today = toDateString(now);
  return { startDate: addDays(today, -DEFAULT_RANGE_DAYS), endDate: today, label: `the last ${DEFAULT_RANGE_DAYS} days` };
}

/**
 * Resolve a time phrase into an inclusive date range. Without a phrase the
 * range is the last 30 days. Returns null for a phrase that carries digits
 * but is not understood, so callers do not silently widen the range.
 */
export function parseTimeRange(phrase: string | undefined, now: Date = new Date()): TimeRange | null {
  const trimmed = phrase?.trim() ?? '';
  if (!trimmed) {
    return defaultTimeRange(now);
  }

  const lower = trimmed.toLowerCase();
  const today = toDateString(now);
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();
  const weekday = (now.getUTCDay() + 6) % 7;

  const specific = parseSpecificDate(trimmed);
  if (specific) {
    return { startDate: specific, endDate: specific, label: trimmed };
  }

  const lastDays = lower.match(LAST_N_DAYS);

  if (lower.includes('today')) {
    return { startDate: today, endDate: today, label: 'today' };
  }
  if (lower.includes('yesterday')) {
    const yesterday = addDays(today, -1);
    return { startDate: yesterday, endDate: yesterday, label: 'yesterday' };
  }
  if (lower.includes('this week')) {
    return { startDate: addDays(today, -weekday), endDate: today, label: 'this week' };
  }
  if (lower.includes('last week')) {
    const lastSunday = addDays(today, -(weekday + 1));
    return { startDate: addDays(lastSunday, -6), endDate: lastSunday, label: 'last week' };
  }
  if (lower.includes('this month')) {
    return { startDate: toDateString(new Date(Date.UTC(year, month, 1))), endDate: today, label: 'this month' };
  }
  if (lower.includes('last month')) {
    return {
      startDate: toDateString(new Date(Date.UTC(year, month - 1, 1))),
      endDate: toDateString(new Date(Date.UTC(year, month, 0))),
      label: 'last month',
    };
  }
  if (lower.includes('this year')) {
    return { startDate: `${year}-01-01`, endDate: today, label: 'this year' };
  }
  if (lower.includes('last year')) {
    return { startDate: `${year - 1}-01-01`, endDate: `${year - 1}-12-31`, label: 'last year' };
  }
  if (lastDays && Number(lastDays[1]) > 0) {
    const days = Number(lastDays[1]);
    return { startDate: addDays(today, -(days - 1)), endDate: today, label: `the last ${days} days` };
  }

  if (/\d/.test(lower)) {
    return null;
  }

  return defaultTimeRange(now);
}
