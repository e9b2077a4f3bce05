import { parseAmount } from '../../utils/money';

export interface ParsedExpense {
  amount: bigint;
  description: string;
  currency?: string;
}

const AMOUNT_TOKEN =
  /(?<![\d.,-])([€$£]\s*)?(\d+(?:[.,]\d{1,2})?)(?![\d.,])(\s*(?:€|\$|£|eur\b|euros?\b|usd\b|dollars?\b|gbp\b|pounds?\b))?/gi;

const LEADING_VERB = /^(?:i\s+)?(?:just\s+)?(?:spent|paid|bought|add|added|spend)\b\s*/i;
const LEADING_PREPOSITION = /^(?:on|for)\b\s*/i;
const TRAILING_PREPOSITION = /\s+(?:on|for|at)$/i;
const PRICE_CUE = /\b(?:for|on|spent|paid|cost|costs)\s*$/i;

function detectCurrency(symbol: string): string | undefined {
  const value = symbol.trim().toLowerCase();
  if (!value) return undefined;
  if (value === '€' || value.startsWith('eur')) return 'EUR';
  if (value === '$' || value === 'usd' || value.startsWith('dollar')) return 'USD';
  if (value === '£' || value === 'gbp' || value.startsWith('pound')) return 'GBP';
  return undefined;
}

// A currency beside the number, a cue word before it and two decimals each
// make it more likely to be the price than a quantity
function priceScore(text: string, match: RegExpMatchArray): number {
  const before = text.slice(0, match.index ?? 0);
  let score = 0;
  if (match[1] || match[3]) score += 4;
  if (PRICE_CUE.test(before)) score += 2;
  if (/[.,]\d{2}$/.test(match[2])) score += 1;
  return score;
}

/**
 * Parse short expense entries: "20 coffee", "15.50 gas", "spent €12,50 on lunch",
 * "bought 2 coffees for 7.50". With several numbers the likeliest price wins.
 * Returns null when there is no positive amount or nothing left to describe
 * the expense.
 */
export function parseQuickEntry(text: string): ParsedExpense | null {
  const trimmed = text.trim();

  let match: RegExpMatchArray | null = null;
  let best = -1;
  for (const candidate of trimmed.matchAll(AMOUNT_TOKEN)) {
    const score = priceScore(trimmed, candidate);
    if (score > best) {
      match = candidate;
      best = score;
    }
  }
  if (!match || match.index === undefined) return null;

  const amount = parseAmount(match[2]);
  if (amount === null || amount <= 0n) return null;

  const remainder = `${trimmed.slice(0, match.index)} ${trimmed.slice(match.index + match[0].length)}`;
  const description = remainder
    .replace(/\s+/g, ' ')
    .trim()
    .replace(LEADING_VERB, '')
    .replace(LEADING_PREPOSITION, '')
    .replace(TRAILING_PREPOSITION, '')
    .trim();

  if (!description) return null;

  return {
    amount,
    description,
    currency: detectCurrency(`${match[1] ?? ''}${match[3] ?? ''}`),
  };
}
