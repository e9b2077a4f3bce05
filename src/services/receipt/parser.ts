import { ParsedReceipt, ReceiptItem } from '../../types/expense';
import { parseAmount } from '../../utils/money';

// "Milk 2.49", "Bread 1,80 A", "Coupon -0.50", "Eggs € 3.10"
const PRICE_LINE = /^(.*?)\s+(-?)(?:[€$£]\s?)?(\d+[.,]\d{2})\s*(?:€|eur|usd|gbp|[a-z])?$/i;
const TOTAL_LINE = /^(?:grand\s+)?(?:total|totaal|summe|gesamt|amount due|te betalen)\b/i;
const SKIP_LINE =
  /\b(?:sub\s*-?total|tax|vat|btw|tva|iva|mwst|gst|change|cash|card|visa|mastercard|pin|paid|balance|tip)\b/i;
const TAX_WORD = /\b(?:tax|vat|btw|tva|iva|mwst|gst)\b/i;
const LEADING_QTY = /^(\d+)\s*[x×]\s+(.+)$/i;
const TRAILING_QTY = /^(.+?)\s+[x×]\s*(\d+)$/i;

function splitQuantity(label: string): { name: string; quantity: number } {
  const leading = label.match(LEADING_QTY);
  if (leading) {
    return { name: leading[2].trim(), quantity: Number(leading[1]) };
  }

  const trailing = label.match(TRAILING_QTY);
  if (trailing) {
    return { name: trailing[1].trim(), quantity: Number(trailing[2]) };
  }

  return { name: label.trim(), quantity: 1 };
}

function toCents(sign: string, digits: string): bigint | null {
  const cents = parseAmount(digits);
  if (cents === null) return null;
  return sign === '-' ? -cents : cents;
}

export function receiptConfidence(itemCount: number): number {
  return itemCount > 3 ? 0.9 : itemCount > 0 ? 0.6 : 0;
}

/**
 * Line-based reading of receipt text, used when no language model is
 * available. Lines ending in a price are items, the first text line is the
 * store and the first TOTAL line gives the total.
 */
export function parseReceiptLines(text: string): ParsedReceipt {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  let storeName = '';
  let totalAmount = 0n;
  let totalFound = false;
  const items: ReceiptItem[] = [];

  for (const line of lines) {
    const priced = line.match(PRICE_LINE);

    if (!priced) {
      if (!storeName && /[a-z]/i.test(line) && !SKIP_LINE.test(line)) {
        storeName = line.substring(0, 50);
      }
      continue;
    }

    const [, label, sign, digits] = priced;
    const amount = toCents(sign, digits);
    if (amount === null) continue;

    // The first total wins; "TOTAL VAT" lines after it are tax breakdowns
    if (TOTAL_LINE.test(label)) {
      if (!totalFound && !TAX_WORD.test(label)) {
        totalAmount = amount;
        totalFound = true;
      }
      continue;
    }

    if (SKIP_LINE.test(label) || !/[a-z]/i.test(label)) {
      continue;
    }

    const { name, quantity } = splitQuantity(label);
    items.push({ name: name.substring(0, 100), amount, quantity });
  }

  return {
    items,
    totalAmount,
    storeName: storeName || 'Store',
    confidence: receiptConfidence(items.length),
  };
}
