const AMOUNT_PATTERN = /^(\d+)(?:[.,](\d{1,2}))?$/;

/**
 * Convert a decimal amount ("12.5", "12,50", 12.5) into cents without going
 * through floating point for string input. Returns null for anything that is
 * not a non-negative amount with at most two decimals.
 */
export function parseAmount(input: string | number): bigint | null {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0) return null;
    // 12.345 stays three decimals here and is rejected below
    return parseAmount(String(input));
  }

  const match = input.trim().match(AMOUNT_PATTERN);
  if (!match) return null;

  const whole = BigInt(match[1]);
  const fraction = BigInt((match[2] ?? '').padEnd(2, '0'));
  return whole * 100n + fraction;
}

export function formatDecimal(cents: bigint): string {
  const negative = cents < 0n;
  const abs = negative ? -cents : cents;
  const fraction = String(abs % 100n).padStart(2, '0');
  return `${negative ? '-' : ''}${abs / 100n}.${fraction}`;
}

export function formatAmount(cents: bigint, currency: string = 'EUR'): string {
  return `${formatDecimal(cents)} ${currency}`;
}

export function centsToNumber(cents: bigint): number {
  return Number(cents) / 100;
}
