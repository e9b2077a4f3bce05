import { describe, it, expect } from 'vitest';
import { centsToNumber, formatAmount, formatDecimal, parseAmount } from '../src/utils/money';
import { addDays, daysBetween, isValidDateString, monthRange, rangesOverlap } from '../src/utils/dates';

describe('money', () => {
  it('parses decimal strings and numbers into cents', () => {
    expect(parseAmount('12.5')).toBe(1250n);
    expect(parseAmount('12,05')).toBe(1205n);
    expect(parseAmount(0.1)).toBe(10n);
    expect(parseAmount('1.234')).toBeNull();
    expect(parseAmount(-1)).toBeNull();
    expect(parseAmount(12.345)).toBeNull();
    expect(parseAmount(12.5)).toBe(1250n);
  });

  it('formats cents', () => {
    expect(formatDecimal(5n)).toBe('0.05');
    expect(formatDecimal(-1250n)).toBe('-12.50');
    expect(formatAmount(123456n, 'USD')).toBe('1234.56 USD');
    expect(centsToNumber(1999n)).toBe(19.99);
  });
});

describe('dates', () => {
  it('validates calendar dates', () => {
    expect(isValidDateString('2024-02-29')).toBe(true);
    expect(isValidDateString('2023-02-29')).toBe(false);
    expect(isValidDateString('2024-2-1')).toBe(false);
  });

  it('does day arithmetic in UTC', () => {
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(daysBetween('2024-01-01', '2024-12-31')).toBe(365);
  });

  it('returns the month containing a date', () => {
    expect(monthRange(new Date('2024-02-10T12:00:00Z'))).toEqual({ startDate: '2024-02-01', endDate: '2024-02-29' });
  });

  it('treats touching ranges as overlapping', () => {
    const march = { startDate: '2024-03-01', endDate: '2024-03-31' };
    expect(rangesOverlap(march, { startDate: '2024-03-31', endDate: '2024-04-30' })).toBe(true);
    expect(rangesOverlap(march, { startDate: '2024-04-01', endDate: '2024-04-30' })).toBe(false);
  });
});
