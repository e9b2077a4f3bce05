import { describe, it, expect } from 'vitest';
import { parseQuickEntry } from '../src/services/expense/quick-entry';

describe('Quick Entry Parser', () => {
  it('should parse "20 coffee" format', () => {
    const result = parseQuickEntry('20 coffee');
    expect(result).not.toBeNull();
    expect(result?.amount).toBe(2000n);
    expect(result?.description).toBe('coffee');
    expect(result?.currency).toBeUndefined();
  });

  it('should parse a comma as decimal separator', () => {
    expect(parseQuickEntry('12,5 lunch')?.amount).toBe(1250n);
  });

  it('should strip leading verbs and prepositions', () => {
    const result = parseQuickEntry('spent €12.50 on lunch');
    expect(result?.amount).toBe(1250n);
    expect(result?.description).toBe('lunch');
    expect(result?.currency).toBe('EUR');
  });

  it('should detect trailing currency words', () => {
    const result = parseQuickEntry('paid 30 dollars for a taxi');
    expect(result?.amount).toBe(3000n);
    expect(result?.description).toBe('a taxi');
    expect(result?.currency).toBe('USD');
  });

  it('should prefer the price over a leading quantity', () => {
    expect(parseQuickEntry('bought 2 coffees for 7.50')).toEqual({ amount: 750n, description: '2 coffees', currency: undefined });
    expect(parseQuickEntry('3 tickets €45')).toEqual({ amount: 4500n, description: '3 tickets', currency: 'EUR' });
  });

  it('should keep multi-word descriptions', () => {
    expect(parseQuickEntry('25 coffee at the station')?.description).toBe('coffee at the station');
  });

  it('should return null without an amount or a description', () => {
    expect(parseQuickEntry('coffee')).toBeNull();
    expect(parseQuickEntry('20')).toBeNull();
    expect(parseQuickEntry('spent 20')).toBeNull();
  });

  it('should return null for zero or negative amounts', () => {
    expect(parseQuickEntry('0 coffee')).toBeNull();
    expect(parseQuickEntry('-5 coffee')).toBeNull();
  });
});
