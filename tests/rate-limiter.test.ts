import { describe, it, expect, beforeEach } from 'vitest';
import { canMakeRequest, getRateLimitStatus, recordRequest, resetRateLimit } from '../src/services/ai/rate-limiter';
import { GEMINI_DAILY_LIMIT } from '../src/config/constants';

describe('AI rate limiter', () => {
  const day = new Date('2024-05-15T10:00:00Z');

  beforeEach(() => {
    resetRateLimit();
  });

  it('counts requests per UTC day', () => {
    recordRequest(day);
    recordRequest(day);

    expect(getRateLimitStatus(day)).toEqual({
      dailyUsed: 2,
      dailyLimit: GEMINI_DAILY_LIMIT,
      isLimited: false,
      resetsAt: '2024-05-16',
    });
  });

  it('blocks at the daily limit and resets the next day', () => {
    for (let i = 0; i < GEMINI_DAILY_LIMIT; i++) {
      recordRequest(day);
    }
    expect(canMakeRequest(day)).toBe(false);
    expect(canMakeRequest(new Date('2024-05-16T00:00:01Z'))).toBe(true);
  });
});
