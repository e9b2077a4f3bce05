import { RateLimitStatus } from '../../types/ai';
import { GEMINI_DAILY_LIMIT } from '../../config/constants';
import { addDays, toDateString } from '../../utils/dates';

let dailyCount = 0;
let resetDate = toDateString(new Date());

export function canMakeRequest(now: Date = new Date()): boolean {
  checkAndResetIfNewDay(now);
  return dailyCount < GEMINI_DAILY_LIMIT;
}

export function recordRequest(now: Date = new Date()): void {
  checkAndResetIfNewDay(now);
  dailyCount++;
}

export function getRateLimitStatus(now: Date = new Date()): RateLimitStatus {
  checkAndResetIfNewDay(now);

  return {
    dailyUsed: dailyCount,
    dailyLimit: GEMINI_DAILY_LIMIT,
    isLimited: dailyCount >= GEMINI_DAILY_LIMIT,
    resetsAt: addDays(resetDate, 1),
  };
}

export function resetRateLimit(): void {
  dailyCount = 0;
  resetDate = toDateString(new Date());
}

function checkAndResetIfNewDay(now: Date): void {
  const today = toDateString(now);
  if (today !== resetDate) {
    resetDate = today;
    dailyCount = 0;
  }
}
