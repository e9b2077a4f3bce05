export const SYSTEM_CATEGORIES = [
  { name: 'Groceries', icon: '🛒', keywords: ['supermarket', 'grocery', 'groceries', 'lidl', 'aldi', 'milk', 'bread', 'eggs'] },
  { name: 'Restaurants', icon: '🍽️', keywords: ['restaurant', 'cafe', 'coffee', 'lunch', 'dinner', 'pizza', 'burger'] },
  { name: 'Transportation', icon: '🚗', keywords: ['fuel', 'gas', 'metro', 'taxi', 'uber', 'bus', 'train', 'parking'] },
  { name: 'Entertainment', icon: '🎬', keywords: ['cinema', 'movie', 'netflix', 'game', 'concert', 'streaming'] },
  { name: 'Health', icon: '💊', keywords: ['pharmacy', 'doctor', 'gym', 'dentist', 'medicine'] },
  { name: 'Shopping', icon: '🛍️', keywords: ['clothing', 'shoes', 'amazon', 'electronics', 'shop'] },
  { name: 'Personal', icon: '💇', keywords: ['haircut', 'barber', 'beauty', 'salon'] },
  { name: 'Bills', icon: '📄', keywords: ['electric', 'water', 'internet', 'phone', 'rent', 'bill', 'subscription'] },
  { name: 'Other', icon: '📦', keywords: [] },
] as const;

export type SystemCategoryName = (typeof SYSTEM_CATEGORIES)[number]['name'];

export const FALLBACK_CATEGORY: SystemCategoryName = 'Other';

export const BUDGET_ALERT_THRESHOLD = 0.8;
export const RECEIPT_CLEANUP_INTERVAL_MS = 24 * 60 * 60 * 1000;

export const EXPENSE_PAGE_SIZE = 10;
export const EXPENSE_MAX_PAGE_SIZE = 100;
export const DEFAULT_QUERY_LIMIT = 5;
export const DEFAULT_RANGE_DAYS = 30;
export const TREND_MONTHS = 12;
export const MAX_HISTORY_MESSAGES = 50;
export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const GEMINI_DAILY_LIMIT = 1500;
export const GEMINI_RESPONSE_TIMEOUT_MS = 10000;
export const GEMINI_MAX_RETRIES = 2;
export const GEMINI_MODEL = 'gemini-1.5-flash';

export const VISION_API_URL = 'https://vision.googleapis.com/v1/images:annotate';

export const DEFAULT_MESSAGES = {
  WELCOME: 'Welcome! Send a receipt photo or type an expense like "12.50 lunch" to track it.',
  HELP: [
    'You can:',
    '- add an expense: "20 coffee" or "spent 12.50 on lunch yesterday"',
    '- send a receipt photo or a text receipt',
    '- ask: "how much did I spend this month?", "top categories last month"',
    '- budgets: "set budget Groceries 300", "how are my budgets?"',
    '- "summary", "insights", "suggestions", "monthly trend"',
  ].join('\n'),
  EMPTY_MESSAGE: 'Please say something!',
  GREETING: 'Hello there! How can I help you?',
  FALLBACK: "I'm sorry, I didn't quite understand that.",
  CLARIFY: 'Could you rephrase that? For example: "20 coffee" or "how much did I spend this week?"',
  NO_GEMINI_KEY: 'AI features disabled. Set GEMINI_API_KEY in your .env file to enable them.',
  ERROR: 'An error occurred. Please try again.',
};
