import { SYSTEM_CATEGORIES } from '../../config/constants';

const CATEGORY_NAMES = SYSTEM_CATEGORIES.map((c) => c.name).join(', ');

export const SYSTEM_PROMPT = `You are an expense tracking assistant with conversation memory.

When answering questions:
1. Search ALL expenses in the provided expense context carefully
2. Descriptions may be abbreviated or in any language - understand them
3. Quote exact descriptions and amounts from the data
4. Never invent data not in the context
5. Do NOT use markdown formatting (no **, no *, no #, no backticks)
6. If the user asks follow-up questions like "what about X?", use the conversation context

Keep responses concise and in plain text.`;

export const JSON_ONLY_PROMPT = 'You convert user input into JSON. Output only valid JSON, no markdown.';

export function buildIntentPrompt(message: string, today: string): string {
  return `Classify the user's message for an expense tracking chat. Today is ${today}.

Intents:
- add_expense: the user reports money spent ("20 coffee", "paid 12.50 for lunch yesterday")
- query: a question about recorded expenses (totals, searches, highest, lowest, lists, top categories)
- get_insights: asks for insights or unusual spending
- get_comprehensive_summary: asks for a summary of spending
- get_suggestions: asks for advice or how to save money
- budget_status: asks about budgets
- set_budget: wants to create a budget ("set budget Groceries 300")
- monthly_trend: asks for the month by month trend
- greeting, help
- clarification_needed: the message is about expenses but too vague to act on
- unknown: anything else

Entities (omit what does not apply):
- amount: number as written, without currency
- description: what the money was spent on
- category: one of ${CATEGORY_NAMES} or the category the user named
- operation: one of search, highest, lowest, list, top, total
- target: the searched item, category, or "item"/"transaction"/"category"
- timeRange: the time phrase as written ("last month", "yesterday", "2026-03-01")
- limit: number of results asked for

Reply ONLY with JSON: {"intent": "query", "entities": {"operation": "total", "target": "Groceries", "timeRange": "this month"}}

Message: "${message}"`;
}

export function buildCategorizePrompt(items: string[]): string {
  return `Categorize these expenses. Use ONLY these categories: ${CATEGORY_NAMES}.

Guidance:
- Items bought at a supermarket (food, drinks, cleaning, personal care, bags) are Groceries
- Restaurants covers eating out, cafes, takeaway and delivery
- Health is pharmacy, doctor visits and gym membership
- Personal is salon and spa services
- Use Other when nothing fits

Items:
${items.join('\n')}

Reply ONLY with JSON: [{"item": "item name", "category": "Category"}]`;
}

export function buildReceiptPrompt(text: string): string {
  return `You are an expert receipt parser that works with ANY store, country, language, and currency.

PRICE FORMAT:
- European receipts use a comma as decimal separator: "2,49" = 2.49
- US/UK receipts use a dot: "2.49" = 2.49
- A price like "2,45" is NEVER 245

Return ONLY valid JSON:
{"store":"Store Name","items":[{"name":"item name","price":2.49,"qty":1}],"total":51.18}

RULES:
1. STORE NAME: from the header of the receipt
2. PRICES: dot-decimal numbers; when qty > 1 the price is the line total
3. QUANTITY: patterns like "2x", "x2", "QTY 2". Default is 1
4. DISCOUNTS: negative prices
5. EXCLUDE tax lines (VAT, TVA, IVA, MwSt, GST), payment lines (card, cash, change) and subtotals
6. Use null for total when the receipt shows none

Receipt text:
${text}`;
}

export function buildSuggestionsPrompt(
  current: { description: string; amount: string; category: string }[],
  previous: { description: string; amount: string; category: string }[],
  currentRange: string,
  previousRange: string
): string {
  return `Compare the user's spending between two periods and give 3 short, concrete suggestions to spend less.
Mention categories and amounts from the data. Plain text, one suggestion per line starting with "- ".

Current period (${currentRange}):
${JSON.stringify(current)}

Previous period (${previousRange}):
${JSON.stringify(previous)}`;
}
