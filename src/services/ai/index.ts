export { initializeGemini, generateResponse, isAIConfigured } from './gemini';
export { buildExpenseContext } from './context-builder';
export { handleAIMessage } from './message-handler';
export { getConversationHistory, addToHistory, clearConversationHistory } from './conversation-history';
export { categorizeItems, categorizeExpense, categorizeByKeywords, normalizeCategory } from './categorizer';
export { getRateLimitStatus } from './rate-limiter';
export type { AIRequest, AIResponse, RateLimitStatus } from '../../types/ai';
