import { generateResponse, isAIConfigured } from './gemini';
import { buildExpenseContext } from './context-builder';
import { SYSTEM_PROMPT } from './prompt-templates';
import { getRateLimitStatus } from './rate-limiter';
import { getConversationHistory, toAIHistory } from './conversation-history';
import { stripMarkdown } from './json';
import { DEFAULT_MESSAGES } from '../../config/constants';
import { getErrorMessage } from '../../utils/errors';

/**
 * Free-form answer about the user's expenses. Never throws: failures become
 * a reply the user can act on.
 */
export async function handleAIMessage(userId: string, message: string): Promise<string> {
  if (!isAIConfigured()) {
    return DEFAULT_MESSAGES.FALLBACK;
  }

  try {
    const rateLimitStatus = getRateLimitStatus();

    if (rateLimitStatus.isLimited) {
      return `AI daily limit reached (${rateLimitStatus.dailyUsed}/${rateLimitStatus.dailyLimit}). Try again tomorrow.`;
    }

    const response = await generateResponse({
      systemPrompt: SYSTEM_PROMPT,
      userMessage: message,
      context: buildExpenseContext(userId),
      history: toAIHistory(getConversationHistory(userId)),
    });

    console.log('[AIHandler] Response generated successfully');
    return stripMarkdown(response.text) || DEFAULT_MESSAGES.FALLBACK;
  } catch (error) {
    const reason = getErrorMessage(error);
    console.error('[AIHandler] Error:', reason);

    if (reason.includes('rate limit') || reason.includes('quota')) {
      return 'AI quota exceeded. Try again later.';
    }

    if (reason.includes('timeout')) {
      return 'Request took too long. Try a simpler query.';
    }

    return 'Unable to process query right now. Try asking "summary" instead.';
  }
}
