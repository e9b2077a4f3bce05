import { Content, GoogleGenerativeAI } from '@google/generative-ai';
import { env } from '../../config/env';
import { AIRequest, AIResponse } from '../../types/ai';
import { canMakeRequest, recordRequest } from './rate-limiter';
import { GEMINI_MODEL, GEMINI_RESPONSE_TIMEOUT_MS, GEMINI_MAX_RETRIES, GEMINI_DAILY_LIMIT } from '../../config/constants';
import { getErrorMessage } from '../../utils/errors';

let genAI: GoogleGenerativeAI | null = null;

export function isAIConfigured(): boolean {
  return Boolean(env.GEMINI_API_KEY);
}

export function initializeGemini(): GoogleGenerativeAI | null {
  if (!env.GEMINI_API_KEY) {
    console.log('[Gemini] No API key configured');
    return null;
  }

  if (!genAI) {
    genAI = new GoogleGenerativeAI(env.GEMINI_API_KEY);
  }

  return genAI;
}

function buildContents(request: AIRequest): Content[] {
  const contents: Content[] = (request.history ?? []).map((msg) => ({
    role: msg.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: msg.content }],
  }));

  const prompt = request.context
    ? `${request.context}\n\nUser: ${request.userMessage}`
    : request.userMessage;

  contents.push({ role: 'user', parts: [{ text: prompt }] });
  return contents;
}

export async function generateResponse(request: AIRequest): Promise<AIResponse> {
  if (!canMakeRequest()) {
    throw new Error(`Gemini API rate limit reached (${GEMINI_DAILY_LIMIT}/day)`);
  }

  const client = initializeGemini();
  if (!client) {
    throw new Error('Gemini API not configured (missing GEMINI_API_KEY)');
  }

  let lastError: Error | null = null;

  for (let attempt = 0; attempt < GEMINI_MAX_RETRIES; attempt++) {
    let timer: NodeJS.Timeout | undefined;
    try {
      const model = client.getGenerativeModel({ model: GEMINI_MODEL });
      const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Gemini API timeout')), GEMINI_RESPONSE_TIMEOUT_MS);
      });

      const response = await Promise.race([
        model.generateContent({
          contents: buildContents(request),
          systemInstruction: request.systemPrompt,
        }),
        timeout,
      ]);
      const text = response.response.text();

      recordRequest();
      console.log('[Gemini] Response generated successfully');

      return {
        text,
        finishReason: response.response.candidates?.[0]?.finishReason,
      };
    } catch (error) {
      const message = getErrorMessage(error);
      lastError = error instanceof Error ? error : new Error(message);
      console.error(`[Gemini] Attempt ${attempt + 1} failed:`, message);

      if (message.includes('429')) {
        throw new Error('Gemini API quota exceeded');
      }

      if (attempt < GEMINI_MAX_RETRIES - 1) {
        await new Promise((resolve) => setTimeout(resolve, Math.pow(2, attempt) * 1000));
      }
    } finally {
      clearTimeout(timer);
    }
  }

  throw lastError ?? new Error('Gemini API failed after retries');
}
