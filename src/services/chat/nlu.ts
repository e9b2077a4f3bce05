import { z } from 'zod';
import { generateResponse, isAIConfigured } from '../ai/gemini';
import { extractJson } from '../ai/json';
import { buildIntentPrompt, JSON_ONLY_PROMPT } from '../ai/prompt-templates';
import { classifyByRules } from './intents';
import { toDateString } from '../../utils/dates';
import { getErrorMessage } from '../../utils/errors';
import { ClassifiedMessage } from '../../types/chat';

const IntentSchema = z.enum([
  'add_expense',
  'upload_receipt',
  'query',
  'get_insights',
  'get_comprehensive_summary',
  'get_suggestions',
  'budget_status',
  'set_budget',
  'monthly_trend',
  'greeting',
  'help',
  'clarification_needed',
  'unknown',
]);

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .nullish()
  .catch(undefined)
  .transform((value) => value || undefined);

const EntitiesSchema = z.object({
  amount: optionalText,
  currency: optionalText,
  description: optionalText,
  category: optionalText,
  target: optionalText,
  operation: z.enum(['search', 'highest', 'lowest', 'list', 'top', 'total']).optional().catch(undefined),
  timeRange: optionalText,
  time_range: optionalText,
  limit: z.coerce.number().int().positive().optional().catch(undefined),
});

const ClassificationSchema = z.object({
  intent: IntentSchema,
  entities: EntitiesSchema,
});

/**
 * Turn the model's answer into a classification, or null when it has no
 * usable JSON or lacks `intent`/`entities`.
 */
export function parseClassification(answer: string): ClassifiedMessage | null {
  const parsed = ClassificationSchema.safeParse(extractJson(answer, 'object'));
  if (!parsed.success) {
    return null;
  }

  const { time_range: snakeRange, timeRange, ...entities } = parsed.data.entities;
  const range = timeRange ?? snakeRange;

  return {
    intent: parsed.data.intent,
    entities: range ? { ...entities, timeRange: range } : entities,
  };
}

export async function classifyMessage(message: string, now: Date = new Date()): Promise<ClassifiedMessage> {
  if (!isAIConfigured()) {
    return classifyByRules(message);
  }

  try {
    const response = await generateResponse({
      systemPrompt: JSON_ONLY_PROMPT,
      userMessage: buildIntentPrompt(message, toDateString(now)),
    });

    const classified = parseClassification(response.text);
    if (!classified) {
      console.error('[NLU] No usable classification in response:', response.text);
      return classifyByRules(message);
    }

    console.log(`[NLU] Intent: ${classified.intent}`);
    return classified;
  } catch (error) {
    console.error('[NLU] Classification failed:', getErrorMessage(error));
    return classifyByRules(message);
  }
}
