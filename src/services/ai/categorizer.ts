import { z } from 'zod';
import { FALLBACK_CATEGORY, SYSTEM_CATEGORIES } from '../../config/constants';
import { generateResponse, isAIConfigured } from './gemini';
import { extractJson } from './json';
import { buildCategorizePrompt, JSON_ONLY_PROMPT } from './prompt-templates';
import { getErrorMessage } from '../../utils/errors';

const CategorizedSchema = z.array(z.object({ item: z.string(), category: z.string() }));

/**
 * Map a free-form category onto the system category with the same name;
 * custom categories are kept as typed.
 */
export function normalizeCategory(name: string): string {
  const trimmed = name.trim();
  const system = SYSTEM_CATEGORIES.find((c) => c.name.toLowerCase() === trimmed.toLowerCase());
  return system?.name ?? trimmed;
}

export function isSystemCategory(name: string): boolean {
  return SYSTEM_CATEGORIES.some((c) => c.name.toLowerCase() === name.trim().toLowerCase());
}

export function categorizeByKeywords(text: string): string {
  const lower = text.toLowerCase();

  for (const cat of SYSTEM_CATEGORIES) {
    if (cat.keywords.some((kw) => new RegExp(`\\b${kw}\\b`).test(lower))) {
      return cat.name;
    }
  }

  return FALLBACK_CATEGORY;
}

/**
 * Match the model's answer back to the requested items, by exact name first
 * and then by containment.
 */
export function mapCategorizedItems(items: string[], answer: unknown): string[] | null {
  const parsed = CategorizedSchema.safeParse(answer);
  if (!parsed.success) return null;

  return items.map((itemName) => {
    const lowerName = itemName.toLowerCase();
    const match =
      parsed.data.find((p) => p.item.toLowerCase() === lowerName) ??
      parsed.data.find((p) => p.item.length > 0 && lowerName.includes(p.item.toLowerCase()));

    if (!match || !isSystemCategory(match.category)) {
      return categorizeByKeywords(itemName);
    }
    return normalizeCategory(match.category);
  });
}

export async function categorizeItems(items: string[]): Promise<string[]> {
  if (items.length === 0) return [];

  if (!isAIConfigured()) {
    return items.map(categorizeByKeywords);
  }

  try {
    const response = await generateResponse({
      systemPrompt: JSON_ONLY_PROMPT,
      userMessage: buildCategorizePrompt(items),
    });

    const categories = mapCategorizedItems(items, extractJson(response.text, 'array'));
    if (!categories) {
      console.error('[Categorizer] No usable JSON in response');
      return items.map(categorizeByKeywords);
    }

    return categories;
  } catch (error) {
    console.error('[Categorizer] Error:', getErrorMessage(error));
    return items.map(categorizeByKeywords);
  }
}

export async function categorizeExpense(description: string): Promise<string> {
  const [category] = await categorizeItems([description]);
  return category ?? FALLBACK_CATEGORY;
}
