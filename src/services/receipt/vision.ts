import { z } from 'zod';
import { env } from '../../config/env';
import { VISION_API_URL } from '../../config/constants';
import { generateResponse, isAIConfigured } from '../ai/gemini';
import { extractJson } from '../ai/json';
import { buildReceiptPrompt, JSON_ONLY_PROMPT } from '../ai/prompt-templates';
import { parseReceiptLines, receiptConfidence } from './parser';
import { getErrorMessage } from '../../utils/errors';
import { ParsedReceipt, ReceiptItem } from '../../types/expense';

const VisionResponseSchema = z.object({
  responses: z
    .array(z.object({ fullTextAnnotation: z.object({ text: z.string() }).optional() }))
    .default([]),
});

const AIReceiptSchema = z.object({
  store: z.string().nullish(),
  items: z
    .array(
      z.object({
        name: z.string().default(''),
        price: z.coerce.number(),
        qty: z.coerce.number().positive().nullish(),
      })
    )
    .default([]),
  total: z.coerce.number().nullish(),
});

function toCents(value: number): bigint {
  return BigInt(Math.round(value * 100));
}

// Extract text from a receipt image via Google Vision OCR
export async function extractReceiptText(image: Buffer): Promise<string> {
  if (!env.GOOGLE_VISION_API_KEY) {
    console.log('[Vision] No API key configured');
    return '';
  }

  try {
    const response = await fetch(`${VISION_API_URL}?key=${env.GOOGLE_VISION_API_KEY}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        requests: [{
          image: { content: image.toString('base64') },
          features: [{ type: 'TEXT_DETECTION' }],
        }],
      }),
    });

    if (!response.ok) {
      console.error('[Vision] API error:', response.status, await response.text());
      return '';
    }

    const data = VisionResponseSchema.safeParse(await response.json());
    const text = data.success ? data.data.responses[0]?.fullTextAnnotation?.text ?? '' : '';
    console.log('[Vision] Extracted text length:', text.length);
    return text;
  } catch (error) {
    console.error('[Vision] Error:', getErrorMessage(error));
    return '';
  }
}

/**
 * Shift prices the model read ten times too small (a dropped decimal digit)
 * until the items add up to the printed total again.
 */
export function correctMisreadPrices(items: ReceiptItem[], totalAmount: bigint): ReceiptItem[] {
  const itemsSum = items.reduce((sum, item) => sum + item.amount, 0n);
  const missing = Number(totalAmount - itemsSum);

  if (missing <= 100 || totalAmount <= 0n) {
    return items;
  }

  console.log('[Receipt] Attempting price correction. Missing:', missing, 'cents');

  const corrected = items.map((item) => ({ ...item }));
  const cheapestFirst = [...corrected].sort((a, b) => Number(a.amount - b.amount));

  let remaining = missing;
  for (const item of cheapestFirst) {
    if (remaining <= 50) break;

    const current = Number(item.amount);
    if (current > 0 && current < 100) {
      const increase = current * 9;
      if (increase <= remaining + 50) {
        console.log(`[Receipt] Correcting ${item.name}: ${current} -> ${current * 10} cents`);
        item.amount = BigInt(current * 10);
        remaining -= increase;
      }
    }
  }

  return corrected;
}

export function mapAIReceipt(answer: unknown): ParsedReceipt | null {
  const parsed = AIReceiptSchema.safeParse(answer);
  if (!parsed.success) return null;

  const totalAmount = parsed.data.total ? toCents(parsed.data.total) : 0n;
  const items = correctMisreadPrices(
    parsed.data.items
      .filter((i) => i.name.trim().length > 0 && Number.isFinite(i.price))
      .map((i) => ({
        name: i.name.trim().substring(0, 100),
        amount: toCents(i.price),
        quantity: i.qty ?? 1,
      })),
    totalAmount
  );

  const itemsSum = items.reduce((sum, item) => sum + item.amount, 0n);
  const diff = Math.abs(Number(itemsSum - totalAmount));
  if (totalAmount > 0n && diff > Math.max(Number(totalAmount) * 0.05, 50)) {
    console.warn('[Receipt] Items sum', itemsSum.toString(), 'does not match total', totalAmount.toString());
  }

  return {
    items,
    totalAmount,
    storeName: (parsed.data.store ?? '').trim().substring(0, 50) || 'Store',
    confidence: receiptConfidence(items.length),
  };
}

// Use AI to parse receipt text into structured items, with the line parser as fallback
export async function parseReceiptText(text: string): Promise<ParsedReceipt> {
  if (!isAIConfigured()) {
    return parseReceiptLines(text);
  }

  try {
    const response = await generateResponse({
      systemPrompt: JSON_ONLY_PROMPT,
      userMessage: buildReceiptPrompt(text),
    });

    const receipt = mapAIReceipt(extractJson(response.text, 'object'));
    if (!receipt) {
      console.log('[Receipt] No usable JSON in response');
      return parseReceiptLines(text);
    }

    console.log('[Receipt] Parsed store:', receipt.storeName, 'items:', receipt.items.length);
    return receipt;
  } catch (error) {
    console.error('[Receipt] AI parse failed:', getErrorMessage(error));
    return parseReceiptLines(text);
  }
}
