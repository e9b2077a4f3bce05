import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initializeDatabase, closeDatabase, getDatabase } from '../src/services/database/db';
import { parseReceiptLines, receiptConfidence } from '../src/services/receipt/parser';
import { cleanupOldReceipts, completeReceipt, getReceiptPath, recordReceipt } from '../src/services/receipt/handler';
import { correctMisreadPrices, mapAIReceipt } from '../src/services/receipt/vision';
import { createBudget } from '../src/services/budget';
import { env } from '../src/config/env';
import { ReceiptUnreadableError, ValidationError } from '../src/utils/errors';

const NOW = new Date('2024-05-15T10:00:00Z');
const DAY_MS = 24 * 60 * 60 * 1000;
const RECEIPT = ['Corner Market', '2x Milk 2.50', 'Bread 1,80', 'VAT 0.30', 'TOTAL 4.30', 'Card 4.30'].join('\n');

function textUpload(text: string) {
  return { content: Buffer.from(text, 'utf8'), mimeType: 'text/plain' };
}

describe('parseReceiptLines', () => {
  it('reads the store, items and total', () => {
    expect(parseReceiptLines(RECEIPT)).toEqual({
      storeName: 'Corner Market',
      items: [
        { name: 'Milk', amount: 250n, quantity: 2 },
        { name: 'Bread', amount: 180n, quantity: 1 },
      ],
      totalAmount: 430n,
      confidence: 0.6,
    });
  });

  it('keeps discounts negative and reads trailing quantities', () => {
    const parsed = parseReceiptLines('Apples x 3 1.20\nCoupon -0.50');
    expect(parsed.storeName).toBe('Store');
    expect(parsed.items).toEqual([
      { name: 'Apples', amount: 120n, quantity: 3 },
      { name: 'Coupon', amount: -50n, quantity: 1 },
    ]);
    expect(parsed.totalAmount).toBe(0n);
  });

  it('takes the first total and ignores tax totals after it', () => {
    expect(parseReceiptLines('Shop\nMilk 2.50\nBread 5.00\nTOTAL 7.50\nTOTAL VAT 0.60')).toEqual({
      storeName: 'Shop',
      items: [
        { name: 'Milk', amount: 250n, quantity: 1 },
        { name: 'Bread', amount: 500n, quantity: 1 },
      ],
      totalAmount: 750n,
      confidence: 0.6,
    });
  });

  it('rates confidence by item count', () => {
    expect(receiptConfidence(0)).toBe(0);
    expect(receiptConfidence(2)).toBe(0.6);
    expect(receiptConfidence(4)).toBe(0.9);
  });
});

describe('completeReceipt', () => {
  it('sums items when the total is missing', () => {
    const parsed = completeReceipt(parseReceiptLines('Kiosk\nNewspaper 2.40\nGum 1.10'));
    expect(parsed.totalAmount).toBe(350n);
  });

  it('turns a bare total into one item named after the store', () => {
    const parsed = completeReceipt({ storeName: 'Fuel Stop', items: [], totalAmount: 6000n, confidence: 0 });
    expect(parsed.items).toEqual([{ name: 'Fuel Stop', amount: 6000n, quantity: 1 }]);
  });
});

describe('model receipt answers', () => {
  it('accepts numeric strings and defaults quantities', () => {
    expect(mapAIReceipt({ store: 'Deli', items: [{ name: 'Soup', price: '4.50' }], total: 4.5 })).toEqual({
      storeName: 'Deli',
      items: [{ name: 'Soup', amount: 450n, quantity: 1 }],
      totalAmount: 450n,
      confidence: 0.6,
    });
    expect(mapAIReceipt({ items: 'none' })).toBeNull();
  });

  it('fixes prices read ten times too small', () => {
    const fixed = correctMisreadPrices(
      [
        { name: 'Wine', amount: 95n, quantity: 1 },
        { name: 'Cheese', amount: 500n, quantity: 1 },
      ],
      1450n
    );
    expect(fixed.map((i) => i.amount)).toEqual([950n, 500n]);
  });
});

describe('recordReceipt', () => {
  beforeEach(() => {
    initializeDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('writes the receipt, its items and one expense per category', async () => {
    const recorded = await recordReceipt('r1', textUpload(`${RECEIPT}\nCoffee to go 3.20`), NOW);

    expect(recorded.receipt.storeName).toBe('Corner Market');
    expect(recorded.receipt.totalAmount).toBe(430n);
    expect(recorded.expenses.map((e) => [e.description, e.amount, e.date, e.source])).toEqual([
      ['Corner Market - Groceries', 430n, '2024-05-15', 'receipt'],
      ['Corner Market - Restaurants', 320n, '2024-05-15', 'receipt'],
    ]);

    const db = getDatabase();
    const items = db
      .prepare<[string], { item_name: string; expense_id: string | null }>(
        'SELECT item_name, expense_id FROM receipt_items WHERE receipt_id = ? ORDER BY item_name'
      )
      .all(recorded.receipt.id);
    expect(items.map((i) => i.item_name)).toEqual(['Bread', 'Coffee to go', 'Milk']);
    expect(items.every((i) => i.expense_id !== null)).toBe(true);
  });

  it('raises budget alerts for receipt expenses', async () => {
    createBudget('r1', { category: 'Groceries', amount: 400n }, NOW);
    const recorded = await recordReceipt('r1', textUpload(RECEIPT), NOW);
    expect(recorded.alerts.map((a) => a.level)).toEqual(['exceeded']);
  });

  it('rejects empty, unsupported and unreadable uploads', async () => {
    await expect(recordReceipt('r1', textUpload(''), NOW)).rejects.toThrow(ValidationError);
    await expect(
      recordReceipt('r1', { content: Buffer.from('GIF89a'), mimeType: 'image/gif' }, NOW)
    ).rejects.toThrow('Unsupported receipt type: image/gif');
    await expect(recordReceipt('r1', textUpload('thank you for shopping'), NOW)).rejects.toThrow(
      ReceiptUnreadableError
    );
  });

  it('leaves no file behind for a receipt it cannot read', async () => {
    const userDir = path.resolve(env.RECEIPTS_DIR, 'unreadable-user');
    await expect(recordReceipt('unreadable-user', textUpload('thank you for shopping'), NOW)).rejects.toThrow(
      ReceiptUnreadableError
    );
    expect(fs.existsSync(userDir) ? fs.readdirSync(userDir) : []).toEqual([]);
  });
});

describe('cleanupOldReceipts', () => {
  const userDir = path.resolve(env.RECEIPTS_DIR, 'retention-user');

  afterEach(() => {
    fs.rmSync(userDir, { recursive: true, force: true });
  });

  it('deletes files past the retention period and keeps recent ones', () => {
    const oldFile = getReceiptPath('retention-user', 'old.txt');
    fs.writeFileSync(oldFile, 'Bakery\nBread 2.00');
    const longAgo = new Date(Date.now() - 100 * DAY_MS);
    fs.utimesSync(oldFile, longAgo, longAgo);

    const freshFile = getReceiptPath('retention-user', 'fresh.txt');
    fs.writeFileSync(freshFile, 'Bakery\nRolls 1.50');

    expect(cleanupOldReceipts(90)).toBeGreaterThanOrEqual(1);
    expect(fs.existsSync(oldFile)).toBe(false);
    expect(fs.existsSync(freshFile)).toBe(true);
  });
});
