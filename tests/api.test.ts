import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { initializeDatabase, closeDatabase } from '../src/services/database/db';
import { dispatch } from '../src/services/api/routes';

const NOW = new Date('2024-05-15T10:00:00Z');
const CreatedExpense = z.object({ expense: z.object({ id: z.string() }) });
const CreatedBudget = z.object({ budget: z.object({ id: z.string() }) });

async function call(method: string, url: string, body?: unknown, userId: string | null = 'api-user') {
  const response = await dispatch({ method, url, headers: userId ? { 'x-user-id': userId } : {}, body }, NOW);
  const json: unknown = response.body === '' ? undefined : JSON.parse(String(response.body));
  return { status: response.status, headers: response.headers, body: response.body, json };
}

describe('API routes', () => {
  beforeEach(() => {
    initializeDatabase(':memory:');
  });

  afterEach(() => {
    closeDatabase();
  });

  it('serves health without a user', async () => {
    const res = await call('GET', '/health', undefined, null);
    expect(res.status).toBe(200);
    expect(res.json).toEqual({ status: 'ok', timestamp: NOW.toISOString(), service: 'spendchat', ai: false });
  });

  it('requires a user id and known routes', async () => {
    expect(await call('GET', '/expenses', undefined, null)).toMatchObject({
      status: 401,
      json: { error: 'UNAUTHORIZED', message: 'Missing user id' },
    });
    expect(await call('GET', '/nope')).toMatchObject({
      status: 404,
      json: { error: 'NOT_FOUND', message: 'No route for GET /nope' },
    });
  });

  it('creates, lists, exports and deletes expenses', async () => {
    const created = await call('POST', '/expenses', { amount: 12.5, description: 'taxi to airport', date: '2024-05-10' });
    expect(created.status).toBe(201);
    expect(created.json).toMatchObject({
      expense: { amount: 12.5, currency: 'EUR', category: 'Transportation', date: '2024-05-10', source: 'manual' },
      alerts: [],
    });
    const id = CreatedExpense.parse(created.json).expense.id;

    expect((await call('GET', '/expenses')).json).toMatchObject({
      expenses: [{ id, description: 'taxi to airport' }],
      skip: 0,
      limit: 10,
    });

    const exported = await call('GET', '/expenses/export?format=csv', undefined);
    expect(exported.headers['Content-Disposition']).toBe('attachment; filename="expenses_2024-05-15.csv"');
    expect(exported.body).toBe(
      'Date,Description,Category,Amount,Currency,Source\n2024-05-10,taxi to airport,Transportation,12.50,EUR,manual\n\nSUMMARY\nTotal Expenses,1\nTotal Spent,12.50'
    );

    expect((await call('PUT', `/expenses/${id}/category`, { category: 'bills' })).json).toMatchObject({
      expense: { id, category: 'Bills' },
    });

    expect(await call('GET', `/expenses/${id}`, undefined, 'someone-else')).toMatchObject({ status: 403 });

    const deleted = await call('DELETE', `/expenses/${id}`);
    expect(deleted.status).toBe(204);
    expect(deleted.body).toBe('');
  });

  it('rejects invalid input', async () => {
    expect(await call('POST', '/expenses', { amount: -3, description: 'refund' })).toMatchObject({
      status: 400,
      json: { error: 'VALIDATION_ERROR' },
    });
    expect(await call('PUT', '/budgets/abc', {})).toMatchObject({
      status: 400,
      json: { error: 'VALIDATION_ERROR', message: 'Nothing to update' },
    });
  });

  it('manages budgets with derived status', async () => {
    await call('POST', '/expenses', { amount: '12.50', description: 'metro card', date: '2024-05-10' });

    const period = { startDate: '2024-05-01', endDate: '2024-05-31' };
    const created = await call('POST', '/budgets', { category: 'transportation', amount: 100, ...period });
    expect(created).toMatchObject({
      status: 201,
      json: { budget: { category: 'Transportation', amount: 100, alertThreshold: 0.8, ...period } },
    });
    const id = CreatedBudget.parse(created.json).budget.id;

    expect(await call('POST', '/budgets', { category: 'Transportation', amount: 50, ...period })).toMatchObject({
      status: 409,
      json: { error: 'CONFLICT' },
    });

    expect((await call('GET', `/budgets/${id}`)).json).toMatchObject({
      status: { spent: 12.5, remaining: 87.5, percentage: 12, level: 'ok', daysRemaining: 16 },
    });

    expect((await call('DELETE', `/budgets/${id}`)).status).toBe(204);
    expect((await call('GET', `/budgets/${id}`)).status).toBe(404);
  });

  it('lists only budgets that need attention when asked', async () => {
    await call('POST', '/expenses', { amount: '12.50', description: 'metro card', category: 'Transportation', date: '2024-05-10' });
    await call('POST', '/expenses', { amount: '45', description: 'weekly shop', category: 'Groceries', date: '2024-05-11' });

    const period = { startDate: '2024-05-01', endDate: '2024-05-31' };
    await call('POST', '/budgets', { category: 'Transportation', amount: 100, ...period });
    await call('POST', '/budgets', { category: 'Groceries', amount: 50, ...period });

    const Statuses = z.object({
      statuses: z.array(z.object({ budget: z.object({ category: z.string() }), level: z.string(), percentage: z.number() })),
    });

    const all = Statuses.parse((await call('GET', '/budgets/status')).json).statuses;
    expect(all).toHaveLength(2);

    const flagged = Statuses.parse((await call('GET', '/budgets/status?alerts=true')).json).statuses;
    expect(flagged).toEqual([{ budget: { category: 'Groceries' }, level: 'warning', percentage: 90 }]);

    expect(await call('GET', '/budgets/status?alerts=maybe')).toMatchObject({
      status: 400,
      json: { error: 'VALIDATION_ERROR', message: 'alerts must be true or false' },
    });
  });

  it('rejects a malformed path segment', async () => {
    expect(await call('GET', '/expenses/%E0%A4%A')).toMatchObject({
      status: 400,
      json: { error: 'VALIDATION_ERROR', message: 'Malformed path segment: %E0%A4%A' },
    });
  });

  it('chats and takes text receipts', async () => {
    expect((await call('POST', '/chat', { message: 'hi' })).json).toEqual({
      message: 'Hello there! How can I help you?',
      intent: 'greeting',
      expenses: [],
      alerts: [],
    });

    const receipt = await call('POST', '/receipts', { text: 'Bakery\nCroissant 2.20\nBread 3.10\nTOTAL 5.30' });
    expect(receipt.status).toBe(201);
    expect(receipt.json).toHaveProperty('receipt.totalAmount', 5.3);
    expect(receipt.json).toHaveProperty('receipt.storeName', 'Bakery');
    expect(receipt.json).not.toHaveProperty('receipt.filePath');
  });

  it('reports the monthly trend', async () => {
    const res = await call('GET', '/trends/monthly');
    const trend = z.object({ trend: z.array(z.object({ year: z.number(), month: z.number(), totalSpent: z.number() })) }).parse(res.json).trend;
    expect(trend).toHaveLength(12);
    expect(trend[11]).toEqual({ year: 2024, month: 5, totalSpent: 0 });
  });
});
