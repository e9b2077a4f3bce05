import { routeMessage } from '../chat/router';
import { defaultTimeRange } from '../chat/time-range';
import { recordExpense } from '../expense/recorder';
import { deleteExpense, getExpensesPage, getUserExpense, overrideExpenseCategory, updateExpense } from '../expense/manage';
import { recordReceipt } from '../receipt/handler';
import { categorizeExpense } from '../ai/categorizer';
import { getConversationHistory } from '../ai/conversation-history';
import { isAIConfigured } from '../ai/gemini';
import {
  createBudget,
  deleteBudget,
  getBudget,
  getBudgetAlerts,
  getBudgetStatus,
  getBudgetStatuses,
  listBudgets,
  updateBudget,
} from '../budget';
import { computeInsights } from '../analytics/insights';
import { getSuggestions } from '../analytics/suggestions';
import { getMonthlySpendingTrend } from '../analytics/trends';
import { handleExport } from '../export';
import {
  BudgetCreateSchema,
  BudgetStatusQuerySchema,
  BudgetUpdateSchema,
  CategorizeRequestSchema,
  CategoryOverrideSchema,
  ChatRequestSchema,
  DateRangeQuerySchema,
  ExpenseCreateSchema,
  ExpenseUpdateSchema,
  ExportQuerySchema,
  PageQuerySchema,
  ReceiptUploadSchema,
  parseInput,
} from '../validation/schemas';
import { toDateString } from '../../utils/dates';
import { AppError, getErrorMessage, NotFoundError, UnauthorizedError, ValidationError } from '../../utils/errors';
import { centsToNumber } from '../../utils/money';
import { Receipt } from '../../types/expense';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ApiRequest {
  method: string;
  url: string;
  headers: Record<string, string | string[] | undefined>;
  body?: unknown;
}

export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

interface RouteContext {
  userId: string;
  params: string[];
  query: Record<string, string>;
  body: unknown;
  now: Date;
}

type RouteResult = { status?: number; json?: unknown } | { status?: number; file: { contentType: string; fileName: string; data: string | Buffer } };

interface Route {
  method: HttpMethod;
  pattern: RegExp;
  public?: boolean;
  handle: (ctx: RouteContext) => Promise<RouteResult> | RouteResult;
}

/**
 * Amounts are held in cents as bigint and leave the API as decimal numbers.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => (typeof val === 'bigint' ? centsToNumber(val) : val));
}

function publicReceipt(receipt: Receipt): Omit<Receipt, 'filePath'> {
  const { filePath: _filePath, ...rest } = receipt;
  return rest;
}

const routes: Route[] = [
  {
    method: 'GET',
    pattern: /^\/health$/,
    public: true,
    handle: ({ now }) => ({
      json: { status: 'ok', timestamp: now.toISOString(), service: 'spendchat', ai: isAIConfigured() },
    }),
  },
  {
    method: 'POST',
    pattern: /^\/chat$/,
    handle: async ({ userId, body, now }) => {
      const request = parseInput(ChatRequestSchema, body);
      return { json: await routeMessage({ userId, text: request.message, attachment: request.receipt }, now) };
    },
  },
  {
    method: 'GET',
    pattern: /^\/chat\/history$/,
    handle: ({ userId }) => ({ json: { messages: getConversationHistory(userId) } }),
  },
  {
    method: 'POST',
    pattern: /^\/receipts$/,
    handle: async ({ userId, body, now }) => {
      const upload = parseInput(ReceiptUploadSchema, body);
      const recorded = await recordReceipt(userId, upload, now);
      return { status: 201, json: { ...recorded, receipt: publicReceipt(recorded.receipt) } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/expenses\/export$/,
    handle: async ({ userId, query, now }) => {
      const { format, startDate, endDate } = parseInput(ExportQuerySchema, query);
      const result = await handleExport({ userId, format, dateRange: { startDate, endDate } }, now);
      return { file: { contentType: result.contentType, fileName: result.fileName, data: result.data } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/expenses$/,
    handle: ({ userId, query }) => {
      const page = parseInput(PageQuerySchema, query);
      return { json: { expenses: getExpensesPage(userId, page), ...page } };
    },
  },
  {
    method: 'POST',
    pattern: /^\/expenses$/,
    handle: async ({ userId, body }) => {
      const input = parseInput(ExpenseCreateSchema, body);
      const { expense, alerts } = await recordExpense(userId, { ...input, source: 'manual' });
      return { status: 201, json: { expense, alerts } };
    },
  },
  {
    method: 'PUT',
    pattern: /^\/expenses\/([^/]+)\/category$/,
    handle: ({ userId, params, body }) => {
      const { category } = parseInput(CategoryOverrideSchema, body);
      return { json: { expense: overrideExpenseCategory(userId, params[0], category) } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/expenses\/([^/]+)$/,
    handle: ({ userId, params }) => ({ json: { expense: getUserExpense(userId, params[0]) } }),
  },
  {
    method: 'PUT',
    pattern: /^\/expenses\/([^/]+)$/,
    handle: ({ userId, params, body }) => ({
      json: { expense: updateExpense(userId, params[0], parseInput(ExpenseUpdateSchema, body)) },
    }),
  },
  {
    method: 'DELETE',
    pattern: /^\/expenses\/([^/]+)$/,
    handle: ({ userId, params }) => {
      deleteExpense(userId, params[0]);
      return { status: 204 };
    },
  },
  {
    method: 'POST',
    pattern: /^\/categorize$/,
    handle: async ({ body }) => {
      const { description } = parseInput(CategorizeRequestSchema, body);
      return { json: { category: await categorizeExpense(description) } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/insights$/,
    handle: ({ userId, query, now }) => {
      const { startDate, endDate } = parseInput(DateRangeQuerySchema, query);
      const fallback = defaultTimeRange(now);
      const range = { startDate: startDate ?? fallback.startDate, endDate: endDate ?? fallback.endDate };
      return { json: { ...range, ...computeInsights(userId, range) } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/suggestions$/,
    handle: async ({ userId, now }) => ({ json: { suggestions: await getSuggestions(userId, now) } }),
  },
  {
    method: 'GET',
    pattern: /^\/budgets\/status$/,
    handle: ({ userId, query, now }) => {
      const { alerts } = parseInput(BudgetStatusQuerySchema, query);
      const today = toDateString(now);
      return { json: { statuses: alerts ? getBudgetAlerts(userId, today) : getBudgetStatuses(userId, today) } };
    },
  },
  {
    method: 'GET',
    pattern: /^\/budgets$/,
    handle: ({ userId }) => ({ json: { budgets: listBudgets(userId) } }),
  },
  {
    method: 'POST',
    pattern: /^\/budgets$/,
    handle: ({ userId, body, now }) => ({
      status: 201,
      json: { budget: createBudget(userId, parseInput(BudgetCreateSchema, body), now) },
    }),
  },
  {
    method: 'GET',
    pattern: /^\/budgets\/([^/]+)$/,
    handle: ({ userId, params, now }) => {
      const budget = getBudget(userId, params[0]);
      return { json: { budget, status: getBudgetStatus(budget, toDateString(now)) } };
    },
  },
  {
    method: 'PUT',
    pattern: /^\/budgets\/([^/]+)$/,
    handle: ({ userId, params, body }) => ({
      json: { budget: updateBudget(userId, params[0], parseInput(BudgetUpdateSchema, body)) },
    }),
  },
  {
    method: 'DELETE',
    pattern: /^\/budgets\/([^/]+)$/,
    handle: ({ userId, params }) => {
      deleteBudget(userId, params[0]);
      return { status: 204 };
    },
  },
  {
    method: 'GET',
    pattern: /^\/trends\/monthly$/,
    handle: ({ userId, now }) => ({ json: { trend: getMonthlySpendingTrend(userId, now) } }),
  },
];

function headerValue(headers: ApiRequest['headers'], name: string): string | undefined {
  const value = headers[name];
  return (Array.isArray(value) ? value[0] : value)?.trim() || undefined;
}

function jsonResponse(status: number, payload: unknown): ApiResponse {
  return {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
    body: payload === undefined ? '' : toJson(payload),
  };
}

function toResponse(result: RouteResult): ApiResponse {
  if ('file' in result) {
    return {
      status: result.status ?? 200,
      headers: {
        'Content-Type': result.file.contentType,
        'Content-Disposition': `attachment; filename="${result.file.fileName}"`,
      },
      body: result.file.data,
    };
  }
  return jsonResponse(result.status ?? 200, result.json);
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (error) {
    if (error instanceof URIError) {
      throw new ValidationError(`Malformed path segment: ${value}`);
    }
    throw error;
  }
}

/**
 * Match a request to its route and run it. Errors are mapped to their HTTP
 * status here so the handlers only throw.
 */
export async function dispatch(request: ApiRequest, now: Date = new Date()): Promise<ApiResponse> {
  const url = new URL(request.url, 'http://localhost');
  const path = url.pathname.replace(/\/+$/, '') || '/';
  const method = request.method.toUpperCase();

  try {
    for (const route of routes) {
      if (route.method !== method) continue;

      const match = path.match(route.pattern);
      if (!match) continue;

      const userId = headerValue(request.headers, 'x-user-id');
      if (!route.public && !userId) {
        throw new UnauthorizedError();
      }

      const result = await route.handle({
        userId: userId ?? '',
        params: match.slice(1).map(decodeParam),
        query: Object.fromEntries(url.searchParams),
        body: request.body,
        now,
      });
      return toResponse(result);
    }

    throw new NotFoundError(`No route for ${method} ${path}`);
  } catch (error) {
    if (error instanceof AppError) {
      return jsonResponse(error.status, { error: error.code, message: error.message });
    }

    console.error(`[API] ${method} ${path} failed:`, getErrorMessage(error));
    return jsonResponse(500, { error: 'INTERNAL_ERROR', message: 'An error occurred. Please try again.' });
  }
}
