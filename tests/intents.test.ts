import { describe, it, expect } from 'vitest';
import { classifyByRules } from '../src/services/chat/intents';
import { parseClassification } from '../src/services/chat/nlu';

describe('classifyByRules', () => {
  it('recognizes greetings and help', () => {
    expect(classifyByRules('hello there!').intent).toBe('greeting');
    expect(classifyByRules('what can you do').intent).toBe('help');
  });

  it('reads new expenses with their date phrase', () => {
    expect(classifyByRules('spent 12.50 on lunch yesterday')).toEqual({
      intent: 'add_expense',
      entities: { timeRange: 'yesterday', amount: '12.50', description: 'lunch' },
    });
  });

  it('keeps the currency named in a new expense', () => {
    expect(classifyByRules('paid 30 dollars for a taxi')).toEqual({
      intent: 'add_expense',
      entities: { amount: '30.00', description: 'a taxi', currency: 'USD' },
    });
  });

  it('reads budgets in either order', () => {
    expect(classifyByRules('set budget Groceries 300')).toEqual({
      intent: 'set_budget',
      entities: { category: 'Groceries', amount: '300' },
    });
    expect(classifyByRules('set a budget of 150 for restaurants')).toEqual({
      intent: 'set_budget',
      entities: { amount: '150', category: 'Restaurants' },
    });
    expect(classifyByRules('how are my budgets?').intent).toBe('budget_status');
  });

  it('turns questions into queries', () => {
    expect(classifyByRules('how much did I spend on groceries last month?')).toEqual({
      intent: 'query',
      entities: { timeRange: 'last month', operation: 'total', target: 'Groceries' },
    });
    expect(classifyByRules('what was my most expensive purchase this month')).toEqual({
      intent: 'query',
      entities: { timeRange: 'this month', operation: 'highest', target: 'item' },
    });
    expect(classifyByRules('top 3 categories last month')).toEqual({
      intent: 'query',
      entities: { timeRange: 'last month', operation: 'top', target: 'category', limit: 3 },
    });
  });

  it('routes analytics requests', () => {
    expect(classifyByRules('monthly trend').intent).toBe('monthly_trend');
    expect(classifyByRules('any suggestions?').intent).toBe('get_suggestions');
    expect(classifyByRules('summary of this month')).toEqual({
      intent: 'get_comprehensive_summary',
      entities: { timeRange: 'this month' },
    });
  });

  it('asks for clarification only when the message is about money', () => {
    expect(classifyByRules('I spent too much money').intent).toBe('clarification_needed');
    expect(classifyByRules('what is the weather').intent).toBe('unknown');
  });
});

describe('parseClassification', () => {
  it('reads fenced JSON and the snake_case time range', () => {
    const answer = '```json\n{"intent":"query","entities":{"operation":"top","time_range":"last month","limit":"3"}}\n```';
    expect(parseClassification(answer)).toEqual({
      intent: 'query',
      entities: { operation: 'top', timeRange: 'last month', limit: 3 },
    });
  });

  it('drops malformed entity values', () => {
    const answer = '{"intent":"add_expense","entities":{"amount":12.5,"description":"taxi","operation":"dance"}}';
    expect(parseClassification(answer)).toEqual({
      intent: 'add_expense',
      entities: { amount: '12.5', description: 'taxi' },
    });
  });

  it('rejects answers without a known intent', () => {
    expect(parseClassification('no json here')).toBeNull();
    expect(parseClassification('{"intent":"dance","entities":{}}')).toBeNull();
    expect(parseClassification('{"intent":"greeting"}')).toBeNull();
  });
});
