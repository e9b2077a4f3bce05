import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { initializeDatabase, closeDatabase } from '../src/services/database/db';
import { routeMessage } from '../src/services/chat/router';
import { clearConversationHistory, getConversationHistory } from '../src/services/ai/conversation-history';
import { DEFAULT_MESSAGES } from '../src/config/constants';

const NOW = new Date('2024-05-15T10:00:00Z');
const USER = 'chat-user';

function send(text: string) {
  return routeMessage({ userId: USER, text }, NOW);
}

describe('routeMessage', () => {
  beforeEach(() => {
    initializeDatabase(':memory:');
    clearConversationHistory(USER);
  });

  afterEach(() => {
    closeDatabase();
  });

  it('answers an empty message without touching the history', async () => {
    const response = await send('   ');
    expect(response).toEqual({ message: DEFAULT_MESSAGES.EMPTY_MESSAGE, intent: 'unknown', expenses: [], alerts: [] });
    expect(getConversationHistory(USER)).toEqual([]);
  });

  it('greets and records the exchange', async () => {
    const response = await send('hi');
    expect(response.intent).toBe('greeting');
    expect(response.message).toBe('Hello there! How can I help you?');
    expect(getConversationHistory(USER)).toEqual([
      { sender: 'user', text: 'hi', timestamp: NOW.toISOString() },
      { sender: 'assistant', text: 'Hello there! How can I help you?', timestamp: NOW.toISOString() },
    ]);
  });

  it('adds expenses and answers questions about them', async () => {
    const lunch = await send('12.50 lunch');
    expect(lunch.intent).toBe('add_expense');
    expect(lunch.message).toBe("Got it. I've added an expense of 12.50 EUR for 'lunch' (Restaurants).");
    expect(lunch.expenses[0].date).toBe('2024-05-15');

    const taxi = await send('spent 30 on taxi yesterday');
    expect(taxi.expenses[0].date).toBe('2024-05-14');
    expect(taxi.expenses[0].category).toBe('Transportation');

    expect((await send('how much did I spend on taxi this month?')).message).toBe(
      "Yes, you spent a total of 30.00 EUR on 'taxi' in this month. Here are the transactions I found:\n- 30.00 EUR on 2024-05-14"
    );
    expect((await send('what did I spend in total this week?')).message).toBe(
      'Your total spending in this week was 42.50 EUR.'
    );
    expect((await send('what was my most expensive purchase this month')).message).toBe(
      "Your most expensive purchase in this month was 'taxi' for 30.00 EUR."
    );
  });

  it('explains a time period it cannot read', async () => {
    const response = await send('how much did I spend on 2024-02-30?');
    expect(response.intent).toBe('query');
    expect(response.message).toBe(
      'I couldn\'t understand the time period \'2024-02-30\'. Try "last month" or a date like 2026-03-01.'
    );
  });

  it('records the currency named in the message', async () => {
    const response = await send('paid 30 dollars for a taxi');
    expect(response.message).toBe("Got it. I've added an expense of 30.00 USD for 'a taxi' (Transportation).");
    expect(response.expenses[0].currency).toBe('USD');
  });

  it('asks for a single readable day before dating an expense', async () => {
    const impossible = await send('20 coffee 31 February 2024');
    expect(impossible.message).toBe(
      'I couldn\'t understand the time period \'31 February 2024\'. Try "last month" or a date like 2026-03-01.'
    );
    expect(impossible.expenses).toEqual([]);

    const week = await send('40 groceries this week');
    expect(week.message).toBe(
      'An expense needs a single day, not \'this week\'. Try "yesterday" or a date like 2026-03-01.'
    );
    expect(week.expenses).toEqual([]);

    expect((await send('what did I spend in total this month?')).message).toBe(
      'Your total spending in this month was 0.00 EUR.'
    );
  });

  it('sets budgets and reports on them', async () => {
    expect((await send('how are my budgets?')).message).toBe(
      'You have no active budgets. Try "set budget Groceries 300".'
    );
    expect((await send('set budget Groceries 300')).message).toBe(
      'Budget set: Groceries 300.00 EUR from 2024-05-01 to 2024-05-31.'
    );

    const added = await send('250 groceries');
    expect(added.alerts.map((a) => a.level)).toEqual(['warning']);
    expect(added.message).toBe(
      "Got it. I've added an expense of 250.00 EUR for 'groceries' (Groceries).\n" +
        "Heads up: you've used 83% of your Groceries budget (250.00 EUR of 300.00 EUR)."
    );

    expect((await send('how are my budgets?')).message).toBe(
      'Your budgets:\n- Groceries: 250.00 EUR of 300.00 EUR (83%) (warning), 16 days left'
    );
  });

  it('falls back to a fixed reply when the model is not configured', async () => {
    const response = await send('what is the weather');
    expect(response.intent).toBe('unknown');
    expect(response.message).toBe(DEFAULT_MESSAGES.FALLBACK);
  });

  it('records a receipt attachment', async () => {
    const text = ['Corner Market', '2x Milk 2.50', 'Bread 1,80', 'Coffee to go 3.20', 'VAT 0.30', 'TOTAL 7.50'].join('\n');
    const response = await routeMessage(
      { userId: USER, attachment: { content: Buffer.from(text), mimeType: 'text/plain', fileName: 'shop.txt' } },
      NOW
    );

    expect(response.intent).toBe('upload_receipt');
    expect(response.message).toBe(
      'Receipt from Corner Market recorded: 7.50 EUR.\n- Groceries: 4.30 EUR\n- Restaurants: 3.20 EUR'
    );
    expect(getConversationHistory(USER)[0].text).toBe('[receipt shop.txt]');
  });
});
