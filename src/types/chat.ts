import { BudgetAlert } from './budget';
import { Expense, ReceiptUpload } from './expense';

export type Intent =
  | 'add_expense'
  | 'upload_receipt'
  | 'query'
  | 'get_insights'
  | 'get_comprehensive_summary'
  | 'get_suggestions'
  | 'budget_status'
  | 'set_budget'
  | 'monthly_trend'
  | 'greeting'
  | 'help'
  | 'clarification_needed'
  | 'unknown';

export type QueryOperation = 'search' | 'highest' | 'lowest' | 'list' | 'top' | 'total';

export interface Entities {
  amount?: string;
  currency?: string;
  description?: string;
  category?: string;
  target?: string;
  operation?: QueryOperation;
  timeRange?: string;
  limit?: number;
}

export interface ClassifiedMessage {
  intent: Intent;
  entities: Entities;
}

export interface ChatMessage {
  sender: 'user' | 'assistant';
  text: string;
  timestamp: string;
}

export interface IncomingChatMessage {
  userId: string;
  text?: string;
  attachment?: ReceiptUpload;
}

export interface ChatReply {
  message: string;
  expenses?: Expense[];
  alerts?: BudgetAlert[];
}

export interface ChatResponse {
  message: string;
  intent: Intent;
  expenses: Expense[];
  alerts: BudgetAlert[];
}
