export type ExpenseSource = 'manual' | 'chat' | 'receipt';

export interface Expense {
  id: string;
  userId: string;
  amount: bigint;
  currency: string;
  description: string;
  category: string;
  date: string;
  source: ExpenseSource;
  receiptId?: string;
  createdAt: string;
}

export interface NewExpense {
  amount: bigint;
  description: string;
  category?: string;
  date?: string;
  currency?: string;
  source: ExpenseSource;
  receiptId?: string;
}

export interface ExpensePatch {
  amount?: bigint;
  description?: string;
  category?: string;
  date?: string;
}

export interface Receipt {
  id: string;
  userId: string;
  storeName: string;
  totalAmount: bigint;
  confidence: number;
  rawText: string;
  filePath?: string;
  uploadedAt: string;
}

export interface ReceiptItem {
  name: string;
  amount: bigint;
  quantity: number;
}

export interface CategorizedReceiptItem extends ReceiptItem {
  category: string;
}

export interface ParsedReceipt {
  items: ReceiptItem[];
  totalAmount: bigint;
  storeName: string;
  confidence: number;
}

export interface ReceiptUpload {
  content: Buffer;
  mimeType: string;
  fileName?: string;
}

export interface DateRange {
  startDate: string;
  endDate: string;
}
