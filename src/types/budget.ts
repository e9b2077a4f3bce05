export interface Budget {
  id: string;
  userId: string;
  category: string;
  amount: bigint;
  startDate: string;
  endDate: string;
  alertThreshold: number;
  createdAt: string;
  updatedAt: string;
}

export interface NewBudget {
  category: string;
  amount: bigint;
  startDate?: string;
  endDate?: string;
  alertThreshold?: number;
}

export type BudgetPatch = Partial<NewBudget>;

export type BudgetLevel = 'ok' | 'warning' | 'exceeded';

export interface BudgetStatus {
  budget: Budget;
  spent: bigint;
  remaining: bigint;
  percentage: number;
  level: BudgetLevel;
  daysRemaining: number;
}

export interface BudgetAlert {
  budgetId: string;
  category: string;
  level: Exclude<BudgetLevel, 'ok'>;
  spent: bigint;
  limit: bigint;
  percentage: number;
  message: string;
}
