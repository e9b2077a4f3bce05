export interface MonthlyTrendPoint {
  year: number;
  month: number;
  totalSpent: bigint;
}

export interface CategoryTotal {
  category: string;
  amount: bigint;
  count: number;
}

export interface Anomaly {
  expenseId: string;
  description: string;
  amount: bigint;
  category: string;
  reason: string;
}

export interface Insights {
  totalSpent: bigint;
  topCategories: CategoryTotal[];
  anomalies: Anomaly[];
}

export interface CategoryChange {
  category: string;
  current: bigint;
  previous: bigint;
  change: bigint;
}
