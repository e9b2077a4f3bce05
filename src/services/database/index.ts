export { initializeDatabase, getDatabase, closeDatabase } from './db';
export { sumExpenses, getTotalsByCategory, getMonthlyTotals, type MonthlyTotal } from './expense-queries';
