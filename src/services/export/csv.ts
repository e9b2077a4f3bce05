import { formatDecimal } from '../../utils/money';
import { Expense } from '../../types/expense';

export function exportToCSV(expenses: Expense[]): string {
  const headers = ['Date', 'Description', 'Category', 'Amount', 'Currency', 'Source'];
  const csvLines: string[] = [headers.join(',')];

  for (const expense of expenses) {
    const values = [
      expense.date,
      escapeCsvField(expense.description),
      escapeCsvField(expense.category),
      formatDecimal(expense.amount),
      expense.currency,
      expense.source,
    ];
    csvLines.push(values.join(','));
  }

  // Add summary section
  if (expenses.length > 0) {
    const total = expenses.reduce((sum, e) => sum + e.amount, 0n);
    csvLines.push('');
    csvLines.push('SUMMARY');
    csvLines.push(`Total Expenses,${expenses.length}`);
    csvLines.push(`Total Spent,${formatDecimal(total)}`);
  }

  return csvLines.join('\n');
}

export function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
