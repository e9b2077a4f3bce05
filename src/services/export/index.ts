import { listExpensesInRange } from '../expense/repository';
import { env } from '../../config/env';
import { isValidDateString, toDateString } from '../../utils/dates';
import { getErrorMessage, ValidationError } from '../../utils/errors';
import { ExportRequest, ExportResult } from '../../types/export';
import { exportToCSV } from './csv';
import { generateJSON } from './json';
import { exportToPDF } from './pdf';

const EARLIEST = '0000-01-01';
const LATEST = '9999-12-31';

export async function handleExport(request: ExportRequest, now: Date = new Date()): Promise<ExportResult> {
  const { userId, format } = request;
  const period = request.dateRange ?? {};

  for (const date of [period.startDate, period.endDate]) {
    if (date !== undefined && !isValidDateString(date)) {
      throw new ValidationError('Invalid date format (YYYY-MM-DD)');
    }
  }
  if (period.startDate && period.endDate && period.startDate > period.endDate) {
    throw new ValidationError('Start date must not be after end date.');
  }

  const expenses = listExpensesInRange(userId, {
    startDate: period.startDate ?? EARLIEST,
    endDate: period.endDate ?? LATEST,
  });
  const stamp = toDateString(now);

  try {
    if (format === 'csv') {
      return {
        format,
        fileName: `expenses_${stamp}.csv`,
        contentType: 'text/csv; charset=utf-8',
        data: exportToCSV(expenses),
      };
    }

    if (format === 'json') {
      return {
        format,
        fileName: `expenses_${stamp}.json`,
        contentType: 'application/json; charset=utf-8',
        data: generateJSON(userId, expenses, period, now),
      };
    }

    return {
      format,
      fileName: `expenses_report_${stamp}.pdf`,
      contentType: 'application/pdf',
      data: await exportToPDF(expenses, period, env.DEFAULT_CURRENCY, now),
    };
  } catch (error) {
    console.error('[Export] Error:', getErrorMessage(error));
    throw error;
  }
}

export { exportToCSV } from './csv';
export { generateJSON } from './json';
export { exportToPDF } from './pdf';
