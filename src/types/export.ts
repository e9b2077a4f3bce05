import { DateRange } from './expense';

export type ExportFormat = 'csv' | 'json' | 'pdf';

export interface ExportRequest {
  userId: string;
  format: ExportFormat;
  dateRange?: Partial<DateRange>;
}

export interface ExportResult {
  format: ExportFormat;
  fileName: string;
  contentType: string;
  data: Buffer | string;
}
