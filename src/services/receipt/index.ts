export { recordReceipt, cleanupOldReceipts, isSupportedReceiptType, type RecordedReceipt } from './handler';
export { parseReceiptText, extractReceiptText } from './vision';
export { parseReceiptLines } from './parser';
