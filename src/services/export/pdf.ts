import PDFDocument from 'pdfkit';
import { formatAmount } from '../../utils/money';
import { DateRange, Expense } from '../../types/expense';

const MAX_TRANSACTIONS = 50;

export async function exportToPDF(expenses: Expense[], period: Partial<DateRange>, currency: string, now: Date = new Date()): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margins: { top: 50, bottom: 50, left: 50, right: 50 }
    });
    const buffers: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => buffers.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(buffers)));
    doc.on('error', reject);

    // Header
    doc.fontSize(24).font('Helvetica-Bold').text('Expense Report', { align: 'center' });
    doc.moveDown(0.3);
    doc.fontSize(11).font('Helvetica').text(periodLabel(period), { align: 'center' });
    doc.moveDown(0.5);

    doc.moveTo(50, doc.y).lineTo(545, doc.y).stroke();
    doc.moveDown();

    const total = expenses.reduce((sum, e) => sum + e.amount, 0n);
    const average = expenses.length > 0 ? total / BigInt(expenses.length) : 0n;

    // Summary section
    doc.fontSize(14).font('Helvetica-Bold').text('Summary');
    doc.moveDown(0.5);
    doc.fontSize(10).font('Helvetica');
    doc.text(`Total Spent: ${formatAmount(total, currency)}`);
    doc.text(`Expenses: ${expenses.length}`);
    doc.text(`Average per Expense: ${formatAmount(average, currency)}`);
    doc.moveDown();

    const categories = totalsByCategory(expenses);
    if (categories.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Spending by Category');
      doc.moveDown(0.5);
      doc.fontSize(10).font('Helvetica');

      for (const [name, amount] of categories) {
        const percentage = total > 0n ? Number((amount * 1000n) / total) / 10 : 0;
        doc.text(`${name}: ${formatAmount(amount, currency)} (${percentage.toFixed(1)}%)`);
      }
      doc.moveDown();
    }

    const transactions = expenses.slice(0, MAX_TRANSACTIONS);
    if (transactions.length > 0) {
      doc.fontSize(14).font('Helvetica-Bold').text('Recent Transactions');
      doc.moveDown(0.5);

      const headers = ['Date', 'Description', 'Amount', 'Category'];
      const colWidths = [80, 200, 90, 100];
      const tableStartX = 50;
      const rowHeight = 18;
      let currentY = doc.y;

      const drawHeader = () => {
        doc.fontSize(9).font('Helvetica-Bold');
        let xPos = tableStartX;
        for (let i = 0; i < headers.length; i++) {
          doc.text(headers[i], xPos, currentY, { width: colWidths[i] });
          xPos += colWidths[i];
        }
        currentY += rowHeight;
        doc.moveTo(tableStartX, currentY - 4).lineTo(tableStartX + 470, currentY - 4).stroke();
        doc.fontSize(8).font('Helvetica');
      };

      drawHeader();

      for (const t of transactions) {
        if (currentY > 750) {
          doc.addPage();
          currentY = 50;
          drawHeader();
        }

        const row = [t.date, truncate(t.description, 36), formatAmount(t.amount, t.currency), truncate(t.category, 18)];

        let xPos = tableStartX;
        for (let i = 0; i < row.length; i++) {
          doc.text(row[i], xPos, currentY, { width: colWidths[i] });
          xPos += colWidths[i];
        }
        currentY += rowHeight;
      }
    }

    // Footer
    doc.moveDown(2);
    doc.fontSize(8).font('Helvetica').text(`Generated on ${now.toISOString().split('T')[0]}`, 50, doc.y, {
      align: 'center',
    });

    doc.end();
  });
}

export function periodLabel(period: Partial<DateRange>): string {
  if (period.startDate && period.endDate) return `${period.startDate} - ${period.endDate}`;
  if (period.startDate) return `From ${period.startDate}`;
  if (period.endDate) return `Until ${period.endDate}`;
  return 'All Time';
}

function totalsByCategory(expenses: Expense[]): [string, bigint][] {
  const totals = new Map<string, bigint>();
  for (const e of expenses) {
    totals.set(e.category, (totals.get(e.category) ?? 0n) + e.amount);
  }
  return [...totals.entries()].sort((a, b) => (b[1] > a[1] ? 1 : b[1] < a[1] ? -1 : 0));
}

function truncate(str: string, maxLen: number): string {
  if (!str) return '-';
  return str.length > maxLen ? str.substring(0, maxLen - 1) + '...' : str;
}
