import { format as formatDate } from 'date-fns';
import * as XLSX from 'xlsx';
import { InvoiceRecord } from '../models/invoice.model';
import { formatAmount } from '../normalization/amount.normalizer';

export type ExportFormat = 'csv' | 'xlsx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx'];

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

const SHEET_NAME = 'Invoices';

interface ExportRow {
  ID: number;
  'Company Name': string;
  'Invoice Date': string;
  'Total Amount': string;
}

function toSheet(invoices: InvoiceRecord[], currency: string): XLSX.WorkSheet {
  const rows: ExportRow[] = invoices.map((invoice) => ({
    ID: invoice.id,
    'Company Name': invoice.companyName,
    'Invoice Date': invoice.invoiceDate,
    'Total Amount': formatAmount(invoice.totalAmount, currency),
  }));
  return XLSX.utils.json_to_sheet(rows, {
    header: ['ID', 'Company Name', 'Invoice Date', 'Total Amount'],
  });
}

export function toCsv(invoices: InvoiceRecord[], currency = '$'): string {
  return XLSX.utils.sheet_to_csv(toSheet(invoices, currency));
}

export function toXlsx(invoices: InvoiceRecord[], currency = '$'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    workbook,
    toSheet(invoices, currency),
    SHEET_NAME,
  );
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

/**
 * `invoices_20240617_093000.csv`
 */
export function exportFilename(
  format: ExportFormat,
  now = new Date(),
): string {
  return `invoices_${formatDate(now, 'yyyyMMdd_HHmmss')}.${format}`;
}
