import * as XLSX from 'xlsx';
import { InvoiceSource } from '../types';

export const INVOICE_HEADER = [
  'product_id',
  'product_name',
  'amount_purchased',
  'price_per_unit',
  'total_price'
];

export const SAMPLE_ROWS: unknown[][] = [
  [101, 'Notebook', 2, 50, 100],
  [102, 'Desk Lamp', 3, 83.5, 250.5],
  [103, 'Pencils', 9, 5.5, 49.5]
];

export function buildWorkbook(rows: unknown[][], sheetName = 'Sheet 1'): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), sheetName);
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export function invoiceSource(
  name: string,
  rows: unknown[][] = [INVOICE_HEADER, ...SAMPLE_ROWS],
  sheetName?: string
): InvoiceSource {
  return { name, payload: buildWorkbook(rows, sheetName) };
}

/** 1×1 RGBA PNG */
export const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==',
  'base64'
);

export const pdfText = (document: Uint8Array): string => Buffer.from(document).toString('latin1');

export const FIXED_NOW = () => new Date(2024, 0, 15, 9, 30, 0);
