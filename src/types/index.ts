export type CellValue =
  | { kind: 'integer'; value: number }
  | { kind: 'decimal'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'empty' };

export type NumericCell = Extract<CellValue, { kind: 'integer' | 'decimal' }>;

export const LINE_ITEM_FIELDS = [
  'product_id',
  'product_name',
  'amount_purchased',
  'price_per_unit',
  'total_price'
] as const;

export type LineItemField = (typeof LINE_ITEM_FIELDS)[number];

export type LineItem = Record<LineItemField, CellValue>;

export interface InvoiceSource {
  name: string;
  payload: Uint8Array;
}

export interface InvoiceRecord {
  invoiceNumber: string;
  date: string;
  columnHeaders: string[];
  rows: LineItem[];
  totalPrice: NumericCell;
}

export type RenderedDocument = Buffer;

export interface BatchResult {
  successes: Map<string, RenderedDocument>;
  errors: string[];
}

export interface LogoImage {
  data: Uint8Array;
  format: 'PNG' | 'JPEG';
  width: number;
  height: number;
}

export interface FileBuffer {
  buffer: Buffer;
  filename: string;
}
