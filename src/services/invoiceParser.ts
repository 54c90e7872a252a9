import * as path from 'path';
import * as XLSX from 'xlsx';
import dayjs from 'dayjs';
import { ParseError, describeError } from '../errors';
import {
  CellValue,
  InvoiceRecord,
  InvoiceSource,
  LINE_ITEM_FIELDS,
  LineItem,
  LineItemField,
  NumericCell
} from '../types';

export const INVOICE_SHEET_NAME = 'Sheet 1';

const CELL_DATE_FORMAT = 'YYYY-MM-DD HH:mm:ss';

export interface ParseOptions {
  now?: () => Date;
}

interface InvoiceName {
  stem: string;
  invoiceNumber: string;
  date: string;
}

type RawCell = unknown;

export class InvoiceParser {
  /**
   * Reads one invoice workbook. The invoice number and date come from
   * the file name, the line items from the `Sheet 1` worksheet.
   */
  static parse(source: InvoiceSource, options: ParseOptions = {}): InvoiceRecord {
    const { invoiceNumber, date } = this.parseName(source.name, options.now);
    const [header, ...body] = this.readSheet(source);

    const columnHeaders = header.map((cell, index) =>
      cell === null || cell === undefined || cell === '' ? `Unnamed: ${index}` : String(cell)
    );

    const missing = LINE_ITEM_FIELDS.filter(field => !columnHeaders.includes(field));
    if (missing.length > 0) {
      throw new ParseError(`Missing required column(s): ${missing.join(', ')}`);
    }

    const column = (field: LineItemField) => this.readColumn(body, columnHeaders.indexOf(field));
    const columns: Record<LineItemField, CellValue[]> = {
      product_id: column('product_id'),
      product_name: column('product_name'),
      amount_purchased: column('amount_purchased'),
      price_per_unit: column('price_per_unit'),
      total_price: column('total_price')
    };

    const rows: LineItem[] = body.map((_, i) => ({
      product_id: columns.product_id[i],
      product_name: columns.product_name[i],
      amount_purchased: columns.amount_purchased[i],
      price_per_unit: columns.price_per_unit[i],
      total_price: columns.total_price[i]
    }));

    return {
      invoiceNumber,
      date,
      columnHeaders: columnHeaders.slice(0, LINE_ITEM_FIELDS.length),
      rows,
      totalPrice: this.sumColumn(rows.map(row => row.total_price))
    };
  }

  /**
   * `2024-001-20240115.xlsx` gives invoice `2024` and date `001`:
   * only the first two dash-separated parts are used.
   */
  static parseName(fileName: string, now: () => Date = () => new Date()): InvoiceName {
    const stem = this.stemOf(fileName);
    const parts = stem.split('-');

    if (parts.length >= 2) {
      return { stem, invoiceNumber: parts[0], date: parts[1] };
    }

    return { stem, invoiceNumber: stem, date: dayjs(now()).format('YYYYMMDD') };
  }

  static stemOf(fileName: string): string {
    return path.parse(fileName).name;
  }

  private static readSheet(source: InvoiceSource): RawCell[][] {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(source.payload, { type: 'array', cellDates: true });
    } catch (error) {
      throw new ParseError(`Unable to read spreadsheet: ${describeError(error)}`, { cause: error });
    }

    if (!workbook.SheetNames.includes(INVOICE_SHEET_NAME)) {
      throw new ParseError(`Worksheet named '${INVOICE_SHEET_NAME}' not found`);
    }

    const rows = XLSX.utils.sheet_to_json<RawCell[]>(workbook.Sheets[INVOICE_SHEET_NAME], {
      header: 1,
      raw: true,
      defval: null,
      blankrows: false
    });

    if (rows.length === 0) {
      throw new ParseError(`Worksheet '${INVOICE_SHEET_NAME}' has no header row`);
    }

    return rows;
  }

  /**
   * A column holding only numbers and blanks is a numeric column:
   * one fractional value or one blank makes every number in it decimal.
   * Columns mixing text and numbers keep each value as it is.
   */
  private static readColumn(body: RawCell[][], index: number): CellValue[] {
    const cells = body.map(row => this.toCellValue(row[index]));

    const numericOnly = cells.every(cell => cell.kind !== 'text');
    const promote = numericOnly && cells.some(cell => cell.kind === 'decimal' || cell.kind === 'empty');
    if (!promote) {
      return cells;
    }

    return cells.map((cell): CellValue =>
      cell.kind === 'integer' ? { kind: 'decimal', value: cell.value } : cell
    );
  }

  private static toCellValue(raw: RawCell): CellValue {
    if (raw === null || raw === undefined || raw === '') {
      return { kind: 'empty' };
    }
    if (typeof raw === 'number') {
      return Number.isInteger(raw) ? { kind: 'integer', value: raw } : { kind: 'decimal', value: raw };
    }
    if (raw instanceof Date) {
      return { kind: 'text', value: dayjs(raw).format(CELL_DATE_FORMAT) };
    }
    if (typeof raw === 'boolean') {
      return { kind: 'text', value: raw ? 'True' : 'False' };
    }
    return { kind: 'text', value: String(raw) };
  }

  private static sumColumn(cells: CellValue[]): NumericCell {
    let total = 0;
    let decimal = false;

    cells.forEach((cell, index) => {
      switch (cell.kind) {
        case 'empty':
          return;
        case 'integer':
          total += cell.value;
          return;
        case 'decimal':
          total += cell.value;
          decimal = true;
          return;
        case 'text': {
          const text = cell.value.trim();
          const value = Number(text);
          if (text === '' || !Number.isFinite(value)) {
            throw new ParseError(
              `Column 'total_price' has a non-numeric value "${cell.value}" in line item ${index + 1}`
            );
          }
          total += value;
          decimal = decimal || !Number.isInteger(value) || text.includes('.');
        }
      }
    });

    return decimal ? { kind: 'decimal', value: total } : { kind: 'integer', value: total };
  }
}
