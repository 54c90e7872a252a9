import { createHash } from 'crypto';
import { jsPDF } from 'jspdf';
import { RenderError, describeError } from '../errors';
import { InvoiceRecord, LINE_ITEM_FIELDS, LogoImage, RenderedDocument } from '../types';
import { formatCell, formatColumnHeader } from '../utils/format';

const PAGE_MARGIN = 10;
const CELL_PADDING = 1;
const LINE_HEIGHT = 8;
const LINE_WIDTH = 0.2;
const HEADER_CELL_WIDTH = 50;
const SUMMARY_CELL_WIDTH = 30;
const COMPANY_CELL_WIDTH = 25;
const LOGO_WIDTH = 10;
const PT_TO_MM = 25.4 / 72;

export const COLUMN_WIDTHS = [30, 70, 30, 30, 30] as const;

const GRAY = 80;

export interface RenderOptions {
  now?: () => Date;
}

interface CellOptions {
  border?: boolean;
  newLine?: boolean;
}

/**
 * Writes fixed-height cells left to right, moving to the next line
 * when a cell asks for it.
 */
class PageCursor {
  private x = PAGE_MARGIN;
  private y = PAGE_MARGIN;

  constructor(private readonly doc: jsPDF) {}

  font(style: 'normal' | 'bold', size: number): this {
    this.doc.setFont('times', style);
    this.doc.setFontSize(size);
    return this;
  }

  cell(width: number, text: string, { border = false, newLine = false }: CellOptions = {}): this {
    assertEncodable(text);

    if (border) {
      this.doc.rect(this.x, this.y, width, LINE_HEIGHT);
    }
    if (text !== '') {
      const fontHeight = this.doc.getFontSize() * PT_TO_MM;
      this.doc.text(text, this.x + CELL_PADDING, this.y + LINE_HEIGHT / 2 + 0.3 * fontHeight);
    }

    if (newLine) {
      this.x = PAGE_MARGIN;
      this.y += LINE_HEIGHT;
    } else {
      this.x += width;
    }
    return this;
  }

  row(cells: string[], options: CellOptions = {}): this {
    cells.forEach((text, index) => {
      this.cell(COLUMN_WIDTHS[index], text, {
        ...options,
        newLine: index === cells.length - 1
      });
    });
    return this;
  }

  image(logo: LogoImage, width: number): this {
    const height = (width * logo.height) / logo.width;
    this.doc.addImage(logo.data, logo.format, this.x, this.y, width, height, 'logo');
    this.y += height;
    return this;
  }
}

/** Standard PDF fonts only cover Latin-1. */
function assertEncodable(text: string): void {
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code > 0xff) {
      throw new RenderError(
        `Character "${char}" (U+${code.toString(16).toUpperCase().padStart(4, '0')}) in "${text}" cannot be encoded`
      );
    }
  }
}

function detectImageFormat(bytes: Uint8Array): LogoImage['format'] | undefined {
  const startsWith = (signature: number[]) => signature.every((byte, index) => bytes[index] === byte);

  if (startsWith([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return 'PNG';
  }
  if (startsWith([0xff, 0xd8, 0xff])) {
    return 'JPEG';
  }
  return undefined;
}

export class PdfRenderer {
  /**
   * Reads the format and pixel size of a logo once so that it can be
   * placed on any number of pages.
   */
  static prepareLogo(bytes: Uint8Array): LogoImage {
    const format = detectImageFormat(bytes);
    if (!format) {
      throw new RenderError('Logo must be a PNG or JPEG image');
    }

    let properties: ReturnType<jsPDF['getImageProperties']>;
    try {
      properties = new jsPDF().getImageProperties(bytes);
    } catch (error) {
      throw new RenderError(`Unable to read logo image: ${describeError(error)}`, { cause: error });
    }

    const { width, height } = properties;
    if (!(width > 0 && height > 0)) {
      throw new RenderError('Logo image has no pixels');
    }

    return { data: bytes, format, width, height };
  }

  /**
   * Lays the invoice out on one A4 page: header, line item table,
   * total, and the company footer with an optional logo.
   */
  static render(
    record: InvoiceRecord,
    companyName: string,
    logo?: LogoImage | Uint8Array,
    options: RenderOptions = {}
  ): RenderedDocument {
    const image = logo instanceof Uint8Array ? this.prepareLogo(logo) : logo;
    const createdAt = (options.now ?? (() => new Date()))();

    try {
      const doc = new jsPDF({ orientation: 'portrait', unit: 'mm', format: 'a4' });
      doc.setCreationDate(createdAt);
      doc.setFileId(this.fileIdOf(record, companyName, createdAt));
      doc.setLineWidth(LINE_WIDTH);

      const page = new PageCursor(doc);
      const total = formatCell(record.totalPrice);

      page
        .font('bold', 16)
        .cell(HEADER_CELL_WIDTH, `Invoice nr.${record.invoiceNumber}`, { newLine: true })
        .cell(HEADER_CELL_WIDTH, `Date: ${record.date}`, { newLine: true });

      doc.setTextColor(GRAY, GRAY, GRAY);
      page.font('bold', 10).row(record.columnHeaders.map(formatColumnHeader), { border: true });

      page.font('normal', 10);
      for (const item of record.rows) {
        page.row(
          LINE_ITEM_FIELDS.map(field => formatCell(item[field])),
          { border: true }
        );
      }
      page.row(['', '', '', '', total], { border: true });

      page
        .font('bold', 10)
        .cell(SUMMARY_CELL_WIDTH, `The total price is ${total}`, { newLine: true })
        .cell(COMPANY_CELL_WIDTH, companyName);

      if (image) {
        page.image(image, LOGO_WIDTH);
      }

      return Buffer.from(doc.output('arraybuffer'));
    } catch (error) {
      if (error instanceof RenderError) {
        throw error;
      }
      throw new RenderError(
        `Unable to render invoice ${record.invoiceNumber}: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  private static fileIdOf(record: InvoiceRecord, companyName: string, createdAt: Date): string {
    return createHash('md5')
      .update(JSON.stringify(record))
      .update(companyName)
      .update(createdAt.toISOString())
      .digest('hex');
  }
}
