export class InvoiceConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The spreadsheet could not be read as an invoice table. */
export class ParseError extends InvoiceConversionError {}

/** The invoice could not be laid out or encoded as a PDF. */
export class RenderError extends InvoiceConversionError {}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
