import { describeError } from '../errors';
import { BatchResult, InvoiceSource, LogoImage } from '../types';
import { InvoiceParser } from './invoiceParser';
import { PdfRenderer } from './pdfRenderer';

export interface ConvertOptions {
  companyName: string;
  logo?: Uint8Array;
  now?: () => Date;
}

export class BatchConverter {
  /**
   * Converts every source in order. A source that fails to parse or
   * render adds one line to `errors` and the batch carries on.
   * Two sources with the same file stem share one output name; the
   * later document replaces the earlier one.
   */
  static convert(sources: InvoiceSource[], options: ConvertOptions): BatchResult {
    const result: BatchResult = { successes: new Map(), errors: [] };
    const now = options.now ?? (() => new Date());

    let logo: LogoImage | undefined;
    let logoError: unknown;
    if (options.logo) {
      try {
        logo = PdfRenderer.prepareLogo(options.logo);
      } catch (error) {
        console.error('Error preparing logo:', error);
        logoError = error;
      }
    }

    console.log(`Converting ${sources.length} invoice(s) for ${options.companyName}`);

    for (const source of sources) {
      try {
        if (logoError !== undefined) {
          throw logoError;
        }

        const record = InvoiceParser.parse(source, { now });
        const document = PdfRenderer.render(record, options.companyName, logo, { now });
        result.successes.set(`${InvoiceParser.stemOf(source.name)}.pdf`, document);
      } catch (error) {
        console.error(`Error converting ${source.name}:`, error);
        result.errors.push(`${source.name}: ${describeError(error)}`);
      }
    }

    console.log(
      `Conversion finished: ${result.successes.size} document(s), ${result.errors.length} error(s)`
    );
    return result;
  }
}
