import { FileBuffer } from '../types';

export interface ConversionSession {
  invoices: FileBuffer[];
  companyName: string;
  logo?: FileBuffer;
}

export type AddInvoiceResult = 'added' | 'limit-reached';

export class SessionStore {
  private readonly sessions = new Map<number, ConversionSession>();

  constructor(
    private readonly defaults: { companyName: string; logo?: FileBuffer; maxFiles: number }
  ) {}

  start(userId: number): ConversionSession {
    const session: ConversionSession = {
      invoices: [],
      companyName: this.defaults.companyName,
      logo: this.defaults.logo
    };
    this.sessions.set(userId, session);
    return session;
  }

  get(userId: number): ConversionSession | undefined {
    return this.sessions.get(userId);
  }

  addInvoice(session: ConversionSession, file: FileBuffer): AddInvoiceResult {
    if (session.invoices.length >= this.defaults.maxFiles) {
      return 'limit-reached';
    }
    session.invoices.push(file);
    return 'added';
  }

  end(userId: number): void {
    this.sessions.delete(userId);
  }
}
