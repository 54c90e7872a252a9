import { Telegram } from 'telegraf';
import type { Message, User } from 'telegraf/types';
import { invoiceSource } from '../../testing/fixtures';
import { SessionStore } from '../session';
import { createInvoiceHandlers, START_HINT } from './invoice';

const USER: User = { id: 42, is_bot: false, first_name: 'Test' };

const CHAT = { id: 42, type: 'private' as const, first_name: 'Test' };

const textMessage = (text: string): Message.TextMessage => ({
  message_id: 1,
  date: 0,
  chat: CHAT,
  from: USER,
  text
});

const documentMessage = (fileName: string | undefined, mimeType?: string): Message.DocumentMessage => ({
  message_id: 2,
  date: 0,
  chat: CHAT,
  from: USER,
  document: { file_id: `id:${fileName ?? ''}`, file_unique_id: 'unique', file_name: fileName, mime_type: mimeType }
});

const createContext = (message?: Message, from: User | undefined = USER) => ({
  from,
  message,
  telegram: new Telegram('test-token'),
  reply: jest.fn((text: string) => Promise.resolve(text)),
  replyWithDocument: jest.fn((document: { source: Buffer; filename: string }) => Promise.resolve(document))
});

const lastReply = (ctx: ReturnType<typeof createContext>) =>
  ctx.reply.mock.calls[ctx.reply.mock.calls.length - 1]?.[0];

describe('invoice handlers', () => {
  const uploads = new Map<string, Buffer>();
  const download = jest.fn((_telegram: Telegram, fileId: string) =>
    Promise.resolve(uploads.get(fileId) ?? Buffer.alloc(0))
  );

  let store: SessionStore;
  let handlers: ReturnType<typeof createInvoiceHandlers>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    uploads.clear();
    download.mockClear();
    store = new SessionStore({ companyName: 'Test Company', maxFiles: 2 });
    handlers = createInvoiceHandlers(store, download);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should ask to start with /invoice before any session exists', async () => {
    const contexts = [
      createContext(textMessage('/company Acme')),
      createContext(documentMessage('10001-20230118.xlsx')),
      createContext(textMessage('/convert'))
    ];

    await handlers.companyCommand(contexts[0]);
    await handlers.handleDocument(contexts[1]);
    await handlers.convertCommand(contexts[2]);

    for (const ctx of contexts) {
      expect(ctx.reply).toHaveBeenCalledTimes(1);
      expect(ctx.reply).toHaveBeenCalledWith(START_HINT);
    }
    expect(download).not.toHaveBeenCalled();
  });

  it('should start a session with the default company name', async () => {
    const ctx = createContext(textMessage('/invoice'));

    await handlers.invoiceCommand(ctx);

    expect(store.get(42)).toEqual({ invoices: [], companyName: 'Test Company', logo: undefined });
    expect(lastReply(ctx)).toContain('Company name: Test Company (change it with /company <name>).');
  });

  it('should show the company name when /company has no argument', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(textMessage('/company'));

    await handlers.companyCommand(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('Company name: Test Company');
    expect(store.get(42)?.companyName).toBe('Test Company');
  });

  it('should set the company name from the /company argument', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(textMessage('/company  Acme Trading Ltd '));

    await handlers.companyCommand(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('Company name set to Acme Trading Ltd');
    expect(store.get(42)?.companyName).toBe('Acme Trading Ltd');
  });

  it('should reject files that are neither invoices nor logos', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(documentMessage('notes.txt', 'text/plain'));

    await handlers.handleDocument(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('Please send an Excel invoice (.xlsx) or a PNG/JPEG logo');
    expect(download).not.toHaveBeenCalled();
    expect(store.get(42)?.invoices).toEqual([]);
  });

  it('should store an image document as the logo', async () => {
    uploads.set('id:logo.png', Buffer.from('logo bytes'));
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(documentMessage('logo.png', 'image/png'));

    await handlers.handleDocument(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('Logo logo.png received');
    expect(store.get(42)?.logo).toEqual({ buffer: Buffer.from('logo bytes'), filename: 'logo.png' });
  });

  it('should name an invoice without a file name by its type', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(
      documentMessage(undefined, 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
    );

    await handlers.handleDocument(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('Invoice document.xlsx received (1 in total)');
  });

  it('should refuse invoices over the batch limit', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    await handlers.handleDocument(createContext(documentMessage('10001-20230118.xlsx')));
    await handlers.handleDocument(createContext(documentMessage('10002-20230119.xlsx')));
    const ctx = createContext(documentMessage('10003-20230120.xlsx'));

    await handlers.handleDocument(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('At most 2 invoices can be converted at once. Send /convert.');
    expect(store.get(42)?.invoices.map(file => file.filename)).toEqual([
      '10001-20230118.xlsx',
      '10002-20230119.xlsx'
    ]);
  });

  it('should take the largest photo size as the logo', async () => {
    uploads.set('large', Buffer.from('large photo'));
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const photo: Message.PhotoMessage = {
      message_id: 3,
      date: 0,
      chat: CHAT,
      from: USER,
      photo: [
        { file_id: 'small', file_unique_id: 'small', width: 90, height: 90 },
        { file_id: 'large', file_unique_id: 'large', width: 800, height: 800 }
      ]
    };
    const ctx = createContext(photo);

    await handlers.handlePhoto(ctx);

    expect(download).toHaveBeenCalledWith(ctx.telegram, 'large');
    expect(store.get(42)?.logo).toEqual({ buffer: Buffer.from('large photo'), filename: 'logo.jpg' });
  });

  it('should ask for invoices when /convert comes before any upload', async () => {
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    const ctx = createContext(textMessage('/convert'));

    await handlers.convertCommand(ctx);

    expect(ctx.reply).toHaveBeenCalledWith('No invoices received yet. Send one or more .xlsx files first.');
    expect(store.get(42)).toBeDefined();
  });

  it('should report the batch, send each document in order and end the session', async () => {
    handlers = createInvoiceHandlers(new SessionStore({ companyName: 'Test Company', maxFiles: 3 }), download);
    uploads.set('id:10002-20230119.xlsx', Buffer.from(invoiceSource('10002-20230119.xlsx').payload));
    uploads.set('id:broken.xlsx', Buffer.from(invoiceSource('broken.xlsx', undefined, 'Invoice').payload));
    uploads.set('id:10001-20230118.xlsx', Buffer.from(invoiceSource('10001-20230118.xlsx').payload));
    await handlers.invoiceCommand(createContext(textMessage('/invoice')));
    for (const name of ['10002-20230119.xlsx', 'broken.xlsx', '10001-20230118.xlsx']) {
      await handlers.handleDocument(createContext(documentMessage(name)));
    }
    const ctx = createContext(textMessage('/convert'));

    await handlers.convertCommand(ctx);

    expect(ctx.reply.mock.calls.map(([text]) => text)).toEqual([
      '🔄 Converting 3 invoice(s)...',
      [
        '⚠️ Conversion finished with errors',
        '',
        'Total files: 3',
        'Successful: 2',
        'Errors: 1',
        '',
        "❌ broken.xlsx: Worksheet named 'Sheet 1' not found"
      ].join('\n')
    ]);
    expect(ctx.replyWithDocument.mock.calls.map(([document]) => document.filename)).toEqual([
      '10002-20230119.pdf',
      '10001-20230118.pdf'
    ]);

    // The session is gone once the batch has run
    const next = createContext(textMessage('/convert'));
    await handlers.convertCommand(next);
    expect(next.reply).toHaveBeenCalledWith(START_HINT);
  });
});
