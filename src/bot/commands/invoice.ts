import { Telegram } from 'telegraf';
import type { Message, User } from 'telegraf/types';
import { BatchConverter } from '../../services/batchConverter';
import { FileBuffer } from '../../types';
import { classifyUpload, downloadFile } from '../files';
import { formatBatchReport } from '../report';
import { SessionStore } from '../session';

export type FileDownloader = (telegram: Telegram, fileId: string) => Promise<Buffer>;

/** The part of a Telegraf context the invoice handlers use. */
export interface InvoiceContext {
  from?: User;
  message?: Message;
  telegram: Telegram;
  reply(text: string): Promise<unknown>;
  replyWithDocument(document: { source: Buffer; filename: string }): Promise<unknown>;
}

export const START_HINT = 'Please start with the /invoice command';

const commandArgument = (ctx: InvoiceContext): string =>
  ctx.message && 'text' in ctx.message ? ctx.message.text.replace(/^\/\S+\s*/, '').trim() : '';

export function createInvoiceHandlers(store: SessionStore, download: FileDownloader = downloadFile) {
  const invoiceCommand = async (ctx: InvoiceContext) => {
    try {
      const userId = ctx.from?.id;
      if (!userId) {
        await ctx.reply('Unable to identify the user');
        return;
      }

      // A new /invoice drops anything uploaded before
      const session = store.start(userId);
      await ctx.reply(
        [
          'Send one or more Excel invoices (.xlsx) with a sheet named "Sheet 1".',
          `Company name: ${session.companyName} (change it with /company <name>).`,
          'Optionally send a PNG or JPEG logo.',
          'When everything is uploaded, send /convert.'
        ].join('\n')
      );
    } catch (error) {
      console.error('Error in invoice command:', error);
      await ctx.reply('Something went wrong while handling the command. Please try again later.');
    }
  };

  const companyCommand = async (ctx: InvoiceContext) => {
    try {
      const session = ctx.from && store.get(ctx.from.id);
      if (!session) {
        await ctx.reply(START_HINT);
        return;
      }

      // Without an argument just show the current name
      const name = commandArgument(ctx);
      if (name === '') {
        await ctx.reply(`Company name: ${session.companyName}`);
        return;
      }

      session.companyName = name;
      await ctx.reply(`Company name set to ${name}`);
    } catch (error) {
      console.error('Error in company command:', error);
      await ctx.reply('Something went wrong while handling the command. Please try again later.');
    }
  };

  const handleDocument = async (ctx: InvoiceContext) => {
    try {
      if (!ctx.message || !('document' in ctx.message)) {
        return;
      }
      const session = ctx.from && store.get(ctx.from.id);
      if (!session) {
        await ctx.reply(START_HINT);
        return;
      }

      // Check the file type
      const document = ctx.message.document;
      const kind = classifyUpload(document.file_name ?? '', document.mime_type);
      if (kind === 'unsupported') {
        await ctx.reply('Please send an Excel invoice (.xlsx) or a PNG/JPEG logo');
        return;
      }

      // Download the file
      const filename = document.file_name || (kind === 'logo' ? 'logo' : 'document.xlsx');
      const file: FileBuffer = {
        buffer: await download(ctx.telegram, document.file_id),
        filename
      };

      if (kind === 'logo') {
        session.logo = file;
        await ctx.reply(`Logo ${filename} received`);
        return;
      }

      // Queue the invoice
      if (store.addInvoice(session, file) === 'limit-reached') {
        await ctx.reply(`At most ${session.invoices.length} invoices can be converted at once. Send /convert.`);
        return;
      }
      await ctx.reply(`Invoice ${filename} received (${session.invoices.length} in total)`);
    } catch (error) {
      console.error('Error handling document:', error);
      await ctx.reply('Something went wrong while receiving the file. Please try again later.');
    }
  };

  const handlePhoto = async (ctx: InvoiceContext) => {
    try {
      if (!ctx.message || !('photo' in ctx.message)) {
        return;
      }
      const session = ctx.from && store.get(ctx.from.id);
      if (!session) {
        await ctx.reply(START_HINT);
        return;
      }

      // Sizes are sent smallest first
      const photo = ctx.message.photo[ctx.message.photo.length - 1];
      if (!photo) {
        return;
      }

      session.logo = {
        buffer: await download(ctx.telegram, photo.file_id),
        filename: 'logo.jpg'
      };
      await ctx.reply('Logo received');
    } catch (error) {
      console.error('Error handling photo:', error);
      await ctx.reply('Something went wrong while receiving the logo. Please try again later.');
    }
  };

  const convertCommand = async (ctx: InvoiceContext) => {
    try {
      const userId = ctx.from?.id;
      const session = userId === undefined ? undefined : store.get(userId);
      if (userId === undefined || !session) {
        await ctx.reply(START_HINT);
        return;
      }
      if (session.invoices.length === 0) {
        await ctx.reply('No invoices received yet. Send one or more .xlsx files first.');
        return;
      }

      // Convert the whole batch
      await ctx.reply(`🔄 Converting ${session.invoices.length} invoice(s)...`);
      const result = BatchConverter.convert(
        session.invoices.map(file => ({ name: file.filename, payload: file.buffer })),
        { companyName: session.companyName, logo: session.logo?.buffer }
      );
      store.end(userId);

      // Report, then send the documents
      await ctx.reply(formatBatchReport(session.invoices.length, result));
      for (const [filename, document] of result.successes) {
        await ctx.replyWithDocument({ source: document, filename });
      }
    } catch (error) {
      console.error('Error converting invoices:', error);
      await ctx.reply('Something went wrong while converting the invoices. Please try again later.');
    }
  };

  return { invoiceCommand, companyCommand, handleDocument, handlePhoto, convertCommand };
}
