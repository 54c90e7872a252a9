import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import { AppConfig } from '../config';
import { FileBuffer } from '../types';
import { createInvoiceHandlers } from './commands/invoice';
import { SessionStore } from './session';

export const createBot = (config: AppConfig, defaultLogo?: FileBuffer) => {
  const bot = new Telegraf(config.botToken);
  const store = new SessionStore({
    companyName: config.companyName,
    logo: defaultLogo,
    maxFiles: config.maxFilesPerBatch
  });
  const handlers = createInvoiceHandlers(store);

  // Commands
  bot.command('invoice', handlers.invoiceCommand);
  bot.command('company', handlers.companyCommand);
  bot.command('convert', handlers.convertCommand);
  bot.on(message('document'), handlers.handleDocument);
  bot.on(message('photo'), handlers.handlePhoto);

  bot.catch(async (err, ctx) => {
    console.error(`Error for ${ctx.updateType}:`, err);
    await ctx.reply('An error occurred while processing the request. Please try again later.');
  });

  return bot;
};

export const startBot = async (config: AppConfig, defaultLogo?: FileBuffer) => {
  const bot = createBot(config, defaultLogo);

  // Graceful shutdown
  process.once('SIGINT', () => bot.stop('SIGINT'));
  process.once('SIGTERM', () => bot.stop('SIGTERM'));

  console.log('Starting bot...');
  await bot.launch(() => {
    console.log('Bot started successfully');
  });
};
