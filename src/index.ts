import { config } from 'dotenv';
import { readFileSync } from 'fs';
import * as path from 'path';
import { startBot } from './bot';
import { loadConfig } from './config';
import { FileBuffer } from './types';

config();

const appConfig = loadConfig();

const defaultLogo: FileBuffer | undefined = appConfig.logoPath
  ? {
      buffer: readFileSync(appConfig.logoPath),
      filename: path.basename(appConfig.logoPath)
    }
  : undefined;

startBot(appConfig, defaultLogo).catch(error => {
  console.error('Error starting bot:', error);
  process.exitCode = 1;
});
