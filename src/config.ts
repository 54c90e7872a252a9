import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const configSchema = z.object({
  BOT_TOKEN: z.string({ required_error: 'BOT_TOKEN must be provided!' }).min(1, 'BOT_TOKEN must be provided!'),
  COMPANY_NAME: optionalString.transform(value => value ?? 'My Company'),
  LOGO_PATH: optionalString,
  MAX_FILES_PER_BATCH: z.coerce.number().int().positive().default(20)
});

export interface AppConfig {
  botToken: string;
  companyName: string;
  logoPath?: string;
  maxFilesPerBatch: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
  }

  return {
    botToken: parsed.data.BOT_TOKEN,
    companyName: parsed.data.COMPANY_NAME,
    logoPath: parsed.data.LOGO_PATH,
    maxFilesPerBatch: parsed.data.MAX_FILES_PER_BATCH
  };
}
