import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('development'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_SYMBOL_COUNTER_MODEL: z.string().optional(),
  OPENAI_TIMEOUT_MS: z.coerce.number().default(180000),
  OPENAI_MAX_RETRIES: z.coerce.number().default(2),
  PDF_MAX_PAGES: z.coerce.number().int().min(0).default(0),
  PROJECT_CONFIG_PATH: z.string().optional(),
  REFERENCE_PATH: z.string().optional(),
});

const raw = envSchema.parse(process.env);

export const config = {
  nodeEnv: raw.NODE_ENV,
  openAiApiKey: raw.OPENAI_API_KEY,
  openAiModel: raw.OPENAI_MODEL,
  openAiSymbolCounterModel: raw.OPENAI_SYMBOL_COUNTER_MODEL,
  openAiTimeoutMs: raw.OPENAI_TIMEOUT_MS,
  openAiMaxRetries: raw.OPENAI_MAX_RETRIES,
  pdfMaxPages: raw.PDF_MAX_PAGES,
  projectConfigPath: raw.PROJECT_CONFIG_PATH,
  referencePath: raw.REFERENCE_PATH,
};

export type EnvConfig = typeof config;
