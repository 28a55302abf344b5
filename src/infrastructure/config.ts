import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { formatIssues } from '../domain/schemas.js';

/** The bundled catalog, found beside the code. A relative COUNTY_CATALOG_PATH resolves against the working directory. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/counties.json', import.meta.url));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    LLM_PROVIDER: z.enum(['groq', 'stub']).default('stub'),
    GROQ_API_KEY: z.string().min(1).optional(),
    LLM_MODEL: z.string().min(1).optional(),
    COUNTY_CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'groq' && env.GROQ_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GROQ_API_KEY'],
        message: 'GROQ_API_KEY is required when LLM_PROVIDER is groq',
      });
    }
  });

export interface AppConfig {
  port: number;
  logLevel: string;
  llmProvider: 'groq' | 'stub';
  groqApiKey?: string;
  llmModel?: string;
  countyCatalogPath: string;
}

/** @throws {Error} If any variable is malformed or a required one is missing */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    llmProvider: values.LLM_PROVIDER,
    groqApiKey: values.GROQ_API_KEY,
    llmModel: values.LLM_MODEL,
    countyCatalogPath: resolve(values.COUNTY_CATALOG_PATH),
  };
}
