import { z } from 'zod';

export const DEFAULT_ARCHIVE_URL = 'https://exoplanetarchive.ipac.caltech.edu/TAP/sync';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash-001';
export const ONE_HOUR_MS = 60 * 60 * 1000;

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  EXOPLANET_ARCHIVE_URL: z.preprocess(emptyAsUndefined, z.string().url().default(DEFAULT_ARCHIVE_URL)),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CATALOG_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(ONE_HOUR_MS),
  CATALOG_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(10_000).default(10),
  CATALOG_FETCH_RETRIES: z.coerce.number().int().nonnegative().default(0),
  GEMINI_API_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
  GEMINI_MODEL: z.preprocess(emptyAsUndefined, z.string().default(DEFAULT_GEMINI_MODEL)),
  ADVISOR_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(ONE_HOUR_MS),
  ADVISOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  REDIS_URL: z.preprocess(emptyAsUndefined, z.string().optional())
});

export interface CatalogConfig {
  baseUrl: string;
  timeoutMs: number;
  cacheTtlMs: number;
  defaultLimit: number;
  retries: number;
}

export interface AdvisorConfig {
  apiKey?: string;
  model: string;
  cacheTtlMs: number;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  redisUrl?: string;
  catalog: CatalogConfig;
  advisor: AdvisorConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration invalide: ${details}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    redisUrl: vars.REDIS_URL,
    catalog: {
      baseUrl: vars.EXOPLANET_ARCHIVE_URL,
      timeoutMs: vars.CATALOG_TIMEOUT_MS,
      cacheTtlMs: vars.CATALOG_CACHE_TTL_MS,
      defaultLimit: vars.CATALOG_DEFAULT_LIMIT,
      retries: vars.CATALOG_FETCH_RETRIES
    },
    advisor: {
      apiKey: vars.GEMINI_API_KEY,
      model: vars.GEMINI_MODEL,
      cacheTtlMs: vars.ADVISOR_CACHE_TTL_MS,
      timeoutMs: vars.ADVISOR_TIMEOUT_MS
    }
  };
}
