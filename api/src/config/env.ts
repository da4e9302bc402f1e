/**
 * Environment Configuration
 *
 * Parses process.env once with zod. Numeric settings are coerced and
 * given defaults; backend credentials stay optional so that a gateway
 * can run with only the backends it has configured.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/errors/gateway';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  CORS_ORIGIN: z.string().optional(),

  // Primary knowledge store (PostgreSQL + pgvector)
  DATABASE_URL: z.string().optional(),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  // Secondary keyword/ACL-aware search index
  KEYWORD_INDEX_URL: z.string().url().optional(),
  KEYWORD_INDEX_API_KEY: z.string().optional(),
  INDEXING_TRIGGER_URL: z.string().url().optional(),

  // Generative model
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default('claude-3-5-sonnet-latest'),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.1),

  // Timeouts and caching
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  PROMPT_CACHE_TTL_MINUTES: z.coerce.number().positive().default(60),

  // Ingestion
  SYNC_PREFIX: z.string().min(1).default('secondary-content'),
  INGESTION_TOKEN: z.string().optional(),
  INGESTION_SYNC_INTERVAL_MINUTES: z.coerce.number().min(0).default(0),
  PDF_MAX_PAGES: z.coerce.number().int().positive().default(20),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Load and validate environment variables.
 * INGESTION_TOKEN is mandatory in production since it guards the ingestion routes.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cachedEnv) return cachedEnv;

  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigurationError(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  const env = result.data;
  if (env.NODE_ENV === 'production' && !env.INGESTION_TOKEN) {
    throw new ConfigurationError('ENV_VALIDATION_FAILED: INGESTION_TOKEN is required in production');
  }

  cachedEnv = env;
  return env;
}

/** For tests: forget the parsed environment */
export function clearEnvCache(): void {
  cachedEnv = null;
}
