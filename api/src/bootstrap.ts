/**
 * Service Wiring
 *
 * Builds the concrete collaborators from configuration. Each backend is
 * optional: a gateway runs with whichever backends have credentials.
 */

import type { Env } from '@/config/env';
import { getDb, getSql } from '@/db/client';
import type { AppServices } from '@/app';
import { AnswerGenerator, type InstructionArtifact } from '@/services/answerGenerator.service';
import { createOpenAiEmbedder } from '@/services/backends/embeddings';
import { HttpIndexingTrigger } from '@/services/backends/httpIndexingTrigger';
import { HttpKeywordIndex } from '@/services/backends/httpKeywordIndex';
import { KeywordIndexAdapter } from '@/services/backends/keywordIndexAdapter';
import { PgObjectStore } from '@/services/backends/pgObjectStore';
import { PgVectorRetriever } from '@/services/backends/pgVectorRetriever';
import type { BackendAdapter, KeywordIndex, ObjectStore } from '@/services/backends/types';
import { VectorStoreAdapter } from '@/services/backends/vectorStoreAdapter';
import { AnthropicGenerativeModel } from '@/services/generation/anthropicModel';
import type { IngestionSyncDeps } from '@/services/ingestionSync.service';
import { PromptCache } from '@/services/promptCache.service';
import { logger as rootLogger, type Logger } from '@/utils/logger';

export interface Runtime {
  services: AppServices;
  /** Present when both the keyword index and the object store are configured */
  syncDeps: IngestionSyncDeps | null;
}

export function createKeywordIndex(env: Env): KeywordIndex | null {
  if (!env.KEYWORD_INDEX_URL) return null;
  return new HttpKeywordIndex({
    baseUrl: env.KEYWORD_INDEX_URL,
    apiKey: env.KEYWORD_INDEX_API_KEY,
    timeoutMs: env.BACKEND_TIMEOUT_MS,
  });
}

export function createObjectStore(env: Env): ObjectStore | null {
  return env.DATABASE_URL ? new PgObjectStore(getDb()) : null;
}

export function createRuntime(env: Env, log: Logger = rootLogger): Runtime {
  const adapters: BackendAdapter[] = [];

  if (env.DATABASE_URL && env.OPENAI_API_KEY) {
    const embed = createOpenAiEmbedder({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_EMBEDDING_MODEL });
    adapters.push(new VectorStoreAdapter(new PgVectorRetriever(getSql(), embed)));
  } else {
    log.warn('Primary knowledge store disabled (DATABASE_URL and OPENAI_API_KEY are required)');
  }

  const keywordIndex = createKeywordIndex(env);
  if (keywordIndex) {
    adapters.push(new KeywordIndexAdapter(keywordIndex));
  } else {
    log.warn('Secondary keyword index disabled (KEYWORD_INDEX_URL is not set)');
  }

  const model = env.ANTHROPIC_API_KEY
    ? new AnthropicGenerativeModel({
        apiKey: env.ANTHROPIC_API_KEY,
        model: env.ANTHROPIC_MODEL,
        maxTokens: env.GENERATION_MAX_TOKENS,
        temperature: env.GENERATION_TEMPERATURE,
      })
    : null;
  if (!model) {
    log.warn('Answer generation disabled (ANTHROPIC_API_KEY is not set)');
  }

  const generator = new AnswerGenerator({
    model,
    promptCache: new PromptCache<InstructionArtifact>({ ttlMs: env.PROMPT_CACHE_TTL_MINUTES * 60 * 1000 }),
    timeoutMs: env.GENERATION_TIMEOUT_MS,
  });

  const store = createObjectStore(env);
  const trigger = env.INDEXING_TRIGGER_URL
    ? new HttpIndexingTrigger(env.INDEXING_TRIGGER_URL, env.KEYWORD_INDEX_API_KEY, env.BACKEND_TIMEOUT_MS)
    : null;
  const syncDeps: IngestionSyncDeps | null =
    keywordIndex && store ? { index: keywordIndex, store, trigger, prefix: env.SYNC_PREFIX } : null;

  return {
    services: {
      query: { adapters, generator, backendTimeoutMs: env.BACKEND_TIMEOUT_MS },
      ingestion: { token: env.INGESTION_TOKEN, sync: syncDeps, store, pdfMaxPages: env.PDF_MAX_PAGES },
      corsOrigin: env.CORS_ORIGIN,
    },
    syncDeps,
  };
}
