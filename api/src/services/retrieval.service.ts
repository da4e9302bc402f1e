/**
 * Retrieval Service — Access-Controlled Query Orchestration
 *
 * Compiles the caller's access predicate, fans out across the selected
 * backends in parallel and merges what comes back. Optionally hands the
 * merged set to the answer generator.
 *
 * Exports:
 *   Pure functions:
 *     - selectAdapters()
 *     - toResultItem()
 *     - summarizeSources()
 *
 *   Async orchestrators:
 *     - queryBackends()
 *     - handleQuery()
 */

import { BackendUnavailableError, describeError } from '@/errors/gateway';
import { compileAccessPredicate, normalizeCaller } from '@/services/accessFilter.service';
import type { AnswerGenerator, Citation } from '@/services/answerGenerator.service';
import {
  BACKEND_BY_SOURCE_KIND,
  type BackendAdapter,
  type BackendName,
  type BackendOutcome,
} from '@/services/backends/types';
import { sanitizeMetadata } from '@/services/metadataSanitizer';
import { mergeResults } from '@/services/resultMerger.service';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import { TimeoutError, withTimeout } from '@/utils/timeout';
import type {
  AccessPredicate,
  CallerContext,
  MetadataValue,
  ScoredDocument,
} from '@/types/documents';
import type { QueryRequest } from '@/validators/query';

// ── Types ──────────────────────────────────────────────────────────────

export interface QueryServices {
  adapters: readonly BackendAdapter[];
  generator: AnswerGenerator;
  backendTimeoutMs: number;
  log?: Logger;
}

export interface ResultItem {
  id: string;
  title: string;
  content: string;
  score: number;
  source: BackendName;
  location: { uri: string };
  metadata: Record<string, MetadataValue>;
}

export interface SourceSummary {
  status: 'ok' | 'unavailable';
  results: number;
}

interface ResponseBase {
  query: string;
  sources: Partial<Record<BackendName, SourceSummary>>;
  timestamp: string;
}

export interface RetrieveResponse extends ResponseBase {
  type: 'retrieve';
  results: ResultItem[];
  total_results: number;
}

export interface GenerateResponse extends ResponseBase {
  type: 'retrieve_and_generate';
  generated_response: string;
  citations: Citation[];
  cached: boolean;
}

export type QueryResponse = RetrieveResponse | GenerateResponse;

// ── Pure Functions ─────────────────────────────────────────────────────

/** Adapters named in `sources`, in configured order; all of them when unspecified */
export function selectAdapters(
  adapters: readonly BackendAdapter[],
  sources?: readonly BackendName[],
): BackendAdapter[] {
  if (!sources || sources.length === 0) return [...adapters];
  const wanted = new Set(sources);
  return adapters.filter((adapter) => wanted.has(adapter.name));
}

export function toResultItem(document: ScoredDocument): ResultItem {
  return {
    id: document.id,
    title: document.title,
    content: document.content,
    score: document.score,
    source: BACKEND_BY_SOURCE_KIND[document.sourceKind],
    location: { uri: document.sourceURI },
    metadata: sanitizeMetadata(document.metadata),
  };
}

export function summarizeSources(outcomes: readonly BackendOutcome[]): Partial<Record<BackendName, SourceSummary>> {
  const summary: Partial<Record<BackendName, SourceSummary>> = {};
  for (const outcome of outcomes) {
    summary[outcome.backend] = {
      status: outcome.error ? 'unavailable' : 'ok',
      results: outcome.documents.length,
    };
  }
  return summary;
}

// ── Fan-out ────────────────────────────────────────────────────────────

/**
 * Query every adapter concurrently. A failure or timeout becomes an
 * empty outcome carrying an error annotation; it never rejects.
 */
export async function queryBackends(
  adapters: readonly BackendAdapter[],
  text: string,
  predicate: AccessPredicate,
  limit: number,
  caller: CallerContext,
  options: { timeoutMs: number; log?: Logger },
): Promise<BackendOutcome[]> {
  const log = options.log ?? rootLogger;

  const settled = await Promise.allSettled(
    adapters.map((adapter) =>
      withTimeout(`${adapter.name} query`, options.timeoutMs, (signal) =>
        adapter.query(text, predicate, limit, caller, signal),
      ),
    ),
  );

  return settled.map((result, i): BackendOutcome => {
    const adapter = adapters[i];
    if (result.status === 'fulfilled') {
      return { backend: adapter.name, sourceKind: adapter.sourceKind, documents: result.value };
    }

    const timedOut = result.reason instanceof TimeoutError;
    const failure = new BackendUnavailableError(
      adapter.name,
      `${adapter.name} ${timedOut ? 'timed out' : 'failed'}: ${describeError(result.reason)}`,
      timedOut,
      { cause: result.reason },
    );
    log.warn('Backend unavailable, continuing without it', {
      backend: adapter.name,
      code: failure.code,
      timedOut,
      error: describeError(result.reason),
    });
    return { backend: adapter.name, sourceKind: adapter.sourceKind, documents: [], error: failure.message };
  });
}

// ── Orchestrator ───────────────────────────────────────────────────────

/**
 * Run one query request end to end.
 *
 * @throws ValidationError when the request carries no identity signal
 * @throws UpstreamGenerationError when answer generation fails
 */
export async function handleQuery(services: QueryServices, request: QueryRequest): Promise<QueryResponse> {
  const log = services.log ?? rootLogger;
  const caller: CallerContext = normalizeCaller({
    userId: request.user_id,
    groups: request.user_groups,
    userToken: request.user_token,
  });

  const predicate = compileAccessPredicate(caller);
  const adapters = selectAdapters(services.adapters, request.sources);

  const outcomes = await queryBackends(adapters, request.query, predicate, request.max_results, caller, {
    timeoutMs: services.backendTimeoutMs,
    log,
  });
  const merged = mergeResults(outcomes, caller, request.max_results);

  log.info('Query served', {
    type: request.type,
    backends: adapters.map((a) => a.name),
    total: merged.total,
    returned: merged.documents.length,
    provenance: merged.provenance,
  });

  const base = {
    query: request.query,
    sources: summarizeSources(outcomes),
    timestamp: new Date().toISOString(),
  };

  if (request.type === 'retrieve_and_generate') {
    const answer = await services.generator.generateAnswer(request.query, merged, caller, {
      useCaching: request.use_caching,
    });
    return {
      type: 'retrieve_and_generate',
      ...base,
      generated_response: answer.text,
      citations: answer.citations,
      cached: answer.cached,
    };
  }

  const results = merged.documents.map(toResultItem);
  return { type: 'retrieve', ...base, results, total_results: results.length };
}
