/**
 * HttpKeywordIndex
 *
 * Client for a JSON keyword-search service. Results carry typed
 * document attributes, including the connector's access-control fields,
 * which are normalized into an AccessPolicy here.
 *
 * Endpoints:
 *   POST {baseUrl}/search                 query, paginated listing
 *   GET  {baseUrl}/documents/{id}/acl     access-control attributes
 */

import { z } from 'zod';
import { normalizeAcl } from '@/services/aclNormalizer.service';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import { withTimeout } from '@/utils/timeout';
import type { AccessPredicate, DocumentMetadata, RawAttributes, SourceDocument } from '@/types/documents';
import {
  DEFAULT_BACKEND_TIMEOUT_MS,
  type KeywordAuthorization,
  type KeywordIndex,
  type RetrievedDocument,
} from './types';

// ── Wire Schemas ───────────────────────────────────────────────────────

const attributeValueSchema = z.object({
  string_value: z.string().optional(),
  string_list_value: z.array(z.string()).optional(),
  long_value: z.number().optional(),
  date_value: z.string().optional(),
});

const attributeSchema = z.object({
  key: z.string(),
  value: attributeValueSchema,
});

const scoreConfidenceSchema = z.enum(['VERY_HIGH', 'HIGH', 'MEDIUM', 'LOW', 'NOT_AVAILABLE']);

const resultItemSchema = z.object({
  id: z.string(),
  title: z.string().default(''),
  excerpt: z.string().default(''),
  uri: z.string().default(''),
  score: z.number().optional(),
  score_confidence: scoreConfidenceSchema.optional(),
  attributes: z.array(attributeSchema).default([]),
});

const searchResponseSchema = z.object({
  items: z.array(resultItemSchema).default([]),
  next_page_token: z.string().optional(),
});

const aclResponseSchema = z.object({
  attributes: z.array(attributeSchema).default([]),
});

type WireAttribute = z.infer<typeof attributeSchema>;
type ResultItem = z.infer<typeof resultItemSchema>;

interface SearchRequest {
  query: string;
  page_size: number;
  page_token?: string;
  user_context?: { token: string };
  attribute_filter?: AccessPredicate;
}

// ── Conversions ────────────────────────────────────────────────────────

/** Confidence buckets for services that do not report a numeric score */
export const CONFIDENCE_SCORES: Record<z.infer<typeof scoreConfidenceSchema>, number> = {
  VERY_HIGH: 1,
  HIGH: 0.75,
  MEDIUM: 0.5,
  LOW: 0.25,
  NOT_AVAILABLE: 0,
};

export function attributesToRaw(attributes: readonly WireAttribute[]): RawAttributes {
  const raw: RawAttributes = {};
  for (const { key, value } of attributes) {
    if (value.string_list_value !== undefined) raw[key] = value.string_list_value;
    else if (value.string_value !== undefined) raw[key] = value.string_value;
    else if (value.long_value !== undefined) raw[key] = value.long_value;
    else if (value.date_value !== undefined) raw[key] = new Date(value.date_value);
  }
  return raw;
}

export function rawToMetadata(raw: RawAttributes): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  for (const [key, value] of Object.entries(raw)) {
    metadata[key] = value instanceof Date ? value.toISOString() : value;
  }
  return metadata;
}

function itemScore(item: ResultItem): number {
  if (item.score !== undefined) return item.score;
  return item.score_confidence ? CONFIDENCE_SCORES[item.score_confidence] : 0;
}

// ── Client ─────────────────────────────────────────────────────────────

export interface HttpKeywordIndexOptions {
  baseUrl: string;
  apiKey?: string;
  pageSize?: number;
  /** Deadline for listing pages and ACL lookups; queries use the caller's signal */
  timeoutMs?: number;
  log?: Logger;
}

const MAX_LIST_PAGES = 500;

export class HttpKeywordIndex implements KeywordIndex {
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(private readonly options: HttpKeywordIndexOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 100;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.log = (options.log ?? rootLogger).child({ backend: 'enterprise_search' });
  }

  async query(
    text: string,
    authorization: KeywordAuthorization,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    const request: SearchRequest = { query: text, page_size: limit };
    if (authorization.kind === 'token') {
      request.user_context = { token: authorization.callerToken };
    } else {
      request.attribute_filter = authorization.filter;
    }

    const page = await this.search(request, signal);
    const documents: RetrievedDocument[] = [];
    for (const item of page.items) {
      const content = item.excerpt || item.title;
      if (!content) continue;
      const raw = attributesToRaw(item.attributes);
      documents.push({
        id: item.id,
        content,
        title: item.title,
        sourceURI: item.uri,
        score: itemScore(item),
        metadata: rawToMetadata(raw),
        accessPolicy: normalizeAcl(raw, { documentId: item.id, log: this.log }),
      });
    }
    return documents;
  }

  async listDocuments(): Promise<SourceDocument[]> {
    const documents: SourceDocument[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const request: SearchRequest = { query: '*', page_size: this.pageSize, page_token: pageToken };
      const response = await withTimeout('keyword index listing', this.timeoutMs, (signal) =>
        this.search(request, signal),
      );
      for (const item of response.items) {
        documents.push({
          id: item.id,
          title: item.title,
          uri: item.uri,
          content: item.excerpt || item.title,
          attributes: attributesToRaw(item.attributes),
        });
      }
      pageToken = response.next_page_token;
      if (!pageToken) return documents;
    }

    this.log.warn('Document listing stopped at page limit', { pages: MAX_LIST_PAGES, documents: documents.length });
    return documents;
  }

  async getDocumentAcl(id: string): Promise<RawAttributes | null> {
    return withTimeout('keyword index ACL lookup', this.timeoutMs, async (signal) => {
      const response = await fetch(`${this.baseUrl}/documents/${encodeURIComponent(id)}/acl`, {
        method: 'GET',
        headers: this.headers(),
        signal,
      });
      if (response.status === 404) return null;
      if (!response.ok) {
        throw new Error(`Keyword index error (${response.status}): ${await response.text()}`);
      }

      const { attributes } = aclResponseSchema.parse(await response.json());
      return attributes.length > 0 ? attributesToRaw(attributes) : null;
    });
  }

  private async search(request: SearchRequest, signal?: AbortSignal): Promise<z.infer<typeof searchResponseSchema>> {
    const response = await fetch(`${this.baseUrl}/search`, {
      method: 'POST',
      headers: { ...this.headers(), 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Keyword index error (${response.status}): ${await response.text()}`);
    }
    return searchResponseSchema.parse(await response.json());
  }

  private headers(): Record<string, string> {
    return this.options.apiKey ? { Authorization: `Bearer ${this.options.apiKey}` } : {};
  }
}
