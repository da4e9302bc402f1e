/**
 * Backend Collaborators
 *
 * Contracts for the retrieval backends and the ingestion-side services
 * they expose. Adapters wrap these; concrete implementations live beside
 * this file.
 */

import type {
  AccessPolicy,
  AccessPredicate,
  CallerContext,
  DocumentMetadata,
  RawAttributes,
  SourceDocument,
  SourceKind,
} from '@/types/documents';

export type BackendName = 'knowledge_base' | 'enterprise_search';

export const BACKEND_BY_SOURCE_KIND: Record<SourceKind, BackendName> = {
  PRIMARY_STORE: 'knowledge_base',
  SECONDARY_INDEX: 'enterprise_search',
};

/** Deadline for backend calls made outside a query, such as sync listings */
export const DEFAULT_BACKEND_TIMEOUT_MS = 10_000;

/** A backend hit before the merger tags it with its source kind */
export interface RetrievedDocument {
  id: string;
  content: string;
  title: string;
  sourceURI: string;
  score: number;
  metadata: DocumentMetadata;
  accessPolicy: AccessPolicy;
}

export interface BackendAdapter {
  readonly name: BackendName;
  readonly sourceKind: SourceKind;
  query(
    text: string,
    predicate: AccessPredicate,
    limit: number,
    caller: CallerContext,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]>;
}

/** Result of one adapter call inside the fan-out */
export interface BackendOutcome {
  backend: BackendName;
  sourceKind: SourceKind;
  documents: RetrievedDocument[];
  error?: string;
}

// ── Primary store ──────────────────────────────────────────────────────

/** Semantic search that applies the access predicate inside the query */
export interface VectorRetriever {
  query(text: string, predicate: AccessPredicate, limit: number, signal?: AbortSignal): Promise<RetrievedDocument[]>;
}

// ── Secondary index ────────────────────────────────────────────────────

/**
 * How a keyword query is authorized: the caller's own token (the index
 * enforces its ACLs) or an attribute filter built from the predicate.
 */
export type KeywordAuthorization =
  | { kind: 'token'; callerToken: string }
  | { kind: 'attributes'; filter: AccessPredicate };

export interface KeywordIndex {
  query(
    text: string,
    authorization: KeywordAuthorization,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]>;
  listDocuments(): Promise<SourceDocument[]>;
  /** Raw access-control attributes, or null when the index has none for the document */
  getDocumentAcl(id: string): Promise<RawAttributes | null>;
}

export interface IndexingTrigger {
  startIngestionJob(description: string): Promise<{ jobId: string }>;
}

// ── Object storage ─────────────────────────────────────────────────────

export interface StoredObject {
  body: Uint8Array;
  contentType: string;
  metadata: Record<string, string>;
}

export interface ObjectStore {
  get(key: string): Promise<StoredObject | null>;
  put(
    key: string,
    body: Uint8Array,
    options?: { contentType?: string; metadata?: Record<string, string> },
  ): Promise<void>;
  delete(key: string): Promise<void>;
}
