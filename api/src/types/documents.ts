/**
 * Domain Types
 *
 * Shared shapes for the query path (documents, policies, predicates)
 * and the ingestion path (source documents, staged objects).
 */

export type SourceKind = 'PRIMARY_STORE' | 'SECONDARY_INDEX';

export type Classification = 'public' | 'internal' | 'confidential' | 'restricted';

export type MetadataValue = string | number | string[];
export type DocumentMetadata = Record<string, MetadataValue>;

/** Typed attribute values as delivered by content connectors */
export type AttributeValue = string | string[] | number | Date;
export type RawAttributes = Record<string, AttributeValue>;

export type Inheritance = 'DIRECT' | 'INHERITED';

export interface PermissionLevel {
  readonly permissions: ReadonlySet<string>;
  readonly inheritance: Inheritance;
}

/**
 * Canonical access policy. Deny entries win over allow entries
 * for the same principal.
 */
export interface AccessPolicy {
  readonly allowedUsers: ReadonlySet<string>;
  readonly allowedGroups: ReadonlySet<string>;
  readonly deniedUsers: ReadonlySet<string>;
  readonly deniedGroups: ReadonlySet<string>;
  readonly permissionLevels: ReadonlyMap<string, PermissionLevel>;
}

export interface ScoredDocument {
  readonly id: string;
  readonly content: string;
  readonly title: string;
  readonly sourceURI: string;
  /** Backend-assigned relevance; not comparable across backends */
  readonly score: number;
  readonly metadata: Readonly<DocumentMetadata>;
  readonly accessPolicy: AccessPolicy;
  readonly sourceKind: SourceKind;
}

export interface CallerContext {
  userId?: string;
  groups: string[];
  /** Opaque token for backends that enforce authorization themselves */
  userToken?: string;
}

export type AccessField = 'access_users' | 'created_by' | 'access_groups' | 'classification';

export interface EqualsCondition {
  equals: {
    key: AccessField;
    value: string;
  };
}

/** Allow-only OR of equality conditions */
export interface AccessPredicate {
  orAll: EqualsCondition[];
}

export interface BackendProvenance {
  returned: number;
  denied: number;
  kept: number;
  error?: string;
}

export interface MergedResultSet {
  documents: ScoredDocument[];
  /** Authorized candidates before truncation */
  total: number;
  provenance: Partial<Record<SourceKind, BackendProvenance>>;
}

/** A document listed by the secondary index for ingestion */
export interface SourceDocument {
  id: string;
  title: string;
  uri: string;
  content: string;
  attributes: RawAttributes;
}

export interface StagedDocument {
  key: string;
  filename: string;
  body: string;
  metadata: Record<string, string>;
}
