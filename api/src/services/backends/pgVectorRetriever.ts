/**
 * PgVectorRetriever
 *
 * Cosine-similarity search over knowledge_documents. The access
 * predicate is rendered into array-overlap conditions on the ACL
 * columns, so unauthorized rows never leave the database.
 */

import type postgres from 'postgres';
import { predicateValues } from '@/services/accessFilter.service';
import { buildAccessPolicy } from '@/services/aclNormalizer.service';
import type { AccessPredicate, DocumentMetadata } from '@/types/documents';
import type { Embedder } from './embeddings';
import type { RetrievedDocument, VectorRetriever } from './types';

interface KnowledgeRow {
  id: string;
  title: string;
  source_uri: string;
  content: string;
  metadata: DocumentMetadata | null;
  access_users: string[] | null;
  access_groups: string[] | null;
  denied_users: string[] | null;
  denied_groups: string[] | null;
  created_by: string | null;
  classification: string;
  similarity: number;
}

export interface PredicateColumnFilters {
  accessUsers: string[];
  createdBy: string[];
  accessGroups: string[];
  classifications: string[];
}

export function predicateToColumnFilters(predicate: AccessPredicate): PredicateColumnFilters {
  return {
    accessUsers: predicateValues(predicate, 'access_users'),
    createdBy: predicateValues(predicate, 'created_by'),
    accessGroups: predicateValues(predicate, 'access_groups'),
    classifications: predicateValues(predicate, 'classification'),
  };
}

export const KNOWLEDGE_SEARCH_SQL = `
  SELECT
    id, title, source_uri, content, metadata,
    access_users, access_groups, denied_users, denied_groups,
    created_by, classification,
    1 - (embedding <=> $1::vector) AS similarity
  FROM knowledge_documents
  WHERE embedding IS NOT NULL
    AND (
      access_users && $2::text[]
      OR created_by = ANY($3::text[])
      OR access_groups && $4::text[]
      OR classification = ANY($5::text[])
    )
  ORDER BY embedding <=> $1::vector
  LIMIT $6
`;

export function rowToDocument(row: KnowledgeRow): RetrievedDocument {
  const metadata: DocumentMetadata = { ...(row.metadata ?? {}), classification: row.classification };
  if (row.created_by) metadata.created_by = row.created_by;

  return {
    id: row.id,
    content: row.content,
    title: row.title,
    sourceURI: row.source_uri,
    score: Number(row.similarity),
    metadata,
    accessPolicy: buildAccessPolicy({
      allowedUsers: row.access_users ?? [],
      allowedGroups: row.access_groups ?? [],
      deniedUsers: row.denied_users ?? [],
      deniedGroups: row.denied_groups ?? [],
    }),
  };
}

export class PgVectorRetriever implements VectorRetriever {
  constructor(
    private readonly sql: postgres.Sql,
    private readonly embed: Embedder,
  ) {}

  async query(
    text: string,
    predicate: AccessPredicate,
    limit: number,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    const embedding = await this.embed(text, signal);
    const filters = predicateToColumnFilters(predicate);

    const pending = this.sql.unsafe<KnowledgeRow[]>(KNOWLEDGE_SEARCH_SQL, [
      JSON.stringify(embedding),
      filters.accessUsers,
      filters.createdBy,
      filters.accessGroups,
      filters.classifications,
      limit,
    ]);
    signal?.addEventListener('abort', () => pending.cancel(), { once: true });

    const rows = await pending;
    return rows.map(rowToDocument);
  }
}
