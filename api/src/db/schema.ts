/**
 * Database Schema Definitions
 * Drizzle ORM schema for PostgreSQL with the pgvector extension.
 *
 * - knowledge_documents: the primary store, one row per chunk with its
 *   embedding and flattened ACL columns used by the access predicate
 * - staged_objects: object storage for ingestion output and PDF uploads
 */

import {
  pgTable,
  text,
  varchar,
  jsonb,
  timestamp,
  vector,
  customType,
  index,
} from 'drizzle-orm/pg-core';
import type { DocumentMetadata } from '@/types/documents';

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return 'bytea';
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

/**
 * Primary knowledge store. ACL columns hold the canonical principal
 * lists; classification and created_by back the public/creator conditions.
 */
export const knowledgeDocuments = pgTable(
  'knowledge_documents',
  {
    id: text('id').primaryKey(),
    title: text('title').notNull().default(''),
    sourceUri: text('source_uri').notNull().default(''),
    content: text('content').notNull(),
    metadata: jsonb('metadata').$type<DocumentMetadata>().notNull().default({}),
    accessUsers: text('access_users').array().notNull().default([]),
    accessGroups: text('access_groups').array().notNull().default([]),
    deniedUsers: text('denied_users').array().notNull().default([]),
    deniedGroups: text('denied_groups').array().notNull().default([]),
    createdBy: text('created_by'),
    classification: varchar('classification', { length: 20 }).notNull().default('internal'),
    embedding: vector('embedding', { dimensions: 1536 }),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    accessUsersIdx: index('idx_knowledge_access_users').using('gin', table.accessUsers),
    accessGroupsIdx: index('idx_knowledge_access_groups').using('gin', table.accessGroups),
    embeddingIdx: index('idx_knowledge_embedding').using('hnsw', table.embedding.op('vector_cosine_ops')),
  })
);

/**
 * Object storage keyed by path-like keys ("uploads/report.pdf",
 * "secondary-content/Q1_Report_abcd1234.txt").
 */
export const stagedObjects = pgTable('staged_objects', {
  key: text('key').primaryKey(),
  body: bytea('body').notNull(),
  contentType: varchar('content_type', { length: 200 }).notNull().default('application/octet-stream'),
  metadata: jsonb('metadata').$type<Record<string, string>>().notNull().default({}),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});
