/**
 * Metadata Sanitizer
 *
 * Strips access-control and internal fields from metadata before it
 * crosses the response boundary. Applied to every result and citation,
 * degraded responses included.
 */

import {
  ALTERNATE_FIELD_MAPPINGS,
  LEGACY_FIELD_MAPPINGS,
  PRINCIPAL_LIST_FIELDS,
  STRUCTURED_ACL_FIELDS,
} from '@/services/aclNormalizer.service';
import type { DocumentMetadata, MetadataValue } from '@/types/documents';

const INTERNAL_METADATA_FIELDS = ['internal_id', 'processing_metadata'];

/** Every field the ACL normalizer reads, plus internal bookkeeping */
export const SENSITIVE_METADATA_FIELDS: ReadonlySet<string> = new Set([
  ...STRUCTURED_ACL_FIELDS,
  ...LEGACY_FIELD_MAPPINGS.map((m) => m.field),
  ...ALTERNATE_FIELD_MAPPINGS.map((m) => m.field),
  ...PRINCIPAL_LIST_FIELDS.map((m) => m.field),
  ...INTERNAL_METADATA_FIELDS,
]);

export function sanitizeMetadata(metadata: Readonly<DocumentMetadata>): Record<string, MetadataValue> {
  const sanitized: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (SENSITIVE_METADATA_FIELDS.has(key.toLowerCase())) continue;
    sanitized[key] = Array.isArray(value) ? [...value] : value;
  }
  return sanitized;
}
