/**
 * Access Filter Compiler
 *
 * Turns a caller's identity into an allow-only predicate: an OR of
 * equality conditions that a backend can push down or that can be
 * evaluated post hoc against canonical metadata.
 *
 * There is no deny clause here; deny lists are enforced by the result
 * merger against each document's AccessPolicy.
 */

import { ValidationError } from '@/errors/gateway';
import type {
  AccessField,
  AccessPredicate,
  CallerContext,
  DocumentMetadata,
  EqualsCondition,
} from '@/types/documents';

export const PUBLIC_CLASSIFICATION = 'public';

function condition(key: AccessField, value: string): EqualsCondition {
  return { equals: { key, value } };
}

function distinctGroups(groups: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const group of groups) {
    const trimmed = group.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

/**
 * Trim the caller's id and groups and drop blank or repeated groups, so
 * the allow predicate and the deny check see the same identity.
 */
export function normalizeCaller(caller: CallerContext): CallerContext {
  const userId = caller.userId?.trim();
  return {
    ...caller,
    userId: userId ? userId : undefined,
    groups: distinctGroups(caller.groups),
  };
}

/**
 * Build the caller's access predicate.
 *
 * Order: direct user access, creator, one condition per group, public
 * classification. Order only affects readability; all conditions are OR'd.
 *
 * @throws ValidationError when the caller has neither a user id nor groups
 */
export function compileAccessPredicate(caller: CallerContext): AccessPredicate {
  const { userId, groups } = normalizeCaller(caller);

  if (!userId && groups.length === 0) {
    throw new ValidationError('Either user_id or user_groups must be provided');
  }

  const orAll: EqualsCondition[] = [];
  if (userId) {
    orAll.push(condition('access_users', userId));
    orAll.push(condition('created_by', userId));
  }
  for (const group of groups) {
    orAll.push(condition('access_groups', group));
  }
  orAll.push(condition('classification', PUBLIC_CLASSIFICATION));

  return { orAll };
}

/** Values of one predicate field, in condition order */
export function predicateValues(predicate: AccessPredicate, key: AccessField): string[] {
  return predicate.orAll.filter((c) => c.equals.key === key).map((c) => c.equals.value);
}

function metadataValues(metadata: Readonly<DocumentMetadata>, key: AccessField): string[] {
  const value = metadata[key];
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  if (typeof value === 'number') return [String(value)];
  return value.split('|');
}

/**
 * Evaluate a predicate against canonical document metadata.
 * List fields may be arrays or "|"-joined strings.
 */
export function matchesAccessPredicate(
  predicate: AccessPredicate,
  metadata: Readonly<DocumentMetadata>,
): boolean {
  return predicate.orAll.some(({ equals }) =>
    metadataValues(metadata, equals.key).some((value) => value.trim() === equals.value),
  );
}
