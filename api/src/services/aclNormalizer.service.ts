/**
 * ACL Normalizer
 *
 * Converts connector-specific access-control attributes into one
 * canonical AccessPolicy.
 *
 * Three encodings are recognized, tried in a fixed priority order
 * (first one with data wins):
 *   1. structured  — list of JSON ACL entries (acl_entries, acl_v2)
 *   2. legacy      — parallel string-list fields (allowed_users, ...)
 *   3. alternate   — canonical/variant fields (access_users as "a|b", allowed_principals, owner)
 *
 * normalizeAcl() never throws: malformed input yields the empty policy
 * and a warning, so the document stays reachable only through the
 * public-classification condition.
 */

import { z } from 'zod';
import { MalformedAclError, describeError } from '@/errors/gateway';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import type {
  AccessPolicy,
  AttributeValue,
  CallerContext,
  Inheritance,
  PermissionLevel,
  RawAttributes,
} from '@/types/documents';

// ── Types ──────────────────────────────────────────────────────────────

export type AclSetName = 'allowedUsers' | 'allowedGroups' | 'deniedUsers' | 'deniedGroups';

export type AclSets = Record<AclSetName, string[]>;

export interface FieldMapping {
  field: string;
  target: AclSetName;
}

export interface StructuredAclEntry {
  principal: string;
  principalType: 'user' | 'group' | 'role';
  permissions: string[];
  access: 'allow' | 'deny';
  inheritance: 'direct' | 'inherited';
}

export interface StructuredAcl {
  kind: 'structured';
  field: string;
  entries: StructuredAclEntry[];
  skipped: number;
}

export interface LegacyAcl {
  kind: 'legacy';
  sets: AclSets;
}

export interface AlternateFieldAcl {
  kind: 'alternate';
  sets: AclSets;
}

export type ParsedAcl = StructuredAcl | LegacyAcl | AlternateFieldAcl;

type AclParser = (raw: RawAttributes, log: Logger) => ParsedAcl | null;

// ── Field Tables ───────────────────────────────────────────────────────

export const STRUCTURED_ACL_FIELDS: readonly string[] = ['acl_entries', 'acl_v2'];

export const LEGACY_FIELD_MAPPINGS: readonly FieldMapping[] = [
  { field: 'allowed_users', target: 'allowedUsers' },
  { field: 'allowed_groups', target: 'allowedGroups' },
  { field: 'denied_users', target: 'deniedUsers' },
  { field: 'denied_groups', target: 'deniedGroups' },
];

/**
 * Alternate single-value or list fields. String values are split on "|",
 * which is how canonical document metadata stores principal lists.
 */
export const ALTERNATE_FIELD_MAPPINGS: readonly FieldMapping[] = [
  { field: 'access_users', target: 'allowedUsers' },
  { field: 'access_groups', target: 'allowedGroups' },
  { field: 'denied_users', target: 'deniedUsers' },
  { field: 'denied_groups', target: 'deniedGroups' },
  { field: 'owner', target: 'allowedUsers' },
];

/** Fields holding "group:<name>" / "user:<name>" principals */
export const PRINCIPAL_LIST_FIELDS: readonly { field: string; access: 'allow' | 'deny' }[] = [
  { field: 'allowed_principals', access: 'allow' },
  { field: 'denied_principals', access: 'deny' },
];

// ── Value Helpers ──────────────────────────────────────────────────────

function emptySets(): AclSets {
  return { allowedUsers: [], allowedGroups: [], deniedUsers: [], deniedGroups: [] };
}

/** A new policy with no principals; each call gets its own sets */
export function emptyAccessPolicy(): AccessPolicy {
  return buildAccessPolicy(emptySets());
}

function hasAnySet(sets: AclSets): boolean {
  return Object.values(sets).some((values) => values.length > 0);
}

/**
 * Read a principal list out of an attribute value.
 * Numbers and dates are not principals and yield nothing.
 */
function toPrincipalList(value: AttributeValue | undefined, splitDelimited: boolean): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => (splitDelimited ? item.split('|') : [item]));
  }
  if (typeof value === 'string') {
    return splitDelimited ? value.split('|') : [value];
  }
  return [];
}

function cleanPrincipals(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

// ── Structured Encoding ────────────────────────────────────────────────

const lowerCased = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value);

const principalTypeSchema = z.preprocess(lowerCased, z.enum(['user', 'group', 'role']));

const aclEntrySchema = z.object({
  principal: z.string().trim().min(1),
  principal_type: principalTypeSchema.optional(),
  type: principalTypeSchema.optional(),
  permissions: z.array(z.string()).default([]),
  access: z.preprocess(lowerCased, z.enum(['allow', 'deny'])).default('allow'),
  inheritance: z.preprocess(lowerCased, z.enum(['direct', 'inherited'])).default('inherited'),
});

/** A structured field holds either one JSON string per entry or a single JSON array */
function explodeStructuredValue(value: AttributeValue): unknown[] {
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [parsed];
  }
  throw new MalformedAclError(`expected a list of ACL entries, got ${value instanceof Date ? 'date' : typeof value}`);
}

function parseEntry(item: unknown): StructuredAclEntry {
  const candidate: unknown = typeof item === 'string' ? JSON.parse(item) : item;
  const entry = aclEntrySchema.parse(candidate);
  return {
    principal: entry.principal,
    principalType: entry.principal_type ?? entry.type ?? 'user',
    permissions: entry.permissions,
    access: entry.access,
    inheritance: entry.inheritance,
  };
}

export function parseStructuredAcl(raw: RawAttributes, log: Logger = rootLogger): StructuredAcl | null {
  for (const field of STRUCTURED_ACL_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;

    let items: unknown[];
    try {
      items = explodeStructuredValue(value);
    } catch (error) {
      log.warn('Structured ACL field is malformed', { field, reason: describeError(error) });
      continue;
    }

    const entries: StructuredAclEntry[] = [];
    let skipped = 0;
    items.forEach((item, index) => {
      try {
        entries.push(parseEntry(item));
      } catch (error) {
        skipped += 1;
        log.warn('Skipping malformed ACL entry', { field, index, reason: describeError(error) });
      }
    });

    if (entries.length > 0) {
      return { kind: 'structured', field, entries, skipped };
    }
  }
  return null;
}

// ── Legacy / Alternate Encodings ───────────────────────────────────────

export function parseLegacyAcl(raw: RawAttributes): LegacyAcl | null {
  // denied_* lists are shared with the alternate encoding; only an allowed_* list marks this one.
  if (!Array.isArray(raw.allowed_users) && !Array.isArray(raw.allowed_groups)) return null;

  const sets = emptySets();
  for (const { field, target } of LEGACY_FIELD_MAPPINGS) {
    const value = raw[field];
    // Legacy fields are always lists; a scalar here belongs to another encoding.
    if (!Array.isArray(value)) continue;
    sets[target].push(...toPrincipalList(value, false));
  }
  return hasAnySet(sets) ? { kind: 'legacy', sets } : null;
}

function splitPrincipal(entry: string): { isGroup: boolean; name: string } {
  const match = /^(group|user|role):(.*)$/i.exec(entry.trim());
  if (!match) return { isGroup: false, name: entry };
  return { isGroup: match[1].toLowerCase() === 'group', name: match[2] };
}

export function parseAlternateFieldAcl(raw: RawAttributes): AlternateFieldAcl | null {
  const sets = emptySets();

  for (const { field, target } of ALTERNATE_FIELD_MAPPINGS) {
    sets[target].push(...toPrincipalList(raw[field], true));
  }

  for (const { field, access } of PRINCIPAL_LIST_FIELDS) {
    for (const entry of toPrincipalList(raw[field], true)) {
      const { isGroup, name } = splitPrincipal(entry);
      if (access === 'allow') {
        (isGroup ? sets.allowedGroups : sets.allowedUsers).push(name);
      } else {
        (isGroup ? sets.deniedGroups : sets.deniedUsers).push(name);
      }
    }
  }

  return hasAnySet(sets) ? { kind: 'alternate', sets } : null;
}

const ACL_PARSERS: readonly AclParser[] = [
  parseStructuredAcl,
  (raw) => parseLegacyAcl(raw),
  (raw) => parseAlternateFieldAcl(raw),
];

/**
 * Run the parsers in priority order and keep the first that yields data.
 */
export function detectAclEncoding(raw: RawAttributes, log: Logger = rootLogger): ParsedAcl | null {
  for (const parser of ACL_PARSERS) {
    const parsed = parser(raw, log);
    if (parsed) return parsed;
  }
  return null;
}

// ── Policy Construction ────────────────────────────────────────────────

function structuredToSets(acl: StructuredAcl): {
  sets: AclSets;
  levels: Map<string, { permissions: Set<string>; inheritance: Inheritance }>;
} {
  const sets = emptySets();
  const levels = new Map<string, { permissions: Set<string>; inheritance: Inheritance }>();

  for (const entry of acl.entries) {
    const isGroup = entry.principalType === 'group';
    if (entry.access === 'allow') {
      (isGroup ? sets.allowedGroups : sets.allowedUsers).push(entry.principal);
    } else {
      (isGroup ? sets.deniedGroups : sets.deniedUsers).push(entry.principal);
    }

    const inheritance: Inheritance = entry.inheritance === 'direct' ? 'DIRECT' : 'INHERITED';
    const existing = levels.get(entry.principal);
    if (existing) {
      entry.permissions.forEach((p) => existing.permissions.add(p));
      if (inheritance === 'DIRECT') existing.inheritance = 'DIRECT';
    } else {
      levels.set(entry.principal, { permissions: new Set(entry.permissions), inheritance });
    }
  }

  return { sets, levels };
}

/**
 * Freeze parsed sets into an AccessPolicy. A principal that is both
 * allowed and denied is kept only in the deny set.
 */
export function buildAccessPolicy(
  sets: AclSets,
  levels: ReadonlyMap<string, PermissionLevel> = new Map(),
): AccessPolicy {
  const deniedUsers = new Set(cleanPrincipals(sets.deniedUsers));
  const deniedGroups = new Set(cleanPrincipals(sets.deniedGroups));
  const allowedUsers = new Set(cleanPrincipals(sets.allowedUsers).filter((u) => !deniedUsers.has(u)));
  const allowedGroups = new Set(cleanPrincipals(sets.allowedGroups).filter((g) => !deniedGroups.has(g)));

  const permissionLevels = new Map<string, PermissionLevel>();
  for (const [principal, level] of levels) {
    permissionLevels.set(
      principal,
      Object.freeze({ permissions: new Set(level.permissions), inheritance: level.inheritance }),
    );
  }

  return Object.freeze({ allowedUsers, allowedGroups, deniedUsers, deniedGroups, permissionLevels });
}

export function toAccessPolicy(parsed: ParsedAcl): AccessPolicy {
  if (parsed.kind === 'structured') {
    const { sets, levels } = structuredToSets(parsed);
    return buildAccessPolicy(sets, levels);
  }
  return buildAccessPolicy(parsed.sets);
}

/**
 * Normalize raw access-control attributes into an AccessPolicy.
 * Deterministic; never throws.
 */
export function normalizeAcl(
  raw: RawAttributes,
  context: { documentId?: string; log?: Logger } = {},
): AccessPolicy {
  const log = context.log ?? rootLogger;
  try {
    const parsed = detectAclEncoding(raw, log.child({ documentId: context.documentId }));
    if (!parsed) {
      log.debug('No access-control attributes found', { documentId: context.documentId });
      return emptyAccessPolicy();
    }
    return toAccessPolicy(parsed);
  } catch (error) {
    const malformed = new MalformedAclError(
      `Unparseable access-control attributes: ${describeError(error)}`,
      { cause: error },
    );
    log.warn(malformed.message, { code: malformed.code, documentId: context.documentId });
    return emptyAccessPolicy();
  }
}

// ── Policy Queries ─────────────────────────────────────────────────────

export function isPolicyEmpty(policy: AccessPolicy): boolean {
  return (
    policy.allowedUsers.size === 0 &&
    policy.allowedGroups.size === 0 &&
    policy.deniedUsers.size === 0 &&
    policy.deniedGroups.size === 0 &&
    policy.permissionLevels.size === 0
  );
}

/** True when the caller's id or any of their groups is in a deny set */
export function isCallerDenied(policy: AccessPolicy, caller: CallerContext): boolean {
  const userId = caller.userId?.trim();
  if (userId && policy.deniedUsers.has(userId)) return true;
  return caller.groups.some((group) => policy.deniedGroups.has(group.trim()));
}

/** Flatten a policy into the "|"-joined canonical metadata fields */
export function policyToMetadata(policy: AccessPolicy): Record<
  'access_users' | 'access_groups' | 'denied_users' | 'denied_groups',
  string
> {
  return {
    access_users: [...policy.allowedUsers].join('|'),
    access_groups: [...policy.allowedGroups].join('|'),
    denied_users: [...policy.deniedUsers].join('|'),
    denied_groups: [...policy.deniedGroups].join('|'),
  };
}
