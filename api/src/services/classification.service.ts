/**
 * Classification Heuristic
 *
 * Infers a sensitivity label and owning department for documents that
 * carry no explicit tag. Rules form an ordered table evaluated top to
 * bottom; the first rule that returns a result wins.
 *
 * This is a heuristic with known false positives (keyword substrings,
 * ACL shape guesses). It is never a security boundary: enforcement is
 * the AccessPolicy allow/deny sets.
 */

import type { AccessPolicy, Classification } from '@/types/documents';

export interface ClassificationResult {
  classification: Classification;
  department: string;
  createdBy?: string;
}

export interface ClassificationInput {
  policy: AccessPolicy;
  /** Path-like hint, e.g. "finance/confidential/jdoe/q1.pdf" */
  pathHint?: string;
  /** File name or title */
  filenameHint?: string;
}

type ClassificationRule = {
  name: string;
  apply: (input: ClassificationInput) => ClassificationResult | null;
};

// ── Keyword Tables ─────────────────────────────────────────────────────

export const DEFAULT_DEPARTMENT = 'general';

/** Order matters: the first department whose keyword matches wins */
export const DEPARTMENT_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['finance', ['finance', 'accounting', 'treasury', 'budget']],
  ['hr', ['hr', 'human resources', 'people', 'talent']],
  ['legal', ['legal', 'compliance', 'risk', 'audit']],
  ['engineering', ['engineering', 'development', 'tech', 'it']],
  ['sales', ['sales', 'business development', 'revenue']],
  ['marketing', ['marketing', 'communications', 'brand']],
  ['operations', ['operations', 'ops', 'facilities']],
];

const CLASSIFICATION_KEYWORDS: ReadonlyArray<readonly [Classification, readonly string[]]> = [
  ['restricted', ['restricted', 'secret']],
  ['confidential', ['confidential']],
  ['public', ['public', 'press release']],
];

export const PUBLIC_GROUPS: readonly string[] = [
  'everyone',
  'all users',
  'company users',
  'all employees',
  'everyone except external users',
];

const FULL_CONTROL_PERMISSIONS = new Set(['full control', 'fullcontrol', 'full_control', 'owner', 'manage']);

const CLASSIFICATIONS: readonly Classification[] = ['public', 'internal', 'confidential', 'restricted'];

function isClassification(value: string): value is Classification {
  return (CLASSIFICATIONS as readonly string[]).includes(value);
}

// ── Department Inference ───────────────────────────────────────────────

function matchDepartment(text: string): string | null {
  const lower = text.toLowerCase();
  for (const [department, keywords] of DEPARTMENT_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return department;
    }
  }
  return null;
}

/**
 * Department from group names: case-insensitive substring match,
 * first matching group wins.
 */
export function departmentFromGroups(groups: Iterable<string>): string {
  for (const group of groups) {
    const department = matchDepartment(group);
    if (department) return department;
  }
  return DEFAULT_DEPARTMENT;
}

// ── ACL Shape ──────────────────────────────────────────────────────────

export interface AclShape {
  fullControlPrincipals: number;
  allowedUsers: number;
  allowedGroups: number;
  hasPublicGroup: boolean;
}

export function describeAclShape(policy: AccessPolicy): AclShape {
  let fullControlPrincipals = 0;
  for (const level of policy.permissionLevels.values()) {
    const holdsFullControl = [...level.permissions].some((p) =>
      FULL_CONTROL_PERMISSIONS.has(p.trim().toLowerCase()),
    );
    if (holdsFullControl) fullControlPrincipals += 1;
  }

  const hasPublicGroup = [...policy.allowedGroups].some((g) => PUBLIC_GROUPS.includes(g.trim().toLowerCase()));

  return {
    fullControlPrincipals,
    allowedUsers: policy.allowedUsers.size,
    allowedGroups: policy.allowedGroups.size,
    hasPublicGroup,
  };
}

function hasAclSignal(policy: AccessPolicy): boolean {
  return policy.allowedUsers.size > 0 || policy.allowedGroups.size > 0 || policy.permissionLevels.size > 0;
}

export function classificationFromAclShape(shape: AclShape): Classification {
  const { fullControlPrincipals: fc, allowedUsers, allowedGroups, hasPublicGroup } = shape;
  if (fc >= 1 && fc <= 2 && allowedUsers <= 3) return 'restricted';
  if (fc <= 5 && !hasPublicGroup) return 'confidential';
  if (hasPublicGroup) return 'internal';
  if (allowedGroups <= 3) return 'confidential';
  return 'internal';
}

// ── Rules ──────────────────────────────────────────────────────────────

function pathSegments(pathHint: string | undefined): string[] {
  if (!pathHint) return [];
  return pathHint.split(/[\\/]+/).map((s) => s.trim()).filter(Boolean);
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'path',
    apply: ({ pathHint }) => {
      const segments = pathSegments(pathHint);
      if (segments.length < 3) return null;
      const [department, classification, createdBy] = segments;
      const normalized = classification.toLowerCase();
      if (!isClassification(normalized)) return null;
      return { classification: normalized, department: department.toLowerCase(), createdBy };
    },
  },
  {
    name: 'acl-shape',
    apply: ({ policy }) => {
      if (!hasAclSignal(policy)) return null;
      return {
        classification: classificationFromAclShape(describeAclShape(policy)),
        department: departmentFromGroups(policy.allowedGroups),
      };
    },
  },
  {
    name: 'filename',
    apply: ({ filenameHint }) => {
      if (!filenameHint) return null;
      const lower = filenameHint.toLowerCase();
      const department = matchDepartment(lower);
      const keyword = CLASSIFICATION_KEYWORDS.find(([, words]) => words.some((w) => lower.includes(w)));
      if (!department && !keyword) return null;
      return {
        classification: keyword ? keyword[0] : 'internal',
        department: department ?? DEFAULT_DEPARTMENT,
      };
    },
  },
];

export function classifyDocument(input: ClassificationInput): ClassificationResult {
  for (const rule of CLASSIFICATION_RULES) {
    const result = rule.apply(input);
    if (result) return result;
  }
  return { classification: 'internal', department: DEFAULT_DEPARTMENT };
}
