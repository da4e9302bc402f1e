import { describe, it, expect } from 'vitest';
import {
  CLASSIFICATION_RULES,
  classificationFromAclShape,
  classifyDocument,
  departmentFromGroups,
  describeAclShape,
} from '@/services/classification.service';
import { emptyAccessPolicy, normalizeAcl } from '@/services/aclNormalizer.service';

const entry = (value: Record<string, unknown>) => JSON.stringify(value);

describe('classifyDocument', () => {
  it('evaluates rules in a fixed order', () => {
    expect(CLASSIFICATION_RULES.map((rule) => rule.name)).toEqual(['path', 'acl-shape', 'filename']);
  });

  describe('path rule', () => {
    it('reads department, classification and creator from the path', () => {
      const result = classifyDocument({
        policy: normalizeAcl({ access_groups: 'Everyone' }),
        pathHint: 'Finance/Confidential/jdoe/q1-forecast.pdf',
      });

      expect(result).toEqual({ classification: 'confidential', department: 'finance', createdBy: 'jdoe' });
    });

    it('is skipped when the second segment is not a classification', () => {
      const result = classifyDocument({
        policy: emptyAccessPolicy(),
        pathHint: 'finance/reports/q1.pdf',
      });

      expect(result).toEqual({ classification: 'internal', department: 'general' });
    });
  });

  describe('acl-shape rule', () => {
    it('marks few full-control principals with few users as restricted', () => {
      const policy = normalizeAcl({
        acl_entries: [
          entry({ principal: 'alice@x.com', permissions: ['Full Control'] }),
          entry({ principal: 'bob@x.com', permissions: ['Read'] }),
        ],
      });

      expect(classifyDocument({ policy })).toEqual({ classification: 'restricted', department: 'general' });
    });

    it('marks non-public group access as confidential', () => {
      const policy = normalizeAcl({ access_groups: 'Finance Team' });

      expect(classifyDocument({ policy })).toEqual({ classification: 'confidential', department: 'finance' });
    });

    it('marks public-group access as internal', () => {
      const policy = normalizeAcl({ access_groups: 'Everyone|Legal' });

      expect(classifyDocument({ policy })).toEqual({ classification: 'internal', department: 'legal' });
    });
  });

  describe('filename rule', () => {
    it('uses keywords when there is no path or ACL signal', () => {
      const result = classifyDocument({
        policy: emptyAccessPolicy(),
        filenameHint: 'Press Release - Marketing Launch.docx',
      });

      expect(result).toEqual({ classification: 'public', department: 'marketing' });
    });

    it('prefers the most sensitive keyword', () => {
      const result = classifyDocument({
        policy: emptyAccessPolicy(),
        filenameHint: 'Confidential Restricted Budget.xlsx',
      });

      expect(result).toEqual({ classification: 'restricted', department: 'finance' });
    });
  });

  it('falls back to internal/general', () => {
    expect(classifyDocument({ policy: emptyAccessPolicy() })).toEqual({
      classification: 'internal',
      department: 'general',
    });
  });
});

describe('classificationFromAclShape', () => {
  it('keeps the documented thresholds', () => {
    const base = { fullControlPrincipals: 0, allowedUsers: 0, allowedGroups: 0, hasPublicGroup: false };

    expect(classificationFromAclShape({ ...base, fullControlPrincipals: 2, allowedUsers: 3 })).toBe('restricted');
    expect(classificationFromAclShape({ ...base, fullControlPrincipals: 2, allowedUsers: 4 })).toBe('confidential');
    expect(classificationFromAclShape({ ...base, fullControlPrincipals: 3, hasPublicGroup: true })).toBe('internal');
    expect(classificationFromAclShape({ ...base, fullControlPrincipals: 6, allowedGroups: 3 })).toBe('confidential');
    expect(classificationFromAclShape({ ...base, fullControlPrincipals: 6, allowedGroups: 4 })).toBe('internal');
  });
});

describe('describeAclShape', () => {
  it('counts full-control principals case-insensitively', () => {
    const policy = normalizeAcl({
      acl_entries: [
        entry({ principal: 'owners', type: 'group', permissions: ['FULL CONTROL'] }),
        entry({ principal: 'admin@x.com', permissions: ['manage'] }),
        entry({ principal: 'All Employees', type: 'group', permissions: ['Read'] }),
      ],
    });

    expect(describeAclShape(policy)).toEqual({
      fullControlPrincipals: 2,
      allowedUsers: 1,
      allowedGroups: 2,
      hasPublicGroup: true,
    });
  });
});

describe('departmentFromGroups', () => {
  it('returns the first matching department', () => {
    expect(departmentFromGroups(['Everyone', 'Accounting Staff', 'Legal'])).toBe('finance');
  });

  it('defaults to general', () => {
    expect(departmentFromGroups(['Everyone'])).toBe('general');
  });
});
