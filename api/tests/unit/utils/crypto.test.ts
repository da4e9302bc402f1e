import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { sha256Hex, tokensMatch } from '@/utils/crypto';

describe('sha256Hex', () => {
  it('matches the node digest', () => {
    const expected = crypto.createHash('sha256').update('finance,legal').digest('hex');
    expect(sha256Hex('finance,legal')).toBe(expected);
  });
});

describe('tokensMatch', () => {
  it('accepts the exact token', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
  });

  it('rejects a different token of the same length', () => {
    expect(tokensMatch('test-secret', 'test-secreT')).toBe(false);
  });

  it('rejects a token of a different length', () => {
    expect(tokensMatch('test-secret', 'test')).toBe(false);
  });

  it('rejects a missing token', () => {
    expect(tokensMatch('test-secret', undefined)).toBe(false);
    expect(tokensMatch('test-secret', '')).toBe(false);
  });
});
