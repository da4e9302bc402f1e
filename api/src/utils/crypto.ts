/**
 * Hashing Utilities
 */

import crypto from 'crypto';

export function sha256Hex(input: string): string {
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Constant-time token comparison. Length mismatches still run a
 * dummy comparison so timing does not reveal the expected length.
 */
export function tokensMatch(expected: string, actual: string | undefined): boolean {
  if (!actual) return false;
  const expectedBuf = Buffer.from(expected, 'utf8');
  const actualBuf = Buffer.from(actual, 'utf8');
  if (expectedBuf.length !== actualBuf.length) {
    crypto.timingSafeEqual(expectedBuf, Buffer.alloc(expectedBuf.length));
    return false;
  }
  return crypto.timingSafeEqual(expectedBuf, actualBuf);
}
