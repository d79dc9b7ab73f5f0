/**
 * SHA-256 hash utilities
 *
 * All hashes use the format 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
export const HASH_PREFIX = 'sha256:';

/**
 * Regular expression for validating hash format
 */
export const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');
  return HASH_PREFIX + hash;
}

export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

/**
 * Hex portion of a hash
 * @throws Error if the hash is not in 'sha256:<hex>' format
 */
export function extractHashHex(hash: string): string {
  if (!isValidHashFormat(hash)) {
    throw new Error(`Invalid hash format: ${hash}`);
  }
  return hash.slice(HASH_PREFIX.length);
}
