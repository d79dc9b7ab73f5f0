/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

export { computeHash, isValidHashFormat, extractHashHex, HASH_PREFIX, HASH_PATTERN } from './hash.js';

export { validateInput, ValidationError } from './validation.js';
