/**
 * Shared test helpers and imports for hash tests
 *
 * @see src/utils/hash.ts
 */

export { describe, it, expect, beforeAll, afterAll } from 'vitest';
export { default as fs } from 'fs';
export { default as path } from 'path';

export {
  computeHash,
  computeDigest,
  computeFileDigestsSync,
  isValidDigestFormat,
  isValidHashFormat,
} from '../../../src/utils/hash.js';
export { createTempDir, removeTempDir } from '../../fixtures/builders.js';

/** Published test vectors for the message "abc" */
export const ABC_DIGESTS = {
  MD5: '900150983cd24fb0d6963f7d28e17f72',
  'SHA-1': 'a9993e364706816aba3e25717850c26c9cd0d89d',
  'SHA-256': 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
  'SHA-512':
    'ddaf35a193617abacc417349ae20413112e6fa4e89a97ea20a9eeee64b55d39a' +
    '2192992a274fc1a836ba3c23a3feebbd454d4423643ce80e2a9ac94fa54ca49f',
} as const;
