/**
 * Shared test helpers and imports for fixity tests
 *
 * @see src/services/fixity
 */

export { describe, it, expect, beforeAll, afterAll } from 'vitest';
export { default as fs } from 'fs';
export { default as path } from 'path';

export {
  dedupeDeclaredFixities,
  normalizeAlgorithmName,
  validateFixities,
  validateFixitySyntax,
  verifyFileFixity,
} from '../../../src/services/fixity/validator.js';
export { FixityMismatchError, ValidationError } from '../../../src/utils/errors.js';
export { createTempDir, makeFiles, removeTempDir } from '../../fixtures/builders.js';

export const MD5_ABC = '900150983cd24fb0d6963f7d28e17f72';
export const MD5_ABC_OFF_BY_ONE = '900150983cd24fb0d6963f7d28e17f73';
export const SHA256_ABC = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
