/**
 * Shared test helpers and imports for METS parser tests
 *
 * @see src/services/mets
 */

export { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
export { default as fs } from 'fs';
export { default as path } from 'path';

export {
  buildMets,
  createTempDir,
  FIXTURES_DIR,
  removeTempDir,
  stagePackage,
  DEFAULT_AMD_SEC,
  DEFAULT_DMD_SEC,
  DEFAULT_FILE_SEC,
  DEFAULT_STRUCT_MAP,
} from '../../fixtures/builders.js';

export { parseXml, childElements, getAttribute, idRefs } from '../../../src/services/mets/xml.js';
export { indexMetsDocument } from '../../../src/services/mets/document-index.js';
export { extractDublinCore } from '../../../src/services/mets/dublin-core.js';
export { readAdministrativeMetadata } from '../../../src/services/mets/administrative.js';
export { resolveContentPath } from '../../../src/services/mets/representations.js';
export {
  assembleSIP,
  parseMetsContent,
  parseMetsDocument,
  parseSIP,
} from '../../../src/services/mets/parser.js';
export { NS } from '../../../src/services/mets/namespaces.js';
export { validateFixities } from '../../../src/services/fixity/validator.js';
export {
  ParseError,
  StructureError,
  UnresolvedReferenceError,
  ValidationError,
} from '../../../src/utils/errors.js';

/** Source path used for inline documents; never read from disk */
export const VIRTUAL_PATH = '/virtual/package/mets.xml';
