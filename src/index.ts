/**
 * SIP Ingest Pipeline
 *
 * Library entry point: METS parsing into the OAIS object graph, fixity
 * validation and the pipeline step adapters an orchestrator schedules.
 *
 * @module index
 */

export * from './models/index.js';
export {
  FixityMismatchError,
  ParseError,
  SipError,
  StructureError,
  UnresolvedReferenceError,
  ValidationError,
  type SipErrorKind,
} from './utils/errors.js';
export {
  applyEnvConfig,
  DEFAULT_POLL_INTERVAL_MS,
  getConfig,
  readEnvConfig,
  resetConfig,
  updateConfig,
} from './utils/config.js';
export type { PipelineConfig } from './utils/validation.js';
export { computeDigest, computeHash } from './utils/hash.js';
export {
  validateFixities,
  validateFixitySyntax,
  verifyFileFixity,
  type VerifyOptions,
} from './services/fixity/index.js';
export {
  assembleSIP,
  parseMetsContent,
  parseMetsDocument,
  type ParsedMetsDocument,
} from './services/mets/index.js';
export * from './services/pipeline/index.js';
