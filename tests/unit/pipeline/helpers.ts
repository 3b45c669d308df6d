/**
 * Shared test helpers and imports for pipeline tests
 *
 * @see src/services/pipeline
 */

export { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
export { default as fs } from 'fs';
export { default as path } from 'path';

export {
  buildMets,
  createTempDir,
  makeFiles,
  makeRepresentation,
  removeTempDir,
  stagePackage,
} from '../../fixtures/builders.js';

export {
  extractFiles,
  extractFixities,
  extractIEs,
  extractRepresentations,
  PIPELINE_STEPS,
} from '../../../src/services/pipeline/steps.js';
export {
  summarizeFiles,
  summarizeFixities,
  summarizeIntellectualEntities,
  summarizeRepresentations,
  summarizeSIP,
} from '../../../src/services/pipeline/summaries.js';
export {
  fingerprintSIP,
  serializeFixityReport,
  serializeSIP,
} from '../../../src/services/pipeline/serialize.js';
export {
  formatStepFailure,
  getRecoveryHint,
  PipelineStepError,
} from '../../../src/services/pipeline/errors.js';
export { runPipeline } from '../../../src/services/pipeline/runner.js';
export { FileWatchSensor, scanWatchDirectory, type RunRequest } from '../../../src/services/pipeline/sensor.js';
export { validateFixities } from '../../../src/services/fixity/validator.js';
export { isValidHashFormat } from '../../../src/utils/hash.js';
export { resetConfig, updateConfig } from '../../../src/utils/config.js';
export {
  FixityMismatchError,
  StructureError,
  ValidationError,
} from '../../../src/utils/errors.js';

import { createDublinCore, type DublinCoreField } from '../../../src/models/dublin-core.js';
import type { IntellectualEntity, Representation, SIP } from '../../../src/models/sip.js';

export const MD5_ABC = '900150983cd24fb0d6963f7d28e17f72';

/**
 * In-memory entity with the given Dublin Core values
 */
export function makeEntity(
  id: string,
  representations: readonly Representation[] = [],
  dublinCore: Partial<Record<DublinCoreField, readonly string[]>> = {}
): IntellectualEntity {
  return {
    id,
    label: null,
    entityType: null,
    dublinCore: createDublinCore(dublinCore),
    representations,
  };
}

export function makeSIP(entities: readonly IntellectualEntity[], id = 'SIP-TEST'): SIP {
  return {
    id,
    createdAt: null,
    submittingAgent: null,
    intellectualEntities: entities,
    sourcePaths: ['/virtual/package/mets.xml'],
  };
}
