/**
 * Pipeline Step Adapters
 *
 * The five stages an external orchestrator schedules. Each takes one typed
 * input and returns one typed output, holds no state and returns the same
 * output for the same input, so any stage can be retried on its own.
 *
 * @module services/pipeline/steps
 */

import type { FixityReport } from '../../models/fixity.js';
import type {
  IntellectualEntity,
  PackageFile,
  Representation,
  SIP,
} from '../../models/sip.js';
import { ValidationError } from '../../utils/errors.js';
import { validateFixities, type VerifyOptions } from '../fixity/validator.js';
import { parseSIP } from '../mets/parser.js';

export { parseSIP };

// ═══════════════════════════════════════════════════════════════════════════════
// STEP REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export type PipelineStepName =
  | 'parse_sip'
  | 'extract_ies'
  | 'extract_representations'
  | 'extract_files'
  | 'extract_fixities';

export interface PipelineStepDescriptor {
  readonly name: PipelineStepName;
  readonly description: string;
  /** Steps whose output this step consumes */
  readonly dependsOn: readonly PipelineStepName[];
}

/**
 * The linear step graph, in execution order
 */
export const PIPELINE_STEPS: readonly PipelineStepDescriptor[] = [
  {
    name: 'parse_sip',
    description: 'Parse METS XML documents into a Submission Information Package',
    dependsOn: [],
  },
  {
    name: 'extract_ies',
    description: 'List the Intellectual Entities of the package',
    dependsOn: ['parse_sip'],
  },
  {
    name: 'extract_representations',
    description: 'List the representations of every Intellectual Entity',
    dependsOn: ['extract_ies'],
  },
  {
    name: 'extract_files',
    description: 'List the files of every representation',
    dependsOn: ['extract_representations'],
  },
  {
    name: 'extract_fixities',
    description: 'Validate declared checksums and verify them against file content',
    dependsOn: ['extract_files'],
  },
];

// ═══════════════════════════════════════════════════════════════════════════════
// STEPS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws ValidationError if two entities share an identifier
 */
export function extractIEs(sip: SIP): IntellectualEntity[] {
  const seen = new Set<string>();
  for (const entity of sip.intellectualEntities) {
    if (seen.has(entity.id)) {
      throw new ValidationError(`Duplicate Intellectual Entity ID "${entity.id}" in SIP ${sip.id}`);
    }
    seen.add(entity.id);
  }
  return [...sip.intellectualEntities];
}

export function extractRepresentations(
  entities: readonly IntellectualEntity[]
): Representation[] {
  return entities.flatMap((entity) => entity.representations);
}

/**
 * @throws ValidationError if a file identifier repeats within one representation
 */
export function extractFiles(representations: readonly Representation[]): PackageFile[] {
  return representations.flatMap((representation) => {
    const seen = new Set<string>();
    for (const file of representation.files) {
      if (seen.has(file.id)) {
        throw new ValidationError(
          `Duplicate file ID "${file.id}" in representation ${representation.id}`
        );
      }
      seen.add(file.id);
    }
    return representation.files;
  });
}

/**
 * Validate and verify the checksums of every file. Never throws for per-file
 * problems: invalid and mismatching assertions are reported in the result.
 */
export function extractFixities(
  files: readonly PackageFile[],
  options: VerifyOptions = {}
): FixityReport {
  return validateFixities(files, options);
}
