/**
 * Pipeline run composition
 *
 * Runs the five steps in registry order over one set of METS documents.
 * Wiring is explicit: each step receives the previous step's output. A step
 * failure aborts the run with a PipelineStepError; fixity mismatches do not,
 * they are part of the run result.
 *
 * @module services/pipeline/runner
 */

import { v4 as uuidv4 } from 'uuid';
import type { FixityReport } from '../../models/fixity.js';
import type {
  IntellectualEntity,
  PackageFile,
  Representation,
  SIP,
} from '../../models/sip.js';
import { getConfig } from '../../utils/config.js';
import { RunPipelineInput, validateInput, type RunPipelineParams } from '../../utils/validation.js';
import { PipelineStepError } from './errors.js';
import { fingerprintSIP } from './serialize.js';
import {
  extractFiles,
  extractFixities,
  extractIEs,
  extractRepresentations,
  parseSIP,
  type PipelineStepName,
} from './steps.js';
import {
  summarizeFiles,
  summarizeFixities,
  summarizeIntellectualEntities,
  summarizeRepresentations,
  summarizeSIP,
  type FileSummary,
  type FixitySummary,
  type IntellectualEntitySummary,
  type RepresentationSummary,
  type SipSummary,
} from './summaries.js';

export interface RunPipelineOptions {
  /** Recompute digests from file content; defaults to the configured verifyContent */
  verifyContent?: boolean;
}

export interface StepTiming {
  step: PipelineStepName;
  durationMs: number;
}

export interface PipelineRunSummary {
  run_id: string;
  sip_fingerprint: string;
  sip: SipSummary;
  intellectual_entities: IntellectualEntitySummary;
  representations: RepresentationSummary;
  files: FileSummary;
  fixities: FixitySummary;
  timings: StepTiming[];
}

export interface PipelineRunResult {
  runId: string;
  sip: SIP;
  intellectualEntities: IntellectualEntity[];
  representations: Representation[];
  files: PackageFile[];
  fixityReport: FixityReport;
  fingerprint: string;
  timings: StepTiming[];
  summary: PipelineRunSummary;
}

async function runStep<T>(
  runId: string,
  step: PipelineStepName,
  timings: StepTiming[],
  fn: () => T | Promise<T>
): Promise<T> {
  const startTime = performance.now();
  try {
    const output = await fn();
    const durationMs = Math.round(performance.now() - startTime);
    timings.push({ step, durationMs });
    console.error(`[Pipeline] ${runId} ${step} completed in ${durationMs}ms`);
    return output;
  } catch (error) {
    const stepError = PipelineStepError.fromUnknown(step, error);
    console.error(`[Pipeline] ${runId} ${step} failed (${stepError.kind}): ${stepError.message}`);
    throw stepError;
  }
}

/**
 * Run every step over the given METS documents
 *
 * @throws PipelineStepError naming the failed step and the originating error kind
 */
export async function runPipeline(
  paths: readonly string[],
  options: RunPipelineOptions = {}
): Promise<PipelineRunResult> {
  const runId = uuidv4();
  let input: RunPipelineParams;
  try {
    input = validateInput(RunPipelineInput, { paths, ...options });
  } catch (error) {
    throw PipelineStepError.fromUnknown('parse_sip', error);
  }
  const verifyContent = input.verifyContent ?? getConfig().verifyContent;
  const timings: StepTiming[] = [];

  console.error(`[Pipeline] ${runId} starting with ${input.paths.length} document(s)`);

  const sip = await runStep(runId, 'parse_sip', timings, () => parseSIP(input.paths));
  const intellectualEntities = await runStep(runId, 'extract_ies', timings, () => extractIEs(sip));
  const representations = await runStep(runId, 'extract_representations', timings, () =>
    extractRepresentations(intellectualEntities)
  );
  const files = await runStep(runId, 'extract_files', timings, () => extractFiles(representations));
  const fixityReport = await runStep(runId, 'extract_fixities', timings, () =>
    extractFixities(files, { verifyContent })
  );

  const fingerprint = fingerprintSIP(sip);
  const summary: PipelineRunSummary = {
    run_id: runId,
    sip_fingerprint: fingerprint,
    sip: summarizeSIP(sip),
    intellectual_entities: summarizeIntellectualEntities(intellectualEntities),
    representations: summarizeRepresentations(representations),
    files: summarizeFiles(files),
    fixities: summarizeFixities(fixityReport),
    timings,
  };

  console.error(
    `[Pipeline] ${runId} finished: ${sip.id}, ${files.length} file(s), ` +
      `${summary.fixities.mismatched_file_ids.length} mismatch(es), ` +
      `${summary.fixities.invalid_file_ids.length} invalid`
  );

  return {
    runId,
    sip,
    intellectualEntities,
    representations,
    files,
    fixityReport,
    fingerprint,
    timings,
    summary,
  };
}
