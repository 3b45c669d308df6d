export {
  formatStepFailure,
  getRecoveryHint,
  PipelineStepError,
  type RecoveryHint,
  type StepFailureKind,
  type StepFailureResponse,
} from './errors.js';
export {
  runPipeline,
  type PipelineRunResult,
  type PipelineRunSummary,
  type RunPipelineOptions,
  type StepTiming,
} from './runner.js';
export {
  FileWatchSensor,
  scanWatchDirectory,
  type FileWatchSensorOptions,
  type RunRequest,
  type SensorScanResult,
} from './sensor.js';
export {
  fingerprintSIP,
  serializeFile,
  serializeFixityReport,
  serializeIntellectualEntity,
  serializeRepresentation,
  serializeSIP,
  type FileRecord,
  type FixityResultRecord,
  type IntellectualEntityRecord,
  type RepresentationRecord,
  type SipRecord,
} from './serialize.js';
export {
  extractFiles,
  extractFixities,
  extractIEs,
  extractRepresentations,
  parseSIP,
  PIPELINE_STEPS,
  type PipelineStepDescriptor,
  type PipelineStepName,
} from './steps.js';
export {
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
