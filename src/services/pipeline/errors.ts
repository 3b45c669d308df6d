/**
 * Pipeline step failures
 *
 * Any value thrown inside a step is wrapped in a PipelineStepError carrying
 * the step name and the originating error kind, so the orchestrator can
 * surface a failed run with a stable category and a recovery hint.
 *
 * @module services/pipeline/errors
 */

import { SipError, type SipErrorKind } from '../../utils/errors.js';
import type { PipelineStepName } from './steps.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR KINDS
// ═══════════════════════════════════════════════════════════════════════════════

export type StepFailureKind = SipErrorKind | 'INTERNAL_ERROR';

export interface RecoveryHint {
  action: string;
  hint: string;
}

const RECOVERY_HINTS: Record<StepFailureKind, RecoveryHint> = {
  PARSE_ERROR: {
    action: 'fix_source',
    hint: 'Check that the file exists, is readable and contains well-formed XML',
  },
  STRUCTURE_ERROR: {
    action: 'fix_source',
    hint: 'Add the missing METS section or attribute named in the message',
  },
  REFERENCE_ERROR: {
    action: 'fix_source',
    hint: 'Every FILEID, DMDID and ADMID token must match an element ID in the same document',
  },
  VALIDATION_ERROR: {
    action: 'fix_source',
    hint: 'Correct the value named in the message; identifiers must be unique and types must be in the allowed set',
  },
  FIXITY_MISMATCH: {
    action: 'review_content',
    hint: 'Compare the file content against the declared checksum; re-transfer the file if it was corrupted',
  },
  INTERNAL_ERROR: {
    action: 'retry',
    hint: 'Unexpected failure; retry the step and report the stack trace if it persists',
  },
};

export function getRecoveryHint(kind: StepFailureKind): RecoveryHint {
  return RECOVERY_HINTS[kind];
}

// ═══════════════════════════════════════════════════════════════════════════════
// STEP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class PipelineStepError extends Error {
  public readonly step: PipelineStepName;
  public readonly kind: StepFailureKind;
  public readonly details?: Record<string, unknown>;

  constructor(
    step: PipelineStepName,
    kind: StepFailureKind,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineStepError';
    this.step = step;
    this.kind = kind;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineStepError);
    }
  }

  /**
   * Wrap any caught value; SipError subclasses keep their kind
   */
  static fromUnknown(step: PipelineStepName, error: unknown): PipelineStepError {
    if (error instanceof PipelineStepError) {
      return error;
    }

    if (error instanceof SipError) {
      return new PipelineStepError(step, error.kind, error.message, {
        originalName: error.name,
        ...(error.sourcePath !== undefined && { sourcePath: error.sourcePath }),
      });
    }

    if (error instanceof Error) {
      return new PipelineStepError(step, 'INTERNAL_ERROR', error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new PipelineStepError(step, 'INTERNAL_ERROR', String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      step: this.step,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// FAILURE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface StepFailureResponse {
  success: false;
  error: {
    step: PipelineStepName;
    kind: StepFailureKind;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
}

export function formatStepFailure(error: PipelineStepError): StepFailureResponse {
  return {
    success: false,
    error: {
      step: error.step,
      kind: error.kind,
      message: error.message,
      recovery: RECOVERY_HINTS[error.kind],
      details: error.details,
    },
  };
}
