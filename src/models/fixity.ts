/**
 * Fixity (checksum) interfaces
 *
 * A file declares checksum assertions; the fixity step validates them into
 * Fixity entities and reports per-file outcomes.
 */

import type { PackageFile } from './sip.js';
import type { FixityMismatchError, ValidationError } from '../utils/errors.js';

/**
 * Supported digest algorithms with their hex digest lengths
 */
export const FIXITY_ALGORITHMS = ['MD5', 'SHA-1', 'SHA-256', 'SHA-512'] as const;

export type FixityAlgorithm = (typeof FIXITY_ALGORITHMS)[number];

export const DIGEST_HEX_LENGTH: Record<FixityAlgorithm, number> = {
  MD5: 32,
  'SHA-1': 40,
  'SHA-256': 64,
  'SHA-512': 128,
};

/**
 * Where a checksum assertion was declared in the METS document
 */
export type FixitySource = 'premis' | 'dnx' | 'mets';

/**
 * A checksum assertion exactly as the package declares it
 */
export interface DeclaredFixity {
  readonly algorithm: string;
  readonly digest: string;
  readonly source: FixitySource;
}

/**
 * A syntactically valid checksum assertion for one file
 */
export interface Fixity {
  readonly algorithm: FixityAlgorithm;
  /** Digest as declared (hex, either case) */
  readonly digest: string;
  readonly source: FixitySource;
  /** Owning file (non-owning reference) */
  readonly file: PackageFile;
}

/**
 * Outcome of recomputing one assertion against the file content
 */
export type FixityOutcome = 'match' | 'mismatch' | 'not_checked';

export interface FixityCheck {
  readonly fixity: Fixity;
  readonly outcome: FixityOutcome;
  /** Lowercase hex digest of the content, null when not checked */
  readonly computedDigest: string | null;
}

/**
 * Per-file status:
 * - invalid: at least one assertion failed syntactic validation
 * - mismatch: a recomputed digest differs from the declared one
 * - verified: every assertion was recomputed and matched
 * - unverified: nothing could be recomputed (no content or no assertions)
 */
export type FileFixityStatus = 'verified' | 'unverified' | 'mismatch' | 'invalid';

export interface FileFixityResult {
  readonly file: PackageFile;
  readonly status: FileFixityStatus;
  readonly contentAvailable: boolean;
  readonly checks: readonly FixityCheck[];
  readonly errors: readonly (ValidationError | FixityMismatchError)[];
}

/**
 * Output of the fixity step. Mismatches are data, not exceptions.
 */
export interface FixityReport {
  /** Every syntactically valid assertion, in file order then declaration order */
  readonly fixities: readonly Fixity[];
  /** One entry per input file, in input order */
  readonly results: readonly FileFixityResult[];
}
