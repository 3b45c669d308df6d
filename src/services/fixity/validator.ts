/**
 * Fixity Validator
 *
 * Two independent checks per declared checksum:
 * - syntactic: known algorithm, hex digest of the algorithm's length
 * - semantic: recomputed digest of the file content equals the declared one
 *
 * Per-file problems never throw out of verifyFileFixity/validateFixities;
 * they are returned as FileFixityResult entries so sibling files are unaffected.
 *
 * @module services/fixity/validator
 */

import {
  FIXITY_ALGORITHMS,
  type DeclaredFixity,
  type FileFixityResult,
  type FileFixityStatus,
  type Fixity,
  type FixityAlgorithm,
  type FixityCheck,
  type FixityReport,
} from '../../models/fixity.js';
import type { PackageFile } from '../../models/sip.js';
import { FixityMismatchError, ValidationError } from '../../utils/errors.js';
import { computeFileDigestsSync, isValidDigestFormat } from '../../utils/hash.js';

const ALGORITHM_ALIASES: Record<string, FixityAlgorithm> = {
  SHA1: 'SHA-1',
  SHA256: 'SHA-256',
  SHA512: 'SHA-512',
};

const ALGORITHM_SET: ReadonlySet<string> = new Set(FIXITY_ALGORITHMS);

function isFixityAlgorithm(value: string): value is FixityAlgorithm {
  return ALGORITHM_SET.has(value);
}

/**
 * Trim and upper-case an algorithm name, mapping the hyphenless aliases.
 * The result is not guaranteed to be a supported algorithm.
 *
 * @example
 * normalizeAlgorithmName(' sha256 ') // 'SHA-256'
 * normalizeAlgorithmName('crc32')    // 'CRC32'
 */
export function normalizeAlgorithmName(raw: string): string {
  const upper = raw.trim().toUpperCase();
  return ALGORITHM_ALIASES[upper] ?? upper;
}

/**
 * Drop repeated assertions (same normalized algorithm, case-insensitive digest),
 * keeping the first declaration.
 */
export function dedupeDeclaredFixities(declared: readonly DeclaredFixity[]): DeclaredFixity[] {
  const seen = new Set<string>();
  const unique: DeclaredFixity[] = [];
  for (const fixity of declared) {
    const key = `${normalizeAlgorithmName(fixity.algorithm)}:${fixity.digest.trim().toLowerCase()}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(fixity);
    }
  }
  return unique;
}

/**
 * Syntactic validation of one assertion
 *
 * @throws ValidationError if the algorithm is unsupported or the digest is malformed
 */
export function validateFixitySyntax(
  declared: DeclaredFixity,
  file: PackageFile
): Fixity {
  const algorithm = normalizeAlgorithmName(declared.algorithm);
  if (!isFixityAlgorithm(algorithm)) {
    throw new ValidationError(
      `Unsupported fixity algorithm "${declared.algorithm}" for file ${file.id} ` +
        `(expected one of ${FIXITY_ALGORITHMS.join(', ')})`
    );
  }

  const digest = declared.digest.trim();
  if (!isValidDigestFormat(digest, algorithm)) {
    throw new ValidationError(
      `Malformed ${algorithm} digest "${digest}" for file ${file.id}: ` +
        `expected a hexadecimal value of the algorithm's length`
    );
  }

  return Object.freeze({ algorithm, digest, source: declared.source, file });
}

export interface VerifyOptions {
  /** Recompute digests from file content; default true */
  readonly verifyContent?: boolean;
}

function fileStatus(
  invalid: boolean,
  checks: readonly FixityCheck[]
): FileFixityStatus {
  if (invalid) {
    return 'invalid';
  }
  if (checks.some((check) => check.outcome === 'mismatch')) {
    return 'mismatch';
  }
  if (checks.length > 0 && checks.every((check) => check.outcome === 'match')) {
    return 'verified';
  }
  return 'unverified';
}

/**
 * Validate and (when content is readable) verify every assertion of one file
 */
export function verifyFileFixity(file: PackageFile, options: VerifyOptions = {}): FileFixityResult {
  const errors: Array<ValidationError | FixityMismatchError> = [];
  const fixities: Fixity[] = [];

  for (const declared of dedupeDeclaredFixities(file.declaredFixities)) {
    try {
      fixities.push(validateFixitySyntax(declared, file));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      errors.push(error);
    }
  }

  let digests: Map<FixityAlgorithm, string> | null = null;
  if (options.verifyContent !== false && file.contentPath !== null && fixities.length > 0) {
    try {
      digests = computeFileDigestsSync(
        file.contentPath,
        fixities.map((fixity) => fixity.algorithm)
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Fixity] Content of file ${file.id} not readable, skipping verification: ${message}`);
    }
  }

  const checks: FixityCheck[] = fixities.map((fixity) => {
    const computed = digests?.get(fixity.algorithm);
    if (computed === undefined) {
      return Object.freeze({ fixity, outcome: 'not_checked' as const, computedDigest: null });
    }
    if (computed === fixity.digest.toLowerCase()) {
      return Object.freeze({ fixity, outcome: 'match' as const, computedDigest: computed });
    }
    errors.push(new FixityMismatchError(file.id, fixity.algorithm, fixity.digest, computed));
    return Object.freeze({ fixity, outcome: 'mismatch' as const, computedDigest: computed });
  });

  const status = fileStatus(
    errors.some((error) => error instanceof ValidationError),
    checks
  );

  return Object.freeze({
    file,
    status,
    contentAvailable: digests !== null,
    checks: Object.freeze(checks),
    errors: Object.freeze(errors),
  });
}

/**
 * Run fixity validation over a batch of files. Files are independent: one
 * file's invalid or mismatching assertions never affect another's result.
 */
export function validateFixities(
  files: readonly PackageFile[],
  options: VerifyOptions = {}
): FixityReport {
  const results = files.map((file) => verifyFileFixity(file, options));
  const fixities = results.flatMap((result) => result.checks.map((check) => check.fixity));

  const flagged = results.filter((result) => result.status === 'mismatch' || result.status === 'invalid');
  if (flagged.length > 0) {
    console.error(
      `[Fixity] ${flagged.length}/${results.length} file(s) flagged: ` +
        flagged.map((result) => `${result.file.id}=${result.status}`).join(', ')
    );
  }

  return Object.freeze({
    fixities: Object.freeze(fixities),
    results: Object.freeze(results),
  });
}
