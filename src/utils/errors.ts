/**
 * SIP Error Classes
 *
 * FAIL-FAST: structural errors abort the whole document, no partial SIP is
 * ever returned. Fixity mismatches are the exception: they are collected as
 * per-file results by the fixity step.
 *
 * @module utils/errors
 */

export type SipErrorKind =
  | 'PARSE_ERROR'
  | 'STRUCTURE_ERROR'
  | 'REFERENCE_ERROR'
  | 'VALIDATION_ERROR'
  | 'FIXITY_MISMATCH';

export class SipError extends Error {
  constructor(
    message: string,
    public readonly kind: SipErrorKind,
    public readonly sourcePath?: string
  ) {
    super(message);
    this.name = 'SipError';
  }
}

/**
 * The input is not a readable, well-formed XML document
 */
export class ParseError extends SipError {
  constructor(message: string, sourcePath?: string) {
    super(message, 'PARSE_ERROR', sourcePath);
    this.name = 'ParseError';
  }
}

/**
 * A required section, element or attribute is missing or misplaced
 */
export class StructureError extends SipError {
  constructor(
    message: string,
    public readonly section: string,
    sourcePath?: string
  ) {
    super(message, 'STRUCTURE_ERROR', sourcePath);
    this.name = 'StructureError';
  }
}

/**
 * An ID reference (FILEID, DMDID, ADMID) matches no element
 */
export class UnresolvedReferenceError extends SipError {
  constructor(
    public readonly reference: string,
    public readonly attribute: string,
    sourcePath?: string
  ) {
    super(`Unresolved ${attribute} reference: "${reference}"`, 'REFERENCE_ERROR', sourcePath);
    this.name = 'UnresolvedReferenceError';
  }
}

/**
 * A value violates a closed-set or format constraint, or an identifier repeats
 */
export class ValidationError extends SipError {
  constructor(message: string, sourcePath?: string) {
    super(message, 'VALIDATION_ERROR', sourcePath);
    this.name = 'ValidationError';
  }
}

/**
 * A recomputed digest differs from the declared one.
 * Reported in the fixity report, never thrown by the fixity step.
 */
export class FixityMismatchError extends SipError {
  constructor(
    public readonly fileId: string,
    public readonly algorithm: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      `${algorithm} mismatch for file ${fileId}: declared ${expected}, computed ${actual}`,
      'FIXITY_MISMATCH'
    );
    this.name = 'FixityMismatchError';
  }
}
