/**
 * OAIS object model for Submission Information Packages
 *
 * SIP → IntellectualEntity → Representation → PackageFile. Every level owns
 * the next exclusively and every entity is frozen once the parser has built
 * it. Back-references (file → representation) are lookups only.
 */

import type { DublinCore } from './dublin-core.js';
import type { DeclaredFixity } from './fixity.js';

/**
 * Closed set of representation usage types. Matching is case-sensitive.
 */
export const REPRESENTATION_TYPES = ['preservation', 'access', 'original'] as const;

export type RepresentationType = (typeof REPRESENTATION_TYPES)[number];

const REPRESENTATION_TYPE_SET: ReadonlySet<string> = new Set(REPRESENTATION_TYPES);

export function isRepresentationType(value: string): value is RepresentationType {
  return REPRESENTATION_TYPE_SET.has(value);
}

/**
 * A single digital object inside a representation
 */
export interface PackageFile {
  /** METS file ID, unique within the owning representation */
  readonly id: string;

  /** Location as written in the package (FLocat href or original path) */
  readonly location: string | null;

  /** Absolute local path of the content, null when the location is remote or unknown */
  readonly contentPath: string | null;

  readonly mimeType: string | null;

  /** Size in bytes; null means unknown, which is not the same as 0 */
  readonly size: number | null;

  readonly originalName: string | null;

  readonly label: string | null;

  /** Checksum assertions as declared, before syntactic validation */
  readonly declaredFixities: readonly DeclaredFixity[];

  /** Owning representation (non-owning reference) */
  readonly representation: Representation;
}

/**
 * One rendition of an Intellectual Entity's content
 */
export interface Representation {
  /** fileGrp ID */
  readonly id: string;
  readonly type: RepresentationType;
  readonly label: string | null;
  readonly files: readonly PackageFile[];
  /** ID of the owning Intellectual Entity */
  readonly intellectualEntityId: string;
}

/**
 * A distinct preservable unit with its descriptive metadata
 */
export interface IntellectualEntity {
  /** structMap div ID, unique within the SIP */
  readonly id: string;
  readonly label: string | null;
  /** Entity type from administrative metadata (e.g. DNX IEEntityType) */
  readonly entityType: string | null;
  readonly dublinCore: DublinCore;
  readonly representations: readonly Representation[];
}

/**
 * Root of the object graph
 */
export interface SIP {
  /** METS OBJID, or SIP-<file stem> when absent */
  readonly id: string;

  /** ISO 8601 creation date from the METS header, null when not declared */
  readonly createdAt: string | null;

  readonly submittingAgent: string | null;

  readonly intellectualEntities: readonly IntellectualEntity[];

  /** Absolute paths of the parsed METS documents, in input order */
  readonly sourcePaths: readonly string[];
}
