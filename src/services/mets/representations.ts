/**
 * Representation & File extraction
 *
 * A representation div's fptr elements (depth-first, document order, folder
 * divs included) name the files of one fileGrp. File attributes come from the
 * administrative metadata linked by ADMID, falling back to the mets:file
 * attributes when none is declared.
 *
 * @module services/mets/representations
 */

import path from 'path';
import { fileURLToPath } from 'url';
import type { DeclaredFixity } from '../../models/fixity.js';
import {
  isRepresentationType,
  REPRESENTATION_TYPES,
  type PackageFile,
  type Representation,
} from '../../models/sip.js';
import { StructureError, ValidationError } from '../../utils/errors.js';
import { dedupeDeclaredFixities } from '../fixity/validator.js';
import { readAdministrativeMetadata, type AdministrativeMetadata } from './administrative.js';
import type { MetsDocument } from './document-index.js';
import { NS } from './namespaces.js';
import { descendants, firstChild, getAttribute, idRefs, isElement, type XmlElement } from './xml.js';

const ADMINISTRATIVE_TARGETS: ReadonlySet<string> = new Set([
  'amdSec',
  'techMD',
  'rightsMD',
  'sourceMD',
  'digiprovMD',
]);

const URI_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;
const SIZE_PATTERN = /^\d+$/;

/**
 * Resolve an element's ADMID tokens and read their administrative metadata
 *
 * @throws UnresolvedReferenceError for a dangling token
 * @throws StructureError when a token names something other than an amdSec or md section
 */
export function resolveAdministrativeMetadata(
  document: MetsDocument,
  element: XmlElement
): AdministrativeMetadata {
  const targets = idRefs(getAttribute(element, 'ADMID')).map((token) => {
    const target = document.index.resolve(token, 'ADMID');
    if (target.namespace !== NS.METS || !ADMINISTRATIVE_TARGETS.has(target.localName)) {
      throw new StructureError(
        `ADMID "${token}" must reference an amdSec or metadata section, found "${target.name}"`,
        'amdSec',
        document.sourcePath
      );
    }
    return target;
  });
  return readAdministrativeMetadata(targets);
}

/**
 * Local path of a file location, resolved against the METS document's
 * directory. Remote URIs have no local path.
 *
 * @param encoded - The location is a URI reference (an xlink:href) whose
 *   percent escapes must be decoded; false for plain filesystem paths
 */
export function resolveContentPath(
  location: string | null,
  sourcePath: string,
  encoded = true
): string | null {
  if (location === null) {
    return null;
  }
  if (/^file:/i.test(location)) {
    try {
      return fileURLToPath(location);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[MetsParser] Ignoring non-local file URL ${location}: ${message}`);
      return null;
    }
  }
  if (URI_SCHEME.test(location)) {
    return null;
  }

  let relative = location;
  if (encoded) {
    try {
      relative = decodeURIComponent(location);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[MetsParser] Ignoring location with malformed escapes ${location}: ${message}`);
      return null;
    }
  }
  return path.resolve(path.dirname(sourcePath), relative);
}

function parseSize(raw: string | undefined, fileId: string, sourcePath: string): number | null {
  if (raw === undefined) {
    return null;
  }
  const value = raw.trim();
  const size = Number(value);
  if (!SIZE_PATTERN.test(value) || !Number.isSafeInteger(size)) {
    throw new ValidationError(
      `Invalid size "${raw}" for file ${fileId}: expected a non-negative integer`,
      sourcePath
    );
  }
  return size;
}

function metsChecksum(fileElement: XmlElement): DeclaredFixity[] {
  const digest = getAttribute(fileElement, 'CHECKSUM');
  const algorithm = getAttribute(fileElement, 'CHECKSUMTYPE');
  return digest !== undefined && algorithm !== undefined
    ? [{ algorithm, digest, source: 'mets' }]
    : [];
}

function buildFile(
  document: MetsDocument,
  fileElement: XmlElement,
  fileId: string,
  representation: Representation
): PackageFile {
  const admin = resolveAdministrativeMetadata(document, fileElement);
  const flocat = firstChild(fileElement, NS.METS, 'FLocat');
  const href = flocat ? getAttribute(flocat, 'href', NS.XLINK) : undefined;
  const location = href ?? admin.originalPath ?? null;

  const declaredFixities = dedupeDeclaredFixities([
    ...admin.fixities,
    ...metsChecksum(fileElement),
  ]).map((fixity) => Object.freeze({ ...fixity }));

  return Object.freeze({
    id: fileId,
    location,
    contentPath: resolveContentPath(location, document.sourcePath, href !== undefined),
    mimeType: admin.mimeType ?? getAttribute(fileElement, 'MIMETYPE') ?? null,
    size: parseSize(admin.size ?? getAttribute(fileElement, 'SIZE'), fileId, document.sourcePath),
    originalName: admin.originalName ?? null,
    label: admin.label ?? null,
    declaredFixities: Object.freeze(declaredFixities),
    representation,
  });
}

interface FileReference {
  readonly id: string;
  readonly element: XmlElement;
}

/**
 * Resolve the fptr elements of a representation div to mets:file elements
 */
function fileReferences(document: MetsDocument, div: XmlElement, divId: string): FileReference[] {
  const fptrs = [...descendants(div)].filter((element) => isElement(element, NS.METS, 'fptr'));
  if (fptrs.length === 0) {
    throw new StructureError(
      `Representation div "${divId}" has no file pointers (fptr)`,
      'structMap',
      document.sourcePath
    );
  }

  const seen = new Set<string>();
  return fptrs.map((fptr) => {
    const fileId = getAttribute(fptr, 'FILEID');
    if (fileId === undefined) {
      throw new StructureError(
        `fptr in representation div "${divId}" has no FILEID attribute`,
        'structMap',
        document.sourcePath
      );
    }
    if (seen.has(fileId)) {
      throw new ValidationError(
        `Duplicate file ID "${fileId}" in representation "${divId}"`,
        document.sourcePath
      );
    }
    seen.add(fileId);

    const element = document.index.resolve(fileId, 'FILEID');
    if (!isElement(element, NS.METS, 'file')) {
      throw new StructureError(
        `FILEID "${fileId}" must reference a mets:file element, found "${element.name}"`,
        'fileSec',
        document.sourcePath
      );
    }
    return { id: fileId, element };
  });
}

/**
 * The single fileGrp holding every referenced file
 */
function owningFileGroup(
  document: MetsDocument,
  references: readonly FileReference[],
  divId: string
): XmlElement {
  let group: XmlElement | undefined;
  for (const reference of references) {
    const candidate = document.index.closestAncestor(reference.element, NS.METS, 'fileGrp');
    if (candidate === undefined) {
      throw new StructureError(
        `File "${reference.id}" is not inside a fileGrp`,
        'fileSec',
        document.sourcePath
      );
    }
    if (group !== undefined && group !== candidate) {
      throw new StructureError(
        `Representation div "${divId}" references files from more than one fileGrp`,
        'fileSec',
        document.sourcePath
      );
    }
    group = candidate;
  }
  if (group === undefined) {
    throw new StructureError(
      `Representation div "${divId}" has no file pointers (fptr)`,
      'structMap',
      document.sourcePath
    );
  }
  return group;
}

/**
 * Build one Representation (with its Files) from a structMap div
 *
 * @throws StructureError for missing fptrs, fptrs without FILEID or mixed fileGrps
 * @throws UnresolvedReferenceError for dangling FILEID or ADMID tokens
 * @throws ValidationError for an unknown type, repeated FILEID or invalid size
 */
export function extractRepresentation(
  document: MetsDocument,
  div: XmlElement,
  intellectualEntityId: string
): Representation {
  const divId = getAttribute(div, 'ID') ?? getAttribute(div, 'LABEL') ?? intellectualEntityId;
  const references = fileReferences(document, div, divId);
  const fileGroup = owningFileGroup(document, references, divId);

  const id = getAttribute(fileGroup, 'ID') ?? getAttribute(div, 'ID');
  if (id === undefined) {
    throw new StructureError(
      `Representation of "${intellectualEntityId}" has no identifier (fileGrp ID or div ID)`,
      'fileSec',
      document.sourcePath
    );
  }

  const admin = resolveAdministrativeMetadata(document, fileGroup);
  const rawType = getAttribute(fileGroup, 'USE') ?? admin.usageType;
  if (rawType === undefined || !isRepresentationType(rawType)) {
    throw new ValidationError(
      `Invalid representation type "${rawType ?? ''}" for representation ${id} ` +
        `(expected one of ${REPRESENTATION_TYPES.join(', ')})`,
      document.sourcePath
    );
  }

  const files: PackageFile[] = [];
  const representation: Representation = Object.freeze({
    id,
    type: rawType,
    label: getAttribute(div, 'LABEL') ?? admin.label ?? null,
    files,
    intellectualEntityId,
  });

  for (const reference of references) {
    files.push(buildFile(document, reference.element, reference.id, representation));
  }
  Object.freeze(files);

  return representation;
}
