/**
 * Intellectual Entity extraction
 *
 * An IE is a direct child div of a structMap. Its DMDID names the dmdSec
 * elements carrying its Dublin Core; its child divs are representations.
 *
 * @module services/mets/entities
 */

import { mergeDublinCore } from '../../models/dublin-core.js';
import type { IntellectualEntity } from '../../models/sip.js';
import { StructureError } from '../../utils/errors.js';
import type { MetsDocument } from './document-index.js';
import { extractDublinCore } from './dublin-core.js';
import { NS } from './namespaces.js';
import { extractRepresentation, resolveAdministrativeMetadata } from './representations.js';
import { childElements, getAttribute, idRefs, isElement, type XmlElement } from './xml.js';

/**
 * Build one Intellectual Entity from a structMap div
 *
 * @throws StructureError if the div has no ID or no DMDID, or DMDID names a non-dmdSec
 * @throws UnresolvedReferenceError for dangling DMDID, ADMID or FILEID tokens
 */
export function extractIntellectualEntity(
  document: MetsDocument,
  div: XmlElement
): IntellectualEntity {
  const id = getAttribute(div, 'ID');
  if (id === undefined) {
    throw new StructureError(
      `Intellectual Entity div${labelSuffix(div)} has no ID attribute`,
      'structMap',
      document.sourcePath
    );
  }

  const dmdIds = idRefs(getAttribute(div, 'DMDID'));
  if (dmdIds.length === 0) {
    throw new StructureError(
      `Intellectual Entity "${id}" has no DMDID attribute`,
      'dmdSec',
      document.sourcePath
    );
  }

  const dmdSecs = dmdIds.map((token) => {
    const target = document.index.resolve(token, 'DMDID');
    if (!isElement(target, NS.METS, 'dmdSec')) {
      throw new StructureError(
        `DMDID "${token}" must reference a dmdSec, found "${target.name}"`,
        'dmdSec',
        document.sourcePath
      );
    }
    return target;
  });

  const admin = resolveAdministrativeMetadata(document, div);
  const representations = childElements(div, NS.METS, 'div').map((child) =>
    extractRepresentation(document, child, id)
  );

  return Object.freeze({
    id,
    label: getAttribute(div, 'LABEL') ?? null,
    entityType: admin.entityType ?? null,
    dublinCore: mergeDublinCore(dmdSecs.map(extractDublinCore)),
    representations: Object.freeze(representations),
  });
}

function labelSuffix(div: XmlElement): string {
  const label = getAttribute(div, 'LABEL');
  return label === undefined ? '' : ` "${label}"`;
}

/**
 * Every IE of a document, structMaps and divs in document order
 */
export function extractIntellectualEntities(document: MetsDocument): IntellectualEntity[] {
  return document.structMaps.flatMap((structMap) =>
    childElements(structMap, NS.METS, 'div').map((div) => extractIntellectualEntity(document, div))
  );
}
