/**
 * Dublin Core extraction from METS dmdSec elements
 *
 * Reads DC 1.1 and DC terms elements from mdWrap/xmlData, either directly or
 * one wrapper level down (dc:record, oai_dc:dc). Anything outside the 15
 * recognized element names is skipped; mdRef (external metadata) is not
 * followed.
 *
 * @module services/mets/dublin-core
 */

import {
  createDublinCore,
  isDublinCoreField,
  type DublinCore,
  type DublinCoreField,
} from '../../models/dublin-core.js';
import { DUBLIN_CORE_NAMESPACES, NS } from './namespaces.js';
import { childElements, firstChild, type XmlElement } from './xml.js';

function dublinCoreField(element: XmlElement): DublinCoreField | undefined {
  if (!DUBLIN_CORE_NAMESPACES.has(element.namespace)) {
    return undefined;
  }
  return isDublinCoreField(element.localName) ? element.localName : undefined;
}

/**
 * DC field elements under xmlData, in document order
 */
function fieldElements(xmlData: XmlElement): Array<[DublinCoreField, XmlElement]> {
  const found: Array<[DublinCoreField, XmlElement]> = [];
  for (const child of xmlData.children) {
    const field = dublinCoreField(child);
    if (field !== undefined) {
      found.push([field, child]);
      continue;
    }
    for (const nested of child.children) {
      const nestedField = dublinCoreField(nested);
      if (nestedField !== undefined) {
        found.push([nestedField, nested]);
      }
    }
  }
  return found;
}

/**
 * Extract Dublin Core fields from one dmdSec. Empty elements are dropped.
 */
export function extractDublinCore(dmdSec: XmlElement): DublinCore {
  const values: Partial<Record<DublinCoreField, string[]>> = {};

  for (const mdWrap of childElements(dmdSec, NS.METS, 'mdWrap')) {
    const xmlData = firstChild(mdWrap, NS.METS, 'xmlData');
    if (xmlData === undefined) {
      continue;
    }
    for (const [field, element] of fieldElements(xmlData)) {
      if (element.text.length === 0) {
        continue;
      }
      const list = values[field] ?? [];
      list.push(element.text);
      values[field] = list;
    }
  }

  return createDublinCore(values);
}
