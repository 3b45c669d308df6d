/**
 * Administrative metadata extraction (PREMIS and DNX)
 *
 * Resolves the technical characteristics of files, representations and
 * Intellectual Entities from the amdSec elements an ADMID points at. Two
 * vocabularies are understood:
 *
 * - PREMIS (v2 and v3) object descriptions: size, format name, original
 *   name and fixity blocks
 * - Ex Libris DNX key/value sections: generalFileCharacteristics,
 *   fileFixity, generalRepCharacteristics, generalIECharacteristics
 *
 * Values are returned raw; callers validate what they consume.
 *
 * @module services/mets/administrative
 */

import type { DeclaredFixity } from '../../models/fixity.js';
import { NS, PREMIS_NAMESPACES } from './namespaces.js';
import { childElements, descendants, firstChild, getAttribute, type XmlElement } from './xml.js';

export interface AdministrativeMetadata {
  readonly mimeType?: string;
  /** Size as written; parsed by the file extractor */
  readonly size?: string;
  readonly originalName?: string;
  readonly originalPath?: string;
  readonly label?: string;
  readonly usageType?: string;
  readonly entityType?: string;
  readonly fixities: readonly DeclaredFixity[];
}

type MetadataFields = Omit<AdministrativeMetadata, 'fixities'>;

/** METS sections that may hold an mdWrap inside an amdSec */
const MD_SECTIONS: ReadonlySet<string> = new Set(['techMD', 'rightsMD', 'sourceMD', 'digiprovMD']);

/** DNX key id → field, per DNX section */
const DNX_FIELDS: ReadonlyMap<string, ReadonlyMap<string, keyof MetadataFields>> = new Map([
  [
    'generalFileCharacteristics',
    new Map<string, keyof MetadataFields>([
      ['fileMIMEType', 'mimeType'],
      ['fileSizeBytes', 'size'],
      ['fileSize', 'size'],
      ['fileOriginalName', 'originalName'],
      ['fileOriginalPath', 'originalPath'],
      ['label', 'label'],
    ]),
  ],
  [
    'generalRepCharacteristics',
    new Map<string, keyof MetadataFields>([
      ['usageType', 'usageType'],
      ['label', 'label'],
    ]),
  ],
  ['generalIECharacteristics', new Map<string, keyof MetadataFields>([['IEEntityType', 'entityType']])],
]);

const MIME_TYPE_PATTERN = /^[\w.+-]+\/[\w.+-]+/;

class MetadataCollector {
  private readonly fields: { -readonly [K in keyof MetadataFields]?: string } = {};
  private readonly fixities: DeclaredFixity[] = [];

  /** First declaration wins */
  set(field: keyof MetadataFields, value: string | undefined): void {
    if (value !== undefined && value.length > 0 && this.fields[field] === undefined) {
      this.fields[field] = value;
    }
  }

  addFixity(fixity: DeclaredFixity): void {
    this.fixities.push(fixity);
  }

  result(): AdministrativeMetadata {
    return { ...this.fields, fixities: this.fixities };
  }
}

function text(element: XmlElement | undefined): string | undefined {
  return element !== undefined && element.text.length > 0 ? element.text : undefined;
}

function premisChild(element: XmlElement, localName: string): XmlElement | undefined {
  return element.children.find(
    (child) => PREMIS_NAMESPACES.has(child.namespace) && child.localName === localName
  );
}

function premisChildren(element: XmlElement, localName: string): XmlElement[] {
  return element.children.filter(
    (child) => PREMIS_NAMESPACES.has(child.namespace) && child.localName === localName
  );
}

function readPremisObject(object: XmlElement, collector: MetadataCollector): void {
  for (const characteristics of premisChildren(object, 'objectCharacteristics')) {
    for (const fixity of premisChildren(characteristics, 'fixity')) {
      const algorithm = text(premisChild(fixity, 'messageDigestAlgorithm'));
      const digest = text(premisChild(fixity, 'messageDigest'));
      if (algorithm !== undefined && digest !== undefined) {
        collector.addFixity({ algorithm, digest, source: 'premis' });
      }
    }

    collector.set('size', text(premisChild(characteristics, 'size')));

    for (const format of premisChildren(characteristics, 'format')) {
      const designation = premisChild(format, 'formatDesignation');
      const formatName = designation ? text(premisChild(designation, 'formatName')) : undefined;
      if (formatName !== undefined && MIME_TYPE_PATTERN.test(formatName)) {
        collector.set('mimeType', formatName);
      }
    }
  }

  collector.set('originalName', text(premisChild(object, 'originalName')));
}

function readDnx(dnx: XmlElement, collector: MetadataCollector): void {
  for (const section of childElements(dnx, NS.DNX, 'section')) {
    const sectionId = getAttribute(section, 'id');
    if (sectionId === undefined) {
      continue;
    }

    for (const record of childElements(section, NS.DNX, 'record')) {
      const keys = new Map<string, string>();
      for (const key of childElements(record, NS.DNX, 'key')) {
        const keyId = getAttribute(key, 'id');
        if (keyId !== undefined && key.text.length > 0) {
          keys.set(keyId, key.text);
        }
      }

      if (sectionId === 'fileFixity') {
        const algorithm = keys.get('fixityType');
        const digest = keys.get('fixityValue');
        if (algorithm !== undefined && digest !== undefined) {
          collector.addFixity({ algorithm, digest, source: 'dnx' });
        }
        continue;
      }

      const mapping = DNX_FIELDS.get(sectionId);
      if (mapping === undefined) {
        continue;
      }
      for (const [keyId, value] of keys) {
        const field = mapping.get(keyId);
        if (field !== undefined) {
          collector.set(field, value);
        }
      }
    }
  }
}

function readMdWrap(mdWrap: XmlElement, collector: MetadataCollector): void {
  const xmlData = firstChild(mdWrap, NS.METS, 'xmlData');
  if (xmlData === undefined) {
    return;
  }
  for (const element of descendants(xmlData)) {
    if (PREMIS_NAMESPACES.has(element.namespace) && element.localName === 'object') {
      readPremisObject(element, collector);
    } else if (element.namespace === NS.DNX && element.localName === 'dnx') {
      readDnx(element, collector);
    }
  }
}

/**
 * md sections (techMD, digiprovMD, ...) covered by an ADMID target
 */
function metadataSections(target: XmlElement): XmlElement[] {
  if (target.namespace === NS.METS && target.localName === 'amdSec') {
    return target.children.filter(
      (child) => child.namespace === NS.METS && MD_SECTIONS.has(child.localName)
    );
  }
  return [target];
}

/**
 * Collect administrative metadata from resolved ADMID targets.
 * Targets may be amdSec elements or individual md sections; earlier targets
 * take precedence for scalar fields, fixities accumulate in order.
 */
export function readAdministrativeMetadata(targets: readonly XmlElement[]): AdministrativeMetadata {
  const collector = new MetadataCollector();
  for (const target of targets) {
    for (const section of metadataSections(target)) {
      for (const mdWrap of childElements(section, NS.METS, 'mdWrap')) {
        readMdWrap(mdWrap, collector);
      }
    }
  }
  return collector.result();
}
