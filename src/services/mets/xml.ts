/**
 * Namespace-aware XML element tree
 *
 * Wraps xml2js so the METS extractors work on a uniform tree: every element
 * knows its namespace URI and local name, and children keep document order.
 *
 * @module services/mets/xml
 */

import sax from 'sax';
import { parseStringPromise, type ParserOptions } from 'xml2js';
import { ParseError } from '../../utils/errors.js';

export interface XmlAttribute {
  /** Qualified name as written (e.g. 'xlink:href') */
  readonly name: string;
  readonly localName: string;
  /** Namespace URI, '' for unprefixed attributes */
  readonly namespace: string;
  readonly value: string;
}

export interface XmlElement {
  /** Qualified name as written (e.g. 'mets:file') */
  readonly name: string;
  readonly localName: string;
  /** Namespace URI, '' when the element is in no namespace */
  readonly namespace: string;
  readonly attributes: readonly XmlAttribute[];
  /** Child elements in document order */
  readonly children: readonly XmlElement[];
  /** Trimmed character content, '' when there is none */
  readonly text: string;
}

/**
 * xmlns: resolve namespace URIs into '$ns' and attribute objects.
 * explicitChildren + preserveChildrenOrder: ordered '$$' child array with '#name'.
 * explicitCharkey: text always under '_'.
 */
const PARSER_OPTIONS: ParserOptions = {
  xmlns: true,
  explicitChildren: true,
  preserveChildrenOrder: true,
  explicitCharkey: true,
  trim: true,
};

const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function localPart(qualifiedName: string): string {
  const colon = qualifiedName.indexOf(':');
  return colon === -1 ? qualifiedName : qualifiedName.slice(colon + 1);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function toAttributes(raw: unknown): XmlAttribute[] {
  if (!isRecord(raw)) {
    return [];
  }
  const attributes: XmlAttribute[] = [];
  for (const [key, entry] of Object.entries(raw)) {
    if (typeof entry === 'string') {
      attributes.push({ name: key, localName: localPart(key), namespace: '', value: entry });
      continue;
    }
    if (!isRecord(entry)) {
      continue;
    }
    const namespace = stringField(entry, 'uri') ?? '';
    if (namespace === XMLNS_NAMESPACE || key === 'xmlns' || key.startsWith('xmlns:')) {
      continue;
    }
    attributes.push({
      name: key,
      localName: stringField(entry, 'local') ?? localPart(key),
      namespace,
      value: stringField(entry, 'value') ?? '',
    });
  }
  return attributes;
}

function toElement(node: unknown, fallbackName: string): XmlElement {
  if (!isRecord(node)) {
    return {
      name: fallbackName,
      localName: localPart(fallbackName),
      namespace: '',
      attributes: [],
      children: [],
      text: typeof node === 'string' ? node.trim() : '',
    };
  }

  const name = stringField(node, '#name') ?? fallbackName;
  const ns = isRecord(node.$ns) ? node.$ns : {};
  const rawChildren = node.$$;

  return {
    name,
    localName: stringField(ns, 'local') ?? localPart(name),
    namespace: stringField(ns, 'uri') ?? '',
    attributes: toAttributes(node.$),
    children: Array.isArray(rawChildren) ? rawChildren.map((child) => toElement(child, '')) : [],
    text: stringField(node, '_') ?? '',
  };
}

function malformed(error: unknown, sourcePath?: string): ParseError {
  const message = error instanceof Error ? error.message : String(error);
  return new ParseError(`Malformed XML: ${message.replace(/\s+/g, ' ').trim()}`, sourcePath);
}

/**
 * Tokenize the whole document. xml2js settles once the root element closes,
 * so content after the root is only caught here.
 *
 * @throws ParseError on a tokenizer error or a second root element
 */
function assertWellFormed(content: string, sourcePath?: string): void {
  const tokenizer = sax.parser(true, { xmlns: true });
  const state: { depth: number; rootClosed: boolean; extraRoot: string | null } = {
    depth: 0,
    rootClosed: false,
    extraRoot: null,
  };

  tokenizer.onopentag = (tag) => {
    if (state.depth === 0 && state.rootClosed && state.extraRoot === null) {
      state.extraRoot = tag.name;
    }
    state.depth++;
  };
  tokenizer.onclosetag = () => {
    state.depth--;
    if (state.depth === 0) {
      state.rootClosed = true;
    }
  };

  try {
    tokenizer.write(content).close();
  } catch (error) {
    throw malformed(error, sourcePath);
  }
  if (state.extraRoot !== null) {
    throw new ParseError(`Malformed XML: element <${state.extraRoot}> after the root element`, sourcePath);
  }
}

/**
 * Parse an XML document into its root element
 *
 * @throws ParseError if the content is empty or not well-formed
 */
export async function parseXml(content: string, sourcePath?: string): Promise<XmlElement> {
  assertWellFormed(content, sourcePath);

  let parsed: unknown;
  try {
    parsed = await parseStringPromise(content, PARSER_OPTIONS);
  } catch (error) {
    throw malformed(error, sourcePath);
  }

  if (!isRecord(parsed)) {
    throw new ParseError('XML document is empty', sourcePath);
  }
  const [root] = Object.entries(parsed);
  if (root === undefined) {
    throw new ParseError('XML document has no root element', sourcePath);
  }
  return toElement(root[1], root[0]);
}

// ═══════════════════════════════════════════════════════════════════════════════
// TREE QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export function isElement(element: XmlElement, namespace: string, localName: string): boolean {
  return element.namespace === namespace && element.localName === localName;
}

export function childElements(
  element: XmlElement,
  namespace: string,
  localName: string
): XmlElement[] {
  return element.children.filter((child) => isElement(child, namespace, localName));
}

export function firstChild(
  element: XmlElement,
  namespace: string,
  localName: string
): XmlElement | undefined {
  return element.children.find((child) => isElement(child, namespace, localName));
}

/**
 * Attribute value, trimmed. Empty values count as absent.
 */
export function getAttribute(
  element: XmlElement,
  localName: string,
  namespace = ''
): string | undefined {
  const attribute = element.attributes.find(
    (attr) => attr.localName === localName && attr.namespace === namespace
  );
  const value = attribute?.value.trim();
  return value ? value : undefined;
}

/**
 * Split an IDREFS attribute value into its tokens
 */
export function idRefs(value: string | undefined): string[] {
  return value === undefined ? [] : value.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Depth-first, document-order traversal including the element itself
 */
export function* descendants(element: XmlElement): Generator<XmlElement> {
  yield element;
  for (const child of element.children) {
    yield* descendants(child);
  }
}
