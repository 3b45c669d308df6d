/**
 * Structural pass over a METS document
 *
 * Checks the root element and required sections, then indexes every element
 * carrying an ID attribute so the semantic pass can resolve FILEID, DMDID and
 * ADMID references. The index lives only for the duration of one parse.
 *
 * @module services/mets/document-index
 */

import {
  StructureError,
  UnresolvedReferenceError,
  ValidationError,
} from '../../utils/errors.js';
import { NS } from './namespaces.js';
import { childElements, firstChild, getAttribute, isElement, type XmlElement } from './xml.js';

/**
 * Required root-level sections with the name used in error messages
 */
const REQUIRED_SECTIONS = [
  { localName: 'dmdSec', description: 'descriptive metadata' },
  { localName: 'amdSec', description: 'administrative metadata' },
  { localName: 'structMap', description: 'structural map' },
] as const;

export class ElementIndex {
  private readonly byId = new Map<string, XmlElement>();
  private readonly parents = new Map<XmlElement, XmlElement>();

  constructor(
    root: XmlElement,
    private readonly sourcePath: string
  ) {
    this.visit(root);
  }

  private visit(root: XmlElement): void {
    const stack: XmlElement[] = [root];
    while (stack.length > 0) {
      const element = stack.pop();
      if (element === undefined) {
        break;
      }
      const id = getAttribute(element, 'ID');
      if (id !== undefined) {
        if (this.byId.has(id)) {
          throw new ValidationError(`Duplicate ID "${id}" in METS document`, this.sourcePath);
        }
        this.byId.set(id, element);
      }
      for (const child of element.children) {
        this.parents.set(child, element);
        stack.push(child);
      }
    }
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): XmlElement | undefined {
    return this.byId.get(id);
  }

  /**
   * Look up an ID reference
   * @throws UnresolvedReferenceError if no element carries the ID
   */
  resolve(id: string, attribute: string): XmlElement {
    const element = this.byId.get(id);
    if (element === undefined) {
      throw new UnresolvedReferenceError(id, attribute, this.sourcePath);
    }
    return element;
  }

  parentOf(element: XmlElement): XmlElement | undefined {
    return this.parents.get(element);
  }

  /**
   * Nearest ancestor (excluding the element itself) with the given name
   */
  closestAncestor(
    element: XmlElement,
    namespace: string,
    localName: string
  ): XmlElement | undefined {
    let current = this.parents.get(element);
    while (current !== undefined) {
      if (isElement(current, namespace, localName)) {
        return current;
      }
      current = this.parents.get(current);
    }
    return undefined;
  }
}

export interface MetsDocument {
  readonly sourcePath: string;
  readonly root: XmlElement;
  readonly header: XmlElement | undefined;
  readonly dmdSecs: readonly XmlElement[];
  readonly amdSecs: readonly XmlElement[];
  readonly structMaps: readonly XmlElement[];
  readonly index: ElementIndex;
}

/**
 * Validate the document skeleton and build the ID index
 *
 * @throws StructureError if the root is not mets:mets or a required section is missing
 * @throws ValidationError if two elements share an ID
 */
export function indexMetsDocument(root: XmlElement, sourcePath: string): MetsDocument {
  if (!isElement(root, NS.METS, 'mets')) {
    throw new StructureError(
      `Root element must be mets:mets, found "${root.name}"`,
      'mets',
      sourcePath
    );
  }

  for (const section of REQUIRED_SECTIONS) {
    if (childElements(root, NS.METS, section.localName).length === 0) {
      throw new StructureError(
        `Missing required ${section.description} section (${section.localName})`,
        section.localName,
        sourcePath
      );
    }
  }

  return {
    sourcePath,
    root,
    header: firstChild(root, NS.METS, 'metsHdr'),
    dmdSecs: childElements(root, NS.METS, 'dmdSec'),
    amdSecs: childElements(root, NS.METS, 'amdSec'),
    structMaps: childElements(root, NS.METS, 'structMap'),
    index: new ElementIndex(root, sourcePath),
  };
}
