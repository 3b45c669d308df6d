/**
 * SIP Parser
 *
 * Two phases per METS document:
 * 1. structural: well-formed XML, mets:mets root, required sections, ID index
 * 2. semantic: structMaps walked in document order, references resolved
 *    through the index and handed to the entity extractors
 *
 * All-or-nothing per document: any error aborts and no partial SIP is returned.
 *
 * CRITICAL: NEVER use console.log() - stdout carries the CLI's JSON output.
 *
 * @module services/mets/parser
 */

import fs from 'fs';
import path from 'path';
import type { IntellectualEntity, SIP } from '../../models/sip.js';
import { ParseError, ValidationError } from '../../utils/errors.js';
import { ParseSipInput, validateInput } from '../../utils/validation.js';
import { indexMetsDocument, type MetsDocument } from './document-index.js';
import { extractIntellectualEntities } from './entities.js';
import { NS } from './namespaces.js';
import { childElements, getAttribute, firstChild, parseXml } from './xml.js';

/**
 * One parsed METS document with its package-level header values
 */
export interface ParsedMetsDocument {
  readonly sourcePath: string;
  readonly objectId: string | null;
  readonly createdAt: string | null;
  readonly submittingAgent: string | null;
  readonly intellectualEntities: readonly IntellectualEntity[];
}

function creatorAgent(document: MetsDocument): string | null {
  if (document.header === undefined) {
    return null;
  }
  for (const agent of childElements(document.header, NS.METS, 'agent')) {
    if (getAttribute(agent, 'ROLE') !== 'CREATOR') {
      continue;
    }
    const name = firstChild(agent, NS.METS, 'name');
    if (name !== undefined && name.text.length > 0) {
      return name.text;
    }
  }
  return null;
}

/**
 * Parse METS content already in memory
 *
 * @param content - XML text
 * @param sourcePath - Absolute path the content was read from; relative file
 *   locations resolve against its directory
 */
export async function parseMetsContent(
  content: string,
  sourcePath: string
): Promise<ParsedMetsDocument> {
  const root = await parseXml(content, sourcePath);
  const document = indexMetsDocument(root, sourcePath);
  const intellectualEntities = extractIntellectualEntities(document);

  return Object.freeze({
    sourcePath,
    objectId: getAttribute(root, 'OBJID') ?? null,
    createdAt: document.header ? (getAttribute(document.header, 'CREATEDATE') ?? null) : null,
    submittingAgent: creatorAgent(document),
    intellectualEntities: Object.freeze(intellectualEntities),
  });
}

/**
 * Read and parse one METS document
 *
 * @throws ParseError if the file cannot be read or is not well-formed XML
 */
export async function parseMetsDocument(filePath: string): Promise<ParsedMetsDocument> {
  const sourcePath = path.resolve(filePath);

  let content: string;
  try {
    content = await fs.promises.readFile(sourcePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Cannot read METS document: ${message}`, sourcePath);
  }

  const parsed = await parseMetsContent(content, sourcePath);
  console.error(
    `[MetsParser] Parsed ${path.basename(sourcePath)}: ${parsed.intellectualEntities.length} intellectual entit${parsed.intellectualEntities.length === 1 ? 'y' : 'ies'}`
  );
  return parsed;
}

/**
 * Combine parsed documents into one SIP. The first document supplies the
 * package identifier and header values; entities keep input order.
 *
 * @throws ValidationError if an entity identifier repeats across documents
 */
export function assembleSIP(documents: readonly ParsedMetsDocument[]): SIP {
  const [first] = documents;
  if (first === undefined) {
    throw new ValidationError('At least one METS XML file path must be provided');
  }

  const owners = new Map<string, string>();
  const intellectualEntities: IntellectualEntity[] = [];
  for (const document of documents) {
    for (const entity of document.intellectualEntities) {
      const owner = owners.get(entity.id);
      if (owner !== undefined) {
        throw new ValidationError(
          `Duplicate Intellectual Entity ID "${entity.id}" (declared in ${owner} and ${document.sourcePath})`,
          document.sourcePath
        );
      }
      owners.set(entity.id, document.sourcePath);
      intellectualEntities.push(entity);
    }
  }

  return Object.freeze({
    id: first.objectId ?? `SIP-${path.parse(first.sourcePath).name}`,
    createdAt: first.createdAt,
    submittingAgent: first.submittingAgent,
    intellectualEntities: Object.freeze(intellectualEntities),
    sourcePaths: Object.freeze(documents.map((document) => document.sourcePath)),
  });
}

/**
 * Parse one or more METS documents into a single SIP
 *
 * @throws ValidationError for an empty path list or repeated entity IDs
 * @throws ParseError | StructureError | UnresolvedReferenceError from any document
 */
export async function parseSIP(paths: readonly string[]): Promise<SIP> {
  const input = validateInput(ParseSipInput, { paths });

  const documents: ParsedMetsDocument[] = [];
  for (const filePath of input.paths) {
    documents.push(await parseMetsDocument(filePath));
  }
  return assembleSIP(documents);
}
