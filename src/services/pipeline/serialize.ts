/**
 * JSON serialization of the object graph
 *
 * Records drop the non-owning back-references (file → representation,
 * fixity → file) so the graph becomes a plain tree. Key order is fixed, which
 * keeps the fingerprint stable across runs on identical input.
 *
 * @module services/pipeline/serialize
 */

import type { DublinCore } from '../../models/dublin-core.js';
import type { FixityReport } from '../../models/fixity.js';
import type {
  IntellectualEntity,
  PackageFile,
  Representation,
  SIP,
} from '../../models/sip.js';
import { computeHash } from '../../utils/hash.js';

export interface FileRecord {
  id: string;
  location: string | null;
  content_path: string | null;
  mime_type: string | null;
  size: number | null;
  original_name: string | null;
  label: string | null;
  declared_fixities: Array<{ algorithm: string; digest: string; source: string }>;
}

export interface RepresentationRecord {
  id: string;
  type: string;
  label: string | null;
  files: FileRecord[];
}

export interface IntellectualEntityRecord {
  id: string;
  label: string | null;
  entity_type: string | null;
  dublin_core: Record<string, string[]>;
  representations: RepresentationRecord[];
}

export interface SipRecord {
  id: string;
  created_at: string | null;
  submitting_agent: string | null;
  source_paths: string[];
  intellectual_entities: IntellectualEntityRecord[];
}

export interface FixityResultRecord {
  file_id: string;
  status: string;
  content_available: boolean;
  checks: Array<{
    algorithm: string;
    digest: string;
    outcome: string;
    computed_digest: string | null;
  }>;
  errors: Array<{ kind: string; message: string }>;
}

/**
 * Only the populated Dublin Core fields, in element-set order
 */
function serializeDublinCore(dublinCore: DublinCore): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const [field, values] of Object.entries(dublinCore)) {
    if (values.length > 0) {
      record[field] = [...values];
    }
  }
  return record;
}

export function serializeFile(file: PackageFile): FileRecord {
  return {
    id: file.id,
    location: file.location,
    content_path: file.contentPath,
    mime_type: file.mimeType,
    size: file.size,
    original_name: file.originalName,
    label: file.label,
    declared_fixities: file.declaredFixities.map((fixity) => ({
      algorithm: fixity.algorithm,
      digest: fixity.digest,
      source: fixity.source,
    })),
  };
}

export function serializeRepresentation(representation: Representation): RepresentationRecord {
  return {
    id: representation.id,
    type: representation.type,
    label: representation.label,
    files: representation.files.map(serializeFile),
  };
}

export function serializeIntellectualEntity(entity: IntellectualEntity): IntellectualEntityRecord {
  return {
    id: entity.id,
    label: entity.label,
    entity_type: entity.entityType,
    dublin_core: serializeDublinCore(entity.dublinCore),
    representations: entity.representations.map(serializeRepresentation),
  };
}

export function serializeSIP(sip: SIP): SipRecord {
  return {
    id: sip.id,
    created_at: sip.createdAt,
    submitting_agent: sip.submittingAgent,
    source_paths: [...sip.sourcePaths],
    intellectual_entities: sip.intellectualEntities.map(serializeIntellectualEntity),
  };
}

export function serializeFixityReport(report: FixityReport): FixityResultRecord[] {
  return report.results.map((result) => ({
    file_id: result.file.id,
    status: result.status,
    content_available: result.contentAvailable,
    checks: result.checks.map((check) => ({
      algorithm: check.fixity.algorithm,
      digest: check.fixity.digest,
      outcome: check.outcome,
      computed_digest: check.computedDigest,
    })),
    errors: result.errors.map((error) => ({ kind: error.kind, message: error.message })),
  }));
}

/**
 * SHA-256 fingerprint of the serialized SIP, usable as an orchestrator cache key
 *
 * @returns 'sha256:' + 64 lowercase hex characters
 */
export function fingerprintSIP(sip: SIP): string {
  return computeHash(JSON.stringify(serializeSIP(sip)));
}
