/**
 * Step summaries
 *
 * Compact, JSON-safe descriptions of each step's output, attached to run
 * results so operators can audit a run without walking the object graph.
 *
 * @module services/pipeline/summaries
 */

import type { FixityReport } from '../../models/fixity.js';
import type {
  IntellectualEntity,
  PackageFile,
  Representation,
  SIP,
} from '../../models/sip.js';

export interface SipSummary {
  sip_id: string;
  source_paths: string[];
  created_at: string | null;
  submitting_agent: string | null;
  ie_count: number;
  ie_ids: string[];
}

export interface IntellectualEntitySummary {
  ie_count: number;
  titles: string[];
  identifiers: string[];
  creators: string[];
  rights: string[];
  types: string[];
}

export interface RepresentationSummary {
  representation_count: number;
  representation_ids: string[];
  types: Record<string, number>;
}

export interface FileSummary {
  file_count: number;
  original_names: string[];
  total_size_bytes: number;
  files_without_size: number;
}

export interface FixityDetail {
  file_id: string;
  algorithm: string;
  digest: string;
  source: string;
  outcome: string;
}

export interface FixityGroup {
  file_id: string;
  file_name: string | null;
  file_label: string | null;
  status: string;
  fixities: Array<{ type: string; value: string }>;
}

export interface FixitySummary {
  fixity_count: number;
  file_count: number;
  status_counts: Record<string, number>;
  fixities_by_file: FixityGroup[];
  fixity_details: FixityDetail[];
  mismatched_file_ids: string[];
  invalid_file_ids: string[];
  errors: string[];
}

export function summarizeSIP(sip: SIP): SipSummary {
  return {
    sip_id: sip.id,
    source_paths: [...sip.sourcePaths],
    created_at: sip.createdAt,
    submitting_agent: sip.submittingAgent,
    ie_count: sip.intellectualEntities.length,
    ie_ids: sip.intellectualEntities.map((entity) => entity.id),
  };
}

export function summarizeIntellectualEntities(
  entities: readonly IntellectualEntity[]
): IntellectualEntitySummary {
  return {
    ie_count: entities.length,
    titles: entities.flatMap((entity) => entity.dublinCore.title),
    identifiers: entities.flatMap((entity) => entity.dublinCore.identifier),
    creators: entities.flatMap((entity) => entity.dublinCore.creator),
    rights: entities.flatMap((entity) => entity.dublinCore.rights),
    types: entities.flatMap((entity) => entity.dublinCore.type),
  };
}

export function summarizeRepresentations(
  representations: readonly Representation[]
): RepresentationSummary {
  const types: Record<string, number> = {};
  for (const representation of representations) {
    types[representation.type] = (types[representation.type] ?? 0) + 1;
  }
  return {
    representation_count: representations.length,
    representation_ids: representations.map((representation) => representation.id),
    types,
  };
}

export function summarizeFiles(files: readonly PackageFile[]): FileSummary {
  let totalSize = 0;
  let withoutSize = 0;
  for (const file of files) {
    if (file.size === null) {
      withoutSize++;
    } else {
      totalSize += file.size;
    }
  }
  return {
    file_count: files.length,
    original_names: files.flatMap((file) => (file.originalName === null ? [] : [file.originalName])),
    total_size_bytes: totalSize,
    files_without_size: withoutSize,
  };
}

export function summarizeFixities(report: FixityReport): FixitySummary {
  const statusCounts: Record<string, number> = {};
  for (const result of report.results) {
    statusCounts[result.status] = (statusCounts[result.status] ?? 0) + 1;
  }

  return {
    fixity_count: report.fixities.length,
    file_count: report.results.length,
    status_counts: statusCounts,
    fixities_by_file: report.results
      .filter((result) => result.checks.length > 0)
      .map((result) => ({
        file_id: result.file.id,
        file_name: result.file.originalName,
        file_label: result.file.label,
        status: result.status,
        fixities: result.checks.map((check) => ({
          type: check.fixity.algorithm,
          value: check.fixity.digest,
        })),
      })),
    fixity_details: report.results.flatMap((result) =>
      result.checks.map((check) => ({
        file_id: result.file.id,
        algorithm: check.fixity.algorithm,
        digest: check.fixity.digest,
        source: check.fixity.source,
        outcome: check.outcome,
      }))
    ),
    // an invalid file can still carry a mismatching assertion
    mismatched_file_ids: report.results
      .filter((result) => result.checks.some((check) => check.outcome === 'mismatch'))
      .map((result) => result.file.id),
    invalid_file_ids: report.results
      .filter((result) => result.status === 'invalid')
      .map((result) => result.file.id),
    errors: report.results.flatMap((result) => result.errors.map((error) => error.message)),
  };
}
