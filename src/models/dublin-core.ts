/**
 * Dublin Core descriptive metadata for Intellectual Entities
 *
 * Every element of the Dublin Core 1.1 element set is repeatable, so each
 * recognized field maps to an ordered list of values in source order.
 * Elements outside this set are discarded by the extractor.
 */

export const DUBLIN_CORE_FIELDS = [
  'title',
  'creator',
  'subject',
  'description',
  'publisher',
  'contributor',
  'date',
  'type',
  'format',
  'identifier',
  'source',
  'language',
  'relation',
  'coverage',
  'rights',
] as const;

export type DublinCoreField = (typeof DUBLIN_CORE_FIELDS)[number];

export type DublinCore = {
  readonly [Field in DublinCoreField]: readonly string[];
};

const DUBLIN_CORE_FIELD_SET: ReadonlySet<string> = new Set(DUBLIN_CORE_FIELDS);

export function isDublinCoreField(name: string): name is DublinCoreField {
  return DUBLIN_CORE_FIELD_SET.has(name);
}

/**
 * Build a frozen DublinCore record; fields not given are empty lists.
 */
export function createDublinCore(
  values: Partial<Record<DublinCoreField, readonly string[]>> = {}
): DublinCore {
  const field = (name: DublinCoreField): readonly string[] =>
    Object.freeze([...(values[name] ?? [])]);
  return Object.freeze({
    title: field('title'),
    creator: field('creator'),
    subject: field('subject'),
    description: field('description'),
    publisher: field('publisher'),
    contributor: field('contributor'),
    date: field('date'),
    type: field('type'),
    format: field('format'),
    identifier: field('identifier'),
    source: field('source'),
    language: field('language'),
    relation: field('relation'),
    coverage: field('coverage'),
    rights: field('rights'),
  });
}

/**
 * Concatenate several records field by field, keeping argument order.
 */
export function mergeDublinCore(records: readonly DublinCore[]): DublinCore {
  const merged: Partial<Record<DublinCoreField, string[]>> = {};
  for (const field of DUBLIN_CORE_FIELDS) {
    merged[field] = records.flatMap((record) => record[field]);
  }
  return createDublinCore(merged);
}
