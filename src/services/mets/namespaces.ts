/**
 * XML namespaces read by the METS parser
 */
export const NS = {
  METS: 'http://www.loc.gov/METS/',
  DC: 'http://purl.org/dc/elements/1.1/',
  DCTERMS: 'http://purl.org/dc/terms/',
  XLINK: 'http://www.w3.org/1999/xlink',
  PREMIS_V3: 'http://www.loc.gov/premis/v3',
  PREMIS_V2: 'info:lc/xmlns/premis-v2',
  DNX: 'http://www.exlibrisgroup.com/dps/dnx',
} as const;

/** Namespaces whose elements carry Dublin Core fields */
export const DUBLIN_CORE_NAMESPACES: ReadonlySet<string> = new Set([NS.DC, NS.DCTERMS]);

export const PREMIS_NAMESPACES: ReadonlySet<string> = new Set([NS.PREMIS_V3, NS.PREMIS_V2]);
