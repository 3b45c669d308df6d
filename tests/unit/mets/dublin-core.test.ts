/**
 * Unit tests for Dublin Core extraction
 *
 * @see src/services/mets/dublin-core.ts
 */

import {
  describe,
  it,
  expect,
  buildMets,
  parseXml,
  indexMetsDocument,
  extractDublinCore,
  VIRTUAL_PATH,
} from './helpers.js';
import { DUBLIN_CORE_FIELDS } from '../../../src/models/dublin-core.js';

async function dublinCoreOf(xmlData: string) {
  const dmdSec =
    '<mets:dmdSec ID="DMD1"><mets:mdWrap MDTYPE="DC"><mets:xmlData>' +
    xmlData +
    '</mets:xmlData></mets:mdWrap></mets:dmdSec>';
  const root = await parseXml(buildMets({ dmdSecs: dmdSec }), VIRTUAL_PATH);
  const document = indexMetsDocument(root, VIRTUAL_PATH);
  return extractDublinCore(document.dmdSecs[0]);
}

describe('extractDublinCore', () => {
  it('should keep every repeated creator in source order', async () => {
    const dc = await dublinCoreOf(
      '<dc:record>' +
        '<dc:creator>Ada Example</dc:creator>' +
        '<dc:title>Field Notes</dc:title>' +
        '<dc:creator>Ben Example</dc:creator>' +
        '<dc:creator>Cy Example</dc:creator>' +
        '</dc:record>'
    );
    expect(dc.creator).toEqual(['Ada Example', 'Ben Example', 'Cy Example']);
    expect(dc.title).toEqual(['Field Notes']);
  });

  it('should read elements placed directly under xmlData', async () => {
    const dc = await dublinCoreOf('<dc:title>Direct</dc:title><dc:language>en</dc:language>');
    expect(dc.title).toEqual(['Direct']);
    expect(dc.language).toEqual(['en']);
  });

  it('should accept the DC terms namespace for the fifteen element names', async () => {
    const dc = await dublinCoreOf('<dcterms:date>2024</dcterms:date><dc:date>2023</dc:date>');
    expect(dc.date).toEqual(['2024', '2023']);
  });

  it('should discard unrecognized elements', async () => {
    const dc = await dublinCoreOf(
      '<dc:record>' +
        '<dcterms:extent>12 pages</dcterms:extent>' +
        '<other:title xmlns:other="urn:test:other">Not Dublin Core</other:title>' +
        '<dc:subject>Maps</dc:subject>' +
        '</dc:record>'
    );
    expect(dc.subject).toEqual(['Maps']);
    expect(dc.title).toEqual([]);
    expect(Object.keys(dc)).toEqual([...DUBLIN_CORE_FIELDS]);
  });

  it('should skip empty elements', async () => {
    const dc = await dublinCoreOf('<dc:subject></dc:subject><dc:subject>  </dc:subject><dc:subject>Rivers</dc:subject>');
    expect(dc.subject).toEqual(['Rivers']);
  });

  it('should ignore externally referenced metadata', async () => {
    const dmdSec =
      '<mets:dmdSec ID="DMD1">' +
      '<mets:mdRef LOCTYPE="URL" MDTYPE="DC" xlink:href="https://example.org/dc.xml"/>' +
      '</mets:dmdSec>';
    const root = await parseXml(buildMets({ dmdSecs: dmdSec }), VIRTUAL_PATH);
    const dc = extractDublinCore(indexMetsDocument(root, VIRTUAL_PATH).dmdSecs[0]);
    for (const field of DUBLIN_CORE_FIELDS) {
      expect(dc[field]).toEqual([]);
    }
  });

  it('should return a frozen record', async () => {
    const dc = await dublinCoreOf('<dc:title>Frozen</dc:title>');
    expect(Object.isFrozen(dc)).toBe(true);
    expect(Object.isFrozen(dc.title)).toBe(true);
  });
});
