export { readAdministrativeMetadata, type AdministrativeMetadata } from './administrative.js';
export { ElementIndex, indexMetsDocument, type MetsDocument } from './document-index.js';
export { extractDublinCore } from './dublin-core.js';
export { extractIntellectualEntities, extractIntellectualEntity } from './entities.js';
export { NS } from './namespaces.js';
export {
  assembleSIP,
  parseMetsContent,
  parseMetsDocument,
  parseSIP,
  type ParsedMetsDocument,
} from './parser.js';
export {
  extractRepresentation,
  resolveAdministrativeMetadata,
  resolveContentPath,
} from './representations.js';
export { parseXml, type XmlAttribute, type XmlElement } from './xml.js';
