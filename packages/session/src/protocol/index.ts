export {
  childElements,
  element,
  getAttribute,
  isXmlElement,
  parseDocument,
  serializeDocument,
  textContent,
  withAttribute,
} from './xml-document.js';
export type { XmlElement, XmlNode, XmlText } from './xml-document.js';
export * from './envelopes.js';
