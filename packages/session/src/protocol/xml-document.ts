import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { SessionError } from '@dedbg/core';

/**
 * Text content inside an element.
 * @public
 */
export interface XmlText {
  readonly text: string;
}

/**
 * Element of a protocol document. Immutable: helpers such as
 * {@link withAttribute} return a new element.
 * @public
 */
export interface XmlElement {
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlNode[];
}

export type XmlNode = XmlElement | XmlText;

/** Key under which fast-xml-parser keeps attributes in preserveOrder mode. */
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

type OrderedNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  suppressEmptyNode: false,
  format: false,
});

export function isXmlElement(node: XmlNode): node is XmlElement {
  return 'name' in node;
}

/**
 * Builds an element.
 * @example
 * ```typescript
 * element('use', { node: '/app' });
 * element('execute', {}, '1+1');
 * ```
 * @public
 */
export function element(
  name: string,
  attributes: Record<string, string> = {},
  ...children: (XmlElement | string)[]
): XmlElement {
  return {
    name,
    attributes: { ...attributes },
    children: children.map((child) =>
      typeof child === 'string' ? { text: child } : child,
    ),
  };
}

export function getAttribute(el: XmlElement, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(el.attributes, name)
    ? el.attributes[name]
    : undefined;
}

export function withAttribute(el: XmlElement, name: string, value: string): XmlElement {
  return {
    ...el,
    attributes: { ...el.attributes, [name]: value },
  };
}

/**
 * Child elements in document order, optionally filtered by tag name.
 */
export function childElements(el: XmlElement, name?: string): XmlElement[] {
  return el.children.filter(
    (child): child is XmlElement =>
      isXmlElement(child) && (name === undefined || child.name === name),
  );
}

/**
 * Concatenated text of the element and all of its descendants.
 */
export function textContent(el: XmlElement): string {
  return el.children
    .map((child) => (isXmlElement(child) ? textContent(child) : child.text))
    .join('');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  if (!isRecord(value)) {
    return {};
  }
  const attributes: Record<string, string> = {};
  for (const [key, attr] of Object.entries(value)) {
    attributes[key] = String(attr);
  }
  return attributes;
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const nodes: XmlNode[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      continue;
    }
    if (TEXT_KEY in entry) {
      nodes.push({ text: String(entry[TEXT_KEY]) });
      continue;
    }
    const name = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
    if (name === undefined) {
      continue;
    }
    nodes.push({
      name,
      attributes: toAttributes(entry[ATTRIBUTES_KEY]),
      children: toNodes(entry[name]),
    });
  }
  return nodes;
}

function toOrdered(node: XmlNode): OrderedNode {
  if (!isXmlElement(node)) {
    return { [TEXT_KEY]: node.text };
  }
  const ordered: OrderedNode = {
    [node.name]: node.children.map(toOrdered),
  };
  if (Object.keys(node.attributes).length > 0) {
    ordered[ATTRIBUTES_KEY] = { ...node.attributes };
  }
  return ordered;
}

/**
 * Parses a protocol document and returns its root element.
 * @throws SessionError with code `protocol_error` when the text is not a
 *   well-formed document with exactly one root element
 * @public
 */
export function parseDocument(text: string): XmlElement {
  let parsed: unknown;
  try {
    parsed = parser.parse(text, true);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw SessionError.protocolError(`malformed document: ${cause.message}`, cause);
  }

  const roots = toNodes(parsed).filter(isXmlElement);
  if (roots.length !== 1) {
    throw SessionError.protocolError(
      `expected one root element, found ${roots.length}`,
    );
  }
  return roots[0];
}

/**
 * Serializes an element into document text.
 * @public
 */
export function serializeDocument(root: XmlElement): string {
  const text: unknown = builder.build([toOrdered(root)]);
  return String(text);
}
