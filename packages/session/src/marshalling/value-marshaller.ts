import {
  childElements,
  getAttribute,
  textContent,
  type XmlElement,
} from '../protocol/index.js';
import type { ClientValue } from './client-value.js';
import { resolveRuntimeType } from './type-registry.js';

const TABLE_TYPE = 'table';
const DEFAULT_TYPE = 'object';

/**
 * Reads one `v` element. Conversion failures, unknown types included, leave
 * the raw text as value and no runtime type.
 * @param index - Positional index used when the element carries no name
 */
export function parseValue(el: XmlElement, index: number): ClientValue {
  const name = getAttribute(el, 'n') || `$${getAttribute(el, 'i') ?? String(index)}`;
  const typeName = getAttribute(el, 't') ?? DEFAULT_TYPE;

  if (typeName === TABLE_TYPE) {
    return { name, typeName, value: parseReturn(el, 1) };
  }

  const text = textContent(el);
  try {
    const runtimeType = resolveRuntimeType(typeName);
    return { name, typeName, runtimeType: runtimeType.name, value: runtimeType.convert(text) };
  } catch {
    return { name, typeName, value: text };
  }
}

/**
 * Reads the `v` children of a reply in document order.
 * @param startIndex - Index of the first child; tables count from 1
 */
export function parseReturn(el: XmlElement, startIndex = 0): ClientValue[] {
  return childElements(el, 'v').map((child, offset) => parseValue(child, startIndex + offset));
}
