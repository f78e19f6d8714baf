import type { ClientScalar, RuntimeTypeName } from './type-registry.js';

export type ClientValueData = ClientScalar | readonly ClientValue[];

/**
 * A named value returned by the debug server.
 * @public
 */
export interface ClientValue {
  /** Member name, or `$` followed by the positional index */
  readonly name: string;
  /** Type name as declared by the server, `object` when absent */
  readonly typeName: string;
  /** Resolved type; absent for tables and for values that did not convert */
  readonly runtimeType?: RuntimeTypeName;
  readonly value: ClientValueData;
}

function isTableValue(
  value: ClientValueData,
): value is readonly ClientValue[] {
  return Array.isArray(value);
}

/**
 * Display form of a value: `null`, quoted text for strings and unconverted
 * values, ISO dates, bracketed tables.
 * @example
 * ```typescript
 * formatClientValue({ name: '$0', typeName: 'int', runtimeType: 'int', value: 2 }); // "2"
 * formatClientValue({ name: 'x', typeName: 'string', runtimeType: 'string', value: 'a' }); // "'a'"
 * ```
 * @public
 */
export function formatClientValue(value: ClientValue): string {
  const data = value.value;
  if (data === null) {
    return 'null';
  }
  if (isTableValue(data)) {
    return `[${data.map(formatClientValue).join(', ')}]`;
  }
  if (data instanceof Date) {
    return data.toISOString();
  }
  if (value.runtimeType === undefined || value.runtimeType === 'string') {
    return `'${String(data)}'`;
  }
  return String(data);
}
