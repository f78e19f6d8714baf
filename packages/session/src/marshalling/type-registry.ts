/**
 * Resolution of declared wire type names to converters.
 *
 * Type names are the short names the debug server reports (`int`, `string`,
 * `datetime`, ...) or their `System.*` spellings. Assembly-qualified names
 * resolve by the part before the first comma.
 */

export type ClientScalar = string | number | bigint | boolean | Date | null;

export type RuntimeTypeName =
  | 'object'
  | 'string'
  | 'bool'
  | 'char'
  | 'sbyte'
  | 'byte'
  | 'short'
  | 'ushort'
  | 'int'
  | 'uint'
  | 'long'
  | 'ulong'
  | 'float'
  | 'double'
  | 'decimal'
  | 'datetime'
  | 'guid';

export interface RuntimeType {
  readonly name: RuntimeTypeName;
  convert(text: string): ClientScalar;
}

export class UnknownTypeError extends Error {
  public constructor(typeName: string) {
    super(`Unknown type: ${typeName}`);
    this.name = 'UnknownTypeError';
  }
}

export class ConversionError extends Error {
  public constructor(typeName: RuntimeTypeName, text: string) {
    super(`Cannot convert '${text}' to ${typeName}`);
    this.name = 'ConversionError';
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const GUID_PATTERN = /^\{?[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\}?$/i;

function integerType(
  name: RuntimeTypeName,
  min: bigint,
  max: bigint,
  asBigInt: boolean,
): RuntimeType {
  return {
    name,
    convert(text) {
      const trimmed = text.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        throw new ConversionError(name, text);
      }
      const value = BigInt(trimmed);
      if (value < min || value > max) {
        throw new ConversionError(name, text);
      }
      return asBigInt ? value : Number(value);
    },
  };
}

function floatType(name: RuntimeTypeName): RuntimeType {
  return {
    name,
    convert(text) {
      const trimmed = text.trim();
      const value = Number(trimmed);
      if (trimmed === '' || Number.isNaN(value)) {
        throw new ConversionError(name, text);
      }
      return value;
    },
  };
}

const RUNTIME_TYPES: readonly RuntimeType[] = [
  { name: 'object', convert: (text) => text },
  { name: 'string', convert: (text) => text },
  {
    name: 'bool',
    convert(text) {
      const value = text.trim().toLowerCase();
      if (value === 'true') return true;
      if (value === 'false') return false;
      throw new ConversionError('bool', text);
    },
  },
  {
    name: 'char',
    convert(text) {
      if ([...text].length !== 1) {
        throw new ConversionError('char', text);
      }
      return text;
    },
  },
  integerType('sbyte', -128n, 127n, false),
  integerType('byte', 0n, 255n, false),
  integerType('short', -32768n, 32767n, false),
  integerType('ushort', 0n, 65535n, false),
  integerType('int', -2147483648n, 2147483647n, false),
  integerType('uint', 0n, 4294967295n, false),
  integerType('long', -9223372036854775808n, 9223372036854775807n, true),
  integerType('ulong', 0n, 18446744073709551615n, true),
  floatType('float'),
  floatType('double'),
  floatType('decimal'),
  {
    name: 'datetime',
    convert(text) {
      const value = new Date(text.trim());
      if (Number.isNaN(value.getTime())) {
        throw new ConversionError('datetime', text);
      }
      return value;
    },
  },
  {
    name: 'guid',
    convert(text) {
      const trimmed = text.trim();
      if (!GUID_PATTERN.test(trimmed)) {
        throw new ConversionError('guid', text);
      }
      return trimmed.replace(/[{}]/g, '').toLowerCase();
    },
  },
];

const SYSTEM_NAMES: Readonly<Record<string, RuntimeTypeName>> = {
  'System.Object': 'object',
  'System.String': 'string',
  'System.Boolean': 'bool',
  'System.Char': 'char',
  'System.SByte': 'sbyte',
  'System.Byte': 'byte',
  'System.Int16': 'short',
  'System.UInt16': 'ushort',
  'System.Int32': 'int',
  'System.UInt32': 'uint',
  'System.Int64': 'long',
  'System.UInt64': 'ulong',
  'System.Single': 'float',
  'System.Double': 'double',
  'System.Decimal': 'decimal',
  'System.DateTime': 'datetime',
  'System.Guid': 'guid',
  boolean: 'bool',
};

const BY_NAME = new Map<string, RuntimeType>(
  RUNTIME_TYPES.map((type) => [type.name, type]),
);

/**
 * Resolves a declared type name.
 * @throws UnknownTypeError for names outside the registry
 */
export function resolveRuntimeType(typeName: string): RuntimeType {
  const commaIndex = typeName.indexOf(',');
  const simpleName = (commaIndex === -1 ? typeName : typeName.slice(0, commaIndex)).trim();
  const canonical = SYSTEM_NAMES[simpleName] ?? simpleName;
  const type = BY_NAME.get(canonical);
  if (!type) {
    throw new UnknownTypeError(typeName);
  }
  return type;
}
