export { formatClientValue } from './client-value.js';
export type { ClientValue, ClientValueData } from './client-value.js';
export { parseReturn, parseValue } from './value-marshaller.js';
export {
  ConversionError,
  UnknownTypeError,
  resolveRuntimeType,
} from './type-registry.js';
export type { ClientScalar, RuntimeType, RuntimeTypeName } from './type-registry.js';
