import { describe, expect, it } from 'vitest';
import {
  ConversionError,
  UnknownTypeError,
  resolveRuntimeType,
} from '../../../marshalling/index.js';

describe('resolveRuntimeType', () => {
  it.each([
    ['int', 'int'],
    ['System.Int32', 'int'],
    ['boolean', 'bool'],
    ['System.Boolean', 'bool'],
    ['System.Int64, mscorlib, Version=4.0.0.0', 'long'],
    ['datetime', 'datetime'],
    ['System.Guid', 'guid'],
  ])('should resolve %s to %s', (typeName, expected) => {
    expect(resolveRuntimeType(typeName).name).toBe(expected);
  });

  it('should reject unknown type names', () => {
    expect(() => resolveRuntimeType('userdata')).toThrow(UnknownTypeError);
    expect(() => resolveRuntimeType('table')).toThrow('Unknown type: table');
  });
});

describe('runtime type conversion', () => {
  const convert = (typeName: string, text: string) => resolveRuntimeType(typeName).convert(text);

  it('should convert integers within range', () => {
    expect(convert('int', '-42')).toBe(-42);
    expect(convert('byte', '255')).toBe(255);
    expect(convert('sbyte', '-128')).toBe(-128);
    expect(convert('uint', '4294967295')).toBe(4294967295);
  });

  it('should reject integers out of range or malformed', () => {
    expect(() => convert('byte', '256')).toThrow(ConversionError);
    expect(() => convert('ushort', '-1')).toThrow(ConversionError);
    expect(() => convert('int', '1.5')).toThrow("Cannot convert '1.5' to int");
    expect(() => convert('int', '')).toThrow(ConversionError);
  });

  it('should convert 64-bit integers to bigint', () => {
    expect(convert('long', '9223372036854775807')).toBe(9223372036854775807n);
    expect(convert('ulong', '18446744073709551615')).toBe(18446744073709551615n);
    expect(() => convert('ulong', '-1')).toThrow(ConversionError);
  });

  it('should convert floating point values', () => {
    expect(convert('double', '1.5')).toBe(1.5);
    expect(convert('float', '-2e3')).toBe(-2000);
    expect(convert('decimal', '10.25')).toBe(10.25);
    expect(() => convert('double', 'abc')).toThrow(ConversionError);
    expect(() => convert('double', ' ')).toThrow(ConversionError);
  });

  it('should convert booleans case-insensitively', () => {
    expect(convert('bool', 'True')).toBe(true);
    expect(convert('bool', 'false')).toBe(false);
    expect(() => convert('bool', 'yes')).toThrow(ConversionError);
  });

  it('should convert chars, dates and guids', () => {
    expect(convert('char', 'x')).toBe('x');
    expect(() => convert('char', 'xy')).toThrow(ConversionError);
    expect(convert('datetime', '2024-03-01T10:20:30.000Z')).toEqual(new Date('2024-03-01T10:20:30.000Z'));
    expect(() => convert('datetime', 'not a date')).toThrow(ConversionError);
    expect(convert('guid', '{0F8FAD5B-D9CB-469F-A165-70867728950E}')).toBe(
      '0f8fad5b-d9cb-469f-a165-70867728950e',
    );
    expect(() => convert('guid', '1234')).toThrow(ConversionError);
  });

  it('should pass strings and objects through unchanged', () => {
    expect(convert('string', ' padded ')).toBe(' padded ');
    expect(convert('object', 'thing')).toBe('thing');
  });
});
