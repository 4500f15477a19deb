import { describe, it, expect } from 'vitest';
import { Code, formatName, isFixInt, valueTypeOf } from '../src/format';

describe('format', () => {
  it('should classify format bytes', () => {
    expect(valueTypeOf(0x00)).toBe('integer');
    expect(valueTypeOf(0xff)).toBe('integer');
    expect(valueTypeOf(0xa5)).toBe('string');
    expect(valueTypeOf(0x93)).toBe('array');
    expect(valueTypeOf(0x81)).toBe('map');
    expect(valueTypeOf(Code.NIL)).toBe('nil');
    expect(valueTypeOf(Code.TRUE)).toBe('boolean');
    expect(valueTypeOf(Code.BIN16)).toBe('binary');
    expect(valueTypeOf(Code.FIXEXT4)).toBe('extension');
    expect(valueTypeOf(Code.FLOAT32)).toBe('float');
    expect(valueTypeOf(Code.INT64)).toBe('integer');
    expect(valueTypeOf(Code.NEVER_USED)).toBe('never_used');
  });

  it('should recognize fixints', () => {
    expect(isFixInt(0x7f)).toBe(true);
    expect(isFixInt(0xe0)).toBe(true);
    expect(isFixInt(0xcc)).toBe(false);
  });

  it('should name format bytes', () => {
    expect(formatName(0x05)).toBe('POSFIXINT');
    expect(formatName(0xa0)).toBe('FIXSTR');
    expect(formatName(Code.UINT8)).toBe('UINT8');
    expect(formatName(Code.NEVER_USED)).toBe('NEVER_USED');
  });
});
