import { describe, it, expect } from 'vitest';
import { fromHex, hexDump, isHexDigit, toHex, toHex8, toHexWord } from '../src/hex.ts';

describe('hex helpers', () => {
  it('formats single bytes as two lowercase digits', () => {
    expect(toHex8(0x5)).toBe('05');
    expect(toHex8(0xab)).toBe('ab');
    expect(toHex8(0x1ff)).toBe('ff');
  });

  it('encodes a view without the bytes around it', () => {
    const backing = Uint8Array.from([0x00, 0x12, 0x34, 0x00]);
    expect(toHex(backing.subarray(1, 3))).toBe('1234');
  });

  it('classifies hex digits', () => {
    expect(isHexDigit('f'.charCodeAt(0))).toBe(true);
    expect(isHexDigit('F'.charCodeAt(0))).toBe(true);
    expect(isHexDigit('g'.charCodeAt(0))).toBe(false);
    expect(isHexDigit(':'.charCodeAt(0))).toBe(false);
  });

  it('decodes hex and ignores whitespace', () => {
    expect(fromHex('de ad\nBE ef')).toEqual(Buffer.from([0xde, 0xad, 0xbe, 0xef]));
    expect(() => fromHex('abc')).toThrow('Invalid hex string: "abc"');
    expect(() => fromHex('zz')).toThrow('Invalid hex string: "zz"');
  });

  it('renders words in either byte order', () => {
    expect(toHexWord(0x401000n, 4, 'little')).toBe('00104000');
    expect(toHexWord(0x401000n, 4, 'big')).toBe('00401000');
    expect(toHexWord(0x1122334455667788n, 8, 'little')).toBe('8877665544332211');
  });

  it('dumps bytes with offsets and printable text', () => {
    const data = Buffer.concat([Buffer.from('0123456789abcdef'), Buffer.from([0x41, 0x00])]);
    expect(hexDump(data).split('\n')).toEqual([
      '00000000  30 31 32 33 34 35 36 37 38 39 61 62 63 64 65 66  0123456789abcdef',
      `00000010  ${'41 00'.padEnd(47)}  A.`,
    ]);
  });
});
