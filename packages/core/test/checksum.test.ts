import { describe, it, expect } from 'vitest';
import {
  computeChecksum,
  formatChecksum,
  framePacket,
  verifyChecksum,
} from '../src/rsp/checksum.ts';

describe('computeChecksum', () => {
  it('sums payload bytes modulo 256', () => {
    expect(computeChecksum('g')).toBe(0x67);
    expect(computeChecksum('OK')).toBe(0x9a);
    expect(computeChecksum('m1000,4')).toBe(0x8e);
  });

  it('is zero for an empty payload', () => {
    expect(computeChecksum('')).toBe(0);
  });

  it('wraps around on overflow', () => {
    expect(computeChecksum(new Uint8Array([0xff, 0x02]))).toBe(0x01);
  });
});

describe('formatChecksum', () => {
  it('renders two lowercase hex digits', () => {
    expect(formatChecksum(0x0a)).toBe('0a');
    expect(formatChecksum(0xbe)).toBe('be');
  });
});

describe('verifyChecksum', () => {
  it('accepts the computed checksum in either case', () => {
    expect(verifyChecksum('deadbeef', '20')).toBe(true);
    expect(verifyChecksum('S05', 'B8')).toBe(true);
  });

  it('rejects a payload with one corrupted byte', () => {
    expect(verifyChecksum('deadbeef', '20')).toBe(true);
    expect(verifyChecksum('deadbeff', '20')).toBe(false);
    expect(verifyChecksum('Deadbeef', '20')).toBe(false);
  });

  it('rejects checksum text that is not two hex digits', () => {
    expect(verifyChecksum('g', '6')).toBe(false);
    expect(verifyChecksum('g', 'zz')).toBe(false);
  });
});

describe('framePacket', () => {
  it('wraps the payload in markers and appends the checksum', () => {
    expect(framePacket('g').toString('latin1')).toBe('$g#67');
    expect(framePacket('S05').toString('latin1')).toBe('$S05#b8');
    expect(framePacket('').toString('latin1')).toBe('$#00');
  });

  it('frames raw bytes', () => {
    expect(framePacket(new Uint8Array([0x4f, 0x4b])).toString('latin1')).toBe('$OK#9a');
  });
});
