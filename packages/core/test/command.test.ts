import { describe, it, expect } from 'vitest';
import { ParseError } from '@rsp-stub/shared';
import {
  commandPrefixMatch,
  parseCommand,
  parseContinue,
  scanHex,
} from '../src/rsp/command.ts';

describe('commandPrefixMatch', () => {
  it('matches when a delimiter follows the known name', () => {
    expect(commandPrefixMatch('vCont:12', 'vCont', ':;?')).toBe(true);
    expect(commandPrefixMatch('vCont?', 'vCont', ':;?')).toBe(true);
  });

  it('matches an exact name', () => {
    expect(commandPrefixMatch('vCont', 'vCont', ':;?')).toBe(true);
  });

  it('rejects a longer name that shares the prefix', () => {
    expect(commandPrefixMatch('vContFoo', 'vCont', ':;?')).toBe(false);
  });

  it('rejects shorter or different names', () => {
    expect(commandPrefixMatch('vCon', 'vCont', ':;?')).toBe(false);
    expect(commandPrefixMatch('vKill', 'vCont', ':;?')).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(commandPrefixMatch('QSupported', 'qSupported', ':;?')).toBe(false);
  });
});

describe('scanHex', () => {
  it('reads digits until the first non-hex byte', () => {
    expect(scanHex('m1000,10', 1)).toEqual({ value: 0x1000n, end: 5 });
    expect(scanHex('xFfz', 1)).toEqual({ value: 0xffn, end: 3 });
  });

  it('reports no progress when there are no digits', () => {
    expect(scanHex('m,10', 1)).toEqual({ value: 0n, end: 1 });
  });
});

describe('parseCommand', () => {
  it('parses vCont thread ids in order', () => {
    expect(parseCommand('vCont:000004d2:00001a85')).toEqual({
      type: 'continue',
      threadIds: [1234, 6789],
    });
  });

  it('accepts a literal zero thread id', () => {
    expect(parseCommand('vCont:0')).toEqual({ type: 'continue', threadIds: [0] });
  });

  it('stops at the first byte after an id that is not a colon', () => {
    expect(parseCommand('vCont:1f;c')).toEqual({ type: 'continue', threadIds: [0x1f] });
  });

  it('parses a memory read', () => {
    expect(parseCommand('m1000,10')).toEqual({ type: 'memoryRead', address: 0x1000n, length: 0x10n });
  });

  it('keeps full 64-bit addresses', () => {
    expect(parseCommand('mffffffffffff0000,8')).toEqual({
      type: 'memoryRead',
      address: 0xffffffffffff0000n,
      length: 8n,
    });
  });

  it('recognises the single-letter commands', () => {
    expect(parseCommand('g')).toEqual({ type: 'registerRead' });
    expect(parseCommand('?')).toEqual({ type: 'queryStopReason' });
  });

  it('routes every q and Q packet to query handling', () => {
    expect(parseCommand('qSupported:multiprocess+')).toEqual({
      type: 'querySupported',
      query: 'qSupported:multiprocess+',
    });
    expect(parseCommand('QStartNoAckMode')).toEqual({ type: 'querySupported', query: 'QStartNoAckMode' });
  });

  it('marks anything else unsupported', () => {
    expect(parseCommand('Z0,1000,1')).toEqual({ type: 'unsupported', payload: 'Z0,1000,1' });
    expect(parseCommand('')).toEqual({ type: 'unsupported', payload: '' });
    expect(parseCommand('vContFoo:1')).toEqual({ type: 'unsupported', payload: 'vContFoo:1' });
    expect(parseCommand('vKill;1')).toEqual({ type: 'unsupported', payload: 'vKill;1' });
  });
});

describe('parseContinue errors', () => {
  it('requires a colon after vCont', () => {
    expect(() => parseCommand('vCont')).toThrow(ParseError);
    expect(() => parseCommand('vCont?')).toThrow(ParseError);
    expect(() => parseCommand('vCont;c')).toThrow(ParseError);
  });

  it('rejects an id with no hex digits', () => {
    expect(() => parseCommand('vCont:')).toThrow('Missing thread id at offset 6 in "vCont:"');
    expect(() => parseCommand('vCont:1:')).toThrow(ParseError);
  });

  it('rejects ids wider than 32 bits', () => {
    expect(() => parseCommand('vCont:100000000')).toThrow('Thread id 0x100000000 does not fit in 32 bits');
    expect(parseCommand('vCont:ffffffff')).toEqual({ type: 'continue', threadIds: [0xffffffff] });
  });

  it('rejects more ids than the configured limit', () => {
    expect(parseContinue('vCont:1:2', 2)).toEqual({ type: 'continue', threadIds: [1, 2] });
    expect(() => parseContinue('vCont:1:2:3', 2)).toThrow('More than 2 thread ids in "vCont:1:2:3"');
    expect(() => parseCommand('vCont:1:2:3', { maxThreadIds: 2 })).toThrow(ParseError);
  });
});

describe('parseMemoryRead errors', () => {
  it('rejects malformed arguments', () => {
    expect(() => parseCommand('m')).toThrow('Missing address in "m"');
    expect(() => parseCommand('m1000')).toThrow(`Expected ',' after the address in "m1000"`);
    expect(() => parseCommand('m1000,')).toThrow('Missing length in "m1000,"');
    expect(() => parseCommand('m1000,4x')).toThrow('Unexpected "x" after the length in "m1000,4x"');
  });

  it('rejects values wider than 64 bits', () => {
    expect(() => parseCommand('m10000000000000000,1')).toThrow(ParseError);
  });
});
