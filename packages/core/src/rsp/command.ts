import { ParseError, isHexDigit } from '@rsp-stub/shared';

export type Command =
  | { type: 'continue'; threadIds: number[] }
  | { type: 'registerRead' }
  | { type: 'memoryRead'; address: bigint; length: bigint }
  | { type: 'queryStopReason' }
  | { type: 'querySupported'; query: string }
  | { type: 'unsupported'; payload: string };

export type CommandType = Command['type'];

export const MULTI_LETTER_PREFIX = 'v';
export const MULTI_LETTER_DELIMITERS = ':;?';
export const QUERY_DELIMITERS = ':;?';
export const MULTI_LETTER_COMMANDS = ['vCont'] as const;

export const DEFAULT_MAX_THREAD_IDS = 64;

const U32_MAX = 0xffff_ffffn;
const U64_MAX = 0xffff_ffff_ffff_ffffn;

export interface ParseOptions {
  maxThreadIds?: number;
}

/**
 * `received` matches `known` when it starts with it and either ends there or
 * continues with one of `delimiters`, so `vContFoo` never matches `vCont`.
 */
export function commandPrefixMatch(received: string, known: string, delimiters: string): boolean {
  if (!received.startsWith(known)) return false;
  if (received.length === known.length) return true;
  return delimiters.includes(received.charAt(known.length));
}

interface HexScan {
  value: bigint;
  end: number;
}

/** Read hex digits from `start`; `end === start` when there were none. */
export function scanHex(text: string, start: number): HexScan {
  let end = start;
  while (end < text.length && isHexDigit(text.charCodeAt(end))) end++;
  return {
    value: end === start ? 0n : BigInt(`0x${text.slice(start, end)}`),
    end,
  };
}

export function parseCommand(payload: string, options: ParseOptions = {}): Command {
  switch (payload.charAt(0)) {
    case MULTI_LETTER_PREFIX:
      return parseMultiLetter(payload, options);
    case 'q':
    case 'Q':
      return { type: 'querySupported', query: payload };
    case 'g':
      return { type: 'registerRead' };
    case 'm':
      return parseMemoryRead(payload);
    case '?':
      return { type: 'queryStopReason' };
    default:
      return { type: 'unsupported', payload };
  }
}

function parseMultiLetter(payload: string, options: ParseOptions): Command {
  const name = MULTI_LETTER_COMMANDS.find((known) =>
    commandPrefixMatch(payload, known, MULTI_LETTER_DELIMITERS),
  );
  switch (name) {
    case 'vCont':
      return parseContinue(payload, options.maxThreadIds ?? DEFAULT_MAX_THREAD_IDS);
    case undefined:
      return { type: 'unsupported', payload };
  }
}

/** `vCont:<tid>[:<tid>...]`, thread ids in hex. */
export function parseContinue(payload: string, maxThreadIds = DEFAULT_MAX_THREAD_IDS): Command {
  let cursor = 'vCont'.length;
  if (payload.charAt(cursor) !== ':') {
    throw new ParseError(`Expected ':' after vCont in "${payload}"`);
  }

  const threadIds: number[] = [];
  while (payload.charAt(cursor) === ':') {
    cursor++;
    const { value, end } = scanHex(payload, cursor);
    if (end === cursor) {
      throw new ParseError(`Missing thread id at offset ${cursor} in "${payload}"`);
    }
    if (value > U32_MAX) {
      throw new ParseError(`Thread id 0x${value.toString(16)} does not fit in 32 bits`);
    }
    if (threadIds.length >= maxThreadIds) {
      throw new ParseError(`More than ${maxThreadIds} thread ids in "${payload}"`);
    }
    threadIds.push(Number(value));
    cursor = end;
  }

  return { type: 'continue', threadIds };
}

/** `m<addr>,<length>`, both hex. */
export function parseMemoryRead(payload: string): Command {
  const address = scanHex(payload, 1);
  if (address.end === 1) {
    throw new ParseError(`Missing address in "${payload}"`);
  }
  if (payload.charAt(address.end) !== ',') {
    throw new ParseError(`Expected ',' after the address in "${payload}"`);
  }
  const length = scanHex(payload, address.end + 1);
  if (length.end === address.end + 1) {
    throw new ParseError(`Missing length in "${payload}"`);
  }
  if (length.end !== payload.length) {
    throw new ParseError(`Unexpected "${payload.slice(length.end)}" after the length in "${payload}"`);
  }
  if (address.value > U64_MAX || length.value > U64_MAX) {
    throw new ParseError(`Address or length in "${payload}" does not fit in 64 bits`);
  }
  return { type: 'memoryRead', address: address.value, length: length.value };
}
