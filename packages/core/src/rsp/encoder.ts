import { EncodeError, toHex, toHex8, toHexWord } from '@rsp-stub/shared';
import type { MemoryBlock, RegisterLayout, RegisterSnapshot, StopReason } from '../types.ts';

/** `S<signal>` */
export function encodeStopReason(reason: StopReason): string {
  switch (reason.kind) {
    case 'signal':
      if (!Number.isInteger(reason.signal) || reason.signal < 0 || reason.signal > 0xff) {
        throw new EncodeError(`Signal ${reason.signal} does not fit in one byte`);
      }
      return `S${toHex8(reason.signal)}`;
    default:
      throw new EncodeError(`Stop reason "${reason.kind}" has no encoding`);
  }
}

/**
 * Concatenate the registers in layout order, each as `width / 4` hex digits in
 * the layout's byte order.
 */
export function encodeRegisters(snapshot: RegisterSnapshot, layout: RegisterLayout): string {
  const byteWidth = layout.width / 8;
  const limit = 1n << BigInt(layout.width);
  let out = '';
  for (const name of layout.names) {
    const value = snapshot[name];
    if (value === undefined) {
      throw new EncodeError(`Register snapshot has no value for ${name}`);
    }
    if (value < 0n || value >= limit) {
      throw new EncodeError(`${name} = 0x${value.toString(16)} does not fit in ${layout.width} bits`);
    }
    out += toHexWord(value, byteWidth, layout.byteOrder);
  }
  return out;
}

/** Two hex digits per byte, in memory order. */
export function encodeMemory(block: MemoryBlock, maxPayload: number): string {
  if (block.data.length * 2 > maxPayload) {
    throw new EncodeError(
      `${block.data.length} bytes at 0x${block.address.toString(16)} need ${block.data.length * 2} hex digits, packet holds ${maxPayload}`,
    );
  }
  return toHex(block.data);
}
