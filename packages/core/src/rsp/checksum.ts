import { toHex8 } from '@rsp-stub/shared';

export const PACKET_START = 0x24; // $
export const PACKET_END = 0x23; // #
export const ACK = 0x2b; // +
export const NAK = 0x2d; // -

function toBytes(payload: string | Uint8Array): Uint8Array {
  return typeof payload === 'string' ? Buffer.from(payload, 'latin1') : payload;
}

/** Unsigned 8-bit sum of the payload bytes. */
export function computeChecksum(payload: string | Uint8Array): number {
  let sum = 0;
  for (const byte of toBytes(payload)) {
    sum = (sum + byte) & 0xff;
  }
  return sum;
}

export function formatChecksum(checksum: number): string {
  return toHex8(checksum);
}

export function verifyChecksum(payload: string | Uint8Array, checksumText: string): boolean {
  if (!/^[0-9a-fA-F]{2}$/.test(checksumText)) return false;
  return parseInt(checksumText, 16) === computeChecksum(payload);
}

/** `$<payload>#<cc>` */
export function framePacket(payload: string | Uint8Array): Buffer {
  const bytes = toBytes(payload);
  return Buffer.concat([
    Buffer.from([PACKET_START]),
    bytes,
    Buffer.from(`#${formatChecksum(computeChecksum(bytes))}`, 'latin1'),
  ]);
}
