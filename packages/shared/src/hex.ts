export function toHex8(value: number): string {
  return (value & 0xff).toString(16).padStart(2, '0');
}

export function toHex(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('hex');
}

export function isHexDigit(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) ||
    (code >= 0x41 && code <= 0x46) ||
    (code >= 0x61 && code <= 0x66)
  );
}

export function fromHex(hex: string): Buffer {
  const clean = hex.replace(/\s+/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error(`Invalid hex string: "${hex}"`);
  }
  return Buffer.from(clean, 'hex');
}

/**
 * Render `value` as `byteWidth` bytes in the given byte order, two hex digits
 * per byte. The caller checks that the value fits.
 */
export function toHexWord(value: bigint, byteWidth: number, byteOrder: 'little' | 'big'): string {
  const bytes = new Uint8Array(byteWidth);
  let rest = value;
  for (let i = 0; i < byteWidth; i++) {
    const index = byteOrder === 'little' ? i : byteWidth - 1 - i;
    bytes[index] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return toHex(bytes);
}

export function hexDump(data: Uint8Array, bytesPerLine = 16): string {
  const lines: string[] = [];
  for (let i = 0; i < data.length; i += bytesPerLine) {
    const slice = data.subarray(i, Math.min(i + bytesPerLine, data.length));
    const hex: string[] = [];
    let ascii = '';
    for (const byte of slice) {
      hex.push(toHex8(byte));
      ascii += byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : '.';
    }
    lines.push(`${i.toString(16).padStart(8, '0')}  ${hex.join(' ').padEnd(bytesPerLine * 3 - 1)}  ${ascii}`);
  }
  return lines.join('\n');
}
