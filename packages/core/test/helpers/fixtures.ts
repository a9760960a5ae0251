import { ImageBackend } from '../../src/image/image-backend.ts';
import type { TargetImage } from '../../src/image/target-image.ts';

export function x86Image(overrides: Partial<TargetImage> = {}): TargetImage {
  return {
    arch: 'x86',
    registers: {
      eax: 1n,
      ebx: 2n,
      ecx: 3n,
      edx: 4n,
      esi: 5n,
      edi: 6n,
      ebp: 7n,
      esp: 8n,
      eip: 0x401000n,
      eflags: 0x246n,
    },
    memory: [
      { address: 0x1000n, data: Buffer.from([0xde, 0xad, 0xbe, 0xef]) },
      { address: 0x2000n, data: Buffer.from([1, 2, 3, 4, 5]) },
    ],
    stopSignal: 5,
    threads: [],
    ...overrides,
  };
}

export const X86_REGISTER_DUMP =
  '01000000020000000300000004000000050000000600000007000000080000000010400046020000';

export function x86Backend(overrides: Partial<TargetImage> = {}): ImageBackend {
  return new ImageBackend(x86Image(overrides));
}
