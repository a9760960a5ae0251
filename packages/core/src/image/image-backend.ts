import { BackendError, MemoryAccessError, TruncatedReadError } from '@rsp-stub/shared';
import { DebugBackend } from '../backend.ts';
import { layoutFor } from '../registers.ts';
import type { Arch, MemoryBlock, RegisterLayout, RegisterSnapshot, StopReason } from '../types.ts';
import { loadTargetImage } from './target-image.ts';
import type { MemoryRegion, TargetImage } from './target-image.ts';

/** Backend over a static target image. Resuming records the request; nothing runs. */
export class ImageBackend extends DebugBackend {
  readonly layout: RegisterLayout;
  private readonly image: TargetImage;
  private stopReason: StopReason;
  private resumed: readonly number[] = [];

  constructor(image: TargetImage) {
    super();
    this.image = image;
    this.layout = layoutFor(image.arch);
    this.stopReason = { kind: 'signal', signal: image.stopSignal };
  }

  static fromFile(filePath: string, fallbackArch?: Arch): ImageBackend {
    return new ImageBackend(loadTargetImage(filePath, fallbackArch));
  }

  /** Thread ids from the last resume request; empty means all threads. */
  get resumedThreads(): readonly number[] {
    return this.resumed;
  }

  setStopReason(reason: StopReason): void {
    this.stopReason = reason;
  }

  async resume(threadIds: readonly number[]): Promise<void> {
    const { threads } = this.image;
    if (threads.length > 0) {
      const unknown = threadIds.filter((id) => !threads.includes(id));
      if (unknown.length > 0) {
        throw new BackendError(`Unknown thread id(s): ${unknown.map((id) => id.toString(16)).join(', ')}`);
      }
    }
    this.resumed = [...threadIds];
    this.emit('resume', this.resumed);
  }

  async registerSnapshot(): Promise<RegisterSnapshot> {
    return { ...this.image.registers };
  }

  async readMemory(address: bigint, length: bigint): Promise<MemoryBlock> {
    const region = this.regionAt(address);
    if (!region) throw new MemoryAccessError(address);

    const offset = address - region.address;
    const available = BigInt(region.data.length) - offset;
    if (length > available) {
      throw new TruncatedReadError(address, length, available);
    }

    const start = Number(offset);
    return { address, data: region.data.subarray(start, start + Number(length)) };
  }

  async lastStopReason(): Promise<StopReason> {
    return this.stopReason;
  }

  private regionAt(address: bigint): MemoryRegion | undefined {
    return this.image.memory.find(
      (region) => address >= region.address && address < region.address + BigInt(region.data.length),
    );
  }
}
