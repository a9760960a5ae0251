import { EventEmitter } from 'node:events';
import type { MemoryBlock, RegisterLayout, RegisterSnapshot, StopReason } from './types.ts';

/**
 * What the protocol engine needs from the debugged target. Implementations own
 * the target; the engine only asks and never keeps what it gets back.
 */
export abstract class DebugBackend extends EventEmitter {
  abstract readonly layout: RegisterLayout;

  /** Resume execution, limited to `threadIds` when the list is non-empty. */
  abstract resume(threadIds: readonly number[]): Promise<void>;

  abstract registerSnapshot(): Promise<RegisterSnapshot>;

  /**
   * Throws `MemoryAccessError` when the range starts in unmapped memory and
   * `TruncatedReadError` when only a prefix of it could be read.
   */
  abstract readMemory(address: bigint, length: bigint): Promise<MemoryBlock>;

  abstract lastStopReason(): Promise<StopReason>;
}
