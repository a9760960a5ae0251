export type Arch = 'x86' | 'x64';

export type ByteOrder = 'little' | 'big';

/** Order and width of the registers in a `g` reply for one target. */
export interface RegisterLayout {
  arch: Arch;
  width: 32 | 64;
  byteOrder: ByteOrder;
  names: readonly string[];
}

/** Register values by name, captured at a stop point. */
export type RegisterSnapshot = Readonly<Record<string, bigint>>;

export interface MemoryBlock {
  address: bigint;
  data: Uint8Array;
}

export type StopReason =
  | { kind: 'signal'; signal: number }
  | { kind: 'exited'; code: number }
  | { kind: 'terminated'; signal: number };

export interface RetryPolicy {
  /** Total transmissions of one frame before giving up; null retries forever. */
  maxAttempts: number | null;
  /** How long to wait for an acknowledgment byte; null waits forever. */
  ackTimeoutMs: number | null;
}

export interface StubOptions {
  host: string;
  port: number;
  arch: Arch;
  maxThreadIds: number;
  retry: RetryPolicy;
}
