import type { Socket } from 'node:net';
import { ConnectionClosedError, TimeoutError, TransportError } from '@rsp-stub/shared';

export interface ReadOptions {
  /** Reject with `TimeoutError` if nothing arrives in time; null or absent waits forever. */
  timeoutMs?: number | null;
}

/**
 * A single bidirectional byte stream. Reads settle only once the requested
 * bytes are there, so callers see the stream as blocking.
 */
export interface Transport {
  readByte(options?: ReadOptions): Promise<number>;
  readExact(length: number, options?: ReadOptions): Promise<Buffer>;
  /** Resolves with the number of bytes handed to the peer. */
  writeAll(data: Uint8Array): Promise<number>;
  close(): void;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout | null;
}

export class SocketTransport implements Transport {
  private readonly socket: Socket;
  private buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: TransportError | null = null;

  constructor(socket: Socket) {
    this.socket = socket;
    this.socket.on('data', (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.drain();
    });
    this.socket.on('error', (err) => {
      this.fail(new TransportError(`Socket error: ${err.message}`, { cause: err }));
    });
    this.socket.once('close', () => {
      this.fail(new ConnectionClosedError());
    });
  }

  async readByte(options?: ReadOptions): Promise<number> {
    const data = await this.readExact(1, options);
    return data.readUInt8(0);
  }

  readExact(length: number, options: ReadOptions = {}): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new TransportError('A read is already in progress on this connection'));
    }
    if (this.buffer.length >= length) {
      return Promise.resolve(this.take(length));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const timeoutMs = options.timeoutMs ?? null;
      const timer = timeoutMs === null
        ? null
        : setTimeout(() => {
          this.pending = null;
          reject(new TimeoutError(`No data within ${timeoutMs}ms`));
        }, timeoutMs);
      this.pending = { length, resolve, reject, timer };
    });
  }

  writeAll(data: Uint8Array): Promise<number> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(new TransportError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve(data.length);
        }
      });
    });
  }

  close(): void {
    this.socket.destroy();
  }

  private take(length: number): Buffer {
    const data = this.buffer.subarray(0, length);
    this.buffer = this.buffer.subarray(length);
    return data;
  }

  private drain(): void {
    const { pending } = this;
    if (!pending || this.buffer.length < pending.length) return;
    this.pending = null;
    if (pending.timer) clearTimeout(pending.timer);
    pending.resolve(this.take(pending.length));
  }

  private fail(err: TransportError): void {
    this.failure ??= err;
    const { pending } = this;
    if (!pending) return;
    this.pending = null;
    if (pending.timer) clearTimeout(pending.timer);
    pending.reject(this.failure);
  }
}
