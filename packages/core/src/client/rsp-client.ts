import { createConnection } from 'node:net';
import type { Socket } from 'node:net';
import { ProtocolError, TransportError, silentLogger } from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import { PacketCodec } from '../rsp/packet-codec.ts';
import { SocketTransport } from '../rsp/transport.ts';
import type { RegisterLayout, RegisterSnapshot, RetryPolicy, StopReason } from '../types.ts';

const CHUNK_SIZE = 0x1000n;

export interface RspClientOptions {
  retry?: RetryPolicy;
  logger?: Logger;
}

/** Parse a `g` reply back into named registers. */
export function decodeRegisters(hex: string, layout: RegisterLayout): RegisterSnapshot {
  const digits = layout.width / 4;
  if (hex.length !== digits * layout.names.length) {
    throw new ProtocolError(
      `Register dump has ${hex.length} hex digits, ${layout.arch} needs ${digits * layout.names.length}`,
    );
  }
  const regs: Record<string, bigint> = {};
  layout.names.forEach((name, i) => {
    const bytes = Buffer.from(hex.slice(i * digits, (i + 1) * digits), 'hex');
    if (layout.byteOrder === 'little') bytes.reverse();
    regs[name] = BigInt(`0x${bytes.toString('hex')}`);
  });
  return regs;
}

export function parseStopReply(reply: string): StopReason {
  const match = /^S([0-9a-fA-F]{2})$/.exec(reply);
  if (!match?.[1]) {
    throw new ProtocolError(`Unexpected stop reply: "${reply}"`);
  }
  return { kind: 'signal', signal: parseInt(match[1], 16) };
}

/** Debugger side of the wire, for probing a running stub. */
export class RspClient {
  private socket: Socket | null = null;
  private codec: PacketCodec | null = null;
  private readonly options: RspClientOptions;
  readonly host: string;
  readonly port: number;

  constructor(host = '127.0.0.1', port = 1234, options: RspClientOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = options;
  }

  async connect(): Promise<void> {
    const socket = await new Promise<Socket>((resolve, reject) => {
      const s = createConnection({ host: this.host, port: this.port });
      s.once('connect', () => resolve(s));
      s.once('error', (err) => {
        reject(new TransportError(`RSP connection error: ${err.message}`, { cause: err }));
      });
    });
    this.socket = socket;
    const transport = new SocketTransport(socket);
    this.codec = new PacketCodec(transport, {
      retry: this.options.retry,
      logger: this.options.logger ?? silentLogger,
    });
    // The opening acknowledgment a stub waits for.
    await transport.writeAll(Buffer.from('+'));
  }

  async command(payload: string): Promise<string> {
    const codec = this.requireCodec();
    await codec.send(payload);
    return (await codec.receivePayload()).toString('latin1');
  }

  async querySupported(features: string[] = []): Promise<string> {
    return this.command(features.length > 0 ? `qSupported:${features.join(';')}` : 'qSupported');
  }

  async readRegisters(layout: RegisterLayout): Promise<RegisterSnapshot> {
    const resp = await this.command('g');
    if (resp.startsWith('E') || resp.length === 0) {
      throw new ProtocolError(`Register read failed: "${resp}"`);
    }
    return decodeRegisters(resp, layout);
  }

  async readMemory(address: bigint, length: bigint): Promise<Buffer> {
    const result: Buffer[] = [];
    for (let offset = 0n; offset < length; offset += CHUNK_SIZE) {
      const remaining = length - offset < CHUNK_SIZE ? length - offset : CHUNK_SIZE;
      const at = address + offset;
      const resp = await this.command(`m${at.toString(16)},${remaining.toString(16)}`);
      if (resp.startsWith('E') || (resp.length === 0 && remaining > 0n)) {
        throw new ProtocolError(`Memory read error at 0x${at.toString(16)}: "${resp}"`);
      }
      result.push(Buffer.from(resp, 'hex'));
    }
    return Buffer.concat(result);
  }

  async stopReason(): Promise<StopReason> {
    return parseStopReply(await this.command('?'));
  }

  /** `vCont` has no reply; this resolves once the stub acknowledged the packet. */
  async resume(threadIds: readonly number[]): Promise<void> {
    if (threadIds.length === 0) {
      throw new ProtocolError('vCont needs at least one thread id');
    }
    const ids = threadIds.map((id) => `:${id.toString(16)}`).join('');
    await this.requireCodec().send(`vCont${ids}`);
  }

  close(): void {
    this.socket?.destroy();
    this.socket = null;
    this.codec = null;
  }

  private requireCodec(): PacketCodec {
    if (!this.codec) throw new TransportError('RSP client not connected');
    return this.codec;
  }
}
