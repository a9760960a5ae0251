import {
  BackendError,
  ConnectionClosedError,
  EncodeError,
  MemoryAccessError,
  ParseError,
  TruncatedReadError,
  silentLogger,
  toHex8,
} from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import type { DebugBackend } from '../backend.ts';
import type { RetryPolicy } from '../types.ts';
import type { Transport } from './transport.ts';
import { DEFAULT_MAX_PACKET_SIZE, PacketCodec } from './packet-codec.ts';
import { CommandDispatcher } from './dispatcher.ts';
import type { BackendCommand } from './dispatcher.ts';
import { encodeMemory, encodeRegisters, encodeStopReason } from './encoder.ts';

export interface StubSessionOptions {
  maxThreadIds?: number;
  retry?: RetryPolicy;
  logger?: Logger;
  /** Wait for the debugger's opening `+` before reading commands. */
  awaitInitialAck?: boolean;
}

const EFAULT = 0x0e;
const EIO = 0x05;
const EGENERIC = 0x01;

export function errorReply(err: BackendError): string {
  if (err instanceof MemoryAccessError) return `E${toHex8(EFAULT)}`;
  if (err instanceof TruncatedReadError) return `E${toHex8(EIO)}`;
  return `E${toHex8(EGENERIC)}`;
}

/** Serves one debugger connection against one backend, a request at a time. */
export class StubSession {
  readonly codec: PacketCodec;
  readonly dispatcher: CommandDispatcher;
  private readonly backend: DebugBackend;
  private readonly awaitInitialAck: boolean;
  private readonly logger: Logger;

  constructor(transport: Transport, backend: DebugBackend, options: StubSessionOptions = {}) {
    this.backend = backend;
    this.awaitInitialAck = options.awaitInitialAck ?? false;
    this.logger = options.logger ?? silentLogger;
    this.codec = new PacketCodec(transport, { retry: options.retry, logger: this.logger });
    this.dispatcher = new CommandDispatcher(this.codec, {
      maxThreadIds: options.maxThreadIds,
      logger: this.logger,
    });
  }

  /** Largest reply payload that still fits the advertised `PacketSize`. */
  get maxPayload(): number {
    return DEFAULT_MAX_PACKET_SIZE - 1;
  }

  /**
   * Serve requests until the peer goes away. Resolves on a clean close and
   * rejects on any other transport failure.
   */
  async run(): Promise<void> {
    try {
      if (this.awaitInitialAck) await this.codec.waitForAck();
      for (;;) {
        await this.step();
      }
    } catch (err) {
      if (err instanceof ConnectionClosedError) {
        this.logger.info('Debugger disconnected');
        return;
      }
      throw err;
    }
  }

  /** Receive one request and answer it. */
  async step(): Promise<void> {
    const payload = (await this.codec.receivePayload(DEFAULT_MAX_PACKET_SIZE)).toString('latin1');

    let command: BackendCommand;
    try {
      const result = await this.dispatcher.dispatch(payload);
      if (result.kind !== 'backend') return;
      command = result.command;
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      this.logger.warn(err.message);
      await this.codec.send('');
      return;
    }

    const reply = await this.execute(command);
    if (reply !== null) await this.codec.send(reply);
  }

  /** Returns the reply payload, or null when the command has none. */
  private async execute(command: BackendCommand): Promise<string | null> {
    try {
      switch (command.type) {
        case 'continue':
          await this.backend.resume(command.threadIds);
          return null;
        case 'registerRead':
          return encodeRegisters(await this.backend.registerSnapshot(), this.backend.layout);
        case 'memoryRead':
          if (2n * command.length > BigInt(this.maxPayload)) {
            this.logger.warn(`Memory read of 0x${command.length.toString(16)} bytes does not fit one reply`);
            return '';
          }
          return encodeMemory(
            await this.backend.readMemory(command.address, command.length),
            this.maxPayload,
          );
        case 'queryStopReason':
          return encodeStopReason(await this.backend.lastStopReason());
      }
    } catch (err) {
      if (err instanceof EncodeError) {
        this.logger.warn(`Cannot encode reply to ${command.type}: ${err.message}`);
        return '';
      }
      if (err instanceof BackendError) {
        this.logger.warn(`Backend failed ${command.type}: ${err.message}`);
        return errorReply(err);
      }
      throw err;
    }
  }
}
