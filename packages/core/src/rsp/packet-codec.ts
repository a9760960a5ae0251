import {
  ChecksumMismatchError,
  MalformedPacketError,
  RetryExhaustedError,
  TransportError,
  errorMessage,
  silentLogger,
} from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import type { RetryPolicy } from '../types.ts';
import type { Transport } from './transport.ts';
import {
  ACK,
  NAK,
  PACKET_END,
  PACKET_START,
  computeChecksum,
  framePacket,
  verifyChecksum,
} from './checksum.ts';

/** Buffer size for one incoming frame, markers and checksum included. */
export const DEFAULT_MAX_PACKET_SIZE = 0x4000;

export const UNBOUNDED_RETRY: RetryPolicy = { maxAttempts: null, ackTimeoutMs: null };

export interface PacketCodecOptions {
  retry?: RetryPolicy;
  logger?: Logger;
}

/**
 * Frames, checksums and acknowledges RSP packets on a transport. One packet
 * is in flight at a time.
 */
export class PacketCodec {
  readonly transport: Transport;
  readonly retry: RetryPolicy;
  private readonly logger: Logger;

  constructor(transport: Transport, options: PacketCodecOptions = {}) {
    this.transport = transport;
    this.retry = options.retry ?? UNBOUNDED_RETRY;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Transmit `payload` and wait for `+`, retransmitting the same frame on
   * anything else. Resolves with the number of transmissions it took.
   */
  async send(payload: string | Uint8Array): Promise<number> {
    const packet = framePacket(payload);
    const { maxAttempts } = this.retry;

    for (let attempt = 1; ; attempt++) {
      this.logger.debug(`-> ${packet.toString('latin1')}`);
      const written = await this.transport.writeAll(packet);
      if (written !== packet.length) {
        throw new TransportError(`Short write: sent ${written} of ${packet.length} bytes`);
      }
      if (await this.readAck()) return attempt;
      if (maxAttempts !== null && attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt);
      }
      this.logger.debug(`packet not acknowledged, retransmitting (attempt ${attempt + 1})`);
    }
  }

  /**
   * Read one frame and acknowledge it. Throws `MalformedPacketError` or
   * `ChecksumMismatchError` after answering `-`; either way the whole frame
   * has been consumed.
   */
  async receive(maxLength = DEFAULT_MAX_PACKET_SIZE): Promise<Buffer> {
    const raw: number[] = [];
    for (;;) {
      const byte = await this.transport.readByte();
      if (byte === PACKET_END) break;
      raw.push(byte);
      if (raw.length >= maxLength) {
        await this.sendAck(false);
        await this.discardFrame();
        throw new MalformedPacketError(`Packet exceeds ${maxLength} bytes without a terminator`);
      }
    }

    const checksumText = (await this.transport.readExact(2)).toString('latin1');

    if (raw[0] !== PACKET_START) {
      await this.sendAck(false);
      throw new MalformedPacketError(
        `Packet does not start with '$': ${Buffer.from(raw).toString('latin1')}#${checksumText}`,
      );
    }

    const payload = Buffer.from(raw.slice(1));
    if (!verifyChecksum(payload, checksumText)) {
      await this.sendAck(false);
      throw new ChecksumMismatchError(computeChecksum(payload), checksumText);
    }

    await this.sendAck(true);
    this.logger.debug(`<- $${payload.toString('latin1')}#${checksumText}`);
    return payload;
  }

  /** Like `receive`, but keeps reading past frames it has already rejected. */
  async receivePayload(maxLength = DEFAULT_MAX_PACKET_SIZE): Promise<Buffer> {
    for (;;) {
      try {
        return await this.receive(maxLength);
      } catch (err) {
        if (err instanceof ChecksumMismatchError || err instanceof MalformedPacketError) {
          this.logger.warn(`Rejected packet: ${err.message}`);
          continue;
        }
        throw err;
      }
    }
  }

  /** Consume bytes until the peer sends `+`. */
  async waitForAck(): Promise<void> {
    while ((await this.transport.readByte()) !== ACK) {
      // skip
    }
  }

  /** Drop the rest of a frame: everything through `#` and its checksum digits. */
  private async discardFrame(): Promise<void> {
    while ((await this.transport.readByte()) !== PACKET_END) {
      // skip
    }
    await this.transport.readExact(2);
  }

  private async sendAck(accepted: boolean): Promise<void> {
    await this.transport.writeAll(Buffer.from([accepted ? ACK : NAK]));
  }

  private async readAck(): Promise<boolean> {
    try {
      const byte = await this.transport.readByte({ timeoutMs: this.retry.ackTimeoutMs });
      return byte === ACK;
    } catch (err) {
      if (!(err instanceof TransportError)) throw err;
      this.logger.debug(`acknowledgment read failed: ${errorMessage(err)}`);
      return false;
    }
  }
}
