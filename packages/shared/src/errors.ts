export class StubError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Byte stream failures. Fatal to the current connection.
export class TransportError extends StubError {}

export class ConnectionClosedError extends TransportError {
  constructor(message = 'Connection closed by peer') {
    super(message);
  }
}

export class TimeoutError extends TransportError {}

export class RetryExhaustedError extends TransportError {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Packet not acknowledged after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

// Wire-level and grammar failures. Recoverable: the connection stays up.
export class ProtocolError extends StubError {}

export class ChecksumMismatchError extends ProtocolError {
  readonly expected: number;
  readonly received: string;

  constructor(expected: number, received: string) {
    super(`Checksum mismatch: computed ${expected.toString(16).padStart(2, '0')}, packet carries "${received}"`);
    this.expected = expected;
    this.received = received;
  }
}

export class MalformedPacketError extends ProtocolError {}

export class ParseError extends ProtocolError {}

export class EncodeError extends ProtocolError {}

// Surfaced by a debug backend. The engine answers with an error reply and keeps going.
export class BackendError extends StubError {}

export class MemoryAccessError extends BackendError {
  readonly address: bigint;

  constructor(address: bigint, message = `Memory at 0x${address.toString(16)} is not accessible`) {
    super(message);
    this.address = address;
  }
}

export class TruncatedReadError extends BackendError {
  readonly address: bigint;
  readonly requested: bigint;
  readonly available: bigint;

  constructor(address: bigint, requested: bigint, available: bigint) {
    super(
      `Read of 0x${requested.toString(16)} bytes at 0x${address.toString(16)} truncated to 0x${available.toString(16)}`,
    );
    this.address = address;
    this.requested = requested;
    this.available = available;
  }
}

export class ConfigError extends StubError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
