export {
  StubError,
  TransportError,
  ConnectionClosedError,
  TimeoutError,
  RetryExhaustedError,
  ProtocolError,
  ChecksumMismatchError,
  MalformedPacketError,
  ParseError,
  EncodeError,
  BackendError,
  MemoryAccessError,
  TruncatedReadError,
  ConfigError,
  errorMessage,
} from './errors.ts';

export { toHex8, toHex, toHexWord, fromHex, isHexDigit, hexDump } from './hex.ts';

export type { Logger, LoggerOptions } from './logger.ts';
export { createLogger, silentLogger } from './logger.ts';
