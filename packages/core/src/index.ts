// Types
export type {
  Arch,
  ByteOrder,
  RegisterLayout,
  RegisterSnapshot,
  MemoryBlock,
  StopReason,
  RetryPolicy,
  StubOptions,
} from './types.ts';

// Register layouts
export { REGISTER_LAYOUTS, ARCHES, isArch, layoutFor } from './registers.ts';

// Abstract backend
export { DebugBackend } from './backend.ts';

// Protocol engine
export {
  PACKET_START,
  PACKET_END,
  ACK,
  NAK,
  computeChecksum,
  formatChecksum,
  verifyChecksum,
  framePacket,
} from './rsp/checksum.ts';
export type { Transport, ReadOptions } from './rsp/transport.ts';
export { SocketTransport } from './rsp/transport.ts';
export { PacketCodec, DEFAULT_MAX_PACKET_SIZE, UNBOUNDED_RETRY } from './rsp/packet-codec.ts';
export type { PacketCodecOptions } from './rsp/packet-codec.ts';
export type { Command, CommandType, ParseOptions } from './rsp/command.ts';
export {
  commandPrefixMatch,
  parseCommand,
  parseContinue,
  parseMemoryRead,
  scanHex,
  DEFAULT_MAX_THREAD_IDS,
  MULTI_LETTER_COMMANDS,
} from './rsp/command.ts';
export {
  CommandDispatcher,
  SUPPORTED_FEATURES,
  SUPPORTED_QUERY,
  isSupportedQuery,
} from './rsp/dispatcher.ts';
export type { BackendCommand, DispatchResult, DispatcherOptions } from './rsp/dispatcher.ts';
export { encodeStopReason, encodeRegisters, encodeMemory } from './rsp/encoder.ts';
export { StubSession, errorReply } from './rsp/session.ts';
export type { StubSessionOptions } from './rsp/session.ts';

// TCP server and client
export { StubServer } from './server/stub-server.ts';
export type { StubServerOptions } from './server/stub-server.ts';
export { RspClient, decodeRegisters, parseStopReply } from './client/rsp-client.ts';
export type { RspClientOptions } from './client/rsp-client.ts';

// Image backend
export { ImageBackend } from './image/image-backend.ts';
export type { TargetImage, MemoryRegion } from './image/target-image.ts';
export { parseTargetImage, loadTargetImage, DEFAULT_STOP_SIGNAL } from './image/target-image.ts';

// Config
export type { ProjectConfig } from './config/project-config.ts';
export {
  CONFIG_FILENAME,
  DEFAULT_STUB_OPTIONS,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
  resolveStubOptions,
} from './config/project-config.ts';
