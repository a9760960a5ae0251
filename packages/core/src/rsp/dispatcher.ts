import { silentLogger } from '@rsp-stub/shared';
import type { Logger } from '@rsp-stub/shared';
import type { PacketCodec } from './packet-codec.ts';
import {
  QUERY_DELIMITERS,
  commandPrefixMatch,
  parseCommand,
} from './command.ts';
import type { Command } from './command.ts';

export const SUPPORTED_QUERY = 'qSupported';
export const SUPPORTED_FEATURES = 'PacketSize=3fff;multiprocess+;vContSupported+';

/** Commands that need the debug backend to answer. */
export type BackendCommand = Extract<
  Command,
  { type: 'continue' | 'registerRead' | 'memoryRead' | 'queryStopReason' }
>;

export type DispatchResult =
  | { kind: 'backend'; command: BackendCommand }
  | { kind: 'resolved'; command: Extract<Command, { type: 'querySupported' }>; reply: string }
  | { kind: 'unsupported'; command: Extract<Command, { type: 'unsupported' }> };

export interface DispatcherOptions {
  maxThreadIds?: number;
  logger?: Logger;
}

export function isSupportedQuery(query: string): boolean {
  return commandPrefixMatch(query, SUPPORTED_QUERY, QUERY_DELIMITERS);
}

/**
 * Turns payloads into commands. Queries and unsupported commands are answered
 * here; everything else goes back to the caller for the backend.
 * Throws `ParseError` when arguments don't fit the grammar.
 */
export class CommandDispatcher {
  private readonly codec: PacketCodec;
  private readonly maxThreadIds: number | undefined;
  private readonly logger: Logger;

  constructor(codec: PacketCodec, options: DispatcherOptions = {}) {
    this.codec = codec;
    this.maxThreadIds = options.maxThreadIds;
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(payload: string): Promise<DispatchResult> {
    const command = parseCommand(payload, { maxThreadIds: this.maxThreadIds });

    switch (command.type) {
      case 'querySupported': {
        const reply = isSupportedQuery(command.query) ? SUPPORTED_FEATURES : '';
        await this.codec.send(reply);
        return { kind: 'resolved', command, reply };
      }
      case 'unsupported':
        this.logger.debug(`unsupported command: ${payload}`);
        await this.codec.send('');
        return { kind: 'unsupported', command };
      default:
        return { kind: 'backend', command };
    }
  }
}
