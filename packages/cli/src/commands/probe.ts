import type { Argv, CommandModule } from 'yargs';
import { ARCHES, RspClient, layoutFor } from '@rsp-stub/core';
import type { RegisterLayout, RegisterSnapshot } from '@rsp-stub/core';
import { hexDump } from '@rsp-stub/shared';
import {
  optionalArch,
  optionalNumber,
  optionalString,
  parseNumber,
  resolveContext,
} from '../context.ts';

function formatRegisters(regs: RegisterSnapshot, layout: RegisterLayout): string {
  const digits = layout.width / 4;
  return layout.names
    .map((name) => `${name.toUpperCase().padStart(6)} = 0x${(regs[name] ?? 0n).toString(16).padStart(digits, '0')}`)
    .join('\n');
}

async function withClient<T>(argv: Record<string, unknown>, fn: (client: RspClient) => Promise<T>): Promise<T> {
  const { config, logger } = resolveContext(argv);
  const host = optionalString(argv, 'host') ?? config.server?.host ?? '127.0.0.1';
  const port = optionalNumber(argv, 'port') ?? config.server?.port ?? 1234;
  const client = new RspClient(host, port, { logger, retry: { maxAttempts: 5, ackTimeoutMs: 2000 } });
  await client.connect();
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

export const probeCommand: CommandModule = {
  command: 'probe <action>',
  describe: 'Query a running stub the way a debugger would',
  builder: (yargs: Argv) =>
    yargs
      .option('host', { describe: 'Stub host', type: 'string' })
      .option('port', { describe: 'Stub port', type: 'number' })
      .command(
        'supported',
        'Negotiate capabilities (qSupported)',
        (y) => y,
        async (argv) => {
          const features = await withClient(argv, (client) => client.querySupported());
          console.log(features.length > 0 ? features : '(empty reply)');
        },
      )
      .command(
        'registers',
        'Dump registers (g)',
        (y) => y.option('arch', { describe: 'Register layout', choices: ARCHES }),
        async (argv) => {
          const { config } = resolveContext(argv);
          const layout = layoutFor(optionalArch(argv) ?? config.target?.arch ?? 'x64');
          const regs = await withClient(argv, (client) => client.readRegisters(layout));
          console.log(formatRegisters(regs, layout));
        },
      )
      .command(
        'memory <address> <length>',
        'Read memory (m)',
        (y) =>
          y
            .positional('address', {
              describe: 'Address (0x-prefixed hex or decimal)',
              type: 'string',
              demandOption: true,
            })
            .positional('length', {
              describe: 'Length in bytes (0x-prefixed hex or decimal)',
              type: 'string',
              demandOption: true,
            }),
        async (argv) => {
          const address = parseNumber(optionalString(argv, 'address') ?? '');
          const length = parseNumber(optionalString(argv, 'length') ?? '');
          const data = await withClient(argv, (client) => client.readMemory(address, length));
          console.log(hexDump(data));
        },
      )
      .command(
        'stop-reason',
        'Ask why the target stopped (?)',
        (y) => y,
        async (argv) => {
          const reason = await withClient(argv, (client) => client.stopReason());
          console.log(`Stopped by signal ${reason.kind === 'signal' ? reason.signal : '?'}`);
        },
      )
      .demandCommand(1),
  handler: () => {},
};
