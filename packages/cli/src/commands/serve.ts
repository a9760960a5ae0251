import { resolve } from 'node:path';
import type { CommandModule } from 'yargs';
import { ARCHES, ImageBackend, StubServer, resolveStubOptions } from '@rsp-stub/core';
import { ConfigError, errorMessage } from '@rsp-stub/shared';
import { optionalArch, optionalNumber, optionalString, resolveContext } from '../context.ts';

export const serveCommand: CommandModule = {
  command: 'serve',
  describe: 'Serve a target image to a debugger over RSP',
  builder: (yargs) =>
    yargs
      .option('port', {
        describe: 'Port to listen on (default: 1234)',
        type: 'number',
      })
      .option('host', {
        describe: 'Address to bind (default: 127.0.0.1)',
        type: 'string',
      })
      .option('image', {
        alias: 'i',
        describe: 'Target image JSON (registers, memory, stop signal)',
        type: 'string',
      })
      .option('arch', {
        describe: 'Target architecture, used when the image names none',
        choices: ARCHES,
      }),
  handler: async (argv) => {
    const { projectDir, config, logger } = resolveContext(argv);
    const explicitArch = optionalArch(argv) ?? config.target?.arch;
    const options = resolveStubOptions(config, {
      host: optionalString(argv, 'host'),
      port: optionalNumber(argv, 'port'),
      arch: explicitArch,
    });

    const imagePath = optionalString(argv, 'image') ?? config.target?.image;
    if (!imagePath) {
      throw new ConfigError('No target image: pass --image or set "target.image" in the project config');
    }
    const backend = ImageBackend.fromFile(resolve(projectDir, imagePath), options.arch);
    if (explicitArch && backend.layout.arch !== explicitArch) {
      throw new ConfigError(`${imagePath} is a ${backend.layout.arch} image, expected ${explicitArch}`);
    }
    backend.on('resume', (threadIds: readonly number[]) => {
      const which = threadIds.length > 0 ? threadIds.map((id) => id.toString(16)).join(', ') : 'all';
      logger.info(`Resume requested for threads: ${which}`);
    });

    const server = new StubServer(backend, {
      host: options.host,
      port: options.port,
      maxThreadIds: options.maxThreadIds,
      retry: options.retry,
      logger,
    });
    await server.listen();
    logger.info(`Attach with: target remote ${options.host}:${server.address()?.port ?? options.port}`);

    process.once('SIGINT', () => {
      logger.info('Shutting down');
      server.close().catch((err: unknown) => {
        logger.error(`Failed to close server: ${errorMessage(err)}`);
        process.exitCode = 1;
      });
    });
  },
};
