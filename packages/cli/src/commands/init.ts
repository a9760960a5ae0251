import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandModule } from 'yargs';
import { ARCHES, CONFIG_FILENAME, writeProjectConfig } from '@rsp-stub/core';
import type { ProjectConfig } from '@rsp-stub/core';
import { optionalArch, optionalNumber, optionalString } from '../context.ts';

export const initCommand: CommandModule = {
  command: 'init',
  describe: `Create a ${CONFIG_FILENAME} project config`,
  builder: (yargs) =>
    yargs
      .option('force', {
        alias: 'f',
        describe: 'Overwrite existing config',
        type: 'boolean',
        default: false,
      })
      .option('arch', {
        describe: 'Target architecture',
        choices: ARCHES,
      })
      .option('port', {
        describe: 'Port the stub listens on',
        type: 'number',
      })
      .option('image', {
        describe: 'Target image JSON, relative to the project',
        type: 'string',
      }),
  handler: (argv) => {
    const projectDir = optionalString(argv, 'project') ?? process.cwd();
    const configPath = join(projectDir, CONFIG_FILENAME);

    if (existsSync(configPath) && argv['force'] !== true) {
      console.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
      process.exitCode = 1;
      return;
    }

    const config: ProjectConfig = {};
    const port = optionalNumber(argv, 'port');
    if (port !== undefined) config.server = { port };

    const arch = optionalArch(argv);
    const image = optionalString(argv, 'image');
    if (arch || image) {
      config.target = {};
      if (arch) config.target.arch = arch;
      if (image) config.target.image = image;
    }

    writeProjectConfig(projectDir, config);
    console.log(`Created ${configPath}`);
    if (config.server?.port !== undefined) console.log(`  server.port: ${config.server.port}`);
    if (config.target?.arch) console.log(`  target.arch: ${config.target.arch}`);
    if (config.target?.image) console.log(`  target.image: ${config.target.image}`);
  },
};
