import yargs from 'yargs';
import { initCommand } from './commands/init.ts';
import { serveCommand } from './commands/serve.ts';
import { frameCommand } from './commands/frame.ts';
import { probeCommand } from './commands/probe.ts';

export function createCli(args: string[]) {
  return yargs(args)
    .scriptName('rsp-stub')
    .usage('$0 <command> [options]')
    .option('project', {
      alias: 'p',
      describe: 'Project root directory',
      type: 'string',
      default: process.cwd(),
    })
    .option('verbose', {
      alias: 'v',
      describe: 'Log every packet',
      type: 'boolean',
      default: false,
    })
    .command(initCommand)
    .command(serveCommand)
    .command(frameCommand)
    .command(probeCommand)
    .demandCommand(1, 'You need at least one command')
    .strict()
    .help();
}
