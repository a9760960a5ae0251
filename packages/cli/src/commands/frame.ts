import type { CommandModule } from 'yargs';
import { framePacket } from '@rsp-stub/core';
import { optionalString } from '../context.ts';

export const frameCommand: CommandModule = {
  command: 'frame <payload>',
  describe: 'Print a payload framed as an RSP packet',
  builder: (yargs) =>
    yargs.positional('payload', {
      describe: 'Packet payload, e.g. m1000,4',
      type: 'string',
      demandOption: true,
    }),
  handler: (argv) => {
    const payload = optionalString(argv, 'payload') ?? '';
    console.log(framePacket(payload).toString('latin1'));
  },
};
