#!/usr/bin/env tsx
import { hideBin } from 'yargs/helpers';
import { createCli } from './program.ts';

await createCli(hideBin(process.argv)).parseAsync();
