#!/usr/bin/env tsx
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { convertCommand } from './commands/convert.ts';
import { formatsCommand } from './commands/formats.ts';
import { initCommand } from './commands/init.ts';

await yargs(hideBin(process.argv))
  .scriptName('bin2const')
  .usage('$0 <input_file> <output_const_name> <conversion_type> [tab_size] [output_file]')
  .option('project', {
    alias: 'p',
    describe: 'Directory holding bin2const.json',
    type: 'string',
    default: process.cwd(),
  })
  .option('verbose', {
    alias: 'v',
    describe: 'Print diagnostics to stderr',
    type: 'boolean',
    default: false,
  })
  .command(convertCommand)
  .command(formatsCommand)
  .command(initCommand)
  .help()
  .parse();
