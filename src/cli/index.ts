#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { planCommand } from './commands/plan';
import { upCommand } from './commands/up';

void yargs(hideBin(process.argv))
  .scriptName('healthgate')
  .usage('$0 <command> [options]')
  .command(upCommand)
  .command(planCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parse();
