#!/usr/bin/env node

import { Command } from 'commander';
import { registerSignoffCommand } from './commands/signoff/signoff';
import { registerHeadersCommand } from './commands/headers/headers';

const program = new Command();

program
  .name('dcoguard')
  .description('DCO sign-off and SPDX license header checks for commits and pull requests')
  .version('1.0.0');

registerSignoffCommand(program);
registerHeadersCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
