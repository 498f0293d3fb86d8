#!/usr/bin/env node

import { Command } from 'commander';
import { renameCommand } from './commands/rename.js';
import { VERSION } from './version.js';

const program = new Command();

program
  .name('namefmt')
  .description('Format file names according to configuration')
  .version(VERSION);

renameCommand(program);

// Error handling
program.exitOverride((err) => {
  if (
    err.code === 'commander.help' ||
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.version'
  ) {
    process.exit(0);
  }
  process.exit(1);
});

await program.parseAsync();
