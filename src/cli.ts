#!/usr/bin/env node

/**
 * pydocsmith CLI
 * Fills in missing Python docstrings with a language model
 */

import { Command } from 'commander';
import { registerAllCommands } from './cli/register-all.js';

const program = new Command();

program
  .name('pydocsmith')
  .description('Add generated docstrings to Python code that lacks them')
  .version('0.1.0');

registerAllCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
