import type { Command } from 'commander';
import { registerDocstringCommands } from './register-docstrings.js';

export function registerAllCommands(program: Command): void {
  registerDocstringCommands(program);
}
