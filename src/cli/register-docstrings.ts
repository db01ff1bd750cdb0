import type { Command } from 'commander';
import { withCliErrorHandling } from '../core/index.js';
import {
  runDocsCommand,
  runDocstringsCommand,
  type DocsCommandOptions,
  type RunCommandOptions,
} from './handlers.js';

export function registerDocstringCommands(program: Command): void {
  program
    .command('run')
    .description('Add generated docstrings to undocumented functions and classes')
    .argument('<dir>', 'Directory to scan for Python files')
    .option('--model <name>', 'Model name sent to the generation service')
    .option('--base-url <url>', 'OpenAI-compatible endpoint')
    .option('--api-key <key>', 'API key (defaults to OPENAI_API_KEY)')
    .option('--timeout <ms>', 'Per-request timeout in milliseconds')
    .option('--retries <n>', 'Extra attempts after a timeout or network failure')
    .option('--concurrency <n>', 'Files processed at the same time')
    .option('-c, --config <path>', 'Config file')
    .option('--doc-output-dir <dir>', 'Also write Markdown reference docs to this directory')
    .option('--json', 'Output as JSON')
    .option('--profile', 'Print command phase timings')
    .option('-v, --verbose', 'Verbose logging')
    .action(
      withCliErrorHandling('run', async (dir: string, options: RunCommandOptions) => {
        await runDocstringsCommand(dir, options);
      }),
    );

  program
    .command('docs')
    .description('Write Markdown reference docs without generating docstrings')
    .argument('<dir>', 'Directory to scan for Python files')
    .option('-o, --output <dir>', 'Output directory')
    .option('-c, --config <path>', 'Config file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose logging')
    .action(
      withCliErrorHandling('docs', async (dir: string, options: DocsCommandOptions) => {
        await runDocsCommand(dir, options);
      }),
    );
}
