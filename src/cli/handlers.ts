import * as path from 'path';
import {
  ConfigError,
  createLogger,
  createProfiler,
  loadConfig,
  resolveApiKey,
  toEngineOptions,
  DEFAULT_CONFIG,
  type EngineLogger,
  type Logger,
  type Profiler,
  type PyDocConfig,
} from '../core/index.js';
import {
  DocstringGenerator,
  DocstringPipeline,
  OpenAIOracle,
  discoverSourceFiles,
  generateReferenceDocs,
  summarizeOutcomes,
  type DocstringOracle,
  type FileOutcome,
  type OutcomeSummary,
} from '../docstrings/index.js';

export interface RunCommandOptions {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  timeout?: string;
  retries?: string;
  concurrency?: string;
  config?: string;
  docOutputDir?: string;
  json?: boolean;
  profile?: boolean;
  verbose?: boolean;
}

export interface DocsCommandOptions {
  output?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Collaborators the run command would otherwise build itself.
 */
export interface RunDependencies {
  oracle?: DocstringOracle;
  /** Replaces the SIGINT-driven cancellation signal. */
  signal?: AbortSignal;
}

export interface RunReport {
  outcomes: FileOutcome[];
  summary: OutcomeSummary;
}

const DEFAULT_DOCS_DIR = 'docs';

function parseIntegerOption(
  value: string | undefined,
  flag: string,
  min: number,
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigError(`${flag} must be an integer of at least ${min}, got "${value}"`);
  }
  return parsed;
}

/**
 * Command line flags win over the config file, which wins over defaults.
 */
export function mergeRunOptions(config: PyDocConfig, options: RunCommandOptions): PyDocConfig {
  return {
    ...config,
    model: options.model ?? config.model,
    endpoint: options.baseUrl ?? config.endpoint,
    apiKey: options.apiKey ?? config.apiKey,
    timeoutMs: parseIntegerOption(options.timeout, '--timeout', 1) ?? config.timeoutMs,
    retries: parseIntegerOption(options.retries, '--retries', 0) ?? config.retries,
    concurrency: parseIntegerOption(options.concurrency, '--concurrency', 1) ?? config.concurrency,
    docOutputDir: options.docOutputDir ?? config.docOutputDir,
  };
}

/**
 * First SIGINT aborts the returned signal so work stops after the current
 * node; a second one exits immediately.
 */
export function createInterruptSignal(logger: EngineLogger): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      logger.error('Interrupted again, exiting without finishing');
      process.exit(130);
    }
    logger.warn('Interrupt received, finishing the current definition (Ctrl+C again to exit)');
    controller.abort();
  };
  process.on('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt);
    },
  };
}

function displayPath(filePath: string): string {
  return path.relative(process.cwd(), filePath) || filePath;
}

function printOutcomes(outcomes: FileOutcome[], summary: OutcomeSummary, logger: Logger): void {
  for (const outcome of outcomes) {
    const name = displayPath(outcome.path);
    switch (outcome.status) {
      case 'modified':
        logger.success(`${name} (+${outcome.inserted})${outcome.interrupted ? ' [interrupted]' : ''}`);
        break;
      case 'failed':
        logger.error(`${name}: ${outcome.error?.kind ?? 'Error'}: ${outcome.error?.message ?? ''}`);
        break;
      case 'not-processed':
        logger.info(`${name}: not processed`);
        break;
      default:
        logger.debug(`${name}: unchanged`);
    }
  }

  logger.info(
    `${summary.files} file(s): ${summary.modified} modified, ${summary.unchanged} unchanged, ` +
      `${summary.failed} failed, ${summary.notProcessed} not processed`,
  );
  logger.info(
    `${summary.docstringsAdded} docstring(s) added, ${summary.nodesSkipped} definition(s) skipped`,
  );
}

function printProfile(profiler: Profiler, logger: Logger): void {
  const profile = profiler.report();
  if (!profile) return;
  logger.info('Performance Profile');
  logger.info(`Total: ${profile.totalMs.toFixed(1)}ms`);
  for (const step of profile.steps) {
    const calls = step.calls > 1 ? ` (${step.calls} calls)` : '';
    logger.info(`- ${step.name}: ${step.ms.toFixed(1)}ms${calls}`);
  }
}

function printJson(data: unknown, success: boolean): void {
  console.log(JSON.stringify({ success, data, timestamp: new Date().toISOString() }, null, 2));
}

export async function runDocstringsCommand(
  dir: string,
  options: RunCommandOptions,
  deps: RunDependencies = {},
): Promise<RunReport> {
  const logger = createLogger({ verbose: options.verbose === true, stderrOnly: options.json === true });
  const profiler = createProfiler(options.profile === true);

  const fileConfig = await profiler.section('config.load', async () => loadConfig(options.config));
  const config = mergeRunOptions(fileConfig, options);
  const engine = toEngineOptions(config);
  const apiKey = resolveApiKey(engine.apiKey);
  if (!apiKey && !deps.oracle) {
    logger.warn('No API key given (--api-key or OPENAI_API_KEY); sending requests without one');
  }

  const oracle =
    deps.oracle ?? new OpenAIOracle({ endpoint: engine.endpoint, model: engine.model, apiKey });
  const pipeline = new DocstringPipeline({
    generator: new DocstringGenerator(oracle, {
      timeoutMs: engine.timeoutMs,
      styleTemplate: engine.styleTemplate,
    }),
    logger,
    retries: engine.retries,
    concurrency: engine.concurrency,
    profiler,
  });

  const rootPath = path.resolve(dir);
  const files = await profiler.section('files.discover', async () =>
    discoverSourceFiles(rootPath, {
      include: config.include ?? DEFAULT_CONFIG.include,
      ignore: config.ignore ?? DEFAULT_CONFIG.ignore,
    }),
  );
  logger.info(`Found ${files.length} Python file(s) in ${rootPath} (model ${engine.model})`);

  const interrupt = deps.signal ? undefined : createInterruptSignal(logger);
  const signal = deps.signal ?? interrupt?.signal;
  let outcomes: FileOutcome[];
  try {
    outcomes = await profiler.section('docstrings.generate', async () =>
      pipeline.processFiles(files, signal),
    );
  } finally {
    interrupt?.dispose();
  }
  const summary = summarizeOutcomes(outcomes);

  if (config.docOutputDir) {
    const outputDir = path.resolve(config.docOutputDir);
    await profiler.section('docs.reference', async () =>
      generateReferenceDocs(files, rootPath, outputDir, logger),
    );
  }

  if (options.json) {
    printJson({ outcomes, summary }, summary.failed === 0);
  } else {
    printOutcomes(outcomes, summary, logger);
  }
  printProfile(profiler, logger);

  if (summary.failed > 0) {
    process.exitCode = 1;
  } else if (signal?.aborted) {
    process.exitCode = 130;
  }
  return { outcomes, summary };
}

export async function runDocsCommand(dir: string, options: DocsCommandOptions): Promise<string[]> {
  const logger = createLogger({ verbose: options.verbose === true, stderrOnly: options.json === true });
  const config = await loadConfig(options.config);
  const rootPath = path.resolve(dir);
  const outputDir = path.resolve(options.output ?? config.docOutputDir ?? DEFAULT_DOCS_DIR);

  const files = await discoverSourceFiles(rootPath, {
    include: config.include ?? DEFAULT_CONFIG.include,
    ignore: config.ignore ?? DEFAULT_CONFIG.ignore,
  });
  const written = await generateReferenceDocs(files, rootPath, outputDir, logger);

  if (options.json) {
    printJson({ outputDir, files: written }, true);
  } else {
    logger.success(`Reference docs written to ${outputDir}`);
  }
  return written;
}
