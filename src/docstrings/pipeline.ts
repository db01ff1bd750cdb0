/**
 * File commit pipeline
 *
 * One file is one unit of work: read, parse, locate, generate for each
 * candidate in order, mutate, finalize, write. Files share no state, so a
 * bounded pool may run several at once.
 */

import * as path from 'path';
import {
  ReadError,
  SourceSyntaxError,
  ValidationError,
  WriteError,
  errorMessage,
  createLimiter,
  createProfiler,
  readSourceFile,
  writeFileAtomic,
  type DecodedSource,
  type EngineLogger,
  type Profiler,
  type SourceEncoding,
} from '../core/index.js';
import type { DocstringGenerator } from './llm/client.js';
import { findUndocumented } from './locator.js';
import { insertDocstring } from './mutator.js';
import { parse } from './parsers/python.js';
import { extractSource } from './snippet.js';
import type {
  DocumentableNode,
  FileErrorKind,
  FileOutcome,
  GenerationResult,
  NodeFailure,
  OutcomeSummary,
  Snippet,
  SourceTree,
} from './types.js';
import { finalize, type FinalizeResult } from './validator.js';

export interface PipelineOptions {
  generator: DocstringGenerator;
  logger: EngineLogger;
  /** Extra attempts for a node whose generation timed out or hit a network error. */
  retries?: number;
  /** Files processed at the same time. */
  concurrency?: number;
  /** Override the atomic writer (tests inject failures through this). */
  write?: (filePath: string, text: string, encoding: SourceEncoding, bom: boolean) => Promise<void>;
  /** Override regeneration and re-parse of a mutated tree. */
  validate?: (tree: SourceTree) => FinalizeResult;
  /** Receives per-file read, parse, generate, finalize and write timings. */
  profiler?: Profiler;
}

export class DocstringPipeline {
  private readonly generator: DocstringGenerator;
  private readonly logger: EngineLogger;
  private readonly retries: number;
  private readonly concurrency: number;
  private readonly write: NonNullable<PipelineOptions['write']>;
  private readonly validate: NonNullable<PipelineOptions['validate']>;
  private readonly profiler: Profiler;

  constructor(options: PipelineOptions) {
    this.generator = options.generator;
    this.logger = options.logger;
    this.retries = Math.max(0, Math.floor(options.retries ?? 0));
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.write = options.write ?? writeFileAtomic;
    this.validate = options.validate ?? finalize;
    this.profiler = options.profiler ?? createProfiler(false);
  }

  /**
   * Process files, each as an independent unit. Outcomes come back in input
   * order. Once `signal` is aborted, files not yet started are reported as
   * not processed.
   */
  async processFiles(filePaths: string[], signal?: AbortSignal): Promise<FileOutcome[]> {
    const limit = createLimiter(this.concurrency);
    return Promise.all(
      filePaths.map((filePath) =>
        limit(async () => {
          if (signal?.aborted) {
            return notProcessed(filePath);
          }
          return this.processFile(filePath, signal);
        }),
      ),
    );
  }

  async processFile(filePath: string, signal?: AbortSignal): Promise<FileOutcome> {
    const outcome = emptyOutcome(filePath);
    this.logger.info(`Processing ${filePath}`);

    let source: DecodedSource;
    let tree: SourceTree;
    try {
      source = await this.profiler.section('file.read', async () => readSourceFile(filePath));
      outcome.encoding = source.encoding;
      outcome.decodedWithFallback = source.usedFallback;
      if (source.usedFallback) {
        this.logger.warn(`${filePath} is not valid UTF-8, decoded as latin1`);
      }
      const text = source.text;
      tree = this.profiler.measure('file.parse', () => parse(text));
    } catch (error) {
      return this.fail(outcome, error);
    }

    // Identity-stable references: materialize every candidate before mutating.
    const candidates = [...findUndocumented(tree)];
    outcome.candidates = candidates.length;
    if (candidates.length === 0) {
      this.logger.debug(`No missing docstrings in ${filePath}`);
      return outcome;
    }

    let inserted = 0;
    let attempted = 0;
    for (const node of candidates) {
      if (signal?.aborted) {
        outcome.interrupted = true;
        this.logger.warn(`Stopped ${filePath} before ${node.qualifiedName}`);
        break;
      }
      attempted += 1;
      if (await this.documentNode(node, tree, filePath, outcome.failures)) {
        inserted += 1;
      }
    }

    if (attempted === 0) {
      outcome.status = 'not-processed';
      return outcome;
    }
    if (inserted === 0) {
      this.logger.warn(`No docstrings generated for ${filePath}`);
      return outcome;
    }

    const result = this.profiler.measure('file.finalize', () => this.validate(tree));
    if (!result.ok) {
      return this.fail(outcome, result.error);
    }

    try {
      const { encoding, bom } = source;
      await this.profiler.section('file.write', async () =>
        this.write(filePath, result.text, encoding, bom),
      );
    } catch (error) {
      return this.fail(
        outcome,
        error instanceof WriteError ? error : new WriteError(errorMessage(error), filePath),
      );
    }

    outcome.status = 'modified';
    outcome.inserted = inserted;
    this.logger.info(`Added ${inserted} docstring(s) to ${filePath}`);
    return outcome;
  }

  private async documentNode(
    node: DocumentableNode,
    tree: SourceTree,
    filePath: string,
    failures: NodeFailure[],
  ): Promise<boolean> {
    const line = node.span.startLine;
    let snippet: Snippet;
    try {
      snippet = extractSource(node, tree.text);
    } catch (error) {
      failures.push({
        node: node.qualifiedName,
        line,
        reason: 'extraction',
        message: errorMessage(error),
        attempts: 0,
      });
      this.logger.error(`Cannot extract ${node.qualifiedName} in ${filePath}: ${errorMessage(error)}`);
      return false;
    }

    this.logger.debug(`Generating docstring for ${node.qualifiedName} (${filePath}:${line})`);
    let attempts = 0;
    let result: GenerationResult;
    do {
      attempts += 1;
      result = await this.profiler.section('node.generate', async () =>
        this.generator.generate(snippet, node.kind, { fileName: path.basename(filePath) }),
      );
    } while (!result.ok && isTransient(result.failure.reason) && attempts <= this.retries);

    if (!result.ok) {
      failures.push({
        node: node.qualifiedName,
        line,
        reason: result.failure.reason,
        message: result.failure.message,
        attempts,
      });
      this.logger.warn(
        `Skipped ${node.qualifiedName} in ${filePath}: ${result.failure.reason} (${result.failure.message})`,
      );
      return false;
    }

    insertDocstring(node, result.literal);
    this.logger.debug(`Docstring added for ${node.qualifiedName}`);
    return true;
  }

  private fail(outcome: FileOutcome, error: unknown): FileOutcome {
    const kind = errorKind(error);
    outcome.status = 'failed';
    outcome.inserted = 0;
    outcome.error = { kind, message: errorMessage(error) };
    this.logger.error(`${outcome.path}: ${kind}: ${errorMessage(error)}`);
    return outcome;
  }
}

function isTransient(reason: string): boolean {
  return reason === 'timeout' || reason === 'network';
}

function errorKind(error: unknown): FileErrorKind {
  if (error instanceof ReadError) return 'ReadError';
  if (error instanceof SourceSyntaxError) return 'SyntaxError';
  if (error instanceof ValidationError) return 'ValidationError';
  if (error instanceof WriteError) return 'WriteError';
  return 'InternalError';
}

function emptyOutcome(filePath: string): FileOutcome {
  return {
    path: filePath,
    status: 'unchanged',
    inserted: 0,
    candidates: 0,
    decodedWithFallback: false,
    interrupted: false,
    failures: [],
  };
}

function notProcessed(filePath: string): FileOutcome {
  return { ...emptyOutcome(filePath), status: 'not-processed' };
}

export function summarizeOutcomes(outcomes: FileOutcome[]): OutcomeSummary {
  const summary: OutcomeSummary = {
    files: outcomes.length,
    modified: 0,
    unchanged: 0,
    failed: 0,
    notProcessed: 0,
    docstringsAdded: 0,
    nodesSkipped: 0,
  };
  for (const outcome of outcomes) {
    if (outcome.status === 'modified') summary.modified += 1;
    else if (outcome.status === 'unchanged') summary.unchanged += 1;
    else if (outcome.status === 'failed') summary.failed += 1;
    else summary.notProcessed += 1;
    summary.docstringsAdded += outcome.inserted;
    summary.nodesSkipped += outcome.failures.length;
  }
  return summary;
}
