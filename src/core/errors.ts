/**
 * Error types and CLI error handling helpers
 */

import { logger } from './logger.js';

export type ErrorCode =
  | 'READ_ERROR'
  | 'SYNTAX_ERROR'
  | 'EXTRACTION_ERROR'
  | 'VALIDATION_ERROR'
  | 'WRITE_ERROR'
  | 'CONFIG_ERROR';

export class PyDocError extends Error {
  constructor(
    message: string,
    public code?: ErrorCode,
  ) {
    super(message);
    this.name = 'PyDocError';
  }
}

export class ReadError extends PyDocError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message, 'READ_ERROR');
    this.name = 'ReadError';
  }
}

/**
 * Source text that tree-sitter could not parse without error recovery.
 */
export class SourceSyntaxError extends PyDocError {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(message, 'SYNTAX_ERROR');
    this.name = 'SourceSyntaxError';
  }
}

export class ExtractionError extends PyDocError {
  constructor(message: string) {
    super(message, 'EXTRACTION_ERROR');
    this.name = 'ExtractionError';
  }
}

export class ValidationError extends PyDocError {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class WriteError extends PyDocError {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message, 'WRITE_ERROR');
    this.name = 'WriteError';
  }
}

export class ConfigError extends PyDocError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  logger.error(message);
  if (error) {
    logger.error(errorMessage(error));
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    if ('json' in candidate && typeof candidate.json === 'boolean') {
      return candidate.json;
    }
  }
  return false;
}

function emitCliJsonError(command: string, error: unknown): void {
  console.log(
    JSON.stringify(
      {
        success: false,
        error: errorMessage(error),
        code: error instanceof PyDocError ? error.code : undefined,
        command,
        timestamp: new Date().toISOString(),
      },
      null,
      2,
    ),
  );
}

export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        process.exitCode = 1;
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}
