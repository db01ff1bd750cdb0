import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { Logger, createLogger } from '../../src/core/logger.js';

describe('Logger', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    chalk.level = 0;
    stdout = [];
    stderr = [];
    jest.spyOn(console, 'log').mockImplementation((line?: unknown) => {
      stdout.push(String(line));
    });
    jest.spyOn(console, 'error').mockImplementation((line?: unknown) => {
      stderr.push(String(line));
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log info, success and warnings to stdout', () => {
    const logger = new Logger(false);
    logger.info('scanning');
    logger.success('done');
    logger.warn('careful');
    expect(stdout).toEqual(['ℹ scanning', '✓ done', '⚠ careful']);
    expect(stderr).toEqual([]);
  });

  it('should log errors to stderr', () => {
    new Logger(false).error('broken');
    expect(stderr).toEqual(['✗ broken']);
  });

  it('should not log debug messages if verbose is false', () => {
    new Logger(false).debug('hidden');
    expect(stdout).toEqual([]);
  });

  it('should log debug messages if verbose is true', () => {
    createLogger(true).debug('shown');
    expect(stdout).toEqual(['[DEBUG] shown']);
  });

  it('should log the stack trace if verbose is true and an error is given', () => {
    const error = new Error('oops');
    error.stack = 'Error: oops\n    at test';
    createLogger({ verbose: true }).error('failed', error);
    expect(stderr).toEqual(['✗ failed', 'Error: oops\n    at test']);
  });

  it('should keep stdout free when stderrOnly is set', () => {
    const logger = createLogger({ stderrOnly: true });
    logger.info('progress');
    logger.log('plain');
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['ℹ progress', 'plain']);
  });
});
