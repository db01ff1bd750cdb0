/**
 * Source file discovery
 */

import * as path from 'path';
import * as fsPromises from 'fs/promises';
import { glob } from 'glob';
import { ReadError, errorMessage } from '../../core/index.js';

export interface DiscoveryOptions {
  /** Glob, relative to the root, selecting the files to process. */
  include: string;
  /** Directory names skipped at any depth. */
  ignore: string[];
}

export function toIgnoreGlobs(ignoredDirs: string[]): string[] {
  return ignoredDirs.map((dir) => `**/${dir.replace(/\\/g, '/').replace(/\/+$/, '')}/**`);
}

/**
 * List the files under `root` matching `include`, as absolute paths in a
 * stable (sorted) order.
 */
export async function discoverSourceFiles(
  root: string,
  options: DiscoveryOptions,
): Promise<string[]> {
  const rootPath = path.resolve(root);
  try {
    const stats = await fsPromises.stat(rootPath);
    if (!stats.isDirectory()) {
      throw new ReadError(`Not a directory: ${rootPath}`, rootPath);
    }
  } catch (error) {
    if (error instanceof ReadError) throw error;
    throw new ReadError(`Cannot access ${rootPath}: ${errorMessage(error)}`, rootPath);
  }

  const files = await glob(options.include, {
    cwd: rootPath,
    ignore: toIgnoreGlobs(options.ignore),
    nodir: true,
    dot: false,
  });
  files.sort((a, b) => a.localeCompare(b));
  return files.map((file) => path.join(rootPath, file));
}
