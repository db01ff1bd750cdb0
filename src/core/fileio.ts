/**
 * File I/O utilities with error handling
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { promisify } from 'util';
import { ReadError, WriteError, errorMessage } from './errors.js';

const mkdir = promisify(fs.mkdir);
const writeFile = promisify(fs.writeFile);
const readFile = promisify(fs.readFile);
const access = promisify(fs.access);
const rename = promisify(fs.rename);
const stat = promisify(fs.stat);
const chmod = promisify(fs.chmod);
const unlink = promisify(fs.unlink);

export type SourceEncoding = 'utf-8' | 'latin1';

export interface DecodedSource {
  text: string;
  encoding: SourceEncoding;
  usedFallback: boolean;
  /** A UTF-8 byte-order mark was present and stripped from `text`. */
  bom: boolean;
}

const UTF8_BOM = '\uFEFF';

function errnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (errnoCode(error) !== 'EEXIST') {
      throw error;
    }
  }
}

export async function writeFileSafe(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await writeFile(filePath, content, 'utf-8');
}

export async function readFileSafe(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJSON(filePath: string): Promise<unknown> {
  const content = await readFileSafe(filePath);
  return JSON.parse(content);
}

/**
 * Decode source bytes as strict UTF-8, falling back to Latin-1 (which accepts
 * any byte sequence).
 */
export function decodeSource(buffer: Buffer): DecodedSource {
  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(buffer);
    if (text.startsWith(UTF8_BOM)) {
      return { text: text.slice(1), encoding: 'utf-8', usedFallback: false, bom: true };
    }
    return { text, encoding: 'utf-8', usedFallback: false, bom: false };
  } catch {
    return { text: buffer.toString('latin1'), encoding: 'latin1', usedFallback: true, bom: false };
  }
}

export function encodeSource(text: string, encoding: SourceEncoding, bom: boolean): Buffer {
  if (encoding === 'latin1') {
    const offending = text.search(/[^\u0000-\u00ff]/);
    if (offending >= 0) {
      throw new Error(`character at offset ${offending} cannot be encoded as latin1`);
    }
  }
  const body = Buffer.from(text, encoding === 'utf-8' ? 'utf8' : 'latin1');
  if (!bom) return body;
  return Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), body]);
}

export async function readSourceFile(filePath: string): Promise<DecodedSource> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ReadError(`File not found: ${filePath}`, filePath);
    }
    throw new ReadError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath);
  }
  return decodeSource(buffer);
}

/**
 * Replace a file's content in one step: write a sibling temp file, then
 * rename it over the target. The target keeps its permission bits.
 */
export async function writeFileAtomic(
  filePath: string,
  text: string,
  encoding: SourceEncoding,
  bom: boolean = false,
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`,
  );

  try {
    await writeFile(tempPath, encodeSource(text, encoding, bom));
    try {
      const original = await stat(filePath);
      await chmod(tempPath, original.mode);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') throw error;
    }
    await rename(tempPath, filePath);
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch {
      // The temp file may never have been created.
    }
    throw new WriteError(`Cannot write ${filePath}: ${errorMessage(error)}`, filePath);
  }
}
