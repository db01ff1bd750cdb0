/**
 * Markdown reference documentation
 *
 * Renders one Markdown page per Python module (module docstring, then its
 * functions and classes with their docstrings and source), in a layout that
 * Sphinx (via MyST) and MkDocs can pick up.
 */

import * as path from 'path';
import {
  errorMessage,
  readSourceFile,
  writeFileSafe,
  type EngineLogger,
} from '../../core/index.js';
import { walkDefinitions } from '../locator.js';
import { parse } from '../parsers/python.js';
import { cleandoc } from '../render.js';
import type { DocumentableNode, NodeKind, SourceSpan, SourceTree } from '../types.js';

export interface DocEntry {
  type: NodeKind;
  name: string;
  qualifiedName: string;
  line: number;
  docstring: string;
  code: string;
  args: string[];
  returns: string | null;
  raises: string[];
}

export interface ModuleDoc {
  name: string;
  docstring: string;
  entries: DocEntry[];
}

const STRING_LITERAL = /[A-Za-z]*("""|'''|"|')([\s\S]*?)\1/g;
const SECTION_HEADER = /^[A-Z][A-Za-z ]*:$/;

/**
 * The text of a docstring literal as written: prefixes and quotes removed,
 * implicitly concatenated parts joined, indentation cleaned. Escape sequences
 * are kept verbatim.
 */
export function docstringText(literalSource: string): string {
  const parts: string[] = [];
  for (const match of literalSource.matchAll(STRING_LITERAL)) {
    parts.push(match[2]);
  }
  return cleandoc(parts.join(''));
}

function spanText(text: string, span: SourceSpan): string {
  return text.slice(span.start, span.end);
}

function leadingDocstring(node: DocumentableNode, text: string): string {
  const first = node.body[0];
  if (!first) return '';
  if (first.type === 'inserted') return first.literal.value;
  return first.docstring ? docstringText(spanText(text, first.span)) : '';
}

export function parseReturns(docstring: string): string | null {
  const lines = docstring.split('\n');
  const header = lines.findIndex((line) => line.trim().startsWith('Returns:'));
  if (header < 0 || header + 1 >= lines.length) return null;
  const next = lines[header + 1].trim();
  return next.length > 0 ? next : null;
}

export function parseRaises(docstring: string): string[] {
  const raises: string[] = [];
  let collecting = false;
  for (const line of docstring.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('Raises:')) {
      collecting = true;
      continue;
    }
    if (!collecting) continue;
    if (trimmed === '' || SECTION_HEADER.test(trimmed)) break;
    raises.push(trimmed.includes(':') ? trimmed.split(':', 1)[0].trim() : trimmed);
  }
  return raises;
}

export function extractDocInfo(tree: SourceTree, fileName: string): ModuleDoc {
  const entries: DocEntry[] = [];
  for (const node of walkDefinitions(tree)) {
    const docstring = leadingDocstring(node, tree.text);
    entries.push({
      type: node.kind,
      name: node.name,
      qualifiedName: node.qualifiedName,
      line: node.span.startLine,
      docstring,
      code: spanText(tree.text, node.span),
      args: node.kind === 'class' ? [] : node.parameters,
      returns: node.kind === 'class' ? null : parseReturns(docstring),
      raises: node.kind === 'class' ? [] : parseRaises(docstring),
    });
  }

  return {
    name: fileName,
    docstring: tree.moduleDocstring
      ? docstringText(spanText(tree.text, tree.moduleDocstring))
      : '',
    entries,
  };
}

function renderEntry(entry: DocEntry): string[] {
  const lines = [`### ${entry.qualifiedName}`, ''];
  if (entry.docstring) {
    lines.push(entry.docstring, '');
  }
  lines.push('```python', entry.code, '```', '');
  return lines;
}

export function renderMarkdown(doc: ModuleDoc): string {
  const lines = [`# ${doc.name}`, ''];
  if (doc.docstring) {
    lines.push(doc.docstring, '');
  }

  const functions = doc.entries.filter((entry) => entry.type !== 'class');
  const classes = doc.entries.filter((entry) => entry.type === 'class');

  if (functions.length > 0) {
    lines.push('## Functions', '');
    functions.forEach((entry) => lines.push(...renderEntry(entry)));
  }
  if (classes.length > 0) {
    lines.push('## Classes', '');
    classes.forEach((entry) => lines.push(...renderEntry(entry)));
  }
  return lines.join('\n');
}

/**
 * Write `<relative path>.md` under `outputDir` for every file except package
 * `__init__.py` files. A file that cannot be read or parsed is logged and
 * skipped. Returns the paths written.
 */
export async function generateReferenceDocs(
  files: string[],
  rootPath: string,
  outputDir: string,
  logger: EngineLogger,
): Promise<string[]> {
  const written: string[] = [];

  for (const file of files) {
    if (path.basename(file) === '__init__.py') continue;
    const relative = path.relative(rootPath, file);
    const target = path.join(
      outputDir,
      path.dirname(relative),
      `${path.basename(relative, path.extname(relative))}.md`,
    );

    try {
      const source = await readSourceFile(file);
      const doc = extractDocInfo(parse(source.text), path.basename(file));
      await writeFileSafe(target, renderMarkdown(doc));
      written.push(target);
      logger.debug(`Reference docs for ${file} written to ${target}`);
    } catch (error) {
      logger.error(`Cannot document ${file}: ${errorMessage(error)}`);
    }
  }

  logger.info(`Reference docs generated for ${written.length} file(s) in ${outputDir}`);
  return written;
}
