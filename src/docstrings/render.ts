/**
 * Docstring literal rendering
 */

import type { DocstringLiteral } from './types.js';

/**
 * Escape text so it can sit between triple double quotes. Backslashes are
 * doubled and runs of three or more quotes are fully escaped, so the literal's
 * value is exactly the input.
 */
export function escapeDocstring(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"{3,}/g, (run) => '\\"'.repeat(run.length));
}

/**
 * Render a literal placed at `indent`. Single-line values stay on one line;
 * longer ones follow PEP 257: continuation lines share the body indentation
 * and the closing quotes sit on their own line. `inspect.cleandoc` of the
 * rendered literal gives back `literal.value`.
 */
export function renderDocstring(
  literal: DocstringLiteral,
  indent: string,
  lineEnding: string = '\n',
): string {
  const lines = escapeDocstring(literal.value).split('\n');

  if (lines.length === 1) {
    const line = lines[0].endsWith('"') ? `${lines[0].slice(0, -1)}\\"` : lines[0];
    return `"""${line}"""`;
  }

  const [summary, ...rest] = lines;
  const continuation = rest.map((line) => (line.length > 0 ? indent + line : ''));
  return [`"""${summary}`, ...continuation, `${indent}"""`].join(lineEnding);
}

/**
 * Same contract as Python's `inspect.cleandoc`: strip the first line's
 * leading whitespace, the indentation common to the remaining lines, trailing
 * whitespace, and leading/trailing blank lines.
 */
export function cleandoc(text: string): string {
  const [first, ...rest] = text
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, '        ')
    .split('\n')
    .map((line) => line.trimEnd());
  const indents = rest
    .filter((line) => line.length > 0)
    .map((line) => line.length - line.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;
  const lines = [first.trimStart(), ...rest.map((line) => line.slice(margin))];

  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}
