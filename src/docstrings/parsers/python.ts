/**
 * Python parser built on tree-sitter
 *
 * `parse` turns source text into a SourceTree: the untouched original text
 * plus an identity-stable model of every function, async function and class
 * definition. `serialize` splices statements inserted into that model back
 * into the original text, so code the engine did not touch keeps its exact
 * formatting and comments.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { SourceSyntaxError } from '../../core/errors.js';
import { walkDefinitions } from '../locator.js';
import { renderDocstring } from '../render.js';
import type {
  BodyLayout,
  DocumentableNode,
  NodeKind,
  OriginalStatement,
  SourceSpan,
  SourceTree,
} from '../types.js';

type SyntaxNode = Parser.SyntaxNode;

const READ_CHUNK = 16 * 1024;
const STRING_TYPES = new Set(['string', 'concatenated_string']);

let sharedParser: Parser | undefined;

function getParser(): Parser {
  if (!sharedParser) {
    sharedParser = new Parser();
    // The grammar package's typings do not line up with tree-sitter's Language type.
    sharedParser.setLanguage(Python as any);
  }
  return sharedParser;
}

/**
 * Feed the parser in chunks; passing one large string trips the binding's
 * internal buffer limit on big files. A chunk never ends between the two
 * halves of a surrogate pair.
 */
function readChunk(text: string, index: number): string {
  let end = Math.min(text.length, index + READ_CHUNK);
  const last = text.charCodeAt(end - 1);
  if (end < text.length && last >= 0xd800 && last <= 0xdbff) {
    end += 1;
  }
  return text.slice(index, end);
}

export function parse(text: string): SourceTree {
  const cst = getParser().parse((index: number) => readChunk(text, index));
  const root = cst.rootNode;
  assertWellFormed(root);

  const definitions: DocumentableNode[] = [];
  collectDefinitions(root, text, '', definitions);

  const first = statementsOf(root)[0];
  const moduleDocstring = first && isStringStatement(first, text) ? spanOf(first) : undefined;

  return {
    text,
    lineEnding: text.includes('\r\n') ? '\r\n' : '\n',
    definitions,
    moduleDocstring,
  };
}

/**
 * Render the tree back to text. An unmodified tree yields its original text.
 */
export function serialize(tree: SourceTree): string {
  const edits: Array<{ start: number; end: number; text: string }> = [];

  for (const node of walkDefinitions(tree)) {
    const leading: string[] = [];
    for (const statement of node.body) {
      if (statement.type !== 'inserted') break;
      leading.push(renderDocstring(statement.literal, node.layout.indent, tree.lineEnding));
    }
    if (leading.length === 0) continue;

    const { insertAt, replaceEnd, indent, inline } = node.layout;
    const separator = tree.lineEnding + indent;
    const block = leading.map((literal) => literal + separator).join('');
    edits.push({
      start: insertAt,
      end: replaceEnd,
      text: inline ? separator + block : block,
    });
  }

  edits.sort((a, b) => b.start - a.start);
  let output = tree.text;
  for (const edit of edits) {
    output = output.slice(0, edit.start) + edit.text + output.slice(edit.end);
  }
  return output;
}

function assertWellFormed(root: SyntaxNode): void {
  const errorNode = findNode(root, (node) => node.type === 'ERROR');
  if (errorNode) {
    const line = errorNode.startPosition.row + 1;
    throw new SourceSyntaxError(`invalid syntax at line ${line}`, line);
  }
  if (root.toString().includes('(MISSING')) {
    const missing = findNode(
      root,
      (node) =>
        node.type !== 'module' && node.childCount === 0 && node.startIndex === node.endIndex,
    );
    const line = missing ? missing.startPosition.row + 1 : root.endPosition.row + 1;
    throw new SourceSyntaxError(`unexpected end of statement at line ${line}`, line);
  }
}

function findNode(node: SyntaxNode, predicate: (node: SyntaxNode) => boolean): SyntaxNode | null {
  if (predicate(node)) return node;
  for (const child of node.children) {
    const found = findNode(child, predicate);
    if (found) return found;
  }
  return null;
}

function collectDefinitions(
  node: SyntaxNode,
  text: string,
  qualifier: string,
  into: DocumentableNode[],
): void {
  for (const child of node.namedChildren) {
    let definition: SyntaxNode | null = null;
    if (child.type === 'function_definition' || child.type === 'class_definition') {
      definition = child;
    } else if (child.type === 'decorated_definition') {
      definition = child.childForFieldName('definition');
    }

    if (!definition) {
      collectDefinitions(child, text, qualifier, into);
      continue;
    }

    const documentable = toDocumentable(definition, child, text, qualifier);
    into.push(documentable);

    const body = definition.childForFieldName('body');
    if (body) {
      const nested =
        documentable.kind === 'class'
          ? documentable.qualifiedName
          : `${documentable.qualifiedName}.<locals>`;
      collectDefinitions(body, text, nested, documentable.children);
    }
  }
}

function toDocumentable(
  definition: SyntaxNode,
  outer: SyntaxNode,
  text: string,
  qualifier: string,
): DocumentableNode {
  const nameNode = definition.childForFieldName('name');
  const name = nameNode ? text.slice(nameNode.startIndex, nameNode.endIndex) : '<anonymous>';
  const body = definition.childForFieldName('body');
  const statements = body ? statementsOf(body) : [];

  return {
    kind: kindOf(definition),
    name,
    qualifiedName: qualifier ? `${qualifier}.${name}` : name,
    parameters: parametersOf(definition, text),
    span: spanOf(outer),
    body: statements.map(
      (statement): OriginalStatement => ({
        type: 'original',
        span: spanOf(statement),
        docstring: isStringStatement(statement, text),
      }),
    ),
    layout: layoutOf(definition, outer, statements[0], text),
    children: [],
  };
}

function kindOf(definition: SyntaxNode): NodeKind {
  if (definition.type === 'class_definition') return 'class';
  return definition.children[0]?.type === 'async' ? 'async-function' : 'function';
}

const NAMED_PARAMETER_TYPES = new Set([
  'typed_parameter',
  'default_parameter',
  'typed_default_parameter',
]);
const SPLAT_TYPES = new Set([
  'list_splat_pattern',
  'dictionary_splat_pattern',
  'keyword_separator',
]);

/**
 * Names of the parameters that can be passed positionally, stopping at the
 * first `*` or `*args`.
 */
function parametersOf(definition: SyntaxNode, text: string): string[] {
  const parameters = definition.childForFieldName('parameters');
  if (!parameters) return [];

  const names: string[] = [];
  for (const parameter of parameters.namedChildren) {
    const target = NAMED_PARAMETER_TYPES.has(parameter.type)
      ? (parameter.childForFieldName('name') ?? parameter.namedChildren[0])
      : parameter;
    if (!target) continue;
    if (target.type === 'identifier') {
      names.push(text.slice(target.startIndex, target.endIndex));
    } else if (SPLAT_TYPES.has(target.type)) {
      break;
    }
  }
  return names;
}

function statementsOf(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child) => child.type !== 'comment');
}

function spanOf(node: SyntaxNode): SourceSpan {
  return {
    start: node.startIndex,
    end: node.endIndex,
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

/**
 * A bare string-literal expression statement. F-strings and bytes literals
 * do not count: they never become a docstring.
 */
function isStringStatement(statement: SyntaxNode, text: string): boolean {
  if (statement.type !== 'expression_statement') return false;
  const expressions = statementsOf(statement);
  if (expressions.length !== 1) return false;

  const expression = expressions[0];
  if (!STRING_TYPES.has(expression.type)) return false;
  const parts = expression.type === 'string' ? [expression] : statementsOf(expression);
  return parts.every((part) => part.type === 'string' && isPlainStringPrefix(text, part));
}

function isPlainStringPrefix(text: string, literal: SyntaxNode): boolean {
  const source = text.slice(literal.startIndex, Math.min(literal.endIndex, literal.startIndex + 4));
  const prefix = /^[A-Za-z]*/.exec(source)?.[0] ?? '';
  return !/[fFbBtT]/.test(prefix);
}

function layoutOf(
  definition: SyntaxNode,
  outer: SyntaxNode,
  firstStatement: SyntaxNode | undefined,
  text: string,
): BodyLayout {
  const body = definition.childForFieldName('body');
  const colon = definition.children
    .filter((child) => child.type === ':' && (!body || child.endIndex <= body.startIndex))
    .pop();
  const headerEnd = colon ? colon.endIndex : body ? body.startIndex : definition.endIndex;
  const definitionIndent = leadingWhitespace(text, outer.startIndex);
  const nestedIndent = definitionIndent + (definitionIndent.includes('\t') ? '\t' : '    ');

  if (!firstStatement) {
    return { headerEnd, insertAt: headerEnd, replaceEnd: headerEnd, indent: nestedIndent, inline: true };
  }

  const start = firstStatement.startIndex;
  const lineStart = text.lastIndexOf('\n', start - 1) + 1;
  const prefix = text.slice(lineStart, start);
  // A body reached through `\` continuations is still on the header's logical line.
  if (/^[ \t\f]*$/.test(prefix) && !hasEscapedLineBreak(text.slice(headerEnd, lineStart))) {
    return { headerEnd, insertAt: start, replaceEnd: start, indent: prefix, inline: false };
  }
  return { headerEnd, insertAt: headerEnd, replaceEnd: start, indent: nestedIndent, inline: true };
}

/**
 * Whether `text` (whitespace and comments between a header and its body)
 * joins lines with a backslash. A backslash ending a comment joins nothing.
 */
export function hasEscapedLineBreak(text: string): boolean {
  return /\\\r?\n/.test(text.replace(/#[^\r\n]*/g, ''));
}

function leadingWhitespace(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  return /^[ \t]*/.exec(text.slice(lineStart, offset))?.[0] ?? '';
}
