/**
 * Shared types for the docstring engine
 */

import type { SourceEncoding } from '../core/fileio.js';

export type NodeKind = 'function' | 'async-function' | 'class';

/**
 * A region of the original source text. Offsets index the decoded string;
 * lines are 1-based.
 */
export interface SourceSpan {
  start: number;
  end: number;
  startLine: number;
  endLine: number;
}

export interface DocstringLiteral {
  /** Normalized docstring text, without quotes or indentation. */
  readonly value: string;
}

export interface OriginalStatement {
  type: 'original';
  span: SourceSpan;
  /** The statement is a bare string-literal expression. */
  docstring: boolean;
}

export interface InsertedStatement {
  type: 'inserted';
  literal: DocstringLiteral;
}

export type BodyStatement = OriginalStatement | InsertedStatement;

/**
 * Where new leading statements go when the tree is serialized.
 */
export interface BodyLayout {
  /** End of the header (after its colon). */
  headerEnd: number;
  /** Offset at which leading statements are spliced in. */
  insertAt: number;
  /** End of the whitespace replaced when the body is moved off the header line. */
  replaceEnd: number;
  /** Indentation of the body statements. */
  indent: string;
  /** Body shares the header line (`def f(): return 1`). */
  inline: boolean;
}

export interface DocumentableNode {
  readonly kind: NodeKind;
  readonly name: string;
  readonly qualifiedName: string;
  /** Positional parameter names; empty for classes. */
  readonly parameters: string[];
  /** Decorators, header and body of the definition. */
  readonly span: SourceSpan;
  readonly body: BodyStatement[];
  readonly layout: BodyLayout;
  readonly children: DocumentableNode[];
}

export interface SourceTree {
  /** The text the tree was parsed from. Never modified. */
  readonly text: string;
  readonly lineEnding: '\n' | '\r\n';
  /** Top-level definitions in source order; nested ones hang off `children`. */
  readonly definitions: DocumentableNode[];
  /** Leading module docstring, when present. */
  readonly moduleDocstring?: SourceSpan;
}

export interface Snippet {
  readonly node: DocumentableNode;
  readonly text: string;
}

export type GenerationFailureReason = 'timeout' | 'network' | 'empty' | 'malformed';

export interface GenerationFailure {
  reason: GenerationFailureReason;
  message: string;
}

export type GenerationResult =
  | { ok: true; literal: DocstringLiteral }
  | { ok: false; failure: GenerationFailure };

export type FileStatus = 'modified' | 'unchanged' | 'failed' | 'not-processed';

export type FileErrorKind =
  | 'ReadError'
  | 'SyntaxError'
  | 'ValidationError'
  | 'WriteError'
  | 'InternalError';

export interface NodeFailure {
  node: string;
  line: number;
  reason: GenerationFailureReason | 'extraction';
  message: string;
  attempts: number;
}

export interface FileOutcome {
  path: string;
  status: FileStatus;
  /** Docstrings written to disk (0 unless `modified`). */
  inserted: number;
  candidates: number;
  encoding?: SourceEncoding;
  decodedWithFallback: boolean;
  /** Cancellation stopped the file before every candidate was tried. */
  interrupted: boolean;
  failures: NodeFailure[];
  error?: {
    kind: FileErrorKind;
    message: string;
  };
}

export interface OutcomeSummary {
  files: number;
  modified: number;
  unchanged: number;
  failed: number;
  notProcessed: number;
  docstringsAdded: number;
  nodesSkipped: number;
}
