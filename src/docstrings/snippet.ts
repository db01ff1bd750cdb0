/**
 * Snippet extraction
 */

import { ExtractionError } from '../core/errors.js';
import type { DocumentableNode, Snippet } from './types.js';

/**
 * Return the exact original text of a definition (decorators, signature and
 * body). Spans are recorded at parse time, so extraction always reads the
 * pre-mutation text.
 */
export function extractSource(node: DocumentableNode, originalText: string): Snippet {
  const { start, end } = node.span;
  if (start < 0 || end > originalText.length || start >= end) {
    throw new ExtractionError(
      `span ${start}..${end} of ${node.qualifiedName} is outside the source (${originalText.length} chars)`,
    );
  }
  return Object.freeze({ node, text: originalText.slice(start, end) });
}
