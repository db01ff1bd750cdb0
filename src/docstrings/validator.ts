/**
 * Regeneration and validation
 */

import { ValidationError, errorMessage } from '../core/errors.js';
import { walkDefinitions } from './locator.js';
import { hasEscapedLineBreak, parse, serialize } from './parsers/python.js';
import type { SourceTree } from './types.js';

export type FinalizeResult = { ok: true; text: string } | { ok: false; error: ValidationError };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Serialize the tree and re-parse the result. The text is only returned when
 * it parses and every inserted docstring is the first statement of the same
 * definition in the re-parsed tree.
 */
export function finalize(tree: SourceTree): FinalizeResult {
  let text: string;
  try {
    text = serialize(tree);
  } catch (error) {
    return {
      ok: false,
      error: new ValidationError(`serialization failed: ${errorMessage(error)}`, toError(error)),
    };
  }

  let reparsed: SourceTree;
  try {
    reparsed = parse(text);
  } catch (error) {
    return {
      ok: false,
      error: new ValidationError(
        `regenerated source does not parse: ${errorMessage(error)}`,
        toError(error),
      ),
    };
  }

  const before = [...walkDefinitions(tree)];
  const after = [...walkDefinitions(reparsed)];
  if (before.length !== after.length) {
    return {
      ok: false,
      error: new ValidationError(
        `regenerated source has ${after.length} definitions, expected ${before.length}`,
      ),
    };
  }

  for (let i = 0; i < before.length; i += 1) {
    const original = before[i];
    const regenerated = after[i];
    if (original.qualifiedName !== regenerated.qualifiedName) {
      return {
        ok: false,
        error: new ValidationError(
          `definition order changed: found ${regenerated.qualifiedName} where ${original.qualifiedName} was`,
        ),
      };
    }
    if (original.body[0]?.type !== 'inserted') continue;

    const first = regenerated.body[0];
    if (first?.type !== 'original' || !first.docstring) {
      return {
        ok: false,
        error: new ValidationError(
          `docstring for ${original.qualifiedName} is not the first statement after regeneration`,
        ),
      };
    }
    // tree-sitter accepts a body statement joined to its header by `\`; Python does not.
    if (hasEscapedLineBreak(text.slice(regenerated.layout.headerEnd, first.span.start))) {
      return {
        ok: false,
        error: new ValidationError(
          `docstring for ${original.qualifiedName} continues the header line of its definition`,
        ),
      };
    }
  }

  return { ok: true, text };
}
