/**
 * Normalization of raw completions into docstring text
 */

import { cleandoc } from '../render.js';
import type { GenerationResult } from '../types.js';

const CODE_FENCE = /^```[\w+-]*[ \t]*\n([\s\S]*?)\n?[ \t]*```$/;
const ENCLOSING_QUOTES = /^[rRuU]?("""|''')([\s\S]*)\1$/;
const DOCSTRING_LABEL = /^docstring\s*:/i;

function stripCodeFence(text: string): string {
  const match = CODE_FENCE.exec(text);
  return match ? match[1].trim() : text;
}

function stripEnclosingQuotes(text: string): string {
  const match = ENCLOSING_QUOTES.exec(text);
  return match ? match[2].trim() : text;
}

function stripLabel(text: string): string {
  return DOCSTRING_LABEL.test(text) ? text.replace(DOCSTRING_LABEL, '').trim() : text;
}

export function normalizeGeneration(raw: string): GenerationResult {
  let text = raw.replace(/\r\n?/g, '\n').trim();
  text = stripCodeFence(text);
  text = stripLabel(text);
  text = stripEnclosingQuotes(text);
  text = stripLabel(text);
  text = cleandoc(text);

  if (text.length === 0) {
    return { ok: false, failure: { reason: 'empty', message: 'generation returned no text' } };
  }
  if (text.includes('"""')) {
    return {
      ok: false,
      failure: {
        reason: 'malformed',
        message: 'generation contains a triple-quote sequence that would end the literal',
      },
    };
  }
  return { ok: true, literal: { value: text } };
}
