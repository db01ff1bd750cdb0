/**
 * Docstring generator client
 */

import { errorMessage } from '../../core/errors.js';
import type { GenerationResult, NodeKind, Snippet } from '../types.js';
import { normalizeGeneration } from './normalize.js';
import { OracleError, type DocstringOracle } from './oracle.js';
import { GOOGLE_STYLE_CONTRACT, buildPrompt, type GenerationRequest } from './prompt.js';

export interface GeneratorOptions {
  timeoutMs: number;
  /** Replaces the built-in Google-style contract in the prompt. */
  styleTemplate?: string;
}

export interface GenerationContext {
  fileName?: string;
}

/**
 * Turns one snippet into one docstring literal, or a classified failure.
 * Exactly one oracle call per `generate`; no retries.
 */
export class DocstringGenerator {
  constructor(
    private readonly oracle: DocstringOracle,
    private readonly options: GeneratorOptions,
  ) {}

  buildRequest(snippet: Snippet, kind: NodeKind, context: GenerationContext = {}): GenerationRequest {
    return {
      snippet: snippet.text,
      kind,
      style: this.options.styleTemplate ?? GOOGLE_STYLE_CONTRACT,
      fileName: context.fileName,
    };
  }

  async generate(
    snippet: Snippet,
    kind: NodeKind,
    context: GenerationContext = {},
  ): Promise<GenerationResult> {
    const messages = buildPrompt(this.buildRequest(snippet, kind, context));
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleError(`no response within ${timeoutMs}ms`, 'timeout'));
      }, timeoutMs);
    });

    try {
      const raw = await Promise.race([
        this.oracle.complete(messages, { timeoutMs, signal: controller.signal }),
        deadline,
      ]);
      return normalizeGeneration(raw);
    } catch (error) {
      const reason = error instanceof OracleError ? error.reason : 'network';
      return { ok: false, failure: { reason, message: errorMessage(error) } };
    } finally {
      clearTimeout(timer);
    }
  }
}
