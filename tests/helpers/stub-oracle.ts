import type { DocstringOracle, OracleCallOptions } from '../../src/docstrings/llm/oracle.js';
import type { PromptMessage } from '../../src/docstrings/llm/prompt.js';
import type { EngineLogger } from '../../src/core/logger.js';

export type Responder = (snippet: string, call: number) => string | Promise<string>;

/**
 * The code block of the user prompt, i.e. the snippet sent for generation.
 */
export function snippetOf(messages: PromptMessage[]): string {
  const user = messages.find((message) => message.role === 'user')?.content ?? '';
  const match = /```python\n([\s\S]*)\n```$/.exec(user);
  return match ? match[1] : '';
}

/**
 * The name of the definition a snippet starts with (after decorators).
 */
export function definitionName(snippet: string): string {
  return /(?:def|class)\s+(\w+)/.exec(snippet)?.[1] ?? '';
}

export class StubOracle implements DocstringOracle {
  readonly snippets: string[] = [];
  readonly options: OracleCallOptions[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(messages: PromptMessage[], options: OracleCallOptions): Promise<string> {
    const snippet = snippetOf(messages);
    this.snippets.push(snippet);
    this.options.push(options);
    return this.respond(snippet, this.snippets.length);
  }
}

export interface RecordingLogger extends EngineLogger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}
