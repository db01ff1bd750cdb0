/**
 * The generation service boundary
 */

import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import { errorMessage } from '../../core/errors.js';
import type { PromptMessage } from './prompt.js';

export type TransportFailure = 'timeout' | 'network';

/**
 * Raised by an oracle when the service could not be reached or did not answer
 * in time.
 */
export class OracleError extends Error {
  constructor(
    message: string,
    public readonly reason: TransportFailure,
  ) {
    super(message);
    this.name = 'OracleError';
  }
}

export interface OracleCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * A text-generation service answering one prompt with one completion.
 */
export interface DocstringOracle {
  complete(messages: PromptMessage[], options: OracleCallOptions): Promise<string>;
}

export interface OpenAIOracleOptions {
  endpoint: string;
  model: string;
  /** Passed through as-is; local endpoints often accept any value. */
  apiKey?: string;
}

const PLACEHOLDER_API_KEY = 'no-key';

/**
 * Oracle backed by an OpenAI chat-completion compatible endpoint.
 */
export class OpenAIOracle implements DocstringOracle {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIOracleOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey ?? PLACEHOLDER_API_KEY,
      baseURL: options.endpoint,
      // Retrying is the caller's decision.
      maxRetries: 0,
    });
  }

  async complete(messages: PromptMessage[], options: OracleCallOptions): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map((message) =>
            message.role === 'system'
              ? { role: 'system' as const, content: message.content }
              : { role: 'user' as const, content: message.content },
          ),
        },
        { timeout: options.timeoutMs, signal: options.signal },
      );
      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
        throw new OracleError(`request timed out after ${options.timeoutMs}ms`, 'timeout');
      }
      throw new OracleError(`request failed: ${errorMessage(error)}`, 'network');
    }
  }
}
