/**
 * Prompt construction for docstring generation
 */

import type { NodeKind } from '../types.js';

export interface PromptMessage {
  role: 'system' | 'user';
  content: string;
}

export interface GenerationRequest {
  snippet: string;
  kind: NodeKind;
  /** Style contract the docstring has to follow. */
  style: string;
  fileName?: string;
}

export const GOOGLE_STYLE_CONTRACT = [
  'Follow the Google Python docstring convention (PEP 257 compatible):',
  '- Start with a one-line summary.',
  '- Then, only where applicable, add the sections "Args:", "Returns:" and "Raises:".',
  '- Put each argument, return value and exception on its own line, indented below its',
  '  section header, followed by a short description.',
].join('\n');

export const SYSTEM_PROMPT = 'You are an assistant that writes Google-style Python docstrings.';

const KIND_LABELS: Record<NodeKind, string> = {
  function: 'function',
  'async-function': 'async function',
  class: 'class',
};

export function buildPrompt(request: GenerationRequest): PromptMessage[] {
  const origin = request.fileName ? ` from the file '${request.fileName}'` : '';
  const user = [
    `Write a concise, informative docstring for the following Python ${KIND_LABELS[request.kind]}${origin}.`,
    '',
    request.style,
    '',
    'Return ONLY the docstring text itself: no surrounding quotes, no code fences, no explanations.',
    '',
    'Code:',
    '```python',
    request.snippet,
    '```',
  ].join('\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}
