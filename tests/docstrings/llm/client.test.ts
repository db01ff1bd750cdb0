import { describe, it, expect } from '@jest/globals';
import { DocstringGenerator } from '../../../src/docstrings/llm/client.js';
import { OracleError } from '../../../src/docstrings/llm/oracle.js';
import { GOOGLE_STYLE_CONTRACT, buildPrompt } from '../../../src/docstrings/llm/prompt.js';
import { parse } from '../../../src/docstrings/parsers/python.js';
import { extractSource } from '../../../src/docstrings/snippet.js';
import type { Snippet } from '../../../src/docstrings/types.js';
import { StubOracle } from '../../helpers/stub-oracle.js';

function snippetFor(source: string): Snippet {
  const tree = parse(source);
  return extractSource(tree.definitions[0], tree.text);
}

describe('DocstringGenerator', () => {
  const snippet = snippetFor('def add(a, b):\n    return a + b\n');

  it('should send the snippet and return the normalized literal', async () => {
    const oracle = new StubOracle(() => '"""Adds two numbers."""');
    const generator = new DocstringGenerator(oracle, { timeoutMs: 1000 });

    const result = await generator.generate(snippet, 'function', { fileName: 'math.py' });

    expect(result).toEqual({ ok: true, literal: { value: 'Adds two numbers.' } });
    expect(oracle.snippets).toEqual(['def add(a, b):\n    return a + b']);
    expect(oracle.options[0].timeoutMs).toBe(1000);
  });

  it('should report a timeout when the oracle does not answer in time', async () => {
    const oracle = new StubOracle(() => new Promise<string>(() => undefined));
    const generator = new DocstringGenerator(oracle, { timeoutMs: 20 });

    const result = await generator.generate(snippet, 'function');

    expect(result).toEqual({
      ok: false,
      failure: { reason: 'timeout', message: 'no response within 20ms' },
    });
    expect(oracle.options[0].signal?.aborted).toBe(true);
  });

  it('should pass through transport failures reported by the oracle', async () => {
    const oracle = new StubOracle(() => {
      throw new OracleError('connection refused', 'network');
    });
    const result = await new DocstringGenerator(oracle, { timeoutMs: 1000 }).generate(
      snippet,
      'function',
    );
    expect(result).toEqual({
      ok: false,
      failure: { reason: 'network', message: 'connection refused' },
    });
  });

  it('should classify unexpected oracle errors as network failures', async () => {
    const oracle = new StubOracle(() => {
      throw new Error('socket hang up');
    });
    const result = await new DocstringGenerator(oracle, { timeoutMs: 1000 }).generate(
      snippet,
      'function',
    );
    expect(result).toEqual({ ok: false, failure: { reason: 'network', message: 'socket hang up' } });
  });

  it('should report empty and malformed generations', async () => {
    const empty = new DocstringGenerator(new StubOracle(() => '  '), { timeoutMs: 1000 });
    const malformed = new DocstringGenerator(new StubOracle(() => 'Ends """ early'), {
      timeoutMs: 1000,
    });

    expect(await empty.generate(snippet, 'function')).toMatchObject({
      ok: false,
      failure: { reason: 'empty' },
    });
    expect(await malformed.generate(snippet, 'function')).toMatchObject({
      ok: false,
      failure: { reason: 'malformed' },
    });
  });

  it('should build requests with the configured style', () => {
    const custom = new DocstringGenerator(new StubOracle(() => ''), {
      timeoutMs: 1000,
      styleTemplate: 'Use NumPy style.',
    });
    const standard = new DocstringGenerator(new StubOracle(() => ''), { timeoutMs: 1000 });

    expect(custom.buildRequest(snippet, 'class').style).toBe('Use NumPy style.');
    expect(standard.buildRequest(snippet, 'function', { fileName: 'a.py' })).toEqual({
      snippet: 'def add(a, b):\n    return a + b',
      kind: 'function',
      style: GOOGLE_STYLE_CONTRACT,
      fileName: 'a.py',
    });
  });
});

describe('buildPrompt', () => {
  it('should describe the definition kind and fence the code', () => {
    const [system, user] = buildPrompt({
      snippet: 'async def fetch():\n    pass',
      kind: 'async-function',
      style: 'STYLE',
      fileName: 'net.py',
    });
    expect(system.role).toBe('system');
    expect(user.role).toBe('user');
    expect(user.content.split('\n')[0]).toBe(
      "Write a concise, informative docstring for the following Python async function from the file 'net.py'.",
    );
    expect(user.content).toContain('\nSTYLE\n');
    expect(user.content.endsWith('```python\nasync def fetch():\n    pass\n```')).toBe(true);
  });
});
