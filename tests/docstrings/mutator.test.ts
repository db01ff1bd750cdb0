import { describe, it, expect } from '@jest/globals';
import { parse } from '../../src/docstrings/parsers/python.js';
import { insertDocstring } from '../../src/docstrings/mutator.js';
import { isDocumented } from '../../src/docstrings/locator.js';

describe('Tree mutator', () => {
  it('should make the literal the first statement of the body', () => {
    const tree = parse('def a():\n    x = 1\n    return x\n\ndef b():\n    pass\n');
    const [a, b] = tree.definitions;
    const before = [...a.body];

    insertDocstring(a, { value: 'Compute x.' });

    expect(a.body[0]).toEqual({ type: 'inserted', literal: { value: 'Compute x.' } });
    expect(a.body.slice(1)).toEqual(before);
    expect(isDocumented(a)).toBe(true);
    expect(isDocumented(b)).toBe(false);
    expect(b.body).toHaveLength(1);
  });

  it('should leave the original text untouched', () => {
    const text = 'class C:\n    pass\n';
    const tree = parse(text);
    insertDocstring(tree.definitions[0], { value: 'A class.' });
    expect(tree.text).toBe(text);
  });
});
