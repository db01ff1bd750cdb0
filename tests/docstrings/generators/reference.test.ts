import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  docstringText,
  extractDocInfo,
  generateReferenceDocs,
  parseRaises,
  parseReturns,
  renderMarkdown,
} from '../../../src/docstrings/generators/reference.js';
import { parse } from '../../../src/docstrings/parsers/python.js';
import { insertDocstring } from '../../../src/docstrings/mutator.js';
import { recordingLogger } from '../../helpers/stub-oracle.js';

const SOURCE = [
  '"""Geometry helpers."""',
  '',
  'def area(r):',
  '    """Compute a circle area.',
  '',
  '    Args:',
  '        r: Radius.',
  '',
  '    Returns:',
  '        float: The area.',
  '',
  '    Raises:',
  '        ValueError: If r is negative.',
  '        TypeError',
  '    """',
  '    return 3.14 * r * r',
  '',
  'class Circle:',
  '    def grow(self, by):',
  '        pass',
  '',
].join('\n');

describe('Reference docs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pydocsmith-docs-'));
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should read docstring text from literal source', () => {
    expect(docstringText('r"""Raw \\d text."""')).toBe('Raw \\d text.');
    expect(docstringText("'one' 'two'")).toBe('onetwo');
    expect(docstringText('"""Title.\n\n    Body.\n    """')).toBe('Title.\n\nBody.');
  });

  it('should read the Returns and Raises sections', () => {
    const doc = 'Summary.\n\nReturns:\n    int: A count.\n\nRaises:\n    KeyError: Missing.\n    OSError\n\nNote:\n    x';
    expect(parseReturns(doc)).toBe('int: A count.');
    expect(parseRaises(doc)).toEqual(['KeyError', 'OSError']);
    expect(parseReturns('No sections.')).toBeNull();
    expect(parseRaises('No sections.')).toEqual([]);
  });

  it('should collect module, function and class entries', () => {
    const doc = extractDocInfo(parse(SOURCE), 'geometry.py');

    expect(doc.name).toBe('geometry.py');
    expect(doc.docstring).toBe('Geometry helpers.');
    expect(doc.entries.map((entry) => entry.qualifiedName)).toEqual(['area', 'Circle', 'Circle.grow']);

    const [area, circle, grow] = doc.entries;
    expect(area).toMatchObject({
      type: 'function',
      line: 3,
      args: ['r'],
      returns: 'float: The area.',
      raises: ['ValueError', 'TypeError'],
    });
    expect(circle).toMatchObject({ type: 'class', docstring: '', args: [], returns: null, raises: [] });
    expect(grow.args).toEqual(['self', 'by']);
  });

  it('should use docstrings inserted into the tree', () => {
    const tree = parse('def f():\n    pass\n');
    insertDocstring(tree.definitions[0], { value: 'Inserted.' });
    expect(extractDocInfo(tree, 'f.py').entries[0].docstring).toBe('Inserted.');
  });

  it('should render functions and classes as Markdown sections', () => {
    const markdown = renderMarkdown(extractDocInfo(parse('class A:\n    """An A."""\n\ndef b():\n    pass\n'), 'm.py'));
    expect(markdown).toBe(
      [
        '# m.py',
        '',
        '## Functions',
        '',
        '### b',
        '',
        '```python',
        'def b():\n    pass',
        '```',
        '',
        '## Classes',
        '',
        '### A',
        '',
        'An A.',
        '',
        '```python',
        'class A:\n    """An A."""',
        '```',
        '',
      ].join('\n'),
    );
  });

  it('should write one page per module and skip package initializers', async () => {
    const root = path.join(tempDir, 'project');
    const outputDir = path.join(tempDir, 'out');
    await fs.promises.mkdir(path.join(root, 'pkg'), { recursive: true });
    await fs.promises.writeFile(path.join(root, 'pkg', '__init__.py'), '');
    await fs.promises.writeFile(path.join(root, 'pkg', 'geometry.py'), SOURCE);
    await fs.promises.writeFile(path.join(root, 'broken.py'), 'def broken(:\n');
    const logger = recordingLogger();

    const written = await generateReferenceDocs(
      [path.join(root, 'broken.py'), path.join(root, 'pkg', '__init__.py'), path.join(root, 'pkg', 'geometry.py')],
      root,
      outputDir,
      logger,
    );

    expect(written).toEqual([path.join(outputDir, 'pkg', 'geometry.md')]);
    const page = fs.readFileSync(path.join(outputDir, 'pkg', 'geometry.md'), 'utf-8');
    expect(page.startsWith('# geometry.py\n\nGeometry helpers.\n\n## Functions\n\n### area\n')).toBe(true);
    expect(logger.lines.filter((line) => line.startsWith('error:'))).toHaveLength(1);
  });
});
