/**
 * Python Import Extractor Tests
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { Parser } from 'web-tree-sitter';
import { PythonImportExtractor, resolveRelativeModule } from '../../../src/analyzers/ast/python-import-extractor.js';
import type { RawImport, SourceUnit } from '../../../src/analyzers/ast/types.js';

describe('resolveRelativeModule', () => {
  it('should keep absolute modules as written', () => {
    expect(resolveRelativeModule('shop', 0, 'os.path')).toBe('os.path');
  });

  it('should anchor leading dots at the importing package', () => {
    expect(resolveRelativeModule('shop', 1, 'models')).toBe('shop.models');
    expect(resolveRelativeModule('shop', 1, '')).toBe('shop');
    expect(resolveRelativeModule('shop.api', 2, 'config')).toBe('shop.config');
    expect(resolveRelativeModule('shop.api', 2, '')).toBe('shop');
  });

  it('should return null when the dots climb above the top package', () => {
    expect(resolveRelativeModule('shop', 2, 'x')).toBeNull();
    expect(resolveRelativeModule('', 1, 'x')).toBeNull();
  });
});

describe('PythonImportExtractor', () => {
  let extractor: PythonImportExtractor;

  beforeAll(() => {
    extractor = new PythonImportExtractor();
  });

  afterAll(() => {
    extractor.dispose();
  });

  const extract = async (content: string, packagePath = 'shop'): Promise<RawImport[]> => {
    const result = await extractor.extract({ filePath: 'shop/orders.py', content, language: 'python', packagePath });
    expect(result.error).toBeUndefined();
    return [...result.imports];
  };

  it('should read plain imports, one record per module', async () => {
    const imports = await extract('import os, json as j\nimport shop.models\n');

    expect(imports).toEqual([
      { specifier: 'os', target: 'os', names: [], isRelative: false, line: 1 },
      { specifier: 'json', target: 'json', names: [], isRelative: false, line: 1 },
      { specifier: 'shop.models', target: 'shop.models', names: [], isRelative: false, line: 2 },
    ]);
  });

  it('should read from-imports with their names', async () => {
    const imports = await extract('from .models import User, Order as O\nfrom shop.util import (a,\n    b)\n');

    expect(imports).toEqual([
      { specifier: '.models', target: 'shop.models', names: ['User', 'Order'], isRelative: true, line: 1 },
      { specifier: 'shop.util', target: 'shop.util', names: ['a', 'b'], isRelative: false, line: 2 },
    ]);
  });

  it('should resolve bare dots against the package', async () => {
    const imports = await extract('from . import payments\nfrom .. import config\n', 'shop.api');

    expect(imports.map(i => [i.specifier, i.target, i.names])).toEqual([
      ['.', 'shop.api', ['payments']],
      ['..', 'shop', ['config']],
    ]);
  });

  it('should give a null target for imports above the top package', async () => {
    const imports = await extract('from ... import x\n');

    expect(imports.map(i => [i.specifier, i.target, i.isRelative])).toEqual([['...', null, true]]);
  });

  it('should find nested imports and skip __future__', async () => {
    const imports = await extract(
      [
        'from __future__ import annotations',
        'try:',
        '    import ujson as json',
        'except ImportError:',
        '    import json',
        '',
        'def load():',
        '    from .cache import get',
        '    return get()',
      ].join('\n')
    );

    expect(imports.map(i => [i.target, i.line])).toEqual([
      ['ujson', 3],
      ['json', 5],
      ['shop.cache', 8],
    ]);
  });

  it('should ignore imports inside comments and strings', async () => {
    const imports = await extract(
      ['# import os', '"""from a import b"""', "text = 'import sys'", "doc = '''", 'from shop import models', "'''"].join('\n')
    );

    expect(imports).toEqual([]);
  });

  it('should measure functions from the same tree', async () => {
    const result = await extractor.extract({
      filePath: 'shop/store.py',
      content: [
        'import os',
        '',
        'def load(path):',
        '    if not path:',
        '        return None',
        "    elif path.endswith('.json') and os.path.exists(path):",
        '        return [line for line in open(path)]',
        '    return path',
        '',
        'class Store:',
        '    async def save(self, item):',
        '        try:',
        '            assert item',
        '        except ValueError:',
        '            pass',
        '',
      ].join('\n'),
      language: 'python',
      packagePath: 'shop',
    });

    expect(result.functions?.map(f => [f.name, f.line, f.lines, f.complexity])).toEqual([
      ['load', 3, 6, 5],
      ['save', 11, 5, 3],
    ]);
  });

  it('should report invalid syntax with its line', async () => {
    const result = await extractor.extract({
      filePath: 'shop/bad.py',
      content: 'import os\n\ndef broken(:\n    pass\n',
      language: 'python',
      packagePath: 'shop',
    });

    expect(result.error?.filePath).toBe('shop/bad.py');
    expect(result.error?.message).toMatch(/^Invalid Python syntax/);
    expect([...result.imports]).toEqual([]);
    expect(result.functions).toBeUndefined();
  });

  it('should support only python files', () => {
    expect(extractor.supports('a.py')).toBe(true);
    expect(extractor.supports('a.ts')).toBe(false);
  });
});

describe('PythonImportExtractor parser setup', () => {
  it('should build one parser for concurrent first calls', async () => {
    const setLanguage = vi.spyOn(Parser.prototype, 'setLanguage');
    const fresh = new PythonImportExtractor();

    try {
      const results = await Promise.all(
        Array.from({ length: 8 }, (_, i) =>
          fresh.extract({ filePath: `shop/m${i}.py`, content: `import m${i}\n`, language: 'python', packagePath: 'shop' })
        )
      );

      expect(setLanguage).toHaveBeenCalledTimes(1);
      expect(results.map(result => [...result.imports].map(i => i.target))).toEqual(
        Array.from({ length: 8 }, (_, i) => [`m${i}`])
      );
    } finally {
      fresh.dispose();
      setLanguage.mockRestore();
    }
  });

  it('should build a new parser after dispose', async () => {
    const fresh = new PythonImportExtractor();
    const unit: SourceUnit = { filePath: 'shop/a.py', content: 'import os\n', language: 'python', packagePath: 'shop' };

    await fresh.extract(unit);
    fresh.dispose();
    const result = await fresh.extract(unit);

    expect([...result.imports].map(i => i.target)).toEqual(['os']);
    fresh.dispose();
  });
});
