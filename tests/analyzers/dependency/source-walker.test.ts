/**
 * Source Walker Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildSourcePattern, discoverSourceFiles } from '../../../src/analyzers/dependency/source-walker.js';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';

describe('buildSourcePattern', () => {
  it('should list every extension of the enabled languages', () => {
    expect(buildSourcePattern(['python'])).toBe('**/*.{py,pyw}');
    expect(buildSourcePattern(['typescript'])).toBe('**/*.{cts,mts,ts,tsx}');
  });
});

describe('discoverSourceFiles', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modgraph-walk-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const touch = async (filename: string): Promise<void> => {
    const filePath = path.join(tempDir, filename);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '', 'utf-8');
  };

  it('should return sorted root-relative paths with their languages', async () => {
    await touch('src/z.ts');
    await touch('src/a.py');
    await touch('lib/util.js');
    await touch('README.md');

    expect(await discoverSourceFiles(tempDir)).toEqual([
      { filePath: 'lib/util.js', language: 'javascript' },
      { filePath: 'src/a.py', language: 'python' },
      { filePath: 'src/z.ts', language: 'typescript' },
    ]);
  });

  it('should skip declaration files and built-in ignores', async () => {
    await touch('src/types.d.ts');
    await touch('src/index.ts');
    await touch('node_modules/pkg/index.ts');
    await touch('pkg/__pycache__/mod.py');
    await touch('.venv/lib/site.py');

    const files = await discoverSourceFiles(tempDir);

    expect(files.map(f => f.filePath)).toEqual(['src/index.ts']);
  });

  it('should apply extra ignore patterns and language filters', async () => {
    await touch('app/main.py');
    await touch('app/tests/test_main.py');
    await touch('app/web.ts');

    const files = await discoverSourceFiles(tempDir, { languages: ['python'], ignorePatterns: ['**/tests/**'] });

    expect(files).toEqual([{ filePath: 'app/main.py', language: 'python' }]);
  });

  it('should find nothing when no language is enabled', async () => {
    await touch('a.ts');

    expect(await discoverSourceFiles(tempDir, { languages: [] })).toEqual([]);
  });
});
