/**
 * Tests for commands/init
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createInitCommand, initProjectConfig, runInit } from '../../src/commands/init.js';
import { readDefaultTemplate } from '../../src/utils/config-loader.js';

describe('init command', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'modgraph-init-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('initProjectConfig', () => {
    it('should write the default template', async () => {
      const result = initProjectConfig(tempDir);

      expect(result).toEqual({ configPath: path.join(tempDir, '.modgraph.yaml'), created: true });
      expect(await fs.readFile(result.configPath, 'utf-8')).toBe(readDefaultTemplate());
    });

    it('should keep an existing config unless forced', async () => {
      const configPath = path.join(tempDir, '.modgraph.yaml');
      await fs.writeFile(configPath, 'ignore: [vendor]\n', 'utf-8');

      expect(initProjectConfig(tempDir).created).toBe(false);
      expect(await fs.readFile(configPath, 'utf-8')).toBe('ignore: [vendor]\n');

      expect(initProjectConfig(tempDir, { force: true }).created).toBe(true);
      expect(await fs.readFile(configPath, 'utf-8')).toBe(readDefaultTemplate());
    });
  });

  describe('runInit', () => {
    it('should exit cleanly whether or not the file existed', () => {
      expect(runInit(tempDir, {})).toBe(0);
      expect(runInit(tempDir, {})).toBe(0);
    });

    it('should fail when the directory does not exist', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(runInit(path.join(tempDir, 'missing'), {})).toBe(2);
    });
  });

  describe('createInitCommand', () => {
    it('should expose a --force option', () => {
      const command = createInitCommand();

      expect(command.name()).toBe('init');
      expect(command.options.map(option => option.long)).toEqual(['--force']);
    });
  });
});
