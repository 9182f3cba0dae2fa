/**
 * Source-tree discovery
 */

import { glob } from 'glob';
import { DEFAULT_IGNORE_PATTERNS } from '../../constants.js';
import { ALL_LANGUAGES, extensionsFor, getLanguageFromPath, type SourceLanguage } from '../ast/index.js';
import { compareIds } from './dependency-graph.js';

export interface DiscoveredFile {
  /** Root-relative POSIX path */
  readonly filePath: string;
  readonly language: SourceLanguage;
}

export interface WalkOptions {
  readonly languages?: ReadonlyArray<SourceLanguage>;
  /** Added to the built-in ignores */
  readonly ignorePatterns?: ReadonlyArray<string>;
}

/**
 * Glob pattern matching every extension of the given languages
 */
export function buildSourcePattern(languages: ReadonlyArray<SourceLanguage>): string {
  const extensions = extensionsFor(languages);
  if (extensions.length === 1) return `**/*.${extensions[0]}`;
  return `**/*.{${extensions.join(',')}}`;
}

/**
 * Find every source file of an enabled language under `projectRoot`, sorted by path
 */
export async function discoverSourceFiles(projectRoot: string, options: WalkOptions = {}): Promise<DiscoveredFile[]> {
  const languages = options.languages ?? ALL_LANGUAGES;
  if (languages.length === 0) return [];

  const enabled = new Set(languages);

  const files = await glob(buildSourcePattern(languages), {
    cwd: projectRoot,
    nodir: true,
    dot: false,
    posix: true,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...(options.ignorePatterns ?? [])],
  });

  const discovered: DiscoveredFile[] = [];
  for (const filePath of files) {
    const language = getLanguageFromPath(filePath);
    if (language && enabled.has(language)) {
      discovered.push({ filePath, language });
    }
  }

  return discovered.sort((a, b) => compareIds(a.filePath, b.filePath));
}
