/**
 * Import Extraction Types
 */

import type { FileParseError } from '../errors.js';
import type { SourceLanguage } from './language.js';

/**
 * One source file handed to an extractor
 */
export interface SourceUnit {
  /** Root-relative POSIX path */
  readonly filePath: string;
  readonly content: string;
  readonly language: SourceLanguage;
  /**
   * Package the file belongs to, used to anchor relative imports.
   * Directory path for path-scheme languages, dotted package for Python.
   */
  readonly packagePath: string;
}

/**
 * An import target as written in source, after relative normalization
 */
export interface RawImport {
  /** Specifier exactly as written (`./b.js`, `..models`, `lodash`) */
  readonly specifier: string;
  /** Normalized target; null when a relative import climbs above the source root */
  readonly target: string | null;
  /** Names brought in by the statement (`from X import a, b` gives `a`, `b`) */
  readonly names: ReadonlyArray<string>;
  readonly isRelative: boolean;
  readonly line: number;
}

/**
 * One function or method measured from the same syntax tree as the imports
 */
export interface FunctionMetric {
  readonly name: string;
  readonly line: number;
  /** Last line minus first line, plus one */
  readonly lines: number;
  /** Cyclomatic complexity: 1 + decision points */
  readonly complexity: number;
  /** Fingerprint of the function text with whitespace removed */
  readonly hash: string;
}

/**
 * Result of extracting one file
 *
 * `imports` is restartable: every iteration walks the same records in the same order.
 */
export interface ImportExtraction {
  readonly imports: Iterable<RawImport>;
  /** Functions in document order; absent when the file failed to parse */
  readonly functions?: ReadonlyArray<FunctionMetric>;
  readonly error?: FileParseError;
}
