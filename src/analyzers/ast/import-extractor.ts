/**
 * Import Extractor Interface
 *
 * One implementation per language. Adding a language means adding an extractor;
 * graph construction and cycle detection do not change.
 */

import { FileParseError } from '../errors.js';
import { getLanguageFromPath, type SourceLanguage } from './language.js';
import type { ImportExtraction, RawImport, SourceUnit } from './types.js';

export interface ImportExtractor {
  /**
   * Languages this extractor handles
   */
  readonly languages: ReadonlyArray<SourceLanguage>;

  /**
   * Check if this extractor supports a given file
   */
  supports(filePath: string): boolean;

  /**
   * Parse one file and list its import targets.
   * Syntax errors are returned in `error`, never thrown.
   */
  extract(unit: SourceUnit): Promise<ImportExtraction>;

  /**
   * Clean up resources
   */
  dispose(): void;
}

/**
 * Wrap collected records in a lazy, restartable sequence.
 * Records that map to undefined are skipped.
 */
export function importSequence<T>(
  records: ReadonlyArray<T>,
  toImport: (record: T) => RawImport | undefined
): Iterable<RawImport> {
  return {
    *[Symbol.iterator]() {
      for (const record of records) {
        const raw = toImport(record);
        if (raw) yield raw;
      }
    },
  };
}

export const EMPTY_IMPORTS: Iterable<RawImport> = Object.freeze([]);

/**
 * Abstract base class for extractors
 */
export abstract class BaseImportExtractor implements ImportExtractor {
  abstract readonly languages: ReadonlyArray<SourceLanguage>;

  abstract extract(unit: SourceUnit): Promise<ImportExtraction>;

  supports(filePath: string): boolean {
    const language = getLanguageFromPath(filePath);
    return language !== undefined && this.languages.includes(language);
  }

  dispose(): void {
    // Override in subclasses if cleanup is needed
  }

  /**
   * Empty extraction carrying a parse diagnostic
   */
  protected failed(unit: SourceUnit, message: string, line?: number): ImportExtraction {
    return Object.freeze({
      imports: EMPTY_IMPORTS,
      error: new FileParseError(message, unit.filePath, line, { language: unit.language }),
    });
  }
}
