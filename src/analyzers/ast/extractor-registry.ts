/**
 * Import Extractor Registry
 *
 * Picks the extractor for a file by its language. Extractors are created
 * lazily, so a TypeScript-only project never loads the Python grammar.
 */

import { ALL_LANGUAGES, getLanguageFromPath, type SourceLanguage } from './language.js';
import type { ImportExtractor } from './import-extractor.js';
import { PythonImportExtractor } from './python-import-extractor.js';
import { TypeScriptImportExtractor } from './typescript-import-extractor.js';

type ExtractorFactory = () => ImportExtractor;

const DEFAULT_FACTORIES: ReadonlyArray<readonly [ReadonlyArray<SourceLanguage>, ExtractorFactory]> = [
  [['typescript', 'javascript'], () => new TypeScriptImportExtractor()],
  [['python'], () => new PythonImportExtractor()],
];

export class ExtractorRegistry {
  private readonly factories = new Map<SourceLanguage, ExtractorFactory>();
  private readonly instances = new Map<ExtractorFactory, ImportExtractor>();

  constructor(private readonly enabledLanguages: ReadonlyArray<SourceLanguage> = ALL_LANGUAGES) {
    for (const [languages, factory] of DEFAULT_FACTORIES) {
      for (const language of languages) {
        this.factories.set(language, factory);
      }
    }
  }

  /**
   * Register (or replace) the extractor used for a set of languages
   */
  register(languages: ReadonlyArray<SourceLanguage>, factory: ExtractorFactory): void {
    for (const language of languages) {
      this.factories.set(language, factory);
    }
  }

  /**
   * Get the extractor for a file, or undefined when its language is not enabled
   */
  getExtractor(filePath: string): ImportExtractor | undefined {
    const language = getLanguageFromPath(filePath);
    if (!language || !this.enabledLanguages.includes(language)) return undefined;

    const factory = this.factories.get(language);
    if (!factory) return undefined;

    let extractor = this.instances.get(factory);
    if (!extractor) {
      extractor = factory();
      this.instances.set(factory, extractor);
    }
    return extractor;
  }

  getEnabledLanguages(): SourceLanguage[] {
    return [...this.enabledLanguages];
  }

  /**
   * Dispose every extractor created so far
   */
  dispose(): void {
    for (const extractor of this.instances.values()) {
      extractor.dispose();
    }
    this.instances.clear();
  }
}
