/**
 * Import Extraction Module
 */

export { ExtractorRegistry } from './extractor-registry.js';
export { BaseImportExtractor, importSequence, type ImportExtractor } from './import-extractor.js';
export { PythonImportExtractor, resolveRelativeModule } from './python-import-extractor.js';
export { TypeScriptImportExtractor, normalizeRelativePath, isRelativeSpecifier } from './typescript-import-extractor.js';
export {
  ALL_LANGUAGES,
  LANGUAGE_NAMING,
  EXTENSION_TO_LANGUAGE,
  extensionsFor,
  getLanguageFromPath,
  type ModuleNamingScheme,
  type SourceLanguage,
} from './language.js';
export type { FunctionMetric, ImportExtraction, RawImport, SourceUnit } from './types.js';
