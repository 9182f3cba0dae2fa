/**
 * Source Languages
 *
 * Maps file extensions to the languages the import extractors understand,
 * and each language to the way its module ids are spelled.
 */

/**
 * Supported programming languages
 */
export type SourceLanguage = 'typescript' | 'javascript' | 'python';

export const ALL_LANGUAGES: readonly SourceLanguage[] = ['typescript', 'javascript', 'python'];

/**
 * How module ids are spelled for a language:
 * - `path`: root-relative path without extension (`src/order/service`)
 * - `dotted`: dotted name relative to the source root (`order.service`)
 */
export type ModuleNamingScheme = 'path' | 'dotted';

export const LANGUAGE_NAMING: Readonly<Record<SourceLanguage, ModuleNamingScheme>> = {
  typescript: 'path',
  javascript: 'path',
  python: 'dotted',
};

/**
 * Map file extensions to languages
 */
export const EXTENSION_TO_LANGUAGE: Readonly<Record<string, SourceLanguage>> = {
  // TypeScript
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  // JavaScript
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  // Python
  '.py': 'python',
  '.pyw': 'python',
};

/**
 * Get the file extension (lowercased, with the dot), or '' when there is none
 */
export function getExtension(filePath: string): string {
  const slash = filePath.lastIndexOf('/');
  const dot = filePath.lastIndexOf('.');
  if (dot <= slash + 1) return '';
  return filePath.slice(dot).toLowerCase();
}

/**
 * Get language from file path
 */
export function getLanguageFromPath(filePath: string): SourceLanguage | undefined {
  if (filePath.endsWith('.d.ts')) return undefined;
  return EXTENSION_TO_LANGUAGE[getExtension(filePath)];
}

/**
 * Extensions handled for a set of languages, without the leading dot
 */
export function extensionsFor(languages: readonly SourceLanguage[]): string[] {
  return Object.entries(EXTENSION_TO_LANGUAGE)
    .filter(([, language]) => languages.includes(language))
    .map(([ext]) => ext.slice(1))
    .sort();
}
