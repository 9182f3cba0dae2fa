/**
 * YAML Configuration Loader
 * Loads the project's `.modgraph.yaml` with Zod validation and merges it with CLI overrides
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { ANALYSIS_CONFIG, CONFIG_FILE_NAME } from '../constants.js';
import { ConfigurationError } from '../analyzers/errors.js';
import { ALL_LANGUAGES, type SourceLanguage } from '../analyzers/ast/index.js';
import { validateThreshold } from '../analyzers/dependency/god-module-detector.js';
import type { LayerDefinition, ModuleGranularity } from '../analyzers/dependency/types.js';
import { ProjectConfigSchema, type ProjectConfigFile } from '../schemas/config-schema.js';
import { extractErrorMessage } from './error-handler.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_TEMPLATE_NAME = 'modgraph.yaml';

/**
 * Settings for one analysis run, after merging defaults, file and flags
 */
export interface ResolvedConfig {
  readonly godModuleThreshold: number;
  readonly granularity: ModuleGranularity;
  readonly sourceRoots: ReadonlyArray<string>;
  readonly languages: ReadonlyArray<SourceLanguage>;
  readonly concurrency: number;
  readonly ignorePatterns: ReadonlyArray<string>;
  readonly layers: ReadonlyArray<LayerDefinition>;
  /** Config file the values came from, if any */
  readonly configPath?: string;
}

/**
 * Values given on the command line; they win over the file
 */
export interface ConfigOverrides {
  readonly godModuleThreshold?: number;
  readonly granularity?: ModuleGranularity;
  readonly ignorePatterns?: ReadonlyArray<string>;
}

export interface LoadedProjectConfig {
  readonly config: ProjectConfigFile;
  readonly configPath?: string;
}

/**
 * Get the config-defaults directory path
 */
export function getConfigDefaultsDir(): string {
  // src/utils -> ../../config-defaults; dist/src/utils -> ../../../config-defaults
  const candidates = [join(__dirname, '../../config-defaults'), join(__dirname, '../../../config-defaults')];
  const found = candidates.find(candidate => existsSync(join(candidate, DEFAULT_TEMPLATE_NAME)));
  return found ?? candidates[0];
}

/**
 * Raw text of the default project configuration
 */
export function readDefaultTemplate(): string {
  const templatePath = join(getConfigDefaultsDir(), DEFAULT_TEMPLATE_NAME);
  try {
    return readFileSync(templatePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read default configuration template: ${extractErrorMessage(error)}`, {
      templatePath,
    });
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse and validate configuration text
 *
 * @throws ConfigurationError on YAML syntax errors or schema violations
 */
export function parseProjectConfig(text: string, source: string): ProjectConfigFile {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${extractErrorMessage(error)}`, { source });
  }

  // An empty file is an empty configuration
  if (raw === undefined || raw === null) {
    return {};
  }

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Validation failed for ${source}: ${formatIssues(result.error)}`, { source });
  }
  return result.data;
}

/**
 * Load `.modgraph.yaml` from the project root, or an explicit path.
 * A missing default file yields an empty configuration; a missing explicit file is an error.
 */
export function loadProjectConfig(projectRoot: string, explicitPath?: string): LoadedProjectConfig {
  const configPath = explicitPath
    ? isAbsolute(explicitPath)
      ? explicitPath
      : resolve(projectRoot, explicitPath)
    : join(projectRoot, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicitPath) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { configPath });
    }
    return { config: {} };
  }

  let text: string;
  try {
    text = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${extractErrorMessage(error)}`, {
      configPath,
    });
  }

  return { config: parseProjectConfig(text, configPath), configPath };
}

/**
 * Turn an ignore entry into a glob: a bare name matches that directory anywhere
 */
export function toIgnoreGlob(entry: string): string {
  const trimmed = entry.trim().replace(/\/+$/, '');
  if (/[*?[\]{}]/.test(trimmed) || trimmed.includes('/')) {
    return trimmed;
  }
  return `**/${trimmed}/**`;
}

/**
 * Merge defaults, file values and overrides (flags > file > defaults)
 *
 * @throws ConfigurationError when an override is out of range
 */
export function resolveConfig(loaded: LoadedProjectConfig, overrides: ConfigOverrides = {}): ResolvedConfig {
  const analysis: NonNullable<ProjectConfigFile['analysis']> = loaded.config.analysis ?? {};

  const godModuleThreshold = validateThreshold(
    overrides.godModuleThreshold ?? analysis.godModuleThreshold ?? ANALYSIS_CONFIG.GOD_MODULE_THRESHOLD
  );

  const ignoreEntries = [...(loaded.config.ignore ?? []), ...(overrides.ignorePatterns ?? [])];

  return Object.freeze({
    godModuleThreshold,
    granularity: overrides.granularity ?? analysis.granularity ?? 'file',
    sourceRoots: Object.freeze([...(analysis.sourceRoots ?? ANALYSIS_CONFIG.SOURCE_ROOTS)]),
    languages: Object.freeze([...(analysis.languages ?? ALL_LANGUAGES)]),
    concurrency: analysis.concurrency ?? ANALYSIS_CONFIG.CONCURRENCY,
    ignorePatterns: Object.freeze(Array.from(new Set(ignoreEntries.map(toIgnoreGlob)))),
    layers: Object.freeze(
      (loaded.config.architecture?.layers ?? []).map(layer =>
        Object.freeze({
          name: layer.name,
          level: layer.level,
          patterns: Object.freeze([...layer.patterns]),
          ...(layer.description !== undefined ? { description: layer.description } : {}),
        })
      )
    ),
    ...(loaded.configPath ? { configPath: loaded.configPath } : {}),
  });
}
