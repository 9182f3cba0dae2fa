/**
 * Module Resolver
 *
 * Gives every source file a canonical module id, groups files into modules
 * at the configured granularity, and classifies import targets as internal,
 * external (third-party or standard library) or unresolved.
 */

import { posix } from 'path';
import { ANALYSIS_CONFIG } from '../../constants.js';
import { LANGUAGE_NAMING, type ModuleNamingScheme, type RawImport, type SourceLanguage } from '../ast/index.js';
import { compareIds } from './dependency-graph.js';
import { findLayer } from './layer-validator.js';
import type { LayerDefinition, ModuleGranularity, ModuleId, ModuleInfo } from './types.js';

export const DEFAULT_SOURCE_ROOTS: ReadonlyArray<string> = ANALYSIS_CONFIG.SOURCE_ROOTS;

/**
 * A source file and the module it belongs to
 */
export interface FileModule {
  readonly filePath: string;
  readonly language: SourceLanguage;
  /** Id of the file itself */
  readonly fileModuleId: ModuleId;
  /** Id of the graph node the file belongs to (equals fileModuleId at `file` granularity) */
  readonly moduleId: ModuleId;
  /** Path of the graph node: the file, or its package directory */
  readonly modulePath: string;
  /** Source root the file sits under ('' for the project root) */
  readonly sourceRoot: string;
  /** Anchor for relative imports: directory (path scheme) or dotted package */
  readonly packagePath: string;
}

export type Resolution =
  | { readonly kind: 'internal'; readonly moduleId: ModuleId; readonly fileModuleId: ModuleId }
  | { readonly kind: 'external' }
  | { readonly kind: 'unresolved' };

export interface ModuleResolverOptions {
  readonly granularity?: ModuleGranularity;
  readonly sourceRoots?: ReadonlyArray<string>;
  readonly layers?: ReadonlyArray<LayerDefinition>;
}

export interface FileDescriptor {
  readonly filePath: string;
  readonly language: SourceLanguage;
  /** Explicit file-level id; derived from the path when omitted */
  readonly moduleId?: ModuleId;
}

function stripExtension(filePath: string): string {
  const base = posix.basename(filePath);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? filePath.slice(0, filePath.length - (base.length - dot)) : filePath;
}

/**
 * Longest configured source root containing the file, or '' for the project root
 */
export function findSourceRoot(filePath: string, sourceRoots: ReadonlyArray<string>): string {
  const roots = sourceRoots
    .map(root => root.replace(/^\.\/+/, '').replace(/\/+$/, ''))
    .filter(root => root.length > 0)
    .sort((a, b) => b.length - a.length);
  return roots.find(root => filePath.startsWith(`${root}/`)) ?? '';
}

function withinRoot(filePath: string, sourceRoot: string): string {
  return sourceRoot ? filePath.slice(sourceRoot.length + 1) : filePath;
}

/**
 * Canonical file-level module id
 */
export function deriveModuleId(filePath: string, scheme: ModuleNamingScheme, sourceRoot: string): ModuleId {
  if (scheme === 'path') {
    return stripExtension(filePath);
  }

  const parts = stripExtension(withinRoot(filePath, sourceRoot)).split('/');
  if (parts.length > 1 && parts[parts.length - 1] === '__init__') {
    parts.pop();
  }
  return parts.join('.');
}

function isPackageMarker(filePath: string): boolean {
  return /^__init__\.pyw?$/.test(posix.basename(filePath));
}

/**
 * Work out ids, grouping and the relative-import anchor for one file
 */
export function describeFile(
  descriptor: FileDescriptor,
  options: ModuleResolverOptions = {}
): FileModule {
  const { filePath, language } = descriptor;
  const scheme = LANGUAGE_NAMING[language];
  const sourceRoot = findSourceRoot(filePath, options.sourceRoots ?? DEFAULT_SOURCE_ROOTS);
  const fileModuleId = descriptor.moduleId ?? deriveModuleId(filePath, scheme, sourceRoot);

  let packagePath: string;
  if (scheme === 'path') {
    const dir = posix.dirname(filePath);
    packagePath = dir === '.' ? '' : dir;
  } else if (isPackageMarker(filePath)) {
    packagePath = fileModuleId;
  } else {
    const dot = fileModuleId.lastIndexOf('.');
    packagePath = dot >= 0 ? fileModuleId.slice(0, dot) : '';
  }

  let moduleId = fileModuleId;
  let modulePath = filePath;
  if (options.granularity === 'package') {
    const inner = withinRoot(filePath, sourceRoot).split('/');
    if (inner.length > 1) {
      const packageDir = sourceRoot ? `${sourceRoot}/${inner[0]}` : inner[0];
      moduleId = scheme === 'path' ? packageDir : inner[0];
      modulePath = packageDir;
    }
  }

  return Object.freeze({ filePath, language, fileModuleId, moduleId, modulePath, sourceRoot, packagePath });
}

export class ModuleResolver {
  private readonly files = new Map<string, FileModule>();
  private readonly idsByScheme = new Map<ModuleNamingScheme, Map<ModuleId, FileModule>>();
  private readonly packageModules = new Set<ModuleId>();
  private readonly granularity: ModuleGranularity;
  private readonly modules: ModuleInfo[];

  constructor(descriptors: ReadonlyArray<FileDescriptor>, private readonly options: ModuleResolverOptions = {}) {
    this.granularity = options.granularity ?? 'file';

    const sorted = [...descriptors].sort((a, b) => compareIds(a.filePath, b.filePath));
    for (const descriptor of sorted) {
      const file = describeFile(descriptor, options);
      this.files.set(file.filePath, file);

      const scheme = LANGUAGE_NAMING[file.language];
      let ids = this.idsByScheme.get(scheme);
      if (!ids) {
        ids = new Map();
        this.idsByScheme.set(scheme, ids);
      }
      // a.js and a.ts share an id; the first in path order owns it
      if (!ids.has(file.fileModuleId)) {
        ids.set(file.fileModuleId, file);
      }
      if (scheme === 'dotted' && file.moduleId !== file.fileModuleId) {
        this.packageModules.add(file.moduleId);
      }
    }

    this.modules = this.buildModules();
  }

  /**
   * Modules (graph nodes), sorted by id
   */
  getModules(): ModuleInfo[] {
    return [...this.modules];
  }

  getFileModule(filePath: string): FileModule | undefined {
    return this.files.get(filePath);
  }

  /**
   * Classify one import of `fromFilePath`
   */
  resolve(fromFilePath: string, raw: RawImport): Resolution {
    const from = this.files.get(fromFilePath);
    if (!from || raw.target === null) {
      return { kind: 'unresolved' };
    }

    const scheme = LANGUAGE_NAMING[from.language];
    // Bare specifiers are packages; there is no baseUrl or paths mapping
    if (scheme === 'path' && !raw.isRelative) {
      return { kind: 'external' };
    }

    const ids = this.idsByScheme.get(scheme);
    const candidates = scheme === 'path' ? this.pathCandidates(raw.target) : this.dottedCandidates(raw.target, raw.names);

    for (const candidate of candidates) {
      const target = ids?.get(candidate);
      if (target) {
        return { kind: 'internal', moduleId: target.moduleId, fileModuleId: target.fileModuleId };
      }
    }

    // `import order` where order/ is a namespace package with no __init__.py
    if (this.granularity === 'package' && scheme === 'dotted') {
      const head = raw.target.split('.')[0];
      if (this.packageModules.has(head)) {
        return { kind: 'internal', moduleId: head, fileModuleId: head };
      }
    }

    return raw.isRelative ? { kind: 'unresolved' } : { kind: 'external' };
  }

  private pathCandidates(target: string): string[] {
    return target === '' ? ['index'] : [target, `${target}/index`];
  }

  /**
   * `from a.b import c` tries a.b.c (c may be a submodule), then a.b, then a
   */
  private dottedCandidates(target: string, names: ReadonlyArray<string>): string[] {
    const candidates = names.map(name => `${target}.${name}`);
    const parts = target.split('.');
    for (let length = parts.length; length > 0; length--) {
      candidates.push(parts.slice(0, length).join('.'));
    }
    return candidates;
  }

  private buildModules(): ModuleInfo[] {
    const grouped = new Map<ModuleId, { path: string; language: SourceLanguage; rootPath: string; files: string[] }>();

    for (const file of this.files.values()) {
      const existing = grouped.get(file.moduleId);
      if (existing) {
        existing.files.push(file.filePath);
        continue;
      }
      grouped.set(file.moduleId, {
        path: file.modulePath,
        language: file.language,
        rootPath: withinRoot(file.modulePath, file.sourceRoot),
        files: [file.filePath],
      });
    }

    const layers = this.options.layers ?? [];
    return Array.from(grouped.entries())
      .sort(([a], [b]) => compareIds(a, b))
      .map(([id, group]) => {
        const layer = layers.length > 0 ? findLayer({ id, path: group.path, rootPath: group.rootPath }, layers) : undefined;
        return Object.freeze({
          id,
          path: group.path,
          language: group.language,
          files: Object.freeze(group.files.sort(compareIds)),
          ...(layer ? { layer: layer.name } : {}),
        });
      });
  }
}
