/**
 * Dependency Analyzer Types
 */

import type { FunctionMetric, RawImport, SourceLanguage } from '../ast/index.js';
import type { ComplexityReport } from '../metrics/types.js';

export type ModuleId = string;

export type ModuleGranularity = 'file' | 'package';

export type Severity = 'critical' | 'high' | 'medium' | 'low';

/**
 * One internal unit of code: a file, or a package at `package` granularity
 */
export interface ModuleInfo {
  readonly id: ModuleId;
  /** Root-relative POSIX path (the package directory at `package` granularity) */
  readonly path: string;
  readonly language: SourceLanguage;
  /** Architecture layer, when the project configures layers */
  readonly layer?: string;
  /** Source files that make up this module */
  readonly files: ReadonlyArray<string>;
}

/**
 * Directed `from imports to` relationship between internal modules
 */
export interface ImportEdge {
  readonly from: ModuleId;
  readonly to: ModuleId;
  /** Line of the first import statement producing this edge */
  readonly line?: number;
  /** File holding that statement */
  readonly filePath?: string;
}

/**
 * Deterministic, serializable view of the graph
 */
export interface GraphSnapshot {
  readonly modules: ReadonlyArray<ModuleId>;
  readonly edges: ReadonlyArray<ImportEdge>;
  readonly selfLoops: ReadonlyArray<ModuleId>;
}

export type CycleKind = 'mutual-cycle' | 'self-cycle';

/**
 * Strongly connected component reported as a circular dependency
 */
export interface CycleGroup {
  readonly kind: CycleKind;
  /** Sorted member ids */
  readonly members: ReadonlyArray<ModuleId>;
  readonly size: number;
  /** Concrete cycle starting and ending at the smallest member, e.g. [a, b, c, a] */
  readonly examplePath: ReadonlyArray<ModuleId>;
  readonly severity: 'critical';
  readonly description: string;
}

/**
 * Module imported by too large a share of the project
 */
export interface GodModuleRecord {
  readonly moduleId: ModuleId;
  /** Distinct importing modules */
  readonly inDegree: number;
  /** inDegree / total module count */
  readonly ratio: number;
  readonly threshold: number;
  readonly severity: 'high';
  readonly dependents: ReadonlyArray<ModuleId>;
}

export type LayerViolationKind = 'skip-layer' | 'reverse-dependency';

export interface LayerViolation {
  readonly kind: LayerViolationKind;
  readonly severity: 'critical';
  readonly from: ModuleId;
  readonly fromLayer: string;
  readonly fromLevel: number;
  readonly to: ModuleId;
  readonly toLayer: string;
  readonly toLevel: number;
  /** Names of the layers jumped over (skip-layer only), highest level first */
  readonly skippedLayers: ReadonlyArray<string>;
}

export interface LayerDefinition {
  readonly name: string;
  /** Higher levels sit closer to the entry point (api above database) */
  readonly level: number;
  readonly description?: string;
  readonly patterns: ReadonlyArray<string>;
}

export type DiagnosticKind = 'parse-error' | 'read-error';

/**
 * A per-file problem recovered during the run
 */
export interface AnalysisDiagnostic {
  readonly kind: DiagnosticKind;
  readonly filePath: string;
  readonly message: string;
  readonly line?: number;
}

export interface GraphBuildStats {
  readonly totalImports: number;
  readonly internalImports: number;
  readonly externalImports: number;
  readonly unresolvedImports: number;
  /** Imports between files of the same module (package granularity) */
  readonly intraModuleImports: number;
}

/**
 * Input tuple for the pure engine: one source file and its raw imports
 */
export interface ModuleSource {
  /** File-level module id */
  readonly moduleId: ModuleId;
  readonly filePath: string;
  readonly language: SourceLanguage;
  readonly imports: Iterable<RawImport>;
  /** Functions measured from the same parse, when the extractor measures them */
  readonly functions?: ReadonlyArray<FunctionMetric>;
}

export type AnalysisStatus = 'clean' | 'issues-found' | 'empty';

export interface DependencySummary {
  readonly totalModules: number;
  readonly totalDependencies: number;
  readonly cycleCount: number;
  readonly selfCycleCount: number;
  readonly maxCycleSize: number;
  readonly godModuleCount: number;
  readonly layerViolationCount: number;
  readonly parseErrorCount: number;
}

/**
 * Structured output of the engine, consumed by the reporters
 */
export interface DependencyAnalysisResult {
  readonly modules: ReadonlyArray<ModuleInfo>;
  readonly graph: GraphSnapshot;
  readonly cycles: ReadonlyArray<CycleGroup>;
  readonly godModules: ReadonlyArray<GodModuleRecord>;
  readonly layerViolations: ReadonlyArray<LayerViolation>;
  readonly diagnostics: ReadonlyArray<AnalysisDiagnostic>;
  readonly stats: GraphBuildStats;
  readonly summary: DependencySummary;
  readonly status: AnalysisStatus;
}

/**
 * Options for the pure engine
 */
export interface EngineOptions {
  readonly granularity?: ModuleGranularity;
  readonly godModuleThreshold?: number;
  readonly sourceRoots?: ReadonlyArray<string>;
  readonly layers?: ReadonlyArray<LayerDefinition>;
}

/**
 * Options for a full project run
 */
export interface DependencyAnalysisOptions extends EngineOptions {
  readonly ignorePatterns?: ReadonlyArray<string>;
  readonly languages?: ReadonlyArray<SourceLanguage>;
  /** Files read and parsed at once */
  readonly concurrency?: number;
}

/**
 * Result of a full project run
 */
export interface ProjectAnalysis extends DependencyAnalysisResult {
  readonly projectRoot: string;
  readonly languages: ReadonlyArray<SourceLanguage>;
  /** From marker files at the project root (`package.json`, `pyproject.toml`, ...) */
  readonly techStack: ReadonlyArray<string>;
  readonly complexity: ComplexityReport;
  readonly timestamp: Date;
}
