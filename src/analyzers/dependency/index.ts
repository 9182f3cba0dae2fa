/**
 * Dependency Analyzer Module
 */

export { DependencyAnalyzer, type DependencyAnalyzerDeps } from './dependency-analyzer.js';
export { analyzeModuleGraph, sortDiagnostics } from './dependency-engine.js';
export { DependencyGraph, compareIds } from './dependency-graph.js';
export { CircularDependencyDetector } from './circular-detector.js';
export { GodModuleDetector, DEFAULT_GOD_MODULE_THRESHOLD, validateThreshold } from './god-module-detector.js';
export { buildDependencyGraph, type GraphBuildResult } from './graph-builder.js';
export { LayerValidator, findLayer, matchesLayerPattern, orderLayers, type LayerMatchTarget } from './layer-validator.js';
export {
  ModuleResolver,
  DEFAULT_SOURCE_ROOTS,
  deriveModuleId,
  describeFile,
  findSourceRoot,
  type FileDescriptor,
  type FileModule,
  type ModuleResolverOptions,
  type Resolution,
} from './module-resolver.js';
export { discoverSourceFiles, buildSourcePattern, type DiscoveredFile, type WalkOptions } from './source-walker.js';
export type {
  AnalysisDiagnostic,
  AnalysisStatus,
  CycleGroup,
  CycleKind,
  DependencyAnalysisOptions,
  DependencyAnalysisResult,
  DependencySummary,
  DiagnosticKind,
  EngineOptions,
  GodModuleRecord,
  GraphBuildStats,
  GraphSnapshot,
  ImportEdge,
  LayerDefinition,
  LayerViolation,
  LayerViolationKind,
  ModuleGranularity,
  ModuleId,
  ModuleInfo,
  ModuleSource,
  ProjectAnalysis,
  Severity,
} from './types.js';
