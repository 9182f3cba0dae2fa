/**
 * Dependency Engine
 *
 * Pure core: (module, file, raw imports) tuples in, graph and findings out.
 * No file system access; the same input always yields the same result.
 */

import { CircularDependencyDetector } from './circular-detector.js';
import { compareIds } from './dependency-graph.js';
import { GodModuleDetector, DEFAULT_GOD_MODULE_THRESHOLD, validateThreshold } from './god-module-detector.js';
import { buildDependencyGraph } from './graph-builder.js';
import { LayerValidator } from './layer-validator.js';
import { ModuleResolver } from './module-resolver.js';
import type {
  AnalysisDiagnostic,
  AnalysisStatus,
  CycleGroup,
  DependencyAnalysisResult,
  EngineOptions,
  ModuleSource,
} from './types.js';

export function sortDiagnostics(diagnostics: ReadonlyArray<AnalysisDiagnostic>): AnalysisDiagnostic[] {
  return [...diagnostics].sort(
    (a, b) => compareIds(a.filePath, b.filePath) || (a.line ?? 0) - (b.line ?? 0) || compareIds(a.message, b.message)
  );
}

function statusOf(moduleCount: number, cycles: ReadonlyArray<CycleGroup>): AnalysisStatus {
  if (moduleCount === 0) return 'empty';
  return cycles.length > 0 ? 'issues-found' : 'clean';
}

/**
 * Build the module graph and run every detector over it
 *
 * @throws ConfigurationError when the god-module threshold is out of range
 */
export function analyzeModuleGraph(
  sources: ReadonlyArray<ModuleSource>,
  options: EngineOptions = {},
  diagnostics: ReadonlyArray<AnalysisDiagnostic> = []
): DependencyAnalysisResult {
  const threshold = validateThreshold(options.godModuleThreshold ?? DEFAULT_GOD_MODULE_THRESHOLD);
  const layers = options.layers ?? [];

  const resolver = new ModuleResolver(
    sources.map(source => ({ filePath: source.filePath, language: source.language, moduleId: source.moduleId })),
    { granularity: options.granularity, sourceRoots: options.sourceRoots, layers }
  );

  const { graph, stats } = buildDependencyGraph(sources, resolver);

  const cycles = new CircularDependencyDetector().detectCycles(graph);
  const godModules = new GodModuleDetector().detect(graph, threshold);
  const layerViolations = new LayerValidator(layers).validate(graph);
  const sortedDiagnostics = sortDiagnostics(diagnostics);
  const modules = graph.getModules();

  return Object.freeze({
    modules: Object.freeze(modules),
    graph: graph.toSnapshot(),
    cycles: Object.freeze(cycles),
    godModules: Object.freeze(godModules),
    layerViolations: Object.freeze(layerViolations),
    diagnostics: Object.freeze(sortedDiagnostics),
    stats,
    summary: Object.freeze({
      totalModules: graph.getModuleCount(),
      totalDependencies: graph.getTotalEdges(),
      cycleCount: cycles.filter(cycle => cycle.kind === 'mutual-cycle').length,
      selfCycleCount: cycles.filter(cycle => cycle.kind === 'self-cycle').length,
      maxCycleSize: cycles.reduce((max, cycle) => Math.max(max, cycle.size), 0),
      godModuleCount: godModules.length,
      layerViolationCount: layerViolations.length,
      parseErrorCount: sortedDiagnostics.filter(d => d.kind === 'parse-error').length,
    }),
    status: statusOf(graph.getModuleCount(), cycles),
  });
}
