/**
 * Plain JSON data dump of an analysis
 */

import type {
  AnalysisDiagnostic,
  AnalysisStatus,
  CycleGroup,
  DependencyAnalysisResult,
  DependencySummary,
  GodModuleRecord,
  GraphBuildStats,
  ImportEdge,
  LayerViolation,
  ModuleId,
  ProjectAnalysis,
} from '../analyzers/dependency/types.js';
import type { ComplexityReport } from '../analyzers/metrics/types.js';

export interface JsonModuleEntry {
  id: ModuleId;
  path: string;
  language: string;
  layer?: string;
  files: string[];
  /** Distinct modules importing this one */
  dependents: number;
  /** Distinct modules this one imports */
  dependencies: number;
  selfImport: boolean;
}

export interface JsonReport {
  projectRoot?: string;
  generatedAt?: string;
  languages?: string[];
  techStack?: string[];
  status: AnalysisStatus;
  summary: DependencySummary;
  stats: GraphBuildStats;
  modules: JsonModuleEntry[];
  edges: ImportEdge[];
  cycles: CycleGroup[];
  godModules: GodModuleRecord[];
  layerViolations: LayerViolation[];
  diagnostics: AnalysisDiagnostic[];
  complexity?: ComplexityReport;
}

export function isProjectAnalysis(result: DependencyAnalysisResult): result is ProjectAnalysis {
  return 'projectRoot' in result && 'timestamp' in result;
}

function countBy(edges: ReadonlyArray<ImportEdge>, key: 'from' | 'to'): Map<ModuleId, number> {
  const counts = new Map<ModuleId, number>();
  for (const edge of edges) {
    counts.set(edge[key], (counts.get(edge[key]) ?? 0) + 1);
  }
  return counts;
}

/**
 * Convert a result into a JSON-serializable object (no class instances, no Dates)
 */
export function toJsonReport(result: DependencyAnalysisResult): JsonReport {
  const incoming = countBy(result.graph.edges, 'to');
  const outgoing = countBy(result.graph.edges, 'from');
  const selfLoops = new Set(result.graph.selfLoops);

  const report: JsonReport = {
    status: result.status,
    summary: { ...result.summary },
    stats: { ...result.stats },
    modules: result.modules.map(module => ({
      id: module.id,
      path: module.path,
      language: module.language,
      ...(module.layer !== undefined ? { layer: module.layer } : {}),
      files: [...module.files],
      dependents: incoming.get(module.id) ?? 0,
      dependencies: outgoing.get(module.id) ?? 0,
      selfImport: selfLoops.has(module.id),
    })),
    edges: result.graph.edges.map(edge => ({ ...edge })),
    cycles: result.cycles.map(cycle => ({
      ...cycle,
      members: [...cycle.members],
      examplePath: [...cycle.examplePath],
    })),
    godModules: result.godModules.map(record => ({ ...record, dependents: [...record.dependents] })),
    layerViolations: result.layerViolations.map(violation => ({
      ...violation,
      skippedLayers: [...violation.skippedLayers],
    })),
    diagnostics: result.diagnostics.map(diagnostic => ({ ...diagnostic })),
  };

  if (isProjectAnalysis(result)) {
    return {
      projectRoot: result.projectRoot,
      generatedAt: result.timestamp.toISOString(),
      languages: [...result.languages],
      techStack: [...result.techStack],
      ...report,
      complexity: result.complexity,
    };
  }

  return report;
}

export function renderJsonReport(result: DependencyAnalysisResult): string {
  return JSON.stringify(toJsonReport(result), null, 2) + '\n';
}
