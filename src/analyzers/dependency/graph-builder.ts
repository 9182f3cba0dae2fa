/**
 * Dependency Graph Builder
 *
 * Turns (file, raw imports) tuples into a deduplicated module graph.
 */

import { compareIds, DependencyGraph } from './dependency-graph.js';
import type { ModuleResolver } from './module-resolver.js';
import type { GraphBuildStats, ModuleSource } from './types.js';

export interface GraphBuildResult {
  readonly graph: DependencyGraph;
  readonly stats: GraphBuildStats;
}

export function buildDependencyGraph(
  sources: ReadonlyArray<ModuleSource>,
  resolver: ModuleResolver
): GraphBuildResult {
  const graph = new DependencyGraph();
  for (const module of resolver.getModules()) {
    graph.addModule(module);
  }

  let totalImports = 0;
  let internalImports = 0;
  let externalImports = 0;
  let unresolvedImports = 0;
  let intraModuleImports = 0;

  const ordered = [...sources].sort((a, b) => compareIds(a.filePath, b.filePath));

  for (const source of ordered) {
    const file = resolver.getFileModule(source.filePath);
    if (!file) continue;

    for (const raw of source.imports) {
      totalImports++;
      const resolution = resolver.resolve(source.filePath, raw);

      if (resolution.kind === 'external') {
        externalImports++;
        continue;
      }
      if (resolution.kind === 'unresolved') {
        unresolvedImports++;
        continue;
      }

      internalImports++;

      if (resolution.fileModuleId === file.fileModuleId) {
        graph.markSelfLoop(file.moduleId);
        continue;
      }
      if (resolution.moduleId === file.moduleId) {
        intraModuleImports++;
        continue;
      }

      graph.addEdge(file.moduleId, resolution.moduleId, { line: raw.line, filePath: source.filePath });
    }
  }

  return {
    graph,
    stats: Object.freeze({ totalImports, internalImports, externalImports, unresolvedImports, intraModuleImports }),
  };
}
