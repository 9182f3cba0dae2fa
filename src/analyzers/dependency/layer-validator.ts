/**
 * Layer Validator
 *
 * Checks graph edges against a layered architecture. Layers carry a level:
 * higher levels sit closer to the entry point (api 4, service 3, repository 2, database 1).
 *
 * - skip-layer: an edge jumps down more than one level
 * - reverse-dependency: an edge points to a higher level
 */

import type { DependencyGraph } from './dependency-graph.js';
import type { LayerDefinition, LayerViolation, ModuleId } from './types.js';

/**
 * What a layer pattern is matched against
 */
export interface LayerMatchTarget {
  readonly id: ModuleId;
  /** Root-relative path */
  readonly path: string;
  /** Path relative to the module's source root */
  readonly rootPath: string;
}

function lastSegment(id: ModuleId): string {
  const parts = id.split(/[./]/);
  return parts[parts.length - 1] ?? id;
}

/**
 * Pattern forms:
 * - `name`: module id, its last segment, or a path/id prefix
 * - `dir/**`: path prefix
 * - `**\/kw/**`: any path segment equals kw
 * - `**\/file.py`: path suffix
 */
export function matchesLayerPattern(target: LayerMatchTarget, pattern: string): boolean {
  const paths = target.path === target.rootPath ? [target.path] : [target.path, target.rootPath];

  if (pattern.startsWith('**/') && pattern.endsWith('/**')) {
    const keyword = pattern.slice(3, -3);
    return paths.some(p => `/${p}/`.includes(`/${keyword}/`));
  }

  if (pattern.endsWith('/**')) {
    const prefix = pattern.slice(0, -3);
    return paths.some(p => p === prefix || p.startsWith(`${prefix}/`));
  }

  if (pattern.startsWith('**/')) {
    const suffix = pattern.slice(3);
    return paths.some(p => p === suffix || p.endsWith(`/${suffix}`));
  }

  return (
    target.id === pattern ||
    lastSegment(target.id) === pattern ||
    target.id.startsWith(`${pattern}.`) ||
    paths.some(p => p === pattern || p.startsWith(`${pattern}/`))
  );
}

/**
 * Sort layers from the highest level down; ties keep configuration order
 */
export function orderLayers(layers: ReadonlyArray<LayerDefinition>): LayerDefinition[] {
  return [...layers].sort((a, b) => b.level - a.level);
}

/**
 * First layer (highest level first) with a matching pattern
 */
export function findLayer(
  target: LayerMatchTarget,
  layers: ReadonlyArray<LayerDefinition>
): LayerDefinition | undefined {
  return orderLayers(layers).find(layer => layer.patterns.some(pattern => matchesLayerPattern(target, pattern)));
}

export class LayerValidator {
  private readonly layers: LayerDefinition[];
  private readonly byName: Map<string, LayerDefinition>;

  constructor(layers: ReadonlyArray<LayerDefinition>) {
    this.layers = orderLayers(layers);
    this.byName = new Map(this.layers.map(layer => [layer.name, layer]));
  }

  isConfigured(): boolean {
    return this.layers.length > 0;
  }

  /**
   * Check every edge between two layered modules
   */
  validate(graph: DependencyGraph): LayerViolation[] {
    if (!this.isConfigured()) return [];

    const violations: LayerViolation[] = [];

    for (const edge of graph.getEdges()) {
      const fromLayer = this.layerOf(graph, edge.from);
      const toLayer = this.layerOf(graph, edge.to);
      if (!fromLayer || !toLayer) continue;

      const base = {
        severity: 'critical' as const,
        from: edge.from,
        fromLayer: fromLayer.name,
        fromLevel: fromLayer.level,
        to: edge.to,
        toLayer: toLayer.name,
        toLevel: toLayer.level,
      };

      if (fromLayer.level - toLayer.level > 1) {
        violations.push(
          Object.freeze({
            ...base,
            kind: 'skip-layer' as const,
            skippedLayers: Object.freeze(this.getSkippedLayers(fromLayer.level, toLayer.level)),
          })
        );
      } else if (toLayer.level > fromLayer.level) {
        violations.push(
          Object.freeze({ ...base, kind: 'reverse-dependency' as const, skippedLayers: Object.freeze([]) })
        );
      }
    }

    return violations;
  }

  /**
   * Layers strictly between two levels, highest first
   */
  getSkippedLayers(fromLevel: number, toLevel: number): string[] {
    return this.layers.filter(layer => toLevel < layer.level && layer.level < fromLevel).map(layer => layer.name);
  }

  private layerOf(graph: DependencyGraph, id: ModuleId): LayerDefinition | undefined {
    const name = graph.getModule(id)?.layer;
    return name ? this.byName.get(name) : undefined;
  }
}
