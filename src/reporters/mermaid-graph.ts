/**
 * Mermaid flowchart of the module graph.
 * Cycle edges are drawn red, god modules filled orange.
 */

import type { DependencyAnalysisResult, ModuleId } from '../analyzers/dependency/types.js';

/** Mermaid graph direction: top-down */
const GRAPH_DIRECTION = 'TD';

/** Style for circular dependency edges (red stroke) */
const CIRCULAR_EDGE_STYLE = 'stroke:red,stroke-width:2px';

/** Style for god modules (orange fill) */
const GOD_MODULE_STYLE = 'fill:#FFA500,stroke:#FF8C00';

/**
 * Escapes a label for a quoted Mermaid node
 */
const escapeLabel = (label: string): string => label.replace(/"/g, "'");

const createNode = (nodeId: string, label: string): string => `    ${nodeId}["${escapeLabel(label)}"]`;

const createEdge = (from: string, to: string): string => `    ${from} --> ${to}`;

const createLinkStyle = (edgeIndex: number, style: string): string => `    linkStyle ${edgeIndex} ${style}`;

const createNodeStyle = (nodeId: string, style: string): string => `    style ${nodeId} ${style}`;

/**
 * Stable node ids (m0, m1, ...) in sorted module order, so labels never need sanitizing
 */
export function assignNodeIds(modules: ReadonlyArray<ModuleId>): Map<ModuleId, string> {
  return new Map(modules.map((id, index) => [id, `m${index}`]));
}

/**
 * Renders the dependency graph as a Mermaid flowchart
 *
 * @example
 * ```
 * graph TD
 *     m0["src/a"]
 *     m1["src/b"]
 *     m0 --> m1
 *     m1 --> m0
 *     linkStyle 0 stroke:red,stroke-width:2px
 *     linkStyle 1 stroke:red,stroke-width:2px
 * ```
 */
export function renderMermaidGraph(result: DependencyAnalysisResult): string {
  const lines: string[] = [`graph ${GRAPH_DIRECTION}`];
  const nodeIds = assignNodeIds(result.graph.modules);
  const nodeId = (id: ModuleId): string => nodeIds.get(id) ?? id;

  // Module -> index of its mutual-cycle group
  const cycleOf = new Map<ModuleId, number>();
  result.cycles.forEach((cycle, index) => {
    if (cycle.kind !== 'mutual-cycle') return;
    for (const member of cycle.members) {
      cycleOf.set(member, index);
    }
  });

  for (const id of result.graph.modules) {
    lines.push(createNode(nodeId(id), id));
  }

  const circularEdgeIndices: number[] = [];
  let edgeIndex = 0;

  for (const edge of result.graph.edges) {
    lines.push(createEdge(nodeId(edge.from), nodeId(edge.to)));
    const group = cycleOf.get(edge.from);
    if (group !== undefined && group === cycleOf.get(edge.to)) {
      circularEdgeIndices.push(edgeIndex);
    }
    edgeIndex++;
  }

  for (const id of result.graph.selfLoops) {
    lines.push(createEdge(nodeId(id), nodeId(id)));
    circularEdgeIndices.push(edgeIndex);
    edgeIndex++;
  }

  for (const index of circularEdgeIndices) {
    lines.push(createLinkStyle(index, CIRCULAR_EDGE_STYLE));
  }

  for (const record of result.godModules) {
    lines.push(createNodeStyle(nodeId(record.moduleId), GOD_MODULE_STYLE));
  }

  return lines.join('\n') + '\n';
}
