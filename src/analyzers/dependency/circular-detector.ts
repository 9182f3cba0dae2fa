/**
 * Circular Dependency Detector
 *
 * Uses Tarjan's Strongly Connected Components algorithm
 */

import { compareIds, type DependencyGraph } from './dependency-graph.js';
import type { CycleGroup, ModuleId } from './types.js';

interface WalkFrame {
  readonly node: ModuleId;
  readonly successors: ReadonlyArray<ModuleId>;
  next: number;
}

export class CircularDependencyDetector {
  /**
   * Detect all circular dependencies: multi-module SCCs and self-importing modules
   */
  detectCycles(graph: DependencyGraph): CycleGroup[] {
    const cycles: CycleGroup[] = [];

    for (const scc of graph.getStronglyConnectedComponents()) {
      if (scc.length > 1) {
        cycles.push(this.createCycleGroup(scc, graph));
      }
    }

    for (const id of graph.getSelfLoops()) {
      cycles.push(
        Object.freeze({
          kind: 'self-cycle' as const,
          members: Object.freeze([id]),
          size: 1,
          examplePath: Object.freeze([id, id]),
          severity: 'critical' as const,
          description: `Module imports itself: ${id} → ${id}`,
        })
      );
    }

    // Members are sorted, so members[0] is the smallest
    return cycles.sort((a, b) => b.size - a.size || compareIds(a.members[0], b.members[0]));
  }

  /**
   * Create cycle group from SCC
   */
  private createCycleGroup(members: ModuleId[], graph: DependencyGraph): CycleGroup {
    const examplePath = this.findExamplePath(members, graph);

    return Object.freeze({
      kind: 'mutual-cycle' as const,
      members: Object.freeze([...members]),
      size: members.length,
      examplePath: Object.freeze(examplePath),
      severity: 'critical' as const,
      description: `Circular dependency detected: ${examplePath.join(' → ')}`,
    });
  }

  /**
   * Depth-first walk inside the component from its smallest member back to itself.
   *
   * Nodes are visited at most once, so the walk is a simple path and stays
   * within |members| + 1 hops. Every member of an SCC reaches the start, so
   * some visited node always has an edge back to it.
   */
  findExamplePath(members: ReadonlyArray<ModuleId>, graph: DependencyGraph): ModuleId[] {
    const inComponent = new Set(members);
    const start = [...members].sort(compareIds)[0];
    if (start === undefined) return [];

    const within = (id: ModuleId): ModuleId[] => graph.getSuccessors(id).filter(s => inComponent.has(s));

    const visited = new Set<ModuleId>([start]);
    const stack: WalkFrame[] = [{ node: start, successors: within(start), next: 0 }];

    while (stack.length > 0 && stack.length <= members.length) {
      const frame = stack[stack.length - 1];

      if (frame.next >= frame.successors.length) {
        stack.pop();
        continue;
      }

      const neighbor = frame.successors[frame.next];
      frame.next++;

      if (neighbor === start) {
        return [...stack.map(f => f.node), start];
      }
      if (!visited.has(neighbor)) {
        visited.add(neighbor);
        stack.push({ node: neighbor, successors: within(neighbor), next: 0 });
      }
    }

    return [start];
  }
}
