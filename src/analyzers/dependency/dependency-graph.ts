/**
 * Dependency Graph Implementation
 *
 * Adjacency list-based directed graph of internal modules.
 * Self-imports are kept as a per-module flag, outside the edge set.
 * Every list it hands out is sorted, so downstream traversal is reproducible.
 */

import type { GraphSnapshot, ImportEdge, ModuleId, ModuleInfo } from './types.js';

/**
 * Code-unit ordering, independent of locale
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function edgeKey(from: ModuleId, to: ModuleId): string {
  return `${from}\u0000${to}`;
}

/**
 * Work-stack frame for the iterative Tarjan traversal
 */
interface TarjanFrame {
  readonly node: ModuleId;
  readonly index: number;
  lowLink: number;
  readonly successors: ReadonlyArray<ModuleId>;
  next: number;
}

export class DependencyGraph {
  private modules: Map<ModuleId, ModuleInfo>;
  private adjacencyList: Map<ModuleId, Set<ModuleId>>;
  private reverseAdjacencyList: Map<ModuleId, Set<ModuleId>>; // For efficient in-degree lookup
  private edges: Map<string, ImportEdge>;
  private selfLoops: Set<ModuleId>;

  constructor() {
    this.modules = new Map();
    this.adjacencyList = new Map();
    this.reverseAdjacencyList = new Map();
    this.edges = new Map();
    this.selfLoops = new Set();
  }

  /**
   * Add a bare node
   */
  addNode(id: ModuleId): void {
    if (!this.adjacencyList.has(id)) {
      this.adjacencyList.set(id, new Set());
    }
    if (!this.reverseAdjacencyList.has(id)) {
      this.reverseAdjacencyList.set(id, new Set());
    }
  }

  /**
   * Add a node together with its module metadata
   */
  addModule(module: ModuleInfo): void {
    this.modules.set(module.id, module);
    this.addNode(module.id);
  }

  /**
   * Add directed edge from -> to.
   * Returns false when the pair already exists or is a self-import (recorded as a self-loop instead).
   */
  addEdge(from: ModuleId, to: ModuleId, details: { line?: number; filePath?: string } = {}): boolean {
    this.addNode(from);
    this.addNode(to);

    if (from === to) {
      this.selfLoops.add(from);
      return false;
    }

    const key = edgeKey(from, to);
    if (this.edges.has(key)) return false;

    this.edges.set(
      key,
      Object.freeze({
        from,
        to,
        ...(details.line !== undefined ? { line: details.line } : {}),
        ...(details.filePath !== undefined ? { filePath: details.filePath } : {}),
      })
    );
    this.adjacencyList.get(from)?.add(to);
    this.reverseAdjacencyList.get(to)?.add(from);
    return true;
  }

  /**
   * Flag a module as importing itself
   */
  markSelfLoop(id: ModuleId): void {
    this.addNode(id);
    this.selfLoops.add(id);
  }

  hasSelfLoop(id: ModuleId): boolean {
    return this.selfLoops.has(id);
  }

  getSelfLoops(): ModuleId[] {
    return Array.from(this.selfLoops).sort(compareIds);
  }

  hasNode(id: ModuleId): boolean {
    return this.adjacencyList.has(id);
  }

  hasEdge(from: ModuleId, to: ModuleId): boolean {
    return this.edges.has(edgeKey(from, to));
  }

  /**
   * Get module metadata by id
   */
  getModule(id: ModuleId): ModuleInfo | undefined {
    return this.modules.get(id);
  }

  /**
   * Get all module metadata, sorted by id
   */
  getModules(): ModuleInfo[] {
    return Array.from(this.modules.values()).sort((a, b) => compareIds(a.id, b.id));
  }

  getModuleIds(): ModuleId[] {
    return Array.from(this.adjacencyList.keys()).sort(compareIds);
  }

  getModuleCount(): number {
    return this.adjacencyList.size;
  }

  /**
   * Modules this module imports
   */
  getSuccessors(id: ModuleId): ModuleId[] {
    const deps = this.adjacencyList.get(id);
    return deps ? Array.from(deps).sort(compareIds) : [];
  }

  /**
   * Modules importing this module
   */
  getPredecessors(id: ModuleId): ModuleId[] {
    const deps = this.reverseAdjacencyList.get(id);
    return deps ? Array.from(deps).sort(compareIds) : [];
  }

  /**
   * Number of distinct modules importing this module
   */
  getInDegree(id: ModuleId): number {
    return this.reverseAdjacencyList.get(id)?.size ?? 0;
  }

  /**
   * All edges, sorted by (from, to)
   */
  getEdges(): ImportEdge[] {
    return Array.from(this.edges.values()).sort(
      (a, b) => compareIds(a.from, b.from) || compareIds(a.to, b.to)
    );
  }

  getTotalEdges(): number {
    return this.edges.size;
  }

  toSnapshot(): GraphSnapshot {
    return Object.freeze({
      modules: Object.freeze(this.getModuleIds()),
      edges: Object.freeze(this.getEdges()),
      selfLoops: Object.freeze(this.getSelfLoops()),
    });
  }

  /**
   * Get strongly connected components using Tarjan's algorithm
   *
   * Iterative formulation: an explicit stack of frames (node, successor cursor,
   * low-link) replaces recursion, so deep import chains cannot overflow the call stack.
   * Returns every component, singletons included, each sorted by id,
   * in the order Tarjan completes them when roots and successors are visited in sorted order.
   */
  getStronglyConnectedComponents(): ModuleId[][] {
    const index = new Map<ModuleId, number>();
    const onStack = new Set<ModuleId>();
    const stack: ModuleId[] = [];
    const sccs: ModuleId[][] = [];
    let currentIndex = 0;

    const work: TarjanFrame[] = [];
    const visit = (node: ModuleId): void => {
      index.set(node, currentIndex);
      work.push({
        node,
        index: currentIndex,
        lowLink: currentIndex,
        successors: this.getSuccessors(node),
        next: 0,
      });
      currentIndex++;
      stack.push(node);
      onStack.add(node);
    };

    for (const root of this.getModuleIds()) {
      if (index.has(root)) continue;
      visit(root);

      while (work.length > 0) {
        const frame = work[work.length - 1];

        if (frame.next < frame.successors.length) {
          const neighbor = frame.successors[frame.next];
          frame.next++;

          const neighborIndex = index.get(neighbor);
          if (neighborIndex === undefined) {
            visit(neighbor);
          } else if (onStack.has(neighbor)) {
            frame.lowLink = Math.min(frame.lowLink, neighborIndex);
          }
          continue;
        }

        work.pop();

        // Root of a component: pop the stack down to this node
        if (frame.lowLink === frame.index) {
          const scc: ModuleId[] = [];
          let w: ModuleId | undefined;
          do {
            w = stack.pop();
            if (w === undefined) break;
            onStack.delete(w);
            scc.push(w);
          } while (w !== frame.node);
          sccs.push(scc.sort(compareIds));
        }

        const parent = work[work.length - 1];
        if (parent) {
          parent.lowLink = Math.min(parent.lowLink, frame.lowLink);
        }
      }
    }

    return sccs;
  }
}
