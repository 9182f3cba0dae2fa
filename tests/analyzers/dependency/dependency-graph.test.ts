/**
 * DependencyGraph Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DependencyGraph, compareIds } from '../../../src/analyzers/dependency/dependency-graph.js';

describe('DependencyGraph', () => {
  let graph: DependencyGraph;

  beforeEach(() => {
    graph = new DependencyGraph();
  });

  describe('addModule', () => {
    it('should register metadata and the node', () => {
      graph.addModule({ id: 'src/a', path: 'src/a.ts', language: 'typescript', files: ['src/a.ts'] });

      expect(graph.hasNode('src/a')).toBe(true);
      expect(graph.getModule('src/a')?.path).toBe('src/a.ts');
      expect(graph.getModuleCount()).toBe(1);
    });
  });

  describe('addEdge', () => {
    it('should add a directed edge', () => {
      expect(graph.addEdge('a', 'b')).toBe(true);

      expect(graph.hasEdge('a', 'b')).toBe(true);
      expect(graph.hasEdge('b', 'a')).toBe(false);
      expect(graph.getSuccessors('a')).toEqual(['b']);
      expect(graph.getPredecessors('b')).toEqual(['a']);
    });

    it('should deduplicate edges and keep the first details', () => {
      graph.addEdge('a', 'b', { line: 3, filePath: 'a.ts' });
      expect(graph.addEdge('a', 'b', { line: 9, filePath: 'a.ts' })).toBe(false);

      expect(graph.getTotalEdges()).toBe(1);
      expect(graph.getEdges()).toEqual([{ from: 'a', to: 'b', line: 3, filePath: 'a.ts' }]);
    });

    it('should record self-imports as self-loops, not edges', () => {
      expect(graph.addEdge('a', 'a')).toBe(false);

      expect(graph.getTotalEdges()).toBe(0);
      expect(graph.hasSelfLoop('a')).toBe(true);
      expect(graph.getSelfLoops()).toEqual(['a']);
      expect(graph.getSuccessors('a')).toEqual([]);
    });
  });

  describe('ordering', () => {
    it('should return ids, successors and edges sorted', () => {
      graph.addEdge('c', 'a');
      graph.addEdge('a', 'c');
      graph.addEdge('a', 'b');
      graph.addNode('B');

      expect(graph.getModuleIds()).toEqual(['B', 'a', 'b', 'c']);
      expect(graph.getSuccessors('a')).toEqual(['b', 'c']);
      expect(graph.getEdges().map(e => `${e.from}->${e.to}`)).toEqual(['a->b', 'a->c', 'c->a']);
    });

    it('should compare by code unit, not locale', () => {
      expect(['b', 'B', 'a', '_'].sort(compareIds)).toEqual(['B', '_', 'a', 'b']);
    });
  });

  describe('getInDegree', () => {
    it('should count distinct importing modules', () => {
      graph.addEdge('a', 'util');
      graph.addEdge('a', 'util');
      graph.addEdge('b', 'util');

      expect(graph.getInDegree('util')).toBe(2);
      expect(graph.getInDegree('a')).toBe(0);
      expect(graph.getInDegree('missing')).toBe(0);
    });
  });

  describe('getStronglyConnectedComponents', () => {
    it('should return singletons for an acyclic graph', () => {
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'c');

      const sccs = graph.getStronglyConnectedComponents();
      expect(sccs).toHaveLength(3);
      expect(sccs.every(scc => scc.length === 1)).toBe(true);
    });

    it('should find a three-module cycle', () => {
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'c');
      graph.addEdge('c', 'a');
      graph.addEdge('c', 'd');

      const multi = graph.getStronglyConnectedComponents().filter(scc => scc.length > 1);
      expect(multi).toEqual([['a', 'b', 'c']]);
    });

    it('should separate two cycles joined by a one-way edge', () => {
      graph.addEdge('a', 'b');
      graph.addEdge('b', 'a');
      graph.addEdge('b', 'x');
      graph.addEdge('x', 'y');
      graph.addEdge('y', 'x');

      const multi = graph
        .getStronglyConnectedComponents()
        .filter(scc => scc.length > 1)
        .sort((p, q) => compareIds(p[0], q[0]));
      expect(multi).toEqual([
        ['a', 'b'],
        ['x', 'y'],
      ]);
    });

    it('should not treat a self-loop as a multi-module component', () => {
      graph.addEdge('a', 'a');
      graph.addEdge('a', 'b');

      expect(graph.getStronglyConnectedComponents().filter(scc => scc.length > 1)).toEqual([]);
    });

    it('should handle a long chain without recursion limits', () => {
      const size = 20000;
      for (let i = 0; i < size - 1; i++) {
        graph.addEdge(`n${i}`, `n${i + 1}`);
      }
      graph.addEdge(`n${size - 1}`, 'n0');

      const sccs = graph.getStronglyConnectedComponents();
      expect(sccs).toHaveLength(1);
      expect(sccs[0]).toHaveLength(size);
    });
  });

  describe('toSnapshot', () => {
    it('should expose modules, edges and self-loops', () => {
      graph.addEdge('b', 'a', { line: 1, filePath: 'b.ts' });
      graph.addEdge('b', 'b');

      expect(graph.toSnapshot()).toEqual({
        modules: ['a', 'b'],
        edges: [{ from: 'b', to: 'a', line: 1, filePath: 'b.ts' }],
        selfLoops: ['b'],
      });
    });
  });
});
