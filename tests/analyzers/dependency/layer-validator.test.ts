/**
 * LayerValidator Tests
 */

import { describe, it, expect } from 'vitest';
import { DependencyGraph } from '../../../src/analyzers/dependency/dependency-graph.js';
import {
  LayerValidator,
  findLayer,
  matchesLayerPattern,
} from '../../../src/analyzers/dependency/layer-validator.js';
import type { LayerDefinition } from '../../../src/analyzers/dependency/types.js';

const LAYERS: LayerDefinition[] = [
  { name: 'database', level: 1, patterns: ['database', '**/db/**', '**/connection.py'] },
  { name: 'repository', level: 2, patterns: ['repository/**', '**/models/**'] },
  { name: 'service', level: 3, patterns: ['service'] },
  { name: 'api', level: 4, patterns: ['api', 'api/**', '**/routes/**'] },
];

function layeredGraph(modules: Array<[string, string | undefined]>, edges: Array<[string, string]>): DependencyGraph {
  const graph = new DependencyGraph();
  for (const [id, layer] of modules) {
    graph.addModule({ id, path: `${id}.py`, language: 'python', files: [`${id}.py`], ...(layer ? { layer } : {}) });
  }
  edges.forEach(([from, to]) => graph.addEdge(from, to));
  return graph;
}

describe('LayerValidator', () => {
  describe('matchesLayerPattern', () => {
    const target = { id: 'app.db.connection', path: 'src/app/db/connection.py', rootPath: 'app/db/connection.py' };

    it('should match a directory anywhere in the path', () => {
      expect(matchesLayerPattern(target, '**/db/**')).toBe(true);
      expect(matchesLayerPattern(target, '**/routes/**')).toBe(false);
    });

    it('should match a path prefix on either the full or root-relative path', () => {
      expect(matchesLayerPattern(target, 'src/app/**')).toBe(true);
      expect(matchesLayerPattern(target, 'app/**')).toBe(true);
      expect(matchesLayerPattern(target, 'db/**')).toBe(false);
    });

    it('should match a file suffix', () => {
      expect(matchesLayerPattern(target, '**/connection.py')).toBe(true);
      expect(matchesLayerPattern(target, '**/nection.py')).toBe(false);
    });

    it('should match plain names against the id', () => {
      expect(matchesLayerPattern(target, 'connection')).toBe(true);
      expect(matchesLayerPattern(target, 'app')).toBe(true);
      expect(matchesLayerPattern(target, 'app.db.connection')).toBe(true);
      expect(matchesLayerPattern(target, 'conn')).toBe(false);
    });
  });

  describe('findLayer', () => {
    it('should prefer the highest level when several layers match', () => {
      const target = { id: 'api.models', path: 'api/models.py', rootPath: 'api/models.py' };
      expect(findLayer(target, LAYERS)?.name).toBe('api');
    });

    it('should return undefined when nothing matches', () => {
      expect(findLayer({ id: 'misc', path: 'misc.py', rootPath: 'misc.py' }, LAYERS)).toBeUndefined();
    });
  });

  describe('validate', () => {
    const validator = new LayerValidator(LAYERS);

    it('should report a skip-layer call with the skipped layers', () => {
      const graph = layeredGraph(
        [
          ['api', 'api'],
          ['database', 'database'],
        ],
        [['api', 'database']]
      );

      expect(validator.validate(graph)).toEqual([
        {
          kind: 'skip-layer',
          severity: 'critical',
          from: 'api',
          fromLayer: 'api',
          fromLevel: 4,
          to: 'database',
          toLayer: 'database',
          toLevel: 1,
          skippedLayers: ['service', 'repository'],
        },
      ]);
    });

    it('should report a reverse dependency', () => {
      const graph = layeredGraph(
        [
          ['repo', 'repository'],
          ['svc', 'service'],
        ],
        [['repo', 'svc']]
      );

      const violations = validator.validate(graph);
      expect(violations).toHaveLength(1);
      expect(violations[0].kind).toBe('reverse-dependency');
      expect(violations[0].skippedLayers).toEqual([]);
    });

    it('should allow calls one level down, within a layer, and to unlayered modules', () => {
      const graph = layeredGraph(
        [
          ['svc', 'service'],
          ['svc2', 'service'],
          ['repo', 'repository'],
          ['misc', undefined],
        ],
        [
          ['svc', 'repo'],
          ['svc', 'svc2'],
          ['repo', 'misc'],
          ['misc', 'svc'],
        ]
      );

      expect(validator.validate(graph)).toEqual([]);
    });

    it('should return nothing when no layers are configured', () => {
      const graph = layeredGraph([['a', 'api']], []);
      expect(new LayerValidator([]).isConfigured()).toBe(false);
      expect(new LayerValidator([]).validate(graph)).toEqual([]);
    });

    it('should list violations in edge order', () => {
      const graph = layeredGraph(
        [
          ['z_api', 'api'],
          ['a_api', 'api'],
          ['db', 'database'],
        ],
        [
          ['z_api', 'db'],
          ['a_api', 'db'],
        ]
      );

      expect(validator.validate(graph).map(v => v.from)).toEqual(['a_api', 'z_api']);
    });
  });
});
