/**
 * Dependency Engine Tests
 */

import { describe, it, expect } from 'vitest';
import { analyzeModuleGraph, sortDiagnostics } from '../../../src/analyzers/dependency/dependency-engine.js';
import { ConfigurationError } from '../../../src/analyzers/errors.js';
import type { ModuleSource } from '../../../src/analyzers/dependency/types.js';
import type { RawImport } from '../../../src/analyzers/ast/types.js';

const abs = (target: string, line = 1): RawImport => ({ specifier: target, target, names: [], isRelative: false, line });

function source(moduleId: string, targets: string[]): ModuleSource {
  return {
    moduleId,
    filePath: `${moduleId.replace(/\./g, '/')}.py`,
    language: 'python',
    imports: targets.map((target, i) => abs(target, i + 1)),
  };
}

/**
 * util imported by 7 of 9 others; a <-> b cycle
 */
function sampleProject(): ModuleSource[] {
  return [
    source('util', []),
    source('a', ['util', 'b']),
    source('b', ['util', 'a']),
    source('c', ['util']),
    source('d', ['util']),
    source('e', ['util']),
    source('f', ['util']),
    source('g', ['util']),
    source('h', []),
    source('i', ['requests']),
  ];
}

describe('analyzeModuleGraph', () => {
  it('should find the cycle and the god module', () => {
    const result = analyzeModuleGraph(sampleProject());

    expect(result.status).toBe('issues-found');
    expect(result.cycles.map(c => c.examplePath)).toEqual([['a', 'b', 'a']]);
    expect(result.godModules.map(g => [g.moduleId, g.inDegree, g.ratio])).toEqual([['util', 7, 0.7]]);
    expect(result.summary).toEqual({
      totalModules: 10,
      totalDependencies: 9,
      cycleCount: 1,
      selfCycleCount: 0,
      maxCycleSize: 2,
      godModuleCount: 1,
      layerViolationCount: 0,
      parseErrorCount: 0,
    });
    expect(result.stats.externalImports).toBe(1);
  });

  it('should be deterministic across runs and input orders', () => {
    const first = analyzeModuleGraph(sampleProject());
    const second = analyzeModuleGraph([...sampleProject()].reverse());

    expect(JSON.stringify(second.graph)).toBe(JSON.stringify(first.graph));
    expect(JSON.stringify(second.cycles)).toBe(JSON.stringify(first.cycles));
    expect(JSON.stringify(second.godModules)).toBe(JSON.stringify(first.godModules));
  });

  it('should report clean when there are no cycles', () => {
    const result = analyzeModuleGraph([source('a', ['b']), source('b', [])], { godModuleThreshold: 0.5 });

    expect(result.status).toBe('clean');
    expect(result.godModules).toEqual([]);
  });

  it('should keep god modules out of the status', () => {
    const result = analyzeModuleGraph([source('a', ['b']), source('b', []), source('c', ['b'])]);

    expect(result.godModules).toHaveLength(1);
    expect(result.status).toBe('clean');
  });

  it('should return an empty result for no modules', () => {
    const result = analyzeModuleGraph([]);

    expect(result.status).toBe('empty');
    expect(result.graph).toEqual({ modules: [], edges: [], selfLoops: [] });
    expect(result.cycles).toEqual([]);
    expect(result.godModules).toEqual([]);
  });

  it('should reject an invalid threshold before building anything', () => {
    let iterated = false;
    const imports: Iterable<RawImport> = {
      *[Symbol.iterator]() {
        iterated = true;
      },
    };

    expect(() =>
      analyzeModuleGraph([{ moduleId: 'a', filePath: 'a.py', language: 'python', imports }], {
        godModuleThreshold: 1.2,
      })
    ).toThrow(ConfigurationError);
    expect(iterated).toBe(false);
  });

  it('should report layer violations from configured layers', () => {
    const result = analyzeModuleGraph([source('api.routes', ['db.session']), source('db.session', [])], {
      godModuleThreshold: 1,
      layers: [
        { name: 'api', level: 3, patterns: ['api'] },
        { name: 'service', level: 2, patterns: ['service'] },
        { name: 'database', level: 1, patterns: ['db'] },
      ],
    });

    expect(result.modules.map(m => [m.id, m.layer])).toEqual([
      ['api.routes', 'api'],
      ['db.session', 'database'],
    ]);
    expect(result.layerViolations.map(v => [v.kind, v.skippedLayers])).toEqual([['skip-layer', ['service']]]);
    expect(result.summary.layerViolationCount).toBe(1);
    expect(result.status).toBe('clean');
  });

  it('should sort and count diagnostics', () => {
    const result = analyzeModuleGraph([source('a', [])], {}, [
      { kind: 'parse-error', filePath: 'z.py', message: 'Invalid Python syntax at line 2', line: 2 },
      { kind: 'read-error', filePath: 'b.py', message: 'Cannot read file' },
    ]);

    expect(result.diagnostics.map(d => d.filePath)).toEqual(['b.py', 'z.py']);
    expect(result.summary.parseErrorCount).toBe(1);
  });
});

describe('sortDiagnostics', () => {
  it('should order by path, then line', () => {
    const sorted = sortDiagnostics([
      { kind: 'parse-error', filePath: 'a.ts', message: 'x', line: 9 },
      { kind: 'parse-error', filePath: 'a.ts', message: 'y', line: 2 },
      { kind: 'read-error', filePath: 'A.ts', message: 'z' },
    ]);

    expect(sorted.map(d => `${d.filePath}:${d.line ?? '-'}`)).toEqual(['A.ts:-', 'a.ts:2', 'a.ts:9']);
  });
});
