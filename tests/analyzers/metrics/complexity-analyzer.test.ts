/**
 * Complexity Analyzer Tests
 */

import { describe, it, expect } from 'vitest';
import { ComplexityAnalyzer, rateComplexity, rateLength } from '../../../src/analyzers/metrics/complexity-analyzer.js';
import { fingerprintSource } from '../../../src/analyzers/metrics/fingerprint.js';
import type { FunctionMetric } from '../../../src/analyzers/ast/types.js';
import type { MeasuredFile } from '../../../src/analyzers/metrics/types.js';

const fn = (name: string, line: number, lines: number, complexity: number, hash = `h-${name}`): FunctionMetric => ({
  name,
  line,
  lines,
  complexity,
  hash,
});

describe('ComplexityAnalyzer', () => {
  const analyzer = new ComplexityAnalyzer();

  it('should return zeroed statistics when nothing was measured', () => {
    const report = analyzer.analyze([{ moduleId: 'a', filePath: 'a.py' }]);

    expect(report.summary).toEqual({
      totalFunctions: 0,
      averageComplexity: 0,
      averageLength: 0,
      highComplexityCount: 0,
      longFunctionCount: 0,
      duplicateGroupCount: 0,
    });
    expect(report.highComplexity).toEqual([]);
  });

  it('should flag functions strictly above the thresholds', () => {
    const report = analyzer.analyze([
      { moduleId: 'a', filePath: 'a.py', functions: [fn('edge', 1, 50, 10), fn('over', 60, 51, 11)] },
    ]);

    expect(report.highComplexity.map(f => f.name)).toEqual(['over']);
    expect(report.longFunctions.map(f => f.name)).toEqual(['over']);
  });

  it('should sort findings worst first, then by location', () => {
    const files: MeasuredFile[] = [
      { moduleId: 'b', filePath: 'b.py', functions: [fn('b1', 1, 80, 12), fn('b2', 90, 120, 30)] },
      { moduleId: 'a', filePath: 'a.py', functions: [fn('a1', 5, 80, 12)] },
    ];

    const report = analyzer.analyze(files);

    expect(report.highComplexity.map(f => [f.name, f.module, f.file, f.line])).toEqual([
      ['b2', 'b', 'b.py', 90],
      ['a1', 'a', 'a.py', 5],
      ['b1', 'b', 'b.py', 1],
    ]);
    expect(report.longFunctions.map(f => f.name)).toEqual(['b2', 'a1', 'b1']);
  });

  it('should round averages to one decimal', () => {
    const report = analyzer.analyze([
      { moduleId: 'a', filePath: 'a.py', functions: [fn('x', 1, 1, 1), fn('y', 3, 2, 2), fn('z', 6, 2, 2)] },
    ]);

    expect(report.summary.averageComplexity).toBe(1.7);
    expect(report.summary.averageLength).toBe(1.7);
  });

  it('should group functions that share a fingerprint, length and complexity', () => {
    const report = analyzer.analyze([
      { moduleId: 'b', filePath: 'b.py', functions: [fn('save', 10, 6, 2, 'same')] },
      { moduleId: 'a', filePath: 'a.py', functions: [fn('save', 4, 6, 2, 'same'), fn('load', 20, 3, 1, 'other')] },
      { moduleId: 'c', filePath: 'c.py', functions: [fn('load', 1, 3, 1, 'other')] },
    ]);

    expect(report.duplicates).toEqual([
      {
        hash: 'same',
        count: 2,
        lines: 6,
        complexity: 2,
        functions: [
          { name: 'save', module: 'a', file: 'a.py', line: 4 },
          { name: 'save', module: 'b', file: 'b.py', line: 10 },
        ],
      },
      {
        hash: 'other',
        count: 2,
        lines: 3,
        complexity: 1,
        functions: [
          { name: 'load', module: 'a', file: 'a.py', line: 20 },
          { name: 'load', module: 'c', file: 'c.py', line: 1 },
        ],
      },
    ]);
  });

  it('should not group fingerprint matches that differ in shape', () => {
    const report = analyzer.analyze([
      { moduleId: 'a', filePath: 'a.py', functions: [fn('f', 1, 6, 2, 'same')] },
      { moduleId: 'b', filePath: 'b.py', functions: [fn('f', 1, 7, 2, 'same')] },
    ]);

    expect(report.duplicates).toEqual([]);
  });

  it('should take custom thresholds', () => {
    const strict = new ComplexityAnalyzer({ maxComplexity: 3, maxLines: 5 });

    const report = strict.analyze([{ moduleId: 'a', filePath: 'a.py', functions: [fn('f', 1, 6, 4)] }]);

    expect(report.summary.highComplexityCount).toBe(1);
    expect(report.summary.longFunctionCount).toBe(1);
  });
});

describe('rateComplexity', () => {
  it('should bucket complexity', () => {
    expect([1, 5, 6, 10, 11, 20, 21].map(rateComplexity)).toEqual([
      'simple',
      'simple',
      'medium',
      'medium',
      'complex',
      'complex',
      'very-complex',
    ]);
  });
});

describe('rateLength', () => {
  it('should bucket function length', () => {
    expect([20, 21, 50, 51, 100, 101].map(rateLength)).toEqual([
      'short',
      'moderate',
      'moderate',
      'long',
      'long',
      'too-long',
    ]);
  });
});

describe('fingerprintSource', () => {
  it('should ignore whitespace', () => {
    expect(fingerprintSource('def f(x):\n    return x\n')).toBe(fingerprintSource('def f(x):\n  return   x'));
  });

  it('should be eight hex characters', () => {
    expect(fingerprintSource('def f(): pass')).toMatch(/^[0-9a-f]{8}$/);
    expect(fingerprintSource('def f(): pass')).not.toBe(fingerprintSource('def g(): pass'));
  });
});
