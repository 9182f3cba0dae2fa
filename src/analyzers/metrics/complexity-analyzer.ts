/**
 * Complexity Analyzer
 *
 * Aggregates the per-function measurements taken during import extraction:
 * high-complexity functions, long functions and duplicated bodies.
 */

import { compareIds } from '../dependency/dependency-graph.js';
import type {
  ComplexityRating,
  ComplexityReport,
  ComplexityThresholds,
  DuplicateGroup,
  FunctionRecord,
  LengthRating,
  MeasuredFile,
} from './types.js';

export const DEFAULT_MAX_COMPLEXITY = 10;
export const DEFAULT_MAX_LINES = 50;

export function rateComplexity(complexity: number): ComplexityRating {
  if (complexity <= 5) return 'simple';
  if (complexity <= 10) return 'medium';
  if (complexity <= 20) return 'complex';
  return 'very-complex';
}

export function rateLength(lines: number): LengthRating {
  if (lines <= 20) return 'short';
  if (lines <= 50) return 'moderate';
  if (lines <= 100) return 'long';
  return 'too-long';
}

function roundOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

function byLocation(a: FunctionRecord, b: FunctionRecord): number {
  return compareIds(a.file, b.file) || a.line - b.line;
}

export class ComplexityAnalyzer {
  private readonly maxComplexity: number;
  private readonly maxLines: number;

  constructor(thresholds: ComplexityThresholds = {}) {
    this.maxComplexity = thresholds.maxComplexity ?? DEFAULT_MAX_COMPLEXITY;
    this.maxLines = thresholds.maxLines ?? DEFAULT_MAX_LINES;
  }

  analyze(files: ReadonlyArray<MeasuredFile>): ComplexityReport {
    const functions = this.collect(files);

    const highComplexity = functions
      .filter(f => f.complexity > this.maxComplexity)
      .sort((a, b) => b.complexity - a.complexity || byLocation(a, b));
    const longFunctions = functions
      .filter(f => f.lines > this.maxLines)
      .sort((a, b) => b.lines - a.lines || byLocation(a, b));
    const duplicates = this.findDuplicates(functions);

    const total = functions.length;
    const sumComplexity = functions.reduce((sum, f) => sum + f.complexity, 0);
    const sumLines = functions.reduce((sum, f) => sum + f.lines, 0);

    return Object.freeze({
      highComplexity: Object.freeze(highComplexity),
      longFunctions: Object.freeze(longFunctions),
      duplicates: Object.freeze(duplicates),
      summary: Object.freeze({
        totalFunctions: total,
        averageComplexity: total > 0 ? roundOneDecimal(sumComplexity / total) : 0,
        averageLength: total > 0 ? roundOneDecimal(sumLines / total) : 0,
        highComplexityCount: highComplexity.length,
        longFunctionCount: longFunctions.length,
        duplicateGroupCount: duplicates.length,
      }),
    });
  }

  /**
   * Flatten to one record per function, in file then line order
   */
  private collect(files: ReadonlyArray<MeasuredFile>): FunctionRecord[] {
    const records: FunctionRecord[] = [];
    for (const file of files) {
      for (const metric of file.functions ?? []) {
        records.push(
          Object.freeze({
            name: metric.name,
            module: file.moduleId,
            file: file.filePath,
            line: metric.line,
            lines: metric.lines,
            complexity: metric.complexity,
            hash: metric.hash,
          })
        );
      }
    }
    return records.sort(byLocation);
  }

  /**
   * Group by fingerprint; a group counts only when every member also agrees
   * on line count and complexity
   */
  private findDuplicates(functions: ReadonlyArray<FunctionRecord>): DuplicateGroup[] {
    const groups = new Map<string, FunctionRecord[]>();
    for (const func of functions) {
      const group = groups.get(func.hash);
      if (group) group.push(func);
      else groups.set(func.hash, [func]);
    }

    const duplicates: DuplicateGroup[] = [];
    for (const [hash, group] of groups) {
      if (group.length < 2) continue;
      const [first] = group;
      if (!group.every(f => f.lines === first.lines && f.complexity === first.complexity)) continue;

      duplicates.push(
        Object.freeze({
          hash,
          count: group.length,
          lines: first.lines,
          complexity: first.complexity,
          functions: Object.freeze(group.map(({ name, module, file, line }) => ({ name, module, file, line }))),
        })
      );
    }
    return duplicates;
  }
}
