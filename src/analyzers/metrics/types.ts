/**
 * Complexity Metrics Types
 */

import type { FunctionMetric } from '../ast/types.js';

/**
 * One analyzed file and the functions measured in it
 */
export interface MeasuredFile {
  readonly moduleId: string;
  readonly filePath: string;
  readonly functions?: ReadonlyArray<FunctionMetric>;
}

/**
 * A function together with where it lives
 */
export interface FunctionRecord {
  readonly name: string;
  readonly module: string;
  readonly file: string;
  readonly line: number;
  readonly lines: number;
  readonly complexity: number;
  readonly hash: string;
}

export interface FunctionLocation {
  readonly name: string;
  readonly module: string;
  readonly file: string;
  readonly line: number;
}

/**
 * Functions sharing a fingerprint, line count and complexity
 */
export interface DuplicateGroup {
  readonly hash: string;
  readonly count: number;
  readonly lines: number;
  readonly complexity: number;
  readonly functions: ReadonlyArray<FunctionLocation>;
}

export type ComplexityRating = 'simple' | 'medium' | 'complex' | 'very-complex';
export type LengthRating = 'short' | 'moderate' | 'long' | 'too-long';

/**
 * Summary statistics
 */
export interface ComplexitySummary {
  readonly totalFunctions: number;
  readonly averageComplexity: number; // 1 decimal
  readonly averageLength: number; // 1 decimal
  readonly highComplexityCount: number; // Complexity > 10
  readonly longFunctionCount: number; // Lines > 50
  readonly duplicateGroupCount: number;
}

export interface ComplexityReport {
  /** Sorted by complexity, highest first */
  readonly highComplexity: ReadonlyArray<FunctionRecord>;
  /** Sorted by length, longest first */
  readonly longFunctions: ReadonlyArray<FunctionRecord>;
  readonly duplicates: ReadonlyArray<DuplicateGroup>;
  readonly summary: ComplexitySummary;
}

export interface ComplexityThresholds {
  readonly maxComplexity?: number;
  readonly maxLines?: number;
}
