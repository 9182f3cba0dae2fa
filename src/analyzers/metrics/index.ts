/**
 * Complexity Metrics
 */

export {
  ComplexityAnalyzer,
  DEFAULT_MAX_COMPLEXITY,
  DEFAULT_MAX_LINES,
  rateComplexity,
  rateLength,
} from './complexity-analyzer.js';
export { fingerprintSource } from './fingerprint.js';
export { detectTechStack, UNKNOWN_STACK } from './tech-stack.js';
export type {
  ComplexityRating,
  ComplexityReport,
  ComplexitySummary,
  ComplexityThresholds,
  DuplicateGroup,
  FunctionLocation,
  FunctionRecord,
  LengthRating,
  MeasuredFile,
} from './types.js';
