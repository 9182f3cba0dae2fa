/**
 * God-Module Detector
 *
 * Flags modules imported by more than `threshold` of the project.
 * In-degree counts distinct importing modules, not import statements.
 */

import { ANALYSIS_CONFIG } from '../../constants.js';
import { ConfigurationError } from '../errors.js';
import { compareIds, type DependencyGraph } from './dependency-graph.js';
import type { GodModuleRecord } from './types.js';

export const DEFAULT_GOD_MODULE_THRESHOLD = ANALYSIS_CONFIG.GOD_MODULE_THRESHOLD;

/**
 * Reject thresholds that make the ratio comparison meaningless
 *
 * @throws ConfigurationError when the value is not a finite number in [0, 1]
 */
export function validateThreshold(threshold: number): number {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigurationError(`God-module threshold must be a number between 0 and 1, got ${threshold}`, {
      threshold,
    });
  }
  return threshold;
}

export class GodModuleDetector {
  detect(graph: DependencyGraph, threshold: number = DEFAULT_GOD_MODULE_THRESHOLD): GodModuleRecord[] {
    validateThreshold(threshold);

    const total = graph.getModuleCount();
    if (total <= 1) return [];

    const records: GodModuleRecord[] = [];

    for (const moduleId of graph.getModuleIds()) {
      const inDegree = graph.getInDegree(moduleId);
      const ratio = inDegree / total;
      if (ratio <= threshold) continue;

      records.push(
        Object.freeze({
          moduleId,
          inDegree,
          ratio,
          threshold,
          severity: 'high' as const,
          dependents: Object.freeze(graph.getPredecessors(moduleId)),
        })
      );
    }

    return records.sort((a, b) => b.ratio - a.ratio || compareIds(a.moduleId, b.moduleId));
  }
}
