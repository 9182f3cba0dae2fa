/**
 * Report rendering and output
 */

import { promises as fs } from 'fs';
import path from 'path';
import { FILE_NAMES } from '../constants.js';
import type { DependencyAnalysisResult } from '../analyzers/dependency/types.js';
import { renderJsonReport } from './json-report.js';
import { renderMarkdownReport } from './markdown-report.js';
import { renderMermaidGraph } from './mermaid-graph.js';

export { renderJsonReport, toJsonReport, isProjectAnalysis, type JsonReport, type JsonModuleEntry } from './json-report.js';
export {
  renderMarkdownReport,
  estimateRefactoring,
  formatComplexitySection,
  cycleHours,
  godModuleHours,
  violationHours,
  type RefactoringEstimate,
} from './markdown-report.js';
export { renderMermaidGraph, assignNodeIds } from './mermaid-graph.js';

export interface WrittenReports {
  readonly report: string;
  readonly graph: string;
  readonly data: string;
}

/**
 * Write the Markdown report, Mermaid graph and JSON data into `outputDir`
 */
export async function writeReports(result: DependencyAnalysisResult, outputDir: string): Promise<WrittenReports> {
  await fs.mkdir(outputDir, { recursive: true });

  const written: WrittenReports = {
    report: path.join(outputDir, FILE_NAMES.REPORT_MD),
    graph: path.join(outputDir, FILE_NAMES.GRAPH_MMD),
    data: path.join(outputDir, FILE_NAMES.DATA_JSON),
  };

  await Promise.all([
    fs.writeFile(written.report, renderMarkdownReport(result), 'utf-8'),
    fs.writeFile(written.graph, renderMermaidGraph(result), 'utf-8'),
    fs.writeFile(written.data, renderJsonReport(result), 'utf-8'),
  ]);

  return written;
}
