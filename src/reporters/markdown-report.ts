/**
 * Markdown analysis report
 */

import { ESTIMATE_CONFIG, FILE_NAMES } from '../constants.js';
import type {
  CycleGroup,
  DependencyAnalysisResult,
  GodModuleRecord,
  LayerViolation,
} from '../analyzers/dependency/types.js';
import {
  DEFAULT_MAX_COMPLEXITY,
  DEFAULT_MAX_LINES,
  rateComplexity,
  rateLength,
  type ComplexityReport,
  type FunctionLocation,
} from '../analyzers/metrics/index.js';
import { isProjectAnalysis } from './json-report.js';

/** Dependents listed per god module before the rest are summarized */
const MAX_LISTED_DEPENDENTS = 5;
const MAX_LISTED_FUNCTIONS = 10;
const MAX_LISTED_DUPLICATES = 5;

export interface RefactoringEstimate {
  readonly layerHours: number;
  readonly cycleHours: number;
  readonly godModuleHours: number;
  readonly totalHours: number;
  /** Whole working days, rounded up; 0 when there is nothing to do */
  readonly totalDays: number;
}

export function cycleHours(cycle: CycleGroup): number {
  return cycle.size * ESTIMATE_CONFIG.HOURS_PER_CYCLE_MODULE;
}

export function godModuleHours(record: GodModuleRecord): number {
  return record.inDegree * ESTIMATE_CONFIG.HOURS_PER_GOD_MODULE_DEPENDENT;
}

export function violationHours(violation: LayerViolation): number {
  return violation.kind === 'skip-layer'
    ? ESTIMATE_CONFIG.HOURS_PER_SKIP_LAYER
    : ESTIMATE_CONFIG.HOURS_PER_REVERSE_DEPENDENCY;
}

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

const days = (hours: number): number => Math.ceil(hours / ESTIMATE_CONFIG.HOURS_PER_DAY);

export function estimateRefactoring(result: DependencyAnalysisResult): RefactoringEstimate {
  const layerHours = sum(result.layerViolations.map(violationHours));
  const cycleTotal = sum(result.cycles.map(cycleHours));
  const godTotal = sum(result.godModules.map(godModuleHours));
  const totalHours = layerHours + cycleTotal + godTotal;

  return {
    layerHours,
    cycleHours: cycleTotal,
    godModuleHours: godTotal,
    totalHours,
    totalDays: days(totalHours),
  };
}

const mark = (count: number): string => (count > 0 ? '⚠️' : '✅');

const percent = (ratio: number): string => `${(ratio * 100).toFixed(1)}%`;

function formatOverview(result: DependencyAnalysisResult): string {
  const { summary } = result;
  const lines = [
    '## Overview',
    '',
    `- **Modules**: ${summary.totalModules}`,
    `- **Dependencies**: ${summary.totalDependencies}`,
    `- **Circular dependencies**: ${result.cycles.length} ${mark(result.cycles.length)}`,
    `- **God modules**: ${summary.godModuleCount} ${mark(summary.godModuleCount)}`,
    `- **Architecture violations**: ${summary.layerViolationCount} ${mark(summary.layerViolationCount)}`,
    `- **Parse errors**: ${summary.parseErrorCount} ${mark(summary.parseErrorCount)}`,
    `- **Imports**: ${result.stats.totalImports} total, ${result.stats.internalImports} internal, ` +
      `${result.stats.externalImports} external, ${result.stats.unresolvedImports} unresolved`,
  ];
  if (isProjectAnalysis(result)) {
    const { summary: metrics } = result.complexity;
    lines.push(
      `- **High-complexity functions**: ${metrics.highComplexityCount} ${mark(metrics.highComplexityCount)}`,
      `- **Long functions**: ${metrics.longFunctionCount} ${mark(metrics.longFunctionCount)}`,
      `- **Duplicate groups**: ${metrics.duplicateGroupCount} ${mark(metrics.duplicateGroupCount)}`
    );
  }
  return lines.join('\n');
}

function formatViolation(violation: LayerViolation, index: number): string {
  const lines = [
    `#### ${index}. \`${violation.from}\` (${violation.fromLayer}) → \`${violation.to}\` (${violation.toLayer})`,
    '',
  ];
  if (violation.kind === 'skip-layer') {
    lines.push(`**Skipped layers**: ${violation.skippedLayers.join(', ')}`, '');
    lines.push('**Suggestion**: route the call through the intermediate layers.', '');
  } else {
    lines.push(
      `**Problem**: level ${violation.fromLevel} depends on level ${violation.toLevel}.`,
      '',
      '**Suggestion**: invert the dependency with an interface or an event.',
      ''
    );
  }
  lines.push(`**Estimate**: ${violationHours(violation)} hours`, '');
  return lines.join('\n');
}

function formatLayerSection(result: DependencyAnalysisResult): string {
  if (result.layerViolations.length === 0) {
    return ['## ✅ Architecture', '', 'No layer violations found.'].join('\n');
  }

  const skips = result.layerViolations.filter(v => v.kind === 'skip-layer');
  const reverses = result.layerViolations.filter(v => v.kind === 'reverse-dependency');
  const parts = [`## 🚨 Architecture violations (P0)`, ''];

  if (skips.length > 0) {
    parts.push(`### Skip-layer calls (${skips.length})`, '');
    skips.forEach((violation, i) => parts.push(formatViolation(violation, i + 1)));
  }
  if (reverses.length > 0) {
    parts.push(`### Reverse dependencies (${reverses.length})`, '');
    reverses.forEach((violation, i) => parts.push(formatViolation(violation, i + 1)));
  }

  return parts.join('\n').trimEnd();
}

function formatCycleSection(result: DependencyAnalysisResult): string {
  if (result.cycles.length === 0) {
    return ['## ✅ Circular dependencies', '', 'No circular dependencies found.'].join('\n');
  }

  const parts = [
    '## 🚨 Circular dependencies (P0)',
    '',
    `Found **${result.cycles.length}** circular dependency groups:`,
    '',
  ];

  result.cycles.forEach((cycle, i) => {
    const title = cycle.kind === 'self-cycle' ? `${cycle.members[0]} (self-import)` : cycle.members.join(' ↔ ');
    parts.push(
      `### ${i + 1}. ${title}`,
      '',
      '**Path**:',
      '```',
      cycle.examplePath.join(' → '),
      '```',
      '',
      `**Severity**: ${cycle.severity}  `,
      `**Estimate**: ${cycleHours(cycle)} hours`,
      ''
    );
  });

  return parts.join('\n').trimEnd();
}

function formatGodModuleSection(result: DependencyAnalysisResult): string {
  if (result.godModules.length === 0) {
    return ['## ✅ God modules', '', 'No god modules found.'].join('\n');
  }

  const total = result.summary.totalModules;
  const parts = ['## ⚠️ God modules (P1)', '', `Found **${result.godModules.length}** god modules:`, ''];

  result.godModules.forEach((record, i) => {
    parts.push(
      `### ${i + 1}. \`${record.moduleId}\``,
      '',
      `**Dependents**: ${record.inDegree}/${total} modules (${percent(record.ratio)}, threshold ${percent(record.threshold)})`,
      ''
    );
    for (const dependent of record.dependents.slice(0, MAX_LISTED_DEPENDENTS)) {
      parts.push(`- \`${dependent}\``);
    }
    if (record.dependents.length > MAX_LISTED_DEPENDENTS) {
      parts.push(`- ... and ${record.dependents.length - MAX_LISTED_DEPENDENTS} more`);
    }
    parts.push('', `**Estimate**: ${godModuleHours(record)} hours`, '');
  });

  return parts.join('\n').trimEnd();
}

const located = (func: FunctionLocation): string => `\`${func.name}\` (${func.module}) at \`${func.file}:${func.line}\``;

function moreLine(total: number, shown: number, noun: string): string[] {
  return total > shown ? [`- ... and ${total - shown} more ${noun}`] : [];
}

export function formatComplexitySection(complexity: ComplexityReport): string {
  const { summary } = complexity;
  const totals = [
    `- **Functions analyzed**: ${summary.totalFunctions}`,
    `- **Average complexity**: ${summary.averageComplexity}`,
    `- **Average length**: ${summary.averageLength} lines`,
  ];

  if (summary.highComplexityCount === 0 && summary.longFunctionCount === 0 && summary.duplicateGroupCount === 0) {
    return ['## ✅ Code quality', '', ...totals, '', 'No high-complexity functions, long functions or duplicated code found.'].join(
      '\n'
    );
  }

  const parts = ['## 📐 Code quality', '', ...totals, ''];

  if (complexity.highComplexity.length > 0) {
    parts.push(
      `### High complexity (${complexity.highComplexity.length})`,
      '',
      `_Cyclomatic complexity above ${DEFAULT_MAX_COMPLEXITY}. Extract branches into smaller functions._`,
      ''
    );
    complexity.highComplexity.slice(0, MAX_LISTED_FUNCTIONS).forEach((func, i) => {
      parts.push(
        `${i + 1}. ${located(func)}: complexity ${func.complexity} (${rateComplexity(func.complexity)}), ${func.lines} lines`
      );
    });
    parts.push(...moreLine(complexity.highComplexity.length, MAX_LISTED_FUNCTIONS, 'functions'), '');
  }

  if (complexity.longFunctions.length > 0) {
    parts.push(
      `### Long functions (${complexity.longFunctions.length})`,
      '',
      `_More than ${DEFAULT_MAX_LINES} lines. Split by responsibility._`,
      ''
    );
    complexity.longFunctions.slice(0, MAX_LISTED_FUNCTIONS).forEach((func, i) => {
      parts.push(`${i + 1}. ${located(func)}: ${func.lines} lines (${rateLength(func.lines)}), complexity ${func.complexity}`);
    });
    parts.push(...moreLine(complexity.longFunctions.length, MAX_LISTED_FUNCTIONS, 'functions'), '');
  }

  if (complexity.duplicates.length > 0) {
    parts.push(
      `### Duplicated code (${complexity.duplicates.length})`,
      '',
      '_Identical bodies; extract a shared function._',
      ''
    );
    complexity.duplicates.slice(0, MAX_LISTED_DUPLICATES).forEach((group, i) => {
      parts.push(`${i + 1}. ${group.count} copies, ${group.lines} lines, complexity ${group.complexity}:`);
      for (const func of group.functions) {
        parts.push(`   - ${located(func)}`);
      }
    });
    parts.push(...moreLine(complexity.duplicates.length, MAX_LISTED_DUPLICATES, 'groups'), '');
  }

  return parts.join('\n').trimEnd();
}

function formatDiagnosticsSection(result: DependencyAnalysisResult): string {
  if (result.diagnostics.length === 0) {
    return ['## ✅ Parsing', '', 'Every file was read and parsed.'].join('\n');
  }

  const parts = ['## ⚠️ Files with problems', ''];
  for (const diagnostic of result.diagnostics) {
    const location = diagnostic.line !== undefined ? `${diagnostic.filePath}:${diagnostic.line}` : diagnostic.filePath;
    parts.push(`- \`${location}\` (${diagnostic.kind}): ${diagnostic.message}`);
  }
  return parts.join('\n');
}

function formatRefactoringPlan(result: DependencyAnalysisResult): string {
  if (result.cycles.length === 0 && result.godModules.length === 0 && result.layerViolations.length === 0) {
    return ['## 🎉 No refactoring needed', '', 'Re-run the analysis regularly to catch new dependencies.'].join('\n');
  }

  const estimate = estimateRefactoring(result);
  const parts = ['## 💡 Refactoring plan', ''];
  let phase = 1;

  if (result.layerViolations.length > 0) {
    parts.push(`### Phase ${phase++}: fix architecture violations (${days(estimate.layerHours)} days)`, '');
    result.layerViolations.forEach((violation, i) => {
      parts.push(`${i + 1}. **${violation.from} → ${violation.to}** (${violationHours(violation)}h)`);
    });
    parts.push('');
  }

  if (result.cycles.length > 0) {
    parts.push(`### Phase ${phase++}: break circular dependencies (${days(estimate.cycleHours)} days)`, '');
    result.cycles.forEach((cycle, i) => {
      parts.push(`${i + 1}. **${cycle.members.join(' ↔ ')}** (${cycleHours(cycle)}h)`);
    });
    parts.push('');
  }

  if (result.godModules.length > 0) {
    parts.push(`### Phase ${phase++}: split god modules (${days(estimate.godModuleHours)} days)`, '');
    result.godModules.forEach((record, i) => {
      parts.push(`${i + 1}. **\`${record.moduleId}\`** (${godModuleHours(record)}h)`);
    });
    parts.push('');
  }

  parts.push(`**Total estimate**: ${estimate.totalHours} hours (about ${estimate.totalDays} working days)`);
  return parts.join('\n');
}

/**
 * Render the full report. Sections are separated by horizontal rules.
 */
export function renderMarkdownReport(result: DependencyAnalysisResult): string {
  const header = ['# Dependency Analysis Report', ''];
  if (isProjectAnalysis(result)) {
    header.push(
      `Generated: ${result.timestamp.toISOString()}  `,
      `Project: \`${result.projectRoot}\`  `,
      `Languages: ${result.languages.join(', ')}  `,
      `Tech stack: ${result.techStack.join(', ')}`,
      ''
    );
  }

  const sections = [
    header.join('\n').trimEnd(),
    formatOverview(result),
    formatLayerSection(result),
    formatCycleSection(result),
    formatGodModuleSection(result),
    ...(isProjectAnalysis(result) ? [formatComplexitySection(result.complexity)] : []),
    formatDiagnosticsSection(result),
    ['## Dependency graph', '', `See \`${FILE_NAMES.GRAPH_MMD}\` (red edges: cycles, orange nodes: god modules).`].join(
      '\n'
    ),
    formatRefactoringPlan(result),
  ];

  return sections.join('\n\n---\n\n') + '\n';
}
