/**
 * Analyze command: build the module graph, report cycles and god modules
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { isAbsolute, join, resolve } from 'path';
import { DependencyAnalyzer } from '../analyzers/dependency/dependency-analyzer.js';
import type { ModuleGranularity, ProjectAnalysis } from '../analyzers/dependency/types.js';
import { ConfigurationError, EmptyProjectError } from '../analyzers/errors.js';
import { EXIT_CODES, OUTPUT_DIR_NAME } from '../constants.js';
import { renderJsonReport, writeReports } from '../reporters/index.js';
import { GranularitySchema } from '../schemas/config-schema.js';
import { createLogger, type Logger } from '../utils/analysis-logger.js';
import { loadProjectConfig, resolveConfig } from '../utils/config-loader.js';
import { categorizeError, createErrorMessage } from '../utils/error-handler.js';

export interface AnalyzeCommandOptions {
  threshold?: string;
  granularity?: string;
  ignore?: string[];
  config?: string;
  output?: string;
  json?: boolean;
  write?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (value.trim() === '' || Number.isNaN(threshold)) {
    throw new ConfigurationError(`--threshold expects a number between 0 and 1, got "${value}"`, { value });
  }
  return threshold;
}

function parseGranularity(value: string): ModuleGranularity {
  const parsed = GranularitySchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`--granularity must be "file" or "package", got "${value}"`, { value });
  }
  return parsed.data;
}

/**
 * Map a finished analysis to the process exit code
 */
export function exitCodeFor(analysis: ProjectAnalysis): ExitCode {
  switch (analysis.status) {
    case 'clean':
      return EXIT_CODES.CLEAN;
    case 'issues-found':
      return EXIT_CODES.ISSUES_FOUND;
    case 'empty':
      return EXIT_CODES.FAILURE;
  }
}

function printSummary(analysis: ProjectAnalysis): void {
  const { summary } = analysis;

  console.log();
  console.log(chalk.bold.blue('🔍 Dependency Analysis'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(`  Modules:               ${chalk.cyan(summary.totalModules)}`);
  console.log(`  Dependencies:          ${chalk.cyan(summary.totalDependencies)}`);

  const cycleTotal = summary.cycleCount + summary.selfCycleCount;
  const cycleColor = cycleTotal > 0 ? chalk.red : chalk.green;
  console.log(`  Circular dependencies: ${cycleColor(cycleTotal)}`);
  console.log(`  God modules:           ${summary.godModuleCount > 0 ? chalk.yellow(summary.godModuleCount) : chalk.green(0)}`);
  console.log(
    `  Layer violations:      ${summary.layerViolationCount > 0 ? chalk.red(summary.layerViolationCount) : chalk.green(0)}`
  );
  if (summary.parseErrorCount > 0) {
    console.log(`  Parse errors:          ${chalk.yellow(summary.parseErrorCount)}`);
  }

  const metrics = analysis.complexity.summary;
  const flag = (count: number): string => (count > 0 ? chalk.yellow(count) : chalk.green(0));
  console.log(`  Functions:             ${chalk.cyan(metrics.totalFunctions)} (avg complexity ${metrics.averageComplexity})`);
  console.log(`  High complexity:       ${flag(metrics.highComplexityCount)}`);
  console.log(`  Long functions:        ${flag(metrics.longFunctionCount)}`);
  console.log(`  Duplicate groups:      ${flag(metrics.duplicateGroupCount)}`);
  console.log();

  for (const cycle of analysis.cycles) {
    console.log(chalk.red(`  ✗ ${cycle.description}`));
  }
  for (const record of analysis.godModules) {
    const share = (record.ratio * 100).toFixed(1);
    console.log(chalk.yellow(`  ⚠ God module ${record.moduleId}: imported by ${record.inDegree} modules (${share}%)`));
  }
  for (const violation of analysis.layerViolations) {
    console.log(
      chalk.red(`  ✗ ${violation.kind}: ${violation.from} (${violation.fromLayer}) → ${violation.to} (${violation.toLayer})`)
    );
  }
  if (analysis.cycles.length + analysis.godModules.length + analysis.layerViolations.length > 0) {
    console.log();
  }
}

/**
 * Run an analysis for the CLI and return the exit code.
 * Never calls process.exit, so it can be driven from tests.
 */
export async function runAnalyze(
  projectArg: string | undefined,
  options: AnalyzeCommandOptions,
  logger: Logger = createLogger({ verbose: options.verbose, quiet: options.quiet })
): Promise<ExitCode> {
  const projectRoot = resolve(projectArg ?? process.cwd());

  try {
    const loaded = loadProjectConfig(projectRoot, options.config);
    const config = resolveConfig(loaded, {
      ...(options.threshold !== undefined ? { godModuleThreshold: parseThreshold(options.threshold) } : {}),
      ...(options.granularity !== undefined ? { granularity: parseGranularity(options.granularity) } : {}),
      ...(options.ignore ? { ignorePatterns: options.ignore } : {}),
    });
    if (config.configPath) {
      logger.info(`Using config ${config.configPath}`);
    }

    const analyzer = new DependencyAnalyzer({ logger });
    const analysis = await analyzer.analyzeProject(projectRoot, config);

    if (analysis.status === 'empty') {
      logger.error(new EmptyProjectError(projectRoot).message);
      return EXIT_CODES.FAILURE;
    }

    if (options.write !== false) {
      const outputDir = options.output
        ? isAbsolute(options.output)
          ? options.output
          : resolve(options.output)
        : join(projectRoot, OUTPUT_DIR_NAME);
      const written = await writeReports(analysis, outputDir);
      logger.info('Reports written', { ...written });
      if (!options.json) {
        console.log(chalk.gray(`Report: ${written.report}`));
      }
    }

    if (options.json) {
      process.stdout.write(renderJsonReport(analysis));
    } else {
      printSummary(analysis);
    }

    return exitCodeFor(analysis);
  } catch (error: unknown) {
    console.error(chalk.red(createErrorMessage(categorizeError(error), 'Dependency analysis', error)));
    return EXIT_CODES.FAILURE;
  }
}

/**
 * Create the analyze command
 */
export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Find circular dependencies and god modules in a project')
    .argument('[project]', 'Project directory (defaults to the current directory)')
    .option('-t, --threshold <ratio>', 'God-module threshold between 0 and 1 (default 0.3)')
    .addOption(new Option('-g, --granularity <mode>', 'Module granularity').choices(['file', 'package']))
    .option('-i, --ignore <glob...>', 'Extra glob patterns or directory names to skip')
    .option('-c, --config <path>', 'Config file (defaults to <project>/.modgraph.yaml)')
    .option('-o, --output <dir>', `Report directory (defaults to <project>/${OUTPUT_DIR_NAME})`)
    .option('-j, --json', 'Print the analysis as JSON on stdout', false)
    .option('--no-write', 'Do not write report files')
    .option('-v, --verbose', 'Verbose logging', false)
    .option('-q, --quiet', 'Only log errors', false)
    .action(async (project: string | undefined, options: AnalyzeCommandOptions) => {
      process.exitCode = await runAnalyze(project, options);
    });
}
