/**
 * Dependency Analyzer
 *
 * Main orchestrator: discovers files, extracts imports in parallel,
 * then hands the merged, path-sorted tuples to the pure engine.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ANALYSIS_CONFIG } from '../../constants.js';
import { NoopLogger, type Logger } from '../../utils/analysis-logger.js';
import { extractErrorMessage } from '../../utils/error-handler.js';
import { parallelLimit } from '../../utils/parallel.js';
import { ALL_LANGUAGES, ExtractorRegistry, type FunctionMetric, type RawImport } from '../ast/index.js';
import { FileReadError } from '../errors.js';
import { ComplexityAnalyzer, detectTechStack } from '../metrics/index.js';
import { analyzeModuleGraph } from './dependency-engine.js';
import { validateThreshold, DEFAULT_GOD_MODULE_THRESHOLD } from './god-module-detector.js';
import { describeFile } from './module-resolver.js';
import { discoverSourceFiles, type DiscoveredFile } from './source-walker.js';
import type { AnalysisDiagnostic, DependencyAnalysisOptions, ModuleSource, ProjectAnalysis } from './types.js';

interface FileOutcome {
  readonly source?: ModuleSource;
  readonly diagnostic?: AnalysisDiagnostic;
}

export interface DependencyAnalyzerDeps {
  readonly logger?: Logger;
  readonly registry?: ExtractorRegistry;
}

export class DependencyAnalyzer {
  private readonly logger: Logger;
  private readonly registry?: ExtractorRegistry;

  constructor(deps: DependencyAnalyzerDeps = {}) {
    this.logger = deps.logger ?? new NoopLogger();
    this.registry = deps.registry;
  }

  /**
   * Analyze dependencies in a project directory
   *
   * @throws ConfigurationError for an invalid threshold, before any file is read
   * @throws GrammarLoadError when a language parser cannot start
   */
  async analyzeProject(projectRoot: string, options: DependencyAnalysisOptions = {}): Promise<ProjectAnalysis> {
    const timestamp = new Date();
    const root = path.resolve(projectRoot);
    validateThreshold(options.godModuleThreshold ?? DEFAULT_GOD_MODULE_THRESHOLD);

    const languages = options.languages ?? ALL_LANGUAGES;
    const registry = this.registry ?? new ExtractorRegistry(languages);

    try {
      const started = Date.now();
      const files = await discoverSourceFiles(root, { languages, ignorePatterns: options.ignorePatterns });
      this.logger.info(`Discovered ${files.length} source files`, { projectRoot: root });
      this.logger.debug('Discovery finished', { ms: Date.now() - started });

      const extractStarted = Date.now();
      const outcomes = await parallelLimit(
        files,
        file => this.processFile(root, file, registry, options),
        options.concurrency ?? ANALYSIS_CONFIG.CONCURRENCY
      );
      this.logger.debug('Import extraction finished', { ms: Date.now() - extractStarted });

      const sources: ModuleSource[] = [];
      const diagnostics: AnalysisDiagnostic[] = [];
      for (const outcome of outcomes) {
        if (outcome.source) sources.push(outcome.source);
        if (outcome.diagnostic) diagnostics.push(outcome.diagnostic);
      }

      const engineStarted = Date.now();
      const result = analyzeModuleGraph(sources, options, diagnostics);
      this.logger.debug('Graph analysis finished', {
        ms: Date.now() - engineStarted,
        modules: result.summary.totalModules,
        edges: result.summary.totalDependencies,
      });

      const complexity = new ComplexityAnalyzer().analyze(sources);
      this.logger.debug('Complexity analysis finished', {
        functions: complexity.summary.totalFunctions,
        highComplexity: complexity.summary.highComplexityCount,
      });

      return Object.freeze({
        ...result,
        projectRoot: root,
        languages: Object.freeze([...languages]),
        techStack: Object.freeze(detectTechStack(root)),
        complexity,
        timestamp,
      });
    } finally {
      if (!this.registry) registry.dispose();
    }
  }

  /**
   * Read and parse one file. Read failures drop the file; parse failures keep it with no imports.
   */
  private async processFile(
    root: string,
    file: DiscoveredFile,
    registry: ExtractorRegistry,
    options: DependencyAnalysisOptions
  ): Promise<FileOutcome> {
    let content: string;
    try {
      content = await fs.readFile(path.join(root, file.filePath), 'utf-8');
    } catch (error) {
      const readError = new FileReadError(`Cannot read file: ${extractErrorMessage(error)}`, file.filePath);
      this.logger.warn(`Skipping ${file.filePath}`, { reason: readError.message });
      return { diagnostic: { kind: 'read-error', filePath: file.filePath, message: readError.message } };
    }

    const descriptor = describeFile(file, { granularity: options.granularity, sourceRoots: options.sourceRoots });
    const extractor = registry.getExtractor(file.filePath);
    let imports: Iterable<RawImport> = [];
    let functions: ReadonlyArray<FunctionMetric> = [];
    let diagnostic: AnalysisDiagnostic | undefined;

    if (extractor) {
      const extraction = await extractor.extract({
        filePath: file.filePath,
        content,
        language: file.language,
        packagePath: descriptor.packagePath,
      });
      imports = extraction.imports;
      functions = extraction.functions ?? [];

      if (extraction.error) {
        this.logger.warn(`Parse error in ${file.filePath}`, {
          message: extraction.error.message,
          line: extraction.error.line,
        });
        diagnostic = {
          kind: 'parse-error',
          filePath: file.filePath,
          message: extraction.error.message,
          ...(extraction.error.line !== undefined ? { line: extraction.error.line } : {}),
        };
      }
    }

    return {
      source: {
        moduleId: descriptor.fileModuleId,
        filePath: file.filePath,
        language: file.language,
        imports,
        functions,
      },
      ...(diagnostic ? { diagnostic } : {}),
    };
  }
}
