/**
 * Application-wide constants
 */

/** Project configuration file name */
export const CONFIG_FILE_NAME = '.modgraph.yaml';

/** Report output directory name (inside the analyzed project) */
export const OUTPUT_DIR_NAME = '.modgraph';

// Report file names (without paths)
export const FILE_NAMES = {
  /** Markdown analysis report */
  REPORT_MD: 'analysis_report.md',
  /** Mermaid flowchart of the module graph */
  GRAPH_MMD: 'dependency_graph.mmd',
  /** Raw analysis data */
  DATA_JSON: 'dependency_data.json',
} as const;

// Analysis defaults
export const ANALYSIS_CONFIG = {
  /** Share of the project importing a module before it counts as a god module */
  GOD_MODULE_THRESHOLD: 0.3,
  /** Files read and parsed at once */
  CONCURRENCY: 8,
  SOURCE_ROOTS: ['src', 'app', 'lib', 'pkg'],
} as const;

// Refactoring estimates used by the report
export const ESTIMATE_CONFIG = {
  HOURS_PER_CYCLE_MODULE: 4,
  HOURS_PER_GOD_MODULE_DEPENDENT: 2,
  HOURS_PER_SKIP_LAYER: 4,
  HOURS_PER_REVERSE_DEPENDENCY: 6,
  HOURS_PER_DAY: 8,
} as const;

/** Always excluded from discovery */
export const DEFAULT_IGNORE_PATTERNS: ReadonlyArray<string> = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.git/**',
  '**/__pycache__/**',
  '**/venv/**',
  '**/.venv/**',
  '**/env/**',
  `**/${OUTPUT_DIR_NAME}/**`,
];

// Process exit codes
export const EXIT_CODES = {
  CLEAN: 0,
  ISSUES_FOUND: 1,
  FAILURE: 2,
} as const;
