/**
 * Python Import Extractor
 *
 * Uses tree-sitter (WebAssembly build) with the tree-sitter-python grammar.
 * Imports are collected from the whole tree, including ones nested in
 * functions or try blocks; `from __future__` statements are skipped.
 * Function definitions are measured from the same tree.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { createRequire } from 'module';
import { join } from 'path';
import { Language, Parser, type Node } from 'web-tree-sitter';
import { GrammarLoadError } from '../errors.js';
import { fingerprintSource } from '../metrics/fingerprint.js';
import { extractErrorMessage } from '../../utils/error-handler.js';
import { BaseImportExtractor, importSequence } from './import-extractor.js';
import type { SourceLanguage } from './language.js';
import type { FunctionMetric, ImportExtraction, RawImport, SourceUnit } from './types.js';

type SyntaxNode = Node;

interface PythonImportRecord {
  /** Number of leading dots; 0 for absolute imports */
  readonly level: number;
  /** Dotted module name after the dots, may be empty (`from . import x`) */
  readonly module: string;
  readonly names: ReadonlyArray<string>;
  readonly line: number;
}

// Parser.init() loads the runtime WASM once per process
let runtimeReady: Promise<void> | null = null;
let pythonLanguage: Promise<Language> | null = null;

function initRuntime(): Promise<void> {
  if (!runtimeReady) {
    runtimeReady = Parser.init();
  }
  return runtimeReady;
}

/**
 * Get the path to the Python grammar WASM file
 */
function getGrammarPath(): string {
  const require = createRequire(import.meta.url);
  const possiblePaths: string[] = [];

  try {
    possiblePaths.push(require.resolve('tree-sitter-python/tree-sitter-python.wasm'));
  } catch {
    // Not resolvable through the package; fall through to node_modules lookup
  }
  possiblePaths.push(join(process.cwd(), 'node_modules', 'tree-sitter-python', 'tree-sitter-python.wasm'));

  for (const path of possiblePaths) {
    if (existsSync(path)) {
      return path;
    }
  }

  throw new Error(`WASM file not found for tree-sitter-python. Tried: ${possiblePaths.join(', ')}`);
}

async function loadPythonLanguage(): Promise<Language> {
  if (!pythonLanguage) {
    pythonLanguage = (async () => {
      await initRuntime();
      const bytes = await readFile(getGrammarPath());
      return Language.load(bytes);
    })();
  }
  return pythonLanguage;
}

/**
 * Get non-null children from a node
 */
function getChildren(node: SyntaxNode): SyntaxNode[] {
  return node.children.filter((c): c is SyntaxNode => c !== null);
}

function getNamedChildren(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((c): c is SyntaxNode => c !== null);
}

function dottedText(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, '');
}

/**
 * Name imported by a `dotted_name` or `aliased_import` child
 */
function importedName(node: SyntaxNode): string | undefined {
  if (node.type === 'dotted_name') return dottedText(node);
  if (node.type === 'aliased_import') {
    const name = node.childForFieldName('name');
    return name ? dottedText(name) : undefined;
  }
  return undefined;
}

/**
 * First ERROR node in document order, for the diagnostic line
 */
function findErrorNode(root: SyntaxNode): SyntaxNode | undefined {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === 'ERROR') return node;
    const children = getChildren(node);
    for (let i = children.length - 1; i >= 0; i--) {
      if (children[i].hasError || children[i].type === 'ERROR') stack.push(children[i]);
    }
  }
  return undefined;
}

function collectImportRecords(root: SyntaxNode): PythonImportRecord[] {
  const records: PythonImportRecord[] = [];
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === 'import_statement') {
      // import a.b, c as d
      for (const child of getNamedChildren(node)) {
        const name = importedName(child);
        if (name) {
          records.push({ level: 0, module: name, names: [], line: node.startPosition.row + 1 });
        }
      }
      continue;
    }

    if (node.type === 'import_from_statement') {
      const moduleNode = node.childForFieldName('module_name');
      if (!moduleNode) continue;

      let level = 0;
      let module = '';
      if (moduleNode.type === 'relative_import') {
        for (const part of getChildren(moduleNode)) {
          if (part.type === 'import_prefix') level = part.text.trim().length;
          else if (part.type === 'dotted_name') module = dottedText(part);
        }
      } else {
        module = dottedText(moduleNode);
      }

      const names: string[] = [];
      for (const child of getNamedChildren(node)) {
        if (child.startIndex === moduleNode.startIndex) continue;
        const name = importedName(child);
        if (name) names.push(name);
      }

      records.push({ level, module, names, line: node.startPosition.row + 1 });
      continue;
    }

    if (node.type === 'future_import_statement') continue;

    const children = getChildren(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return records;
}

// Each `and`/`or` is its own boolean_operator node, so `a and b and c` counts twice
const DECISION_NODES: ReadonlySet<string> = new Set([
  'if_statement',
  'elif_clause',
  'for_statement',
  'while_statement',
  'except_clause',
  'boolean_operator',
  'list_comprehension',
  'dictionary_comprehension',
  'set_comprehension',
  'generator_expression',
  'assert_statement',
]);

function countDecisionPoints(node: SyntaxNode): number {
  let count = 0;
  const stack = getChildren(node);
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (DECISION_NODES.has(current.type)) count++;
    stack.push(...getChildren(current));
  }
  return count;
}

function collectFunctionMetrics(root: SyntaxNode): FunctionMetric[] {
  const functions: FunctionMetric[] = [];
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === 'function_definition') {
      const line = node.startPosition.row + 1;
      functions.push(
        Object.freeze({
          name: node.childForFieldName('name')?.text ?? '<anonymous>',
          line,
          lines: node.endPosition.row - node.startPosition.row + 1,
          complexity: 1 + countDecisionPoints(node),
          hash: fingerprintSource(node.text),
        })
      );
    }

    const children = getChildren(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return functions;
}

/**
 * Resolve leading dots against the importing file's package.
 * `from ..x import y` inside package `a.b` gives `a.x`.
 */
export function resolveRelativeModule(packagePath: string, level: number, module: string): string | null {
  if (level === 0) return module;

  const parts = packagePath ? packagePath.split('.') : [];
  const remaining = parts.slice(0, parts.length - (level - 1));
  if (level - 1 > parts.length || remaining.length === 0) return null;

  return module ? [...remaining, module].join('.') : remaining.join('.');
}

async function createParser(): Promise<Parser> {
  try {
    const language = await loadPythonLanguage();
    const parser = new Parser();
    parser.setLanguage(language);
    return parser;
  } catch (error) {
    throw new GrammarLoadError(`Failed to load the Python grammar: ${extractErrorMessage(error)}`, 'python');
  }
}

export class PythonImportExtractor extends BaseImportExtractor {
  readonly languages: ReadonlyArray<SourceLanguage> = ['python'];
  // Shared by concurrent extract() calls so the parser is built once
  private parserPromise: Promise<Parser> | null = null;

  private ensureParser(): Promise<Parser> {
    if (!this.parserPromise) {
      const pending = createParser();
      this.parserPromise = pending;
      // A failed load is retried on the next call
      void pending.catch(() => {
        if (this.parserPromise === pending) this.parserPromise = null;
      });
    }
    return this.parserPromise;
  }

  async extract(unit: SourceUnit): Promise<ImportExtraction> {
    const parser = await this.ensureParser();
    const tree = parser.parse(unit.content);
    if (!tree) {
      return this.failed(unit, 'Parser produced no syntax tree');
    }

    try {
      const root = tree.rootNode;
      if (root.hasError) {
        const errorNode = findErrorNode(root);
        const line = errorNode ? errorNode.startPosition.row + 1 : undefined;
        return this.failed(unit, line ? `Invalid Python syntax at line ${line}` : 'Invalid Python syntax', line);
      }

      const records = collectImportRecords(root);
      return Object.freeze({
        imports: importSequence(records, record => this.toRawImport(record, unit)),
        functions: Object.freeze(collectFunctionMetrics(root)),
      });
    } finally {
      tree.delete();
    }
  }

  private toRawImport(record: PythonImportRecord, unit: SourceUnit): RawImport | undefined {
    if (record.level === 0 && record.module === '__future__') return undefined;

    return Object.freeze({
      specifier: '.'.repeat(record.level) + record.module,
      target: resolveRelativeModule(unit.packagePath, record.level, record.module),
      names: Object.freeze([...record.names]),
      isRelative: record.level > 0,
      line: record.line,
    });
  }

  dispose(): void {
    const pending = this.parserPromise;
    this.parserPromise = null;
    // Load failures were already reported to extract() callers
    void pending?.then(
      parser => parser.delete(),
      () => undefined
    );
  }
}
