/**
 * TypeScript / JavaScript Import Extractor
 *
 * Uses ts-morph on an in-memory project, so only the file's own text is parsed.
 * Reads static imports, re-exports, `import x = require()`, `require()` and `import()`,
 * and measures every function with a body from the same tree.
 */

import { posix } from 'path';
import {
  Node,
  Project,
  SyntaxKind,
  ts,
  type ArrowFunction,
  type ConstructorDeclaration,
  type FunctionDeclaration,
  type FunctionExpression,
  type GetAccessorDeclaration,
  type MethodDeclaration,
  type SetAccessorDeclaration,
  type SourceFile,
} from 'ts-morph';
import { fingerprintSource } from '../metrics/fingerprint.js';
import { BaseImportExtractor, importSequence } from './import-extractor.js';
import type { SourceLanguage } from './language.js';
import type { FunctionMetric, ImportExtraction, RawImport, SourceUnit } from './types.js';

interface ImportRecord {
  readonly specifier: string;
  readonly names: ReadonlyArray<string>;
  readonly line: number;
}

const STRIPPED_EXTENSIONS = ['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts'];

type MeasuredFunction =
  | FunctionDeclaration
  | MethodDeclaration
  | ArrowFunction
  | FunctionExpression
  | ConstructorDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration;

const ANONYMOUS = '<anonymous>';

const DECISION_KINDS: ReadonlySet<SyntaxKind> = new Set([
  SyntaxKind.IfStatement,
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
  SyntaxKind.CaseClause,
  SyntaxKind.CatchClause,
  SyntaxKind.ConditionalExpression,
]);

const SHORT_CIRCUIT_OPERATORS: ReadonlySet<SyntaxKind> = new Set([
  SyntaxKind.AmpersandAmpersandToken,
  SyntaxKind.BarBarToken,
  SyntaxKind.QuestionQuestionToken,
]);

function asMeasuredFunction(node: Node): MeasuredFunction | undefined {
  if (
    Node.isFunctionDeclaration(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isArrowFunction(node) ||
    Node.isFunctionExpression(node) ||
    Node.isConstructorDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node)
  ) {
    return node;
  }
  return undefined;
}

/**
 * Declared name, or the name of the variable or property a function expression is assigned to
 */
function functionName(func: MeasuredFunction): string {
  if (Node.isConstructorDeclaration(func)) return 'constructor';
  if (Node.isArrowFunction(func) || Node.isFunctionExpression(func)) {
    const parent = func.getParent();
    if (Node.isVariableDeclaration(parent) || Node.isPropertyAssignment(parent) || Node.isPropertyDeclaration(parent)) {
      return parent.getName();
    }
    return Node.isFunctionExpression(func) ? func.getName() ?? ANONYMOUS : ANONYMOUS;
  }
  return func.getName() ?? ANONYMOUS;
}

/**
 * 1 + branches, loops, case clauses, catch clauses, `?:` and short-circuit operators.
 * Nested functions count toward their enclosing function too.
 */
export function cyclomaticComplexity(func: Node): number {
  let complexity = 1;
  func.forEachDescendant(node => {
    if (DECISION_KINDS.has(node.getKind())) {
      complexity++;
    } else if (Node.isBinaryExpression(node) && SHORT_CIRCUIT_OPERATORS.has(node.getOperatorToken().getKind())) {
      complexity++;
    }
  });
  return complexity;
}

function collectFunctions(sourceFile: SourceFile): FunctionMetric[] {
  const functions: FunctionMetric[] = [];

  sourceFile.forEachDescendant(node => {
    const func = asMeasuredFunction(node);
    // Overload signatures and abstract members have no body
    if (!func || func.getBody() === undefined) return;

    const line = func.getStartLineNumber();
    functions.push(
      Object.freeze({
        name: functionName(func),
        line,
        lines: func.getEndLineNumber() - line + 1,
        complexity: cyclomaticComplexity(func),
        hash: fingerprintSource(func.getText()),
      })
    );
  });

  return functions;
}

export function isRelativeSpecifier(specifier: string): boolean {
  return specifier === '.' || specifier === '..' || specifier.startsWith('./') || specifier.startsWith('../');
}

/**
 * Resolve a relative specifier against the importing file's directory.
 * Returns '' for the project root itself and null when the path leaves the root.
 */
export function normalizeRelativePath(fromDirectory: string, specifier: string): string | null {
  let joined = posix.normalize(posix.join(fromDirectory || '.', specifier));
  if (joined.endsWith('/')) joined = joined.slice(0, -1);
  if (joined === '..' || joined.startsWith('../')) return null;
  if (joined === '.') return '';

  const extension = STRIPPED_EXTENSIONS.find(ext => joined.endsWith(ext));
  return extension ? joined.slice(0, -extension.length) : joined;
}

export class TypeScriptImportExtractor extends BaseImportExtractor {
  readonly languages: ReadonlyArray<SourceLanguage> = ['typescript', 'javascript'];
  private project: Project;

  constructor() {
    super();
    this.project = new Project({
      useInMemoryFileSystem: true,
      skipLoadingLibFiles: true,
      compilerOptions: {
        target: ts.ScriptTarget.Latest,
        allowJs: true,
        noLib: true,
        jsx: ts.JsxEmit.Preserve,
      },
    });
  }

  async extract(unit: SourceUnit): Promise<ImportExtraction> {
    const sourceFile = this.project.createSourceFile(`/${unit.filePath}`, unit.content, { overwrite: true });

    try {
      const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
      if (diagnostics.length > 0) {
        const first = diagnostics[0];
        const text = first.getMessageText();
        const message = typeof text === 'string' ? text : text.getMessageText();
        return this.failed(unit, message, first.getLineNumber());
      }

      const records = this.collectImports(sourceFile);
      return Object.freeze({
        imports: importSequence(records, record => this.toRawImport(record, unit)),
        functions: Object.freeze(collectFunctions(sourceFile)),
      });
    } finally {
      // Keep the in-memory project from growing across files
      this.project.removeSourceFile(sourceFile);
    }
  }

  private collectImports(sourceFile: SourceFile): ImportRecord[] {
    const records: ImportRecord[] = [];

    for (const decl of sourceFile.getImportDeclarations()) {
      const names = decl.getNamedImports().map(named => named.getName());
      const defaultImport = decl.getDefaultImport();
      const namespaceImport = decl.getNamespaceImport();
      if (defaultImport) names.push(defaultImport.getText());
      if (namespaceImport) names.push(namespaceImport.getText());

      records.push({
        specifier: decl.getModuleSpecifierValue(),
        names,
        line: decl.getStartLineNumber(),
      });
    }

    // export { x } from './y' and export * from './z'
    for (const decl of sourceFile.getExportDeclarations()) {
      const specifier = decl.getModuleSpecifierValue();
      if (specifier === undefined) continue;
      records.push({
        specifier,
        names: decl.getNamedExports().map(named => named.getName()),
        line: decl.getStartLineNumber(),
      });
    }

    for (const decl of sourceFile.getDescendantsOfKind(SyntaxKind.ImportEqualsDeclaration)) {
      const reference = decl.getModuleReference();
      if (!Node.isExternalModuleReference(reference)) continue;
      const expression = reference.getExpression();
      if (Node.isStringLiteral(expression)) {
        records.push({ specifier: expression.getLiteralValue(), names: [decl.getName()], line: decl.getStartLineNumber() });
      }
    }

    for (const call of sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      const callee = call.getExpression();
      const isRequire = Node.isIdentifier(callee) && callee.getText() === 'require';
      const isDynamicImport = callee.getKind() === SyntaxKind.ImportKeyword;
      if (!isRequire && !isDynamicImport) continue;

      const [argument] = call.getArguments();
      if (Node.isStringLiteral(argument) || Node.isNoSubstitutionTemplateLiteral(argument)) {
        records.push({ specifier: argument.getLiteralValue(), names: [], line: call.getStartLineNumber() });
      }
    }

    return records.sort((a, b) => a.line - b.line);
  }

  private toRawImport(record: ImportRecord, unit: SourceUnit): RawImport {
    const isRelative = isRelativeSpecifier(record.specifier);
    return Object.freeze({
      specifier: record.specifier,
      target: isRelative ? normalizeRelativePath(unit.packagePath, record.specifier) : record.specifier,
      names: Object.freeze([...record.names]),
      isRelative,
      line: record.line,
    });
  }

  dispose(): void {
    for (const sourceFile of this.project.getSourceFiles()) {
      this.project.removeSourceFile(sourceFile);
    }
  }
}
