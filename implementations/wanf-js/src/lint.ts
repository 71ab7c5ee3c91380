import { BlockStatement, Expression, Root, Statement, VarStatement } from "./ast.js";
import { Parser, diagnosticAt } from "./parser.js";
import { Diagnostic, ErrorLevel, ErrorType } from "./types.js";

const INTERPOLATION = /\$\{(\w+)\}/g;

export interface LintResult {
  root: Root;
  diagnostics: Diagnostic[];
  /** True when `diagnostics` are fatal parser errors and analysis did not run */
  fatal: boolean;
}

/**
 * Parse in lint mode and analyze. Fatal parser errors are returned as-is,
 * one per offending token, and skip analysis.
 */
export function lint(source: string | Uint8Array): LintResult {
  const parser = new Parser(source, { lintMode: true });
  const root = parser.parseProgram();
  if (parser.errors.length > 0) {
    return { root, diagnostics: [...parser.errors], fatal: true };
  }
  const analyzer = new Analyzer(parser.advisories);
  return { root: analyzer.analyze(root), diagnostics: analyzer.diagnostics, fatal: false };
}

/**
 * Two passes: collect block-name counts and variable declarations, then
 * rewrite redundant labels and record variable uses.
 */
export class Analyzer {
  readonly diagnostics: Diagnostic[];
  private blockCounts = new Map<string, number>();
  private declared = new Map<string, VarStatement>();
  private used = new Set<string>();

  constructor(advisories: readonly Diagnostic[] = []) {
    this.diagnostics = [...advisories];
  }

  analyze(root: Root): Root {
    this.collectRoot(root, true);
    const checked = this.checkRoot(root);
    for (const [name, stmt] of this.declared) {
      if (!this.used.has(name)) {
        this.diagnostics.push(
          diagnosticAt(
            stmt.name.token,
            `variable "${name}" is declared but not used`,
            ErrorLevel.Lint,
            ErrorType.UnusedVariable,
            [name],
          ),
        );
      }
    }
    return checked;
  }

  private collectRoot(root: Root, topLevel: boolean): void {
    for (const stmt of root.statements) {
      this.collectStatement(stmt, topLevel);
    }
  }

  private collectStatement(stmt: Statement, topLevel: boolean): void {
    switch (stmt.type) {
      case "block":
        this.blockCounts.set(stmt.name.value, (this.blockCounts.get(stmt.name.value) ?? 0) + 1);
        this.collectRoot(stmt.body, false);
        break;
      case "var":
        if (topLevel && !this.declared.has(stmt.name.value)) {
          this.declared.set(stmt.name.value, stmt);
        }
        this.collectExpression(stmt.value);
        break;
      case "assign":
        this.collectExpression(stmt.value);
        break;
      case "import":
        break;
    }
  }

  private collectExpression(expr: Expression): void {
    switch (expr.type) {
      case "list":
        expr.elements.forEach((el) => this.collectExpression(el));
        break;
      case "map":
        expr.elements.forEach((el) => this.collectStatement(el, false));
        break;
      case "blockLiteral":
        this.collectRoot(expr.body, false);
        break;
      default:
        break;
    }
  }

  private checkRoot(root: Root): Root {
    root.statements = root.statements.map((stmt) => this.checkStatement(stmt));
    return root;
  }

  private checkStatement(stmt: Statement): Statement {
    switch (stmt.type) {
      case "block":
        return this.checkBlock(stmt);
      case "assign":
      case "var":
        this.checkExpression(stmt.value);
        return stmt;
      case "import":
        this.markInterpolations(stmt.path.value);
        return stmt;
    }
  }

  private checkBlock(stmt: BlockStatement): Statement {
    this.checkRoot(stmt.body);
    if (!stmt.label || this.blockCounts.get(stmt.name.value) !== 1) {
      return stmt;
    }
    this.diagnostics.push(
      diagnosticAt(
        stmt.token,
        `block "${stmt.name.value}" is defined only once, the label "${stmt.label.value}" is redundant`,
        ErrorLevel.Fmt,
        ErrorType.RedundantLabel,
        [stmt.name.value, stmt.label.value],
      ),
    );
    const rewritten: BlockStatement = {
      type: "block",
      token: stmt.token,
      name: stmt.name,
      body: stmt.body,
      leadingComments: stmt.leadingComments,
    };
    if (stmt.lineComment) {
      rewritten.lineComment = stmt.lineComment;
    }
    return rewritten;
  }

  private checkExpression(expr: Expression): void {
    switch (expr.type) {
      case "varRef":
        this.used.add(expr.name);
        break;
      case "string":
        this.markInterpolations(expr.value);
        break;
      case "env":
        this.markInterpolations(expr.name.value);
        if (expr.defaultValue) {
          this.markInterpolations(expr.defaultValue.value);
        }
        break;
      case "list":
        expr.elements.forEach((el) => this.checkExpression(el));
        break;
      case "map":
        expr.elements = expr.elements.map((el) => this.checkStatement(el));
        break;
      case "blockLiteral":
        this.checkRoot(expr.body);
        break;
      default:
        break;
    }
  }

  private markInterpolations(text: string): void {
    for (const match of text.matchAll(INTERPOLATION)) {
      this.used.add(match[1]);
    }
  }
}
