import * as fs from "node:fs";
import * as path from "node:path";
import { Expression, Statement, positionOf } from "./ast.js";
import { parse } from "./parser.js";
import { WanfValue } from "./schema.js";
import { DecodeError, ParseError } from "./types.js";

/**
 * Replace every `import` with the statements of the file it names, in place.
 * Paths resolve against `baseDir`; an absolute path already in `processed`
 * is dropped, which breaks cycles and deduplicates diamonds. Imported files
 * share the same `processed` set.
 */
export function resolveImports(statements: readonly Statement[], baseDir: string, processed: Set<string>): Statement[] {
  const out: Statement[] = [];
  for (const stmt of statements) {
    if (stmt.type !== "import") {
      out.push(stmt);
      continue;
    }
    const file = path.resolve(baseDir, stmt.path.value);
    if (processed.has(file)) {
      continue;
    }
    processed.add(file);

    let source: Buffer;
    try {
      source = fs.readFileSync(file);
    } catch (err) {
      throw new DecodeError(`failed to read imported file "${stmt.path.value}"`, positionOf(stmt), { cause: err });
    }
    const result = parse(source);
    if (result.errors.length > 0) {
      throw new ParseError(result.errors, file);
    }
    out.push(...resolveImports(result.root.statements, path.dirname(file), processed));
  }
  return out;
}

/** The evaluated top-level `var` bindings of one document */
export type Environment = Map<string, WanfValue>;

/**
 * Evaluate `var` declarations in order into `env`, which `evaluate` reads
 * from, so each declaration sees only the ones before it.
 * Declarations from imported files are already inlined, so they share the
 * environment of the importing document.
 */
export function resolveVariables(
  statements: readonly Statement[],
  evaluate: (expr: Expression) => WanfValue,
  env: Environment = new Map(),
): Environment {
  for (const stmt of statements) {
    if (stmt.type === "var") {
      env.set(stmt.name.value, evaluate(stmt.value));
    }
  }
  return env;
}
