import assert from "node:assert";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { after, describe, it } from "node:test";
import { Statement } from "./ast.js";
import { parseStrict } from "./parser.js";
import { resolveImports, resolveVariables } from "./resolve.js";
import { WanfValue } from "./schema.js";
import { DecodeError, ParseError } from "./types.js";

function names(statements: Statement[]): string[] {
  return statements.map((s) => (s.type === "import" ? `import ${s.path.value}` : s.name.value));
}

describe("resolveImports", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wanf-resolve-"));
  after(() => fs.rmSync(dir, { recursive: true, force: true }));

  function write(name: string, source: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, source);
    return file;
  }

  function resolveFile(file: string): Statement[] {
    const root = parseStrict(fs.readFileSync(file, "utf-8"));
    return resolveImports(root.statements, dir, new Set([file]));
  }

  it("inlines imported statements in place", () => {
    write("inner.wanf", "var shared = 1\ninner = 2\n");
    const main = write("main.wanf", 'first = 0\nimport "inner.wanf"\nlast = 3\n');
    assert.deepStrictEqual(names(resolveFile(main)), ["first", "shared", "inner", "last"]);
  });

  it("stops at import cycles", () => {
    write("a.wanf", 'import "b.wanf"\nx = 1\n');
    write("b.wanf", 'import "a.wanf"\ny = 2\n');
    assert.deepStrictEqual(names(resolveFile(path.join(dir, "a.wanf"))), ["y", "x"]);
  });

  it("includes a shared import once", () => {
    write("base.wanf", "base = 1\n");
    write("left.wanf", 'import "base.wanf"\nleft = 1\n');
    write("right.wanf", 'import "base.wanf"\nright = 1\n');
    const top = write("top.wanf", 'import "left.wanf"\nimport "right.wanf"\ntop = 1\n');
    assert.deepStrictEqual(names(resolveFile(top)), ["base", "left", "right", "top"]);
  });

  it("resolves nested paths against the importing file", () => {
    fs.mkdirSync(path.join(dir, "sub"));
    write(path.join("sub", "leaf.wanf"), "leaf = 1\n");
    write(path.join("sub", "mid.wanf"), 'import "leaf.wanf"\nmid = 1\n');
    const outer = write("outer.wanf", 'import "sub/mid.wanf"\n');
    assert.deepStrictEqual(names(resolveFile(outer)), ["leaf", "mid"]);
  });

  it("reports missing files at the import", () => {
    const file = write("missing.wanf", 'x = 1\nimport "nowhere.wanf"\n');
    assert.throws(
      () => resolveFile(file),
      (err: unknown) => {
        assert.ok(err instanceof DecodeError);
        assert.strictEqual(err.message, 'line 2:1: failed to read imported file "nowhere.wanf"');
        assert.ok(err.cause instanceof Error);
        return true;
      },
    );
  });

  it("reports syntax errors in imported files", () => {
    write("broken.wanf", "x = \n");
    const file = write("uses-broken.wanf", 'import "broken.wanf"\n');
    assert.throws(
      () => resolveFile(file),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.strictEqual(err.file, path.join(dir, "broken.wanf"));
        assert.ok(err.message.startsWith(`parser errors in imported file ${path.join(dir, "broken.wanf")}: `));
        return true;
      },
    );
  });
});

describe("resolveVariables", () => {
  it("evaluates declarations in order", () => {
    const root = parseStrict("var a = 1\nx = 5\nvar b = ${a}");
    const env = new Map<string, WanfValue>();
    const seen: string[] = [];
    resolveVariables(
      root.statements,
      (expr) => {
        seen.push(expr.type);
        if (expr.type === "integer") {
          return expr.value;
        }
        if (expr.type === "varRef") {
          const value = env.get(expr.name);
          assert.ok(value !== undefined);
          return value;
        }
        throw new Error(`unexpected ${expr.type}`);
      },
      env,
    );
    assert.deepStrictEqual(seen, ["integer", "varRef"]);
    assert.deepStrictEqual([...env], [
      ["a", 1],
      ["b", 1],
    ]);
  });
});
