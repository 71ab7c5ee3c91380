import assert from "node:assert";
import { describe, it } from "node:test";
import { Parser, parse, parseStrict } from "./parser.js";
import { ErrorLevel, ErrorType, ParseError } from "./types.js";

describe("parse", () => {
  it("parses assignments and labeled blocks", () => {
    const { root, errors, advisories } = parse('a = 1\nsrv "x" {\n\tport = 80\n}');
    assert.deepStrictEqual(errors, []);
    assert.deepStrictEqual(advisories, []);
    assert.strictEqual(root.statements.length, 2);
    const block = root.statements[1];
    assert.strictEqual(block.type, "block");
    if (block.type === "block") {
      assert.strictEqual(block.name.value, "srv");
      assert.strictEqual(block.label?.value, "x");
      assert.strictEqual(block.body.statements.length, 1);
    }
  });

  it("parses every expression kind", () => {
    const { root, errors } = parse(
      [
        "var v = 2",
        'import "other.wanf"',
        "i = 1",
        "f = 1.5",
        "s = 'x'",
        "b = false",
        "d = 5s",
        "l = [1, 2]",
        "m = {[k = 1]}",
        "o = { x = 1 }",
        "r = ${v}",
        'e = env("HOME", "/tmp")',
      ].join("\n"),
    );
    assert.deepStrictEqual(errors, []);
    assert.deepStrictEqual(
      root.statements.map((s) => (s.type === "assign" || s.type === "var" ? s.value.type : s.type)),
      ["integer", "import", "integer", "float", "string", "bool", "duration", "list", "map", "blockLiteral", "varRef", "env"],
    );
  });

  it("attaches leading and trailing comments", () => {
    const { root } = parse("a = 1 // note\n// lead\nb = 2\n// bye");
    const [a, b] = root.statements;
    assert.strictEqual(a.lineComment?.text, "// note");
    assert.deepStrictEqual(
      b.leadingComments.map((c) => c.text),
      ["// lead"],
    );
    assert.deepStrictEqual(
      root.danglingComments.map((c) => c.text),
      ["// bye"],
    );
  });

  it("attaches a line comment that follows a multi-line string", () => {
    const { root, errors } = parse("a = `x\ny` // c\nb = 1");
    assert.deepStrictEqual(errors, []);
    const [a, b] = root.statements;
    assert.strictEqual(a.lineComment?.text, "// c");
    assert.deepStrictEqual(b.leadingComments, []);
  });

  it("keeps comments before a closing brace", () => {
    const { root } = parse("s {\n\ta = 1\n\t// end\n}");
    const block = root.statements[0];
    assert.strictEqual(block.type, "block");
    if (block.type === "block") {
      assert.deepStrictEqual(
        block.body.danglingComments.map((c) => c.text),
        ["// end"],
      );
    }
  });

  it("advises on commas between block statements", () => {
    const { errors, advisories } = parse("b {\n\tx = 1,\n\ty = 2\n}");
    assert.deepStrictEqual(errors, []);
    assert.deepStrictEqual(advisories, [
      {
        line: 2,
        column: 7,
        endLine: 2,
        endColumn: 8,
        message: "redundant comma; statements in a block should be separated by newlines",
        level: ErrorLevel.Fmt,
        type: ErrorType.RedundantComma,
      },
    ]);
  });

  it("records a trailing list comma", () => {
    const { root, advisories } = parse("a = [1, 2,]");
    const stmt = root.statements[0];
    assert.strictEqual(stmt.type, "assign");
    if (stmt.type === "assign" && stmt.value.type === "list") {
      assert.strictEqual(stmt.value.elements.length, 2);
      assert.strictEqual(stmt.value.hasTrailingComma, true);
    }
    assert.deepStrictEqual(advisories, [
      {
        line: 1,
        column: 10,
        endLine: 1,
        endColumn: 11,
        message: "redundant trailing comma in list literal",
        level: ErrorLevel.Fmt,
        type: ErrorType.RedundantComma,
      },
    ]);
  });

  it("inserts a missing comma in map literals", () => {
    const { root, errors, advisories } = parse("m = {[a = 1 b = 2,]}");
    assert.deepStrictEqual(errors, []);
    const stmt = root.statements[0];
    if (stmt.type === "assign" && stmt.value.type === "map") {
      assert.deepStrictEqual(
        stmt.value.elements.map((el) => el.type === "assign" && el.name.value),
        ["a", "b"],
      );
    } else {
      assert.fail("expected a map assignment");
    }
    assert.deepStrictEqual(advisories, [
      {
        line: 1,
        column: 13,
        endLine: 1,
        endColumn: 14,
        message: "missing comma, auto-inserted before IDENT",
        level: ErrorLevel.Fmt,
        type: ErrorType.MissingComma,
        args: ["IDENT"],
      },
    ]);
  });

  it("treats stray tokens as fatal outside lint mode", () => {
    const { errors } = parse("a = 1\n@");
    assert.deepStrictEqual(errors, [
      {
        line: 2,
        column: 1,
        endLine: 2,
        endColumn: 2,
        message: "parser error: unexpected token ILLEGAL (@)",
        level: ErrorLevel.Lint,
        type: ErrorType.UnexpectedToken,
      },
    ]);
  });

  it("reports stray tokens as advisories in lint mode", () => {
    const parser = new Parser("a = 1\n@\n# old style", { lintMode: true });
    parser.parseProgram();
    assert.deepStrictEqual(parser.errors, []);
    assert.deepStrictEqual(
      parser.advisories.map((d) => [d.message, d.args]),
      [
        ["@", undefined],
        ['unexpected token ILLEGAL_COMMENT (# old style); comments start with "//"', ["ILLEGAL_COMMENT", "# old style"]],
      ],
    );
  });

  it("reports the unexpected token of a malformed var", () => {
    const { errors } = parse("var = 1");
    assert.deepStrictEqual(errors[0], {
      line: 1,
      column: 5,
      endLine: 1,
      endColumn: 6,
      message: "parser error: expected next token to be IDENT, got = instead",
      level: ErrorLevel.Lint,
      type: ErrorType.ExpectDiffToken,
    });
  });

  it("reports unclosed blocks and maps", () => {
    const block = parse("a {\n\tb = 1\n");
    assert.deepStrictEqual(
      block.errors.map((e) => [e.message, e.line, e.column]),
      [["parser error: unclosed block, expected }", 3, 1]],
    );
    const map = parse("m = {[a = 1,");
    assert.strictEqual(map.errors[0].message, "parser error: unclosed map literal, expected ]");
  });

  it("rejects integers beyond the safe range", () => {
    const { errors } = parse("a = 99999999999999999999");
    assert.strictEqual(errors[0].message, 'parser error: could not parse "99999999999999999999" as integer');
  });

  it("requires string arguments for env()", () => {
    const { errors } = parse("a = env(HOME)");
    assert.strictEqual(errors[0].message, "parser error: expected string argument for env()");
  });
});

describe("parseStrict", () => {
  it("returns the tree when there are no errors", () => {
    assert.strictEqual(parseStrict("a = 1").statements.length, 1);
  });

  it("throws ParseError carrying every diagnostic", () => {
    assert.throws(
      () => parseStrict("a = 1\n@"),
      (err: unknown) => {
        assert.ok(err instanceof ParseError);
        assert.strictEqual(err.message, "parser errors: line 2:1: parser error: unexpected token ILLEGAL (@)");
        assert.strictEqual(err.diagnostics.length, 1);
        return true;
      },
    );
  });
});
