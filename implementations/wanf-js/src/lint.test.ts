import assert from "node:assert";
import { describe, it } from "node:test";
import { format } from "./format.js";
import { lint } from "./lint.js";
import { ErrorLevel, ErrorType, diagnosticsToJSON } from "./types.js";

describe("lint", () => {
  it("reports unused variables at their names", () => {
    const result = lint("var a = 1\nvar b = 2\nx = ${a}");
    assert.strictEqual(result.fatal, false);
    assert.deepStrictEqual(result.diagnostics, [
      {
        line: 2,
        column: 5,
        endLine: 2,
        endColumn: 6,
        message: 'variable "b" is declared but not used',
        level: ErrorLevel.Lint,
        type: ErrorType.UnusedVariable,
        args: ["b"],
      },
    ]);
  });

  it("counts interpolation inside strings as a use", () => {
    const result = lint('var host = "h"\nvar port = "1"\nurl = "http://${host}/"\nhome = env("X", "${port}")');
    assert.deepStrictEqual(result.diagnostics, []);
  });

  it("drops a label from a block defined once", () => {
    const result = lint('srv "main" {\n\tport = 80\n} // only one');
    assert.deepStrictEqual(result.diagnostics, [
      {
        line: 1,
        column: 1,
        endLine: 1,
        endColumn: 4,
        message: 'block "srv" is defined only once, the label "main" is redundant',
        level: ErrorLevel.Fmt,
        type: ErrorType.RedundantLabel,
        args: ["srv", "main"],
      },
    ]);
    assert.strictEqual(format(result.root), "srv {\n\tport = 80\n} // only one\n");
  });

  it("keeps labels on blocks that repeat", () => {
    const result = lint('srv "a" {\n\tport = 1\n}\nsrv "b" {\n\tport = 2\n}');
    assert.deepStrictEqual(result.diagnostics, []);
  });

  it("checks nested blocks too", () => {
    const result = lint('outer {\n\tinner "x" {\n\t\ta = 1\n\t}\n}');
    assert.deepStrictEqual(
      result.diagnostics.map((d) => [d.line, d.column, d.type]),
      [[2, 2, ErrorType.RedundantLabel]],
    );
  });

  it("puts parser advisories before analysis findings", () => {
    const result = lint("var unused = 1\nl = [1, 2,]");
    assert.deepStrictEqual(
      result.diagnostics.map((d) => d.type),
      [ErrorType.RedundantComma, ErrorType.UnusedVariable],
    );
  });

  it("returns fatal errors without analysis", () => {
    const result = lint("var a = 1\nb = ");
    assert.strictEqual(result.fatal, true);
    assert.deepStrictEqual(result.diagnostics, [
      {
        line: 2,
        column: 5,
        endLine: 2,
        endColumn: 5,
        message: "parser error: expected an expression, got EOF ()",
        level: ErrorLevel.Lint,
        type: ErrorType.UnexpectedToken,
      },
    ]);
  });
});

describe("diagnosticsToJSON", () => {
  it("writes the wire format", () => {
    const { diagnostics } = lint("var a = 1\nvar b = 2\nx = ${a}\nl = [1,]");
    assert.strictEqual(
      diagnosticsToJSON(diagnostics),
      [
        "[",
        "  {",
        '    "line": 4,',
        '    "column": 7,',
        '    "endLine": 4,',
        '    "endColumn": 8,',
        '    "message": "redundant trailing comma in list literal",',
        '    "level": 1,',
        '    "type": 2',
        "  },",
        "  {",
        '    "line": 2,',
        '    "column": 5,',
        '    "endLine": 2,',
        '    "endColumn": 6,',
        '    "message": "variable \\"b\\" is declared but not used",',
        '    "level": 0,',
        '    "type": 4,',
        '    "args": [',
        '      "b"',
        "    ]",
        "  }",
        "]",
      ].join("\n"),
    );
  });

  it("writes an empty list", () => {
    assert.strictEqual(diagnosticsToJSON([]), "[]");
  });
});
