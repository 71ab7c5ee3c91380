import assert from "node:assert";
import { describe, it } from "node:test";
import { OutputStyle, defaultFormatOptions, format, formatNode, nodeToString, quoteString } from "./format.js";
import { parse, parseStrict } from "./parser.js";

function fmt(source: string, options: Parameters<typeof format>[1] = {}): string {
  const { root, errors } = parse(source);
  assert.deepStrictEqual(errors, []);
  return format(root, options);
}

const MIXED = "b = 2\na = 1\nsrv {\n\tz = 1\n\ty = 2\n}";

describe("format", () => {
  it("sorts nested blocks only in blockSorted", () => {
    assert.strictEqual(fmt(MIXED), "b = 2\na = 1\n\nsrv {\n\ty = 2\n\tz = 1\n}\n");
  });

  it("sorts every level in allSorted", () => {
    assert.strictEqual(fmt(MIXED, { style: "allSorted" }), "a = 1\nb = 2\n\nsrv {\n\ty = 2\n\tz = 1\n}\n");
  });

  it("keeps source order and no blank lines when streaming", () => {
    assert.strictEqual(fmt(MIXED, { style: "streaming" }), "b = 2\na = 1\nsrv {\n\tz = 1\n\ty = 2\n}\n");
  });

  it("puts everything on one line", () => {
    assert.strictEqual(fmt(MIXED, { style: "singleLine" }), "b = 2; a = 1; srv {z = 1; y = 2}");
  });

  it("can preserve declared order", () => {
    assert.strictEqual(
      fmt(MIXED, { preserveDeclaredOrder: true }),
      "b = 2\na = 1\n\nsrv {\n\tz = 1\n\ty = 2\n}\n",
    );
  });

  it("can leave out blank lines", () => {
    assert.strictEqual(fmt(MIXED, { emitBlankLines: false }), "b = 2\na = 1\nsrv {\n\ty = 2\n\tz = 1\n}\n");
  });

  it("orders imports and variables first, in source order", () => {
    const source = 'b = 1\nvar y = 2\nimport "f.wanf"\nvar x = 3\na = ${x}';
    assert.strictEqual(
      fmt(source, { style: "allSorted" }),
      'import "f.wanf"\nvar y = 2\nvar x = 3\na = ${x}\nb = 1\n',
    );
  });

  it("orders same-named blocks by label", () => {
    const source = 's "b" {\n\tx = 1\n}\ns "a" {\n\tx = 2\n}';
    assert.strictEqual(
      fmt(source, { style: "allSorted" }),
      's "a" {\n\tx = 2\n}\n\ns "b" {\n\tx = 1\n}\n',
    );
  });

  it("drops list trailing commas and always ends map entries with one", () => {
    assert.strictEqual(fmt("a = [1, 2,]"), "a = [\n\t1,\n\t2\n]\n");
    assert.strictEqual(fmt('m = {[x = 1, y = "s"]}'), 'm = {[\n\tx = 1,\n\ty = "s",\n]}\n');
    assert.strictEqual(fmt('m = {[x = 1, y = "s"]}', { style: "singleLine" }), 'm = {[x = 1, y = "s"]}');
    assert.strictEqual(fmt("a = []\nm = {[]}\nb = {}"), "a = []\nm = {[]}\nb = {}\n");
  });

  it("keeps comments in place", () => {
    assert.strictEqual(fmt("// head\na = 1 // tail\n"), "// head\na = 1 // tail\n");
    assert.strictEqual(fmt("s {\n\ta = 1\n\t// end\n}"), "s {\n\ta = 1\n\t// end\n}\n");
    assert.strictEqual(fmt("a = 1\n// bye"), "a = 1\n// bye\n");
    assert.strictEqual(fmt("m = {[\n\ta = 1, // one\n\tb = 2 // two\n]}"), "m = {[\n\ta = 1, // one\n\tb = 2, // two\n]}\n");
  });

  it("separates commented statements at the top level", () => {
    assert.strictEqual(fmt("a = 1\n// c\nb = 2"), "a = 1\n\n// c\nb = 2\n");
    assert.strictEqual(fmt("a = 1\n// c\nb = 2", { style: "streaming" }), "a = 1\n// c\nb = 2\n");
  });

  it("drops comments in single-line style", () => {
    assert.strictEqual(fmt("// head\na = 1 // tail\nb = 2", { style: "singleLine" }), "a = 1; b = 2");
  });

  it("indents nested block literals", () => {
    assert.strictEqual(
      fmt("users = [{ name = 'a'\nage = 1 }]"),
      'users = [\n\t{\n\t\tage = 1\n\t\tname = "a"\n\t}\n]\n',
    );
  });

  it("renders env() and variable references", () => {
    assert.strictEqual(
      fmt('var h = "x"\na = env("HOME", "/tmp")\nb = ${h}'),
      'var h = "x"\na = env("HOME", "/tmp")\nb = ${h}\n',
    );
  });

  it("rewrites multi-line strings with backticks", () => {
    assert.strictEqual(fmt('a = "x\ny"'), "a = `x\ny`\n");
    assert.strictEqual(fmt('a = "x\ny"', { style: "singleLine" }), 'a = "x\\ny"');
    assert.strictEqual(fmt(`a = 'say "hi"'`), `a = 'say "hi"'\n`);
  });

  it("keeps a line comment after a multi-line string on its line", () => {
    assert.strictEqual(fmt("a = `x\ny` // c\nb = 1", { style: "streaming" }), "a = `x\ny` // c\nb = 1\n");
  });

  it("renders an empty document as empty text", () => {
    assert.strictEqual(fmt(""), "");
  });

  const SAMPLE = [
    "// service settings",
    'name = "api"',
    "port = 8080",
    "var base = '/srv'",
    'paths = ["a", "b",]',
    "limits = {[cpu = 2, mem = 512]}",
    'server "b" {',
    "\ttimeout = 1.5s",
    "\thost = env(\"HOST\", 'localhost') // override",
    "\tnested {",
    "\t\tz = true",
    "\t\ty = ${base}",
    "\t}",
    "}",
    'server "a" {',
    "\tport = 1",
    "}",
  ].join("\n");

  const styles: OutputStyle[] = ["blockSorted", "allSorted", "streaming", "singleLine"];
  for (const style of styles) {
    it(`is idempotent in ${style}`, () => {
      const once = fmt(SAMPLE, { style });
      assert.strictEqual(fmt(once, { style }), once);
    });
  }

  it("sorts the same statements identically regardless of input order", () => {
    const shuffled = [
      'server "a" {',
      "\tport = 1",
      "}",
      'paths = ["a", "b"]',
      "limits = {[cpu = 2, mem = 512]}",
      'server "b" {',
      "\tnested {",
      "\t\ty = ${base}",
      "\t\tz = true",
      "\t}",
      "\thost = env(\"HOST\", 'localhost') // override",
      "\ttimeout = 1.5s",
      "}",
      "var base = '/srv'",
      "port = 8080",
      "// service settings",
      'name = "api"',
    ].join("\n");
    assert.strictEqual(fmt(shuffled, { style: "allSorted" }), fmt(SAMPLE, { style: "allSorted" }));
  });
});

describe("formatNode", () => {
  const root = parseStrict('srv "a" {\n\tb = 2\n\ta = [1, 2]\n}');

  it("renders a statement at the given indent", () => {
    assert.strictEqual(
      formatNode(root.statements[0], "\t", defaultFormatOptions),
      '\tsrv "a" {\n\t\ta = [\n\t\t\t1,\n\t\t\t2\n\t\t]\n\t\tb = 2\n\t}',
    );
  });

  it("follows the style it is given", () => {
    assert.strictEqual(
      formatNode(root.statements[0], "\t", { ...defaultFormatOptions, style: "singleLine" }),
      'srv "a" {b = 2; a = [1, 2]}',
    );
  });
});

describe("nodeToString", () => {
  it("renders any node with the default options", () => {
    const root = parseStrict('srv "a" {\n\tb = 2\n\ta = [1, 2]\n}');
    assert.strictEqual(nodeToString(root), 'srv "a" {\n\ta = [\n\t\t1,\n\t\t2\n\t]\n\tb = 2\n}');
    const [block] = root.statements;
    assert.ok(block.type === "block");
    const a = block.body.statements[1];
    assert.ok(a.type === "assign");
    assert.strictEqual(nodeToString(a.value), "[\n\t1,\n\t2\n]");
  });
});

describe("quoteString", () => {
  it("picks a delimiter the text does not contain", () => {
    assert.strictEqual(quoteString("plain", "blockSorted"), '"plain"');
    assert.strictEqual(quoteString('a"b', "blockSorted"), "'a\"b'");
    assert.strictEqual(quoteString("a\"b'c", "blockSorted"), '`a"b\'c`');
    assert.strictEqual(quoteString("a\"b'c`d", "blockSorted"), null);
  });
});
