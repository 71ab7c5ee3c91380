import { Comment, Expression, Node, Root, Statement } from "./ast.js";

export type OutputStyle = "blockSorted" | "allSorted" | "streaming" | "singleLine";

export interface FormatOptions {
  /**
   * - `blockSorted`: nested block bodies sorted, top level kept in source order
   * - `allSorted`: sorted at every depth
   * - `streaming`: never sorted
   * - `singleLine`: never sorted, everything on one line
   */
  style: OutputStyle;
  /** Blank line around top-level blocks and commented statements (sorted styles only) */
  emitBlankLines: boolean;
  /** Disable sorting at every depth */
  preserveDeclaredOrder: boolean;
}

export const defaultFormatOptions: FormatOptions = {
  style: "blockSorted",
  emitBlankLines: true,
  preserveDeclaredOrder: false,
};

export function resolveFormatOptions(options: Partial<FormatOptions> = {}): FormatOptions {
  return { ...defaultFormatOptions, ...options };
}

/** Whether statements at `depth` (0 = document) are reordered */
export function sortsAtDepth(options: FormatOptions, depth: number): boolean {
  if (options.preserveDeclaredOrder) {
    return false;
  }
  switch (options.style) {
    case "allSorted":
      return true;
    case "blockSorted":
      return depth > 0;
    default:
      return false;
  }
}

export function blankLinesEnabled(options: FormatOptions): boolean {
  return options.emitBlankLines && (options.style === "blockSorted" || options.style === "allSorted");
}

/**
 * Quote a string value. Embedded newlines get a raw backtick string except in
 * `singleLine`, where they are escaped inside double quotes. Returns null when
 * no delimiter can hold the text, since the lexer has no escapes.
 */
export function quoteString(value: string, style: OutputStyle): string | null {
  let text = value;
  if (value.includes("\n")) {
    if (style === "singleLine") {
      text = value.replaceAll("\n", "\\n");
    } else if (!value.includes("`")) {
      return "`" + value + "`";
    }
  }
  for (const quote of ['"', "'", "`"]) {
    if (!text.includes(quote)) {
      return quote + text + quote;
    }
  }
  return null;
}

/** What statement ordering looks at */
export interface SortKey {
  kind: Statement["type"];
  name: string;
  label?: string;
}

const KIND_RANK: Record<Statement["type"], number> = { import: 0, var: 1, assign: 2, block: 3 };

/**
 * Imports, then variables (both in source order, since a variable may only
 * use earlier ones), then assignments, then blocks, the last two
 * alphabetical. Blocks sharing a name are ordered by label.
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  const rank = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rank !== 0 || a.kind === "import" || a.kind === "var") {
    return rank;
  }
  return compareText(a.name, b.name) || compareText(a.label ?? "", b.label ?? "");
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortKey(stmt: Statement): SortKey {
  switch (stmt.type) {
    case "import":
      return { kind: "import", name: "" };
    case "block":
      return { kind: "block", name: stmt.name.value, label: stmt.label?.value };
    default:
      return { kind: stmt.type, name: stmt.name.value };
  }
}

/** Stable sorted copy, see {@link compareSortKeys} */
export function sortStatements(statements: readonly Statement[]): Statement[] {
  return [...statements].sort((a, b) => compareSortKeys(sortKey(a), sortKey(b)));
}

/** A rendered statement, as {@link joinStatements} needs it */
export interface RenderedStatement {
  text: string;
  isBlock: boolean;
  hasLeadingComments: boolean;
}

/**
 * Join rendered statements: `; ` in single-line style, else one per line,
 * with a blank line at the top level around blocks and before commented
 * statements when the sorted styles ask for it.
 */
export function joinStatements(statements: readonly RenderedStatement[], options: FormatOptions, depth: number): string {
  if (options.style === "singleLine") {
    return statements.map((s) => s.text).join("; ");
  }
  const blankLines = depth === 0 && blankLinesEnabled(options);
  let out = "";
  statements.forEach((stmt, i) => {
    if (i > 0) {
      const prev = statements[i - 1];
      out += blankLines && (prev.isBlock || stmt.isBlock || stmt.hasLeadingComments) ? "\n\n" : "\n";
    }
    out += stmt.text;
  });
  return out;
}

/** Render a document */
export function format(root: Root, options: Partial<FormatOptions> = {}): string {
  const opts = resolveFormatOptions(options);
  const text = formatRoot(root, "", opts, 0);
  return opts.style !== "singleLine" && text.length > 0 ? text + "\n" : text;
}

/** Debug rendering with the default options */
export function nodeToString(node: Node): string {
  return formatNode(node, "", defaultFormatOptions);
}

/** Style-aware rendering of any node at the given indent */
export function formatNode(node: Node, indent: string, options: FormatOptions, depth = 0): string {
  switch (node.type) {
    case "root":
      return formatRoot(node, indent, options, depth);
    case "comment":
      return node.text;
    case "assign":
    case "block":
    case "var":
    case "import":
      return formatStatement(node, indent, options, depth);
    default:
      return formatExpression(node, indent, options, depth);
  }
}

function formatRoot(root: Root, indent: string, options: FormatOptions, depth: number): string {
  const statements = sortsAtDepth(options, depth) ? sortStatements(root.statements) : root.statements;
  const out = joinStatements(
    statements.map((stmt) => ({
      text: formatStatement(stmt, indent, options, depth),
      isBlock: stmt.type === "block",
      hasLeadingComments: stmt.leadingComments.length > 0,
    })),
    options,
    depth,
  );
  if (options.style === "singleLine") {
    return out;
  }
  return out + formatDangling(root.danglingComments, indent, out.length > 0);
}

function formatDangling(comments: Comment[], indent: string, afterContent: boolean): string {
  return comments.map((c, i) => (afterContent || i > 0 ? "\n" : "") + indent + c.text).join("");
}

/**
 * Render one statement. `suffix` goes right after the statement and before
 * its line comment, so a separator is never swallowed by the comment.
 */
function formatStatement(stmt: Statement, indent: string, options: FormatOptions, depth: number, suffix = ""): string {
  const singleLine = options.style === "singleLine";
  let out = "";
  if (!singleLine) {
    for (const comment of stmt.leadingComments) {
      out += indent + comment.text + "\n";
    }
  }
  const lead = singleLine ? "" : indent;
  switch (stmt.type) {
    case "assign":
      out += `${lead}${stmt.name.value} = ${formatExpression(stmt.value, indent, options, depth)}`;
      break;
    case "var":
      out += `${lead}var ${stmt.name.value} = ${formatExpression(stmt.value, indent, options, depth)}`;
      break;
    case "import":
      out += `${lead}import ${formatExpression(stmt.path, indent, options, depth)}`;
      break;
    case "block": {
      out += lead + stmt.name.value;
      if (stmt.label) {
        out += " " + formatExpression(stmt.label, indent, options, depth);
      }
      out += " " + formatBody(stmt.body, indent, options, depth + 1);
      break;
    }
  }
  out += suffix;
  if (!singleLine && stmt.lineComment) {
    out += " " + stmt.lineComment.text;
  }
  return out;
}

/** `{ ... }` for block statements and block literals */
function formatBody(body: Root, indent: string, options: FormatOptions, depth: number): string {
  if (body.statements.length === 0 && (options.style === "singleLine" || body.danglingComments.length === 0)) {
    return "{}";
  }
  if (options.style === "singleLine") {
    return "{" + formatRoot(body, "", options, depth) + "}";
  }
  return "{\n" + formatRoot(body, indent + "\t", options, depth) + "\n" + indent + "}";
}

function formatExpression(expr: Expression, indent: string, options: FormatOptions, depth: number): string {
  const singleLine = options.style === "singleLine";
  switch (expr.type) {
    case "identifier":
      return expr.value;
    case "string":
      return quoteString(expr.value, options.style) ?? '"' + expr.value + '"';
    case "integer":
    case "float":
    case "bool":
    case "duration":
      return expr.token.literal;
    case "varRef":
      return "${" + expr.name + "}";
    case "env": {
      const name = formatExpression(expr.name, indent, options, depth);
      return expr.defaultValue
        ? `env(${name}, ${formatExpression(expr.defaultValue, indent, options, depth)})`
        : `env(${name})`;
    }
    case "list": {
      if (expr.elements.length === 0) {
        return "[]";
      }
      if (singleLine) {
        return "[" + expr.elements.map((el) => formatExpression(el, "", options, depth)).join(", ") + "]";
      }
      const inner = indent + "\t";
      const lines = expr.elements.map((el) => inner + formatExpression(el, inner, options, depth));
      return "[\n" + lines.join(",\n") + "\n" + indent + "]";
    }
    case "map": {
      if (expr.elements.length === 0 && (singleLine || expr.danglingComments.length === 0)) {
        return "{[]}";
      }
      if (singleLine) {
        return "{[" + expr.elements.map((el) => formatStatement(el, "", options, depth)).join(", ") + "]}";
      }
      const inner = indent + "\t";
      let out = "{[\n";
      for (const el of expr.elements) {
        out += formatStatement(el, inner, options, depth, ",") + "\n";
      }
      for (const comment of expr.danglingComments) {
        out += inner + comment.text + "\n";
      }
      return out + indent + "]}";
    }
    case "blockLiteral":
      return formatBody(expr.body, indent, options, depth + 1);
  }
}
