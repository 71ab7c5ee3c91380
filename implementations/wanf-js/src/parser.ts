import {
  AssignStatement,
  BlockLiteral,
  BlockStatement,
  Comment,
  EnvExpression,
  Expression,
  ImportStatement,
  ListLiteral,
  MapLiteral,
  Root,
  Statement,
  StringLiteral,
  VarRef,
  VarStatement,
} from "./ast.js";
import { Lexer } from "./lexer.js";
import { Token, TokenSource, TokenType, byteLength, endLine, tokenName } from "./token.js";
import { Diagnostic, ErrorLevel, ErrorType, ParseError } from "./types.js";

/** Two-token window over a token source */
export class TokenCursor {
  current: Token;
  peeked: Token;

  constructor(private source: TokenSource) {
    this.current = source.nextToken();
    this.peeked = source.nextToken();
  }

  advance(): Token {
    const prev = this.current;
    this.current = this.peeked;
    this.peeked = this.source.nextToken();
    return prev;
  }

  check(...types: TokenType[]): boolean {
    return types.includes(this.current.type);
  }

  checkPeek(...types: TokenType[]): boolean {
    return types.includes(this.peeked.type);
  }
}

export function diagnosticAt(
  token: Token,
  message: string,
  level: ErrorLevel,
  type: ErrorType,
  args?: string[],
): Diagnostic {
  const diagnostic: Diagnostic = {
    line: token.line,
    column: token.column,
    endLine: token.line,
    endColumn: token.column + byteLength(token.literal),
    message,
    level,
    type,
  };
  if (args) {
    diagnostic.args = args;
  }
  return diagnostic;
}

export interface ParserOptions {
  /** Report stray tokens at statement position as advisories and keep going */
  lintMode?: boolean;
}

/**
 * Recursive-descent parser. Fatal errors land in `errors`, advisories in
 * `advisories`; a populated `errors` list means the tree must not be decoded.
 */
export class Parser {
  private cursor: TokenCursor;
  private lintMode: boolean;
  readonly errors: Diagnostic[] = [];
  readonly advisories: Diagnostic[] = [];

  constructor(source: string | Uint8Array | TokenSource, options: ParserOptions = {}) {
    const tokens = typeof source === "string" || source instanceof Uint8Array ? new Lexer(source) : source;
    this.cursor = new TokenCursor(tokens);
    this.lintMode = options.lintMode ?? false;
  }

  private get current(): Token {
    return this.cursor.current;
  }

  private get peeked(): Token {
    return this.cursor.peeked;
  }

  private advance(): Token {
    return this.cursor.advance();
  }

  private check(...types: TokenType[]): boolean {
    return this.cursor.check(...types);
  }

  private checkPeek(...types: TokenType[]): boolean {
    return this.cursor.checkPeek(...types);
  }

  /** Advance onto the peeked token if it has the given type, else record a fatal error */
  private expectPeek(type: TokenType): boolean {
    if (this.checkPeek(type)) {
      this.advance();
      return true;
    }
    this.errorAt(
      this.peeked,
      `expected next token to be ${tokenName(type)}, got ${tokenName(this.peeked.type)} instead`,
      ErrorType.ExpectDiffToken,
    );
    return false;
  }

  private errorAt(token: Token, message: string, type: ErrorType = ErrorType.UnexpectedToken): void {
    this.errors.push(diagnosticAt(token, `parser error: ${message}`, ErrorLevel.Lint, type));
  }

  private advise(token: Token, message: string, level: ErrorLevel, type: ErrorType, args?: string[]): void {
    this.advisories.push(diagnosticAt(token, message, level, type, args));
  }

  parseProgram(): Root {
    const root: Root = { type: "root", statements: [], danglingComments: [] };
    while (!this.check("eof")) {
      const leading = this.parseComments();
      if (this.check("eof")) {
        root.danglingComments.push(...leading);
        break;
      }
      const stmt = this.parseStatement(leading);
      if (stmt) {
        root.statements.push(stmt);
      }
    }
    return root;
  }

  private parseComments(): Comment[] {
    const comments: Comment[] = [];
    while (this.check("comment")) {
      const token = this.advance();
      comments.push({ type: "comment", token, text: token.literal });
    }
    return comments;
  }

  /**
   * Parse one statement, leaving the cursor on the token after it.
   * Returns null for separators and for statements that failed to parse.
   */
  private parseStatement(leading: Comment[] = this.parseComments()): Statement | null {
    if (this.check("eof")) {
      return null;
    }

    let stmt: Statement | null = null;
    let dispatched = true;
    switch (this.current.type) {
      case "semicolon":
        this.advance();
        return null;
      case "var":
        stmt = this.parseVarStatement(leading);
        break;
      case "import":
        stmt = this.parseImportStatement(leading);
        break;
      case "ident":
        if (this.checkPeek("assign")) {
          stmt = this.parseAssignStatement(leading);
        } else if (this.checkPeek("lbrace", "string")) {
          stmt = this.parseBlockStatement(leading);
        } else {
          dispatched = false;
        }
        break;
      default:
        dispatched = false;
    }

    if (!dispatched) {
      this.reportUnexpected(this.current);
      this.advance();
      return null;
    }

    if (stmt && this.checkPeek("comment") && this.peeked.line === endLine(this.current)) {
      this.advance();
      stmt.lineComment = { type: "comment", token: this.current, text: this.current.literal };
    }

    this.advance();
    return stmt;
  }

  private reportUnexpected(token: Token): void {
    const name = tokenName(token.type);
    if (!this.lintMode) {
      this.errorAt(token, `unexpected token ${name} (${token.literal})`);
      return;
    }
    if (token.type === "illegal") {
      this.advise(token, token.literal, ErrorLevel.Lint, ErrorType.UnexpectedToken);
      return;
    }
    const message =
      token.type === "illegalComment"
        ? `unexpected token ${name} (${token.literal}); comments start with "//"`
        : `unexpected token ${name} (${token.literal})`;
    this.advise(token, message, ErrorLevel.Lint, ErrorType.UnexpectedToken, [name, token.literal]);
  }

  private parseAssignStatement(leading: Comment[]): AssignStatement | null {
    const token = this.current;
    this.advance(); // name
    this.advance(); // '='
    const value = this.parseExpression();
    if (!value) {
      return null;
    }
    return {
      type: "assign",
      token,
      name: { type: "identifier", token, value: token.literal },
      value,
      leadingComments: leading,
    };
  }

  private parseBlockStatement(leading: Comment[]): BlockStatement | null {
    const token = this.current;
    let label: StringLiteral | undefined;
    if (this.checkPeek("string")) {
      this.advance();
      label = this.parseStringLiteral();
    }
    if (!this.expectPeek("lbrace")) {
      return null;
    }
    const body = this.parseBlockBody();
    const stmt: BlockStatement = {
      type: "block",
      token,
      name: { type: "identifier", token, value: token.literal },
      body,
      leadingComments: leading,
    };
    if (label) {
      stmt.label = label;
    }
    return stmt;
  }

  /** Enter on '{'; leaves the cursor on the closing '}' (or eof) */
  private parseBlockBody(): Root {
    const body: Root = { type: "root", statements: [], danglingComments: [] };
    this.advance();
    while (!this.check("rbrace", "eof")) {
      const leading = this.parseComments();
      if (this.check("rbrace", "eof")) {
        body.danglingComments.push(...leading);
        break;
      }
      const stmt = this.parseStatement(leading);
      if (stmt) {
        body.statements.push(stmt);
      }
      if (this.check("comma")) {
        this.advise(
          this.current,
          "redundant comma; statements in a block should be separated by newlines",
          ErrorLevel.Fmt,
          ErrorType.RedundantComma,
        );
        this.advance();
      }
    }
    if (this.check("eof")) {
      this.errorAt(this.current, "unclosed block, expected }", ErrorType.ExpectDiffToken);
    }
    return body;
  }

  private parseVarStatement(leading: Comment[]): VarStatement | null {
    const token = this.current;
    if (!this.expectPeek("ident")) {
      return null;
    }
    const nameToken = this.current;
    if (!this.expectPeek("assign")) {
      return null;
    }
    this.advance();
    const value = this.parseExpression();
    if (!value) {
      return null;
    }
    return {
      type: "var",
      token,
      name: { type: "identifier", token: nameToken, value: nameToken.literal },
      value,
      leadingComments: leading,
    };
  }

  private parseImportStatement(leading: Comment[]): ImportStatement | null {
    const token = this.current;
    if (!this.expectPeek("string")) {
      return null;
    }
    return { type: "import", token, path: this.parseStringLiteral(), leadingComments: leading };
  }

  /** Parse the expression starting at the current token, leaving the cursor on its last token */
  private parseExpression(): Expression | null {
    const token = this.current;
    switch (token.type) {
      case "ident":
        if (token.literal === "env" && this.checkPeek("lparen")) {
          return this.parseEnvExpression();
        }
        return { type: "identifier", token, value: token.literal };
      case "int":
        return this.parseIntegerLiteral();
      case "float":
        return this.parseFloatLiteral();
      case "string":
        return this.parseStringLiteral();
      case "bool":
        return { type: "bool", token, value: token.literal === "true" };
      case "duration":
        return { type: "duration", token, value: token.literal };
      case "lbrack":
        return this.parseListLiteral();
      case "lbrace":
        return this.checkPeek("lbrack") ? this.parseMapLiteral() : this.parseBlockLiteral();
      case "dollarLbrace":
        return this.parseVarRef();
      default:
        this.errorAt(token, `expected an expression, got ${tokenName(token.type)} (${token.literal})`);
        return null;
    }
  }

  private parseIntegerLiteral(): Expression | null {
    const token = this.current;
    const value = Number(token.literal);
    if (!Number.isSafeInteger(value)) {
      this.errorAt(token, `could not parse "${token.literal}" as integer`);
      return null;
    }
    return { type: "integer", token, value };
  }

  private parseFloatLiteral(): Expression | null {
    const token = this.current;
    const value = Number(token.literal);
    if (!Number.isFinite(value)) {
      this.errorAt(token, `could not parse "${token.literal}" as float`);
      return null;
    }
    return { type: "float", token, value };
  }

  private parseStringLiteral(): StringLiteral {
    return { type: "string", token: this.current, value: this.current.literal };
  }

  private parseListLiteral(): ListLiteral | null {
    const list: ListLiteral = { type: "list", token: this.current, elements: [], hasTrailingComma: false };
    this.advance();
    if (this.check("rbrack")) {
      return list;
    }
    const first = this.parseExpression();
    if (!first) {
      return null;
    }
    list.elements.push(first);
    while (this.checkPeek("comma")) {
      this.advance();
      const comma = this.current;
      this.advance();
      if (this.check("rbrack")) {
        list.hasTrailingComma = true;
        this.advise(comma, "redundant trailing comma in list literal", ErrorLevel.Fmt, ErrorType.RedundantComma);
        return list;
      }
      const element = this.parseExpression();
      if (!element) {
        return null;
      }
      list.elements.push(element);
    }
    if (!this.expectPeek("rbrack")) {
      return null;
    }
    return list;
  }

  private parseMapLiteral(): MapLiteral | null {
    const map: MapLiteral = { type: "map", token: this.current, elements: [], danglingComments: [] };
    this.advance(); // '{'
    this.advance(); // '['

    while (!this.check("rbrack")) {
      const leading = this.parseComments();
      if (this.check("rbrack")) {
        map.danglingComments.push(...leading);
        break;
      }
      if (this.check("eof")) {
        this.errorAt(this.current, "unclosed map literal, expected ]", ErrorType.ExpectDiffToken);
        return null;
      }
      const start = this.current;
      const errorCount = this.errors.length;
      const stmt = this.parseStatement(leading);
      if (!stmt) {
        if (this.errors.length === errorCount) {
          this.errorAt(start, `invalid map literal element ${tokenName(start.type)} (${start.literal})`);
        }
        return null;
      }
      map.elements.push(stmt);

      if (this.check("comma")) {
        const comma = this.advance();
        if (!stmt.lineComment && this.check("comment") && this.current.line === comma.line) {
          const token = this.advance();
          stmt.lineComment = { type: "comment", token, text: token.literal };
        }
      } else {
        const next = this.current;
        this.advise(
          next,
          `missing comma, auto-inserted before ${tokenName(next.type)}`,
          ErrorLevel.Fmt,
          ErrorType.MissingComma,
          [tokenName(next.type)],
        );
      }
    }

    if (!this.expectPeek("rbrace")) {
      return null;
    }
    return map;
  }

  private parseBlockLiteral(): BlockLiteral {
    const token = this.current;
    return { type: "blockLiteral", token, body: this.parseBlockBody() };
  }

  private parseVarRef(): VarRef | null {
    const token = this.current;
    if (!this.expectPeek("ident")) {
      return null;
    }
    const name = this.current.literal;
    if (!this.expectPeek("rbrace")) {
      return null;
    }
    return { type: "varRef", token, name };
  }

  private parseEnvExpression(): EnvExpression | null {
    const token = this.current;
    if (!this.expectPeek("lparen")) {
      return null;
    }
    this.advance();
    if (!this.check("string")) {
      this.errorAt(this.current, "expected string argument for env()");
      return null;
    }
    const expr: EnvExpression = { type: "env", token, name: this.parseStringLiteral() };
    if (this.checkPeek("comma")) {
      this.advance();
      this.advance();
      if (!this.check("string")) {
        this.errorAt(this.current, "expected string for env() default value");
        return null;
      }
      expr.defaultValue = this.parseStringLiteral();
    }
    if (!this.expectPeek("rparen")) {
      return null;
    }
    return expr;
  }
}

export interface ParseResult {
  root: Root;
  /** Fatal errors; the tree is not trustworthy when non-empty */
  errors: Diagnostic[];
  advisories: Diagnostic[];
}

export function parse(source: string | Uint8Array, options: ParserOptions = {}): ParseResult {
  const parser = new Parser(source, options);
  const root = parser.parseProgram();
  return { root, errors: parser.errors, advisories: parser.advisories };
}

/** Parse and throw a {@link ParseError} on any fatal error */
export function parseStrict(source: string | Uint8Array, file?: string): Root {
  const result = parse(source);
  if (result.errors.length > 0) {
    throw new ParseError(result.errors, file);
  }
  return result.root;
}
