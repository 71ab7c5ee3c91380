export type TokenType =
  | "illegal"
  | "eof"
  | "ident"
  | "int"
  | "float"
  | "string"
  | "bool"
  | "duration"
  | "assign"
  | "comma"
  | "semicolon"
  | "lbrace"
  | "rbrace"
  | "lbrack"
  | "rbrack"
  | "lparen"
  | "rparen"
  | "import"
  | "var"
  | "dollarLbrace"
  | "comment"
  | "illegalComment";

export interface Token {
  readonly type: TokenType;
  /** Decoded literal text; string tokens exclude their quotes */
  readonly literal: string;
  readonly line: number;
  /** 1-based byte column */
  readonly column: number;
}

/** Anything that hands out tokens one at a time until `eof` */
export interface TokenSource {
  nextToken(): Token;
}

/** Names used in diagnostics and their `args` */
const TOKEN_NAMES: Record<TokenType, string> = {
  illegal: "ILLEGAL",
  eof: "EOF",
  ident: "IDENT",
  int: "INT",
  float: "FLOAT",
  string: "STRING",
  bool: "BOOL",
  duration: "DUR",
  assign: "=",
  comma: ",",
  semicolon: ";",
  lbrace: "{",
  rbrace: "}",
  lbrack: "[",
  rbrack: "]",
  lparen: "(",
  rparen: ")",
  import: "IMPORT",
  var: "VAR",
  dollarLbrace: "${",
  comment: "COMMENT",
  illegalComment: "ILLEGAL_COMMENT",
};

export function tokenName(type: TokenType): string {
  return TOKEN_NAMES[type];
}

const KEYWORDS = new Map<string, TokenType>([
  ["import", "import"],
  ["var", "var"],
  ["true", "bool"],
  ["false", "bool"],
]);

export function lookupIdentifier(ident: string): TokenType {
  return KEYWORDS.get(ident) ?? "ident";
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

/** UTF-8 byte length, the unit columns are counted in */
/** Line of the token's last character; raw strings may span lines */
export function endLine(token: Token): number {
  return token.line + token.literal.split("\n").length - 1;
}

export function byteLength(text: string): number {
  return encoder.encode(text).length;
}

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode a complete literal; invalid sequences become U+FFFD */
export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

// Byte classes shared by both lexers

export const CH_TAB = 0x09;
export const CH_NEWLINE = 0x0a;
export const CH_RETURN = 0x0d;
export const CH_SPACE = 0x20;

export function isWhitespace(ch: number): boolean {
  return ch === CH_SPACE || ch === CH_TAB || ch === CH_RETURN || ch === CH_NEWLINE;
}

export function isIdentifierStart(ch: number): boolean {
  return (ch >= 0x61 && ch <= 0x7a) || (ch >= 0x41 && ch <= 0x5a) || ch === 0x5f;
}

export function isDigit(ch: number): boolean {
  return ch >= 0x30 && ch <= 0x39;
}

export function isIdentifierChar(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Single-character punctuation */
export const PUNCTUATION = new Map<number, TokenType>([
  [0x3d, "assign"],
  [0x2c, "comma"],
  [0x3b, "semicolon"],
  [0x7b, "lbrace"],
  [0x7d, "rbrace"],
  [0x5b, "lbrack"],
  [0x5d, "rbrack"],
  [0x28, "lparen"],
  [0x29, "rparen"],
]);

export const UNCLOSED_BLOCK_COMMENT = "unclosed block comment";
