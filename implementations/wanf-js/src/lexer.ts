import {
  CH_NEWLINE,
  CH_RETURN,
  PUNCTUATION,
  Token,
  TokenSource,
  TokenType,
  UNCLOSED_BLOCK_COMMENT,
  decodeText,
  encodeText,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  lookupIdentifier,
} from "./token.js";

const EOF = -1;

/** Tokenizer over a complete in-memory buffer; literals are sliced from it */
export class Lexer implements TokenSource {
  private input: Uint8Array;
  private position = 0; // index of ch
  private readPosition = 0;
  private ch = EOF;
  private line = 1;
  private column = 0;

  constructor(source: string | Uint8Array) {
    this.input = typeof source === "string" ? encodeText(source) : source;
    this.readChar();
  }

  private readChar(): void {
    this.ch = this.readPosition < this.input.length ? this.input[this.readPosition] : EOF;
    this.position = this.readPosition;
    this.readPosition++;
    this.column++;
  }

  /** Move past ch, keeping line and column in step */
  private advance(): void {
    if (this.ch === CH_NEWLINE) {
      this.line++;
      this.column = 0;
    }
    this.readChar();
  }

  private peekChar(): number {
    return this.readPosition < this.input.length ? this.input[this.readPosition] : EOF;
  }

  private slice(start: number, end: number): string {
    return decodeText(this.input.subarray(start, end));
  }

  nextToken(): Token {
    while (isWhitespace(this.ch)) {
      this.advance();
    }

    const line = this.line;
    const column = this.column;
    const ch = this.ch;
    const token = (type: TokenType, literal: string): Token => ({ type, literal, line, column });

    if (ch === EOF) {
      return token("eof", "");
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation) {
      this.advance();
      return token(punctuation, String.fromCharCode(ch));
    }

    switch (ch) {
      case 0x23: // #
        return token("illegalComment", this.readUntilEndOfLine());
      case 0x24: // $
        if (this.peekChar() === 0x7b) {
          this.advance();
          this.advance();
          return token("dollarLbrace", "${");
        }
        this.advance();
        return token("illegal", "$");
      case 0x22: // "
      case 0x27: // '
      case 0x60: // `
        return token("string", this.readString());
      case 0x2f: // /
        if (this.peekChar() === 0x2f) {
          return token("comment", this.readLineComment());
        }
        if (this.peekChar() === 0x2a) {
          const comment = this.readBlockComment(line, column);
          return comment === null ? token("illegal", UNCLOSED_BLOCK_COMMENT) : token("comment", comment);
        }
        this.advance();
        return token("illegal", "/");
    }

    if (isIdentifierStart(ch)) {
      const literal = this.readIdentifier();
      return token(lookupIdentifier(literal), literal);
    }

    if (isDigit(ch)) {
      const start = this.position;
      const isFloat = this.readNumber();
      if (this.atDurationSuffix()) {
        this.readDurationSuffix();
        return token("duration", this.slice(start, this.position));
      }
      return token(isFloat ? "float" : "int", this.slice(start, this.position));
    }

    const start = this.position;
    this.advance();
    return token("illegal", this.slice(start, this.position));
  }

  private readUntilEndOfLine(): string {
    const start = this.position;
    while (this.ch !== CH_NEWLINE && this.ch !== CH_RETURN && this.ch !== EOF) {
      this.advance();
    }
    return this.slice(start, this.position);
  }

  private readLineComment(): string {
    const start = this.position;
    while (this.ch !== CH_NEWLINE && this.ch !== EOF) {
      this.advance();
    }
    return this.slice(start, this.position);
  }

  /** Returns null, with line and column rewound to the comment start, when unclosed */
  private readBlockComment(startLine: number, startColumn: number): string | null {
    const start = this.position;
    this.advance(); // '/'
    this.advance(); // '*'
    for (;;) {
      if (this.ch === EOF) {
        this.line = startLine;
        this.column = startColumn;
        return null;
      }
      if (this.ch === 0x2a && this.peekChar() === 0x2f) {
        this.advance();
        this.advance();
        return this.slice(start, this.position);
      }
      this.advance();
    }
  }

  private readString(): string {
    const quote = this.ch;
    this.advance();
    const start = this.position;
    while (this.ch !== quote && this.ch !== EOF) {
      this.advance();
    }
    const literal = this.slice(start, this.position);
    if (this.ch === quote) {
      this.advance();
    }
    return literal;
  }

  private readIdentifier(): string {
    const start = this.position;
    while (isIdentifierChar(this.ch)) {
      this.advance();
    }
    return this.slice(start, this.position);
  }

  /** Digits with at most one '.'; returns whether a '.' was taken */
  private readNumber(): boolean {
    let isFloat = false;
    while (isDigit(this.ch) || (this.ch === 0x2e && !isFloat)) {
      if (this.ch === 0x2e) {
        isFloat = true;
      }
      this.advance();
    }
    return isFloat;
  }

  private atDurationSuffix(): boolean {
    return isDurationSuffixStart(this.ch, this.peekChar());
  }

  private readDurationSuffix(): void {
    if (isTwoByteUnitStart(this.ch) && this.peekChar() === 0x73) {
      this.advance();
    }
    this.advance();
  }
}

/** s, m, h, or the first byte of ms, us, ns */
export function isDurationSuffixStart(ch: number, next: number): boolean {
  if (ch === 0x73 || ch === 0x6d || ch === 0x68) {
    return true;
  }
  return (ch === 0x75 || ch === 0x6e) && next === 0x73;
}

export function isTwoByteUnitStart(ch: number): boolean {
  return ch === 0x6d || ch === 0x75 || ch === 0x6e;
}

/** Lex a whole source into tokens, `eof` included */
export function tokenize(source: string | Uint8Array): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (;;) {
    const tok = lexer.nextToken();
    tokens.push(tok);
    if (tok.type === "eof") {
      return tokens;
    }
  }
}
