import { isDurationSuffixStart, isTwoByteUnitStart } from "./lexer.js";
import { ByteReader, ByteSource } from "./source.js";
import {
  CH_NEWLINE,
  CH_RETURN,
  PUNCTUATION,
  Token,
  TokenSource,
  TokenType,
  UNCLOSED_BLOCK_COMMENT,
  decodeText,
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  lookupIdentifier,
} from "./token.js";

const EOF = -1;

/** Growable byte buffer that literals are rebuilt into */
class LiteralBuffer {
  private bytes = new Uint8Array(64);
  private length = 0;

  reset(): void {
    this.length = 0;
  }

  push(byte: number): void {
    if (this.length === this.bytes.length) {
      const grown = new Uint8Array(this.bytes.length * 2);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.bytes[this.length++] = byte;
  }

  /** Decoded only once the literal is complete, so split UTF-8 sequences survive */
  text(): string {
    return decodeText(this.bytes.subarray(0, this.length));
  }
}

/**
 * Tokenizer over an incremental byte source. Source bytes are not retained,
 * so every literal is copied out as it is read. Produces the same tokens as
 * {@link Lexer} for the same bytes.
 */
export class StreamLexer implements TokenSource {
  private reader: ByteReader;
  private literal = new LiteralBuffer();
  private ch = EOF;
  private line = 1;
  private column = 0;

  constructor(source: ByteSource) {
    this.reader = new ByteReader(source);
    this.readChar();
  }

  private readChar(): void {
    this.ch = this.reader.readByte();
    this.column++;
  }

  private advance(): void {
    if (this.ch === CH_NEWLINE) {
      this.line++;
      this.column = 0;
    }
    this.readChar();
  }

  /** Append ch to the literal and move past it */
  private take(): void {
    this.literal.push(this.ch);
    this.advance();
  }

  private peekChar(): number {
    return this.reader.peekByte();
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

    this.literal.reset();
    switch (ch) {
      case 0x23: // #
        while (this.ch !== CH_NEWLINE && this.ch !== CH_RETURN && this.ch !== EOF) {
          this.take();
        }
        return token("illegalComment", this.literal.text());
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
        this.readString(ch);
        return token("string", this.literal.text());
      case 0x2f: // /
        if (this.peekChar() === 0x2f) {
          while (this.ch !== CH_NEWLINE && this.ch !== EOF) {
            this.take();
          }
          return token("comment", this.literal.text());
        }
        if (this.peekChar() === 0x2a) {
          return this.readBlockComment(line, column)
            ? token("comment", this.literal.text())
            : token("illegal", UNCLOSED_BLOCK_COMMENT);
        }
        this.advance();
        return token("illegal", "/");
    }

    if (isIdentifierStart(ch)) {
      while (isIdentifierChar(this.ch)) {
        this.take();
      }
      const literal = this.literal.text();
      return token(lookupIdentifier(literal), literal);
    }

    if (isDigit(ch)) {
      let isFloat = false;
      while (isDigit(this.ch) || (this.ch === 0x2e && !isFloat)) {
        if (this.ch === 0x2e) {
          isFloat = true;
        }
        this.take();
      }
      if (isDurationSuffixStart(this.ch, this.peekChar())) {
        if (isTwoByteUnitStart(this.ch) && this.peekChar() === 0x73) {
          this.take();
        }
        this.take();
        return token("duration", this.literal.text());
      }
      return token(isFloat ? "float" : "int", this.literal.text());
    }

    this.take();
    return token("illegal", this.literal.text());
  }

  private readString(quote: number): void {
    this.advance();
    while (this.ch !== quote && this.ch !== EOF) {
      this.take();
    }
    if (this.ch === quote) {
      this.advance();
    }
  }

  private readBlockComment(startLine: number, startColumn: number): boolean {
    this.take(); // '/'
    this.take(); // '*'
    for (;;) {
      if (this.ch === EOF) {
        this.line = startLine;
        this.column = startColumn;
        return false;
      }
      if (this.ch === 0x2a && this.peekChar() === 0x2f) {
        this.take();
        this.take();
        return true;
      }
      this.take();
    }
  }
}
