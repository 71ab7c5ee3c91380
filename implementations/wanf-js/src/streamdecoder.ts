import * as fs from "node:fs";
import { Duration } from "./duration.js";
import { TokenCursor } from "./parser.js";
import { ByteSource, fileSource } from "./source.js";
import {
  FieldInfo,
  Infer,
  StructSchema,
  WanfValue,
  fieldCatalog,
  lookupField,
  unwrapOptional,
} from "./schema.js";
import {
  Struct,
  convertField,
  convertValue,
  getEntry,
  isObjectValue,
  isRecord,
  setEntry,
  structZero,
} from "./decoder.js";
import { StreamLexer } from "./streamlexer.js";
import { Token, TokenType, tokenName } from "./token.js";
import { DecodeError, Position } from "./types.js";

export interface StreamDecoderOptions {
  /** Variables visible to `env()`; defaults to `process.env` */
  env?: Record<string, string | undefined>;
}

function positionOf(token: Token): Position {
  return { line: token.line, column: token.column };
}

/**
 * Decodes straight from tokens without building a syntax tree. `var`,
 * `import` and `${...}` need the whole document and are rejected.
 */
export class StreamDecoder {
  private cursor: TokenCursor;
  private env: Record<string, string | undefined>;

  constructor(source: ByteSource, options: StreamDecoderOptions = {}) {
    this.cursor = new TokenCursor(new StreamLexer(source));
    this.env = options.env ?? process.env;
  }

  /** Decode a file read in chunks from disk */
  static decodeFile<S extends StructSchema>(file: string, schema: S, options: StreamDecoderOptions = {}): Infer<S> {
    let fd: number;
    try {
      fd = fs.openSync(file, "r");
    } catch (err) {
      throw new DecodeError(`failed to open "${file}"`, undefined, { cause: err });
    }
    try {
      return new StreamDecoder(fileSource(fd), options).decode(schema);
    } finally {
      fs.closeSync(fd);
    }
  }

  decode<S extends StructSchema>(schema: S, target?: Infer<S>): Infer<S> {
    return this.decodeInto(schema, target) as Infer<S>;
  }

  private decodeInto(schema: StructSchema, target: unknown): unknown {
    const out = isRecord(target) ? target : structZero(schema);
    this.decodeBody(schema, out, "eof");
    return out;
  }

  private get current(): Token {
    return this.cursor.current;
  }

  private advance(): Token {
    return this.cursor.advance();
  }

  private check(...types: TokenType[]): boolean {
    return this.cursor.check(...types);
  }

  private expect(type: TokenType): Token {
    if (!this.check(type)) {
      throw this.unexpected(`expected ${tokenName(type)}`);
    }
    return this.advance();
  }

  private unexpected(context: string): DecodeError {
    const token = this.current;
    return new DecodeError(
      `${context}, got ${tokenName(token.type)} (${token.literal})`,
      positionOf(token),
    );
  }

  private unsupported(construct: string): DecodeError {
    return new DecodeError(`${construct} are not supported in stream decoding mode`, positionOf(this.current));
  }

  private skipSeparators(): void {
    while (this.check("comment", "semicolon", "comma")) {
      this.advance();
    }
  }

  /** Decode statements up to `closing`, which is consumed */
  private decodeBody(schema: StructSchema, target: Struct, closing: "rbrace" | "eof"): void {
    const catalog = fieldCatalog(schema);
    for (;;) {
      this.skipSeparators();
      if (this.check(closing)) {
        this.advance();
        return;
      }
      const name = this.statementName();
      const field = lookupField(catalog, name.literal);
      if (this.check("assign")) {
        this.advance();
        const value = this.parseValue();
        if (field) {
          target[field.property] = convertField(field, value, positionOf(name));
        }
        continue;
      }
      const label = this.check("string") ? this.advance().literal : undefined;
      this.expect("lbrace");
      if (field) {
        this.decodeBlock(name, label, field, target);
      } else {
        this.skipBlock();
      }
    }
  }

  /** Consume the identifier opening a statement, rejecting what stream mode cannot handle */
  private statementName(): Token {
    switch (this.current.type) {
      case "var":
        throw this.unsupported("var statements");
      case "import":
        throw this.unsupported("import statements");
      case "ident": {
        const name = this.advance();
        if (!this.check("assign", "lbrace", "string")) {
          throw this.unexpected(`expected = or { after ${name.literal}`);
        }
        return name;
      }
      default:
        throw this.unexpected("expected a statement");
    }
  }

  /** Enter after '{'; consumes the closing '}' */
  private decodeBlock(name: Token, label: string | undefined, field: FieldInfo, target: Struct): void {
    const schema = unwrapOptional(field.schema);
    const position = positionOf(name);
    switch (schema.type) {
      case "struct": {
        const existing = target[field.property];
        const nested = isRecord(existing) ? existing : structZero(schema);
        this.decodeBody(schema, nested, "rbrace");
        target[field.property] = nested;
        return;
      }
      case "map": {
        const existing = target[field.property];
        const map = isRecord(existing) ? existing : {};
        const valueSchema = unwrapOptional(schema.value);
        if (valueSchema.type === "struct") {
          if (label === undefined) {
            throw new DecodeError(`block "${name.literal}" is for a map, but is missing a label`, position);
          }
          const entry = structZero(valueSchema);
          this.decodeBody(valueSchema, entry, "rbrace");
          setEntry<unknown>(map, label, entry);
        } else {
          for (const [key, value] of Object.entries(this.parseBody())) {
            setEntry(map, key, convertValue(value, schema.value, position));
          }
        }
        target[field.property] = map;
        return;
      }
      case "any":
        target[field.property] = this.parseBody();
        return;
      default:
        throw new DecodeError(`block "${name.literal}" cannot be decoded into a ${schema.type} field`, position);
    }
  }

  /** Skip a block body by brace matching; enter after '{' */
  private skipBlock(): void {
    let depth = 1;
    while (depth > 0) {
      const token = this.advance();
      if (token.type === "lbrace") {
        depth++;
      } else if (token.type === "rbrace") {
        depth--;
      } else if (token.type === "eof") {
        throw new DecodeError("unexpected end of input inside block", positionOf(token));
      }
    }
  }

  /** Untyped block body; enter after '{', consumes '}' */
  private parseBody(): Record<string, WanfValue> {
    const out: Record<string, WanfValue> = {};
    for (;;) {
      this.skipSeparators();
      if (this.check("rbrace")) {
        this.advance();
        return out;
      }
      const name = this.statementName().literal;
      if (this.check("assign")) {
        this.advance();
        setEntry(out, name, this.parseValue());
        continue;
      }
      const label = this.check("string") ? this.advance().literal : undefined;
      this.expect("lbrace");
      const nested = this.parseBody();
      if (label === undefined) {
        setEntry(out, name, nested);
      } else {
        const group = getEntry(out, name);
        const labeled = isObjectValue(group) ? group : {};
        setEntry(labeled, label, nested);
        setEntry(out, name, labeled);
      }
    }
  }

  private parseValue(): WanfValue {
    const token = this.advance();
    switch (token.type) {
      case "int": {
        const value = Number(token.literal);
        if (!Number.isSafeInteger(value)) {
          throw new DecodeError(`could not parse "${token.literal}" as integer`, positionOf(token));
        }
        return value;
      }
      case "float":
        return Number(token.literal);
      case "string":
        return token.literal;
      case "bool":
        return token.literal === "true";
      case "duration":
        try {
          return Duration.parse(token.literal);
        } catch (err) {
          throw new DecodeError(`invalid duration "${token.literal}"`, positionOf(token), { cause: err });
        }
      case "lbrack":
        return this.parseList();
      case "lbrace":
        if (this.check("lbrack")) {
          this.advance();
          return this.parseMap();
        }
        return this.parseBody();
      case "dollarLbrace":
        throw new DecodeError("variable references are not supported in stream decoding mode", positionOf(token));
      case "ident":
        if (token.literal === "env" && this.check("lparen")) {
          return this.parseEnv(token);
        }
        throw new DecodeError(`unexpected identifier "${token.literal}"; quote it to use it as a string`, positionOf(token));
      default:
        throw new DecodeError(
          `expected a value, got ${tokenName(token.type)} (${token.literal})`,
          positionOf(token),
        );
    }
  }

  /** Enter after '['; consumes ']' */
  private parseList(): WanfValue[] {
    const items: WanfValue[] = [];
    while (!this.check("rbrack")) {
      items.push(this.parseValue());
      if (this.check("comma")) {
        this.advance();
      } else if (!this.check("rbrack")) {
        throw this.unexpected("expected , or ] in list");
      }
    }
    this.advance();
    return items;
  }

  /** Enter after '{['; consumes ']}'. Missing commas between entries are tolerated */
  private parseMap(): Record<string, WanfValue> {
    const out: Record<string, WanfValue> = {};
    for (;;) {
      this.skipSeparators();
      if (this.check("rbrack")) {
        this.advance();
        this.expect("rbrace");
        return out;
      }
      const key = this.expect("ident");
      this.expect("assign");
      setEntry(out, key.literal, this.parseValue());
    }
  }

  private parseEnv(token: Token): string {
    this.expect("lparen");
    const name = this.expect("string").literal;
    let fallback: string | undefined;
    if (this.check("comma")) {
      this.advance();
      fallback = this.expect("string").literal;
    }
    this.expect("rparen");
    const value = this.env[name];
    if (value !== undefined) {
      return value;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new DecodeError(`environment variable "${name}" not set`, positionOf(token));
  }
}
