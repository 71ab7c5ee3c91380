export { Lexer, tokenize } from "./lexer.js";
export { StreamLexer } from "./streamlexer.js";
export { chunkSource, fileSource } from "./source.js";
export type { ByteSource } from "./source.js";
export { Parser, parse, parseStrict } from "./parser.js";
export type { ParseResult, ParserOptions } from "./parser.js";
export { format, formatNode, nodeToString, defaultFormatOptions } from "./format.js";
export type { FormatOptions, OutputStyle } from "./format.js";
export { lint } from "./lint.js";
export type { LintResult } from "./lint.js";
export { Duration } from "./duration.js";
export { t, parseTag } from "./schema.js";
export type { Infer, Schema, StructSchema, WanfValue } from "./schema.js";
export { Decoder, decode, decodeFile } from "./decoder.js";
export type { DecoderOptions } from "./decoder.js";
export { StreamDecoder } from "./streamdecoder.js";
export type { StreamDecoderOptions } from "./streamdecoder.js";
export { Encoder, marshal } from "./encoder.js";
export type { TextSink } from "./encoder.js";
export { run } from "./cli.js";
export type { CliIO } from "./cli.js";
export type { Token, TokenType } from "./token.js";
export { tokenLiteral } from "./ast.js";
export type {
  Root,
  Statement,
  AssignStatement,
  BlockStatement,
  VarStatement,
  ImportStatement,
  Expression,
  Comment,
  Node,
} from "./ast.js";
export { ErrorLevel, ErrorType, formatDiagnostic, diagnosticsToJSON, ParseError, DecodeError, EncodeError } from "./types.js";
export type { Diagnostic, Position } from "./types.js";
