/** 1-based line and byte column in source */
export interface Position {
  line: number;
  column: number;
}

/** Diagnostic severity, as sent over the wire */
export const ErrorLevel = {
  /** Error-grade finding */
  Lint: 0,
  /** Style finding that `fmt` resolves */
  Fmt: 1,
} as const;
export type ErrorLevel = (typeof ErrorLevel)[keyof typeof ErrorLevel];

/** Diagnostic category, as sent over the wire */
export const ErrorType = {
  Unknown: 0,
  UnexpectedToken: 1,
  RedundantComma: 2,
  RedundantLabel: 3,
  UnusedVariable: 4,
  ExpectDiffToken: 5,
  MissingComma: 6,
} as const;
export type ErrorType = (typeof ErrorType)[keyof typeof ErrorType];

/** A positioned finding produced by the parser or the lint analyzer */
export interface Diagnostic {
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  message: string;
  level: ErrorLevel;
  type: ErrorType;
  args?: string[];
}

export function formatDiagnostic(d: Diagnostic): string {
  return `line ${d.line}:${d.column}: ${d.message}`;
}

/**
 * Serialize diagnostics in the shape editor clients consume.
 * Field order and the integer encodings of `level` and `type` are fixed.
 */
export function diagnosticsToJSON(diagnostics: readonly Diagnostic[]): string {
  const records = diagnostics.map((d) => {
    const record: Diagnostic = {
      line: d.line,
      column: d.column,
      endLine: d.endLine,
      endColumn: d.endColumn,
      message: d.message,
      level: d.level,
      type: d.type,
    };
    if (d.args && d.args.length > 0) {
      record.args = [...d.args];
    }
    return record;
  });
  return JSON.stringify(records, null, 2);
}

/** Fatal syntax errors; `diagnostics` holds one entry per offending token */
export class ParseError extends Error {
  constructor(
    public diagnostics: Diagnostic[],
    public file?: string,
  ) {
    const detail = diagnostics.map(formatDiagnostic).join("; ");
    super(file ? `parser errors in imported file ${file}: ${detail}` : `parser errors: ${detail}`);
    this.name = "ParseError";
  }
}

/** A value could not be mapped onto the target schema */
export class DecodeError extends Error {
  constructor(
    message: string,
    public position?: Position,
    options?: { cause?: unknown },
  ) {
    super(position ? `line ${position.line}:${position.column}: ${message}` : message, options);
    this.name = "DecodeError";
  }
}

/** A value cannot be written in the configuration syntax */
export class EncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}
