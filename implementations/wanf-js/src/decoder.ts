import * as fs from "node:fs";
import * as path from "node:path";
import { Expression, Root, Statement, positionOf } from "./ast.js";
import { Duration } from "./duration.js";
import { parse } from "./parser.js";
import { Environment, resolveImports, resolveVariables } from "./resolve.js";
import {
  FieldInfo,
  Infer,
  Schema,
  StructSchema,
  WanfValue,
  fieldCatalog,
  lookupField,
  unwrapOptional,
  zeroValue,
} from "./schema.js";
import { DecodeError, ParseError, Position } from "./types.js";

export interface DecoderOptions {
  /** Directory imports resolve against; defaults to the working directory */
  basePath?: string;
  /** Variables visible to `env()`; defaults to `process.env` */
  env?: Record<string, string | undefined>;
}

export type Struct = Record<string, unknown>;

export function isRecord(value: unknown): value is Struct {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Duration);
}

/** Define an own entry; assigning `__proto__` would replace the prototype instead */
export function setEntry<V>(record: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Own entries only, so inherited members never read as map entries */
export function getEntry<V>(record: Record<string, V>, key: string): V | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Narrow an evaluated value to a nested map */
export function isObjectValue(value: WanfValue | undefined): value is { [key: string]: WanfValue } {
  return isRecord(value);
}

function describe(value: WanfValue | undefined): string {
  if (value === undefined) {
    return "nothing";
  }
  if (typeof value === "string") {
    return `string "${value}"`;
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? `integer ${value}` : `float ${value}`;
  }
  if (typeof value === "boolean") {
    return `bool ${value}`;
  }
  if (value instanceof Duration) {
    return `duration ${value.toString()}`;
  }
  return Array.isArray(value) ? "list" : "object";
}

const TRUE_STRINGS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_STRINGS = new Set(["0", "f", "F", "FALSE", "false", "False"]);
const RADIX_PREFIXES = new Map([
  ["0x", 16],
  ["0o", 8],
  ["0b", 2],
]);
const DIGITS = new Map([
  [16, /^[0-9a-f]+(_[0-9a-f]+)*$/i],
  [10, /^\d+(_\d+)*$/],
  [8, /^[0-7]+(_[0-7]+)*$/],
  [2, /^[01]+(_[01]+)*$/],
]);
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Integer text with an optional sign, a `0x`, `0o` or `0b` prefix or a
 * leading `0` for octal, and `_` between digits. Undefined unless the result
 * is a safe integer.
 */
export function parseIntegerText(text: string): number | undefined {
  const negative = text.startsWith("-");
  let digits = negative || text.startsWith("+") ? text.slice(1) : text;
  let radix = RADIX_PREFIXES.get(digits.slice(0, 2).toLowerCase());
  if (radix !== undefined) {
    digits = digits.slice(2).replace(/^_/, "");
  } else if (digits.length > 1 && digits.startsWith("0")) {
    radix = 8;
    digits = digits.slice(1).replace(/^_/, "");
  } else {
    radix = 10;
  }
  if (!DIGITS.get(radix)?.test(digits)) {
    return undefined;
  }
  const n = Number.parseInt(digits.replaceAll("_", ""), radix);
  if (!Number.isSafeInteger(n)) {
    return undefined;
  }
  return negative ? -n : n;
}

/**
 * Convert an evaluated value to the shape `schema` describes. Strings are
 * accepted for numbers, booleans and durations so `env()` values can feed
 * typed fields.
 */
export function convertValue(value: WanfValue | undefined, schema: Schema, position?: Position): unknown {
  const mismatch = (what: string) => new DecodeError(`cannot use ${describe(value)} as ${what}`, position);

  switch (schema.type) {
    case "optional":
      return value === undefined ? undefined : convertValue(value, schema.inner, position);
    case "any":
      return value;
    case "string":
      if (typeof value === "string") {
        return value;
      }
      throw mismatch("string");
    case "int":
      if (typeof value === "number" && Number.isInteger(value)) {
        return value;
      }
      if (typeof value === "string") {
        const n = parseIntegerText(value.trim());
        if (n !== undefined) {
          return n;
        }
      }
      throw mismatch("integer");
    case "float":
      if (typeof value === "number") {
        return value;
      }
      if (typeof value === "string" && FLOAT.test(value.trim())) {
        return Number(value.trim());
      }
      throw mismatch("float");
    case "bool":
      if (typeof value === "boolean") {
        return value;
      }
      if (typeof value === "string" && TRUE_STRINGS.has(value)) {
        return true;
      }
      if (typeof value === "string" && FALSE_STRINGS.has(value)) {
        return false;
      }
      throw mismatch("bool");
    case "duration":
      if (value instanceof Duration) {
        return value;
      }
      if (typeof value === "string") {
        try {
          return Duration.parse(value.trim());
        } catch (err) {
          throw new DecodeError(`cannot use ${describe(value)} as duration`, position, { cause: err });
        }
      }
      throw mismatch("duration");
    case "list":
      if (Array.isArray(value)) {
        return value.map((item) => convertValue(item, schema.element, position));
      }
      throw mismatch("list");
    case "map":
      if (isObjectValue(value)) {
        const out: Struct = {};
        for (const [key, item] of Object.entries(value)) {
          setEntry(out, key, convertValue(item, schema.value, position));
        }
        return out;
      }
      throw mismatch("map");
    case "struct":
      if (isObjectValue(value)) {
        const target = zeroValue(schema);
        if (!isRecord(target)) {
          throw mismatch("object");
        }
        return assignRecord(value, schema, target, position);
      }
      throw mismatch("object");
  }
}

/** Copy record entries onto matching struct fields; unknown keys are ignored */
export function assignRecord(
  source: Record<string, WanfValue>,
  schema: StructSchema,
  target: Struct,
  position?: Position,
): Struct {
  const catalog = fieldCatalog(schema);
  for (const [key, value] of Object.entries(source)) {
    const field = lookupField(catalog, key);
    if (field) {
      target[field.property] = convertField(field, value, position);
    }
  }
  return target;
}

/** Convert a value for a field, folding lists into maps for `key=` fields */
export function convertField(field: FieldInfo, value: WanfValue, position?: Position): unknown {
  if (field.keyField === undefined) {
    return convertValue(value, field.schema, position);
  }
  const keyField = field.keyField;
  const mapSchema = unwrapOptional(field.schema);
  if (mapSchema.type !== "map") {
    throw new DecodeError(`field "${field.name}" has a key tag but is not a map`, position);
  }
  if (!Array.isArray(value)) {
    throw new DecodeError("value for map field with 'key' tag must be a list", position);
  }
  const out: Struct = {};
  for (const item of value) {
    if (!isObjectValue(item)) {
      throw new DecodeError("items in list for keyed map must be objects", position);
    }
    const key = getEntry(item, keyField);
    if (key === undefined) {
      throw new DecodeError(`key field "${keyField}" not found in list item`, position);
    }
    if (typeof key !== "string") {
      throw new DecodeError(`key field "${keyField}" must be a string`, position);
    }
    setEntry(out, key, convertValue(item, mapSchema.value, position));
  }
  return out;
}

/**
 * Evaluates expressions against one document's variables and the process
 * environment, and maps statements onto struct schemas.
 */
class Evaluator {
  readonly vars: Environment = new Map();

  constructor(private env: Record<string, string | undefined>) {}

  evaluate(expr: Expression): WanfValue {
    switch (expr.type) {
      case "integer":
      case "float":
      case "string":
      case "bool":
        return expr.value;
      case "duration":
        try {
          return Duration.parse(expr.value);
        } catch (err) {
          throw new DecodeError(`invalid duration "${expr.value}"`, positionOf(expr), { cause: err });
        }
      case "varRef": {
        const value = this.vars.get(expr.name);
        if (value === undefined) {
          throw new DecodeError(`variable "${expr.name}" is not defined`, positionOf(expr));
        }
        return value;
      }
      case "env": {
        const value = this.env[expr.name.value];
        if (value !== undefined) {
          return value;
        }
        if (expr.defaultValue) {
          return expr.defaultValue.value;
        }
        throw new DecodeError(`environment variable "${expr.name.value}" not set`, positionOf(expr));
      }
      case "list":
        return expr.elements.map((el) => this.evaluate(el));
      case "blockLiteral":
        return this.bodyToRecord(expr.body);
      case "map": {
        const out: Record<string, WanfValue> = {};
        for (const el of expr.elements) {
          if (el.type !== "assign") {
            throw new DecodeError("map literal elements must be key = value assignments", positionOf(el));
          }
          setEntry(out, el.name.value, this.evaluate(el.value));
        }
        return out;
      }
      case "identifier":
        throw new DecodeError(`unexpected identifier "${expr.value}"; quote it to use it as a string`, positionOf(expr));
    }
  }

  /** Untyped view of a block body: assignments and nested blocks by name, labeled blocks by name then label */
  bodyToRecord(body: Root): Record<string, WanfValue> {
    const out: Record<string, WanfValue> = {};
    for (const stmt of body.statements) {
      if (stmt.type === "assign") {
        setEntry(out, stmt.name.value, this.evaluate(stmt.value));
      } else if (stmt.type === "block") {
        const nested = this.bodyToRecord(stmt.body);
        if (stmt.label) {
          const group = getEntry(out, stmt.name.value);
          const labeled = isObjectValue(group) ? group : {};
          setEntry(labeled, stmt.label.value, nested);
          setEntry(out, stmt.name.value, labeled);
        } else {
          setEntry(out, stmt.name.value, nested);
        }
      }
    }
    return out;
  }

  decodeStatements(statements: readonly Statement[], schema: StructSchema, target: Struct): void {
    const catalog = fieldCatalog(schema);
    for (const stmt of statements) {
      if (stmt.type !== "assign" && stmt.type !== "block") {
        continue;
      }
      const field = lookupField(catalog, stmt.name.value);
      if (!field) {
        continue;
      }
      if (stmt.type === "assign") {
        target[field.property] = convertField(field, this.evaluate(stmt.value), positionOf(stmt));
      } else {
        this.decodeBlock(stmt.name.value, stmt.label?.value, stmt.body, field, target, positionOf(stmt));
      }
    }
  }

  private decodeBlock(
    name: string,
    label: string | undefined,
    body: Root,
    field: FieldInfo,
    target: Struct,
    position: Position,
  ): void {
    const schema = unwrapOptional(field.schema);
    switch (schema.type) {
      case "struct": {
        const existing = target[field.property];
        const nested = isRecord(existing) ? existing : structZero(schema);
        this.decodeStatements(body.statements, schema, nested);
        target[field.property] = nested;
        return;
      }
      case "map": {
        const existing = target[field.property];
        const map = isRecord(existing) ? existing : {};
        const valueSchema = unwrapOptional(schema.value);
        if (valueSchema.type === "struct") {
          if (label === undefined) {
            throw new DecodeError(`block "${name}" is for a map, but is missing a label`, position);
          }
          const entry = structZero(valueSchema);
          this.decodeStatements(body.statements, valueSchema, entry);
          setEntry<unknown>(map, label, entry);
        } else {
          for (const stmt of body.statements) {
            if (stmt.type === "assign") {
              setEntry(map, stmt.name.value, convertValue(this.evaluate(stmt.value), schema.value, positionOf(stmt)));
            }
          }
        }
        target[field.property] = map;
        return;
      }
      case "any":
        target[field.property] = this.bodyToRecord(body);
        return;
      default:
        throw new DecodeError(`block "${name}" cannot be decoded into a ${schema.type} field`, position);
    }
  }
}

export function structZero(schema: StructSchema): Struct {
  const zero = zeroValue(schema);
  return isRecord(zero) ? zero : {};
}

/**
 * Decoder for one document: parses it, inlines its imports and evaluates its
 * variables up front, then maps it onto any number of schemas.
 */
export class Decoder {
  private statements: Statement[];
  private evaluator: Evaluator;

  constructor(source: string | Uint8Array, options: DecoderOptions = {}, processed = new Set<string>()) {
    const result = parse(source);
    if (result.errors.length > 0) {
      throw new ParseError(result.errors);
    }
    const basePath = path.resolve(options.basePath ?? ".");
    this.statements = resolveImports(result.root.statements, basePath, processed);
    const evaluator = new Evaluator(options.env ?? process.env);
    resolveVariables(this.statements, (expr) => evaluator.evaluate(expr), evaluator.vars);
    this.evaluator = evaluator;
  }

  /** Decode into `target` (mutated in place) or into a fresh zero value */
  decode<S extends StructSchema>(schema: S, target?: Infer<S>): Infer<S> {
    return this.decodeInto(schema, target) as Infer<S>;
  }

  private decodeInto(schema: StructSchema, target: unknown): unknown {
    const out = isRecord(target) ? target : structZero(schema);
    this.evaluator.decodeStatements(this.statements, schema, out);
    return out;
  }
}

export function decode<S extends StructSchema>(source: string | Uint8Array, schema: S, options: DecoderOptions = {}): Infer<S> {
  return new Decoder(source, options).decode(schema);
}

/** Decode a file; its imports resolve against its own directory */
export function decodeFile<S extends StructSchema>(file: string, schema: S, options: DecoderOptions = {}): Infer<S> {
  const absolute = path.resolve(file);
  let source: Buffer;
  try {
    source = fs.readFileSync(absolute);
  } catch (err) {
    throw new DecodeError(`failed to read "${file}"`, undefined, { cause: err });
  }
  const processed = new Set([absolute]);
  return new Decoder(source, { ...options, basePath: path.dirname(absolute) }, processed).decode(schema);
}
