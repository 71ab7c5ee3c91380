import { isRecord } from "./decoder.js";
import { Duration } from "./duration.js";
import {
  FormatOptions,
  RenderedStatement,
  SortKey,
  compareSortKeys,
  joinStatements,
  quoteString,
  resolveFormatOptions,
  sortsAtDepth,
} from "./format.js";
import {
  FieldInfo,
  Infer,
  Schema,
  StructSchema,
  fieldCatalog,
  lookupField,
  unwrapOptional,
} from "./schema.js";
import { lookupIdentifier } from "./token.js";
import { EncodeError } from "./types.js";

/** Anything text can be written to, e.g. a Node writable stream */
export interface TextSink {
  write(chunk: string): unknown;
}

interface Entry extends RenderedStatement {
  key: SortKey;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function checkName(name: string): string {
  if (!IDENTIFIER.test(name) || lookupIdentifier(name) !== "ident") {
    throw new EncodeError(`"${name}" cannot be written as a key: it is not a plain identifier`);
  }
  return name;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Decimal digits without exponent notation */
function plainDigits(n: number): string {
  const text = String(n);
  const match = /^(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }
  const [, whole, fraction = "", exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) {
    return "0." + "0".repeat(-point) + digits;
  }
  if (point >= digits.length) {
    return digits + "0".repeat(point - digits.length);
  }
  return digits.slice(0, point) + "." + digits.slice(point);
}

/** Whether a value counts as empty for `omitempty` */
export function isZero(schema: Schema, value: unknown): boolean {
  if (value === undefined) {
    return true;
  }
  switch (schema.type) {
    case "optional":
      return false;
    case "string":
      return value === "";
    case "int":
    case "float":
      return value === 0;
    case "bool":
      return value === false;
    case "duration":
      return value instanceof Duration && value.isZero();
    case "list":
      return Array.isArray(value) && value.length === 0;
    case "map":
      return isRecord(value) && Object.keys(value).length === 0;
    case "struct": {
      if (!isRecord(value)) {
        return false;
      }
      return fieldCatalog(schema).fields.every((field) => isZero(field.schema, value[field.property]));
    }
    case "any":
      return false;
  }
}

/**
 * Writes schema-typed values as configuration text, laid out exactly as
 * the formatter would lay out the same statements.
 */
export class Encoder {
  private options: FormatOptions;

  constructor(
    private sink: TextSink,
    options: Partial<FormatOptions> = {},
  ) {
    this.options = resolveFormatOptions(options);
  }

  encode<S extends StructSchema>(schema: S, value: Infer<S>): void {
    this.sink.write(this.render(schema, value));
  }

  /** Document text for a struct value */
  render(schema: StructSchema, value: unknown): string {
    const text = joinStatements(this.structEntries(schema, value, "", 0), this.options, 0);
    return this.options.style !== "singleLine" && text.length > 0 ? text + "\n" : text;
  }

  private get singleLine(): boolean {
    return this.options.style === "singleLine";
  }

  private lead(indent: string): string {
    return this.singleLine ? "" : indent;
  }

  private structEntries(schema: StructSchema, value: unknown, indent: string, depth: number): Entry[] {
    if (!isRecord(value)) {
      throw new EncodeError("expected an object for a struct value");
    }
    const entries: Entry[] = [];
    for (const field of fieldCatalog(schema).fields) {
      const fieldValue = value[field.property];
      if (fieldValue === undefined || (field.omitEmpty && isZero(field.schema, fieldValue))) {
        continue;
      }
      entries.push(...this.fieldEntries(field, fieldValue, indent, depth));
    }
    if (sortsAtDepth(this.options, depth)) {
      entries.sort((a, b) => compareSortKeys(a.key, b.key));
    }
    return entries;
  }

  private fieldEntries(field: FieldInfo, value: unknown, indent: string, depth: number): Entry[] {
    const name = checkName(field.name);
    const schema = unwrapOptional(field.schema);

    if (schema.type === "struct") {
      return [this.blockEntry(name, undefined, this.structEntries(schema, value, indent + "\t", depth + 1), indent)];
    }
    if (schema.type !== "map") {
      return [this.assignEntry(name, this.value(schema, value, indent, depth), indent)];
    }

    if (!isRecord(value)) {
      throw new EncodeError(`expected an object for map field "${name}"`);
    }
    const keys = Object.keys(value).sort(compareText);
    if (keys.length === 0) {
      return [];
    }
    const valueSchema = unwrapOptional(schema.value);
    if (field.isLabeledBlockMap && valueSchema.type === "struct") {
      return keys.map((key) =>
        this.blockEntry(name, key, this.structEntries(valueSchema, value[key], indent + "\t", depth + 1), indent),
      );
    }
    if (field.keyField !== undefined) {
      if (valueSchema.type !== "struct") {
        throw new EncodeError(`map field "${name}" with a key tag must hold structs`);
      }
      const keyField = field.keyField;
      const items = keys.map((key) => this.keyedItem(valueSchema, keyField, key, value[key], indent + "\t", depth));
      return [this.assignEntry(name, this.listText(items, indent), indent)];
    }
    return [this.assignEntry(name, this.mapText(keys, (key, inner) => this.value(schema.value, value[key], inner, depth), indent), indent)];
  }

  /** A block literal for one entry of a `key=` map, carrying its key */
  private keyedItem(schema: StructSchema, keyField: string, key: string, value: unknown, indent: string, depth: number): string {
    if (!isRecord(value)) {
      throw new EncodeError(`expected an object for map entry "${key}"`);
    }
    const keyInfo = lookupField(fieldCatalog(schema), keyField);
    if (keyInfo) {
      const keyType = unwrapOptional(keyInfo.schema).type;
      if (keyType !== "string") {
        throw new EncodeError(`key field "${keyField}" must be a string, not ${keyType}`);
      }
      return this.bodyText(this.structEntries(schema, { ...value, [keyInfo.property]: key }, indent + "\t", depth + 1), indent);
    }
    const entries = this.structEntries(schema, value, indent + "\t", depth + 1);
    entries.push(this.assignEntry(checkName(keyField), this.quote(key), indent + "\t"));
    if (sortsAtDepth(this.options, depth + 1)) {
      entries.sort((a, b) => compareSortKeys(a.key, b.key));
    }
    return this.bodyText(entries, indent);
  }

  private assignEntry(name: string, valueText: string, indent: string): Entry {
    return {
      key: { kind: "assign", name },
      text: `${this.lead(indent)}${name} = ${valueText}`,
      isBlock: false,
      hasLeadingComments: false,
    };
  }

  private blockEntry(name: string, label: string | undefined, body: Entry[], indent: string): Entry {
    const labelText = label === undefined ? "" : " " + this.quote(label);
    return {
      key: { kind: "block", name, label },
      text: `${this.lead(indent)}${name}${labelText} ${this.bodyText(body, indent)}`,
      isBlock: true,
      hasLeadingComments: false,
    };
  }

  /** `{ ... }`; entries were rendered one indent level deeper, at depth + 1 */
  private bodyText(entries: Entry[], indent: string): string {
    if (entries.length === 0) {
      return "{}";
    }
    // depth only matters for blank lines, which nested bodies never get
    const joined = joinStatements(entries, this.options, 1);
    return this.singleLine ? "{" + joined + "}" : "{\n" + joined + "\n" + indent + "}";
  }

  private listText(items: string[], indent: string): string {
    if (items.length === 0) {
      return "[]";
    }
    if (this.singleLine) {
      return "[" + items.join(", ") + "]";
    }
    const inner = indent + "\t";
    return "[\n" + items.map((item) => inner + item).join(",\n") + "\n" + indent + "]";
  }

  /** `{[ k = v, ]}` with keys in the given order */
  private mapText(keys: string[], render: (key: string, indent: string) => string, indent: string): string {
    if (keys.length === 0) {
      return "{[]}";
    }
    if (this.singleLine) {
      return "{[" + keys.map((key) => `${checkName(key)} = ${render(key, "")}`).join(", ") + "]}";
    }
    const inner = indent + "\t";
    let out = "{[\n";
    for (const key of keys) {
      out += `${inner}${checkName(key)} = ${render(key, inner)},\n`;
    }
    return out + indent + "]}";
  }

  private quote(text: string): string {
    const quoted = quoteString(text, this.options.style);
    if (quoted === null) {
      throw new EncodeError("string contains every quote character and cannot be written");
    }
    return quoted;
  }

  private number(n: number, integer: boolean): string {
    if (!Number.isFinite(n)) {
      throw new EncodeError(`${n} cannot be written as a number`);
    }
    if (integer && !Number.isSafeInteger(n)) {
      throw new EncodeError(`${n} is not a safe integer`);
    }
    let text = plainDigits(Math.abs(n));
    if (Number.isInteger(n) && !Number.isSafeInteger(n)) {
      text += ".0";
    }
    // the grammar has no signed literals; a quoted value converts back on decode
    return n < 0 ? this.quote("-" + text) : text;
  }

  /** Text of a value expression; `depth` is that of the statement holding it */
  private value(schema: Schema, value: unknown, indent: string, depth: number): string {
    const mismatch = (what: string) => new EncodeError(`expected ${what}, got ${typeof value}`);

    switch (schema.type) {
      case "optional":
        if (value === undefined) {
          throw new EncodeError("undefined cannot be written inside a list or map");
        }
        return this.value(schema.inner, value, indent, depth);
      case "string":
        if (typeof value !== "string") {
          throw mismatch("a string");
        }
        return this.quote(value);
      case "int":
      case "float":
        if (typeof value !== "number") {
          throw mismatch("a number");
        }
        return this.number(value, schema.type === "int");
      case "bool":
        if (typeof value !== "boolean") {
          throw mismatch("a boolean");
        }
        return String(value);
      case "duration":
        if (!(value instanceof Duration)) {
          throw mismatch("a Duration");
        }
        return value.nanoseconds < 0n ? this.quote(value.toString()) : value.toString();
      case "list": {
        if (!Array.isArray(value)) {
          throw mismatch("an array");
        }
        const inner = this.singleLine ? "" : indent + "\t";
        const items: unknown[] = value;
        return this.listText(
          items.map((item) => this.value(schema.element, item, inner, depth)),
          indent,
        );
      }
      case "map": {
        if (!isRecord(value)) {
          throw mismatch("an object");
        }
        const keys = Object.keys(value).sort(compareText);
        return this.mapText(keys, (key, inner) => this.value(schema.value, value[key], inner, depth), indent);
      }
      case "struct":
        return this.bodyText(this.structEntries(schema, value, indent + "\t", depth + 1), indent);
      case "any":
        return this.anyValue(value, indent, depth);
    }
  }

  private anyValue(value: unknown, indent: string, depth: number): string {
    if (typeof value === "string") {
      return this.quote(value);
    }
    if (typeof value === "number") {
      return this.number(value, false);
    }
    if (typeof value === "boolean") {
      return String(value);
    }
    if (value instanceof Duration) {
      return this.value({ type: "duration" }, value, indent, depth);
    }
    if (Array.isArray(value)) {
      const inner = this.singleLine ? "" : indent + "\t";
      const items: unknown[] = value;
      return this.listText(
        items.map((item) => this.anyValue(item, inner, depth)),
        indent,
      );
    }
    if (isRecord(value)) {
      const keys = Object.keys(value).sort(compareText);
      return this.mapText(keys, (key, inner) => this.anyValue(value[key], inner, depth), indent);
    }
    throw new EncodeError(`${typeof value} cannot be written`);
  }
}

/** Encode a struct value to text */
export function marshal<S extends StructSchema>(schema: S, value: Infer<S>, options: Partial<FormatOptions> = {}): string {
  let out = "";
  new Encoder({ write: (chunk: string) => (out += chunk) }, options).encode(schema, value);
  return out;
}
