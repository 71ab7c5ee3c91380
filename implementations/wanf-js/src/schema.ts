import { Duration } from "./duration.js";

/** Untyped decoded value, produced for `any` fields */
export type WanfValue = string | number | boolean | Duration | WanfValue[] | { [key: string]: WanfValue };

export interface StringSchema {
  type: "string";
}
export interface IntSchema {
  type: "int";
}
export interface FloatSchema {
  type: "float";
}
export interface BoolSchema {
  type: "bool";
}
export interface DurationSchema {
  type: "duration";
}
export interface AnySchema {
  type: "any";
}
export interface ListSchema<E extends Schema = Schema> {
  type: "list";
  element: E;
}
export interface MapSchema<V extends Schema = Schema> {
  type: "map";
  value: V;
}
export interface OptionalSchema<I extends Schema = Schema> {
  type: "optional";
  inner: I;
}
export interface StructSchema<F extends FieldDefs = FieldDefs> {
  type: "struct";
  fields: F;
}

export type Schema =
  | StringSchema
  | IntSchema
  | FloatSchema
  | BoolSchema
  | DurationSchema
  | AnySchema
  | ListSchema
  | MapSchema
  | OptionalSchema
  | StructSchema;

/** A struct member carrying a tag: `name[,key=field][,omitempty]` */
export interface TaggedField<S extends Schema = Schema> {
  type: "field";
  schema: S;
  tag: string;
}

export type FieldDefs = { [property: string]: Schema | TaggedField };

type FieldSchemaOf<D> = D extends TaggedField<infer S> ? S : D;

/** The value type a schema decodes to */
export type Infer<S> = S extends StringSchema
  ? string
  : S extends IntSchema | FloatSchema
    ? number
    : S extends BoolSchema
      ? boolean
      : S extends DurationSchema
        ? Duration
        : S extends AnySchema
          ? WanfValue | undefined
          : S extends ListSchema<infer E>
            ? Infer<E>[]
            : S extends MapSchema<infer V>
              ? Record<string, Infer<V>>
              : S extends OptionalSchema<infer I>
                ? Infer<I> | undefined
                : S extends StructSchema<infer F>
                  ? { -readonly [K in keyof F]: Infer<FieldSchemaOf<F[K]>> }
                  : never;

/** Schema builders */
export const t = {
  string: (): StringSchema => ({ type: "string" }),
  int: (): IntSchema => ({ type: "int" }),
  float: (): FloatSchema => ({ type: "float" }),
  bool: (): BoolSchema => ({ type: "bool" }),
  duration: (): DurationSchema => ({ type: "duration" }),
  any: (): AnySchema => ({ type: "any" }),
  list: <E extends Schema>(element: E): ListSchema<E> => ({ type: "list", element }),
  map: <V extends Schema>(value: V): MapSchema<V> => ({ type: "map", value }),
  optional: <I extends Schema>(inner: I): OptionalSchema<I> => ({ type: "optional", inner }),
  struct: <F extends FieldDefs>(fields: F): StructSchema<F> => ({ type: "struct", fields }),
  field: <S extends Schema>(schema: S, tag: string): TaggedField<S> => ({ type: "field", schema, tag }),
};

export interface FieldTag {
  /** Display name; the property name when the tag leaves it empty */
  name: string;
  /** Whether the tag supplied the name */
  named: boolean;
  keyField?: string;
  omitEmpty: boolean;
}

export function parseTag(tag: string, property: string): FieldTag {
  const [name, ...options] = tag.split(",");
  const parsed: FieldTag = { name: name || property, named: name !== "", omitEmpty: false };
  for (const option of options) {
    if (option === "omitempty") {
      parsed.omitEmpty = true;
    } else if (option.startsWith("key=")) {
      parsed.keyField = option.slice("key=".length);
    }
  }
  return parsed;
}

export interface FieldInfo {
  property: string;
  name: string;
  /** Name came from a tag; such fields match exactly only */
  named: boolean;
  keyField?: string;
  omitEmpty: boolean;
  /** Declared schema, optional wrapper included */
  schema: Schema;
  /** Rendered as a nested block */
  isBlock: boolean;
  /** Map rendered as one labeled block per entry */
  isLabeledBlockMap: boolean;
}

export interface FieldCatalog {
  fields: FieldInfo[];
  byName: Map<string, FieldInfo>;
}

export function unwrapOptional(schema: Schema): Schema {
  return schema.type === "optional" ? unwrapOptional(schema.inner) : schema;
}

export function isNonEmptyStruct(schema: Schema): boolean {
  const s = unwrapOptional(schema);
  return s.type === "struct" && Object.keys(s.fields).length > 0;
}

const catalogs = new WeakMap<StructSchema, FieldCatalog>();

/** Field table for a struct schema, built once per schema object */
export function fieldCatalog(schema: StructSchema): FieldCatalog {
  const cached = catalogs.get(schema);
  if (cached) {
    return cached;
  }
  const fields: FieldInfo[] = [];
  const byName = new Map<string, FieldInfo>();
  for (const [property, def] of Object.entries(schema.fields)) {
    const fieldSchema = def.type === "field" ? def.schema : def;
    const tag = parseTag(def.type === "field" ? def.tag : "", property);
    const inner = unwrapOptional(fieldSchema);
    const info: FieldInfo = {
      property,
      name: tag.name,
      named: tag.named,
      omitEmpty: tag.omitEmpty,
      schema: fieldSchema,
      isBlock: inner.type === "struct",
      isLabeledBlockMap: inner.type === "map" && tag.keyField === undefined && isNonEmptyStruct(inner.value),
    };
    if (tag.keyField !== undefined) {
      info.keyField = tag.keyField;
    }
    fields.push(info);
    if (!byName.has(info.name)) {
      byName.set(info.name, info);
    }
  }
  const catalog: FieldCatalog = { fields, byName };
  catalogs.set(schema, catalog);
  return catalog;
}

/** Exact name first, then a case-insensitive match on fields without a tag name */
export function lookupField(catalog: FieldCatalog, name: string): FieldInfo | undefined {
  const exact = catalog.byName.get(name);
  if (exact) {
    return exact;
  }
  const lower = name.toLowerCase();
  return catalog.fields.find((f) => !f.named && f.property.toLowerCase() === lower);
}

export function zeroValue(schema: Schema): unknown {
  switch (schema.type) {
    case "string":
      return "";
    case "int":
    case "float":
      return 0;
    case "bool":
      return false;
    case "duration":
      return Duration.zero;
    case "any":
    case "optional":
      return undefined;
    case "list":
      return [];
    case "map":
      return {};
    case "struct": {
      const out: Record<string, unknown> = {};
      for (const field of fieldCatalog(schema).fields) {
        out[field.property] = zeroValue(field.schema);
      }
      return out;
    }
  }
}
