/**
 * Type descriptors: the type language commands use to declare parameters and
 * return values.
 *
 * A descriptor is plain data. The `t` namespace builds them, and `Infer<T>`
 * gives the TypeScript type of the values a descriptor describes:
 *
 * ```ts
 * const Point = t.record({
 *   name: "Point",
 *   description: "A 2D point",
 *   fields: { x: t.number(), y: t.number() },
 * });
 * type Point = Infer<typeof Point>; // { x: number; y: number }
 * ```
 */

// ---------------------------------------------------------------------------
// TypeKind
// ---------------------------------------------------------------------------

/** Discriminator tags for TypeDescriptor. */
export const TypeKind = {
  STRING: "string",
  INTEGER: "integer",
  NUMBER: "number",
  BOOLEAN: "boolean",
  OPTIONAL: "optional",
  LIST: "list",
  MAP: "map",
  RECORD: "record",
} as const satisfies Record<string, string>;

export type TypeKind = (typeof TypeKind)[keyof typeof TypeKind];

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export interface StringType {
  readonly kind: typeof TypeKind.STRING;
}

export interface IntegerType {
  readonly kind: typeof TypeKind.INTEGER;
}

export interface NumberType {
  readonly kind: typeof TypeKind.NUMBER;
}

export interface BooleanType {
  readonly kind: typeof TypeKind.BOOLEAN;
}

/** A value that may be absent. Wraps exactly one non-optional descriptor. */
export interface OptionalType<T extends TypeDescriptor> {
  readonly kind: typeof TypeKind.OPTIONAL;
  readonly inner: T;
}

export interface ListType<T extends TypeDescriptor> {
  readonly kind: typeof TypeKind.LIST;
  readonly items: T;
}

/** A string-keyed map. Any other key descriptor is rejected at translation. */
export interface MapType<K extends TypeDescriptor, V extends TypeDescriptor> {
  readonly kind: typeof TypeKind.MAP;
  readonly key: K;
  readonly values: V;
}

/** Named fields of a record, in declaration order. */
export type RecordFields = { readonly [field: string]: TypeDescriptor };

/** A named structure. Nested records are shared by name in JSON Schema. */
export interface RecordType<F extends RecordFields> {
  readonly kind: typeof TypeKind.RECORD;
  readonly name: string;
  readonly description?: string;
  readonly fields: F;
}

/** Discriminated union of all descriptors. */
export type TypeDescriptor =
  | StringType
  | IntegerType
  | NumberType
  | BooleanType
  | OptionalType<TypeDescriptor>
  | ListType<TypeDescriptor>
  | MapType<TypeDescriptor, TypeDescriptor>
  | RecordType<RecordFields>;

// ---------------------------------------------------------------------------
// Infer
// ---------------------------------------------------------------------------

/** The TypeScript type of values described by `T`. */
export type Infer<T extends TypeDescriptor> = T extends StringType
  ? string
  : T extends IntegerType | NumberType
    ? number
    : T extends BooleanType
      ? boolean
      : T extends OptionalType<infer I>
        ? Infer<I> | undefined
        : T extends ListType<infer I>
          ? Infer<I>[]
          : T extends MapType<TypeDescriptor, infer V>
            ? Record<string, Infer<V>>
            : T extends RecordType<infer F>
              ? { [K in keyof F]: Infer<F[K]> }
              : never;

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

const STRING: StringType = { kind: TypeKind.STRING };
const INTEGER: IntegerType = { kind: TypeKind.INTEGER };
const NUMBER: NumberType = { kind: TypeKind.NUMBER };
const BOOLEAN: BooleanType = { kind: TypeKind.BOOLEAN };

export const t = {
  string: (): StringType => STRING,
  integer: (): IntegerType => INTEGER,
  number: (): NumberType => NUMBER,
  boolean: (): BooleanType => BOOLEAN,

  optional: <T extends TypeDescriptor>(inner: T): OptionalType<T> => ({
    kind: TypeKind.OPTIONAL,
    inner,
  }),

  list: <T extends TypeDescriptor>(items: T): ListType<T> => ({
    kind: TypeKind.LIST,
    items,
  }),

  map: <K extends TypeDescriptor, V extends TypeDescriptor>(
    key: K,
    values: V,
  ): MapType<K, V> => ({
    kind: TypeKind.MAP,
    key,
    values,
  }),

  record: <F extends RecordFields>(definition: {
    name: string;
    description?: string;
    fields: F;
  }): RecordType<F> => ({
    kind: TypeKind.RECORD,
    name: definition.name,
    description: definition.description,
    fields: definition.fields,
  }),
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Human-readable name of a descriptor, used in error messages.
 * `list<integer>`, `map<string, Point>`, `optional<string>`.
 */
export function typeName(type: TypeDescriptor): string {
  switch (type.kind) {
    case TypeKind.STRING:
    case TypeKind.INTEGER:
    case TypeKind.NUMBER:
    case TypeKind.BOOLEAN:
      return type.kind;
    case TypeKind.OPTIONAL:
      return `optional<${typeName(type.inner)}>`;
    case TypeKind.LIST:
      return `list<${typeName(type.items)}>`;
    case TypeKind.MAP:
      return `map<${typeName(type.key)}, ${typeName(type.values)}>`;
    case TypeKind.RECORD:
      return type.name;
    default:
      return unknownKind(type);
  }
}

/**
 * The `kind` of a value that fell through an exhaustive switch. Descriptors
 * assembled outside the `t` builders (plain objects, JSON tables) can carry
 * kinds this module does not know.
 */
export function unknownKind(value: never): string {
  const candidate: unknown = value;
  if (candidate != null && typeof candidate === "object" && "kind" in candidate) {
    return String(candidate.kind);
  }
  return typeof candidate;
}

/** True for an `optional<...>` descriptor. */
export function isOptional(
  type: TypeDescriptor,
): type is OptionalType<TypeDescriptor> {
  return type.kind === TypeKind.OPTIONAL;
}
