export { TypeKind, t, typeName, isOptional } from "./types.js";
export type {
  TypeDescriptor,
  StringType,
  IntegerType,
  NumberType,
  BooleanType,
  OptionalType,
  ListType,
  MapType,
  RecordType,
  RecordFields,
  Infer,
} from "./types.js";
export { toJsonSchema } from "./to-json-schema.js";
export { decode, encode, conforms } from "./codec.js";
export type { JsonValue } from "./codec.js";
