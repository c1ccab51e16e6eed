/**
 * Decode argument text into typed values, and encode return values into
 * JSON-compatible data.
 *
 * Decoding is permissive at the edges the model tends to get wrong: numbers
 * and booleans may arrive as strings, a `string` parameter may arrive
 * unquoted, and list or record elements may arrive as JSON text.
 */

import { CodecError, SchemaError } from "../errors.js";
import { TypeKind, typeName, unknownKind } from "./types.js";
import type { TypeDescriptor } from "./types.js";

/** A value `JSON.stringify` writes without loss. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const INTEGER_TEXT = /^[+-]?\d+$/;

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function join(path: string, segment: string): string {
  return path ? `${path}.${segment}` : segment;
}

function mismatch(type: TypeDescriptor, value: unknown, path: string): CodecError {
  const where = path ? ` at ${path}` : "";
  return new CodecError(
    `Expected ${typeName(type)}${where}, got ${describe(value)}`,
    { path },
  );
}

/** Containers may arrive re-serialized as JSON text. */
function unwrapText(value: unknown, type: TypeDescriptor, path: string): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new CodecError(
      `Expected ${typeName(type)}${path ? ` at ${path}` : ""}, got text that is not valid JSON`,
      { path, cause: error },
    );
  }
}

function decodeValue(value: unknown, type: TypeDescriptor, path: string): unknown {
  switch (type.kind) {
    case TypeKind.STRING:
      if (typeof value === "string") return value;
      if (typeof value === "number" || typeof value === "boolean") {
        return String(value);
      }
      throw mismatch(type, value, path);

    case TypeKind.INTEGER:
      if (typeof value === "number" && Number.isInteger(value)) return value;
      if (typeof value === "string" && INTEGER_TEXT.test(value.trim())) {
        return Number(value.trim());
      }
      throw mismatch(type, value, path);

    case TypeKind.NUMBER:
      if (typeof value === "number" && Number.isFinite(value)) return value;
      if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        if (Number.isFinite(parsed)) return parsed;
      }
      throw mismatch(type, value, path);

    case TypeKind.BOOLEAN:
      if (typeof value === "boolean") return value;
      if (value === "true") return true;
      if (value === "false") return false;
      throw mismatch(type, value, path);

    case TypeKind.OPTIONAL:
      if (value === null || value === undefined) return undefined;
      return decodeValue(value, type.inner, path);

    case TypeKind.LIST: {
      const list = unwrapText(value, type, path);
      if (!Array.isArray(list)) throw mismatch(type, list, path);
      return list.map((item, index) =>
        decodeValue(item, type.items, `${path}[${index}]`),
      );
    }

    case TypeKind.MAP: {
      const map = unwrapText(value, type, path);
      if (!isPlainObject(map)) throw mismatch(type, map, path);
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(map)) {
        result[key] = decodeValue(item, type.values, join(path, key));
      }
      return result;
    }

    case TypeKind.RECORD: {
      const record = unwrapText(value, type, path);
      if (!isPlainObject(record)) throw mismatch(type, record, path);
      const result: Record<string, unknown> = {};
      for (const [field, fieldType] of Object.entries(type.fields)) {
        const fieldPath = join(path, field);
        const item = record[field];
        if (item === undefined && fieldType.kind !== TypeKind.OPTIONAL) {
          throw new CodecError(
            `Missing required field ${fieldPath} of ${type.name}`,
            { path: fieldPath },
          );
        }
        result[field] = decodeValue(item, fieldType, fieldPath);
      }
      return result;
    }

    default:
      throw new SchemaError(`Cannot decode unsupported type: ${unknownKind(type)}`);
  }
}

function matches(value: unknown, type: TypeDescriptor): boolean {
  switch (type.kind) {
    case TypeKind.STRING:
      return typeof value === "string";
    case TypeKind.INTEGER:
      return typeof value === "number" && Number.isInteger(value);
    case TypeKind.NUMBER:
      return typeof value === "number" && Number.isFinite(value);
    case TypeKind.BOOLEAN:
      return typeof value === "boolean";
    case TypeKind.OPTIONAL:
      return value === undefined || matches(value, type.inner);
    case TypeKind.LIST:
      return Array.isArray(value) && value.every((item) => matches(item, type.items));
    case TypeKind.MAP:
      return (
        isPlainObject(value) &&
        Object.values(value).every((item) => matches(item, type.values))
      );
    case TypeKind.RECORD: {
      if (!isPlainObject(value)) return false;
      const record = value;
      return Object.entries(type.fields).every(([field, fieldType]) =>
        matches(record[field], fieldType),
      );
    }
    default:
      return false;
  }
}

function encodeValue(value: unknown, type: TypeDescriptor, path: string): JsonValue {
  if (value === undefined || value === null) {
    return null;
  }

  switch (type.kind) {
    case TypeKind.STRING:
    case TypeKind.INTEGER:
    case TypeKind.NUMBER:
    case TypeKind.BOOLEAN:
      if (
        (typeof value === "string" || typeof value === "number" || typeof value === "boolean") &&
        matches(value, type)
      ) {
        return value;
      }
      throw mismatch(type, value, path);

    case TypeKind.OPTIONAL:
      return encodeValue(value, type.inner, path);

    case TypeKind.LIST:
      if (!Array.isArray(value)) throw mismatch(type, value, path);
      return value.map((item, index) =>
        encodeValue(item, type.items, `${path}[${index}]`),
      );

    case TypeKind.MAP: {
      if (!isPlainObject(value)) throw mismatch(type, value, path);
      const result: Record<string, JsonValue> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = encodeValue(item, type.values, join(path, key));
      }
      return result;
    }

    case TypeKind.RECORD: {
      if (!isPlainObject(value)) throw mismatch(type, value, path);
      const result: Record<string, JsonValue> = {};
      for (const [field, fieldType] of Object.entries(type.fields)) {
        result[field] = encodeValue(value[field], fieldType, join(path, field));
      }
      return result;
    }

    default:
      throw new SchemaError(`Cannot encode unsupported type: ${unknownKind(type)}`);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** True when `value` is a value of `type`. Extra record fields are allowed. */
export function conforms(value: unknown, type: TypeDescriptor): boolean {
  return matches(value, type);
}

/**
 * Decode one argument's JSON text against `type`.
 *
 * - `optional<T>`: `"null"` or empty text is `undefined`.
 * - `string`: a quoted JSON string is unquoted; any other text is returned
 *   verbatim, so `hello` and `123` both decode to themselves.
 * - everything else: the text is parsed as JSON and decoded element-wise.
 *   Records keep only their declared fields.
 *
 * @throws {CodecError} The text does not describe a value of the type.
 */
export function decode(text: string, type: TypeDescriptor): unknown {
  return decodeValue(parseArgument(text, type), type, "");
}

function parseArgument(text: string, type: TypeDescriptor): unknown {
  if (type.kind === TypeKind.OPTIONAL) {
    const trimmed = text.trim();
    if (trimmed === "" || trimmed === "null") return undefined;
    return parseArgument(text, type.inner);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    if (type.kind === TypeKind.STRING) return text;
    throw new CodecError(`Expected ${typeName(type)}, got text that is not valid JSON`, {
      cause: error,
    });
  }
  if (type.kind === TypeKind.STRING && typeof parsed !== "string") {
    return text;
  }
  return parsed;
}

/**
 * Encode `value` as JSON-compatible data shaped by `type`. Records keep only
 * their declared fields, and absent values become `null`.
 *
 * @throws {CodecError} The value does not fit the type.
 */
export function encode(value: unknown, type: TypeDescriptor): JsonValue {
  return encodeValue(value, type, "");
}
