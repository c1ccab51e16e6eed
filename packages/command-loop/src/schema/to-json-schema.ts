/**
 * Translate type descriptors to JSON Schema.
 *
 * A record reached from outside any record is inlined. Records nested in a
 * record's fields are emitted as `{"$ref": "#/definitions/<Name>"}` and their
 * schemas collected once, by name, under the outermost record's
 * `definitions`. Two records may share a name only when they have the same
 * description and the same fields.
 */

import type { JsonSchema } from "@chatcmd/chat-client";
import { SchemaError } from "../errors.js";
import { TypeKind, isOptional, typeName, unknownKind } from "./types.js";
import type { RecordFields, RecordType, TypeDescriptor } from "./types.js";

interface Definition {
  readonly source: RecordType<RecordFields>;
  schema: JsonSchema;
}

type Definitions = Map<string, Definition>;

function unsupported(name: string): SchemaError {
  return new SchemaError(
    `Unsupported type: ${name}. Only primitive types, lists, maps, optionals and records are supported.`,
  );
}

/**
 * Structural equality of descriptors. Record pairs already under comparison
 * are assumed equal so self-referencing records terminate.
 */
function sameStructure(
  a: TypeDescriptor,
  b: TypeDescriptor,
  comparing: Set<string>,
): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case TypeKind.STRING:
    case TypeKind.INTEGER:
    case TypeKind.NUMBER:
    case TypeKind.BOOLEAN:
      return a.kind === b.kind;
    case TypeKind.OPTIONAL:
      return b.kind === TypeKind.OPTIONAL && sameStructure(a.inner, b.inner, comparing);
    case TypeKind.LIST:
      return b.kind === TypeKind.LIST && sameStructure(a.items, b.items, comparing);
    case TypeKind.MAP:
      return (
        b.kind === TypeKind.MAP &&
        sameStructure(a.key, b.key, comparing) &&
        sameStructure(a.values, b.values, comparing)
      );
    case TypeKind.RECORD: {
      if (b.kind !== TypeKind.RECORD) return false;
      if (a.name !== b.name || a.description !== b.description) return false;
      if (comparing.has(a.name)) return true;
      comparing.add(a.name);
      const fieldsA = Object.keys(a.fields);
      const fieldsB = Object.keys(b.fields);
      return (
        fieldsA.length === fieldsB.length &&
        fieldsA.every((field) => {
          const fieldA = a.fields[field];
          const fieldB = b.fields[field];
          return (
            fieldA !== undefined &&
            fieldB !== undefined &&
            sameStructure(fieldA, fieldB, comparing)
          );
        })
      );
    }
    default:
      return false;
  }
}

function recordSchema(
  type: RecordType<RecordFields>,
  definitions: Definitions,
): JsonSchema {
  const properties: Record<string, JsonSchema> = {};
  const required: string[] = [];
  for (const [field, fieldType] of Object.entries(type.fields)) {
    properties[field] = translate(fieldType, definitions);
    if (!isOptional(fieldType)) {
      required.push(field);
    }
  }

  const schema: JsonSchema = { type: "object", properties, required };
  if (type.description) {
    schema.description = type.description;
  }
  return schema;
}

function translate(
  type: TypeDescriptor,
  definitions: Definitions | undefined,
): JsonSchema {
  switch (type.kind) {
    case TypeKind.STRING:
    case TypeKind.INTEGER:
    case TypeKind.NUMBER:
    case TypeKind.BOOLEAN:
      return { type: type.kind };

    case TypeKind.OPTIONAL:
      // Optionality is expressed by the enclosing `required` list only.
      if (type.inner.kind === TypeKind.OPTIONAL) {
        throw unsupported(typeName(type));
      }
      return translate(type.inner, definitions);

    case TypeKind.LIST:
      return { type: "array", items: translate(type.items, definitions) };

    case TypeKind.MAP:
      if (type.key.kind !== TypeKind.STRING) {
        throw new SchemaError(
          `Unsupported map key type: ${typeName(type.key)}. Only string keys are supported.`,
        );
      }
      return {
        type: "object",
        additionalProperties: translate(type.values, definitions),
      };

    case TypeKind.RECORD: {
      if (definitions) {
        const existing = definitions.get(type.name);
        if (existing && !sameStructure(existing.source, type, new Set())) {
          throw new SchemaError(
            `Conflicting definitions for record ${type.name}`,
          );
        }
        if (!existing) {
          // Registered before the fields are walked so self-references resolve.
          const entry: Definition = { source: type, schema: {} };
          definitions.set(type.name, entry);
          entry.schema = recordSchema(type, definitions);
        }
        return { $ref: `#/definitions/${type.name}` };
      }

      const collected: Definitions = new Map();
      const schema = recordSchema(type, collected);
      if (collected.size > 0) {
        const shared: Record<string, JsonSchema> = {};
        for (const [name, entry] of collected) {
          shared[name] = entry.schema;
        }
        schema.definitions = shared;
      }
      return schema;
    }

    default:
      throw unsupported(unknownKind(type));
  }
}

/**
 * The JSON Schema for values of `type`.
 *
 * @throws {SchemaError} A map key is not a string, an optional wraps an
 *   optional, or the descriptor kind is unknown.
 */
export function toJsonSchema(type: TypeDescriptor): JsonSchema {
  return translate(type, undefined);
}
