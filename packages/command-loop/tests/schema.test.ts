import { describe, it, expect, expectTypeOf } from "vitest";
import {
  t,
  typeName,
  toJsonSchema,
  decode,
  encode,
  conforms,
} from "../src/schema/index.js";
import type { Infer, TypeDescriptor } from "../src/schema/index.js";
import { CodecError, SchemaError } from "../src/errors.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const Point = t.record({
  name: "Point",
  description: "A 2D point",
  fields: { x: t.number(), y: t.number() },
});

const Plane = t.record({
  name: "Plane",
  description: "A 2D plane",
  fields: {
    origin: Point,
    normal: Point,
    selected_points: t.list(Point),
    label_to_point: t.map(t.string(), Point),
  },
});

const Tag = t.record({
  name: "Tag",
  fields: { label: t.string(), note: t.optional(t.string()) },
});

const POINT_SCHEMA = {
  type: "object",
  properties: { x: { type: "number" }, y: { type: "number" } },
  required: ["x", "y"],
  description: "A 2D point",
};

/** A descriptor kind the library does not know. */
const SetType = { kind: "set" } as unknown as TypeDescriptor;

// ---------------------------------------------------------------------------
// Type inference
// ---------------------------------------------------------------------------

describe("Infer", () => {
  it("derives value types from descriptors", () => {
    expectTypeOf<Infer<typeof Point>>().toEqualTypeOf<{ x: number; y: number }>();
    expectTypeOf<Infer<typeof Tag>>().toEqualTypeOf<{
      label: string;
      note: string | undefined;
    }>();
    const Ids = t.list(t.integer());
    expectTypeOf<Infer<typeof Ids>>().toEqualTypeOf<number[]>();
    const Scores = t.map(t.string(), t.optional(t.number()));
    expectTypeOf<Infer<typeof Scores>>().toEqualTypeOf<
      Record<string, number | undefined>
    >();
  });
});

describe("typeName", () => {
  it("names composite descriptors", () => {
    expect(typeName(t.list(t.integer()))).toBe("list<integer>");
    expect(typeName(t.map(t.string(), Point))).toBe("map<string, Point>");
    expect(typeName(t.optional(t.boolean()))).toBe("optional<boolean>");
  });
});

// ---------------------------------------------------------------------------
// toJsonSchema
// ---------------------------------------------------------------------------

describe("toJsonSchema", () => {
  it("translates primitives", () => {
    expect(toJsonSchema(t.string())).toEqual({ type: "string" });
    expect(toJsonSchema(t.integer())).toEqual({ type: "integer" });
    expect(toJsonSchema(t.number())).toEqual({ type: "number" });
    expect(toJsonSchema(t.boolean())).toEqual({ type: "boolean" });
  });

  it("translates nested lists", () => {
    expect(toJsonSchema(t.list(t.list(t.integer())))).toEqual({
      type: "array",
      items: { type: "array", items: { type: "integer" } },
    });
  });

  it("translates nested maps", () => {
    expect(
      toJsonSchema(t.map(t.string(), t.map(t.string(), t.list(t.integer())))),
    ).toEqual({
      type: "object",
      additionalProperties: {
        type: "object",
        additionalProperties: { type: "array", items: { type: "integer" } },
      },
    });
  });

  it("translates an optional as its inner type", () => {
    expect(toJsonSchema(t.optional(t.integer()))).toEqual({ type: "integer" });
    expect(toJsonSchema(t.optional(Point))).toEqual(POINT_SCHEMA);
  });

  it("inlines a top-level record", () => {
    expect(toJsonSchema(Point)).toEqual(POINT_SCHEMA);
  });

  it("leaves optional fields out of required and omits a missing description", () => {
    expect(toJsonSchema(Tag)).toEqual({
      type: "object",
      properties: { label: { type: "string" }, note: { type: "string" } },
      required: ["label"],
    });
  });

  it("references nested records and collects their definitions once", () => {
    expect(toJsonSchema(Plane)).toEqual({
      type: "object",
      properties: {
        origin: { $ref: "#/definitions/Point" },
        normal: { $ref: "#/definitions/Point" },
        selected_points: {
          type: "array",
          items: { $ref: "#/definitions/Point" },
        },
        label_to_point: {
          type: "object",
          additionalProperties: { $ref: "#/definitions/Point" },
        },
      },
      required: ["origin", "normal", "selected_points", "label_to_point"],
      description: "A 2D plane",
      definitions: { Point: POINT_SCHEMA },
    });
  });

  it("collects definitions of deeper records under the outermost record", () => {
    const Segment = t.record({
      name: "Segment",
      fields: { start: Point, end: Point },
    });
    const Path = t.record({
      name: "Path",
      fields: { segments: t.list(Segment) },
    });

    expect(toJsonSchema(Path)).toEqual({
      type: "object",
      properties: {
        segments: { type: "array", items: { $ref: "#/definitions/Segment" } },
      },
      required: ["segments"],
      definitions: {
        Segment: {
          type: "object",
          properties: {
            start: { $ref: "#/definitions/Point" },
            end: { $ref: "#/definitions/Point" },
          },
          required: ["start", "end"],
        },
        Point: POINT_SCHEMA,
      },
    });
  });

  it("inlines records inside a top-level list", () => {
    expect(toJsonSchema(t.list(Point))).toEqual({
      type: "array",
      items: POINT_SCHEMA,
    });
  });

  it("rejects a map with non-string keys", () => {
    expect(() => toJsonSchema(t.map(t.integer(), t.string()))).toThrow(
      new SchemaError(
        "Unsupported map key type: integer. Only string keys are supported.",
      ),
    );
  });

  it("rejects an unknown descriptor kind", () => {
    expect(() => toJsonSchema(SetType)).toThrow(
      "Unsupported type: set. Only primitive types, lists, maps, optionals and records are supported.",
    );
    expect(() => toJsonSchema(SetType)).toThrow(SchemaError);
  });

  it("rejects an optional of an optional", () => {
    expect(() => toJsonSchema(t.optional(t.optional(t.string())))).toThrow(
      "Unsupported type: optional<optional<string>>. Only primitive types, lists, maps, optionals and records are supported.",
    );
  });

  it("rejects two different records with the same name", () => {
    const OtherPoint = t.record({ name: "Point", fields: { z: t.number() } });
    const Mixed = t.record({
      name: "Mixed",
      fields: { a: Point, b: OtherPoint },
    });

    expect(() => toJsonSchema(Mixed)).toThrow(
      "Conflicting definitions for record Point",
    );
  });

  it("merges records with the same name and the same structure", () => {
    const SamePoint = t.record({
      name: "Point",
      description: "A 2D point",
      fields: { x: t.number(), y: t.number() },
    });
    const Pair = t.record({
      name: "Pair",
      fields: { a: Point, b: SamePoint },
    });

    expect(toJsonSchema(Pair)).toEqual({
      type: "object",
      properties: {
        a: { $ref: "#/definitions/Point" },
        b: { $ref: "#/definitions/Point" },
      },
      required: ["a", "b"],
      definitions: {
        Point: {
          type: "object",
          properties: { x: { type: "number" }, y: { type: "number" } },
          required: ["x", "y"],
          description: "A 2D point",
        },
      },
    });
  });

  it("rejects same-named records whose descriptions differ", () => {
    const Vague = t.record({
      name: "Point",
      fields: { x: t.number(), y: t.number() },
    });
    const Pair = t.record({ name: "Pair", fields: { a: Point, b: Vague } });

    expect(() => toJsonSchema(Pair)).toThrow(
      "Conflicting definitions for record Point",
    );
  });
});

// ---------------------------------------------------------------------------
// decode
// ---------------------------------------------------------------------------

describe("decode", () => {
  it("returns string arguments verbatim unless they are quoted JSON", () => {
    expect(decode("hello", t.string())).toBe("hello");
    expect(decode('"hello"', t.string())).toBe("hello");
    expect(decode("123", t.string())).toBe("123");
    expect(decode("123.456", t.string())).toBe("123.456");
    expect(decode("true", t.string())).toBe("true");
  });

  it("decodes numbers and booleans", () => {
    expect(decode("123", t.integer())).toBe(123);
    expect(decode("123.456", t.number())).toBe(123.456);
    expect(decode("true", t.boolean())).toBe(true);
    expect(decode("false", t.boolean())).toBe(false);
  });

  it("accepts numbers and booleans sent as strings", () => {
    expect(decode('"5"', t.integer())).toBe(5);
    expect(decode('"2.5"', t.number())).toBe(2.5);
    expect(decode('"true"', t.boolean())).toBe(true);
  });

  it("decodes lists", () => {
    expect(decode("[1, 2, 3]", t.list(t.integer()))).toEqual([1, 2, 3]);
    expect(decode("[1, 2, 3]", t.list(t.number()))).toEqual([1, 2, 3]);
    expect(decode('["1", "2", "3"]', t.list(t.string()))).toEqual(["1", "2", "3"]);
    expect(decode("[[1, 2], [3, 4]]", t.list(t.list(t.integer())))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("decodes maps", () => {
    expect(decode('{"a": 1, "b": 2}', t.map(t.string(), t.integer()))).toEqual({
      a: 1,
      b: 2,
    });
    expect(
      decode('{"a": true, "b": false}', t.map(t.string(), t.boolean())),
    ).toEqual({ a: true, b: false });
    expect(
      decode(
        '{"a": {"b": [1,2,3]}, "c": {"d": [4,5,6]}}',
        t.map(t.string(), t.map(t.string(), t.list(t.integer()))),
      ),
    ).toEqual({ a: { b: [1, 2, 3] }, c: { d: [4, 5, 6] } });
  });

  it("decodes records", () => {
    expect(decode('{"x": 1, "y": 2}', Point)).toEqual({ x: 1, y: 2 });
  });

  it("decodes nested records", () => {
    const text = `{
      "origin": {"x": 1, "y": 2},
      "normal": {"x": 3, "y": 4},
      "selected_points": [{"x": 5, "y": 6}, {"x": 7, "y": 8}],
      "label_to_point": {"a": {"x": 9, "y": 10}, "b": {"x": 11, "y": 12}}
    }`;

    expect(decode(text, Plane)).toEqual({
      origin: { x: 1, y: 2 },
      normal: { x: 3, y: 4 },
      selected_points: [
        { x: 5, y: 6 },
        { x: 7, y: 8 },
      ],
      label_to_point: { a: { x: 9, y: 10 }, b: { x: 11, y: 12 } },
    });
  });

  it("drops fields a record does not declare", () => {
    expect(decode('{"x": 1, "y": 2, "z": 3}', Point)).toEqual({ x: 1, y: 2 });
  });

  it("leaves a missing optional field undefined", () => {
    const tag = decode('{"label": "door"}', Tag);

    expect(tag).toEqual({ label: "door", note: undefined });
  });

  it("accepts list elements sent as JSON text", () => {
    expect(decode('["{\\"x\\":1,\\"y\\":2}"]', t.list(Point))).toEqual([
      { x: 1, y: 2 },
    ]);
  });

  it("decodes null and empty text as an absent optional", () => {
    expect(decode("null", t.optional(t.integer()))).toBeUndefined();
    expect(decode("null", t.optional(t.string()))).toBeUndefined();
    expect(decode("null", t.optional(t.list(t.integer())))).toBeUndefined();
    expect(decode("null", t.optional(Plane))).toBeUndefined();
    expect(decode("", t.optional(t.string()))).toBeUndefined();
  });

  it("decodes a present optional through its inner type", () => {
    expect(decode("asdf", t.optional(t.string()))).toBe("asdf");
    expect(decode("123", t.optional(t.integer()))).toBe(123);
    expect(decode("123.456", t.optional(t.number()))).toBe(123.456);
  });

  it("rejects text that is not JSON for non-string types", () => {
    expect(() => decode("abc", t.integer())).toThrow(
      "Expected integer, got text that is not valid JSON",
    );
  });

  it("rejects a fractional integer", () => {
    expect(() => decode("1.5", t.integer())).toThrow(
      new CodecError("Expected integer, got 1.5"),
    );
  });

  it("reports where inside the value decoding failed", () => {
    try {
      decode('[1, "x"]', t.list(t.integer()));
      expect.unreachable("decode should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(CodecError);
      expect((error as CodecError).message).toBe('Expected integer at [1], got "x"');
      expect((error as CodecError).path).toBe("[1]");
    }
  });

  it("reports a missing required record field", () => {
    expect(() => decode('{"x": 1}', Point)).toThrow(
      "Missing required field y of Point",
    );
  });

  it("rejects a list where a record is expected", () => {
    expect(() => decode("[]", Point)).toThrow("Expected Point, got array");
  });

  it("rejects an unknown descriptor kind", () => {
    expect(() => decode("[]", SetType)).toThrow(SchemaError);
  });
});

// ---------------------------------------------------------------------------
// encode
// ---------------------------------------------------------------------------

describe("encode", () => {
  it("keeps primitives as they are", () => {
    expect(encode("test123", t.string())).toBe("test123");
    expect(encode(7, t.integer())).toBe(7);
    expect(encode(false, t.boolean())).toBe(false);
  });

  it("keeps only the declared fields of a record", () => {
    expect(encode({ x: 1, y: 2, label: "extra" }, Point)).toEqual({ x: 1, y: 2 });
  });

  it("encodes absent values as null", () => {
    expect(encode(undefined, t.optional(t.string()))).toBeNull();
    expect(encode(undefined, t.list(t.string()))).toBeNull();
    expect(encode({ label: "door" }, Tag)).toEqual({ label: "door", note: null });
  });

  it("encodes nested containers", () => {
    expect(
      encode(
        {
          origin: { x: 0, y: 0 },
          normal: { x: 0, y: 1 },
          selected_points: [],
          label_to_point: { a: { x: 1, y: 1 } },
        },
        Plane,
      ),
    ).toEqual({
      origin: { x: 0, y: 0 },
      normal: { x: 0, y: 1 },
      selected_points: [],
      label_to_point: { a: { x: 1, y: 1 } },
    });
  });

  it("rejects a value of the wrong type", () => {
    expect(() => encode("seven", t.integer())).toThrow(
      'Expected integer, got "seven"',
    );
    expect(() => encode([{ x: 1, y: "2" }], t.list(Point))).toThrow(
      'Expected number at [0].y, got "2"',
    );
  });

  it("survives a trip back through decode", () => {
    const plane: Infer<typeof Plane> = {
      origin: { x: 1, y: 2 },
      normal: { x: 3, y: 4 },
      selected_points: [{ x: 5, y: 6 }],
      label_to_point: { home: { x: 7, y: 8 } },
    };

    expect(decode(JSON.stringify(encode(plane, Plane)), Plane)).toEqual(plane);
  });

  it.each([
    ["hello", t.string()],
    ["123", t.string()],
    ["null", t.string()],
    ["", t.string()],
    ["true", t.string()],
    [42, t.integer()],
    [-7, t.integer()],
    [1.5, t.number()],
    [-0.25, t.number()],
    [true, t.boolean()],
    [false, t.boolean()],
    [undefined, t.optional(t.string())],
    ["null", t.optional(t.string())],
  ] satisfies Array<[unknown, TypeDescriptor]>)(
    "brings %j back through decode",
    (value, type) => {
      expect(decode(JSON.stringify(encode(value, type)), type)).toBe(value);
    },
  );
});

// ---------------------------------------------------------------------------
// conforms
// ---------------------------------------------------------------------------

describe("conforms", () => {
  it("checks values against descriptors", () => {
    expect(conforms({ x: 1, y: 2 }, Point)).toBe(true);
    expect(conforms({ x: 1 }, Point)).toBe(false);
    expect(conforms(undefined, t.optional(t.string()))).toBe(true);
    expect(conforms(1.5, t.integer())).toBe(false);
    expect(conforms({ a: [1] }, t.map(t.string(), t.list(t.integer())))).toBe(true);
  });
});
