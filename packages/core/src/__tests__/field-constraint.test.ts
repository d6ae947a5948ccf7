import { describe, it, expect } from "vitest";
import {
  anchorPattern,
  canonicalKey,
  checkFieldSpec,
  evaluateField,
  evaluatePresent,
  field,
} from "../field-constraint";
import { EnumValue } from "../tree";
import { ACTIONS, recordingContext } from "./fixtures";

describe("string fields", () => {
  const name = field.string({ pattern: "[a-z]+", maxLength: 3 });

  it("accepts a value matching the pattern", () => {
    const ctx = recordingContext();
    expect(evaluatePresent(name, "abc", ["name"], ctx)).toBe("abc");
    expect(ctx.violations).toEqual([]);
  });

  it("reports a pattern mismatch with the declared pattern", () => {
    const ctx = recordingContext();
    expect(evaluatePresent(name, "ab1", ["name"], ctx)).toBeUndefined();
    expect(ctx.violations).toEqual([
      { kind: "PatternMismatch", path: ["name"], pattern: "[a-z]+", detail: "must fully match /[a-z]+/" },
    ]);
  });

  it("reports pattern and length problems together", () => {
    const ctx = recordingContext();
    evaluatePresent(name, "ABCD", ["name"], ctx);
    expect(ctx.violations.map((v) => v.kind)).toEqual(["PatternMismatch", "RangeViolation"]);
    expect(ctx.violations[1]).toEqual({
      kind: "RangeViolation",
      path: ["name"],
      measure: "length",
      max: 3,
      detail: "must be at most 3 characters",
    });
  });

  it("anchors patterns at both ends", () => {
    const peer = field.string({ pattern: "local|none" });
    const ctx = recordingContext();
    expect(evaluatePresent(peer, "none", ["peer"], ctx)).toBe("none");
    expect(evaluatePresent(peer, "localhost", ["peer"], ctx)).toBeUndefined();
    expect(ctx.violations).toHaveLength(1);
    expect(anchorPattern("a|b").test("ab")).toBe(false);
    expect(anchorPattern("a|b").test("b")).toBe(true);
  });

  it("rejects non-strings", () => {
    const ctx = recordingContext();
    evaluatePresent(name, 12, ["name"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "TypeMismatch", path: ["name"], expected: "string", detail: "expected string, received integer" },
    ]);
  });
});

describe("numeric fields", () => {
  const weight = field.int({ min: 1, max: 10 });

  it.each([1, 5, 10])("accepts %d inside the inclusive bounds", (value) => {
    const ctx = recordingContext();
    expect(evaluatePresent(weight, value, ["weight"], ctx)).toBe(value);
    expect(ctx.violations).toEqual([]);
  });

  it("rejects min - 1", () => {
    const ctx = recordingContext();
    evaluatePresent(weight, 0, ["weight"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "RangeViolation", path: ["weight"], measure: "value", min: 1, detail: "must be >= 1" },
    ]);
  });

  it("rejects max + 1", () => {
    const ctx = recordingContext();
    evaluatePresent(weight, 11, ["weight"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "RangeViolation", path: ["weight"], measure: "value", max: 10, detail: "must be <= 10" },
    ]);
  });

  it("does not coerce numeric strings or fractions into integers", () => {
    const ctx = recordingContext();
    evaluatePresent(weight, "5", ["weight"], ctx);
    evaluatePresent(weight, 2.5, ["weight"], ctx);
    expect(ctx.violations.map((v) => v.detail)).toEqual([
      "expected integer, received string",
      "expected integer, received float",
    ]);
  });

  it("bounds float fields the same way", () => {
    const ratio = field.number({ min: 0, max: 1 });
    const ctx = recordingContext();
    expect(evaluatePresent(ratio, 0.25, ["ratio"], ctx)).toBe(0.25);
    evaluatePresent(ratio, 1.5, ["ratio"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "RangeViolation", path: ["ratio"], measure: "value", max: 1, detail: "must be <= 1" },
    ]);
  });
});

describe("bool and enum fields", () => {
  it("rejects a string for a boolean", () => {
    const ctx = recordingContext();
    evaluatePresent(field.bool(), "true", ["enabled"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "TypeMismatch", path: ["enabled"], expected: "boolean", detail: "expected boolean, received string" },
    ]);
  });

  it("stores an enum member as tag and value", () => {
    const ctx = recordingContext();
    const value = evaluatePresent(field.enum(ACTIONS), "deny", ["action"], ctx);
    expect(value).toBeInstanceOf(EnumValue);
    expect(value).toEqual(new EnumValue("DENY", "deny"));
  });

  it("maps a boolean onto the declared enum members", () => {
    const spec = field.enum({ YES: "yes", NO: "no" }, { booleanValues: { true: "yes", false: "no" } });
    const ctx = recordingContext();
    expect(evaluatePresent(spec, true, ["bi"], ctx)).toEqual(new EnumValue("YES", "yes"));
    expect(evaluatePresent(spec, false, ["bi"], ctx)).toEqual(new EnumValue("NO", "no"));
    expect(ctx.violations).toEqual([]);
  });

  it("rejects a boolean for an enum without boolean values", () => {
    const ctx = recordingContext();
    evaluatePresent(field.enum(ACTIONS), true, ["action"], ctx);
    expect(ctx.violations.map((v) => [v.kind, v.path])).toEqual([["TypeMismatch", ["action"]]]);
  });

  it("matches enum values case-sensitively", () => {
    const ctx = recordingContext();
    evaluatePresent(field.enum(ACTIONS), "PERMIT", ["action"], ctx);
    expect(ctx.violations).toEqual([
      {
        kind: "TypeMismatch",
        path: ["action"],
        expected: "one of 'permit', 'deny'",
        detail: "'PERMIT' is not one of 'permit', 'deny'",
      },
    ]);
  });
});

describe("list fields", () => {
  it("reports duplicates independently of item validity", () => {
    const digits = field.list(field.string({ pattern: "[0-9]+" }), { uniqueItems: true });
    const ctx = recordingContext();
    expect(evaluatePresent(digits, ["a", "a", "b"], ["tags"], ctx)).toBeUndefined();
    expect(ctx.violations[0]).toEqual({
      kind: "DuplicateItems",
      path: ["tags"],
      duplicates: ["a"],
      detail: 'list items must be unique; repeated: "a"',
    });
    expect(ctx.violations.slice(1).map((v) => v.path)).toEqual([
      ["tags", 0],
      ["tags", 1],
      ["tags", 2],
    ]);
  });

  it("compares object items regardless of key order", () => {
    const objects = field.list(field.mapping(), { uniqueItems: true });
    const ctx = recordingContext();
    evaluatePresent(objects, [{ a: 1, b: 2 }, { b: 2, a: 1 }], ["items"], ctx);
    expect(ctx.violations.map((v) => v.kind)).toEqual(["DuplicateItems"]);
    expect(canonicalKey({ b: 1, a: [1, "x"] })).toBe('{"a":[1,"x"],"b":1}');
  });

  it("wraps a bare string when the field coerces scalars", () => {
    const zones = field.list(field.string(), { coerceScalar: true });
    const ctx = recordingContext();
    expect(evaluatePresent(zones, "any", ["from_"], ctx)).toEqual(["any"]);
    evaluatePresent(zones, 5, ["from_"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "TypeMismatch", path: ["from_"], expected: "list", detail: "expected list, received integer" },
    ]);
  });

  it("rejects a bare string otherwise", () => {
    const ctx = recordingContext();
    evaluatePresent(field.list(field.string()), "any", ["source"], ctx);
    expect(ctx.violations[0]?.detail).toBe("expected list, received string");
  });

  it("reports null items at their index", () => {
    const ctx = recordingContext();
    evaluatePresent(field.list(field.string()), ["a", null], ["source"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "TypeMismatch", path: ["source", 1], expected: "string", detail: "expected string, received null" },
    ]);
  });

  it("bounds the number of items", () => {
    const ctx = recordingContext();
    evaluatePresent(field.list(field.string(), { minItems: 1, maxItems: 2 }), [], ["members"], ctx);
    evaluatePresent(field.list(field.string(), { minItems: 1, maxItems: 2 }), ["a", "b", "c"], ["members"], ctx);
    expect(ctx.violations).toEqual([
      { kind: "RangeViolation", path: ["members"], measure: "items", min: 1, detail: "must contain at least 1 item(s), got 0" },
      { kind: "RangeViolation", path: ["members"], measure: "items", max: 2, detail: "must contain at most 2 item(s), got 3" },
    ]);
  });

  it("returns a frozen list", () => {
    const value = evaluatePresent(field.list(field.int()), [1, 2], ["metric"], recordingContext());
    expect(value).toEqual([1, 2]);
    expect(Object.isFrozen(value)).toBe(true);
  });
});

describe("mapping fields", () => {
  it("copies the object", () => {
    const raw = { inherit: { source: "dhcp" } };
    const value = evaluatePresent(field.mapping(), raw, ["inheritance"], recordingContext());
    expect(value).toEqual(raw);
    expect(value).not.toBe(raw);
  });

  it("rejects a list", () => {
    const ctx = recordingContext();
    evaluatePresent(field.mapping(), [1], ["inheritance"], ctx);
    expect(ctx.violations[0]?.detail).toBe("expected object, received list");
  });
});

describe("evaluateField", () => {
  it("reports a missing required field", () => {
    const ctx = recordingContext();
    expect(evaluateField(field.string({ required: true }), undefined, ["name"], ctx)).toEqual({ status: "invalid" });
    expect(ctx.violations).toEqual([{ kind: "MissingRequired", path: ["name"], detail: "field required" }]);
  });

  it("treats null as absent", () => {
    const ctx = recordingContext();
    expect(evaluateField(field.string(), null, ["description"], ctx)).toEqual({ status: "absent" });
    expect(evaluateField(field.string({ required: true }), null, ["name"], ctx)).toEqual({ status: "invalid" });
    expect(ctx.violations.map((v) => v.kind)).toEqual(["MissingRequired"]);
  });

  it("fills in a default without marking it explicit", () => {
    const ctx = recordingContext();
    expect(evaluateField(field.bool({ default: true }), undefined, ["enabled"], ctx)).toEqual({
      status: "ok",
      value: true,
      explicit: false,
    });
    expect(evaluateField(field.bool({ default: true }), true, ["enabled"], ctx)).toEqual({
      status: "ok",
      value: true,
      explicit: true,
    });
  });
});

describe("checkFieldSpec", () => {
  it("accepts a sound declaration", () => {
    expect(checkFieldSpec("weight", field.int({ min: 1, max: 10, default: 5 }))).toEqual([]);
  });

  it("rejects a required field with a default", () => {
    expect(checkFieldSpec("f", field.string({ required: true, default: "x" }))).toEqual([
      "field 'f': a required field cannot declare a default",
    ]);
  });

  it("rejects inverted bounds", () => {
    expect(checkFieldSpec("f", field.int({ min: 5, max: 1 }))).toEqual([
      "field 'f': min/max bounds are inverted (5 > 1)",
    ]);
  });

  it("rejects a default its own constraint refuses", () => {
    expect(checkFieldSpec("f", field.int({ min: 1, max: 10, default: 20 }))).toEqual([
      "field 'f': default is invalid (must be <= 10)",
    ]);
  });

  it("rejects a pattern that does not compile", () => {
    const problems = checkFieldSpec("f", field.string({ pattern: "(" }));
    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^field 'f': pattern does not compile/);
  });

  it("rejects an enum without members", () => {
    expect(checkFieldSpec("f", field.enum({}))).toEqual(["field 'f': an enum field needs at least one member"]);
  });

  it("rejects boolean values that are not enum members", () => {
    expect(checkFieldSpec("f", field.enum(ACTIONS, { booleanValues: { true: "yes", false: "deny" } }))).toEqual([
      "field 'f': booleanValues must name enum members",
    ]);
  });

  it("rejects required list items", () => {
    expect(checkFieldSpec("f", field.list(field.string({ required: true })))).toEqual([
      "field 'f': list items cannot be required or aliased",
    ]);
  });
});
