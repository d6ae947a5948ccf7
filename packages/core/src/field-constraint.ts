/**
 * Field Constraints
 *
 * Leaf-level rules for a single field: kind, presence, pattern, bounds and
 * list options. Scalar checks are compiled once per declaration into zod
 * schemas; zod issues are translated into the validator's violation kinds.
 */

import { z } from "zod";
import type { NodeSchema } from "./node-schema";
import type { PathSegment, Violation } from "./errors";
import { EnumValue, isPlainObject, toJsonValue } from "./tree";
import type { TreeValue, ValidatedTree } from "./tree";

// ── Declarations ────────────────────────────────────────────────────────

interface FieldBase {
  readonly required?: boolean;
  /** External (wire) name, e.g. `from` for `from_` or `domain-servers`. */
  readonly alias?: string;
  readonly description?: string;
}

export interface StringField extends FieldBase {
  readonly kind: "string";
  readonly pattern?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly default?: string;
}

export interface IntField extends FieldBase {
  readonly kind: "int";
  readonly min?: number;
  readonly max?: number;
  readonly default?: number;
}

export interface NumberField extends FieldBase {
  readonly kind: "number";
  readonly min?: number;
  readonly max?: number;
  readonly default?: number;
}

export interface BoolField extends FieldBase {
  readonly kind: "bool";
  readonly default?: boolean;
}

export interface EnumField extends FieldBase {
  readonly kind: "enum";
  /** Tag → wire value. Input is matched against the values, case-sensitively. */
  readonly members: Readonly<Record<string, string>>;
  readonly default?: string;
  /** Wire values a JSON boolean stands for; without it a boolean is a type mismatch. */
  readonly booleanValues?: { readonly true: string; readonly false: string };
}

export interface ListField extends FieldBase {
  readonly kind: "list";
  readonly items: FieldSpec;
  readonly uniqueItems?: boolean;
  readonly minItems?: number;
  readonly maxItems?: number;
  /** Accept a bare string as a one-element list. */
  readonly coerceScalar?: boolean;
  readonly default?: readonly (string | number | boolean)[];
}

export interface NestedField extends FieldBase {
  readonly kind: "nested";
  readonly schema: NodeSchema;
}

/** Free-form JSON object, kept as given. */
export interface MappingField extends FieldBase {
  readonly kind: "mapping";
}

export type FieldSpec =
  | StringField
  | IntField
  | NumberField
  | BoolField
  | EnumField
  | ListField
  | NestedField
  | MappingField;

export type FieldKind = FieldSpec["kind"];

type Options<T extends FieldSpec> = Omit<T, "kind">;

/**
 * Declaration helpers used by the catalog.
 */
export const field = {
  string: (options: Options<StringField> = {}): StringField => ({ kind: "string", ...options }),
  int: (options: Options<IntField> = {}): IntField => ({ kind: "int", ...options }),
  number: (options: Options<NumberField> = {}): NumberField => ({ kind: "number", ...options }),
  bool: (options: Options<BoolField> = {}): BoolField => ({ kind: "bool", ...options }),
  enum: (members: Readonly<Record<string, string>>, options: Omit<Options<EnumField>, "members"> = {}): EnumField => ({
    kind: "enum",
    members,
    ...options,
  }),
  list: (items: FieldSpec, options: Omit<Options<ListField>, "items"> = {}): ListField => ({
    kind: "list",
    items,
    ...options,
  }),
  nested: (schema: NodeSchema, options: Omit<Options<NestedField>, "schema"> = {}): NestedField => ({
    kind: "nested",
    schema,
    ...options,
  }),
  mapping: (options: Options<MappingField> = {}): MappingField => ({ kind: "mapping", ...options }),
};

/** Allowed wire values of an enum field, in declaration order. */
export function allowedValues(spec: EnumField): string[] {
  return Object.values(spec.members);
}

// ── Declaration checks ──────────────────────────────────────────────────

const FieldDeclarationSchema = z
  .object({
    kind: z.enum(["string", "int", "number", "bool", "enum", "list", "nested", "mapping"]),
    required: z.boolean().optional(),
    alias: z.string().min(1).optional(),
    description: z.string().optional(),
    pattern: z.string().optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
    uniqueItems: z.boolean().optional(),
    coerceScalar: z.boolean().optional(),
    members: z.record(z.string()).optional(),
    booleanValues: z.object({ true: z.string(), false: z.string() }).optional(),
    default: z.unknown().optional(),
  })
  .passthrough()
  .superRefine((decl, ctx) => {
    const fail = (message: string) => ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    const { kind } = decl;

    if (decl.required && decl.default !== undefined) {
      fail("a required field cannot declare a default");
    }
    if (decl.pattern !== undefined) {
      if (kind !== "string") {
        fail("pattern applies to string fields only");
      } else {
        try {
          new RegExp(decl.pattern);
        } catch (err) {
          fail(`pattern does not compile: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
    if ((decl.minLength !== undefined || decl.maxLength !== undefined) && kind !== "string") {
      fail("minLength/maxLength apply to string fields only");
    }
    if ((decl.min !== undefined || decl.max !== undefined) && kind !== "int" && kind !== "number") {
      fail("min/max apply to numeric fields only");
    }
    const listOnly = [decl.minItems, decl.maxItems, decl.uniqueItems, decl.coerceScalar];
    if (listOnly.some((v) => v !== undefined) && kind !== "list") {
      fail("minItems/maxItems/uniqueItems/coerceScalar apply to list fields only");
    }
    if (kind === "enum" && Object.keys(decl.members ?? {}).length === 0) {
      fail("an enum field needs at least one member");
    }
    if (decl.booleanValues !== undefined) {
      const values = Object.values(decl.members ?? {});
      if (kind !== "enum") {
        fail("booleanValues applies to enum fields only");
      } else if (!values.includes(decl.booleanValues.true) || !values.includes(decl.booleanValues.false)) {
        fail("booleanValues must name enum members");
      }
    }
    if ((kind === "nested" || kind === "mapping") && decl.default !== undefined) {
      fail(`a ${kind} field cannot declare a default`);
    }
    const ordered: [string, number | undefined, number | undefined][] = [
      ["min/max", decl.min, decl.max],
      ["minLength/maxLength", decl.minLength, decl.maxLength],
      ["minItems/maxItems", decl.minItems, decl.maxItems],
    ];
    for (const [label, lo, hi] of ordered) {
      if (lo !== undefined && hi !== undefined && lo > hi) {
        fail(`${label} bounds are inverted (${lo} > ${hi})`);
      }
    }
  });

/**
 * Check a declaration's internal consistency. Returns problems as messages;
 * an empty list means the declaration is sound.
 */
export function checkFieldSpec(name: string, spec: FieldSpec): string[] {
  const problems: string[] = [];
  const parsed = FieldDeclarationSchema.safeParse(spec);
  if (!parsed.success) {
    problems.push(...parsed.error.issues.map((issue) => `field '${name}': ${issue.message}`));
  }

  if (spec.kind === "list") {
    const { items } = spec;
    if (items.required !== undefined || items.alias !== undefined) {
      problems.push(`field '${name}': list items cannot be required or aliased`);
    }
    if (items.kind !== "nested" && items.kind !== "mapping" && items.default !== undefined) {
      problems.push(`field '${name}': list items cannot declare a default`);
    }
    problems.push(...checkFieldSpec(`${name}[]`, items));
  }

  const declaredDefault = defaultOf(spec);
  if (problems.length === 0 && declaredDefault !== undefined) {
    const collected: Violation[] = [];
    const scratch: EvaluationContext = {
      halted: false,
      report: (violation) => collected.push(violation),
      visitNode: () => undefined,
    };
    evaluatePresent(spec, declaredDefault, [name], scratch);
    problems.push(...collected.map((v) => `field '${name}': default is invalid (${v.detail})`));
  }
  return problems;
}

// ── Evaluation ──────────────────────────────────────────────────────────

/**
 * What the field evaluator needs from the traversal that drives it.
 */
export interface EvaluationContext {
  readonly halted: boolean;
  report(violation: Violation): void;
  visitNode(
    schema: NodeSchema,
    raw: Record<string, unknown>,
    path: readonly PathSegment[],
  ): ValidatedTree | undefined;
}

export type FieldOutcome =
  | { readonly status: "absent" }
  | { readonly status: "ok"; readonly value: TreeValue; readonly explicit: boolean }
  | { readonly status: "invalid" };

const ABSENT: FieldOutcome = { status: "absent" };
const INVALID: FieldOutcome = { status: "invalid" };

function defaultOf(spec: FieldSpec): unknown {
  switch (spec.kind) {
    case "nested":
    case "mapping":
      return undefined;
    default:
      return spec.default;
  }
}

/**
 * Evaluate one field of a node. `raw` is undefined (or null) when the input
 * did not supply the field.
 */
export function evaluateField(
  spec: FieldSpec,
  raw: unknown,
  path: readonly PathSegment[],
  ctx: EvaluationContext,
): FieldOutcome {
  if (raw === undefined || raw === null) {
    if (spec.required) {
      ctx.report({ kind: "MissingRequired", path, detail: "field required" });
      return INVALID;
    }
    const declaredDefault = defaultOf(spec);
    if (declaredDefault === undefined) {
      return ABSENT;
    }
    const value = evaluatePresent(spec, declaredDefault, path, ctx);
    return value === undefined ? INVALID : { status: "ok", value, explicit: false };
  }

  const value = evaluatePresent(spec, raw, path, ctx);
  return value === undefined ? INVALID : { status: "ok", value, explicit: true };
}

/**
 * Evaluate a supplied value. Returns undefined after reporting when invalid.
 */
export function evaluatePresent(
  spec: FieldSpec,
  raw: unknown,
  path: readonly PathSegment[],
  ctx: EvaluationContext,
): TreeValue | undefined {
  switch (spec.kind) {
    case "string":
    case "int":
    case "number":
    case "bool":
      return parseScalar(spec, raw, path, ctx);
    case "enum":
      return parseEnum(spec, raw, path, ctx);
    case "list":
      return evaluateList(spec, raw, path, ctx);
    case "nested":
      if (!isPlainObject(raw)) {
        ctx.report(typeMismatch(path, "object", raw));
        return undefined;
      }
      return ctx.visitNode(spec.schema, raw, path);
    case "mapping": {
      const copy = isPlainObject(raw) ? toJsonValue(raw) : undefined;
      if (copy === undefined || copy === null || typeof copy !== "object" || Array.isArray(copy)) {
        ctx.report(typeMismatch(path, "object", raw));
        return undefined;
      }
      return copy;
    }
  }
}

// ── Scalars ─────────────────────────────────────────────────────────────

type ScalarField = StringField | IntField | NumberField | BoolField;
type Scalar = string | number | boolean;

const scalarCache = new WeakMap<ScalarField, z.ZodType<Scalar>>();
const enumCache = new WeakMap<EnumField, z.ZodType<string>>();

/** Wrap a pattern so it must match the whole value. */
export function anchorPattern(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

function compileScalar(spec: ScalarField): z.ZodType<Scalar> {
  const cached = scalarCache.get(spec);
  if (cached) return cached;

  let compiled: z.ZodType<Scalar>;
  switch (spec.kind) {
    case "string": {
      let schema = z.string();
      if (spec.pattern !== undefined) {
        schema = schema.regex(anchorPattern(spec.pattern), { message: `must fully match /${spec.pattern}/` });
      }
      if (spec.minLength !== undefined) {
        schema = schema.min(spec.minLength, { message: `must be at least ${spec.minLength} characters` });
      }
      if (spec.maxLength !== undefined) {
        schema = schema.max(spec.maxLength, { message: `must be at most ${spec.maxLength} characters` });
      }
      compiled = schema;
      break;
    }
    case "int":
    case "number": {
      let schema = spec.kind === "int" ? z.number().int() : z.number().finite();
      if (spec.min !== undefined) {
        schema = schema.gte(spec.min, { message: `must be >= ${spec.min}` });
      }
      if (spec.max !== undefined) {
        schema = schema.lte(spec.max, { message: `must be <= ${spec.max}` });
      }
      compiled = schema;
      break;
    }
    case "bool":
      compiled = z.boolean();
      break;
  }
  scalarCache.set(spec, compiled);
  return compiled;
}

function compileEnum(spec: EnumField): z.ZodType<string> {
  const cached = enumCache.get(spec);
  if (cached) return cached;
  const [first, ...rest] = allowedValues(spec);
  const compiled = first === undefined ? z.never() : z.enum([first, ...rest]);
  enumCache.set(spec, compiled);
  return compiled;
}

function parseScalar(
  spec: ScalarField,
  raw: unknown,
  path: readonly PathSegment[],
  ctx: EvaluationContext,
): Scalar | undefined {
  const result = compileScalar(spec).safeParse(raw);
  if (result.success) {
    return result.data;
  }
  for (const issue of result.error.issues) {
    ctx.report(issueToViolation(issue, spec, path, raw));
  }
  return undefined;
}

function parseEnum(
  spec: EnumField,
  raw: unknown,
  path: readonly PathSegment[],
  ctx: EvaluationContext,
): EnumValue | undefined {
  const { booleanValues } = spec;
  const input = typeof raw === "boolean" && booleanValues ? (raw ? booleanValues.true : booleanValues.false) : raw;
  const result = compileEnum(spec).safeParse(input);
  if (!result.success) {
    for (const issue of result.error.issues) {
      ctx.report(issueToViolation(issue, spec, path, raw));
    }
    return undefined;
  }
  const tag = Object.keys(spec.members).find((key) => spec.members[key] === result.data);
  return new EnumValue(tag ?? result.data, result.data);
}

function describe(raw: unknown): string {
  if (raw === null) return "null";
  if (Array.isArray(raw)) return "list";
  if (typeof raw === "number") return Number.isInteger(raw) ? "integer" : "float";
  return typeof raw === "object" ? "object" : typeof raw;
}

function typeMismatch(path: readonly PathSegment[], expected: string, raw: unknown): Violation {
  return { kind: "TypeMismatch", path, expected, detail: `expected ${expected}, received ${describe(raw)}` };
}

const EXPECTED_BY_KIND: Record<FieldKind, string> = {
  string: "string",
  int: "integer",
  number: "number",
  bool: "boolean",
  enum: "string",
  list: "list",
  nested: "object",
  mapping: "object",
};

function issueToViolation(
  issue: z.ZodIssue,
  spec: ScalarField | EnumField,
  path: readonly PathSegment[],
  raw: unknown,
): Violation {
  switch (issue.code) {
    case z.ZodIssueCode.invalid_type:
      return typeMismatch(path, EXPECTED_BY_KIND[spec.kind], raw);
    case z.ZodIssueCode.invalid_string:
      return {
        kind: "PatternMismatch",
        path,
        pattern: spec.kind === "string" && spec.pattern !== undefined ? spec.pattern : String(issue.validation),
        detail: issue.message,
      };
    case z.ZodIssueCode.too_small:
      return {
        kind: "RangeViolation",
        path,
        measure: issue.type === "string" ? "length" : "value",
        min: Number(issue.minimum),
        detail: issue.message,
      };
    case z.ZodIssueCode.too_big:
      return {
        kind: "RangeViolation",
        path,
        measure: issue.type === "string" ? "length" : "value",
        max: Number(issue.maximum),
        detail: issue.message,
      };
    case z.ZodIssueCode.invalid_enum_value:
      return {
        kind: "TypeMismatch",
        path,
        expected: `one of ${issue.options.map((o) => `'${String(o)}'`).join(", ")}`,
        detail: `'${String(issue.received)}' is not one of ${issue.options.map((o) => `'${String(o)}'`).join(", ")}`,
      };
    default:
      return { kind: "TypeMismatch", path, expected: EXPECTED_BY_KIND[spec.kind], detail: issue.message };
  }
}

// ── Lists ───────────────────────────────────────────────────────────────

/** Key under which two raw JSON values compare equal regardless of key order. */
export function canonicalKey(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalKey).join(",")}]`;
  }
  if (isPlainObject(value)) {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value) ?? "undefined";
}

function findDuplicates(items: readonly unknown[]): unknown[] {
  const seen = new Map<string, number>();
  const duplicates: unknown[] = [];
  for (const item of items) {
    const key = canonicalKey(item);
    const count = seen.get(key) ?? 0;
    if (count === 1) {
      duplicates.push(item);
    }
    seen.set(key, count + 1);
  }
  return duplicates;
}

function evaluateList(
  spec: ListField,
  raw: unknown,
  path: readonly PathSegment[],
  ctx: EvaluationContext,
): readonly TreeValue[] | undefined {
  const items: unknown[] | undefined =
    Array.isArray(raw) ? raw : spec.coerceScalar && typeof raw === "string" ? [raw] : undefined;
  if (items === undefined) {
    ctx.report(typeMismatch(path, "list", raw));
    return undefined;
  }

  let valid = true;
  if (spec.minItems !== undefined && items.length < spec.minItems) {
    ctx.report({
      kind: "RangeViolation",
      path,
      measure: "items",
      min: spec.minItems,
      detail: `must contain at least ${spec.minItems} item(s), got ${items.length}`,
    });
    valid = false;
  }
  if (spec.maxItems !== undefined && items.length > spec.maxItems) {
    ctx.report({
      kind: "RangeViolation",
      path,
      measure: "items",
      max: spec.maxItems,
      detail: `must contain at most ${spec.maxItems} item(s), got ${items.length}`,
    });
    valid = false;
  }
  if (spec.uniqueItems) {
    const duplicates = findDuplicates(items);
    if (duplicates.length > 0) {
      ctx.report({
        kind: "DuplicateItems",
        path,
        duplicates,
        detail: `list items must be unique; repeated: ${duplicates.map((d) => canonicalKey(d)).join(", ")}`,
      });
      valid = false;
    }
  }

  const out: TreeValue[] = [];
  for (const [index, item] of items.entries()) {
    if (ctx.halted) return undefined;
    const itemPath = [...path, index];
    if (item === null || item === undefined) {
      ctx.report(typeMismatch(itemPath, EXPECTED_BY_KIND[spec.items.kind], item));
      valid = false;
      continue;
    }
    const value = evaluatePresent(spec.items, item, itemPath, ctx);
    if (value === undefined) {
      valid = false;
    } else {
      out.push(value);
    }
  }
  if (!valid) {
    return undefined;
  }
  Object.freeze(out);
  return out;
}
