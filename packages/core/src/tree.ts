/**
 * Validated Tree
 *
 * The immutable result of a successful validation. Only the tree validator
 * creates instances; nothing mutates them afterwards.
 */

import type { NodeSchema } from "./node-schema";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** An enum member as held in a tree: its symbolic tag plus the wire value. */
export class EnumValue {
  constructor(
    public readonly tag: string,
    public readonly value: string,
  ) {
    Object.freeze(this);
  }

  toJSON(): string {
    return this.value;
  }

  toString(): string {
    return this.value;
  }
}

export type TreeValue =
  | string
  | number
  | boolean
  | EnumValue
  | ValidatedTree
  | Readonly<JsonObject>
  | readonly TreeValue[];

/** Plain-data view of a tree: canonical names, enums reduced to their values. */
export type PlainValue = JsonValue;

export function isTreeList(value: TreeValue): value is readonly TreeValue[] {
  return Array.isArray(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy a parsed-JSON value, returning undefined if anything in it is not part
 * of the JSON data model.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const out: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      out.push(converted);
    }
    Object.freeze(out);
    return out;
  }
  if (isPlainObject(value)) {
    const entries: [string, JsonValue][] = [];
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      entries.push([key, converted]);
    }
    // fromEntries defines own properties, so a "__proto__" key is kept as data.
    const out: JsonObject = Object.fromEntries(entries);
    return Object.freeze(out);
  }
  return undefined;
}

export class ValidatedTree {
  private readonly values: ReadonlyMap<string, TreeValue>;
  private readonly explicit: ReadonlySet<string>;

  /** @internal use `validateTree` / `parseTree` */
  constructor(
    public readonly schema: NodeSchema,
    values: Map<string, TreeValue>,
    explicit: Set<string>,
  ) {
    this.values = values;
    this.explicit = explicit;
    Object.freeze(this);
  }

  get schemaName(): string {
    return this.schema.name;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get(name: string): TreeValue | undefined {
    return this.values.get(name);
  }

  /** True when the field came from the input rather than from a default. */
  isExplicit(name: string): boolean {
    return this.explicit.has(name);
  }

  /** Fields holding a value, in schema declaration order. */
  keys(): string[] {
    return [...this.schema.fields.keys()].filter((name) => this.values.has(name));
  }

  getString(name: string): string | undefined {
    const value = this.values.get(name);
    return typeof value === "string" ? value : undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.values.get(name);
    return typeof value === "number" ? value : undefined;
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.values.get(name);
    return typeof value === "boolean" ? value : undefined;
  }

  getEnum(name: string): EnumValue | undefined {
    const value = this.values.get(name);
    return value instanceof EnumValue ? value : undefined;
  }

  getTree(name: string): ValidatedTree | undefined {
    const value = this.values.get(name);
    return value instanceof ValidatedTree ? value : undefined;
  }

  getList(name: string): readonly TreeValue[] | undefined {
    const value = this.values.get(name);
    return value !== undefined && isTreeList(value) ? value : undefined;
  }

  toObject(): { [key: string]: PlainValue } {
    const out: { [key: string]: PlainValue } = {};
    for (const name of this.keys()) {
      const value = this.values.get(name);
      if (value !== undefined) {
        out[name] = toPlain(value);
      }
    }
    return out;
  }
}

function toPlain(value: TreeValue): PlainValue {
  if (value instanceof EnumValue) return value.value;
  if (value instanceof ValidatedTree) return value.toObject();
  if (isTreeList(value)) return value.map(toPlain);
  if (isPlainObject(value)) return { ...value };
  return value;
}
