/**
 * Canonical Serializer
 *
 * Re-emits a validated tree as a plain mapping for the transport layer:
 * fields under their external (alias) names, enum members as their wire
 * values, and, with `explicitOnly`, only fields the caller actually supplied.
 */

import { EnumValue, ValidatedTree, isPlainObject, isTreeList } from "./tree";
import type { JsonObject, JsonValue, TreeValue } from "./tree";

export interface SerializeOptions {
  /** Emit only fields present in the original input. Default true. */
  readonly explicitOnly?: boolean;
}

export function serializeTree(tree: ValidatedTree, options: SerializeOptions = {}): JsonObject {
  const explicitOnly = options.explicitOnly ?? true;
  const out: JsonObject = {};
  for (const [name, spec] of tree.schema.fields) {
    const value = tree.get(name);
    if (value === undefined) continue;
    if (explicitOnly && !tree.isExplicit(name)) continue;
    out[spec.alias ?? name] = serializeValue(value, explicitOnly);
  }
  return out;
}

function serializeValue(value: TreeValue, explicitOnly: boolean): JsonValue {
  if (value instanceof EnumValue) {
    return value.value;
  }
  if (value instanceof ValidatedTree) {
    return serializeTree(value, { explicitOnly });
  }
  if (isTreeList(value)) {
    return value.map((item) => serializeValue(item, explicitOnly));
  }
  if (isPlainObject(value)) {
    return { ...value };
  }
  return value;
}
