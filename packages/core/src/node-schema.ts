/**
 * Node Schemas
 *
 * A node schema describes one JSON object shape: its fields (in declaration
 * order), the exclusivity groups over those fields, optional cross-field
 * rules, and what to do with keys it does not declare.
 *
 * Schema objects are frozen on construction. Their field and input-name maps
 * are exposed as ReadonlyMap and are not written after `defineNode` returns.
 */

import { SchemaDefinitionError } from "./errors";
import type { ExclusivityGroup } from "./exclusivity";
import { checkFieldSpec } from "./field-constraint";
import type { FieldSpec } from "./field-constraint";
import type { ValidatedTree } from "./tree";

/**
 * `forbid` reports undeclared keys; `ignore` drops them silently (response
 * shapes, which must tolerate additive API changes).
 */
export type ExtraPolicy = "forbid" | "ignore";

/**
 * Cross-field check run on a node once its own fields and groups validated.
 */
export interface NodeRule {
  /** Stable identifier reported with violations. */
  readonly id: string;
  readonly description: string;
  /** Field the violation is attributed to; the node itself when omitted. */
  readonly field?: string;

  /**
   * @returns a message describing the violation, or undefined when it holds
   */
  check(tree: ValidatedTree): string | undefined;
}

/**
 * Base class for rules with the usual helpers.
 */
export abstract class BaseNodeRule implements NodeRule {
  abstract readonly id: string;
  abstract readonly description: string;
  readonly field?: string;

  abstract check(tree: ValidatedTree): string | undefined;

  protected pass(): undefined {
    return undefined;
  }

  protected fail(message?: string): string {
    return message ?? this.description;
  }
}

export interface NodeSchema {
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldSpec>;
  readonly exclusivityGroups: readonly ExclusivityGroup[];
  readonly rules: readonly NodeRule[];
  readonly extraPolicy: ExtraPolicy;
  /** Every accepted input key (canonical name or alias) → canonical name. */
  readonly inputNames: ReadonlyMap<string, string>;
}

export interface NodeDefinition {
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldSpec>>;
  readonly exclusivity?: readonly ExclusivityGroup[];
  readonly rules?: readonly NodeRule[];
  readonly extraPolicy?: ExtraPolicy;
}

export function defineNode(def: NodeDefinition): NodeSchema {
  const problems: string[] = [];
  const fields = new Map<string, FieldSpec>(Object.entries(def.fields));
  const inputNames = new Map<string, string>();

  for (const name of fields.keys()) {
    inputNames.set(name, name);
  }
  for (const [name, spec] of fields) {
    problems.push(...checkFieldSpec(name, spec));
    if (spec.alias === undefined || spec.alias === name) continue;
    const claimed = inputNames.get(spec.alias);
    if (claimed !== undefined) {
      problems.push(`alias '${spec.alias}' of field '${name}' collides with field '${claimed}'`);
    } else {
      inputNames.set(spec.alias, name);
    }
  }

  const exclusivityGroups = def.exclusivity ?? [];
  for (const grp of exclusivityGroups) {
    if (grp.members.length === 0) {
      problems.push(`an exclusivity group (${grp.cardinality}) has no members`);
    }
    for (const member of grp.members) {
      if (!fields.has(member)) {
        problems.push(`exclusivity group member '${member}' is not a declared field`);
      }
    }
  }

  const rules = def.rules ?? [];
  const ruleIds = new Set<string>();
  for (const rule of rules) {
    if (ruleIds.has(rule.id)) {
      problems.push(`rule '${rule.id}' is declared twice`);
    }
    ruleIds.add(rule.id);
    if (rule.field !== undefined && !fields.has(rule.field)) {
      problems.push(`rule '${rule.id}' targets undeclared field '${rule.field}'`);
    }
  }

  if (problems.length > 0) {
    throw new SchemaDefinitionError(problems.join("; "), def.name);
  }

  return Object.freeze({
    name: def.name,
    fields,
    exclusivityGroups: Object.freeze([...exclusivityGroups]),
    rules: Object.freeze([...rules]),
    extraPolicy: def.extraPolicy ?? "forbid",
    inputNames,
  });
}

/**
 * A node with no fields. Its presence alone carries the meaning
 * (`discard: {}`, `no_pbf: {}`, `inherit: {}`).
 */
export function defineMarker(name: string): NodeSchema {
  return defineNode({ name, fields: {} });
}

export interface NodeExtension {
  readonly name: string;
  /** Added after the base fields; a field with an existing name replaces it in place. */
  readonly fields?: Readonly<Record<string, FieldSpec>>;
  readonly exclusivity?: readonly ExclusivityGroup[];
  readonly rules?: readonly NodeRule[];
  readonly extraPolicy?: ExtraPolicy;
}

/**
 * Derive a schema from another: base fields, groups and rules, plus additions.
 */
export function extendNode(base: NodeSchema, ext: NodeExtension): NodeSchema {
  return defineNode({
    name: ext.name,
    fields: { ...Object.fromEntries(base.fields), ...ext.fields },
    exclusivity: [...base.exclusivityGroups, ...(ext.exclusivity ?? [])],
    rules: [...base.rules, ...(ext.rules ?? [])],
    extraPolicy: ext.extraPolicy ?? base.extraPolicy,
  });
}

/** Name a field is emitted under. */
export function outputName(schema: NodeSchema, field: string): string {
  return schema.fields.get(field)?.alias ?? field;
}
