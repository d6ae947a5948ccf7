/**
 * Resource family variants.
 *
 * Every resource family is declared once and expanded into four schemas:
 *   Base     - the shared fields, unknown keys forbidden
 *   Create   - Base + exactly one of folder/snippet/device
 *   Update   - Base + required `id`
 *   Response - Base + required `id`, unknown keys ignored
 */

import { CONTAINER_NAME_MAX_LENGTH, CONTAINER_NAME_PATTERN, UUID_PATTERN } from "./constants";
import { CONTAINER_FIELDS, CONTAINER_GROUP } from "./exclusivity";
import type { ExclusivityGroup } from "./exclusivity";
import { field } from "./field-constraint";
import type { FieldSpec, StringField } from "./field-constraint";
import { defineNode, extendNode } from "./node-schema";
import type { NodeRule, NodeSchema } from "./node-schema";

export const SCHEMA_VARIANTS = ["Base", "Create", "Update", "Response"] as const;
export type SchemaVariant = (typeof SCHEMA_VARIANTS)[number];

export function schemaName(family: string, variant: SchemaVariant): string {
  return `${family}.${variant}`;
}

function containerField(kind: string): StringField {
  return field.string({
    pattern: CONTAINER_NAME_PATTERN,
    maxLength: CONTAINER_NAME_MAX_LENGTH,
    description: `The ${kind} in which the resource is defined`,
  });
}

export const containerFields: Readonly<Record<(typeof CONTAINER_FIELDS)[number], StringField>> = {
  folder: containerField("folder"),
  snippet: containerField("snippet"),
  device: containerField("device"),
};

export const idField: StringField = field.string({
  required: true,
  pattern: UUID_PATTERN,
  description: "The UUID of the resource",
});

export interface ResourceFamilyDefinition {
  /** snake_case family key, e.g. `nat_rule`. */
  readonly family: string;
  readonly fields: Readonly<Record<string, FieldSpec>>;
  readonly exclusivity?: readonly ExclusivityGroup[];
  readonly rules?: readonly NodeRule[];
  /** Add folder/snippet/device and the container rule. Default true. */
  readonly containers?: boolean;
}

export interface ResourceFamily {
  readonly family: string;
  readonly Base: NodeSchema;
  readonly Create: NodeSchema;
  readonly Update: NodeSchema;
  readonly Response: NodeSchema;
}

export function defineResourceFamily(def: ResourceFamilyDefinition): ResourceFamily {
  const containers = def.containers ?? true;
  const Base = defineNode({
    name: schemaName(def.family, "Base"),
    fields: containers ? { ...def.fields, ...containerFields } : def.fields,
    exclusivity: def.exclusivity,
    rules: def.rules,
    extraPolicy: "forbid",
  });

  const withId = (variant: SchemaVariant, extraPolicy: "forbid" | "ignore") =>
    defineNode({
      name: schemaName(def.family, variant),
      fields: { id: idField, ...Object.fromEntries(Base.fields) },
      exclusivity: Base.exclusivityGroups,
      rules: Base.rules,
      extraPolicy,
    });

  return Object.freeze({
    family: def.family,
    Base,
    Create: extendNode(Base, {
      name: schemaName(def.family, "Create"),
      exclusivity: containers ? [CONTAINER_GROUP] : [],
    }),
    Update: withId("Update", "forbid"),
    Response: withId("Response", "ignore"),
  });
}
