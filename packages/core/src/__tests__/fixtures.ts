/**
 * Test schemas and payload factories.
 */

import { v4 as uuidv4 } from "uuid";
import { atMostOne, exactlyOne } from "../exclusivity";
import { field } from "../field-constraint";
import type { EvaluationContext } from "../field-constraint";
import type { Violation } from "../errors";
import { defineMarker, defineNode } from "../node-schema";
import { defineResourceFamily } from "../variants";

export function newId(): string {
  return uuidv4();
}

export const ACTIONS = { PERMIT: "permit", DENY: "deny" } as const;

export const Leaf = defineNode({
  name: "test.Leaf",
  fields: {
    label: field.string({ required: true, pattern: "[a-z]+" }),
    weight: field.int({ min: 1, max: 10 }),
  },
});

export const Choice = defineNode({
  name: "test.Choice",
  fields: {
    a: field.string(),
    b: field.string(),
    c: field.nested(defineMarker("test.C")),
  },
  exclusivity: [exactlyOne("a", "b", "c")],
});

export const Widget = defineResourceFamily({
  family: "widget",
  fields: {
    name: field.string({ required: true, maxLength: 8 }),
    action: field.enum(ACTIONS, { default: ACTIONS.PERMIT }),
    enabled: field.bool({ default: true }),
    from_: field.list(field.string(), { alias: "from", coerceScalar: true }),
    tags: field.list(field.string(), { uniqueItems: true }),
    ratio: field.number({ min: 0, max: 1 }),
    leaf: field.nested(Leaf),
    leaves: field.list(field.nested(Leaf)),
    choice: field.nested(Choice),
    extra: field.mapping(),
  },
  exclusivity: [atMostOne("leaf", "leaves")],
});

/** The smallest payload Widget.Create accepts. */
export function widgetPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { name: "w1", folder: "Shared", ...overrides };
}

/** Context that records what the field evaluator reports. */
export function recordingContext(): EvaluationContext & { readonly violations: Violation[] } {
  const violations: Violation[] = [];
  return {
    violations,
    halted: false,
    report: (violation) => {
      violations.push(violation);
    },
    visitNode: () => undefined,
  };
}
