/**
 * Exclusivity Groups
 *
 * Cardinality constraints over sibling fields of one node. Presence is about
 * the input: a member counts as present when the input supplied a non-null
 * value for it, whether or not that value was itself valid.
 */

import type { Cardinality, ExclusivityViolation, PathSegment } from "./errors";

export interface ExclusivityGroup {
  readonly members: readonly string[];
  readonly cardinality: Cardinality;
}

function group(cardinality: Cardinality, members: readonly string[]): ExclusivityGroup {
  return Object.freeze({ cardinality, members: Object.freeze([...members]) });
}

export function exactlyOne(...members: string[]): ExclusivityGroup {
  return group("exactly_one", members);
}

export function atMostOne(...members: string[]): ExclusivityGroup {
  return group("at_most_one", members);
}

export function atLeastOne(...members: string[]): ExclusivityGroup {
  return group("at_least_one", members);
}

export const CONTAINER_FIELDS = ["folder", "snippet", "device"] as const;

/** Every Create variant applies this exact group. */
export const CONTAINER_GROUP: ExclusivityGroup = exactlyOne(...CONTAINER_FIELDS);

function quoteAll(names: readonly string[]): string {
  return names.map((n) => `'${n}'`).join(", ");
}

/**
 * Decide whether a group holds for the given set of present fields.
 *
 * @returns the violation, or undefined when the group is satisfied
 */
export function evaluateExclusivity(
  grp: ExclusivityGroup,
  present: ReadonlySet<string>,
  path: readonly PathSegment[],
): ExclusivityViolation | undefined {
  const found = grp.members.filter((m) => present.has(m));
  const count = found.length;

  let detail: string | undefined;
  switch (grp.cardinality) {
    case "exactly_one":
      if (count !== 1) {
        detail =
          count === 0
            ? `exactly one of ${quoteAll(grp.members)} must be provided; none were`
            : `exactly one of ${quoteAll(grp.members)} must be provided; got ${quoteAll(found)}`;
      }
      break;
    case "at_most_one":
      if (count > 1) {
        detail = `at most one of ${quoteAll(grp.members)} may be provided; got ${quoteAll(found)}`;
      }
      break;
    case "at_least_one":
      if (count === 0) {
        detail = `at least one of ${quoteAll(grp.members)} must be provided; none were`;
      }
      break;
  }

  if (detail === undefined) {
    return undefined;
  }
  return {
    kind: "ExclusivityViolation",
    path,
    cardinality: grp.cardinality,
    members: grp.members,
    present: found,
    detail,
  };
}
