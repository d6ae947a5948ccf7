/**
 * Field declarations shared by several resource families.
 */

import { field } from "@netschema/core";
import type { ListField, StringField } from "@netschema/core";

/** Object names as accepted by the management API. */
export const OBJECT_NAME_PATTERN = "[a-zA-Z0-9_ \\.-]+";

export function objectName(maxLength = 63): StringField {
  return field.string({
    required: true,
    pattern: OBJECT_NAME_PATTERN,
    maxLength,
    description: "Object name",
  });
}

export function description(maxLength = 1023): StringField {
  return field.string({ maxLength, description: "Free-form description" });
}

/** Tags attached to an object; a single tag may be given as a bare string. */
export function tagList(): ListField {
  return field.list(field.string({ maxLength: 64 }), {
    uniqueItems: true,
    coerceScalar: true,
    description: "Tags associated with the object",
  });
}

/** Address, zone or service references; `"any"` is accepted for `["any"]`. */
export function memberList(what: string): ListField {
  return field.list(field.string(), { coerceScalar: true, uniqueItems: true, description: what });
}
