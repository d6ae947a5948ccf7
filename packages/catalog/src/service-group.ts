/**
 * Service Groups
 */

import { defineResourceFamily, field } from "@netschema/core";
import { description, objectName, tagList } from "./common";

export const ServiceGroup = defineResourceFamily({
  family: "service_group",
  fields: {
    name: objectName(63),
    members: field.list(field.string({ maxLength: 63 }), {
      required: true,
      minItems: 1,
      uniqueItems: true,
      description: "Services or service groups in this group",
    }),
    description: description(1023),
    tag: tagList(),
  },
});
