/**
 * Policy-Based Forwarding Rules
 */

import { atMostOne, defineMarker, defineNode, defineResourceFamily, exactlyOne, field } from "@netschema/core";
import { description, memberList, objectName, tagList } from "./common";

export const PbfForwardMonitor = defineNode({
  name: "pbf_rule.ForwardMonitor",
  fields: {
    profile: field.string({ description: "Monitoring profile" }),
    disable_if_unreachable: field.bool(),
    ip_address: field.string({ description: "Address to monitor" }),
  },
});

export const PbfForwardNexthop = defineNode({
  name: "pbf_rule.ForwardNexthop",
  fields: {
    ip_address: field.string(),
    fqdn: field.string(),
  },
  exclusivity: [atMostOne("ip_address", "fqdn")],
});

export const PbfForward = defineNode({
  name: "pbf_rule.Forward",
  fields: {
    egress_interface: field.string(),
    nexthop: field.nested(PbfForwardNexthop),
    monitor: field.nested(PbfForwardMonitor),
  },
});

export const PbfAction = defineNode({
  name: "pbf_rule.Action",
  fields: {
    forward: field.nested(PbfForward),
    discard: field.nested(defineMarker("pbf_rule.Discard")),
    no_pbf: field.nested(defineMarker("pbf_rule.NoPbf")),
  },
  exclusivity: [exactlyOne("forward", "discard", "no_pbf")],
});

export const PbfFrom = defineNode({
  name: "pbf_rule.From",
  fields: {
    zone: memberList("Source zones"),
    interface: memberList("Source interfaces"),
  },
  exclusivity: [exactlyOne("zone", "interface")],
});

export const PbfSymmetricReturn = defineNode({
  name: "pbf_rule.EnforceSymmetricReturn",
  fields: {
    enabled: field.bool(),
    nexthop_address_list: field.list(
      field.nested(
        defineNode({
          name: "pbf_rule.NexthopAddress",
          fields: { name: field.string({ required: true }) },
        }),
      ),
    ),
  },
});

export const PbfRule = defineResourceFamily({
  family: "pbf_rule",
  fields: {
    name: objectName(),
    description: description(),
    tag: tagList(),
    schedule: field.string(),
    disabled: field.bool(),
    from_: field.nested(PbfFrom, { alias: "from" }),
    source: memberList("Source addresses"),
    source_user: memberList("Source users"),
    destination: memberList("Destination addresses"),
    destination_application: field.mapping(),
    service: memberList("Services"),
    application: memberList("Applications"),
    action: field.nested(PbfAction),
    enforce_symmetric_return: field.nested(PbfSymmetricReturn),
  },
});
