/**
 * BGP Route Maps
 *
 * An ordered list of entries keyed by sequence number, each with optional
 * match criteria and set actions. The match and set shapes are shared with
 * route-map redistribution.
 */

import { defineNode, defineResourceFamily, field } from "@netschema/core";
import type { FieldSpec, NodeSchema } from "@netschema/core";

export const ROUTE_MAP_ACTION_PATTERN = "permit|deny";

export const BgpRouteMapMatchIpv4 = defineNode({
  name: "bgp_route_map.MatchIpv4",
  fields: {
    address: field.string({ description: "Access or prefix list matching the address" }),
    next_hop: field.string(),
    route_source: field.string(),
  },
});

export const BgpRouteMapMatch = defineNode({
  name: "bgp_route_map.Match",
  fields: {
    as_path_access_list: field.string(),
    interface: field.string(),
    regular_community: field.string(),
    origin: field.string(),
    large_community: field.string(),
    tag: field.int(),
    extended_community: field.string(),
    local_preference: field.int(),
    metric: field.int(),
    peer: field.string({ pattern: "local|none" }),
    ipv4: field.nested(BgpRouteMapMatchIpv4),
  },
});

export const BgpRouteMapSetMetric = defineNode({
  name: "bgp_route_map.SetMetric",
  fields: {
    // "substract" is how the API spells it
    action: field.string({ pattern: "set|add|substract" }),
    value: field.int(),
  },
});

export const BgpRouteMapSetAggregator = defineNode({
  name: "bgp_route_map.SetAggregator",
  fields: {
    as_: field.int({ alias: "as", description: "Aggregator AS number" }),
    router_id: field.string(),
  },
});

export const BgpRouteMapSetIpv4 = defineNode({
  name: "bgp_route_map.SetIpv4",
  fields: {
    source_address: field.string(),
    next_hop: field.string(),
  },
});

/** Set actions that apply to any BGP-bound route. */
export const bgpSetFields: Readonly<Record<string, FieldSpec>> = {
  atomic_aggregate: field.bool(),
  local_preference: field.int(),
  tag: field.int(),
  metric: field.nested(BgpRouteMapSetMetric),
  weight: field.int(),
  origin: field.string({ pattern: "none|egp|igp|incomplete" }),
  remove_regular_community: field.string(),
  remove_large_community: field.string(),
  originator_id: field.string(),
  aggregator: field.nested(BgpRouteMapSetAggregator),
  ipv4: field.nested(BgpRouteMapSetIpv4),
  aspath_exclude: field.string(),
  aspath_prepend: field.string(),
  regular_community: field.list(field.string()),
  overwrite_regular_community: field.bool(),
  large_community: field.list(field.string()),
  overwrite_large_community: field.bool(),
};

export const BgpRouteMapSet = defineNode({
  name: "bgp_route_map.Set",
  fields: bgpSetFields,
});

/**
 * Entry shape shared by route maps and redistribution route maps:
 * sequence number, description, permit/deny and the given match/set schemas.
 */
export function defineRouteMapEntry(name: string, match: NodeSchema, set: NodeSchema): NodeSchema {
  return defineNode({
    name,
    fields: {
      name: field.int({ required: true, min: 1, max: 65535, description: "Sequence number" }),
      description: field.string(),
      action: field.string({ pattern: ROUTE_MAP_ACTION_PATTERN }),
      match: field.nested(match),
      set: field.nested(set),
    },
  });
}

export const BgpRouteMapEntry = defineRouteMapEntry("bgp_route_map.Entry", BgpRouteMapMatch, BgpRouteMapSet);

export const BgpRouteMap = defineResourceFamily({
  family: "bgp_route_map",
  fields: {
    name: field.string({ required: true }),
    route_map: field.list(field.nested(BgpRouteMapEntry)),
  },
});
