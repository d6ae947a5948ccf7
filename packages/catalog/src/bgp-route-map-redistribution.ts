/**
 * BGP Route-Map Redistribution
 *
 * Two levels of choice: at most one source protocol (bgp, ospf,
 * connected_static), and inside it at most one target protocol. Each
 * source/target pair has its own entry shape; the match criteria depend on
 * the source and the set actions on the target.
 */

import { atMostOne, defineNode, defineResourceFamily, field } from "@netschema/core";
import type { NodeSchema } from "@netschema/core";
import {
  BgpRouteMapMatch,
  BgpRouteMapSetIpv4,
  BgpRouteMapSetMetric,
  bgpSetFields,
  defineRouteMapEntry,
} from "./bgp-route-map";

export const RedistSimpleMatch = defineNode({
  name: "bgp_route_map_redistribution.SimpleMatch",
  fields: {
    interface: field.string(),
    metric: field.int(),
    tag: field.int(),
    ipv4: field.nested(
      defineNode({
        name: "bgp_route_map_redistribution.SimpleMatchIpv4",
        fields: {
          address: field.string(),
          next_hop: field.string(),
        },
      }),
    ),
  },
});

export const RedistSetToBgp = defineNode({
  name: "bgp_route_map_redistribution.SetToBgp",
  fields: bgpSetFields,
});

export const RedistSetToOspf = defineNode({
  name: "bgp_route_map_redistribution.SetToOspf",
  fields: {
    metric: field.nested(BgpRouteMapSetMetric),
    metric_type: field.string(),
    tag: field.int(),
  },
});

export const RedistSetToRib = defineNode({
  name: "bgp_route_map_redistribution.SetToRib",
  fields: {
    ipv4: field.nested(BgpRouteMapSetIpv4),
  },
});

function target(source: string, to: string, match: NodeSchema, set: NodeSchema): NodeSchema {
  const prefix = `bgp_route_map_redistribution.${source}To${to}`;
  return defineNode({
    name: prefix,
    fields: {
      route_map: field.list(field.nested(defineRouteMapEntry(`${prefix}Entry`, match, set))),
    },
  });
}

export const RedistBgpSource = defineNode({
  name: "bgp_route_map_redistribution.BgpSource",
  fields: {
    ospf: field.nested(target("Bgp", "Ospf", BgpRouteMapMatch, RedistSetToOspf)),
    rib: field.nested(target("Bgp", "Rib", BgpRouteMapMatch, RedistSetToRib)),
  },
  exclusivity: [atMostOne("ospf", "rib")],
});

export const RedistOspfSource = defineNode({
  name: "bgp_route_map_redistribution.OspfSource",
  fields: {
    bgp: field.nested(target("Ospf", "Bgp", RedistSimpleMatch, RedistSetToBgp)),
    rib: field.nested(target("Ospf", "Rib", RedistSimpleMatch, RedistSetToRib)),
  },
  exclusivity: [atMostOne("bgp", "rib")],
});

export const RedistConnectedStaticSource = defineNode({
  name: "bgp_route_map_redistribution.ConnectedStaticSource",
  fields: {
    bgp: field.nested(target("ConnStatic", "Bgp", RedistSimpleMatch, RedistSetToBgp)),
    ospf: field.nested(target("ConnStatic", "Ospf", RedistSimpleMatch, RedistSetToOspf)),
    rib: field.nested(target("ConnStatic", "Rib", RedistSimpleMatch, RedistSetToRib)),
  },
  exclusivity: [atMostOne("bgp", "ospf", "rib")],
});

export const BgpRouteMapRedistribution = defineResourceFamily({
  family: "bgp_route_map_redistribution",
  fields: {
    name: field.string({ required: true }),
    bgp: field.nested(RedistBgpSource),
    ospf: field.nested(RedistOspfSource),
    connected_static: field.nested(RedistConnectedStaticSource),
  },
  exclusivity: [atMostOne("bgp", "ospf", "connected_static")],
});
