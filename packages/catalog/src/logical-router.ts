/**
 * Logical Routers
 *
 * Covers the VRF list with its static routing tables, administrative
 * distances and ECMP settings. Nexthop, route-table and ECMP algorithm
 * selections are each "at most one" choices; empty-object members
 * (`receive: {}`, `discard: {}`, `unicast: {}`...) are markers.
 */

import { atMostOne, defineMarker, defineNode, defineResourceFamily, field } from "@netschema/core";
import type { FieldSpec, NodeSchema } from "@netschema/core";

export const ROUTING_STACKS = {
  LEGACY: "legacy",
  ADVANCED: "advanced",
} as const;

const marker = (name: string) => field.nested(defineMarker(`logical_router.${name}`));

export const BfdProfile = defineNode({
  name: "logical_router.BfdProfile",
  fields: { profile: field.string() },
});

export const MonitorDestination = defineNode({
  name: "logical_router.MonitorDestination",
  fields: {
    name: field.string({ required: true }),
    enable: field.bool(),
    source: field.string(),
    destination: field.string(),
    destination_fqdn: field.string(),
    interval: field.int(),
    count: field.int(),
  },
});

export const PathMonitor = defineNode({
  name: "logical_router.PathMonitor",
  fields: {
    enable: field.bool(),
    failure_condition: field.string({ pattern: "any|all" }),
    hold_time: field.int(),
    monitor_destinations: field.list(field.nested(MonitorDestination)),
  },
});

const nexthopVariants: Record<string, FieldSpec> = {
  receive: marker("Receive"),
  discard: marker("Discard"),
  ip_address: field.string(),
  ipv6_address: field.string(),
  fqdn: field.string(),
  next_lr: field.string({ description: "Next logical router" }),
  next_vr: field.string({ description: "Next virtual router" }),
  tunnel: field.string(),
};

function nexthop(name: string, variants: Record<string, FieldSpec>): NodeSchema {
  return defineNode({
    name,
    fields: variants,
    exclusivity: [atMostOne(...Object.keys(variants))],
  });
}

export const IPv4Nexthop = nexthop("logical_router.IPv4Nexthop", nexthopVariants);

// IPv6 routes cannot point at an IPv4 nexthop
export const IPv6Nexthop = nexthop(
  "logical_router.IPv6Nexthop",
  Object.fromEntries(Object.entries(nexthopVariants).filter(([key]) => key !== "ip_address")),
);

export const RouteTable = defineNode({
  name: "logical_router.RouteTable",
  fields: {
    unicast: marker("Unicast"),
    multicast: marker("Multicast"),
    both: marker("Both"),
    no_install: marker("NoInstall"),
  },
  exclusivity: [atMostOne("unicast", "multicast", "both", "no_install")],
});

function staticRoute(name: string, hop: NodeSchema, extra: Record<string, FieldSpec> = {}): NodeSchema {
  return defineNode({
    name,
    fields: {
      name: field.string({ required: true }),
      destination: field.string(),
      interface: field.string(),
      nexthop: field.nested(hop),
      route_table: field.nested(RouteTable),
      admin_dist: field.int(),
      metric: field.int(),
      ...extra,
      bfd: field.nested(BfdProfile),
      path_monitor: field.nested(PathMonitor),
    },
  });
}

export const IPv4StaticRoute = staticRoute("logical_router.IPv4StaticRoute", IPv4Nexthop);
export const IPv6StaticRoute = staticRoute("logical_router.IPv6StaticRoute", IPv6Nexthop, {
  option: field.mapping(),
});

export const RoutingTable = defineNode({
  name: "logical_router.RoutingTable",
  fields: {
    ip: field.nested(
      defineNode({
        name: "logical_router.RoutingTableIp",
        fields: { static_route: field.list(field.nested(IPv4StaticRoute)) },
      }),
    ),
    ipv6: field.nested(
      defineNode({
        name: "logical_router.RoutingTableIpv6",
        fields: { static_route: field.list(field.nested(IPv6StaticRoute)) },
      }),
    ),
  },
});

export const AdminDists = defineNode({
  name: "logical_router.AdminDists",
  fields: Object.fromEntries(
    ["static", "static_ipv6", "ospf_inter", "ospf_intra", "ospf_ext", "ospfv3_inter", "ospfv3_intra",
      "ospfv3_ext", "bgp_internal", "bgp_external", "bgp_local", "rip"].map((key) => [key, field.int()]),
  ),
});

export const EcmpAlgorithm = defineNode({
  name: "logical_router.EcmpAlgorithm",
  fields: {
    ip_modulo: marker("IpModulo"),
    ip_hash: field.nested(
      defineNode({
        name: "logical_router.EcmpIpHash",
        fields: {
          src_only: field.bool(),
          use_port: field.bool(),
          hash_seed: field.int(),
        },
      }),
    ),
    weighted_round_robin: field.nested(
      defineNode({
        name: "logical_router.EcmpWeightedRoundRobin",
        fields: {
          interface: field.list(
            field.nested(
              defineNode({
                name: "logical_router.EcmpWeightedInterface",
                fields: {
                  name: field.string({ required: true }),
                  weight: field.int(),
                },
              }),
            ),
          ),
        },
      }),
    ),
    balanced_round_robin: marker("BalancedRoundRobin"),
  },
  exclusivity: [atMostOne("ip_modulo", "ip_hash", "weighted_round_robin", "balanced_round_robin")],
});

export const EcmpConfig = defineNode({
  name: "logical_router.Ecmp",
  fields: {
    enable: field.bool(),
    algorithm: field.nested(EcmpAlgorithm),
    max_path: field.int(),
    symmetric_return: field.bool(),
    strict_source_path: field.bool(),
  },
});

export const VrfConfig = defineNode({
  name: "logical_router.Vrf",
  fields: {
    name: field.string({ required: true }),
    interface: field.list(field.string()),
    global_vrid: field.int(),
    zone_name: field.string(),
    sdwan_type: field.string(),
    admin_dists: field.nested(AdminDists),
    routing_table: field.nested(RoutingTable),
    ecmp: field.nested(EcmpConfig),
    multicast: field.mapping(),
  },
});

export const LogicalRouter = defineResourceFamily({
  family: "logical_router",
  fields: {
    name: field.string({ required: true }),
    routing_stack: field.enum(ROUTING_STACKS),
    vrf: field.list(field.nested(VrfConfig)),
  },
});
