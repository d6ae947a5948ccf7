/**
 * Payload factories for catalog tests. Every factory returns a payload the
 * family's Create schema accepts; pass overrides to break it.
 */

import { v4 as uuidv4 } from "uuid";
import type { EvaluationContext, Violation } from "@netschema/core";

type Payload = Record<string, unknown>;

export function newId(): string {
  return uuidv4();
}

export function natRulePayload(overrides: Payload = {}): Payload {
  return {
    name: "nat_rule_1",
    folder: "Texas",
    nat_type: "ipv4",
    from: ["trust"],
    to: ["untrust"],
    source: ["any"],
    destination: ["any"],
    service: "any",
    source_translation: {
      dynamic_ip_and_port: { translated_address: ["10.0.0.1"] },
    },
    ...overrides,
  };
}

export function pbfRulePayload(overrides: Payload = {}): Payload {
  return {
    name: "pbf_rule_1",
    folder: "Texas",
    from: { zone: ["trust"] },
    source: ["any"],
    destination: ["any"],
    application: ["any"],
    service: ["application-default"],
    action: {
      forward: {
        egress_interface: "ethernet1/1",
        nexthop: { ip_address: "10.0.0.254" },
      },
    },
    ...overrides,
  };
}

export function dnsProxyPayload(overrides: Payload = {}): Payload {
  return {
    name: "dns-proxy-1",
    folder: "Texas",
    enabled: true,
    default: { primary: "8.8.8.8", secondary: "8.8.4.4" },
    interface: ["ethernet1/1"],
    "domain-servers": [{ name: "corp", "domain-name": ["corp.example"], primary: "10.0.0.53" }],
    "tcp-queries": { enabled: true, "max-pending-requests": 64 },
    cache: { enabled: true, "max-ttl": { enabled: true, "time-to-live": 3600 } },
    ...overrides,
  };
}

export function bgpRouteMapPayload(overrides: Payload = {}): Payload {
  return {
    name: "rm-1",
    folder: "Texas",
    route_map: [
      {
        name: 10,
        action: "permit",
        match: { peer: "local", ipv4: { address: "pl-1" } },
        set: { local_preference: 200, aggregator: { as: 65001, router_id: "10.0.0.1" } },
      },
    ],
    ...overrides,
  };
}

export function redistributionPayload(overrides: Payload = {}): Payload {
  return {
    name: "redist-1",
    folder: "Texas",
    ospf: {
      bgp: {
        route_map: [{ name: 10, action: "permit", match: { interface: "ethernet1/1" }, set: { aspath_prepend: "65001" } }],
      },
    },
    ...overrides,
  };
}

export function logicalRouterPayload(overrides: Payload = {}): Payload {
  return {
    name: "lr-1",
    folder: "Texas",
    routing_stack: "advanced",
    vrf: [
      {
        name: "default",
        interface: ["ethernet1/1"],
        routing_table: {
          ip: {
            static_route: [
              { name: "default-route", destination: "0.0.0.0/0", nexthop: { ip_address: "10.0.0.1" } },
              { name: "blackhole", destination: "192.0.2.0/24", nexthop: { discard: {} }, route_table: { unicast: {} } },
            ],
          },
        },
        ecmp: { enable: true, algorithm: { ip_modulo: {} }, max_path: 2 },
      },
    ],
    ...overrides,
  };
}

export function serviceGroupPayload(overrides: Payload = {}): Payload {
  return {
    name: "web-services",
    folder: "Texas",
    members: ["http", "https"],
    tag: ["web"],
    ...overrides,
  };
}

export function ipsecTunnelPayload(overrides: Payload = {}): Payload {
  return {
    name: "tunnel-1",
    folder: "Texas",
    auto_key: {
      ike_gateway: [{ name: "gw-1" }],
      ipsec_crypto_profile: "default",
      proxy_id: [{ name: "p1", local: "10.0.0.0/24", remote: "10.1.0.0/24", protocol: { tcp: { local_port: 443 } } }],
    },
    anti_replay: true,
    ...overrides,
  };
}

export function ethernetInterfacePayload(overrides: Payload = {}): Payload {
  return {
    name: "$eth1",
    folder: "Texas",
    default_value: "ethernet1/1",
    link_speed: "1000",
    layer3: {
      ip: [{ name: "192.168.1.1/24" }],
      interface_management_profile: "allow-ping",
    },
    ...overrides,
  };
}

export function zoneProtectionProfilePayload(overrides: Payload = {}): Payload {
  return {
    name: "zpp-edge",
    folder: "Texas",
    flood: {
      tcp_syn: { enable: true, red: { alarm_rate: 10000, activate_rate: 10000, maximal_rate: 40000 } },
      udp: { enable: true },
    },
    scan: [{ name: "8001", action: { block_ip: { track_by: "source", duration: 300 } }, interval: 2, threshold: 100 }],
    spoofed_ip_discard: true,
    reject_non_syn_tcp: "global",
    ...overrides,
  };
}

/** Create payload for every family, keyed by family name. */
export const CREATE_PAYLOADS: Readonly<Record<string, () => Payload>> = {
  nat_rule: natRulePayload,
  pbf_rule: pbfRulePayload,
  dns_proxy: dnsProxyPayload,
  bgp_route_map: bgpRouteMapPayload,
  bgp_route_map_redistribution: redistributionPayload,
  logical_router: logicalRouterPayload,
  service_group: serviceGroupPayload,
  ipsec_tunnel: ipsecTunnelPayload,
  ethernet_interface: ethernetInterfacePayload,
  zone_protection_profile: zoneProtectionProfilePayload,
};

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
