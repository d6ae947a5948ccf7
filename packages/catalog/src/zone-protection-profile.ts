/**
 * Zone Protection Profiles
 *
 * Flood thresholds, reconnaissance (scan) protection and packet-based
 * attack protection applied to a security zone. The IPv6 section is kept
 * as a free-form mapping.
 */

import { atMostOne, defineNode, defineResourceFamily, exactlyOne, field } from "@netschema/core";
import type { FieldSpec, NodeSchema } from "@netschema/core";
import { description } from "./common";

/** Packets per second. */
function floodRate(): FieldSpec {
  return field.int({ min: 0, max: 2_000_000 });
}

function floodThresholds(name: string): NodeSchema {
  return defineNode({
    name: `zone_protection_profile.${name}`,
    fields: {
      alarm_rate: floodRate(),
      activate_rate: floodRate(),
      maximal_rate: floodRate(),
    },
  });
}

export const FloodRed = floodThresholds("FloodRed");
export const FloodSynCookies = floodThresholds("FloodSynCookies");

export const TcpSynFlood = defineNode({
  name: "zone_protection_profile.TcpSynFlood",
  fields: {
    enable: field.bool(),
    red: field.nested(FloodRed),
    syn_cookies: field.nested(FloodSynCookies),
  },
  exclusivity: [atMostOne("red", "syn_cookies")],
});

/** Per-protocol flood settings that only know RED. */
function redFlood(name: string): NodeSchema {
  return defineNode({
    name: `zone_protection_profile.${name}`,
    fields: {
      enable: field.bool(),
      red: field.nested(FloodRed),
    },
  });
}

export const FloodProtection = defineNode({
  name: "zone_protection_profile.FloodProtection",
  fields: {
    tcp_syn: field.nested(TcpSynFlood),
    udp: field.nested(redFlood("UdpFlood")),
    sctp_init: field.nested(redFlood("SctpInitFlood")),
    icmp: field.nested(redFlood("IcmpFlood")),
    icmpv6: field.nested(redFlood("Icmpv6Flood")),
    other_ip: field.nested(redFlood("OtherIpFlood")),
  },
});

export const ScanActionBlockIp = defineNode({
  name: "zone_protection_profile.ScanActionBlockIp",
  fields: {
    track_by: field.string({ required: true, pattern: "source|source-and-destination" }),
    duration: field.int({ required: true, min: 1, max: 3600, description: "Block duration in seconds" }),
  },
});

export const ScanAction = defineNode({
  name: "zone_protection_profile.ScanAction",
  fields: {
    allow: field.mapping(),
    alert: field.mapping(),
    block: field.mapping(),
    block_ip: field.nested(ScanActionBlockIp),
  },
  exclusivity: [exactlyOne("allow", "alert", "block", "block_ip")],
});

export const ScanEntry = defineNode({
  name: "zone_protection_profile.ScanEntry",
  fields: {
    // Threat IDs of the host sweep and port scan signatures.
    name: field.string({ required: true, pattern: "8001|8002|8003|8006" }),
    action: field.nested(ScanAction),
    interval: field.int({ min: 2, max: 65535 }),
    threshold: field.int({ min: 2, max: 65535 }),
  },
});

export const ScanWhiteListEntry = defineNode({
  name: "zone_protection_profile.ScanWhiteListEntry",
  fields: {
    name: field.string({ required: true }),
    ipv4: field.string(),
    ipv6: field.string(),
  },
});

export const NonIpProtocol = defineNode({
  name: "zone_protection_profile.NonIpProtocol",
  fields: {
    list_type: field.string({ pattern: "exclude|include" }),
    protocol: field.list(
      field.nested(
        defineNode({
          name: "zone_protection_profile.NonIpProtocolEntry",
          fields: {
            name: field.string({ required: true }),
            ether_type: field.string({ required: true }),
            enable: field.bool(),
          },
        }),
      ),
    ),
  },
});

export const L2SecGroupTagProtection = defineNode({
  name: "zone_protection_profile.L2SecGroupTagProtection",
  fields: {
    tags: field.list(
      field.nested(
        defineNode({
          name: "zone_protection_profile.SgtEntry",
          fields: {
            name: field.string({ required: true }),
            tag: field.string({ required: true }),
            enable: field.bool(),
          },
        }),
      ),
    ),
  },
});

const PACKET_CHECKS = [
  "spoofed_ip_discard",
  "strict_ip_check",
  "fragmented_traffic_discard",
  "strict_source_routing_discard",
  "loose_source_routing_discard",
  "timestamp_discard",
  "record_route_discard",
  "security_discard",
  "stream_id_discard",
  "unknown_option_discard",
  "malformed_option_discard",
  "mismatched_overlapping_tcp_segment_discard",
  "tcp_handshake_discard",
  "tcp_syn_with_data_discard",
  "tcp_synack_with_data_discard",
] as const;

const ICMP_CHECKS = [
  "icmp_ping_zero_id_discard",
  "icmp_frag_discard",
  "icmp_large_packet_discard",
  "discard_icmp_embedded_error",
  "suppress_icmp_timeexceeded",
  "suppress_icmp_needfrag",
] as const;

function flags(names: readonly string[]): Record<string, FieldSpec> {
  return Object.fromEntries(names.map((name): [string, FieldSpec] => [name, field.bool()]));
}

export const ZoneProtectionProfile = defineResourceFamily({
  family: "zone_protection_profile",
  fields: {
    name: field.string({ required: true, maxLength: 31 }),
    description: description(255),
    flood: field.nested(FloodProtection),
    scan: field.list(field.nested(ScanEntry)),
    scan_white_list: field.list(field.nested(ScanWhiteListEntry)),
    ...flags(PACKET_CHECKS),
    reject_non_syn_tcp: field.string({ pattern: "global|yes|no" }),
    asymmetric_path: field.string({ pattern: "global|drop|bypass" }),
    mptcp_option_strip: field.string({ pattern: "no|yes|global" }),
    tcp_timestamp_strip: field.bool(),
    tcp_fast_open_and_data_strip: field.bool(),
    ...flags(ICMP_CHECKS),
    ipv6: field.mapping({ description: "IPv6 protection settings" }),
    non_ip_protocol: field.nested(NonIpProtocol),
    l2_sec_group_tag_protection: field.nested(L2SecGroupTagProtection),
  },
});
