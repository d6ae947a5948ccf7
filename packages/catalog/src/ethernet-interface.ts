/**
 * Ethernet Interfaces
 *
 * A physical port runs in at most one mode (layer2, layer3 or tap); a
 * layer3 port takes at most one addressing mode (static, DHCP or PPPoE).
 * Link settings default to `auto`.
 */

import { atMostOne, defineMarker, defineNode, defineResourceFamily, field } from "@netschema/core";

export const PPPOE_AUTHENTICATION = {
  CHAP: "CHAP",
  PAP: "PAP",
  AUTO: "auto",
} as const;

/** VLAN IDs 1-4096. */
export const VLAN_TAG_PATTERN = "[1-9]\\d{0,2}|[1-3]\\d{3}|40[0-8]\\d|409[0-6]";

const routeMetric = () => field.int({ min: 1, max: 65535, default: 10 });

const enableFlag = (name: string, flag = "enable") =>
  defineNode({ name: `ethernet_interface.${name}`, fields: { [flag]: field.bool({ default: false }) } });

export const LldpConfig = enableFlag("Lldp");
export const BonjourConfig = enableFlag("Bonjour");
export const NdpProxyConfig = enableFlag("NdpProxy", "enabled");

export const StaticIpEntry = defineNode({
  name: "ethernet_interface.StaticIpEntry",
  fields: {
    name: field.string({ required: true, description: "Address with optional netmask, e.g. 192.168.1.1/24" }),
  },
});

export const SendHostname = defineNode({
  name: "ethernet_interface.SendHostname",
  fields: {
    enable: field.bool({ default: true }),
    hostname: field.string({ default: "system-hostname", maxLength: 64, pattern: "[a-zA-Z0-9._-]+" }),
  },
});

export const DhcpClient = defineNode({
  name: "ethernet_interface.DhcpClient",
  fields: {
    enable: field.bool({ default: true }),
    create_default_route: field.bool({ default: true }),
    default_route_metric: routeMetric(),
    send_hostname: field.nested(SendHostname),
  },
});

export const PppoeConfig = defineNode({
  name: "ethernet_interface.Pppoe",
  fields: {
    enable: field.bool({ default: true }),
    username: field.string({ required: true, minLength: 1, maxLength: 255 }),
    password: field.string({ required: true, maxLength: 255 }),
    authentication: field.enum(PPPOE_AUTHENTICATION),
    static_address: field.nested(
      defineNode({
        name: "ethernet_interface.PppoeStaticAddress",
        fields: { ip: field.string({ required: true, maxLength: 63 }) },
      }),
    ),
    default_route_metric: routeMetric(),
    access_concentrator: field.string({ minLength: 1, maxLength: 255 }),
    service: field.string({ minLength: 1, maxLength: 255 }),
    passive: field.nested(enableFlag("PppoePassive")),
  },
});

export const ArpEntry = defineNode({
  name: "ethernet_interface.ArpEntry",
  fields: {
    name: field.string({ required: true, description: "IP address" }),
    hw_address: field.string({ description: "MAC address" }),
  },
});

export const DdnsConfig = defineNode({
  name: "ethernet_interface.Ddns",
  fields: {
    ddns_enabled: field.bool({ default: false }),
    ddns_vendor: field.string({ maxLength: 127 }),
    ddns_update_interval: field.int({ min: 1, max: 30, default: 1, description: "Days between updates" }),
    ddns_cert_profile: field.string(),
    ddns_hostname: field.string({ maxLength: 255, pattern: "[a-zA-Z0-9_.\\-]+" }),
    ddns_ip: field.string(),
    ddns_vendor_config: field.string({ maxLength: 255 }),
  },
});

export const AdjustTcpMss = defineNode({
  name: "ethernet_interface.AdjustTcpMss",
  fields: {
    enable: field.bool({ default: false }),
    ipv4_mss_adjustment: field.int({ min: 40, max: 300 }),
    ipv6_mss_adjustment: field.int({ min: 60, max: 300 }),
  },
});

export const PoeConfig = defineNode({
  name: "ethernet_interface.Poe",
  fields: {
    poe_enabled: field.bool({ default: false }),
    poe_rsvd_pwr: field.int({ min: 0, max: 90, default: 0, description: "Reserved power in watts" }),
  },
});

export const EthernetLayer2 = defineNode({
  name: "ethernet_interface.Layer2",
  fields: {
    vlan_tag: field.string({ pattern: VLAN_TAG_PATTERN }),
    lldp: field.nested(LldpConfig),
  },
});

export const EthernetLayer3 = defineNode({
  name: "ethernet_interface.Layer3",
  fields: {
    ip: field.list(field.nested(StaticIpEntry)),
    dhcp_client: field.nested(DhcpClient),
    pppoe: field.nested(PppoeConfig),
    mtu: field.int({ min: 576, max: 9216, default: 1500 }),
    interface_management_profile: field.string({ maxLength: 31 }),
    arp: field.list(field.nested(ArpEntry)),
    ddns_config: field.nested(DdnsConfig),
    adjust_tcp_mss: field.nested(AdjustTcpMss),
    bonjour: field.nested(BonjourConfig),
    ipv6: field.mapping({ description: "IPv6 settings, passed through as given" }),
    lldp: field.nested(LldpConfig),
    ndp_proxy: field.nested(NdpProxyConfig),
    untagged_sub_interface: field.bool(),
  },
  exclusivity: [atMostOne("ip", "dhcp_client", "pppoe")],
});

export const EthernetInterface = defineResourceFamily({
  family: "ethernet_interface",
  fields: {
    name: field.string({ required: true, pattern: "\\$[a-zA-Z0-9_\\-]+", maxLength: 63 }),
    default_value: field.string({ pattern: "ethernet\\d+/\\d+(\\.\\d+)?", description: "Default interface assignment" }),
    comment: field.string({ maxLength: 1023 }),
    link_speed: field.string({ pattern: "auto|10|100|1000|10000|40000|100000", default: "auto" }),
    link_duplex: field.string({ pattern: "auto|half|full", default: "auto" }),
    link_state: field.string({ pattern: "auto|up|down", default: "auto" }),
    poe: field.nested(PoeConfig),
    layer2: field.nested(EthernetLayer2),
    layer3: field.nested(EthernetLayer3),
    tap: field.nested(defineMarker("ethernet_interface.Tap")),
  },
  exclusivity: [atMostOne("layer2", "layer3", "tap")],
});
