/**
 * NAT Rules
 *
 * Source translation is a three-way choice (dynamic IP and port, dynamic IP,
 * static IP); dynamic IP and port itself picks between an address list and
 * an interface address. Two cross-field rules guard combinations the
 * firewall refuses.
 */

import { BaseNodeRule, atMostOne, defineNode, defineResourceFamily, exactlyOne, field } from "@netschema/core";
import type { ValidatedTree } from "@netschema/core";
import { description, memberList, objectName, tagList } from "./common";

export const NAT_TYPES = {
  IPV4: "ipv4",
  NAT64: "nat64",
  NPTV6: "nptv6",
} as const;

export const BI_DIRECTIONAL = {
  YES: "yes",
  NO: "no",
} as const;

export const DNS_REWRITE_DIRECTIONS = {
  FORWARD: "forward",
  REVERSE: "reverse",
} as const;

export const InterfaceAddress = defineNode({
  name: "nat_rule.InterfaceAddress",
  fields: {
    interface: field.string({ required: true, description: "Egress interface" }),
    ip: field.string({ description: "Interface IP address" }),
    floating_ip: field.string({ description: "Floating IP for HA pairs" }),
  },
  exclusivity: [atMostOne("ip", "floating_ip")],
});

export const DynamicIpAndPort = defineNode({
  name: "nat_rule.DynamicIpAndPort",
  fields: {
    translated_address: field.list(field.string(), { minItems: 1 }),
    interface_address: field.nested(InterfaceAddress),
  },
  exclusivity: [exactlyOne("translated_address", "interface_address")],
});

export const DynamicIpFallback = defineNode({
  name: "nat_rule.DynamicIpFallback",
  fields: {
    translated_address: field.list(field.string()),
    interface_address: field.nested(InterfaceAddress),
  },
  exclusivity: [atMostOne("translated_address", "interface_address")],
});

export const DynamicIp = defineNode({
  name: "nat_rule.DynamicIp",
  fields: {
    translated_address: field.list(field.string(), { required: true, minItems: 1 }),
    fallback: field.nested(DynamicIpFallback),
  },
});

export const StaticIp = defineNode({
  name: "nat_rule.StaticIp",
  fields: {
    translated_address: field.string({ required: true }),
    bi_directional: field.enum(BI_DIRECTIONAL, {
      booleanValues: { true: BI_DIRECTIONAL.YES, false: BI_DIRECTIONAL.NO },
      description: "Create the reverse mapping as well",
    }),
  },
});

export const SourceTranslation = defineNode({
  name: "nat_rule.SourceTranslation",
  fields: {
    dynamic_ip_and_port: field.nested(DynamicIpAndPort),
    dynamic_ip: field.nested(DynamicIp),
    static_ip: field.nested(StaticIp),
  },
  exclusivity: [exactlyOne("dynamic_ip_and_port", "dynamic_ip", "static_ip")],
});

export const DnsRewrite = defineNode({
  name: "nat_rule.DnsRewrite",
  fields: {
    direction: field.enum(DNS_REWRITE_DIRECTIONS, { required: true }),
  },
});

export const DestinationTranslation = defineNode({
  name: "nat_rule.DestinationTranslation",
  fields: {
    translated_address: field.string(),
    translated_port: field.int({ min: 1, max: 65535 }),
    dns_rewrite: field.nested(DnsRewrite),
  },
});

export class DnsRewriteWithNat64Rule extends BaseNodeRule {
  readonly id = "nat_dns_rewrite_nat64";
  readonly description = "DNS rewrite is not available with NAT64 rules";
  readonly field = "destination_translation";

  check(tree: ValidatedTree): string | undefined {
    const isNat64 = tree.getEnum("nat_type")?.value === NAT_TYPES.NAT64;
    const rewrite = tree.getTree("destination_translation")?.getTree("dns_rewrite");
    return isNat64 && rewrite !== undefined ? this.fail() : this.pass();
  }
}

export class BiDirectionalDestinationRule extends BaseNodeRule {
  readonly id = "nat_bi_directional_destination";
  readonly description =
    "Bi-directional static NAT cannot be used with destination translation in the same rule";
  readonly field = "source_translation";

  check(tree: ValidatedTree): string | undefined {
    const staticIp = tree.getTree("source_translation")?.getTree("static_ip");
    const biDirectional = staticIp?.getEnum("bi_directional")?.value === BI_DIRECTIONAL.YES;
    return biDirectional && tree.has("destination_translation") ? this.fail() : this.pass();
  }
}

export const NatRule = defineResourceFamily({
  family: "nat_rule",
  fields: {
    name: objectName(),
    description: description(),
    tag: tagList(),
    disabled: field.bool({ default: false }),
    nat_type: field.enum(NAT_TYPES, { default: NAT_TYPES.IPV4 }),
    from_: { ...memberList("Source zones"), alias: "from" },
    to_: { ...memberList("Destination zones"), alias: "to" },
    to_interface: field.string({ description: "Destination interface of the original packet" }),
    source: memberList("Source addresses"),
    destination: memberList("Destination addresses"),
    service: field.string({ default: "any" }),
    source_translation: field.nested(SourceTranslation),
    destination_translation: field.nested(DestinationTranslation),
    active_active_device_binding: field.string(),
  },
  rules: [new DnsRewriteWithNat64Rule(), new BiDirectionalDestinationRule()],
});
