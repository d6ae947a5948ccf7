/**
 * Resource Schema Catalog
 *
 * Every resource family the validator knows about. `buildCatalog()` registers
 * all four variants of each family into the shared default registry (or the
 * one given) and seals it, so a `TreeValidator` built without a registry
 * resolves catalog schemas.
 */

import { defaultRegistry, silentLogger } from "@netschema/core";
import type { ResourceFamily, SchemaRegistry, ValidatorLogger } from "@netschema/core";
import { BgpRouteMap } from "./bgp-route-map";
import { BgpRouteMapRedistribution } from "./bgp-route-map-redistribution";
import { DnsProxy } from "./dns-proxy";
import { EthernetInterface } from "./ethernet-interface";
import { IpsecTunnel } from "./ipsec-tunnel";
import { LogicalRouter } from "./logical-router";
import { NatRule } from "./nat-rule";
import { PbfRule } from "./pbf-rule";
import { ServiceGroup } from "./service-group";
import { ZoneProtectionProfile } from "./zone-protection-profile";

export * from "./common";
export * from "./nat-rule";
export * from "./pbf-rule";
export * from "./dns-proxy";
export * from "./bgp-route-map";
export * from "./bgp-route-map-redistribution";
export * from "./logical-router";
export * from "./service-group";
export * from "./ipsec-tunnel";
export * from "./ethernet-interface";
export * from "./zone-protection-profile";

export const ALL_FAMILIES: readonly ResourceFamily[] = Object.freeze([
  NatRule,
  PbfRule,
  DnsProxy,
  BgpRouteMap,
  BgpRouteMapRedistribution,
  LogicalRouter,
  ServiceGroup,
  IpsecTunnel,
  EthernetInterface,
  ZoneProtectionProfile,
]);

export function buildCatalog(
  logger: ValidatorLogger = silentLogger,
  registry: SchemaRegistry = defaultRegistry,
): SchemaRegistry {
  // Registering an identical schema again is a no-op, even once sealed.
  for (const family of ALL_FAMILIES) {
    registry.registerFamily(family);
  }
  logger.info(`schema catalog ready: ${ALL_FAMILIES.length} families, ${registry.size} schemas`);
  return registry.seal();
}
