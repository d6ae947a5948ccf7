/**
 * DNS Proxies
 *
 * Several fields travel with hyphenated names on the wire
 * (`domain-servers`, `static-entries`, `max-ttl`, ...); they are declared
 * under snake_case names with the hyphenated form as alias.
 */

import { defineNode, defineResourceFamily, field } from "@netschema/core";

export const DnsProxyDefaultServer = defineNode({
  name: "dns_proxy.DefaultServer",
  fields: {
    inheritance: field.mapping({ description: "Inherit servers from a source" }),
    primary: field.string({ required: true }),
    secondary: field.string(),
  },
});

export const DnsProxyDomainServer = defineNode({
  name: "dns_proxy.DomainServer",
  fields: {
    name: field.string({ required: true }),
    cacheable: field.bool(),
    domain_name: field.list(field.string(), { alias: "domain-name", coerceScalar: true }),
    primary: field.string({ required: true }),
    secondary: field.string(),
  },
});

export const DnsProxyStaticEntry = defineNode({
  name: "dns_proxy.StaticEntry",
  fields: {
    name: field.string({ required: true, maxLength: 31 }),
    domain: field.string({ required: true, maxLength: 255 }),
    address: field.list(field.string(), { required: true, minItems: 1 }),
  },
});

export const DnsProxyTcpQueries = defineNode({
  name: "dns_proxy.TcpQueries",
  fields: {
    enabled: field.bool({ required: true }),
    max_pending_requests: field.int({ alias: "max-pending-requests", min: 64, max: 256 }),
  },
});

export const DnsProxyUdpRetries = defineNode({
  name: "dns_proxy.UdpRetries",
  fields: {
    interval: field.int({ min: 1, max: 30, description: "Seconds between retries" }),
    attempts: field.int({ min: 1, max: 30 }),
  },
});

export const DnsProxyUdpQueries = defineNode({
  name: "dns_proxy.UdpQueries",
  fields: {
    retries: field.nested(DnsProxyUdpRetries),
  },
});

export const DnsProxyMaxTtl = defineNode({
  name: "dns_proxy.MaxTtl",
  fields: {
    enabled: field.bool({ required: true }),
    time_to_live: field.int({ alias: "time-to-live", min: 60, max: 86400 }),
  },
});

export const DnsProxyCache = defineNode({
  name: "dns_proxy.Cache",
  fields: {
    enabled: field.bool({ required: true }),
    cache_edns: field.bool({ alias: "cache-edns" }),
    max_ttl: field.nested(DnsProxyMaxTtl, { alias: "max-ttl" }),
  },
});

export const DnsProxy = defineResourceFamily({
  family: "dns_proxy",
  fields: {
    name: field.string({ required: true, maxLength: 31 }),
    enabled: field.bool(),
    default: field.nested(DnsProxyDefaultServer),
    interface: field.list(field.string(), { uniqueItems: true }),
    domain_servers: field.list(field.nested(DnsProxyDomainServer), { alias: "domain-servers" }),
    static_entries: field.list(field.nested(DnsProxyStaticEntry), { alias: "static-entries" }),
    tcp_queries: field.nested(DnsProxyTcpQueries, { alias: "tcp-queries" }),
    udp_queries: field.nested(DnsProxyUdpQueries, { alias: "udp-queries" }),
    cache: field.nested(DnsProxyCache),
  },
});
