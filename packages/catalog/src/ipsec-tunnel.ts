/**
 * IPsec Tunnels
 */

import { atMostOne, defineNode, defineResourceFamily, field } from "@netschema/core";

export const PortPair = defineNode({
  name: "ipsec_tunnel.PortPair",
  fields: {
    local_port: field.int({ min: 0, max: 65535, default: 0 }),
    remote_port: field.int({ min: 0, max: 65535, default: 0 }),
  },
});

export const ProxyIdProtocol = defineNode({
  name: "ipsec_tunnel.ProxyIdProtocol",
  fields: {
    number: field.int({ min: 1, max: 254, description: "IP protocol number" }),
    tcp: field.nested(PortPair),
    udp: field.nested(PortPair),
  },
  exclusivity: [atMostOne("number", "tcp", "udp")],
});

export const ProxyId = defineNode({
  name: "ipsec_tunnel.ProxyId",
  fields: {
    name: field.string({ required: true }),
    local: field.string(),
    remote: field.string(),
    protocol: field.nested(ProxyIdProtocol),
  },
});

export const AutoKey = defineNode({
  name: "ipsec_tunnel.AutoKey",
  fields: {
    ike_gateway: field.list(
      field.nested(
        defineNode({
          name: "ipsec_tunnel.IkeGatewayRef",
          fields: { name: field.string({ required: true }) },
        }),
      ),
      { required: true, minItems: 1 },
    ),
    ipsec_crypto_profile: field.string({ required: true }),
    proxy_id: field.list(field.nested(ProxyId)),
    proxy_id_v6: field.list(field.nested(ProxyId)),
  },
});

export const TunnelMonitor = defineNode({
  name: "ipsec_tunnel.TunnelMonitor",
  fields: {
    enable: field.bool({ default: true }),
    destination_ip: field.string({ required: true }),
    proxy_id: field.string(),
  },
});

export const IpsecTunnel = defineResourceFamily({
  family: "ipsec_tunnel",
  fields: {
    name: field.string({ required: true, maxLength: 63 }),
    auto_key: field.nested(AutoKey, { required: true }),
    anti_replay: field.bool(),
    copy_tos: field.bool({ default: false }),
    enable_gre_encapsulation: field.bool({ default: false }),
    tunnel_monitor: field.nested(TunnelMonitor),
  },
});
