import type {
  DnsServer,
  XrayConfig,
  XrayInbound,
  XrayLogLevel,
  XrayOutbound,
  XrayRoutingRule,
} from '../../types/models.js';

type QueryStrategy = 'UseIPv4' | 'UseIPv6' | 'UseIP';

export class XrayConfigBuilder {
  private config: XrayConfig = {
    log: {
      loglevel: 'info',
    },
    inbounds: [],
    outbounds: [],
    routing: {
      domainStrategy: 'AsIs',
      rules: [],
    },
  };

  setLogLevel(level: XrayLogLevel) {
    this.config.log.loglevel = level;
    return this;
  }

  /** Servers without domain restrictions are emitted as plain addresses. */
  setDns(servers: DnsServer[], queryStrategy: QueryStrategy = 'UseIPv4') {
    this.config.dns = {
      servers: servers.map(server =>
        server.domains.length > 0 ? { address: server.address, domains: [...server.domains] } : server.address,
      ),
      queryStrategy,
    };
    return this;
  }

  addInbound(inbound: XrayInbound) {
    this.config.inbounds.push(inbound);
    return this;
  }

  addOutbound(outbound: XrayOutbound) {
    this.config.outbounds.push(outbound);
    return this;
  }

  addRules(rules: XrayRoutingRule[]) {
    this.config.routing.rules.push(...rules);
    return this;
  }

  addPrivateIpDirect() {
    this.config.routing.rules.push({
      type: 'field',
      ip: ['geoip:private'],
      outboundTag: 'direct',
    });
    return this;
  }

  /** Returns a fresh copy; later builder calls do not leak into it. */
  build(): XrayConfig {
    return structuredClone(this.config);
  }
}
