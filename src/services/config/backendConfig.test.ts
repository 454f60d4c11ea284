import type { ProfileConfig, ServerDefinition } from '../../types/models.js';
import {
  BackendConfigError,
  UnsupportedProtocolError,
  createStreamSettings,
  generateXrayConfig,
  serverFromProfileConfig,
} from './backendConfig.js';

const p1: ProfileConfig = {
  outbounds: [
    {
      tag: 'proxy',
      protocol: 'vless',
      settings: { vnext: [{ address: 'a.example', port: 443, users: [{ id: 'u1' }] }] },
    },
  ],
};

const server = (overrides: Partial<ServerDefinition> = {}): ServerDefinition => ({
  id: 's1',
  name: 'Server One',
  protocol: 'vless',
  address: 'h.example',
  port: 443,
  uuid: 'u1',
  ...overrides,
});

describe('generateXrayConfig', () => {
  test('builds the full config for a stored vless profile', () => {
    const config = generateXrayConfig(serverFromProfileConfig(p1));

    expect(config).toEqual({
      log: { loglevel: 'info' },
      inbounds: [
        {
          tag: 'socks-in',
          protocol: 'socks',
          listen: '127.0.0.1',
          port: 10805,
          settings: { auth: 'noauth', udp: true },
        },
      ],
      outbounds: [
        {
          tag: 'proxy',
          protocol: 'vless',
          settings: {
            vnext: [{ address: 'a.example', port: 443, users: [{ id: 'u1', encryption: 'none', flow: '' }] }],
          },
          streamSettings: { network: 'tcp', security: 'none' },
        },
        { protocol: 'freedom', tag: 'direct' },
      ],
      routing: {
        domainStrategy: 'AsIs',
        rules: [{ type: 'field', ip: ['geoip:private'], outboundTag: 'direct' }],
      },
    });
  });

  test('is deterministic and returns independent objects', () => {
    const first = generateXrayConfig(server());
    const second = generateXrayConfig(server());
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.outbounds).not.toBe(first.outbounds);
  });

  test('vmess defaults', () => {
    const [proxy] = generateXrayConfig(server({ protocol: 'vmess' })).outbounds;
    expect(proxy.settings).toEqual({
      vnext: [{ address: 'h.example', port: 443, users: [{ id: 'u1', alterId: 0, security: 'auto' }] }],
    });
  });

  test('trojan and shadowsocks use the servers list', () => {
    const trojan = generateXrayConfig(server({ protocol: 'trojan', uuid: undefined, password: 'pw' })).outbounds[0];
    expect(trojan.settings).toEqual({ servers: [{ address: 'h.example', port: 443, password: 'pw' }] });

    const ss = generateXrayConfig(server({ protocol: 'shadowsocks', uuid: undefined, password: 'pw' })).outbounds[0];
    expect(ss.settings).toEqual({
      servers: [{ address: 'h.example', port: 443, method: 'aes-256-gcm', password: 'pw' }],
    });
  });

  test('missing credentials are an error', () => {
    expect(() => generateXrayConfig(server({ uuid: undefined }))).toThrow(BackendConfigError);
    expect(() => generateXrayConfig(server({ protocol: 'trojan' }))).toThrow('trojan server "Server One" requires a password');
  });

  test('unknown protocols are rejected', () => {
    expect(() => generateXrayConfig(server({ protocol: 'wireguard' }))).toThrow(UnsupportedProtocolError);
    expect(() => generateXrayConfig(server({ protocol: 'wireguard' }))).toThrow('Unsupported protocol: wireguard');
  });

  test('vpn mode enables sniffing on the inbound', () => {
    const [inbound] = generateXrayConfig(server(), { mode: 'vpn' }).inbounds;
    expect(inbound.sniffing).toEqual({ enabled: true, destOverride: ['http', 'tls'] });

    const [proxyInbound] = generateXrayConfig(server(), { mode: 'proxy' }).inbounds;
    expect(proxyInbound.sniffing).toBeUndefined();
  });

  test('extra rules come before the private-ip rule and add a block outbound when needed', () => {
    const config = generateXrayConfig(server(), {
      routingRules: [
        { type: 'field', outboundTag: 'direct', domain: ['domain:lan'] },
        { type: 'field', outboundTag: 'block', domain: ['geosite:category-ads-all'] },
      ],
    });

    expect(config.routing.rules.map(rule => rule.outboundTag)).toEqual(['direct', 'block', 'direct']);
    expect(config.routing.rules[2]).toEqual({ type: 'field', ip: ['geoip:private'], outboundTag: 'direct' });
    expect(config.outbounds.map(o => o.tag)).toEqual(['proxy', 'direct', 'block']);
  });

  test('the private-ip rule can be left out', () => {
    expect(generateXrayConfig(server(), { directPrivateIps: false }).routing.rules).toEqual([]);
  });

  test('dns servers without domains are plain addresses', () => {
    const config = generateXrayConfig(server(), {
      dns: [
        { address: '1.1.1.1', protocol: 'udp', domains: [] },
        { address: '8.8.8.8', protocol: 'udp', domains: ['geosite:google'] },
      ],
    });
    expect(config.dns).toEqual({
      servers: ['1.1.1.1', { address: '8.8.8.8', domains: ['geosite:google'] }],
      queryStrategy: 'UseIPv4',
    });
  });

  test('uses the given inbound and log level', () => {
    const config = generateXrayConfig(server(), {
      inbound: { listen: '0.0.0.0', port: 2080, protocol: 'http' },
      logLevel: 'warning',
    });
    expect(config.log.loglevel).toBe('warning');
    expect(config.inbounds[0]).toMatchObject({ listen: '0.0.0.0', port: 2080, protocol: 'http' });
  });
});

describe('createStreamSettings', () => {
  test('tls over websocket', () => {
    expect(createStreamSettings(server({ network: 'ws', tls: 'tls', path: '/ws' }))).toEqual({
      network: 'ws',
      security: 'tls',
      tlsSettings: { serverName: 'h.example', allowInsecure: false },
      wsSettings: { path: '/ws', headers: {} },
    });
  });

  test('grpc uses the sni as server name', () => {
    expect(createStreamSettings(server({ network: 'grpc', tls: 'tls', sni: 'sni.example', service_name: 'svc' }))).toEqual({
      network: 'grpc',
      security: 'tls',
      tlsSettings: { serverName: 'sni.example', allowInsecure: false },
      grpcSettings: { serviceName: 'svc' },
    });
  });

  test('h2 defaults', () => {
    expect(createStreamSettings(server({ network: 'h2' }))).toEqual({
      network: 'h2',
      security: 'none',
      httpSettings: { host: [], path: '/' },
    });
  });
});

describe('serverFromProfileConfig', () => {
  test('flattens a trojan outbound with transport settings', () => {
    const config: ProfileConfig = {
      outbounds: [
        { protocol: 'freedom', tag: 'direct' },
        {
          tag: 'proxy',
          protocol: 'trojan',
          settings: { servers: [{ address: 't.example', port: '8443', password: 'pw' }] },
          streamSettings: {
            network: 'ws',
            security: 'tls',
            tlsSettings: { serverName: 'sni.t', allowInsecure: true },
            wsSettings: { path: '/t', headers: { Host: 'cdn.t' } },
          },
        },
      ],
    };

    expect(serverFromProfileConfig(config, 'x', 'Trojan')).toEqual({
      id: 'x',
      name: 'Trojan',
      protocol: 'trojan',
      address: 't.example',
      port: 8443,
      password: 'pw',
      network: 'ws',
      tls: 'tls',
      sni: 'sni.t',
      allow_insecure: true,
      path: '/t',
      headers: { Host: 'cdn.t' },
    });
  });

  test('rejects stream security it cannot reproduce', () => {
    const config: ProfileConfig = {
      outbounds: [{ ...p1.outbounds[0], streamSettings: { network: 'tcp', security: 'reality' } }],
    };
    expect(() => serverFromProfileConfig(config)).toThrow('Unsupported stream security: reality');
  });

  test('rejects outbounds that are not proxies', () => {
    expect(() => serverFromProfileConfig({ outbounds: [{ protocol: 'freedom', tag: 'proxy' }] })).toThrow('Unsupported protocol: freedom');
    expect(() => serverFromProfileConfig({ outbounds: [{ protocol: 'freedom' }] })).toThrow('No valid proxy outbound in profile');
    expect(() => serverFromProfileConfig({ outbounds: [] })).toThrow('No valid proxy outbound in profile');
  });
});
