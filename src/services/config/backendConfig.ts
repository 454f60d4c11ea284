import { isRecord } from '../../db/jsonStore.js';
import { isProtocol } from '../../types/models.js';
import type {
  ConnectionMode,
  DnsServer,
  InboundSettings,
  Network,
  ProfileConfig,
  ServerDefinition,
  XrayConfig,
  XrayInbound,
  XrayLogLevel,
  XrayOutbound,
  XrayRoutingRule,
  XrayStreamSettings,
} from '../../types/models.js';
import { getProxyOutbound } from '../../utils/validators.js';
import { DEFAULT_INBOUND } from '../../db/appConfig.js';
import { XrayConfigBuilder } from './XrayConfigBuilder.js';

export class BackendConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendConfigError';
  }
}

export class UnsupportedProtocolError extends BackendConfigError {
  constructor(readonly protocol: string) {
    super(`Unsupported protocol: ${protocol || '(none)'}`);
    this.name = 'UnsupportedProtocolError';
  }
}

export interface BackendConfigOptions {
  inbound?: InboundSettings;
  logLevel?: XrayLogLevel;
  /** vpn mode turns on sniffing so a TUN front end sees domain names. */
  mode?: ConnectionMode;
  routingRules?: XrayRoutingRule[];
  dns?: DnsServer[];
  directPrivateIps?: boolean;
}

const NETWORKS: readonly Network[] = ['tcp', 'ws', 'grpc', 'h2'];

const toNetwork = (value: string | undefined): Network => {
  if (value === undefined || value === '') return 'tcp';
  const network = NETWORKS.find(n => n === value);
  if (!network) {
    throw new BackendConfigError(`Unsupported network: ${value}`);
  }
  return network;
};

export const createStreamSettings = (server: ServerDefinition): XrayStreamSettings => {
  const network = toNetwork(server.network);
  const security = server.tls === 'tls' ? 'tls' : 'none';
  const stream: XrayStreamSettings = { network, security };

  if (security === 'tls') {
    stream.tlsSettings = {
      serverName: server.sni || server.address,
      allowInsecure: server.allow_insecure ?? false,
    };
  }

  switch (network) {
    case 'ws':
      stream.wsSettings = { path: server.path || '/', headers: { ...(server.headers ?? {}) } };
      break;
    case 'grpc':
      stream.grpcSettings = { serviceName: server.service_name || '' };
      break;
    case 'h2':
      stream.httpSettings = { host: [...(server.host ?? [])], path: server.path || '/' };
      break;
    case 'tcp':
      break;
  }
  return stream;
};

const requireField = (server: ServerDefinition, value: string | undefined, field: string): string => {
  if (!value) {
    throw new BackendConfigError(`${server.protocol} server "${server.name}" requires ${field}`);
  }
  return value;
};

/** Builds the outbound tagged `proxy`. Unknown protocols are rejected. */
export const createOutbound = (server: ServerDefinition): XrayOutbound => {
  const { address, port } = server;
  const base = { tag: 'proxy', protocol: server.protocol, streamSettings: createStreamSettings(server) };

  switch (server.protocol) {
    case 'vless':
      return {
        ...base,
        settings: {
          vnext: [{
            address,
            port,
            users: [{
              id: requireField(server, server.uuid, 'a uuid'),
              encryption: server.encryption || 'none',
              flow: server.flow || '',
            }],
          }],
        },
      };
    case 'vmess':
      return {
        ...base,
        settings: {
          vnext: [{
            address,
            port,
            users: [{
              id: requireField(server, server.uuid, 'a uuid'),
              alterId: server.alter_id ?? 0,
              security: server.security || 'auto',
            }],
          }],
        },
      };
    case 'trojan':
      return {
        ...base,
        settings: {
          servers: [{ address, port, password: requireField(server, server.password, 'a password') }],
        },
      };
    case 'shadowsocks':
      return {
        ...base,
        settings: {
          servers: [{
            address,
            port,
            method: server.method || 'aes-256-gcm',
            password: requireField(server, server.password, 'a password'),
          }],
        },
      };
    default:
      throw new UnsupportedProtocolError(server.protocol);
  }
};

export const createInbound = (inbound: InboundSettings, mode?: ConnectionMode): XrayInbound => {
  const result: XrayInbound = {
    tag: 'socks-in',
    protocol: inbound.protocol,
    listen: inbound.listen,
    port: inbound.port,
    settings: { auth: 'noauth', udp: true },
  };
  if (mode === 'vpn') {
    result.sniffing = { enabled: true, destOverride: ['http', 'tls'] };
  }
  return result;
};

/**
 * Maps a server definition to a complete backend configuration. Pure: the
 * same arguments always give an equal structure and nothing is read from
 * disk or network.
 */
export const generateXrayConfig = (server: ServerDefinition, options: BackendConfigOptions = {}): XrayConfig => {
  const extraRules = options.routingRules ?? [];
  const builder = new XrayConfigBuilder()
    .setLogLevel(options.logLevel ?? 'info')
    .addInbound(createInbound(options.inbound ?? DEFAULT_INBOUND, options.mode))
    .addOutbound(createOutbound(server))
    .addOutbound({ protocol: 'freedom', tag: 'direct' })
    .addRules(extraRules);

  if (extraRules.some(rule => rule.outboundTag === 'block')) {
    builder.addOutbound({ protocol: 'blackhole', tag: 'block' });
  }
  if (options.directPrivateIps ?? true) {
    builder.addPrivateIpDirect();
  }
  if (options.dns && options.dns.length > 0) {
    builder.setDns(options.dns);
  }
  return builder.build();
};

/** A stored profile document holding the server's proxy outbound and a direct outbound. */
export const profileConfigFromServer = (server: ServerDefinition): ProfileConfig => ({
  remarks: server.name,
  outbounds: [createOutbound(server), { protocol: 'freedom', tag: 'direct' }],
});

// ---------------------------------------------------------------------------
// Profile documents -> server definitions
// ---------------------------------------------------------------------------

const str = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const num = (value: unknown): number | undefined => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
};

const firstRecord = (value: unknown): Record<string, unknown> | undefined => {
  if (!Array.isArray(value)) return undefined;
  const first: unknown = value[0];
  return isRecord(first) ? first : undefined;
};

const recordOf = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

const stringRecord = (value: unknown): Record<string, string> | undefined => {
  if (!isRecord(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
};

const stringList = (value: unknown): string[] | undefined => {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return undefined;
};

/** Copies the defined values of `extra` onto `server`. */
const assignDefined = (server: ServerDefinition, extra: Partial<ServerDefinition>): ServerDefinition => {
  const result: ServerDefinition = { ...server };
  for (const [key, value] of Object.entries(extra)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
};

/**
 * Flattens the proxy outbound of a profile document (an Xray JSON config)
 * into a server definition.
 */
export const serverFromProfileConfig = (config: ProfileConfig, id = 'profile', name = 'Profile'): ServerDefinition => {
  const outbound = getProxyOutbound(config);
  if (!outbound) {
    throw new BackendConfigError('No valid proxy outbound in profile');
  }
  const protocol = outbound.protocol ?? '';
  if (!isProtocol(protocol)) {
    throw new UnsupportedProtocolError(protocol);
  }

  const settings = recordOf(outbound.settings);
  const endpoint = firstRecord(settings.vnext) ?? firstRecord(settings.servers) ?? {};
  const user = firstRecord(endpoint.users) ?? {};

  const address = str(endpoint.address) ?? str(outbound.address);
  const port = num(endpoint.port) ?? num(outbound.port);
  if (!address || port === undefined) {
    throw new BackendConfigError('Profile outbound has no server address or port');
  }

  const stream = recordOf(outbound.streamSettings);
  const security = str(stream.security) ?? 'none';
  if (security !== 'none' && security !== 'tls') {
    throw new BackendConfigError(`Unsupported stream security: ${security}`);
  }
  const tlsSettings = recordOf(stream.tlsSettings);
  const ws = recordOf(stream.wsSettings);
  const grpc = recordOf(stream.grpcSettings);
  const http = recordOf(stream.httpSettings);
  const allowInsecure = tlsSettings.allowInsecure;

  return assignDefined({ id, name, protocol, address, port }, {
    uuid: str(user.id),
    encryption: str(user.encryption),
    flow: str(user.flow),
    alter_id: num(user.alterId),
    security: str(user.security),
    password: str(endpoint.password),
    method: str(endpoint.method),
    network: toNetwork(str(stream.network)),
    tls: security,
    sni: str(tlsSettings.serverName),
    allow_insecure: typeof allowInsecure === 'boolean' ? allowInsecure : undefined,
    path: str(ws.path) ?? str(http.path),
    headers: stringRecord(ws.headers),
    service_name: str(grpc.serviceName),
    host: stringList(http.host),
  });
};
