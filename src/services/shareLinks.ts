import { v4 as uuidv4 } from 'uuid';
import { isRecord } from '../db/jsonStore.js';
import type { Network, ServerDefinition } from '../types/models.js';
import debugLogger from './debugLogger.js';

export class ShareLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShareLinkError';
  }
}

export const SHARE_LINK_SCHEMES = ['vless://', 'vmess://', 'trojan://', 'ss://'] as const;

const NETWORKS: readonly Network[] = ['tcp', 'ws', 'grpc', 'h2'];

const toNetwork = (value: string | null | undefined): Network | undefined => {
  if (!value) return undefined;
  const normalized = value === 'http' ? 'h2' : value;
  const network = NETWORKS.find(n => n === normalized);
  if (!network) {
    throw new ShareLinkError(`Unsupported transport: ${value}`);
  }
  return network;
};

const decodeBase64 = (value: string): string => {
  const normalized = value.replace(/-/g, '+').replace(/_/g, '/');
  return Buffer.from(normalized, 'base64').toString('utf-8');
};

const encodeBase64 = (value: string): string => Buffer.from(value, 'utf-8').toString('base64');

const decodeName = (hash: string, fallback: string): string => {
  const raw = hash.startsWith('#') ? hash.slice(1) : hash;
  if (!raw) return fallback;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
};

const hostOf = (url: URL): string => url.hostname.replace(/^\[(.*)\]$/, '$1');

const portOf = (value: string | number | undefined, fallback = 443): number => {
  const port = typeof value === 'number' ? value : parseInt(value ?? '', 10);
  return Number.isInteger(port) && port > 0 ? port : fallback;
};

/** Drops undefined and empty-string fields so definitions compare cleanly. */
const compact = (server: ServerDefinition): ServerDefinition => {
  const result: ServerDefinition = { id: server.id, name: server.name, protocol: server.protocol, address: server.address, port: server.port };
  for (const [key, value] of Object.entries(server)) {
    if (value !== undefined && value !== '') {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
};

/** Transport and TLS fields shared by the URL-style links. */
const streamFromQuery = (params: URLSearchParams, defaultTls: boolean): Partial<ServerDefinition> => {
  const network = toNetwork(params.get('type'));
  const security = params.get('security');
  const tls = security === 'tls' || (security === null && defaultTls) ? 'tls' : undefined;
  const host = params.get('host') ?? undefined;

  const stream: Partial<ServerDefinition> = {
    network,
    tls,
    sni: params.get('sni') ?? undefined,
    path: params.get('path') ?? undefined,
    service_name: params.get('serviceName') ?? undefined,
  };
  if (params.get('allowInsecure') === '1' || params.get('allowInsecure') === 'true') {
    stream.allow_insecure = true;
  }
  if (host && network === 'ws') {
    stream.headers = { Host: host };
  } else if (host && network === 'h2') {
    stream.host = host.split(',').map(h => h.trim()).filter(Boolean);
  }
  return stream;
};

const parseVless = (link: string, id: string): ServerDefinition => {
  const url = new URL(link);
  const uuid = decodeURIComponent(url.username);
  if (!uuid) throw new ShareLinkError('vless link has no user id');
  return compact({
    id,
    name: decodeName(url.hash, 'VLESS Server'),
    protocol: 'vless',
    address: hostOf(url),
    port: portOf(url.port),
    uuid,
    encryption: url.searchParams.get('encryption') ?? 'none',
    flow: url.searchParams.get('flow') ?? undefined,
    ...streamFromQuery(url.searchParams, false),
  });
};

const parseTrojan = (link: string, id: string): ServerDefinition => {
  const url = new URL(link);
  const password = decodeURIComponent(url.username);
  if (!password) throw new ShareLinkError('trojan link has no password');
  return compact({
    id,
    name: decodeName(url.hash, 'Trojan Server'),
    protocol: 'trojan',
    address: hostOf(url),
    port: portOf(url.port),
    password,
    ...streamFromQuery(url.searchParams, true),
  });
};

const field = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
};

const parseVmess = (link: string, id: string): ServerDefinition => {
  const decoded: unknown = JSON.parse(decodeBase64(link.slice('vmess://'.length)));
  if (!isRecord(decoded)) throw new ShareLinkError('vmess link is not a JSON object');

  const address = field(decoded, 'add');
  const uuid = field(decoded, 'id');
  if (!address || !uuid) throw new ShareLinkError('vmess link needs an address and a user id');

  const network = toNetwork(field(decoded, 'net'));
  const host = field(decoded, 'host');
  const server: ServerDefinition = {
    id,
    name: field(decoded, 'ps') || 'VMess Server',
    protocol: 'vmess',
    address,
    port: portOf(field(decoded, 'port')),
    uuid,
    alter_id: portOf(field(decoded, 'aid'), 0),
    security: field(decoded, 'scy') || 'auto',
    network,
    tls: field(decoded, 'tls') === 'tls' ? 'tls' : undefined,
    sni: field(decoded, 'sni'),
    path: network === 'grpc' ? undefined : field(decoded, 'path'),
    service_name: network === 'grpc' ? field(decoded, 'path') : undefined,
  };
  if (host && network === 'ws') {
    server.headers = { Host: host };
  } else if (host && network === 'h2') {
    server.host = host.split(',').map(h => h.trim()).filter(Boolean);
  }
  return compact(server);
};

// Either base64 of method:password or the percent-encoded pair itself.
const decodeUserInfo = (raw: string): string => {
  const plain = decodeURIComponent(raw);
  if (plain.includes(':')) return plain;
  return decodeBase64(plain);
};

const parseShadowsocks = (link: string, id: string): ServerDefinition => {
  const hashIndex = link.indexOf('#');
  const name = decodeName(hashIndex === -1 ? '' : link.slice(hashIndex), 'Shadowsocks Server');
  const body = (hashIndex === -1 ? link : link.slice(0, hashIndex)).slice('ss://'.length);

  // ss://base64(method:password)@host:port, or the older ss://base64(method:password@host:port)
  const at = body.lastIndexOf('@');
  const userInfo = at === -1 ? decodeBase64(body.split('?')[0] ?? '') : '';
  const credentials = at === -1 ? userInfo.slice(0, userInfo.lastIndexOf('@')) : decodeUserInfo(body.slice(0, at));
  const endpoint = at === -1 ? userInfo.slice(userInfo.lastIndexOf('@') + 1) : body.slice(at + 1).split(/[?/]/)[0] ?? '';

  const separator = credentials.indexOf(':');
  const portSeparator = endpoint.lastIndexOf(':');
  if (separator === -1 || portSeparator === -1) {
    throw new ShareLinkError('Malformed ss link');
  }
  return compact({
    id,
    name,
    protocol: 'shadowsocks',
    address: endpoint.slice(0, portSeparator).replace(/^\[(.*)\]$/, '$1'),
    port: portOf(endpoint.slice(portSeparator + 1)),
    method: credentials.slice(0, separator),
    password: credentials.slice(separator + 1),
  });
};

export const isShareLink = (value: string): boolean =>
  SHARE_LINK_SCHEMES.some(scheme => value.trim().toLowerCase().startsWith(scheme));

/** Parses a share link into a server definition, or null when it is not usable. */
export const parseShareLink = (link: string, id: string = uuidv4()): ServerDefinition | null => {
  const value = link.trim();
  try {
    const scheme = value.slice(0, value.indexOf('://') + 3).toLowerCase();
    switch (scheme) {
      case 'vless://':
        return parseVless(value, id);
      case 'vmess://':
        return parseVmess(value, id);
      case 'trojan://':
        return parseTrojan(value, id);
      case 'ss://':
        return parseShadowsocks(value, id);
      default:
        debugLogger.warn('ShareLinks', `Unsupported share link scheme: ${scheme || value.slice(0, 10)}`);
        return null;
    }
  } catch (error) {
    debugLogger.warn('ShareLinks', 'Error parsing share link', {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
};

const queryFromStream = (server: ServerDefinition, params: URLSearchParams): void => {
  const network = server.network ?? 'tcp';
  params.set('type', network);
  params.set('security', server.tls === 'tls' ? 'tls' : 'none');
  if (server.sni) params.set('sni', server.sni);
  if (server.allow_insecure) params.set('allowInsecure', '1');
  if (network === 'ws') {
    if (server.path) params.set('path', server.path);
    const host = server.headers?.Host;
    if (host) params.set('host', host);
  } else if (network === 'h2') {
    if (server.path) params.set('path', server.path);
    if (server.host && server.host.length > 0) params.set('host', server.host.join(','));
  } else if (network === 'grpc' && server.service_name) {
    params.set('serviceName', server.service_name);
  }
};

const formatHost = (address: string): string => (address.includes(':') ? `[${address}]` : address);

/** Formats a server definition as a share link. */
export const toShareLink = (server: ServerDefinition): string => {
  const name = encodeURIComponent(server.name);
  const endpoint = `${formatHost(server.address)}:${server.port}`;

  switch (server.protocol) {
    case 'vless': {
      const params = new URLSearchParams();
      params.set('encryption', server.encryption || 'none');
      if (server.flow) params.set('flow', server.flow);
      queryFromStream(server, params);
      return `vless://${encodeURIComponent(server.uuid ?? '')}@${endpoint}?${params.toString()}#${name}`;
    }
    case 'trojan': {
      const params = new URLSearchParams();
      queryFromStream(server, params);
      return `trojan://${encodeURIComponent(server.password ?? '')}@${endpoint}?${params.toString()}#${name}`;
    }
    case 'vmess': {
      const network = server.network ?? 'tcp';
      const body = {
        v: '2',
        ps: server.name,
        add: server.address,
        port: String(server.port),
        id: server.uuid ?? '',
        aid: String(server.alter_id ?? 0),
        scy: server.security || 'auto',
        net: network,
        type: 'none',
        host: network === 'h2' ? (server.host ?? []).join(',') : server.headers?.Host ?? '',
        path: network === 'grpc' ? server.service_name ?? '' : server.path ?? '',
        tls: server.tls === 'tls' ? 'tls' : '',
        sni: server.sni ?? '',
      };
      return `vmess://${encodeBase64(JSON.stringify(body))}`;
    }
    case 'shadowsocks': {
      const userInfo = encodeBase64(`${server.method || 'aes-256-gcm'}:${server.password ?? ''}`);
      return `ss://${userInfo}@${endpoint}#${name}`;
    }
    default:
      throw new ShareLinkError(`Unsupported protocol: ${server.protocol}`);
  }
};
