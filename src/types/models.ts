import { isRecord, isStringArray } from '../db/jsonStore.js';

export const CHAINABLE_PROTOCOLS = ['vless', 'vmess', 'trojan', 'shadowsocks'] as const;
export const NON_CHAINABLE_PROTOCOLS = ['freedom', 'blackhole', 'dns', 'loopback'] as const;

export type Protocol = (typeof CHAINABLE_PROTOCOLS)[number];
export type Network = 'tcp' | 'ws' | 'grpc' | 'h2';
export type TlsMode = 'none' | 'tls';
export type ConnectionMode = 'proxy' | 'vpn';
export type XrayLogLevel = 'debug' | 'info' | 'warning' | 'error' | 'none';

export const isProtocol = (value: unknown): value is Protocol =>
  typeof value === 'string' && (CHAINABLE_PROTOCOLS as readonly string[]).includes(value);

// ---------------------------------------------------------------------------
// Stored records
// ---------------------------------------------------------------------------

/** One outbound as it appears inside an imported or stored profile document. */
export interface OutboundConfig {
  tag?: string;
  protocol?: string;
  address?: string;
  port?: number;
  settings?: Record<string, unknown>;
  streamSettings?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ProfileConfig {
  outbounds: OutboundConfig[];
  [key: string]: unknown;
}

export interface Profile {
  id: string;
  name: string;
  config: ProfileConfig;
  created_at: string;
  updated_at?: string;
}

export interface Chain {
  id: string;
  name: string;
  items: string[];
  created_at: string;
  updated_at?: string;
}

export interface EnrichedChain extends Chain {
  valid: boolean;
  missing_profiles: string[];
}

export interface Subscription {
  id: string;
  name: string;
  url: string;
  profiles: Profile[];
  created_at: string;
  updated_at?: string;
}

export interface RoutingRules {
  direct: string[];
  proxy: string[];
  block: string[];
}

export type RoutingBucket = keyof RoutingRules;

export interface RoutingToggles {
  block_udp_443: boolean;
  block_ads: boolean;
  direct_private_ips: boolean;
  direct_local_domains: boolean;
}

export interface DnsServer {
  address: string;
  protocol: string;
  domains: string[];
}

/**
 * Flat server entry of the CLI document. Field names follow the persisted
 * config.json layout.
 */
export interface ServerDefinition {
  id: string;
  name: string;
  protocol: string;
  address: string;
  port: number;
  uuid?: string;
  encryption?: string;
  flow?: string;
  alter_id?: number;
  security?: string;
  password?: string;
  method?: string;
  network?: Network;
  tls?: TlsMode;
  sni?: string;
  allow_insecure?: boolean;
  path?: string;
  headers?: Record<string, string>;
  service_name?: string;
  host?: string[];
}

export interface InboundSettings {
  listen: string;
  port: number;
  protocol: string;
}

// ---------------------------------------------------------------------------
// Generated backend configuration
// ---------------------------------------------------------------------------

export interface XrayUser {
  id: string;
  encryption?: string;
  flow?: string;
  alterId?: number;
  security?: string;
}

export interface XrayVnext {
  address: string;
  port: number;
  users: XrayUser[];
}

export interface XrayServerEntry {
  address: string;
  port: number;
  password: string;
  method?: string;
}

// Outbound shapes are type aliases so they also fit the looser OutboundConfig.
export type XrayOutboundSettings = {
  vnext?: XrayVnext[];
  servers?: XrayServerEntry[];
};

export type XrayStreamSettings = {
  network: Network;
  security: TlsMode;
  tlsSettings?: { serverName: string; allowInsecure: boolean };
  wsSettings?: { path: string; headers: Record<string, string> };
  grpcSettings?: { serviceName: string };
  httpSettings?: { host: string[]; path: string };
};

export type XrayOutbound = {
  tag: string;
  protocol: string;
  settings?: XrayOutboundSettings;
  streamSettings?: XrayStreamSettings;
};

export interface XrayInbound {
  tag: string;
  protocol: string;
  listen: string;
  port: number;
  settings: Record<string, unknown>;
  sniffing?: { enabled: boolean; destOverride: string[] };
}

export interface XrayRoutingRule {
  type: 'field';
  outboundTag: string;
  domain?: string[];
  ip?: string[];
  network?: string;
  port?: string;
}

export interface XrayDnsConfig {
  servers: Array<string | { address: string; domains: string[] }>;
  queryStrategy?: 'UseIPv4' | 'UseIPv6' | 'UseIP';
}

export interface XrayConfig {
  log: { loglevel: XrayLogLevel };
  dns?: XrayDnsConfig;
  inbounds: XrayInbound[];
  outbounds: XrayOutbound[];
  routing: {
    domainStrategy: 'AsIs' | 'IPIfNonMatch' | 'IPOnDemand';
    rules: XrayRoutingRule[];
  };
}

// ---------------------------------------------------------------------------
// Guards for documents read back from disk
// ---------------------------------------------------------------------------

export const isProfileConfig = (value: unknown): value is ProfileConfig =>
  isRecord(value) && Array.isArray(value.outbounds) && value.outbounds.every(isRecord);

export const isProfile = (value: unknown): value is Profile =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.name === 'string' &&
  isProfileConfig(value.config);

export const isChain = (value: unknown): value is Chain =>
  isRecord(value) && typeof value.id === 'string' && typeof value.name === 'string' && isStringArray(value.items);

export const isServerDefinition = (value: unknown): value is ServerDefinition =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.name === 'string' &&
  typeof value.protocol === 'string' &&
  typeof value.address === 'string' &&
  typeof value.port === 'number';

export const isRoutingRules = (value: unknown): value is RoutingRules =>
  isRecord(value) && isStringArray(value.direct) && isStringArray(value.proxy) && isStringArray(value.block);

export const isDnsServer = (value: unknown): value is DnsServer =>
  isRecord(value) && typeof value.address === 'string' && typeof value.protocol === 'string' && isStringArray(value.domains);
