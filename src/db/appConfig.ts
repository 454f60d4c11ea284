import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { isServerDefinition } from '../types/models.js';
import { ValidationError } from '../utils/validators.js';
import type { InboundSettings, ServerDefinition, XrayLogLevel } from '../types/models.js';
import { atomicWrite, atomicWriteJson, isRecord, readTextFile } from './jsonStore.js';
import { DEFAULT_PROXY_PORT } from './settingsRepository.js';

export type ConfigFormat = 'json' | 'yaml';

const LOG_LEVELS: readonly XrayLogLevel[] = ['debug', 'info', 'warning', 'error', 'none'];
const RESERVED_SEGMENTS = ['__proto__', 'constructor', 'prototype'];

const keySegments = (key: string): string[] => {
  const parts = key.split('.');
  if (parts.some(part => part === '' || RESERVED_SEGMENTS.includes(part))) {
    throw new ValidationError(`Invalid config key: ${key}`);
  }
  return parts;
};

export type InboundListener = Omit<InboundSettings, 'port'>;

export const DEFAULT_INBOUND: Readonly<InboundSettings> = {
  listen: '127.0.0.1',
  port: DEFAULT_PROXY_PORT,
  protocol: 'socks',
};

export const defaultXrayBinary = (): string => (process.platform === 'win32' ? 'xray.exe' : 'xray');

export const createDefaultConfig = (): Record<string, unknown> => ({
  xray_binary: defaultXrayBinary(),
  log_level: 'info',
  auto_reconnect: true,
  servers: [],
  active_server: null,
  inbound: { listen: DEFAULT_INBOUND.listen, protocol: DEFAULT_INBOUND.protocol },
});

/**
 * The command-line document (`config.json`): backend binary, log level,
 * inbound listener and the flat server list. Keys can be addressed with dot
 * notation, e.g. `inbound.listen`. The inbound port lives in the settings
 * store.
 */
export class AppConfig {
  readonly configPath: string;
  private data: Record<string, unknown>;

  constructor(configPath: string = path.join(getConfigDir(), 'config.json')) {
    this.configPath = configPath;
    this.data = this.load();
  }

  private load(): Record<string, unknown> {
    const raw = readTextFile(this.configPath);
    if (raw === null) {
      const defaults = createDefaultConfig();
      this.data = defaults;
      this.save();
      return defaults;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isRecord(parsed)) {
        return parsed;
      }
      debugLogger.error('AppConfig', 'Config document is not an object, using defaults');
    } catch (error) {
      debugLogger.error('AppConfig', 'Error loading config, using defaults', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return createDefaultConfig();
  }

  save(): boolean {
    return atomicWriteJson(this.configPath, this.data);
  }

  get(key: string, fallback?: unknown): unknown {
    let value: unknown = this.data;
    for (const part of keySegments(key)) {
      if (!isRecord(value)) {
        return fallback;
      }
      value = value[part];
      if (value === undefined || value === null) {
        return fallback;
      }
    }
    return value;
  }

  /** Sets a value in memory; call save() to persist. Throws ValidationError for unusable keys. */
  set(key: string, value: unknown): void {
    const parts = keySegments(key);
    const last = parts.pop();
    if (last === undefined) {
      return;
    }
    let node = this.data;
    for (const part of parts) {
      const next = node[part];
      if (isRecord(next)) {
        node = next;
      } else {
        const created: Record<string, unknown> = {};
        node[part] = created;
        node = created;
      }
    }
    node[last] = value;
  }

  toJSON(): Record<string, unknown> {
    return structuredClone(this.data);
  }

  getXrayBinary(): string {
    const value = this.get('xray_binary');
    return typeof value === 'string' && value ? value : defaultXrayBinary();
  }

  getLogLevel(): XrayLogLevel {
    const value = this.get('log_level');
    return LOG_LEVELS.find(level => level === value) ?? 'info';
  }

  getAutoReconnect(): boolean {
    return this.get('auto_reconnect') !== false;
  }

  getInboundListener(): InboundListener {
    const listen = this.get('inbound.listen');
    const protocol = this.get('inbound.protocol');
    return {
      listen: typeof listen === 'string' && listen ? listen : DEFAULT_INBOUND.listen,
      protocol: typeof protocol === 'string' && protocol ? protocol : DEFAULT_INBOUND.protocol,
    };
  }

  getServers(): ServerDefinition[] {
    const servers = this.get('servers');
    return Array.isArray(servers) ? servers.filter(isServerDefinition) : [];
  }

  addServer(server: ServerDefinition): boolean {
    this.data.servers = [...this.getServers(), server];
    return this.save();
  }

  removeServer(serverId: string): boolean {
    const servers = this.getServers();
    const remaining = servers.filter(s => s.id !== serverId);
    if (remaining.length === servers.length) {
      return false;
    }
    this.data.servers = remaining;
    if (this.data.active_server === serverId) {
      this.data.active_server = null;
    }
    return this.save();
  }

  getActiveServerId(): string | null {
    const id = this.get('active_server');
    return typeof id === 'string' && id ? id : null;
  }

  setActiveServer(serverId: string | null): boolean {
    this.data.active_server = serverId;
    return this.save();
  }

  getActiveServer(): ServerDefinition | null {
    const id = this.getActiveServerId();
    if (!id) {
      return null;
    }
    return this.getServers().find(s => s.id === id) ?? null;
  }

  /** Merges the top-level keys of a JSON or YAML file into the document. */
  importConfig(filePath: string, format: ConfigFormat = 'json'): boolean {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const parsed: unknown = format === 'yaml' ? YAML.parse(content) : JSON.parse(content);
      if (!isRecord(parsed)) {
        debugLogger.error('AppConfig', `Imported ${format} document is not an object: ${filePath}`);
        return false;
      }
      this.data = { ...this.data, ...parsed };
      return this.save();
    } catch (error) {
      debugLogger.error('AppConfig', 'Error importing config', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  exportConfig(filePath: string, format: ConfigFormat = 'json'): boolean {
    const content = format === 'yaml' ? YAML.stringify(this.data) : JSON.stringify(this.data, null, 2);
    return atomicWrite(filePath, content);
  }
}
