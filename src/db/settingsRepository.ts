import path from 'path';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { MAX_PORT, MIN_PORT, ValidationError, validatePort } from '../utils/validators.js';
import type { ConnectionMode } from '../types/models.js';
import { atomicWrite, ensureDir, readTextFile } from './jsonStore.js';

export const DEFAULT_PROXY_PORT = 10805;
export const LEGACY_PROXY_PORT = 10808;
export const DEFAULT_DNS = '8.8.8.8, 1.1.1.1';

export const CONNECTION_MODES = ['proxy', 'vpn'] as const;
export const THEME_MODES = ['dark', 'light'] as const;
export const LANGUAGES = ['en', 'fa', 'zh', 'ru'] as const;
export const SORT_MODES = ['name_asc', 'ping_asc', 'ping_desc'] as const;
export const ROUTING_COUNTRIES = ['ir', 'cn', 'ru', 'none'] as const;

export type ThemeMode = (typeof THEME_MODES)[number];
export type Language = (typeof LANGUAGES)[number];
export type SortMode = (typeof SORT_MODES)[number];
export type RoutingCountry = (typeof ROUTING_COUNTRIES)[number];

const oneOf = <T extends string>(allowed: readonly T[], value: string): value is T =>
  (allowed as readonly string[]).includes(value);

/**
 * Scalar preferences, one plain-text file per key. Reads fall back to the
 * default for missing or out-of-domain values; writes outside the domain are
 * ignored.
 */
export class SettingsRepository {
  private configDir: string;

  constructor(configDir: string = getConfigDir()) {
    this.configDir = configDir;
    ensureDir(configDir);
    this.migrateLegacyPort();
  }

  private migrateLegacyPort(): void {
    if (this.read('proxy_port.txt') === String(LEGACY_PROXY_PORT)) {
      debugLogger.info('SettingsRepository', `Migrating proxy port ${LEGACY_PROXY_PORT} -> ${DEFAULT_PROXY_PORT}`);
      this.write('proxy_port.txt', String(DEFAULT_PROXY_PORT));
    }
  }

  private read(filename: string, fallback = ''): string {
    const raw = readTextFile(path.join(this.configDir, filename));
    return raw === null ? fallback : raw.trim();
  }

  private write(filename: string, value: string): boolean {
    return atomicWrite(path.join(this.configDir, filename), value);
  }

  private readEnum<T extends string>(filename: string, allowed: readonly T[], fallback: T): T {
    const value = this.read(filename, fallback);
    return oneOf(allowed, value) ? value : fallback;
  }

  private writeEnum<T extends string>(filename: string, allowed: readonly T[], value: string): boolean {
    if (!oneOf(allowed, value)) {
      debugLogger.warn('SettingsRepository', `Ignoring invalid value for ${filename}: ${value}`);
      return false;
    }
    return this.write(filename, value);
  }

  private readFlag(filename: string, fallback: boolean): boolean {
    const value = this.read(filename).toLowerCase();
    if (value === '') return fallback;
    return fallback ? value !== 'false' : value === 'true';
  }

  getProxyPort(): number {
    const port = Number(this.read('proxy_port.txt'));
    return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT ? port : DEFAULT_PROXY_PORT;
  }

  setProxyPort(port: number): boolean {
    try {
      validatePort(port);
    } catch (error) {
      if (error instanceof ValidationError) {
        debugLogger.warn('SettingsRepository', error.message);
        return false;
      }
      throw error;
    }
    return this.write('proxy_port.txt', String(port));
  }

  getConnectionMode(): ConnectionMode {
    return this.readEnum('connection_mode.txt', CONNECTION_MODES, 'vpn');
  }

  setConnectionMode(mode: string): boolean {
    return this.writeEnum('connection_mode.txt', CONNECTION_MODES, mode);
  }

  getThemeMode(): ThemeMode {
    return this.readEnum('theme_mode.txt', THEME_MODES, 'dark');
  }

  setThemeMode(mode: string): boolean {
    return this.writeEnum('theme_mode.txt', THEME_MODES, mode);
  }

  getLanguage(): Language {
    return this.readEnum('language.txt', LANGUAGES, 'en');
  }

  setLanguage(language: string): boolean {
    return this.writeEnum('language.txt', LANGUAGES, language);
  }

  getSortMode(): SortMode {
    return this.readEnum('sort_mode.txt', SORT_MODES, 'name_asc');
  }

  setSortMode(mode: string): boolean {
    return this.writeEnum('sort_mode.txt', SORT_MODES, mode);
  }

  getRoutingCountry(): RoutingCountry {
    return this.readEnum('routing_country.txt', ROUTING_COUNTRIES, 'none');
  }

  setRoutingCountry(country: string | null): boolean {
    return this.writeEnum('routing_country.txt', ROUTING_COUNTRIES, country || 'none');
  }

  getCustomDns(): string {
    return this.read('custom_dns.txt') || DEFAULT_DNS;
  }

  setCustomDns(value: string): boolean {
    return this.write('custom_dns.txt', value);
  }

  getRememberCloseChoice(): boolean {
    return this.readFlag('remember_close.txt', false);
  }

  setRememberCloseChoice(enabled: boolean): boolean {
    return this.write('remember_close.txt', String(enabled));
  }

  getStartupEnabled(): boolean {
    return this.readFlag('startup_enabled.txt', false);
  }

  setStartupEnabled(enabled: boolean): boolean {
    return this.write('startup_enabled.txt', String(enabled));
  }

  getAutoReconnectEnabled(): boolean {
    return this.readFlag('auto_reconnect_enabled.txt', true);
  }

  setAutoReconnectEnabled(enabled: boolean): boolean {
    return this.write('auto_reconnect_enabled.txt', String(enabled));
  }

  getLastSelectedProfileId(): string | null {
    return this.read('last_profile.txt') || null;
  }

  setLastSelectedProfileId(profileId: string): boolean {
    if (!profileId) return false;
    return this.write('last_profile.txt', profileId);
  }
}
