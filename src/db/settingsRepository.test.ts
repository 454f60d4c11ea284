import fs from 'fs';
import os from 'os';
import path from 'path';
import { DEFAULT_DNS, SettingsRepository } from './settingsRepository.js';

describe('SettingsRepository', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('returns defaults when nothing is stored', () => {
    const settings = new SettingsRepository(dir);
    expect(settings.getProxyPort()).toBe(10805);
    expect(settings.getConnectionMode()).toBe('vpn');
    expect(settings.getThemeMode()).toBe('dark');
    expect(settings.getLanguage()).toBe('en');
    expect(settings.getSortMode()).toBe('name_asc');
    expect(settings.getRoutingCountry()).toBe('none');
    expect(settings.getCustomDns()).toBe(DEFAULT_DNS);
    expect(settings.getRememberCloseChoice()).toBe(false);
    expect(settings.getStartupEnabled()).toBe(false);
    expect(settings.getAutoReconnectEnabled()).toBe(true);
    expect(settings.getLastSelectedProfileId()).toBeNull();
  });

  test('migrates the legacy proxy port on open', () => {
    fs.writeFileSync(path.join(dir, 'proxy_port.txt'), '10808');
    const settings = new SettingsRepository(dir);
    expect(settings.getProxyPort()).toBe(10805);
    expect(fs.readFileSync(path.join(dir, 'proxy_port.txt'), 'utf-8')).toBe('10805');
  });

  test('out-of-range ports are refused and unreadable ones fall back', () => {
    const settings = new SettingsRepository(dir);
    expect(settings.setProxyPort(80)).toBe(false);
    expect(settings.setProxyPort(20000)).toBe(true);
    expect(settings.getProxyPort()).toBe(20000);

    fs.writeFileSync(path.join(dir, 'proxy_port.txt'), 'not a port');
    expect(settings.getProxyPort()).toBe(10805);
  });

  test('enumerated values outside their domain are ignored', () => {
    const settings = new SettingsRepository(dir);
    expect(settings.setConnectionMode('tun')).toBe(false);
    expect(settings.getConnectionMode()).toBe('vpn');
    expect(settings.setConnectionMode('proxy')).toBe(true);
    expect(settings.getConnectionMode()).toBe('proxy');

    fs.writeFileSync(path.join(dir, 'language.txt'), 'xx\n');
    expect(settings.getLanguage()).toBe('en');
    expect(settings.setRoutingCountry(null)).toBe(true);
    expect(settings.getRoutingCountry()).toBe('none');
  });

  test('flags read back what was written', () => {
    const settings = new SettingsRepository(dir);
    settings.setAutoReconnectEnabled(false);
    settings.setStartupEnabled(true);
    expect(settings.getAutoReconnectEnabled()).toBe(false);
    expect(settings.getStartupEnabled()).toBe(true);

    fs.writeFileSync(path.join(dir, 'auto_reconnect_enabled.txt'), 'garbage');
    expect(settings.getAutoReconnectEnabled()).toBe(true);
  });

  test('last selected profile', () => {
    const settings = new SettingsRepository(dir);
    expect(settings.setLastSelectedProfileId('')).toBe(false);
    expect(settings.setLastSelectedProfileId('p1')).toBe(true);
    expect(settings.getLastSelectedProfileId()).toBe('p1');
  });
});
