import { EventEmitter } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import type { RuntimeState } from '../db/runtimeStateRepository.js';
import type { BackendProcess } from '../services/xrayManager.js';
import { runCli } from './cli.js';
import type { CliDeps, ProcessControl, SessionSignal } from './cli.js';
import { createContainer } from './container.js';
import type { AppContainer } from './container.js';

class FakeProcess extends EventEmitter implements BackendProcess {
  pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  stdout = new PassThrough();
  stderr = new PassThrough();

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signalCode = signal;
    return true;
  }
}

class FakeProcessControl implements ProcessControl {
  alive = new Set<number>();
  sent: Array<{ pid: number; signal: NodeJS.Signals }> = [];
  exitOnTerm = true;

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  signal(pid: number, signal: NodeJS.Signals): void {
    this.sent.push({ pid, signal });
    if (signal === 'SIGTERM' && this.exitOnTerm) {
      this.alive.delete(pid);
    }
  }

  async stats() {
    return { cpu: 1.234, memory: 1536, elapsed: 0, timestamp: 0 };
  }
}

const runningState: RuntimeState = {
  pid: 555,
  xray_pid: 4242,
  server_id: 's1',
  server_name: 'Server One',
  mode: 'proxy',
  started_at: '2024-01-01T00:00:00.000Z',
};

const LINKS = ['trojan://test-secret@t.example:443#T1', 'ss://aes-128-gcm:test-secret@s.example:8388#S2'].join('\n');

describe('xenray cli', () => {
  let dir: string;
  let container: AppContainer;
  let spawned: FakeProcess[];
  let pc: FakeProcessControl;
  let out: string[];
  let err: string[];

  const cli = (argv: string[], extra: Partial<CliDeps> = {}) =>
    runCli(argv, {
      container,
      io: { out: line => out.push(line), err: line => err.push(line) },
      processControl: pc,
      sleep: async () => undefined,
      pid: 999,
      waitForSignal: async () => 'stop',
      ...extra,
    });

  const addServer = () =>
    cli(['server', 'add', '--id', 's1', '--name', 'Server One', '--address', 'a.example', '--port', '443', '--uuid', 'u1']);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    spawned = [];
    container = createContainer({
      configDir: path.join(dir, 'config'),
      tempDir: path.join(dir, 'tmp'),
      xray: {
        spawnFn: () => {
          const child = new FakeProcess();
          spawned.push(child);
          return child;
        },
        sleep: async () => undefined,
        which: () => '/opt/xray/xray',
      },
      networkValidator: { checkInternetConnection: async () => true },
      connectionTester: { testConnection: async () => ({ success: true, latencyMs: 10, detail: '10ms' }) },
      fetcher: async () => Buffer.from(LINKS, 'utf-8').toString('base64'),
    });
    pc = new FakeProcessControl();
    out = [];
    err = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('server', () => {
    test('add, set active and list', async () => {
      expect(await cli(['server', 'list'])).toBe(0);
      expect(out).toEqual(['No servers configured']);

      expect(await addServer()).toBe(0);
      expect(await cli(['server', 'set', 's1'])).toBe(0);
      out = [];
      expect(await cli(['server', 'list'])).toBe(0);

      expect(out).toEqual(['* s1  Server One  vless://a.example:443']);
      expect(container.appConfig.getActiveServer()).toMatchObject({ id: 's1', network: 'tcp', tls: 'none' });
    });

    test('duplicate ids and bad ports are rejected', async () => {
      await addServer();
      expect(await addServer()).toBe(1);
      expect(err).toEqual(["✗ Server 's1' already exists"]);

      err = [];
      const code = await cli(['server', 'add', '--id', 's2', '--name', 'Two', '--address', 'b.example', '--port', '70000', '--uuid', 'u2']);
      expect(code).toBe(1);
      expect(err).toEqual(['✗ Invalid server port: 70000']);
    });

    test('unknown servers', async () => {
      expect(await cli(['server', 'set', 'nope'])).toBe(1);
      expect(await cli(['server', 'remove', 'nope'])).toBe(1);
      expect(err).toEqual(["✗ Server 'nope' not found", "✗ Server 'nope' not found"]);
    });

    test('import and export share links', async () => {
      expect(await cli(['server', 'import', 'trojan://test-secret@t.example:443#T', '--id', 't1'])).toBe(0);
      expect(out).toEqual(["✓ Imported server 'T' (t1)"]);

      out = [];
      expect(await cli(['server', 'export', 't1'])).toBe(0);
      expect(out).toEqual(['trojan://test-secret@t.example:443?type=tcp&security=tls#T']);

      expect(await cli(['server', 'import', 'garbage'])).toBe(1);
      expect(err).toEqual(['✗ Unrecognized or malformed share link']);
    });

    test('remove clears the active server', async () => {
      await addServer();
      await cli(['server', 'set', 's1']);
      expect(await cli(['server', 'remove', 's1'])).toBe(0);
      expect(out).toContain("✓ Server 's1' removed");
      expect(container.appConfig.getActiveServerId()).toBeNull();
    });
  });

  describe('config', () => {
    test('get and set with dot notation', async () => {
      expect(await cli(['config', 'get', 'inbound.listen'])).toBe(0);
      expect(await cli(['config', 'set', 'log_level', 'warning'])).toBe(0);
      expect(out).toEqual(['127.0.0.1', '✓ log_level = "warning"']);
      expect(container.appConfig.getLogLevel()).toBe('warning');
    });

    test('the inbound port is kept in the settings store and validated', async () => {
      expect(await cli(['config', 'get', 'inbound.port'])).toBe(0);
      expect(await cli(['config', 'set', 'inbound.port', '2080'])).toBe(0);
      expect(out).toEqual(['10805', '✓ inbound.port = 2080']);
      expect(container.settings.getProxyPort()).toBe(2080);
      expect(container.getInbound()).toEqual({ listen: '127.0.0.1', port: 2080, protocol: 'socks' });

      expect(await cli(['config', 'set', 'inbound.port', '80'])).toBe(1);
      expect(await cli(['config', 'set', 'inbound.port', 'high'])).toBe(1);
      expect(err).toEqual(['✗ Port must be between 1024 and 65535, got 80', '✗ Port must be an integer']);
      expect(container.settings.getProxyPort()).toBe(2080);
    });

    test('keys that reach object internals are refused', async () => {
      expect(await cli(['config', 'set', '__proto__.polluted', '1'])).toBe(1);
      expect(err).toEqual(['✗ Invalid config key: __proto__.polluted']);
      expect(Object.prototype.hasOwnProperty.call(Object.prototype, 'polluted')).toBe(false);
    });

    test('missing keys', async () => {
      expect(await cli(['config', 'get', 'missing.key'])).toBe(1);
      expect(err).toEqual(["✗ Key 'missing.key' is not set"]);
    });

    test('show prints the document as JSON', async () => {
      expect(await cli(['config', 'show'])).toBe(0);
      expect(JSON.parse(out.join('\n'))).toMatchObject({ log_level: 'info', inbound: { listen: '127.0.0.1', protocol: 'socks' } });
    });

    test('yaml export and import', async () => {
      const file = path.join(dir, 'out.yaml');
      expect(await cli(['config', 'export', file, '--format', 'yaml'])).toBe(0);
      expect(fs.readFileSync(file, 'utf-8')).toContain('log_level: info');

      const incoming = path.join(dir, 'in.yaml');
      fs.writeFileSync(incoming, 'log_level: error\n');
      expect(await cli(['config', 'import', incoming, '--format', 'yaml'])).toBe(0);
      expect(out).toEqual([`✓ Configuration exported to ${file}`, `✓ Configuration imported from ${incoming}`]);
      expect(container.appConfig.getLogLevel()).toBe('error');
    });
  });

  test('usage errors exit with 1', async () => {
    expect(await cli([])).toBe(1);
    expect(err).toEqual(['Specify a command']);
    expect(await cli(['bogus'])).toBe(1);
    expect(await cli(['server'])).toBe(1);
  });

  describe('start', () => {
    test('needs an active server', async () => {
      expect(await cli(['start'])).toBe(1);
      expect(err).toEqual(["Error: No active server configured. Use 'xenray server set <id>' first."]);
      expect(spawned).toEqual([]);
    });

    test('runs in the foreground until stopped', async () => {
      await addServer();
      await cli(['server', 'set', 's1']);
      out = [];

      let published: RuntimeState | null = null;
      const code = await cli(['start', '--mode', 'proxy'], {
        waitForSignal: async (): Promise<SessionSignal> => {
          published = container.runtimeState.load();
          return 'stop';
        },
      });

      expect(code).toBe(0);
      expect(out).toEqual([
        '✓ Xray started successfully',
        '  Server: Server One',
        '  Listening: socks://127.0.0.1:10805',
        '  Mode: proxy',
        '✓ Xray stopped',
      ]);
      expect(published).toMatchObject({ pid: 999, xray_pid: 4242, server_id: 's1', server_name: 'Server One', mode: 'proxy' });
      expect(container.runtimeState.load()).toBeNull();
      expect(spawned).toHaveLength(1);
      expect(spawned[0].signalCode).toBe('SIGTERM');
    });

    test('uses the saved mode by default', async () => {
      await addServer();
      await cli(['server', 'set', 's1']);
      await cli(['start']);
      expect(out).toContain('  Mode: vpn');
    });

    test('a restart signal reconnects', async () => {
      await addServer();
      await cli(['server', 'set', 's1']);
      out = [];
      const signals: SessionSignal[] = ['restart', 'stop'];

      expect(await cli(['start', '--mode', 'proxy'], { waitForSignal: async () => signals.shift() ?? 'stop' })).toBe(0);
      expect(out.slice(4)).toEqual(['✓ Xray restarted (Server One)', '✓ Xray stopped']);
      expect(spawned).toHaveLength(2);
    });

    test('a stored profile can be started', async () => {
      const id = container.profiles.save('Stored', {
        outbounds: [{ tag: 'proxy', protocol: 'trojan', settings: { servers: [{ address: 't.example', port: 443, password: 'test-secret' }] } }],
      });

      expect(await cli(['start', '--profile', id ?? '', '--mode', 'proxy'])).toBe(0);
      expect(out[1]).toBe('  Server: Stored');
      expect(container.settings.getLastSelectedProfileId()).toBe(id);
    });

    test('an unknown profile', async () => {
      expect(await cli(['start', '--profile', 'nope'])).toBe(1);
      expect(err).toEqual(["✗ Profile 'nope' not found"]);
    });

    test('a config file is started and remembered', async () => {
      const file = path.join(dir, 'edge.json');
      fs.writeFileSync(file, JSON.stringify({
        outbounds: [{ protocol: 'vless', settings: { vnext: [{ address: 'v.example', port: 443, users: [{ id: 'u1' }] }] } }],
      }));

      expect(await cli(['start', '--file', file, '--mode', 'proxy'])).toBe(0);
      expect(out[1]).toBe('  Server: edge.json');
      expect(container.recentFiles.getAll()).toEqual([file]);
    });

    test('refuses to start twice', async () => {
      container.runtimeState.save(runningState);
      pc.alive.add(555);

      expect(await cli(['start'])).toBe(1);
      expect(err).toEqual(['✗ xenray is already running (pid 555)']);
    });

    test('a backend that will not start', async () => {
      await addServer();
      await cli(['server', 'set', 's1']);
      const failing = createContainer({
        configDir: container.configDir,
        tempDir: container.tempDir,
        xray: { spawnFn: () => Object.assign(new FakeProcess(), { exitCode: 1 }), sleep: async () => undefined, which: () => '/opt/xray/xray' },
      });

      const code = await runCli(['start'], {
        container: failing,
        io: { out: line => out.push(line), err: line => err.push(line) },
        processControl: pc,
      });
      expect(code).toBe(1);
      expect(err).toEqual(['✗ Failed to start Xray']);
    });
  });

  describe('stop, restart and status', () => {
    test('stop without a session', async () => {
      expect(await cli(['stop'])).toBe(1);
      expect(err).toEqual(['✗ Xray is not running']);
    });

    test('stop signals the session and waits for it', async () => {
      container.runtimeState.save(runningState);
      pc.alive.add(555);

      expect(await cli(['stop'])).toBe(0);
      expect(pc.sent).toEqual([{ pid: 555, signal: 'SIGTERM' }]);
      expect(out).toEqual(['✓ Xray stopped']);
      expect(container.runtimeState.load()).toBeNull();
    });

    test('a session that ignores SIGTERM', async () => {
      container.runtimeState.save(runningState);
      pc.alive.add(555);
      pc.exitOnTerm = false;

      expect(await cli(['stop'], { stopTimeoutMs: 300 })).toBe(1);
      expect(err).toEqual(['✗ Failed to stop Xray (pid 555)']);
    });

    test('restart asks a live session to reconnect', async () => {
      container.runtimeState.save(runningState);
      pc.alive.add(555);

      expect(await cli(['restart'])).toBe(0);
      expect(pc.sent).toEqual([{ pid: 555, signal: 'SIGHUP' }]);
      expect(out).toEqual(['✓ Restart requested (pid 555)']);
    });

    test('status of a running session', async () => {
      container.runtimeState.save(runningState);
      pc.alive.add(555);

      expect(await cli(['status'])).toBe(0);
      expect(out).toEqual([
        'Status: running',
        '  Server: Server One (s1)',
        '  Mode: proxy',
        '  Session PID: 555',
        '  Started: 2024-01-01T00:00:00.000Z',
        '  Xray PID: 4242',
        '  CPU: 1.2%',
        '  Memory: 1.5 KB',
      ]);
    });

    test('a stale session counts as stopped', async () => {
      container.runtimeState.save(runningState);

      expect(await cli(['status'])).toBe(0);
      expect(out).toEqual(['Status: stopped']);
      expect(container.runtimeState.load()).toBeNull();
    });
  });

  describe('profiles, chains, subscriptions and routing', () => {
    test('profiles from share links', async () => {
      expect(await cli(['profile', 'add', 'trojan://test-secret@t.example:443#T', '--name', 'Mine'])).toBe(0);
      expect(out[0]).toMatch(/^✓ Profile 'Mine' added \([0-9a-f-]{36}\)$/);
      expect(container.profiles.loadAll().map(p => p.name)).toEqual(['Mine']);

      expect(await cli(['profile', 'add', 'nonsense'])).toBe(1);
      expect(err).toEqual(['✗ Error: Failed to parse share link']);
    });

    test('chains are validated', async () => {
      const config = {
        outbounds: [{ tag: 'proxy', protocol: 'vless', settings: { vnext: [{ address: 'a.example', port: 443, users: [{ id: 'u1' }] }] } }],
      };
      const first = container.profiles.save('First', config) ?? '';
      const second = container.profiles.save('Second', config) ?? '';

      expect(await cli(['chain', 'add', '--name', 'Short', '--items', first])).toBe(1);
      expect(err).toEqual(['✗ Chain must have at least 2 items']);

      expect(await cli(['chain', 'add', '--name', 'Double', '--items', `${first},${second}`])).toBe(0);
      out = [];
      await cli(['chain', 'list']);
      expect(out).toHaveLength(1);
      expect(out[0]).toContain(`Double  [${first} -> ${second}]  ok`);
    });

    test('subscriptions', async () => {
      expect(await cli(['sub', 'add', 'Main', 'https://sub.example/list'])).toBe(0);
      const [subscription] = container.subscriptionManager.list();

      expect(await cli(['sub', 'update', subscription.id])).toBe(0);
      expect(out[1]).toBe('✓ Updated 2 servers');

      expect(await cli(['sub', 'update', 'nope'])).toBe(1);
      expect(err).toEqual(['✗ Subscription not found: nope']);
    });

    test('routing rules and toggles', async () => {
      expect(await cli(['routing', 'add', 'direct', 'example.com'])).toBe(0);
      expect(await cli(['routing', 'toggle', 'block_ads', 'on'])).toBe(0);
      expect(await cli(['routing', 'country', 'ir'])).toBe(0);
      out = [];
      expect(await cli(['routing', 'list'])).toBe(0);

      expect(out).toEqual([
        'direct: example.com',
        'proxy: (none)',
        'block: (none)',
        'block_udp_443: off',
        'block_ads: on',
        'direct_private_ips: on',
        'direct_local_domains: on',
        'country: ir',
      ]);
    });

    test('recent files', async () => {
      expect(await cli(['recent'])).toBe(0);
      expect(out).toEqual(['No recent files']);
    });
  });
});
