import { spawn } from 'child_process';
import fs from 'fs';
import http from 'http';
import net from 'net';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { isRecord } from '../db/jsonStore.js';
import { getTempDir } from '../utils/paths.js';
import debugLogger from './debugLogger.js';
import type { BackendProcess, SpawnFn } from './xrayManager.js';

export interface ConnectionTestResult {
  success: boolean;
  latencyMs: number | null;
  /** "123ms" on success, otherwise a short reason. */
  detail: string;
}

export interface ConnectionTester {
  testConnection(config: Record<string, unknown>): Promise<ConnectionTestResult>;
}

export type ProbeResult = { ok: true; latencyMs: number } | { ok: false; reason: string };

export const PROBE_URL = 'http://cp.cloudflare.com/';

const IGNORED_OUTBOUNDS = ['freedom', 'blackhole', 'dns'];

/**
 * The outbound to test: the first one that actually proxies, or the config
 * itself when it is a bare outbound object.
 */
export const pickTestOutbound = (config: Record<string, unknown>): Record<string, unknown> | null => {
  const outbounds = config.outbounds;
  if (Array.isArray(outbounds)) {
    for (const outbound of outbounds) {
      if (isRecord(outbound) && typeof outbound.protocol === 'string' && !IGNORED_OUTBOUNDS.includes(outbound.protocol)) {
        return outbound;
      }
    }
  }
  return typeof config.protocol === 'string' ? config : null;
};

export const findFreePort = (): Promise<number> =>
  new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.on('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      server.close(() => resolve(port));
    });
  });

/** Sends one GET for `targetUrl` through the HTTP proxy on `port`. */
export const probeThroughHttpProxy = (port: number, targetUrl: string, timeoutMs: number): Promise<ProbeResult> =>
  new Promise(resolve => {
    const startTime = Date.now();
    const req = http.request(
      {
        hostname: '127.0.0.1',
        port,
        path: targetUrl,
        method: 'GET',
        timeout: timeoutMs,
        headers: { Connection: 'close', 'User-Agent': 'xenray' },
      },
      res => {
        res.resume();
        res.on('end', () => {
          const statusCode = res.statusCode ?? 0;
          if (statusCode >= 200 && statusCode < 300) {
            resolve({ ok: true, latencyMs: Date.now() - startTime });
          } else {
            resolve({ ok: false, reason: `HTTP ${statusCode}` });
          }
        });
      },
    );
    req.on('timeout', () => {
      req.destroy();
      resolve({ ok: false, reason: 'Timeout' });
    });
    req.on('error', () => resolve({ ok: false, reason: 'Conn Error' }));
    req.end();
  });

export interface XrayConnectionTesterOptions {
  findBinary: () => string | null;
  spawnFn?: SpawnFn;
  sleep?: (ms: number) => Promise<void>;
  probe?: (port: number) => Promise<ProbeResult>;
  freePort?: () => Promise<number>;
  tempDir?: string;
  startupMs?: number;
  timeoutMs?: number;
}

/**
 * Starts a throw-away Xray with an HTTP inbound on a free port and fetches a
 * small page through it. The main backend is left alone.
 */
export class XrayConnectionTester implements ConnectionTester {
  private spawnFn: SpawnFn;
  private sleep: (ms: number) => Promise<void>;
  private probe: (port: number) => Promise<ProbeResult>;
  private freePort: () => Promise<number>;
  private tempDir: string;
  private startupMs: number;

  constructor(private options: XrayConnectionTesterOptions) {
    const timeoutMs = options.timeoutMs ?? 3000;
    this.spawnFn = options.spawnFn ?? ((binary, args) => spawn(binary, args, { stdio: 'ignore', windowsHide: true }));
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.probe = options.probe ?? (port => probeThroughHttpProxy(port, PROBE_URL, timeoutMs));
    this.freePort = options.freePort ?? findFreePort;
    this.tempDir = options.tempDir ?? getTempDir();
    this.startupMs = options.startupMs ?? 500;
  }

  async testConnection(config: Record<string, unknown>): Promise<ConnectionTestResult> {
    const outbound = pickTestOutbound(config);
    if (!outbound) {
      return { success: false, latencyMs: null, detail: 'Invalid Config' };
    }

    const binary = this.options.findBinary();
    if (!binary) {
      return { success: false, latencyMs: null, detail: 'Xray Not Found' };
    }

    const port = await this.freePort();
    const configPath = path.join(this.tempDir, `test-${uuidv4()}.json`);
    const testConfig = {
      log: { loglevel: 'none' },
      inbounds: [{
        port,
        listen: '127.0.0.1',
        protocol: 'http',
        settings: { allowTransparent: false },
        sniffing: { enabled: true, destOverride: ['http', 'tls'] },
      }],
      outbounds: [outbound, { protocol: 'freedom', tag: 'direct' }],
    };

    try {
      fs.mkdirSync(this.tempDir, { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(testConfig), { encoding: 'utf-8', mode: 0o600 });
    } catch (error) {
      debugLogger.error('ConnectionTester', 'Failed to write temp config', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, latencyMs: null, detail: 'Config Error' };
    }

    let child: BackendProcess | null = null;
    try {
      child = this.spawnFn(binary, ['run', '-c', configPath]);
      child.on('error', error => debugLogger.warn('ConnectionTester', 'Test process error', { error: error.message }));
      await this.sleep(this.startupMs);

      if (child.exitCode !== null || child.signalCode !== null) {
        return { success: false, latencyMs: null, detail: 'Core Failed' };
      }

      const result = await this.probe(port);
      if (result.ok) {
        return { success: true, latencyMs: result.latencyMs, detail: `${result.latencyMs}ms` };
      }
      return { success: false, latencyMs: null, detail: result.reason };
    } catch (error) {
      debugLogger.warn('ConnectionTester', 'Connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { success: false, latencyMs: null, detail: 'Error' };
    } finally {
      if (child && child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
      try {
        if (fs.existsSync(configPath)) fs.unlinkSync(configPath);
      } catch (error) {
        debugLogger.warn('ConnectionTester', `Failed to remove ${configPath}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
