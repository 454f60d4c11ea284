import { spawn } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import readline from 'readline';
import type { Readable } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import pidusage from 'pidusage';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from '../db/appConfig.js';
import type { ConnectionMode, ServerDefinition, XrayConfig } from '../types/models.js';
import { getTempDir } from '../utils/paths.js';
import { generateXrayConfig } from './config/backendConfig.js';
import type { BackendConfigOptions } from './config/backendConfig.js';
import debugLogger from './debugLogger.js';

export type SupervisorState = 'stopped' | 'starting' | 'running' | 'stopping' | 'failed_to_start';

/** The part of a child process the supervisor relies on. */
export interface BackendProcess {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (binary: string, args: string[]) => BackendProcess;

export interface ProcessStats {
  cpu: number;
  memory: number;
  elapsed: number;
  timestamp: number;
}

export interface XrayStatus {
  running: boolean;
  state: SupervisorState;
  pid: number | null;
  configFile: string | null;
  cpuPercent?: number;
  memoryMb?: number;
  /** Epoch milliseconds. */
  createTime?: number;
}

export type OutputListener = (line: string, stream: 'stdout' | 'stderr') => void;

export interface StartOptions {
  mode?: ConnectionMode;
}

export interface XrayManagerOptions {
  spawnFn?: SpawnFn;
  sleep?: (ms: number) => Promise<void>;
  fileExists?: (filePath: string) => boolean;
  which?: (name: string) => string | null;
  stats?: (pid: number) => Promise<ProcessStats>;
  /** Extra generator inputs (routing rules, DNS) read on every start. */
  configOptions?: () => Omit<BackendConfigOptions, 'logLevel' | 'mode'>;
  tempDir?: string;
  settleMs?: number;
  stopTimeoutMs?: number;
  restartPauseMs?: number;
  pollIntervalMs?: number;
}

const STDERR_TAIL = 50;

const defaultSpawn: SpawnFn = (binary, args) =>
  spawn(binary, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: false,
    windowsHide: true,
  });

/** Scans PATH for an executable called `name`. */
export const findOnPath = (name: string, fileExists: (filePath: string) => boolean = fs.existsSync): string | null => {
  const dirs = (process.env.PATH || '').split(path.delimiter).filter(Boolean);
  const extensions =
    process.platform === 'win32' && !path.extname(name)
      ? (process.env.PATHEXT || '.EXE;.CMD;.BAT').split(';').map(ext => ext.toLowerCase())
      : [''];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (fileExists(candidate)) {
        return candidate;
      }
    }
  }
  return null;
};

export const commonXrayLocations = (platform: NodeJS.Platform = process.platform, home: string = os.homedir()): string[] => {
  switch (platform) {
    case 'win32':
      return [
        'C:/Program Files/Xray/xray.exe',
        'C:/Program Files (x86)/Xray/xray.exe',
        path.join(home, 'AppData', 'Local', 'Xray', 'xray.exe'),
      ];
    case 'darwin':
      return ['/usr/local/bin/xray', '/opt/homebrew/bin/xray', path.join(home, '.local', 'bin', 'xray')];
    default:
      return ['/usr/local/bin/xray', '/usr/bin/xray', path.join(home, '.local', 'bin', 'xray')];
  }
};

const hasExited = (child: BackendProcess): boolean => child.exitCode !== null || child.signalCode !== null;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Owns a single Xray process slot: spawns it against a freshly written
 * config file, watches it settle, stops it and removes the file again.
 */
export class XrayManager {
  private process: BackendProcess | null = null;
  private configFile: string | null = null;
  private state: SupervisorState = 'stopped';
  private spawnError: Error | null = null;
  private stderrTail: string[] = [];
  private outputListeners = new Set<OutputListener>();

  private spawnFn: SpawnFn;
  private sleep: (ms: number) => Promise<void>;
  private fileExists: (filePath: string) => boolean;
  private which: (name: string) => string | null;
  private stats: (pid: number) => Promise<ProcessStats>;
  private configOptions: NonNullable<XrayManagerOptions['configOptions']>;
  private tempDir: string;
  private settleMs: number;
  private stopTimeoutMs: number;
  private restartPauseMs: number;
  private pollIntervalMs: number;

  constructor(private config: AppConfig, options: XrayManagerOptions = {}) {
    this.spawnFn = options.spawnFn ?? defaultSpawn;
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.fileExists = options.fileExists ?? fs.existsSync;
    this.which = options.which ?? (name => findOnPath(name, this.fileExists));
    this.stats = options.stats ?? (pid => pidusage(pid));
    this.configOptions = options.configOptions ?? (() => ({}));
    this.tempDir = options.tempDir ?? getTempDir();
    this.settleMs = options.settleMs ?? 1000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.restartPauseMs = options.restartPauseMs ?? 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  getState(): SupervisorState {
    return this.state;
  }

  getConfigFile(): string | null {
    return this.configFile;
  }

  getPid(): number | null {
    return this.process?.pid ?? null;
  }

  /** Subscribes to backend output lines. Returns an unsubscribe function. */
  onOutput(listener: OutputListener): () => void {
    this.outputListeners.add(listener);
    return () => {
      this.outputListeners.delete(listener);
    };
  }

  findXrayBinary(): string | null {
    const configured = this.config.getXrayBinary();

    if (path.isAbsolute(configured) && this.fileExists(configured)) {
      return configured;
    }

    const found = this.which(configured);
    if (found) {
      return found;
    }

    const fallback = commonXrayLocations().find(candidate => this.fileExists(candidate));
    if (fallback) {
      return fallback;
    }

    debugLogger.warn('XrayManager', `Xray binary not found: ${configured}`);
    return null;
  }

  buildConfig(server: ServerDefinition, options: StartOptions = {}): XrayConfig {
    return generateXrayConfig(server, {
      ...this.configOptions(),
      logLevel: this.config.getLogLevel(),
      mode: options.mode,
    });
  }

  async start(server?: ServerDefinition, options: StartOptions = {}): Promise<boolean> {
    if (this.isRunning() || this.state === 'starting' || this.state === 'stopping') {
      debugLogger.warn('XrayManager', 'Xray is already running');
      return false;
    }

    const target = server ?? this.config.getActiveServer();
    if (!target) {
      debugLogger.error('XrayManager', 'No active server configured');
      return false;
    }

    const binary = this.findXrayBinary();
    if (!binary) {
      return false;
    }

    let xrayConfig: XrayConfig;
    try {
      xrayConfig = this.buildConfig(target, options);
    } catch (error) {
      debugLogger.error('XrayManager', `Cannot build config for ${target.name}`, { error: errorMessage(error) });
      return false;
    }

    this.state = 'starting';
    const configFile = this.writeTempConfig(xrayConfig);
    if (!configFile) {
      this.state = 'stopped';
      return false;
    }

    let child: BackendProcess;
    try {
      child = this.spawnFn(binary, ['run', '-c', configFile]);
    } catch (error) {
      debugLogger.error('XrayManager', 'Failed to spawn Xray', { error: errorMessage(error) });
      this.removeFile(configFile);
      this.state = 'stopped';
      return false;
    }

    this.process = child;
    this.spawnError = null;
    this.stderrTail = [];
    child.on('error', error => {
      this.spawnError = error;
      debugLogger.error('XrayManager', 'Xray process error', { error: error.message });
    });
    this.attachOutput(child);

    debugLogger.info('XrayManager', `Starting Xray for ${target.name}`, { pid: child.pid, configFile });
    await this.sleep(this.settleMs);

    if (hasExited(child) || this.spawnError) {
      this.state = 'failed_to_start';
      debugLogger.error('XrayManager', 'Xray exited during startup', {
        exitCode: child.exitCode,
        signal: child.signalCode,
        stderr: this.stderrTail.join('\n'),
      });
      this.removeFile(configFile);
      this.process = null;
      this.state = 'stopped';
      return false;
    }

    this.configFile = configFile;
    this.state = 'running';
    debugLogger.info('XrayManager', 'Xray started', { pid: child.pid });
    return true;
  }

  async stop(): Promise<boolean> {
    const child = this.process;
    if (!child || !this.isRunning()) {
      return false;
    }

    this.state = 'stopping';
    try {
      child.kill('SIGTERM');
      if (!(await this.waitForExit(child, this.stopTimeoutMs))) {
        debugLogger.warn('XrayManager', `Xray did not exit within ${this.stopTimeoutMs}ms, killing`);
        child.kill('SIGKILL');
        await this.waitForExit(child, this.pollIntervalMs * 10);
      }
      debugLogger.info('XrayManager', 'Xray stopped');
      return true;
    } catch (error) {
      debugLogger.error('XrayManager', 'Error stopping Xray', { error: errorMessage(error) });
      return false;
    } finally {
      this.releaseSlot();
    }
  }

  async restart(server?: ServerDefinition, options: StartOptions = {}): Promise<boolean> {
    await this.stop();
    await this.sleep(this.restartPauseMs);
    return this.start(server, options);
  }

  /**
   * Polls the child. A process that exited on its own is forgotten here, so
   * callers see a consistent slot afterwards.
   */
  isRunning(): boolean {
    const child = this.process;
    if (!child) {
      return false;
    }
    if (this.state === 'starting') {
      return !hasExited(child);
    }
    if (hasExited(child) || this.spawnError) {
      debugLogger.warn('XrayManager', 'Xray process exited unexpectedly', {
        exitCode: child.exitCode,
        signal: child.signalCode,
      });
      this.releaseSlot();
      return false;
    }
    return true;
  }

  async getStatus(): Promise<XrayStatus> {
    const running = this.isRunning();
    const status: XrayStatus = {
      running,
      state: this.state,
      pid: running ? this.getPid() : null,
      configFile: running ? this.configFile : null,
    };

    if (running && status.pid !== null) {
      try {
        const stats = await this.stats(status.pid);
        status.cpuPercent = stats.cpu;
        status.memoryMb = stats.memory / (1024 * 1024);
        status.createTime = stats.timestamp - stats.elapsed;
      } catch (error) {
        debugLogger.debug('XrayManager', 'Process metrics unavailable', { error: errorMessage(error) });
      }
    }
    return status;
  }

  private async waitForExit(child: BackendProcess, timeoutMs: number): Promise<boolean> {
    const attempts = Math.max(1, Math.ceil(timeoutMs / this.pollIntervalMs));
    for (let i = 0; i < attempts; i++) {
      if (hasExited(child)) {
        return true;
      }
      await this.sleep(this.pollIntervalMs);
    }
    return hasExited(child);
  }

  private releaseSlot(): void {
    if (this.configFile) {
      this.removeFile(this.configFile);
    }
    this.configFile = null;
    this.process = null;
    this.state = 'stopped';
  }

  private writeTempConfig(config: XrayConfig): string | null {
    const filePath = path.join(this.tempDir, `xenray-${uuidv4()}.json`);
    try {
      fs.mkdirSync(this.tempDir, { recursive: true });
      fs.writeFileSync(filePath, JSON.stringify(config, null, 2), { encoding: 'utf-8', flag: 'wx', mode: 0o600 });
      return filePath;
    } catch (error) {
      debugLogger.error('XrayManager', 'Failed to write Xray config', { error: errorMessage(error) });
      return null;
    }
  }

  private removeFile(filePath: string): void {
    try {
      if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
    } catch (error) {
      debugLogger.warn('XrayManager', `Failed to remove ${filePath}`, { error: errorMessage(error) });
    }
  }

  private attachOutput(child: BackendProcess): void {
    const pipe = (stream: Readable | null, name: 'stdout' | 'stderr') => {
      if (!stream) return;
      const lines = readline.createInterface({ input: stream });
      lines.on('line', line => {
        if (!line.trim()) return;
        if (name === 'stderr') {
          this.stderrTail.push(line);
          if (this.stderrTail.length > STDERR_TAIL) this.stderrTail.shift();
        }
        debugLogger.debug('Xray', line);
        for (const listener of this.outputListeners) {
          try {
            listener(line, name);
          } catch (error) {
            debugLogger.error('XrayManager', 'Output listener failed', { error: errorMessage(error) });
          }
        }
      });
    };
    pipe(child.stdout, 'stdout');
    pipe(child.stderr, 'stderr');
  }
}
