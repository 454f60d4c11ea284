import path from 'path';
import { atomicWriteJson } from '../db/jsonStore.js';
import { isProfileConfig } from '../types/models.js';
import type { ConnectionMode, ProfileConfig, ServerDefinition } from '../types/models.js';
import { getTempDir } from '../utils/paths.js';
import { BackendConfigError, profileConfigFromServer, serverFromProfileConfig } from './config/backendConfig.js';
import type { ConnectionTester } from './connectionTester.js';
import debugLogger from './debugLogger.js';
import { AutoReconnectService } from './monitoring/autoReconnectService.js';
import type { CancellableSleep, ConfigSource } from './monitoring/autoReconnectService.js';
import { ADOPTED_CONNECTION } from './monitoring/events.js';
import type { CurrentConnection, ReconnectEvent, ReconnectEventListener } from './monitoring/events.js';
import { PassiveLogMonitor } from './monitoring/passiveLogMonitor.js';
import type { NetworkValidator } from './networkValidator.js';
import type { XrayManager } from './xrayManager.js';

/** The parts of the process supervisor a session needs. */
export type BackendSupervisor = Pick<XrayManager, 'isRunning' | 'start' | 'stop' | 'onOutput'>;

export interface ConnectionManagerDeps {
  xray: BackendSupervisor;
  configLoader: ConfigSource;
  networkValidator: NetworkValidator;
  connectionTester: ConnectionTester;
  isAutoReconnectEnabled: () => boolean;
  tempDir?: string;
  monitor?: PassiveLogMonitor;
  sleep?: CancellableSleep;
  stabilizationMs?: number;
}

export const SESSION_FILE_NAME = 'session.json';

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Owns the current session. Connects from profile files, feeds backend output
 * to the log monitor and runs at most one reconnect at a time.
 */
export class ConnectionManager {
  private current: CurrentConnection | null = null;
  private controller = new AbortController();
  private reconnectQueue: Promise<unknown> = Promise.resolve();
  private listeners = new Set<ReconnectEventListener>();
  private reconnect: AutoReconnectService;
  private monitor: PassiveLogMonitor;
  private tempDir: string;

  constructor(private deps: ConnectionManagerDeps) {
    this.tempDir = deps.tempDir ?? getTempDir();
    this.monitor = deps.monitor ?? new PassiveLogMonitor({ onFailure: () => this.handleFailure() });
    this.reconnect = new AutoReconnectService({
      networkValidator: deps.networkValidator,
      connectionTester: deps.connectionTester,
      configLoader: deps.configLoader,
      connect: (filePath, mode, signal) => this.connect(filePath, mode, signal),
      emit: event => this.emit(event),
      sleep: deps.sleep,
      stabilizationMs: deps.stabilizationMs,
    });
  }

  getCurrentConnection(): CurrentConnection | null {
    return this.current ? { ...this.current } : null;
  }

  getSessionFile(): string {
    return path.join(this.tempDir, SESSION_FILE_NAME);
  }

  onEvent(listener: ReconnectEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Starts the backend from a profile file, replacing any running instance.
   * An aborted `signal` stops the attempt before the new backend becomes the
   * session.
   */
  async connect(filePath: string, mode: ConnectionMode, signal?: AbortSignal): Promise<boolean> {
    const { config } = this.deps.configLoader.load(filePath);
    if (!config || !isProfileConfig(config)) {
      debugLogger.error('ConnectionManager', `Not a usable profile file: ${filePath}`);
      return false;
    }

    let server: ServerDefinition;
    try {
      const name = typeof config.remarks === 'string' && config.remarks ? config.remarks : path.basename(filePath);
      server = serverFromProfileConfig(config, 'session', name);
    } catch (error) {
      debugLogger.error('ConnectionManager', `Cannot use ${filePath}`, { error: errorMessage(error) });
      return false;
    }

    if (this.deps.xray.isRunning()) {
      await this.deps.xray.stop();
    }
    if (signal?.aborted) {
      debugLogger.info('ConnectionManager', 'Connect cancelled before start');
      return false;
    }

    const started = await this.deps.xray.start(server, { mode });
    if (!started) {
      debugLogger.error('ConnectionManager', `Failed to connect using ${filePath}`);
      return false;
    }
    if (signal?.aborted) {
      debugLogger.info('ConnectionManager', 'Connect cancelled after start, stopping backend');
      await this.deps.xray.stop();
      return false;
    }

    this.current = { filePath, mode };
    this.monitor.reset();
    this.monitor.start(this.deps.xray);
    debugLogger.info('ConnectionManager', `Connected (${mode})`, { filePath, server: server.name });
    return true;
  }

  /** Writes the server as a profile document to the session file, then connects. */
  async connectServer(server: ServerDefinition, mode: ConnectionMode): Promise<boolean> {
    let document: ProfileConfig;
    try {
      document = profileConfigFromServer(server);
    } catch (error) {
      const level = error instanceof BackendConfigError ? 'warn' : 'error';
      debugLogger[level]('ConnectionManager', `Cannot build profile for ${server.name}`, { error: errorMessage(error) });
      return false;
    }
    return this.connectProfileConfig(document, mode);
  }

  async connectProfileConfig(config: ProfileConfig, mode: ConnectionMode): Promise<boolean> {
    const sessionFile = this.getSessionFile();
    if (!atomicWriteJson(sessionFile, config)) {
      return false;
    }
    return this.connect(sessionFile, mode);
  }

  /** Tracks a backend started elsewhere. Such a session cannot be re-created on failure. */
  adopt(mode: ConnectionMode): void {
    this.current = { filePath: ADOPTED_CONNECTION, mode };
    this.monitor.reset();
    this.monitor.start(this.deps.xray);
  }

  async disconnect(): Promise<boolean> {
    this.controller.abort();
    this.controller = new AbortController();
    this.current = null;
    this.monitor.stop();
    const stopped = await this.deps.xray.stop();
    debugLogger.info('ConnectionManager', 'Disconnected');
    return stopped;
  }

  /**
   * Queues a reconnect attempt behind any attempt already running. Resolves
   * false when the attempt is skipped.
   */
  handleFailure(): Promise<boolean> {
    if (!this.current) {
      debugLogger.debug('ConnectionManager', 'Failure ignored: no active session');
      return Promise.resolve(false);
    }
    if (!this.deps.isAutoReconnectEnabled()) {
      debugLogger.info('ConnectionManager', 'Failure ignored: auto-reconnect is disabled');
      return Promise.resolve(false);
    }

    const signal = this.controller.signal;
    const run = this.reconnectQueue.then(() => {
      if (signal.aborted || !this.current) {
        return false;
      }
      return this.reconnect.handleFailure(this.getCurrentConnection(), signal);
    });
    this.reconnectQueue = run.catch((error: unknown) => {
      debugLogger.error('ConnectionManager', 'Reconnect attempt failed', { error: errorMessage(error) });
    });
    return run;
  }

  private emit(event: ReconnectEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        debugLogger.error('ConnectionManager', `Listener failed for ${event.type}`, { error: errorMessage(error) });
      }
    }
  }
}
