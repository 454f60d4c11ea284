import { setTimeout as delay } from 'timers/promises';
import type { ConfigLoadResult } from '../../db/configFileLoader.js';
import type { ConnectionMode } from '../../types/models.js';
import type { ConnectionTester } from '../connectionTester.js';
import debugLogger from '../debugLogger.js';
import type { NetworkValidator } from '../networkValidator.js';
import { ADOPTED_CONNECTION } from './events.js';
import type { CurrentConnection, ReconnectEvent, ReconnectEventListener } from './events.js';

export type ConnectFn = (filePath: string, mode: ConnectionMode, signal?: AbortSignal) => Promise<boolean>;
export type CancellableSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ConfigSource {
  load(filePath: string): ConfigLoadResult;
}

export interface AutoReconnectDeps {
  networkValidator: NetworkValidator;
  connectionTester: ConnectionTester;
  configLoader: ConfigSource;
  connect: ConnectFn;
  emit: ReconnectEventListener;
  sleep?: CancellableSleep;
  stabilizationMs?: number;
}

export const STABILIZATION_MS = 2000;

const defaultSleep: CancellableSleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Reacts to one detected failure: checks the internet, waits for the link to
 * settle, keeps a connection that recovered by itself and otherwise
 * reconnects. Holds no state between calls; callers serialize invocations
 * for the same session.
 */
export class AutoReconnectService {
  private sleep: CancellableSleep;
  private stabilizationMs: number;

  constructor(private deps: AutoReconnectDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.stabilizationMs = deps.stabilizationMs ?? STABILIZATION_MS;
  }

  /**
   * Resolves true when the connection is healthy again. An aborted `signal`
   * ends the flow at the next step without further events.
   */
  async handleFailure(connection: CurrentConnection | null, signal?: AbortSignal): Promise<boolean> {
    this.emit({ type: 'failure_detected' });
    if (signal?.aborted) return this.cancelled();

    const online = await this.deps.networkValidator.checkInternetConnection();
    if (signal?.aborted) return this.cancelled();
    if (!online) {
      debugLogger.warn('AutoReconnect', 'No internet connection, skipping reconnect');
      this.emit({ type: 'reconnect_failed', reason: 'no_internet' });
      return false;
    }

    try {
      await this.sleep(this.stabilizationMs, signal);
    } catch (error) {
      if (signal?.aborted) return this.cancelled();
      throw error;
    }
    if (signal?.aborted) return this.cancelled();

    const filePath = connection?.filePath ?? null;
    const mode = connection?.mode ?? null;

    if (filePath && filePath !== ADOPTED_CONNECTION && (await this.recoveredOnItsOwn(filePath))) {
      if (signal?.aborted) return this.cancelled();
      debugLogger.info('AutoReconnect', 'Connection recovered without restart');
      this.emit({ type: 'reconnected', selfRecovered: true });
      return true;
    }
    if (signal?.aborted) return this.cancelled();

    if (!filePath || !mode || filePath === ADOPTED_CONNECTION) {
      debugLogger.warn('AutoReconnect', 'No reconnectable connection', { filePath, mode });
      this.emit({ type: 'reconnect_failed', reason: 'invalid_connection' });
      return false;
    }

    this.emit({ type: 'reconnecting', filePath, mode });
    let connected = false;
    try {
      connected = await this.deps.connect(filePath, mode, signal);
    } catch (error) {
      debugLogger.error('AutoReconnect', 'Reconnect attempt threw', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (signal?.aborted) return this.cancelled();
    if (connected) {
      this.emit({ type: 'reconnected', selfRecovered: false });
      return true;
    }
    this.emit({ type: 'reconnect_failed', reason: 'connect_failed' });
    return false;
  }

  private async recoveredOnItsOwn(filePath: string): Promise<boolean> {
    const { config } = this.deps.configLoader.load(filePath);
    if (!config) {
      return false;
    }
    try {
      const result = await this.deps.connectionTester.testConnection(config);
      debugLogger.info('AutoReconnect', `Recovery probe: ${result.detail}`);
      return result.success;
    } catch (error) {
      debugLogger.warn('AutoReconnect', 'Recovery probe failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private cancelled(): false {
    debugLogger.info('AutoReconnect', 'Reconnect cancelled');
    return false;
  }

  private emit(event: ReconnectEvent): void {
    try {
      this.deps.emit(event);
    } catch (error) {
      debugLogger.error('AutoReconnect', `Event listener failed for ${event.type}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
