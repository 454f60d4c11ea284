import debugLogger from '../debugLogger.js';

/** Lower-case fragments of backend log lines that mean the link is broken. */
export const ERROR_KEYWORDS = [
  'failed to handler mux client connection',
  'transport closed',
  'generic::error',
  'connection reset by peer',
  'connection refused',
  'connection timed out',
  'read timeout',
  'i/o timeout',
  'dial tcp',
  'handshake failed',
  'tls handshake',
  'all retry attempts failed',
  'failed to get',
  'failed to post',
  'no such host',
  'no route to host',
  'network is unreachable',
  'wsarecv:',
];

export const DEBOUNCE_MS = 5000;
export const BASE_COOLDOWN_MS = 5000;
export const MAX_COOLDOWN_MS = 300_000;

export const cooldownFor = (consecutiveFailures: number): number =>
  Math.min(BASE_COOLDOWN_MS * 2 ** (consecutiveFailures - 1), MAX_COOLDOWN_MS);

export interface LineSource {
  onOutput(listener: (line: string) => void): () => void;
}

export interface PassiveLogMonitorOptions {
  onFailure: () => unknown;
  now?: () => number;
}

/**
 * Watches backend output for failure keywords. Each alert pauses the monitor
 * for an exponentially growing cooldown.
 */
export class PassiveLogMonitor {
  private onFailure: PassiveLogMonitorOptions['onFailure'];
  private now: () => number;
  private unsubscribe: (() => void) | null = null;
  private lastAlertAt: number | null = null;
  private paused = false;
  private pausedUntil = 0;
  private consecutiveFailures = 0;

  constructor(options: PassiveLogMonitorOptions) {
    this.onFailure = options.onFailure;
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  start(source: LineSource): void {
    if (this.unsubscribe) {
      return;
    }
    this.reset();
    this.unsubscribe = source.onOutput(line => {
      this.processLine(line);
    });
    debugLogger.info('PassiveLogMonitor', 'Started monitoring backend output');
  }

  stop(): void {
    if (!this.unsubscribe) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
    debugLogger.info('PassiveLogMonitor', 'Stopped monitoring');
  }

  /** Pauses for `durationMs`, or until resume() when 0. */
  pause(durationMs = 0): void {
    if (durationMs > 0) {
      this.pausedUntil = this.now() + durationMs;
    } else {
      this.paused = true;
    }
  }

  resume(): void {
    this.paused = false;
    this.pausedUntil = 0;
    this.lastAlertAt = null;
  }

  reset(): void {
    this.resume();
    this.consecutiveFailures = 0;
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  /** Returns true when the line raised an alert. */
  processLine(line: string): boolean {
    if (this.paused) {
      return false;
    }
    if (this.pausedUntil > 0) {
      if (this.now() < this.pausedUntil) {
        return false;
      }
      this.pausedUntil = 0;
    }

    const lower = line.toLowerCase();
    const keyword = ERROR_KEYWORDS.find(candidate => lower.includes(candidate));
    if (!keyword) {
      return false;
    }
    return this.triggerAlert(line.trim());
  }

  private triggerAlert(line: string): boolean {
    const now = this.now();
    if (this.lastAlertAt !== null && now - this.lastAlertAt < DEBOUNCE_MS) {
      return false;
    }

    debugLogger.warn('PassiveLogMonitor', `Connection failure detected: ${line}`);
    this.lastAlertAt = now;
    this.consecutiveFailures += 1;

    const cooldown = cooldownFor(this.consecutiveFailures);
    debugLogger.info('PassiveLogMonitor', `Backing off for ${cooldown}ms (attempt ${this.consecutiveFailures})`);
    this.pause(cooldown);

    void this.runCallback();
    return true;
  }

  private async runCallback(): Promise<void> {
    try {
      await this.onFailure();
    } catch (error) {
      debugLogger.error('PassiveLogMonitor', 'Error in failure callback', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
