import fs from 'fs';
import path from 'path';
import { getLogFilePath } from '../utils/paths.js';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
  details?: unknown;
}

export interface LogFilter {
  level?: LogLevel;
  source?: string;
  /** Only entries newer than this many milliseconds. */
  since?: number;
}

export interface DebugLoggerOptions {
  logFilePath?: string | null;
  debugMode?: boolean;
  /** Console echo; tests switch it off. */
  console?: boolean;
  maxLogs?: number;
}

const describeDetails = (details: unknown): string => {
  if (details instanceof Error) {
    return details.message;
  }
  try {
    return JSON.stringify(details);
  } catch {
    return String(details);
  }
};

export class DebugLogger {
  private logFilePath: string | null;
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private debugMode: boolean;
  private consoleEnabled: boolean;

  constructor(options: DebugLoggerOptions = {}) {
    this.logFilePath = options.logFilePath === undefined ? getLogFilePath() : options.logFilePath;
    this.maxLogs = options.maxLogs ?? 1000;
    this.debugMode = options.debugMode ?? (process.env.DEBUG === 'true' || process.env.NODE_ENV === 'development');
    this.consoleEnabled = options.console ?? process.env.NODE_ENV !== 'test';

    if (this.logFilePath) {
      try {
        fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      } catch (error) {
        this.logFilePath = null;
        if (this.consoleEnabled) {
          console.error('[DebugLogger] Log directory unavailable, file logging disabled:', error);
        }
      }
    }
  }

  log(level: LogLevel, source: string, message: string, details?: unknown): void {
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, source, message };
    if (details !== undefined) {
      entry.details = details instanceof Error ? { message: details.message } : details;
    }

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }

    if (this.consoleEnabled) {
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${source}]`;
      const msg = details !== undefined ? `${message} ${describeDetails(details)}` : message;

      switch (level) {
        case 'error':
          console.error(prefix, msg);
          break;
        case 'warn':
          console.warn(prefix, msg);
          break;
        case 'debug':
          if (this.debugMode) {
            console.log(prefix, msg);
          }
          break;
        default:
          console.log(prefix, msg);
      }
    }

    this.appendToFile(entry);
  }

  info(source: string, message: string, details?: unknown): void {
    this.log('info', source, message, details);
  }

  warn(source: string, message: string, details?: unknown): void {
    this.log('warn', source, message, details);
  }

  error(source: string, message: string, details?: unknown): void {
    this.log('error', source, message, details);
  }

  debug(source: string, message: string, details?: unknown): void {
    this.log('debug', source, message, details);
  }

  private appendToFile(entry: LogEntry): void {
    if (!this.logFilePath) {
      return;
    }
    try {
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      if (this.consoleEnabled) {
        console.error('[DebugLogger] Failed to write to log file:', error);
      }
    }
  }

  getLogs(filter?: LogFilter): LogEntry[] {
    let filtered = [...this.logs];

    if (filter?.level) {
      const level = filter.level;
      filtered = filtered.filter(log => log.level === level);
    }

    if (filter?.source) {
      const source = filter.source;
      filtered = filtered.filter(log => log.source.includes(source));
    }

    if (filter?.since) {
      const sinceDate = new Date(Date.now() - filter.since).toISOString();
      filtered = filtered.filter(log => log.timestamp >= sinceDate);
    }

    return filtered;
  }

  clearLogs(): void {
    this.logs = [];
    if (!this.logFilePath) {
      return;
    }
    try {
      fs.writeFileSync(this.logFilePath, '', 'utf-8');
    } catch (error) {
      if (this.consoleEnabled) {
        console.error('[DebugLogger] Failed to clear log file:', error);
      }
    }
  }

  exportLogs(): string {
    return this.logs.map(log => JSON.stringify(log)).join('\n');
  }

  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  getLogFilePath(): string | null {
    return this.logFilePath;
  }
}

const debugLogger = new DebugLogger();
export default debugLogger;
