import type { ConnectionMode } from '../../types/models.js';

export type ReconnectFailureReason = 'no_internet' | 'invalid_connection' | 'connect_failed';

export type ReconnectEvent =
  | { type: 'failure_detected' }
  | { type: 'reconnecting'; filePath: string; mode: ConnectionMode }
  | { type: 'reconnected'; selfRecovered: boolean }
  | { type: 'reconnect_failed'; reason: ReconnectFailureReason };

export type ReconnectEventType = ReconnectEvent['type'];

export type ReconnectEventListener = (event: ReconnectEvent) => void;

/** Placeholder file path used when a running backend was adopted rather than started here. */
export const ADOPTED_CONNECTION = 'Adopted Connection';

export interface CurrentConnection {
  filePath: string | null;
  mode: ConnectionMode | null;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled reconnect event: ${JSON.stringify(value)}`);
};

export const describeReconnectEvent = (event: ReconnectEvent): string => {
  switch (event.type) {
    case 'failure_detected':
      return 'Connection failure detected';
    case 'reconnecting':
      return `Reconnecting (${event.mode})...`;
    case 'reconnected':
      return event.selfRecovered ? 'Connection recovered on its own' : 'Reconnected';
    case 'reconnect_failed':
      switch (event.reason) {
        case 'no_internet':
          return 'Reconnect failed: no internet connection';
        case 'invalid_connection':
          return 'Reconnect failed: no connection to restore';
        case 'connect_failed':
          return 'Reconnect failed: could not start the connection';
        default:
          return assertNever(event.reason);
      }
    default:
      return assertNever(event);
  }
};
