import net from 'net';
import debugLogger from './debugLogger.js';

export interface NetworkValidator {
  checkInternetConnection(): Promise<boolean>;
}

export interface HostPort {
  host: string;
  port: number;
}

export const DEFAULT_TEST_HOSTS: readonly HostPort[] = [
  { host: '8.8.8.8', port: 53 },
  { host: '1.1.1.1', port: 53 },
  { host: '208.67.222.222', port: 53 },
];

export const canConnect = ({ host, port }: HostPort, timeoutMs: number): Promise<boolean> =>
  new Promise(resolve => {
    const socket = new net.Socket();
    const finish = (result: boolean) => {
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });

/** Reachability by TCP connect to well-known DNS resolvers, tried in order. */
export class TcpNetworkValidator implements NetworkValidator {
  constructor(
    private hosts: readonly HostPort[] = DEFAULT_TEST_HOSTS,
    private timeoutMs = 3000,
    private connect: (target: HostPort, timeoutMs: number) => Promise<boolean> = canConnect,
  ) {}

  async checkInternetConnection(): Promise<boolean> {
    for (const target of this.hosts) {
      if (await this.connect(target, this.timeoutMs)) {
        debugLogger.info('NetworkValidator', `Connection verified via ${target.host}:${target.port}`);
        return true;
      }
    }
    debugLogger.error('NetworkValidator', 'Failed to connect to any test host');
    return false;
  }
}
