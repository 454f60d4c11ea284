import path from 'path';
import { getConfigDir } from '../utils/paths.js';
import { isDnsServer } from '../types/models.js';
import type { DnsServer } from '../types/models.js';
import { atomicWriteJson, loadJsonFile } from './jsonStore.js';

const defaultDns = (): DnsServer[] => [
  { address: '1.1.1.1', protocol: 'udp', domains: [] },
  { address: '8.8.8.8', protocol: 'udp', domains: [] },
];

const isDnsList = (value: unknown): value is DnsServer[] => Array.isArray(value) && value.every(isDnsServer);

export class DnsRepository {
  private filePath: string;

  constructor(configDir: string = getConfigDir()) {
    this.filePath = path.join(configDir, 'dns_config.json');
  }

  load(): DnsServer[] {
    return loadJsonFile(this.filePath, defaultDns(), isDnsList);
  }

  save(servers: DnsServer[]): boolean {
    return atomicWriteJson(this.filePath, servers);
  }
}
