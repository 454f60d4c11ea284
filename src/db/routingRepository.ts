import path from 'path';
import { getConfigDir } from '../utils/paths.js';
import { isRoutingRules } from '../types/models.js';
import type { RoutingRules, RoutingToggles } from '../types/models.js';
import { atomicWriteJson, isRecord, loadJsonFile } from './jsonStore.js';

export const DEFAULT_ROUTING_TOGGLES: Readonly<RoutingToggles> = {
  block_udp_443: false,
  block_ads: false,
  direct_private_ips: true,
  direct_local_domains: true,
};

const TOGGLE_KEYS: ReadonlyArray<keyof RoutingToggles> = [
  'block_udp_443',
  'block_ads',
  'direct_private_ips',
  'direct_local_domains',
];

const emptyRules = (): RoutingRules => ({ direct: [], proxy: [], block: [] });

export class RoutingRepository {
  private rulesPath: string;
  private togglesPath: string;

  constructor(configDir: string = getConfigDir()) {
    this.rulesPath = path.join(configDir, 'routing_rules.json');
    this.togglesPath = path.join(configDir, 'routing_toggles.json');
  }

  loadRules(): RoutingRules {
    return loadJsonFile(this.rulesPath, emptyRules(), isRoutingRules);
  }

  saveRules(rules: RoutingRules): boolean {
    return atomicWriteJson(this.rulesPath, rules);
  }

  /** Stored toggles over the defaults; non-boolean entries are ignored. */
  loadToggles(): RoutingToggles {
    const stored = loadJsonFile<Record<string, unknown>>(this.togglesPath, {}, isRecord);
    const toggles: RoutingToggles = { ...DEFAULT_ROUTING_TOGGLES };
    for (const key of TOGGLE_KEYS) {
      const value = stored[key];
      if (typeof value === 'boolean') {
        toggles[key] = value;
      }
    }
    return toggles;
  }

  saveToggle(name: keyof RoutingToggles, value: boolean): boolean {
    const toggles = this.loadToggles();
    toggles[name] = value;
    return atomicWriteJson(this.togglesPath, toggles);
  }
}
