import net from 'net';
import type { RoutingRepository } from '../../db/routingRepository.js';
import type { RoutingCountry, SettingsRepository } from '../../db/settingsRepository.js';
import type { RoutingBucket, RoutingRules, RoutingToggles, XrayRoutingRule } from '../../types/models.js';
import debugLogger from '../debugLogger.js';

/** geosite and geoip tags sent direct for each routing country. */
const COUNTRY_TAGS: Record<Exclude<RoutingCountry, 'none'>, { geosite: string; geoip: string }> = {
  ir: { geosite: 'category-ir', geoip: 'ir' },
  cn: { geosite: 'cn', geoip: 'cn' },
  ru: { geosite: 'category-ru', geoip: 'ru' },
};

export const LOCAL_DOMAINS = ['domain:localhost', 'domain:local', 'domain:lan'];

export const isIpEntry = (value: string): boolean =>
  value.startsWith('geoip:') || value.includes('/') || net.isIP(value) !== 0;

const userRules = (tag: RoutingBucket, entries: string[]): XrayRoutingRule[] => {
  const cleaned = entries.map(entry => entry.trim()).filter(Boolean);
  const ips = cleaned.filter(isIpEntry);
  const domains = cleaned.filter(entry => !isIpEntry(entry));
  const rules: XrayRoutingRule[] = [];
  if (ips.length > 0) rules.push({ type: 'field', outboundTag: tag, ip: ips });
  if (domains.length > 0) rules.push({ type: 'field', outboundTag: tag, domain: domains });
  return rules;
};

/**
 * Rule order: user rules (direct, proxy, block), routing country, then the
 * toggles. The private-IP rule is left to the config generator.
 */
export const buildRoutingRules = (
  rules: RoutingRules,
  toggles: RoutingToggles,
  country: RoutingCountry,
): XrayRoutingRule[] => {
  const result: XrayRoutingRule[] = [
    ...userRules('direct', rules.direct),
    ...userRules('proxy', rules.proxy),
    ...userRules('block', rules.block),
  ];

  if (country !== 'none') {
    const tags = COUNTRY_TAGS[country];
    result.push(
      { type: 'field', outboundTag: 'direct', domain: [`geosite:${tags.geosite}`] },
      { type: 'field', outboundTag: 'direct', ip: [`geoip:${tags.geoip}`] },
    );
  }

  if (toggles.block_udp_443) {
    result.push({ type: 'field', outboundTag: 'block', network: 'udp', port: '443' });
  }
  if (toggles.block_ads) {
    result.push({ type: 'field', outboundTag: 'block', domain: ['geosite:category-ads-all'] });
  }
  if (toggles.direct_local_domains) {
    result.push({ type: 'field', outboundTag: 'direct', domain: [...LOCAL_DOMAINS] });
  }
  return result;
};

export class RoutingManager {
  constructor(
    private repository: RoutingRepository,
    private settings: SettingsRepository,
  ) {}

  getRules(): RoutingRules {
    return this.repository.loadRules();
  }

  getToggles(): RoutingToggles {
    return this.repository.loadToggles();
  }

  addRule(bucket: RoutingBucket, value: string): boolean {
    const entry = value.trim();
    if (!entry) {
      return false;
    }
    const rules = this.repository.loadRules();
    if (rules[bucket].includes(entry)) {
      return false;
    }
    rules[bucket] = [...rules[bucket], entry];
    debugLogger.info('RoutingManager', `Added ${bucket} rule: ${entry}`);
    return this.repository.saveRules(rules);
  }

  removeRule(bucket: RoutingBucket, value: string): boolean {
    const rules = this.repository.loadRules();
    const remaining = rules[bucket].filter(entry => entry !== value.trim());
    if (remaining.length === rules[bucket].length) {
      return false;
    }
    rules[bucket] = remaining;
    return this.repository.saveRules(rules);
  }

  setToggle(name: keyof RoutingToggles, value: boolean): boolean {
    return this.repository.saveToggle(name, value);
  }

  getXrayRoutingRules(): XrayRoutingRule[] {
    const rules = this.repository.loadRules();
    const country = this.settings.getRoutingCountry();
    const generated = buildRoutingRules(rules, this.repository.loadToggles(), country);
    const userCount = rules.direct.length + rules.proxy.length + rules.block.length;
    debugLogger.debug('RoutingManager', `Generated ${generated.length} routing rules`, { country, userRules: userCount });
    return generated;
  }
}
