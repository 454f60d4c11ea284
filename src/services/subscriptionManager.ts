import http from 'http';
import https from 'https';
import { v4 as uuidv4 } from 'uuid';
import { stripJsonComments } from '../db/configFileLoader.js';
import { isRecord } from '../db/jsonStore.js';
import type { SubscriptionRepository } from '../db/subscriptionRepository.js';
import { isProfileConfig } from '../types/models.js';
import type { Profile, Subscription } from '../types/models.js';
import { isValidURL } from '../utils/validators.js';
import { profileConfigFromServer } from './config/backendConfig.js';
import debugLogger from './debugLogger.js';
import { isShareLink, parseShareLink } from './shareLinks.js';

export type Fetcher = (url: string, timeoutMs: number) => Promise<string>;

export interface SubscriptionUpdateResult {
  success: boolean;
  message: string;
  count: number;
}

export const FETCH_TIMEOUT_MS = 10_000;
const MAX_REDIRECTS = 3;

/** GETs `url` as text, following a few redirects. */
export const httpFetch: Fetcher = (url, timeoutMs) => {
  const get = (target: string, redirects: number): Promise<string> =>
    new Promise((resolve, reject) => {
      const client = target.startsWith('https:') ? https : http;
      const req = client.get(target, { headers: { 'User-Agent': 'Mozilla/5.0' }, timeout: timeoutMs }, res => {
        const status = res.statusCode ?? 0;
        const location = res.headers.location;
        if (status >= 300 && status < 400 && location && redirects < MAX_REDIRECTS) {
          res.resume();
          get(new URL(location, target).toString(), redirects + 1).then(resolve, reject);
          return;
        }
        if (status < 200 || status >= 300) {
          res.resume();
          reject(new Error(`HTTP ${status}`));
          return;
        }
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
        res.on('error', reject);
      });
      req.on('timeout', () => req.destroy(new Error('Request timed out')));
      req.on('error', reject);
    });
  return get(url, 0);
};

const newProfile = (name: string, config: Profile['config']): Profile => ({
  id: uuidv4(),
  name,
  config,
  created_at: new Date().toISOString(),
});

const parseJsonProfiles = (content: string): Profile[] => {
  const cleaned = stripJsonComments(content)
    .replace(/,\s*([\]}])/g, '$1')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g, '');

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (error) {
    debugLogger.debug('SubscriptionManager', 'Content is not JSON', {
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
  if (!Array.isArray(data)) {
    return [];
  }

  const profiles: Profile[] = [];
  for (const item of data) {
    if (!isRecord(item) || !isProfileConfig(item)) continue;
    const name = typeof item.remarks === 'string' ? item.remarks : typeof item.tag === 'string' ? item.tag : 'Server';
    profiles.push(newProfile(name, item));
  }
  return profiles;
};

const looksLikeBase64 = (content: string): boolean => /^[A-Za-z0-9+/=_-]+$/.test(content.replace(/\s+/g, ''));

const decodeLinkList = (content: string): string => {
  if (isShareLink(content) || content.includes('outbounds') || !looksLikeBase64(content)) {
    return content;
  }
  const compact = content.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');
  const decoded = Buffer.from(compact, 'base64').toString('utf-8');
  return decoded.includes('://') ? decoded : content;
};

/**
 * Turns a subscription body into profiles: a JSON array of full configs
 * first, otherwise a base64 or plain list of share links, one per line.
 */
export const parseSubscriptionContent = (raw: string): Profile[] => {
  const content = raw.replace(/^\uFEFF/, '').trim();
  if (!content) {
    return [];
  }

  const fromJson = parseJsonProfiles(content);
  if (fromJson.length > 0) {
    return fromJson;
  }

  const profiles: Profile[] = [];
  for (const line of decodeLinkList(content).split(/\r?\n/)) {
    const link = line.trim();
    if (!link) continue;
    const server = parseShareLink(link);
    if (!server) {
      debugLogger.warn('SubscriptionManager', `Skipping invalid link in subscription: ${link.slice(0, 20)}...`);
      continue;
    }
    profiles.push({ ...newProfile(server.name, profileConfigFromServer(server)), id: server.id });
  }
  return profiles;
};

export class SubscriptionManager {
  constructor(
    private repository: SubscriptionRepository,
    private fetcher: Fetcher = httpFetch,
    private timeoutMs: number = FETCH_TIMEOUT_MS,
  ) {}

  list(): Subscription[] {
    return this.repository.loadAll();
  }

  add(name: string, url: string): string | null {
    if (!isValidURL(url)) {
      debugLogger.warn('SubscriptionManager', `Invalid subscription URL: ${url}`);
      return null;
    }
    return this.repository.save(name, url);
  }

  remove(id: string): boolean {
    return this.repository.delete(id);
  }

  async fetch(url: string): Promise<Profile[]> {
    try {
      const content = await this.fetcher(url, this.timeoutMs);
      return parseSubscriptionContent(content);
    } catch (error) {
      debugLogger.error('SubscriptionManager', `Failed to fetch subscription ${url}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /** Re-downloads a subscription and replaces its stored profiles. */
  async update(id: string): Promise<SubscriptionUpdateResult> {
    const subscription = this.repository.getById(id);
    if (!subscription) {
      return { success: false, message: `Subscription not found: ${id}`, count: 0 };
    }

    debugLogger.info('SubscriptionManager', `Updating subscription: ${subscription.name} (${subscription.url})`);
    try {
      const profiles = await this.fetch(subscription.url);
      const saved = this.repository.update({ ...subscription, profiles, updated_at: new Date().toISOString() });
      if (!saved) {
        return { success: false, message: 'Failed to save subscription', count: 0 };
      }
      return { success: true, message: `Updated ${profiles.length} servers`, count: profiles.length };
    } catch (error) {
      return { success: false, message: error instanceof Error ? error.message : String(error), count: 0 };
    }
  }
}
