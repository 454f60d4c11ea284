import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { isProfileConfig } from '../types/models.js';
import type { Profile, Subscription } from '../types/models.js';
import { atomicWriteJson, isRecord, loadJsonFile } from './jsonStore.js';

const isUnknownArray = (value: unknown): value is unknown[] => Array.isArray(value);

const asString = (value: unknown, fallback = ''): string => (typeof value === 'string' ? value : fallback);

export class SubscriptionRepository {
  private filePath: string;

  constructor(configDir: string = getConfigDir()) {
    this.filePath = path.join(configDir, 'subscriptions.json');
  }

  /**
   * Loads every subscription. Profiles stored without an id get one here and
   * the document is rewritten so the ids stay stable.
   */
  loadAll(): Subscription[] {
    const raw = loadJsonFile(this.filePath, [], isUnknownArray);
    let dirty = false;

    const subscriptions: Subscription[] = [];
    for (const entry of raw) {
      if (!isRecord(entry) || typeof entry.id !== 'string') {
        continue;
      }

      const profiles: Profile[] = [];
      const rawProfiles = Array.isArray(entry.profiles) ? entry.profiles : [];
      for (const candidate of rawProfiles) {
        if (!isRecord(candidate) || !isProfileConfig(candidate.config)) {
          continue;
        }
        let id = asString(candidate.id);
        if (!id) {
          id = uuidv4();
          dirty = true;
        }
        profiles.push({
          id,
          name: asString(candidate.name, 'Unnamed'),
          config: candidate.config,
          created_at: asString(candidate.created_at),
        });
      }

      const subscription: Subscription = {
        id: entry.id,
        name: asString(entry.name),
        url: asString(entry.url),
        profiles,
        created_at: asString(entry.created_at),
      };
      if (typeof entry.updated_at === 'string') {
        subscription.updated_at = entry.updated_at;
      }
      subscriptions.push(subscription);
    }

    if (dirty) {
      debugLogger.info('SubscriptionRepository', 'Assigned ids to subscription profiles');
      atomicWriteJson(this.filePath, subscriptions);
    }
    return subscriptions;
  }

  save(name: string, url: string): string | null {
    if (!name || !url) {
      debugLogger.warn('SubscriptionRepository', 'Subscription name and url are required');
      return null;
    }
    const subscriptions = this.loadAll();
    const id = uuidv4();
    subscriptions.push({ id, name, url, profiles: [], created_at: new Date().toISOString() });
    return atomicWriteJson(this.filePath, subscriptions) ? id : null;
  }

  /** Replaces the stored subscription that has the same id. */
  update(subscription: Subscription): boolean {
    const subscriptions = this.loadAll();
    const index = subscriptions.findIndex(s => s.id === subscription.id);
    if (index === -1) {
      return false;
    }
    subscriptions[index] = subscription;
    return atomicWriteJson(this.filePath, subscriptions);
  }

  delete(id: string): boolean {
    const subscriptions = this.loadAll();
    const remaining = subscriptions.filter(s => s.id !== id);
    if (remaining.length === subscriptions.length) {
      return false;
    }
    return atomicWriteJson(this.filePath, remaining);
  }

  getById(id: string): Subscription | null {
    if (!id) return null;
    return this.loadAll().find(s => s.id === id) ?? null;
  }
}
