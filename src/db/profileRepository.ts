import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { ValidationError, validateProfileConfig, validateProfileName } from '../utils/validators.js';
import { isProfile, isProfileConfig } from '../types/models.js';
import type { Profile, ProfileConfig } from '../types/models.js';
import { atomicWriteJson, loadJsonFile } from './jsonStore.js';

export type ProfileUpdate = Partial<Pick<Profile, 'name' | 'config'>>;

const isUnknownArray = (value: unknown): value is unknown[] => Array.isArray(value);

export class ProfileRepository {
  private filePath: string;

  constructor(configDir: string = getConfigDir()) {
    this.filePath = path.join(configDir, 'profiles.json');
  }

  loadAll(): Profile[] {
    return loadJsonFile(this.filePath, [], isUnknownArray).filter(isProfile);
  }

  private passes(check: () => void): boolean {
    try {
      check();
      return true;
    } catch (error) {
      if (error instanceof ValidationError) {
        debugLogger.warn('ProfileRepository', error.message);
        return false;
      }
      throw error;
    }
  }

  private isValidName(name: unknown): name is string {
    return this.passes(() => {
      validateProfileName(name);
    });
  }

  private isValidConfig(config: unknown): config is ProfileConfig {
    const structured = this.passes(() => {
      validateProfileConfig(config);
    });
    if (structured && !isProfileConfig(config)) {
      debugLogger.warn('ProfileRepository', 'Profile config needs an outbounds list');
    }
    return structured && isProfileConfig(config);
  }

  /** Stores a new profile and returns its id, or null when rejected. */
  save(name: string, config: unknown): string | null {
    if (!this.isValidName(name) || !this.isValidConfig(config)) {
      return null;
    }

    const profiles = this.loadAll();
    const id = uuidv4();
    profiles.push({ id, name, config, created_at: new Date().toISOString() });

    if (atomicWriteJson(this.filePath, profiles)) {
      debugLogger.info('ProfileRepository', `Profile saved: ${name}`, { id });
      return id;
    }
    debugLogger.error('ProfileRepository', 'Failed to save profile');
    return null;
  }

  update(id: string, updates: ProfileUpdate): boolean {
    if (!id) return false;
    if (updates.name !== undefined && !this.isValidName(updates.name)) return false;
    if (updates.config !== undefined && !this.isValidConfig(updates.config)) return false;

    const profiles = this.loadAll();
    const index = profiles.findIndex(p => p.id === id);
    if (index === -1) {
      return false;
    }

    const current = profiles[index];
    const config: ProfileConfig = updates.config ?? current.config;
    profiles[index] = {
      ...current,
      name: updates.name ?? current.name,
      config,
      updated_at: new Date().toISOString(),
    };

    if (!atomicWriteJson(this.filePath, profiles)) {
      debugLogger.error('ProfileRepository', 'Failed to save updated profile', { id });
      return false;
    }
    return true;
  }

  delete(id: string): boolean {
    if (!id) return false;

    const profiles = this.loadAll();
    const remaining = profiles.filter(p => p.id !== id);
    if (remaining.length === profiles.length) {
      return false;
    }
    if (!atomicWriteJson(this.filePath, remaining)) {
      debugLogger.error('ProfileRepository', 'Failed to delete profile', { id });
      return false;
    }
    return true;
  }

  getById(id: string): Profile | null {
    if (!id) return null;
    return this.loadAll().find(p => p.id === id) ?? null;
  }
}
