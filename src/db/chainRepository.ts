import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import debugLogger from '../services/debugLogger.js';
import { getConfigDir } from '../utils/paths.js';
import { ValidationError, validateChainItems } from '../utils/validators.js';
import type { ProfileResolver } from '../utils/validators.js';
import { isChain } from '../types/models.js';
import type { Chain, EnrichedChain } from '../types/models.js';
import { atomicWriteJson, loadJsonFile } from './jsonStore.js';

export type ChainUpdate = Partial<Pick<Chain, 'name' | 'items'>>;

export interface ChainValidationResult {
  valid: boolean;
  error: string;
}

const isUnknownArray = (value: unknown): value is unknown[] => Array.isArray(value);

export class ChainRepository {
  private filePath: string;

  constructor(configDir: string = getConfigDir()) {
    this.filePath = path.join(configDir, 'chains.json');
  }

  /** Raw chains, without checking that their items still resolve. */
  loadAll(): Chain[] {
    return loadJsonFile(this.filePath, [], isUnknownArray).filter(isChain);
  }

  save(name: string, items: string[]): string | null {
    if (!name) {
      debugLogger.warn('ChainRepository', 'Invalid chain name');
      return null;
    }

    const chains = this.loadAll();
    const id = uuidv4();
    chains.push({ id, name, items, created_at: new Date().toISOString() });

    if (atomicWriteJson(this.filePath, chains)) {
      return id;
    }
    debugLogger.error('ChainRepository', 'Failed to save chain');
    return null;
  }

  update(id: string, updates: ChainUpdate): boolean {
    if (!id) return false;

    const chains = this.loadAll();
    const index = chains.findIndex(c => c.id === id);
    if (index === -1) {
      return false;
    }
    const current = chains[index];
    chains[index] = {
      ...current,
      name: updates.name ?? current.name,
      items: updates.items ?? current.items,
      updated_at: new Date().toISOString(),
    };
    return atomicWriteJson(this.filePath, chains);
  }

  delete(id: string): boolean {
    if (!id) return false;
    const chains = this.loadAll();
    const remaining = chains.filter(c => c.id !== id);
    if (remaining.length === chains.length) {
      return false;
    }
    return atomicWriteJson(this.filePath, remaining);
  }

  getById(id: string): Chain | null {
    if (!id) return null;
    return this.loadAll().find(c => c.id === id) ?? null;
  }

  isChain(id: string): boolean {
    if (!id) return false;
    return this.loadAll().some(c => c.id === id);
  }

  loadEnriched(resolver: ProfileResolver): EnrichedChain[] {
    return this.loadAll().map(chain => {
      const missing = chain.items.filter(itemId => !resolver.resolveForValidation(itemId));
      return { ...chain, valid: missing.length === 0, missing_profiles: missing };
    });
  }

  getEnrichedById(id: string, resolver: ProfileResolver): EnrichedChain | null {
    if (!id) return null;
    return this.loadEnriched(resolver).find(c => c.id === id) ?? null;
  }

  validate(items: unknown, resolver: ProfileResolver): ChainValidationResult {
    try {
      validateChainItems(items, id => this.isChain(id), resolver);
      return { valid: true, error: '' };
    } catch (error) {
      if (error instanceof ValidationError) {
        return { valid: false, error: error.message };
      }
      throw error;
    }
  }

  saveValidated(name: string, items: unknown, resolver: ProfileResolver): string | null {
    if (!name) {
      debugLogger.warn('ChainRepository', 'Invalid chain name');
      return null;
    }
    const result = this.validate(items, resolver);
    if (!result.valid || !Array.isArray(items)) {
      debugLogger.warn('ChainRepository', `Chain validation failed: ${result.error}`);
      return null;
    }
    return this.save(name, items.filter((item): item is string => typeof item === 'string'));
  }

  updateValidated(id: string, updates: ChainUpdate, resolver: ProfileResolver): boolean {
    if (!id) return false;

    if (updates.items !== undefined) {
      const result = this.validate(updates.items, resolver);
      if (!result.valid) {
        debugLogger.warn('ChainRepository', `Chain update validation failed: ${result.error}`);
        return false;
      }
    }
    return this.update(id, updates);
  }
}
