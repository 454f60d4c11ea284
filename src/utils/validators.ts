import { CHAINABLE_PROTOCOLS, NON_CHAINABLE_PROTOCOLS } from '../types/models.js';
import type { OutboundConfig, Profile, ProfileConfig } from '../types/models.js';
import { isRecord } from '../db/jsonStore.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Looks a profile up by id for chain validation. Chains are never returned. */
export interface ProfileResolver {
  resolveForValidation(profileId: string): Profile | null;
}

export const MIN_PORT = 1024;
export const MAX_PORT = 65535;

export function validatePort(port: unknown): asserts port is number {
  if (typeof port !== 'number' || !Number.isInteger(port)) {
    throw new ValidationError('Port must be an integer');
  }
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new ValidationError(`Port must be between ${MIN_PORT} and ${MAX_PORT}, got ${port}`);
  }
}

const isChainable = (outbound: OutboundConfig): boolean => {
  const chainable: readonly string[] = CHAINABLE_PROTOCOLS;
  return chainable.includes(outbound.protocol ?? '');
};

/** The outbound a profile contributes to a chain: the first chainable one listed. */
export const getChainOutbound = (config: ProfileConfig): OutboundConfig | null =>
  config.outbounds.find(isChainable) ?? null;

/** The outbound a profile connects through: the one tagged `proxy`, else its chain outbound. */
export const getProxyOutbound = (config: ProfileConfig): OutboundConfig | null =>
  config.outbounds.find(outbound => outbound.tag === 'proxy') ?? getChainOutbound(config);

const hasDialerProxy = (outbound: OutboundConfig): boolean => {
  const stream = outbound.streamSettings;
  if (!stream || !isRecord(stream.sockopt)) {
    return false;
  }
  return Boolean(stream.sockopt.dialerProxy);
};

/**
 * Throws on the first violation found. Whole-list checks run first, then each
 * item is checked in order.
 */
export function validateChainItems(
  items: unknown,
  isChain: (id: string) => boolean,
  resolver: ProfileResolver,
): asserts items is string[] {
  if (!Array.isArray(items) || items.length === 0 || !items.every(item => typeof item === 'string')) {
    throw new ValidationError('Invalid chain items');
  }

  if (items.length < 2) {
    throw new ValidationError('Chain must have at least 2 items');
  }

  if (new Set(items).size !== items.length) {
    throw new ValidationError('Duplicate server in chain');
  }

  const chainable: readonly string[] = CHAINABLE_PROTOCOLS;
  const blocked: readonly string[] = NON_CHAINABLE_PROTOCOLS;

  items.forEach((profileId: string, idx: number) => {
    if (isChain(profileId)) {
      throw new ValidationError('Chains cannot contain other chains');
    }

    const profile = resolver.resolveForValidation(profileId);
    if (!profile) {
      throw new ValidationError(`Server not found: ${profileId.slice(0, 8)}...`);
    }

    const outbound = getChainOutbound(profile.config);
    if (!outbound) {
      throw new ValidationError('No valid proxy outbound in profile');
    }

    const protocol = outbound.protocol ?? '';
    if (blocked.includes(protocol)) {
      throw new ValidationError(`${protocol} cannot be used in chains`);
    }
    if (!chainable.includes(protocol)) {
      throw new ValidationError(`${protocol} does not support chaining`);
    }

    if (idx === items.length - 1 && hasDialerProxy(outbound)) {
      throw new ValidationError('Last server already has dialerProxy configured');
    }
  });
}

export function validateProfileName(name: unknown): asserts name is string {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ValidationError('Profile name is required');
  }
}

export function validateProfileConfig(config: unknown): asserts config is Record<string, unknown> {
  if (!isRecord(config)) {
    throw new ValidationError('Profile config must be a dictionary');
  }
}

export const formatBytes = (bytes: number): string => {
  if (bytes === 0) return '0 Bytes';
  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
};

export const isValidURL = (url: string): boolean => {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
};
