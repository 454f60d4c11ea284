import type { ChainRepository } from '../db/chainRepository.js';
import type { ProfileRepository } from '../db/profileRepository.js';
import type { SubscriptionRepository } from '../db/subscriptionRepository.js';
import type { Chain, Profile } from '../types/models.js';
import type { ProfileResolver } from '../utils/validators.js';

export type ResolvedEntry = { kind: 'profile'; profile: Profile } | { kind: 'chain'; chain: Chain };

/** Finds profiles by id across local profiles, subscriptions and chains. */
export class RepositoryProfileResolver implements ProfileResolver {
  constructor(
    private profiles: ProfileRepository,
    private subscriptions: SubscriptionRepository,
    private chains: ChainRepository,
  ) {}

  resolve(id: string, includeChains = true): ResolvedEntry | null {
    if (!id) {
      return null;
    }

    const local = this.profiles.getById(id);
    if (local) {
      return { kind: 'profile', profile: local };
    }

    for (const subscription of this.subscriptions.loadAll()) {
      const match = subscription.profiles.find(p => p.id === id);
      if (match) {
        return { kind: 'profile', profile: match };
      }
    }

    if (includeChains) {
      const chain = this.chains.getById(id);
      if (chain) {
        return { kind: 'chain', chain };
      }
    }
    return null;
  }

  resolveForValidation(id: string): Profile | null {
    const entry = this.resolve(id, false);
    return entry?.kind === 'profile' ? entry.profile : null;
  }
}
