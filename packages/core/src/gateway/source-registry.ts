import type { SourceIdentity } from '@crosscheck/shared/src/types/source.types.js';
import { ConfigurationError, UnknownSourceError } from '@crosscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import type { SourceAdapter } from './types.js';

const log = createChildLogger('gateway:registry');

export interface SourceRegistry {
  get(sourceId: string): SourceAdapter;
  has(sourceId: string): boolean;
  identities(): readonly SourceIdentity[];
}

export function createSourceRegistry(adapters: readonly SourceAdapter[]): SourceRegistry {
  const byId = new Map<string, SourceAdapter>();
  const identities = new Map<string, SourceIdentity>();

  for (const adapter of adapters) {
    const identity = adapter.identify();
    if (byId.has(identity.sourceId)) {
      throw new ConfigurationError(`Duplicate source id: ${identity.sourceId}`);
    }
    byId.set(identity.sourceId, adapter);
    identities.set(identity.sourceId, identity);
  }

  log.info({ sources: [...byId.keys()] }, 'Source registry created');

  return {
    get(sourceId: string): SourceAdapter {
      const adapter = byId.get(sourceId);
      if (!adapter) {
        throw new UnknownSourceError(sourceId);
      }
      return adapter;
    },

    has(sourceId: string): boolean {
      return byId.has(sourceId);
    },

    identities(): readonly SourceIdentity[] {
      return [...identities.values()].sort((a, b) => a.sourceId.localeCompare(b.sourceId));
    },
  };
}
