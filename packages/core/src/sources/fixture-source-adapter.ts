import type { QueryParams, RawResponse, SourceIdentity } from '@crosscheck/shared/src/types/source.types.js';
import {
  AdapterAuthError,
  AdapterParseError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  AdapterUpstreamError,
} from '@crosscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import type { FixtureSourceDefinition } from '@crosscheck/schemas/src/source-fixtures.schema.js';
import { normalizeQuery } from '../cache/cache-key.js';
import type { SourceAdapter } from '../gateway/types.js';
import type { Scheduler } from '../gateway/scheduler.js';
import { systemScheduler } from '../gateway/scheduler.js';

const log = createChildLogger('sources:fixture');

export interface FixtureSourceAdapter extends SourceAdapter {
  /** Number of `fetch` calls made so far. */
  readonly calls: number;
  readonly queries: readonly string[];
}

export interface FixtureSourceOptions {
  /** Fail only the first N fetches, then answer normally. */
  readonly failTimes?: number;
  readonly scheduler?: Scheduler;
}

function failureFor(definition: FixtureSourceDefinition): Error {
  const sourceId = definition.id;
  switch (definition.failWith) {
    case 'rate_limited':
      return new AdapterRateLimitError(sourceId);
    case 'timeout':
      return new AdapterTimeoutError(sourceId);
    case 'upstream':
      return new AdapterUpstreamError(sourceId, 503);
    case 'auth':
      return new AdapterAuthError(sourceId, 'fixture credentials rejected');
    case 'parse':
      return new AdapterParseError(sourceId, 'fixture body malformed');
    default:
      return new Error(`Fixture source ${sourceId} failed`);
  }
}

/** Source adapter answering from static records keyed by normalized query. */
export function createFixtureSourceAdapter(
  definition: FixtureSourceDefinition,
  options: FixtureSourceOptions = {},
): FixtureSourceAdapter {
  const scheduler = options.scheduler ?? systemScheduler;
  const queries: string[] = [];
  const identity: SourceIdentity = {
    sourceId: definition.id,
    displayName: definition.displayName,
    qualityTier: definition.qualityTier,
    domains: definition.domains,
    configured: definition.configured,
  };

  return {
    get calls(): number {
      return queries.length;
    },

    queries,

    identify(): SourceIdentity {
      return identity;
    },

    async fetch(params: QueryParams, signal: AbortSignal): Promise<RawResponse> {
      const query = normalizeQuery(params.query);
      queries.push(query);

      if (definition.latencyMs > 0) {
        await scheduler.sleep(definition.latencyMs, signal);
      }

      if (definition.failWith && (options.failTimes === undefined || queries.length <= options.failTimes)) {
        log.debug({ sourceId: definition.id, failure: definition.failWith }, 'Fixture failure');
        throw failureFor(definition);
      }

      const records = definition.responses[query] ?? [];
      if (records.length === 0) {
        return { kind: 'empty' };
      }

      return {
        kind: 'records',
        records: records.slice(0, params.maxResultsPerSource),
        ...(definition.sourceUrl ? { sourceUrl: definition.sourceUrl } : {}),
      };
    },

    healthCheck(): Promise<boolean> {
      return Promise.resolve(definition.healthy);
    },
  };
}

export function createFixtureSourceAdapters(
  definitions: readonly FixtureSourceDefinition[],
  options: Omit<FixtureSourceOptions, 'failTimes'> = {},
): FixtureSourceAdapter[] {
  return definitions.map((definition) => createFixtureSourceAdapter(definition, options));
}
