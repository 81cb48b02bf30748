import type {
  FailureKind,
  QueryParams,
  SourceIdentity,
  SourcePayload,
  SourceResult,
  SourceStatus,
} from '@crosscheck/shared/src/types/source.types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import type {
  CacheConfig,
  GatewayConfig,
  SourcePolicyConfig,
} from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import type { CacheTier } from '../cache/cache-tier.js';
import { createCacheKey } from '../cache/cache-key.js';
import { computeBackoffMs } from './backoff.js';
import { classifyError } from './classify.js';
import type { Classification } from './classify.js';
import { TokenBucket } from './rate-limiter.js';
import type { Scheduler } from './scheduler.js';
import { AbortedError, systemScheduler, withTimeout } from './scheduler.js';
import { SingleFlight } from './single-flight.js';
import type { SourceRegistry } from './source-registry.js';
import type { AdapterGateway, GatewayQueryOptions } from './types.js';

const log = createChildLogger('gateway');

export interface AdapterGatewayDeps {
  readonly registry: SourceRegistry;
  readonly cache: CacheTier;
  readonly gateway: GatewayConfig;
  readonly cacheConfig: CacheConfig;
  readonly sources?: Readonly<Record<string, SourcePolicyConfig>>;
  readonly scheduler?: Scheduler;
  readonly random?: () => number;
}

interface MutableStatus {
  lastHealthCheck: { healthy: boolean; checkedAt: Date } | null;
  lastLatencyMs: number | null;
  lastSuccessAt: Date | null;
  lastFailure: { kind: FailureKind; at: Date } | null;
}

type ResultMeta = Pick<SourceResult, 'sourceId' | 'qualityTier' | 'fetchedAt' | 'fromCache' | 'stale' | 'latencyMs'>;

/** Parameters that change an upstream answer, apart from the query itself. */
function cacheParams(params: QueryParams): Record<string, unknown> {
  return {
    timeWindow: params.timeWindow,
    maxResultsPerSource: params.maxResultsPerSource,
    isEntity: params.isEntity,
  };
}

function fromPayload(meta: ResultMeta, payload: SourcePayload): SourceResult {
  return payload.records.length === 0
    ? { ...meta, status: 'no_data' }
    : { ...meta, status: 'success', payload };
}

export function createAdapterGateway(deps: AdapterGatewayDeps): AdapterGateway {
  const { registry, cache, gateway: config, cacheConfig } = deps;
  const policies = deps.sources ?? {};
  const scheduler = deps.scheduler ?? systemScheduler;
  const random = deps.random ?? Math.random;
  const flight = new SingleFlight<SourceResult>();
  const limiters = new Map<string, TokenBucket>();
  const statuses = new Map<string, MutableStatus>();

  function statusFor(sourceId: string): MutableStatus {
    let status = statuses.get(sourceId);
    if (!status) {
      status = { lastHealthCheck: null, lastLatencyMs: null, lastSuccessAt: null, lastFailure: null };
      statuses.set(sourceId, status);
    }
    return status;
  }

  function limiterFor(sourceId: string): TokenBucket | undefined {
    const rateLimit = policies[sourceId]?.rateLimit;
    if (!rateLimit) {
      return undefined;
    }
    let limiter = limiters.get(sourceId);
    if (!limiter) {
      limiter = new TokenBucket(rateLimit, scheduler);
      limiters.set(sourceId, limiter);
    }
    return limiter;
  }

  /** `fetchedAt` is when the payload left the source: the entry's creation time for cache reads. */
  function meta(
    identity: SourceIdentity,
    startedAt: number,
    cached?: { readonly createdAt: Date; readonly stale: boolean },
  ): ResultMeta {
    return {
      sourceId: identity.sourceId,
      qualityTier: identity.qualityTier,
      fetchedAt: cached?.createdAt ?? new Date(),
      fromCache: cached !== undefined,
      stale: cached?.stale ?? false,
      latencyMs: Math.max(0, scheduler.now() - startedAt),
    };
  }

  function failed(
    identity: SourceIdentity,
    startedAt: number,
    classification: Pick<Classification, 'kind' | 'transient'>,
    attempts: number,
    message: string,
  ): SourceResult {
    const status = statusFor(identity.sourceId);
    status.lastFailure = { kind: classification.kind, at: new Date() };
    return {
      ...meta(identity, startedAt),
      status: 'error',
      failure: { kind: classification.kind, transient: classification.transient, attempts, message },
    };
  }

  async function fetchLive(
    identity: SourceIdentity,
    params: QueryParams,
    key: string,
    signal: AbortSignal,
  ): Promise<SourceResult> {
    const { sourceId } = identity;
    const adapter = registry.get(sourceId);
    const policy = policies[sourceId];
    const timeoutMs = policy?.callTimeoutMs ?? config.callTimeoutMs;
    const { maxAttempts } = config.retry;
    const limiter = limiterFor(sourceId);
    const startedAt = scheduler.now();
    const status = statusFor(sourceId);

    let last: Classification = { kind: 'unknown', transient: false };
    let lastMessage = '';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        if (limiter) {
          const permit = await limiter.acquire(config.rateLimitMaxWaitMs, signal);
          if (!permit.acquired) {
            log.warn({ sourceId, retryAfterMs: permit.retryAfterMs }, 'Local rate limit exhausted');
            status.lastFailure = { kind: 'rate_limited', at: new Date() };
            return { ...meta(identity, startedAt), status: 'rate_limited', retryAfterMs: permit.retryAfterMs };
          }
        }

        const callStartedAt = scheduler.now();
        const response = await withTimeout(sourceId, timeoutMs, signal, (callSignal) =>
          adapter.fetch(params, callSignal),
        );
        status.lastLatencyMs = Math.max(0, scheduler.now() - callStartedAt);

        if (response.kind === 'rate_limited') {
          last =
            response.retryAfterMs === undefined
              ? { kind: 'rate_limited', transient: true }
              : { kind: 'rate_limited', transient: true, retryAfterMs: response.retryAfterMs };
          lastMessage = 'Upstream rate limit';
        } else {
          const payload: SourcePayload =
            response.kind === 'records'
              ? { records: response.records, ...(response.sourceUrl ? { sourceUrl: response.sourceUrl } : {}) }
              : { records: [] };
          const ttlSeconds =
            payload.records.length === 0
              ? cacheConfig.noDataTtlSeconds
              : (policy?.ttlSeconds ?? cacheConfig.defaultTtlSeconds);

          await cache.set(key, payload, ttlSeconds, sourceId);
          status.lastSuccessAt = new Date();
          log.debug({ sourceId, records: payload.records.length, attempt: attempt + 1 }, 'Source answered');
          return fromPayload(meta(identity, startedAt), payload);
        }
      } catch (error) {
        if (signal.aborted || error instanceof AbortedError) {
          return failed(identity, startedAt, { kind: 'timeout', transient: true }, attempt + 1, 'Cancelled');
        }
        last = classifyError(error);
        lastMessage = error instanceof Error ? error.message : String(error);

        if (!last.transient) {
          log.warn({ sourceId, kind: last.kind, err: lastMessage }, 'Permanent source failure');
          return failed(identity, startedAt, last, attempt + 1, lastMessage);
        }
      }

      log.warn(
        { sourceId, kind: last.kind, attempt: attempt + 1, maxAttempts, err: lastMessage },
        'Transient source failure',
      );

      if (attempt < maxAttempts - 1) {
        const delayMs = Math.max(computeBackoffMs(attempt, config.retry, random), last.retryAfterMs ?? 0);
        try {
          await scheduler.sleep(Math.min(delayMs, config.retry.maxDelayMs), signal);
        } catch (error) {
          if (error instanceof AbortedError) {
            return failed(identity, startedAt, { kind: 'timeout', transient: true }, attempt + 1, 'Cancelled');
          }
          throw error;
        }
      }
    }

    return failed(identity, startedAt, last, maxAttempts, lastMessage);
  }

  function sourceStatus(sourceId: string): SourceStatus;
  function sourceStatus(): readonly SourceStatus[];
  function sourceStatus(sourceId?: string): SourceStatus | readonly SourceStatus[] {
    const snapshot = (identity: SourceIdentity): SourceStatus => {
      const status = statusFor(identity.sourceId);
      return {
        sourceId: identity.sourceId,
        displayName: identity.displayName,
        configured: identity.configured,
        lastHealthCheck: status.lastHealthCheck ? { ...status.lastHealthCheck } : null,
        lastLatencyMs: status.lastLatencyMs,
        lastSuccessAt: status.lastSuccessAt,
        lastFailure: status.lastFailure ? { ...status.lastFailure } : null,
      };
    };

    if (sourceId === undefined) {
      return registry.identities().map(snapshot);
    }
    return snapshot(registry.get(sourceId).identify());
  }

  return {
    async query(sourceId: string, params: QueryParams, options: GatewayQueryOptions = {}): Promise<SourceResult> {
      const identity = registry.get(sourceId).identify();
      const key = createCacheKey(sourceId, params.query, cacheParams(params));
      const startedAt = scheduler.now();

      const cached = await cache.get(key);
      if (cached) {
        log.debug({ sourceId, key }, 'Cache hit');
        return fromPayload(meta(identity, startedAt, { createdAt: cached.createdAt, stale: false }), cached.payload);
      }

      try {
        return await flight.run(key, (signal) => fetchLive(identity, params, key, signal), options.signal);
      } catch (error) {
        if (error instanceof AbortedError) {
          return failed(identity, startedAt, { kind: 'timeout', transient: true }, 0, 'Cancelled by caller');
        }
        throw error;
      }
    },

    async readCached(sourceId: string, params: QueryParams): Promise<SourceResult | null> {
      const identity = registry.get(sourceId).identify();
      const key = createCacheKey(sourceId, params.query, cacheParams(params));
      const startedAt = scheduler.now();
      const cached = await cache.get(key, { allowStale: true });
      if (!cached) {
        return null;
      }
      return fromPayload(meta(identity, startedAt, { createdAt: cached.createdAt, stale: cached.isStale }), cached.payload);
    },

    async healthCheck(sourceId: string): Promise<boolean> {
      const adapter = registry.get(sourceId);
      const status = statusFor(sourceId);
      let healthy: boolean;

      try {
        healthy = await withTimeout(sourceId, config.healthCheckTimeoutMs, undefined, (signal) =>
          adapter.healthCheck(signal),
        );
      } catch (error) {
        const classification = classifyError(error);
        log.warn(
          { sourceId, kind: classification.kind, err: error instanceof Error ? error.message : String(error) },
          'Health check failed',
        );
        healthy = false;
      }

      status.lastHealthCheck = { healthy, checkedAt: new Date() };
      log.info({ sourceId, healthy }, 'Health check completed');
      return healthy;
    },

    isAvailable(sourceId: string): boolean {
      if (!registry.has(sourceId)) {
        return false;
      }
      const identity = registry.get(sourceId).identify();
      const lastHealthCheck = statuses.get(sourceId)?.lastHealthCheck;
      return identity.configured && lastHealthCheck?.healthy !== false;
    },

    sourceStatus,

    listSources(): readonly SourceIdentity[] {
      return registry.identities();
    },
  };
}

