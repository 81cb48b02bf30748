import type {
  AggregatedResult,
  ConsultedSource,
  Provenance,
  SkippedSource,
  SourceSelection,
  TriangulationSummary,
} from '@crosscheck/shared/src/types/aggregation.types.js';
import type { EntityMatch } from '@crosscheck/shared/src/types/entity.types.js';
import type { QualityTier, QueryParams, SourceResult } from '@crosscheck/shared/src/types/source.types.js';
import { AggregationError } from '@crosscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { withQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import type { CorrelatorConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import type { AdapterGateway } from '../gateway/types.js';
import type { SourceSelector } from '../selection/source-selector.js';
import { extractClaims, groupClaims } from './claims.js';
import type { Contribution } from './claims.js';
import { TIER_BASE, assessConfidence } from './confidence.js';

const log = createChildLogger('correlation');

export interface CorrelatorDeps {
  readonly gateway: AdapterGateway;
  readonly selector: SourceSelector;
  readonly config: CorrelatorConfig;
}

export interface AggregateOptions {
  /** Precomputed ranking; the selector is asked when omitted. */
  readonly selection?: SourceSelection;
  readonly entity?: EntityMatch;
}

export interface Correlator {
  aggregate(params: QueryParams, options?: AggregateOptions): Promise<AggregatedResult>;
}

interface Outcome {
  readonly sourceId: string;
  readonly provenance: Provenance;
  readonly result: SourceResult;
}

/** Fires once at the deadline and again `graceMs` later. */
class Deadline {
  readonly controller = new AbortController();
  readonly cutoff: Promise<void>;
  private deadlineTimer: NodeJS.Timeout | undefined;
  private graceTimer: NodeJS.Timeout | undefined;

  constructor(deadlineMs: number, graceMs: number) {
    this.cutoff = new Promise((resolve) => {
      this.deadlineTimer = setTimeout(() => {
        this.controller.abort();
        this.graceTimer = setTimeout(resolve, graceMs);
      }, deadlineMs);
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  clear(): void {
    clearTimeout(this.deadlineTimer);
    clearTimeout(this.graceTimer);
  }
}

/**
 * Queries each source with at most `limit` calls in flight. Returns whatever
 * finished before the deadline's grace period ran out.
 */
async function fanOut(
  gateway: AdapterGateway,
  sourceIds: readonly string[],
  params: QueryParams,
  provenance: Provenance,
  limit: number,
  deadline: Deadline,
): Promise<Map<string, Outcome>> {
  const outcomes = new Map<string, Outcome>();
  let next = 0;

  async function worker(): Promise<void> {
    while (next < sourceIds.length && !deadline.expired) {
      const sourceId = sourceIds[next++];
      if (sourceId === undefined) {
        return;
      }
      const result = await gateway.query(sourceId, params, { signal: deadline.signal });
      outcomes.set(sourceId, { sourceId, provenance, result });
    }
  }

  const workers = Array.from({ length: Math.min(limit, sourceIds.length) }, () => worker());
  await Promise.race([Promise.all(workers), deadline.cutoff]);
  // late workers keep writing to `outcomes` after the cutoff
  return new Map(outcomes);
}

function skipFor(result: SourceResult, expired: boolean): SkippedSource | null {
  const { sourceId } = result;
  if (result.status === 'rate_limited') {
    const seconds = Math.max(1, Math.ceil(result.retryAfterMs / 1000));
    return {
      sourceId,
      reason: 'rate_limited',
      failureKind: 'rate_limited',
      explanation: `Local request quota exhausted; retry in about ${String(seconds)}s`,
    };
  }
  if (result.status !== 'error') {
    return null;
  }

  const { kind, attempts } = result.failure;
  const tries = `${String(attempts)} attempt(s)`;
  switch (kind) {
    case 'timeout':
      return {
        sourceId,
        reason: 'timeout',
        failureKind: kind,
        explanation: expired ? 'Cancelled at the aggregation deadline' : `No answer within the time limit after ${tries}`,
      };
    case 'rate_limited':
      return { sourceId, reason: 'rate_limited', failureKind: kind, explanation: `Upstream rate limit persisted after ${tries}` };
    case 'upstream':
      return { sourceId, reason: 'errored', failureKind: kind, explanation: `Upstream service unavailable after ${tries}` };
    case 'auth':
      return { sourceId, reason: 'errored', failureKind: kind, explanation: 'Source rejected the configured credentials' };
    case 'parse':
      return { sourceId, reason: 'errored', failureKind: kind, explanation: 'Source returned a response that could not be read' };
    case 'unknown':
      return { sourceId, reason: 'errored', failureKind: kind, explanation: 'Source failed with an unexpected error' };
  }
}

function unfinished(sourceId: string): SkippedSource {
  return { sourceId, reason: 'timeout', explanation: 'No answer before the aggregation deadline' };
}

function buildSuggestions(
  params: QueryParams,
  entity: EntityMatch | undefined,
  findingCount: number,
  skipped: readonly SkippedSource[],
  degraded: boolean,
): string[] {
  const suggestions: string[] = [];
  if (entity?.tier === 'failed') {
    suggestions.push(...entity.suggestions);
  }
  if (findingCount === 0) {
    if (params.timeWindow) {
      suggestions.push('Widen or remove the time window');
    }
    if (!params.altIdentifier) {
      suggestions.push('Provide an alternate identifier so other sources can be tried');
    }
  }
  if (skipped.some((s) => s.reason === 'rate_limited')) {
    suggestions.push('Some sources were rate limited; retry later for fuller coverage');
  }
  if (degraded) {
    suggestions.push('Fewer sources answered than expected; treat these results as partial');
  }
  return suggestions;
}

export function createCorrelator(deps: CorrelatorDeps): Correlator {
  const { gateway, selector, config } = deps;

  /** Available registered sources outside the fan-out, honouring include and exclude lists. */
  function fallbackPool(params: QueryParams, exclude: ReadonlySet<string>): string[] {
    const include = params.includeSources ? new Set(params.includeSources) : null;
    const excluded = new Set(params.excludeSources ?? []);
    return gateway
      .listSources()
      .map((identity) => identity.sourceId)
      .filter(
        (id) =>
          !exclude.has(id) &&
          !excluded.has(id) &&
          (include === null || include.has(id)) &&
          gateway.isAvailable(id),
      );
  }

  async function triangulate(
    params: QueryParams,
    pool: readonly string[],
    deadline: Deadline,
  ): Promise<Map<string, Outcome>> {
    const outcomes = await fanOut(gateway, pool, params, 'triangulated', config.maxConcurrency, deadline);
    const alt = params.altIdentifier?.trim();
    if (!alt || alt === params.query || deadline.expired) {
      return outcomes;
    }

    const retry = pool.filter((id) => outcomes.get(id)?.result.status === 'no_data');
    if (retry.length === 0) {
      return outcomes;
    }
    const altOutcomes = await fanOut(
      gateway,
      retry,
      withQueryParams(params, { query: alt }),
      'triangulated',
      config.maxConcurrency,
      deadline,
    );
    for (const [id, outcome] of altOutcomes) {
      outcomes.set(id, outcome);
    }
    return outcomes;
  }

  async function staleFallback(outcome: Outcome, params: QueryParams): Promise<Outcome> {
    const { status } = outcome.result;
    if (!config.staleFallback || (status !== 'error' && status !== 'rate_limited')) {
      return outcome;
    }
    try {
      const cached = await gateway.readCached(outcome.sourceId, params);
      if (cached?.status !== 'success') {
        return outcome;
      }
      log.info({ sourceId: outcome.sourceId, stale: cached.stale }, 'Serving cached payload after failure');
      return { ...outcome, result: cached };
    } catch (error) {
      log.warn(
        { sourceId: outcome.sourceId, err: error instanceof Error ? error.message : String(error) },
        'Stale fallback read failed',
      );
      return outcome;
    }
  }

  /** Runs the fallback reads together; past `graceMs` the original outcomes stand. */
  async function withFallbacks(found: readonly Outcome[], params: QueryParams): Promise<Map<string, Outcome>> {
    const original = new Map<string, Outcome>(found.map((o) => [o.sourceId, o]));
    let timer: NodeJS.Timeout | undefined;
    const bound = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), config.graceMs);
    });

    try {
      const resolved = await Promise.race([Promise.all(found.map((o) => staleFallback(o, params))), bound]);
      if (!resolved) {
        log.warn({ sources: found.length, graceMs: config.graceMs }, 'Stale fallback reads outlasted the grace period');
        return original;
      }
      return new Map<string, Outcome>(resolved.map((o) => [o.sourceId, o]));
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    async aggregate(params: QueryParams, options: AggregateOptions = {}): Promise<AggregatedResult> {
      const startedAt = Date.now();
      const selection = options.selection ?? selector.selectSources(params);
      const skipped: SkippedSource[] = [];

      for (const candidate of selection.candidates) {
        if (!candidate.available) {
          skipped.push({
            sourceId: candidate.sourceId,
            reason: 'unavailable',
            explanation: candidate.unavailableReason ?? 'Source is unavailable',
          });
        }
      }

      const available = selection.candidates.filter((c) => c.available).map((c) => c.sourceId);
      if (available.length === 0) {
        throw new AggregationError(
          `No available sources for query "${params.query}"`,
          'NO_AVAILABLE_SOURCES',
          skipped.map((s) => `${s.sourceId}: ${s.explanation}`),
        );
      }

      const targets = available.slice(0, config.maxSources);
      const deadline = new Deadline(config.deadlineMs, config.graceMs);

      try {
        const outcomes = await fanOut(gateway, targets, params, 'direct', config.maxConcurrency, deadline);
        const order = [...targets];
        let triangulation: TriangulationSummary = { triggered: false, status: 'not_needed', sourcesQueried: [] };

        const primary = targets[0];
        if (primary !== undefined && outcomes.get(primary)?.result.status === 'no_data' && !deadline.expired) {
          const remaining = available.slice(config.maxSources);
          const pool = remaining.length > 0 ? remaining : fallbackPool(params, new Set(targets));
          const found = await triangulate(params, pool, deadline);
          for (const [id, outcome] of found) {
            outcomes.set(id, outcome);
          }
          order.push(...pool);
          const matched = [...found.values()].some((o) => o.result.status === 'success');
          triangulation = { triggered: true, status: matched ? 'matched' : 'exhausted', sourcesQueried: pool };
          log.info({ primary, pool, matched }, 'Triangulated after empty primary result');
        }

        const consulted: ConsultedSource[] = [];
        const contributions: Contribution[] = [];

        const settled = await withFallbacks(
          order.flatMap((sourceId) => {
            const found = outcomes.get(sourceId);
            return found ? [found] : [];
          }),
          params,
        );

        for (const sourceId of order) {
          const outcome = settled.get(sourceId);
          if (!outcome) {
            skipped.push(unfinished(sourceId));
            continue;
          }
          const { result } = outcome;

          if (result.status === 'success' || result.status === 'no_data') {
            const records = result.status === 'success' ? result.payload.records : [];
            consulted.push({
              sourceId,
              outcome: result.status,
              qualityTier: result.qualityTier,
              provenance: outcome.provenance,
              fromCache: result.fromCache,
              stale: result.stale,
              recordCount: records.length,
              fetchedAt: result.fetchedAt,
              ...(result.status === 'success' && result.payload.sourceUrl
                ? { sourceUrl: result.payload.sourceUrl }
                : {}),
            });
            if (records.length > 0) {
              contributions.push({
                sourceId,
                qualityTier: result.qualityTier,
                provenance: outcome.provenance,
                stale: result.stale,
                records,
              });
            }
            continue;
          }

          const skip = skipFor(result, deadline.expired);
          if (skip) {
            skipped.push(skip);
          }
        }

        const claims = contributions.flatMap((contribution) =>
          extractClaims(contribution, {
            factTypes: config.factTypes,
            qualifierFields: config.qualifierFields,
            fallbackSubject: options.entity?.matchedLabel ?? params.query,
          }),
        );
        const { findings, dissentingSources } = groupClaims(claims, {
          factTypes: config.factTypes,
          triangulationFactor: config.triangulationFactor,
        });

        let best: { sourceId: string; tier: QualityTier } | undefined;
        for (const contribution of contributions) {
          if (!best || TIER_BASE[contribution.qualityTier] > TIER_BASE[best.tier]) {
            best = { sourceId: contribution.sourceId, tier: contribution.qualityTier };
          }
        }
        const corroborating = new Set(findings.flatMap((f) => f.corroboration));
        if (best) {
          corroborating.delete(best.sourceId);
        }

        const confidence = assessConfidence({
          ...(best ? { bestTier: best.tier } : {}),
          findingCount: findings.length,
          corroboratingSources: corroborating.size,
          conflictingSources: dissentingSources.length,
          allTriangulated: contributions.length > 0 && contributions.every((c) => c.provenance === 'triangulated'),
          staleContributed: contributions.some((c) => c.stale),
          triangulationFactor: config.triangulationFactor,
        });

        const attempted = new Set(order).size;
        const contributed = new Set(contributions.map((c) => c.sourceId)).size;
        const degraded = contributed < Math.min(config.minViableSources, attempted);

        log.info(
          {
            query: params.query,
            findings: findings.length,
            consulted: consulted.length,
            contributed,
            skipped: skipped.length,
            band: confidence.band,
            degraded,
          },
          'Aggregation completed',
        );

        return {
          query: params.query,
          queryKind: selection.queryKind,
          ...(options.entity ? { entity: options.entity } : {}),
          findings,
          confidence,
          sourcesConsulted: consulted,
          sourcesSkipped: skipped,
          triangulation,
          degraded,
          suggestions: buildSuggestions(params, options.entity, findings.length, skipped, degraded),
          durationMs: Date.now() - startedAt,
          completedAt: new Date(),
        };
      } finally {
        deadline.clear();
      }
    },
  };
}
