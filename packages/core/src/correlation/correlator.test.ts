import { describe, it, expect, vi } from 'vitest';
import type { QueryKind, SourceSelection } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { QueryParams, RawResponse, SourceIdentity } from '@crosscheck/shared/src/types/source.types.js';
import { AdapterUpstreamError, AggregationError } from '@crosscheck/shared/src/utils/errors.js';
import type { CorrelatorConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import { LexiconSchema } from '@crosscheck/schemas/src/lexicon.schema.js';
import { createQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import type { SourceAdapter } from '../gateway/types.js';
import { createQueryClassifier } from '../selection/query-classifier.js';
import { createSourceSelector } from '../selection/source-selector.js';
import { createTestGateway } from '../test-helpers.js';
import type { FixtureInput, TestGatewayOptions } from '../test-helpers.js';
import { createCorrelator } from './correlator.js';
import type { Correlator } from './correlator.js';

type FetchFn = (params: QueryParams, signal: AbortSignal) => Promise<RawResponse>;

const sudanRecord = { subject: 'sudan', event_window: '2024-W10', fatalities: 42 };

function harness(
  fixtures: readonly FixtureInput[],
  overrides: Partial<CorrelatorConfig> = {},
  extraAdapters: readonly SourceAdapter[] = [],
  options: TestGatewayOptions = {},
): Correlator & ReturnType<typeof createTestGateway> {
  const test = createTestGateway(fixtures, extraAdapters, options);
  const selector = createSourceSelector({
    gateway: test.gateway,
    classifier: createQueryClassifier(LexiconSchema.parse({ countries: ['sudan'] })),
    config: { minRelevance: 0.3 },
  });
  const correlator = createCorrelator({
    gateway: test.gateway,
    selector,
    config: { ...test.config.correlator, ...overrides },
  });
  return { ...test, aggregate: correlator.aggregate };
}

function selection(queryKind: QueryKind, ...sourceIds: string[]): SourceSelection {
  return {
    queryKind,
    candidates: sourceIds.map((sourceId, index) => ({
      sourceId,
      relevanceScore: 1 - index * 0.1,
      available: true,
      reasoning: 'test ranking',
    })),
  };
}

function stubAdapter(sourceId: string, fetch: FetchFn): SourceAdapter {
  const identity: SourceIdentity = {
    sourceId,
    displayName: sourceId,
    qualityTier: 'high',
    domains: ['sanctions'],
    configured: true,
  };
  return { identify: () => identity, fetch, healthCheck: () => Promise.resolve(true) };
}

/** Adapter that only settles when its call is cancelled. */
function hangingAdapter(sourceId: string): SourceAdapter {
  return stubAdapter(
    sourceId,
    (_params, signal) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
  );
}

describe('Correlator', () => {
  it('should corroborate agreeing sources and raise overall confidence', async () => {
    const { aggregate } = harness([
      { id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'], responses: { sudan: [sudanRecord] } },
      { id: 'news-events', displayName: 'News', qualityTier: 'medium', domains: ['news'], responses: { sudan: [sudanRecord] } },
    ]);

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'conflict-events', 'news-events'),
    });

    expect(result.findings).toHaveLength(1);
    expect(result.findings[0]).toMatchObject({
      attribute: 'fatalities',
      value: 42,
      status: 'corroborated',
      corroboration: ['conflict-events', 'news-events'],
      confidence: 'almost_certain',
    });
    expect(result.confidence.band).toBe('very_likely');
    expect(result.confidence.score).toBe(0.85);
    expect(result.degraded).toBe(false);
    expect(result.triangulation).toEqual({ triggered: false, status: 'not_needed', sourcesQueried: [] });
  });

  it('should keep both values when sources conflict and lower confidence', async () => {
    const { aggregate } = harness([
      { id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'], responses: { sudan: [sudanRecord] } },
      {
        id: 'casualty-monitor',
        displayName: 'Casualties',
        qualityTier: 'high',
        domains: ['conflict'],
        responses: { sudan: [{ ...sudanRecord, fatalities: 57 }] },
      },
    ]);

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'conflict-events', 'casualty-monitor'),
    });

    expect(result.findings[0]).toMatchObject({
      status: 'conflicting',
      value: 42,
      conflict: [
        { sourceId: 'casualty-monitor', value: 57 },
        { sourceId: 'conflict-events', value: 42 },
      ],
      confidence: 'likely',
    });
    expect(result.confidence.band).toBe('likely');
    expect(result.confidence.score).toBe(0.7);
  });

  it('should place a conflict between low-quality sources a band below a single one', async () => {
    const lowSource = (id: string, fatalities: number): FixtureInput => ({
      id,
      displayName: id,
      qualityTier: 'low',
      domains: ['conflict'],
      responses: { sudan: [{ ...sudanRecord, fatalities }] },
    });
    const params = createQueryParams({ query: 'Sudan' });

    const single = await harness([lowSource('conflict-events', 42)]).aggregate(params, {
      selection: selection('country', 'conflict-events'),
    });
    const conflicted = await harness([lowSource('conflict-events', 42), lowSource('casualty-monitor', 57)]).aggregate(
      params,
      { selection: selection('country', 'conflict-events', 'casualty-monitor') },
    );

    expect(single.confidence).toMatchObject({ band: 'unlikely', score: 0.4 });
    expect(conflicted.confidence).toMatchObject({ band: 'remote', score: 0.19 });
    expect(conflicted.findings[0]?.resolutionNote).toBe(
      'Conflicting: casualty-monitor says 57, conflict-events says 42',
    );
    expect(conflicted.findings[0]).not.toHaveProperty('suggestedAuthority');
  });

  it('should attribute each consulted source with its URL and fetch time', async () => {
    const { aggregate } = harness(
      [
        {
          id: 'conflict-events',
          displayName: 'Conflict',
          qualityTier: 'high',
          domains: ['conflict'],
          sourceUrl: 'https://example.org/events',
          responses: { sudan: [sudanRecord] },
        },
      ],
      {},
      [],
      { now: () => new Date('2024-06-01T00:00:00Z') },
    );
    const params = createQueryParams({ query: 'Sudan' });
    const ranking = selection('country', 'conflict-events');

    const live = await aggregate(params, { selection: ranking });
    const cached = await aggregate(params, { selection: ranking });

    expect(live.sourcesConsulted[0]).toMatchObject({ sourceUrl: 'https://example.org/events', fromCache: false });
    expect(cached.sourcesConsulted[0]).toMatchObject({
      sourceUrl: 'https://example.org/events',
      fromCache: true,
      fetchedAt: new Date('2024-06-01T00:00:00Z'),
    });
  });

  it('should mark the result degraded when every source answers without data', async () => {
    const { aggregate } = harness([
      { id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'] },
      { id: 'news-events', displayName: 'News', qualityTier: 'medium', domains: ['news'] },
    ]);

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'conflict-events', 'news-events'),
    });

    expect(result.sourcesConsulted.map((s) => s.outcome)).toEqual(['no_data', 'no_data']);
    expect(result.findings).toEqual([]);
    expect(result.degraded).toBe(true);
    expect(result.suggestions).toEqual([
      'Provide an alternate identifier so other sources can be tried',
      'Fewer sources answered than expected; treat these results as partial',
    ]);
  });

  it('should triangulate with the alternate identifier when the primary source has no data', async () => {
    const { aggregate, adapters } = harness([
      { id: 'sanctions-registry', displayName: 'Sanctions', qualityTier: 'high', domains: ['sanctions'] },
      {
        id: 'corporate-registry',
        displayName: 'Corporate',
        qualityTier: 'high',
        domains: ['identity'],
        responses: { gazprom: [{ subject: 'gazprom', sanctioned: true }] },
      },
    ]);

    const result = await aggregate(createQueryParams({ query: 'PJSC Gazprom', altIdentifier: 'Gazprom' }), {
      selection: selection('organization', 'sanctions-registry'),
    });

    expect(adapters.get('corporate-registry')?.queries).toEqual(['pjsc gazprom', 'gazprom']);
    expect(result.triangulation).toEqual({
      triggered: true,
      status: 'matched',
      sourcesQueried: ['corporate-registry'],
    });
    expect(result.findings[0]).toMatchObject({
      attribute: 'sanctioned',
      value: true,
      provenance: 'triangulated',
      confidence: 'likely',
    });
    expect(result.confidence.score).toBe(0.6);
    expect(result.confidence.band).toBe('likely');
    expect(result.sourcesConsulted.map((s) => [s.sourceId, s.outcome, s.provenance])).toEqual([
      ['sanctions-registry', 'no_data', 'direct'],
      ['corporate-registry', 'success', 'triangulated'],
    ]);
  });

  it('should leave excluded sources out of triangulation', async () => {
    const { aggregate, adapters } = harness([
      { id: 'sanctions-registry', displayName: 'Sanctions', qualityTier: 'high', domains: ['sanctions'] },
      { id: 'corporate-registry', displayName: 'Corporate', qualityTier: 'high', domains: ['identity'] },
    ]);

    const result = await aggregate(
      createQueryParams({ query: 'PJSC Gazprom', altIdentifier: 'Gazprom', excludeSources: ['corporate-registry'] }),
      { selection: selection('organization', 'sanctions-registry') },
    );

    expect(adapters.get('corporate-registry')?.calls).toBe(0);
    expect(result.triangulation).toEqual({ triggered: true, status: 'exhausted', sourcesQueried: [] });
    expect(result.confidence).toMatchObject({ band: 'remote', score: 0.05 });
  });

  it('should isolate a permanent failure and explain it without upstream text', async () => {
    const { aggregate, adapters } = harness([
      { id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'], responses: { sudan: [sudanRecord] } },
      { id: 'sanctions-registry', displayName: 'Sanctions', qualityTier: 'high', domains: ['sanctions'], failWith: 'auth' },
    ]);

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'conflict-events', 'sanctions-registry'),
    });

    expect(adapters.get('sanctions-registry')?.calls).toBe(1);
    expect(result.sourcesSkipped).toEqual([
      {
        sourceId: 'sanctions-registry',
        reason: 'errored',
        failureKind: 'auth',
        explanation: 'Source rejected the configured credentials',
      },
    ]);
    expect(result.findings).toHaveLength(1);
    expect(result.degraded).toBe(true);
    expect(result.suggestions).toEqual(['Fewer sources answered than expected; treat these results as partial']);
  });

  it('should serve a stale cached payload when a source fails', async () => {
    let now = new Date('2024-06-01T00:00:00Z');
    const fetch = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce({ kind: 'records', records: [sudanRecord] })
      .mockRejectedValue(new AdapterUpstreamError('casualty-monitor', 503));
    const { aggregate } = harness([], {}, [stubAdapter('casualty-monitor', fetch)], { now: () => now });
    const params = createQueryParams({ query: 'Sudan' });
    const ranking = selection('country', 'casualty-monitor');

    await aggregate(params, { selection: ranking });
    now = new Date('2024-06-01T02:00:00Z');
    const result = await aggregate(params, { selection: ranking });

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(result.sourcesSkipped).toEqual([]);
    expect(result.sourcesConsulted[0]).toMatchObject({ sourceId: 'casualty-monitor', fromCache: true, stale: true });
    expect(result.findings[0]?.stale).toBe(true);
    expect(result.confidence.score).toBe(0.75);
  });

  it('should report the failure when stale fallback is off', async () => {
    const { aggregate } = harness(
      [{ id: 'sanctions-registry', displayName: 'Sanctions', qualityTier: 'high', domains: ['sanctions'], failWith: 'upstream' }],
      { staleFallback: false },
    );

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'sanctions-registry'),
    });

    expect(result.sourcesSkipped).toEqual([
      {
        sourceId: 'sanctions-registry',
        reason: 'errored',
        failureKind: 'upstream',
        explanation: 'Upstream service unavailable after 2 attempt(s)',
      },
    ]);
  });

  it('should stop waiting for fallback reads after the grace period', async () => {
    const test = createTestGateway([
      { id: 'sanctions-registry', displayName: 'Sanctions', qualityTier: 'high', domains: ['sanctions'], failWith: 'upstream' },
      { id: 'news-events', displayName: 'News', qualityTier: 'medium', domains: ['news'], failWith: 'upstream' },
    ]);
    const readCached = vi.fn(() => new Promise<null>(() => undefined));
    const correlator = createCorrelator({
      gateway: { ...test.gateway, readCached },
      selector: createSourceSelector({
        gateway: test.gateway,
        classifier: createQueryClassifier(LexiconSchema.parse({})),
        config: { minRelevance: 0.3 },
      }),
      config: { ...test.config.correlator, graceMs: 20 },
    });
    const startedAt = Date.now();

    const result = await correlator.aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'sanctions-registry', 'news-events'),
    });

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(readCached).toHaveBeenCalledTimes(2);
    expect(result.sourcesSkipped.map((s) => [s.sourceId, s.failureKind])).toEqual([
      ['sanctions-registry', 'upstream'],
      ['news-events', 'upstream'],
    ]);
  });

  it('should return the other sources when one exceeds its own call timeout', async () => {
    const { aggregate } = harness(
      [{ id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'], responses: { sudan: [sudanRecord] } }],
      {},
      [hangingAdapter('slow-source')],
      { sources: { 'slow-source': { callTimeoutMs: 15 } } },
    );

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'conflict-events', 'slow-source'),
    });

    expect(result.findings[0]?.sources).toEqual(['conflict-events']);
    expect(result.sourcesSkipped).toEqual([
      {
        sourceId: 'slow-source',
        reason: 'timeout',
        failureKind: 'timeout',
        explanation: 'No answer within the time limit after 2 attempt(s)',
      },
    ]);
    expect(result.degraded).toBe(true);
  });

  it('should finalize at the deadline and skip sources that did not answer', async () => {
    const { aggregate } = harness(
      [],
      { deadlineMs: 30, graceMs: 20, maxConcurrency: 1 },
      [hangingAdapter('slow-source'), hangingAdapter('queued-source')],
    );
    const startedAt = Date.now();

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'slow-source', 'queued-source'),
    });

    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(result.sourcesSkipped).toEqual([
      {
        sourceId: 'slow-source',
        reason: 'timeout',
        failureKind: 'timeout',
        explanation: 'Cancelled at the aggregation deadline',
      },
      { sourceId: 'queued-source', reason: 'timeout', explanation: 'No answer before the aggregation deadline' },
    ]);
    expect(result.degraded).toBe(true);
  });

  it('should fan out to at most maxSources candidates', async () => {
    const { aggregate, adapters } = harness(
      ['a-source', 'b-source', 'c-source'].map((id) => ({
        id,
        displayName: id,
        qualityTier: 'medium' as const,
        domains: ['conflict' as const],
        responses: { sudan: [sudanRecord] },
      })),
      { maxSources: 2 },
    );

    const result = await aggregate(createQueryParams({ query: 'Sudan' }), {
      selection: selection('country', 'a-source', 'b-source', 'c-source'),
    });

    expect(adapters.get('c-source')?.calls).toBe(0);
    expect(result.sourcesConsulted.map((s) => s.sourceId)).toEqual(['a-source', 'b-source']);
  });

  it('should record unavailable candidates as skipped', async () => {
    const { aggregate } = harness([
      { id: 'conflict-events', displayName: 'Conflict', qualityTier: 'high', domains: ['conflict'], responses: { sudan: [sudanRecord] } },
      { id: 'economic-indicators', displayName: 'Economic', qualityTier: 'high', domains: ['economic'], configured: false },
    ]);

    const result = await aggregate(createQueryParams({ query: 'Sudan' }));

    expect(result.queryKind).toBe('country');
    expect(result.sourcesSkipped).toEqual([
      { sourceId: 'economic-indicators', reason: 'unavailable', explanation: 'Source is not configured' },
    ]);
  });

  it('should fail when no candidate is available', async () => {
    const { aggregate } = harness([
      { id: 'economic-indicators', displayName: 'Economic', qualityTier: 'high', domains: ['economic'], configured: false },
    ]);

    const promise = aggregate(createQueryParams({ query: 'Sudan' }));

    await expect(promise).rejects.toBeInstanceOf(AggregationError);
    await expect(promise).rejects.toMatchObject({ code: 'NO_AVAILABLE_SOURCES' });
  });
});
