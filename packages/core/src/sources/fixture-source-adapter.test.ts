import { describe, it, expect } from 'vitest';
import { FixtureSourceSchema } from '@crosscheck/schemas/src/source-fixtures.schema.js';
import { createQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import { AdapterAuthError, AdapterUpstreamError } from '@crosscheck/shared/src/utils/errors.js';
import { createFixtureSourceAdapter } from './fixture-source-adapter.js';
import { createManualScheduler } from '../gateway/test-scheduler.js';

const definition = FixtureSourceSchema.parse({
  id: 'news-events',
  displayName: 'News Events',
  qualityTier: 'medium',
  domains: ['news'],
  sourceUrl: 'https://news.example.org',
  responses: {
    gazprom: [
      { subject: 'gazprom', title: 'One' },
      { subject: 'gazprom', title: 'Two' },
    ],
  },
});

const signal = new AbortController().signal;

describe('FixtureSourceAdapter', () => {
  it('should identify itself from the definition', () => {
    const adapter = createFixtureSourceAdapter(definition);
    expect(adapter.identify()).toEqual({
      sourceId: 'news-events',
      displayName: 'News Events',
      qualityTier: 'medium',
      domains: ['news'],
      configured: true,
    });
  });

  it('should answer by normalized query', async () => {
    const adapter = createFixtureSourceAdapter(definition);
    const response = await adapter.fetch(createQueryParams({ query: '  GAZPROM ' }), signal);

    expect(response).toEqual({
      kind: 'records',
      records: [
        { subject: 'gazprom', title: 'One' },
        { subject: 'gazprom', title: 'Two' },
      ],
      sourceUrl: 'https://news.example.org',
    });
    expect(adapter.queries).toEqual(['gazprom']);
  });

  it('should cap records at maxResultsPerSource', async () => {
    const adapter = createFixtureSourceAdapter(definition);
    const response = await adapter.fetch(createQueryParams({ query: 'gazprom', maxResultsPerSource: 1 }), signal);
    expect(response.kind === 'records' ? response.records : []).toHaveLength(1);
  });

  it('should answer empty for unknown queries', async () => {
    const adapter = createFixtureSourceAdapter(definition);
    expect(await adapter.fetch(createQueryParams({ query: 'unknown' }), signal)).toEqual({ kind: 'empty' });
  });

  it('should throw the configured failure', async () => {
    const adapter = createFixtureSourceAdapter({ ...definition, failWith: 'auth' });
    await expect(adapter.fetch(createQueryParams({ query: 'gazprom' }), signal)).rejects.toBeInstanceOf(
      AdapterAuthError,
    );
  });

  it('should recover after the configured number of failures', async () => {
    const adapter = createFixtureSourceAdapter({ ...definition, failWith: 'upstream' }, { failTimes: 1 });
    const params = createQueryParams({ query: 'gazprom' });

    await expect(adapter.fetch(params, signal)).rejects.toBeInstanceOf(AdapterUpstreamError);
    expect((await adapter.fetch(params, signal)).kind).toBe('records');
    expect(adapter.calls).toBe(2);
  });

  it('should simulate latency through the scheduler', async () => {
    const scheduler = createManualScheduler();
    const adapter = createFixtureSourceAdapter({ ...definition, latencyMs: 250 }, { scheduler });
    await adapter.fetch(createQueryParams({ query: 'gazprom' }), signal);
    expect(scheduler.sleeps).toEqual([250]);
  });

  it('should report the configured health', async () => {
    const adapter = createFixtureSourceAdapter({ ...definition, healthy: false });
    expect(await adapter.healthCheck(signal)).toBe(false);
  });
});
