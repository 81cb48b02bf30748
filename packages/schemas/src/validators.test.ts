import { describe, it, expect } from 'vitest';
import {
  validateCrosscheckConfig,
  validateEntityRegistry,
  validateLexicon,
  validateSourceFixtures,
} from './validators.js';
import { createQueryParams, withQueryParams } from './query.schema.js';
import { SchemaValidationError } from '@crosscheck/shared/src/utils/errors.js';

describe('validateCrosscheckConfig', () => {
  it('should fill every default from an empty object', () => {
    const config = validateCrosscheckConfig({});
    expect(config.cache.volatileHorizonSeconds).toBe(300);
    expect(config.cache.durableStore).toBe('memory');
    expect(config.resolver.fuzzyThreshold).toBe(0.8);
    expect(config.selector.minRelevance).toBe(0.3);
    expect(config.correlator.triangulationFactor).toBe(0.75);
    expect(config.correlator.qualifierFields).toContain('event_window');
  });

  it('should default fact types with tolerances', () => {
    const { factTypes } = validateCrosscheckConfig({}).correlator;
    expect(factTypes['population']).toEqual({
      kind: 'numeric',
      absoluteTolerance: 0,
      relativeTolerance: 0.02,
      aliases: [],
    });
    expect(factTypes['sanctioned']).toEqual({ kind: 'categorical', aliases: ['is_sanctioned'] });
  });

  it('should reject a fuzzy floor that reaches the canonical tier', () => {
    expect(() => validateCrosscheckConfig({ resolver: { fuzzyMinConfidence: 0.9 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should report the path of each issue', () => {
    try {
      validateCrosscheckConfig({ correlator: { maxSources: 0 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.validationErrors[0]).toMatch(/^correlator\.maxSources: /);
      }
    }
  });
});

describe('validateEntityRegistry', () => {
  it('should accept a registry entry without canonical id', () => {
    const registry = validateEntityRegistry({
      entities: [{ id: 'e1', label: 'Acme', names: ['acme'], kind: 'organization' }],
    });
    expect(registry.entities[0]?.canonicalId).toBeUndefined();
  });

  it('should reject entities without names', () => {
    expect(() =>
      validateEntityRegistry({ entities: [{ id: 'e1', label: 'Acme', names: [], kind: 'organization' }] }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject duplicate ids', () => {
    const entity = { id: 'e1', label: 'Acme', names: ['acme'], kind: 'organization' };
    expect(() => validateEntityRegistry({ entities: [entity, entity] })).toThrow(
      SchemaValidationError,
    );
  });
});

describe('validateLexicon', () => {
  it('should default missing word lists to empty', () => {
    const lexicon = validateLexicon({ countries: ['chile'] });
    expect(lexicon.aircraftKeywords).toEqual([]);
    expect(lexicon.countries).toEqual(['chile']);
  });
});

describe('validateSourceFixtures', () => {
  it('should reject an unknown domain', () => {
    expect(() =>
      validateSourceFixtures({
        sources: [{ id: 'x', displayName: 'X', qualityTier: 'low', domains: ['weather'] }],
      }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject ids with upper-case letters', () => {
    expect(() =>
      validateSourceFixtures({
        sources: [{ id: 'News', displayName: 'X', qualityTier: 'low', domains: ['news'] }],
      }),
    ).toThrow(SchemaValidationError);
  });
});

describe('createQueryParams', () => {
  it('should trim the query and apply defaults', () => {
    const params = createQueryParams({ query: '  Gazprom  ' });
    expect(params.query).toBe('Gazprom');
    expect(params.maxResultsPerSource).toBe(10);
    expect(params.isEntity).toBe(false);
  });

  it('should return a frozen object', () => {
    const params = createQueryParams({ query: 'nato', includeSources: ['a'] });
    expect(Object.isFrozen(params)).toBe(true);
    expect(Object.isFrozen(params.includeSources)).toBe(true);
  });

  it('should coerce time window strings to dates', () => {
    const params = createQueryParams({
      query: 'sudan',
      timeWindow: { start: '2024-01-01T00:00:00Z', end: '2024-02-01T00:00:00Z' },
    });
    expect(params.timeWindow?.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('should reject an inverted time window', () => {
    expect(() =>
      createQueryParams({
        query: 'sudan',
        timeWindow: { start: '2024-02-01T00:00:00Z', end: '2024-01-01T00:00:00Z' },
      }),
    ).toThrow(SchemaValidationError);
  });

  it('should reject a blank query', () => {
    expect(() => createQueryParams({ query: '   ' })).toThrow(SchemaValidationError);
  });

  it('should derive a new frozen copy', () => {
    const params = createQueryParams({ query: 'gazprom' });
    const variant = withQueryParams(params, { query: 'Q102673' });
    expect(variant.query).toBe('Q102673');
    expect(params.query).toBe('gazprom');
    expect(Object.isFrozen(variant)).toBe(true);
  });
});
