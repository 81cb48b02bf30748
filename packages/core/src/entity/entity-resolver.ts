import type {
  EntityMatch,
  EntityQuery,
  KnownEntity,
  ResolutionTier,
} from '@crosscheck/shared/src/types/entity.types.js';
import type { SourceRecord } from '@crosscheck/shared/src/types/source.types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import { levenshteinSimilarity } from '@crosscheck/shared/src/utils/math.js';
import { stringField, stringListField } from '@crosscheck/shared/src/utils/records.js';
import type { ResolverConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import { createQueryParams } from '@crosscheck/schemas/src/query.schema.js';
import type { AdapterGateway } from '../gateway/types.js';
import { normalizeName } from './normalize.js';

const log = createChildLogger('entity:resolver');

const EXACT_CONFIDENCE = 1.0;
const NORMALIZED_CONFIDENCE = 0.95;
const CANONICAL_LABEL_CONFIDENCE = 1.0;
const CANONICAL_ALIAS_CONFIDENCE = 0.95;
const CANONICAL_FLOOR = 0.85;
const FUZZY_CEILING = 0.84;
const SUGGESTION_FLOOR = 0.5;

const GENERIC_SUGGESTIONS = [
  'Check the spelling of the name',
  'Try the full official name instead of an abbreviation',
  'Provide an alternate identifier such as a registry id',
];

type EvaluatedTier = Exclude<ResolutionTier, 'failed'>;

export interface EntityResolver {
  resolve(query: EntityQuery): Promise<EntityMatch>;
}

export interface EntityResolverDeps {
  readonly entities: readonly KnownEntity[];
  readonly config: ResolverConfig;
  /** Needed for the canonical tier; the tier is skipped without it. */
  readonly gateway?: AdapterGateway;
}

interface Candidate {
  readonly entity: KnownEntity;
  readonly similarity: number;
}

export function createEntityResolver(deps: EntityResolverDeps): EntityResolver {
  const { entities, config, gateway } = deps;

  function matchFor(
    query: EntityQuery,
    entity: KnownEntity,
    tier: EvaluatedTier,
    confidence: number,
    evaluatedTiers: readonly EvaluatedTier[],
  ): EntityMatch {
    return {
      originalQuery: query.name,
      entityId: entity.id,
      ...(entity.canonicalId ? { canonicalId: entity.canonicalId } : {}),
      matchedLabel: entity.label,
      kind: entity.kind,
      tier,
      confidence,
      evaluatedTiers,
      suggestions: [],
    };
  }

  function tryExact(query: EntityQuery): KnownEntity | undefined {
    return entities.find(
      (entity) =>
        entity.names.includes(query.name) ||
        (query.altId !== undefined && (entity.id === query.altId || entity.canonicalId === query.altId)),
    );
  }

  function tryNormalized(query: EntityQuery): KnownEntity | undefined {
    const normalized = normalizeName(query.name);
    if (normalized.length === 0) {
      return undefined;
    }
    return entities.find(
      (entity) =>
        normalizeName(entity.label) === normalized ||
        entity.names.some((name) => normalizeName(name) === normalized),
    );
  }

  function canonicalAvailable(): string | undefined {
    const sourceId = config.canonicalSourceId;
    if (!gateway || !sourceId) {
      return undefined;
    }
    const registered = gateway.listSources().some((identity) => identity.sourceId === sourceId);
    return registered && gateway.isAvailable(sourceId) ? sourceId : undefined;
  }

  async function lookupCanonical(
    sourceId: string,
    directory: AdapterGateway,
    term: string,
  ): Promise<SourceRecord | undefined> {
    const result = await directory.query(
      sourceId,
      createQueryParams({ query: term, isEntity: true, maxResultsPerSource: 5 }),
    );
    if (result.status !== 'success') {
      log.debug({ sourceId, term, status: result.status }, 'Canonical directory miss');
      return undefined;
    }
    return result.payload.records[0];
  }

  async function tryCanonical(
    query: EntityQuery,
    evaluatedTiers: readonly EvaluatedTier[],
  ): Promise<EntityMatch | undefined> {
    const sourceId = canonicalAvailable();
    if (!sourceId || !gateway) {
      return undefined;
    }

    const terms = [query.name, query.altId].filter(
      (term): term is string => term !== undefined && normalizeName(term).length > 0,
    );
    const normalized = normalizeName(query.name);

    for (const term of terms) {
      const record = await lookupCanonical(sourceId, gateway, term);
      if (!record) {
        continue;
      }

      const canonicalId = stringField(record, 'id');
      const label = stringField(record, 'label');
      if (!canonicalId || !label) {
        continue;
      }

      const confidence =
        normalizeName(label) === normalized
          ? CANONICAL_LABEL_CONFIDENCE
          : stringListField(record, 'aliases').some((alias) => normalizeName(alias) === normalized)
            ? CANONICAL_ALIAS_CONFIDENCE
            : CANONICAL_FLOOR;

      const known = entities.find((entity) => entity.canonicalId === canonicalId);
      if (known) {
        return { ...matchFor(query, known, 'canonical', confidence, evaluatedTiers), canonicalId, matchedLabel: label };
      }

      return {
        originalQuery: query.name,
        entityId: canonicalId,
        canonicalId,
        matchedLabel: label,
        tier: 'canonical',
        confidence,
        evaluatedTiers,
        suggestions: [],
      };
    }

    return undefined;
  }

  function rankCandidates(query: EntityQuery): Candidate[] {
    const normalized = normalizeName(query.name);
    return entities
      .map((entity) => ({
        entity,
        similarity: Math.max(
          ...entity.names.map((name) => levenshteinSimilarity(normalized, normalizeName(name))),
          levenshteinSimilarity(normalized, normalizeName(entity.label)),
        ),
      }))
      .sort((a, b) => b.similarity - a.similarity || a.entity.id.localeCompare(b.entity.id));
  }

  function fuzzyConfidence(similarity: number): number {
    const { fuzzyThreshold, fuzzyMinConfidence } = config;
    if (fuzzyThreshold >= 1) {
      return FUZZY_CEILING;
    }
    const position = (similarity - fuzzyThreshold) / (1 - fuzzyThreshold);
    return fuzzyMinConfidence + position * (FUZZY_CEILING - fuzzyMinConfidence);
  }

  function suggestionsFor(candidates: readonly Candidate[]): readonly string[] {
    const close = candidates
      .filter((c) => c.similarity >= SUGGESTION_FLOOR && c.similarity < config.fuzzyThreshold)
      .map((c) => c.entity.label);
    const unique = [...new Set(close)];
    return (unique.length > 0 ? unique : GENERIC_SUGGESTIONS).slice(0, config.maxSuggestions);
  }

  return {
    async resolve(query: EntityQuery): Promise<EntityMatch> {
      const evaluatedTiers: EvaluatedTier[] = [];

      evaluatedTiers.push('exact');
      const exact = tryExact(query);
      if (exact) {
        log.info({ query: query.name, entityId: exact.id, tier: 'exact' }, 'Entity resolved');
        return matchFor(query, exact, 'exact', EXACT_CONFIDENCE, [...evaluatedTiers]);
      }

      evaluatedTiers.push('normalized');
      const normalized = tryNormalized(query);
      if (normalized) {
        log.info({ query: query.name, entityId: normalized.id, tier: 'normalized' }, 'Entity resolved');
        return matchFor(query, normalized, 'normalized', NORMALIZED_CONFIDENCE, [...evaluatedTiers]);
      }

      if (canonicalAvailable()) {
        evaluatedTiers.push('canonical');
        const canonical = await tryCanonical(query, [...evaluatedTiers]);
        if (canonical && canonical.confidence >= CANONICAL_FLOOR) {
          log.info({ query: query.name, entityId: canonical.entityId, tier: 'canonical' }, 'Entity resolved');
          return canonical;
        }
      }

      evaluatedTiers.push('fuzzy');
      const candidates = rankCandidates(query);
      const best = candidates[0];
      if (best && best.similarity >= config.fuzzyThreshold) {
        const confidence = fuzzyConfidence(best.similarity);
        log.info(
          { query: query.name, entityId: best.entity.id, tier: 'fuzzy', similarity: best.similarity },
          'Entity resolved',
        );
        return matchFor(query, best.entity, 'fuzzy', confidence, [...evaluatedTiers]);
      }

      log.info({ query: query.name, tiers: evaluatedTiers }, 'Entity resolution failed');
      return {
        originalQuery: query.name,
        tier: 'failed',
        confidence: 0,
        evaluatedTiers: [...evaluatedTiers],
        suggestions: suggestionsFor(candidates),
      };
    },
  };
}
