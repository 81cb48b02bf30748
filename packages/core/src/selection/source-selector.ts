import type {
  QueryKind,
  SourceCandidate,
  SourceSelection,
} from '@crosscheck/shared/src/types/aggregation.types.js';
import type { QueryParams, SourceDomain, SourceIdentity } from '@crosscheck/shared/src/types/source.types.js';
import { createChildLogger } from '@crosscheck/shared/src/logger.js';
import type { SelectorConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import type { AdapterGateway } from '../gateway/types.js';
import type { QueryClassifier } from './query-classifier.js';

const log = createChildLogger('selection:selector');

/** How useful each source domain is for each kind of query. Missing pairs score 0. */
export const DOMAIN_AFFINITY: Readonly<Record<QueryKind, Partial<Record<SourceDomain, number>>>> = {
  topic: { news: 0.9, conflict: 0.6, economic: 0.4, identity: 0.3, sanctions: 0.3 },
  entity: { identity: 0.9, sanctions: 0.8, news: 0.7, economic: 0.3 },
  country: { economic: 0.9, news: 0.8, conflict: 0.8, identity: 0.5, sanctions: 0.4 },
  person: { identity: 0.9, sanctions: 0.9, news: 0.7 },
  organization: { sanctions: 0.9, identity: 0.8, news: 0.7, economic: 0.4 },
  vessel: { maritime: 1.0, sanctions: 0.6, news: 0.3 },
  aircraft: { aviation: 1.0, news: 0.3, sanctions: 0.3 },
};

export interface SourceSelector {
  selectSources(params: QueryParams): SourceSelection;
}

export interface SourceSelectorDeps {
  readonly gateway: AdapterGateway;
  readonly classifier: QueryClassifier;
  readonly config: SelectorConfig;
}

function bestDomain(identity: SourceIdentity, kind: QueryKind): { domain: SourceDomain; score: number } | null {
  let best: { domain: SourceDomain; score: number } | null = null;
  for (const domain of identity.domains) {
    const score = DOMAIN_AFFINITY[kind][domain] ?? 0;
    if (!best || score > best.score) {
      best = { domain, score };
    }
  }
  return best;
}

function unavailableReason(identity: SourceIdentity): string {
  return identity.configured ? 'Source failed its last health check' : 'Source is not configured';
}

export function createSourceSelector(deps: SourceSelectorDeps): SourceSelector {
  const { gateway, classifier, config } = deps;

  return {
    selectSources(params: QueryParams): SourceSelection {
      const { kind, signal } = classifier.classify(params.query, params.isEntity);
      const include = params.includeSources ? new Set(params.includeSources) : null;
      const exclude = new Set(params.excludeSources ?? []);
      const candidates: SourceCandidate[] = [];

      for (const identity of gateway.listSources()) {
        const { sourceId } = identity;
        if ((include && !include.has(sourceId)) || exclude.has(sourceId)) {
          continue;
        }

        const best = bestDomain(identity, kind);
        const score = best?.score ?? 0;
        const explicitlyIncluded = include?.has(sourceId) ?? false;
        if (score < config.minRelevance && !explicitlyIncluded) {
          continue;
        }

        const available = gateway.isAvailable(sourceId);
        const reasoning = best
          ? `${best.domain} coverage scores ${score.toFixed(2)} for ${kind} queries (${signal})`
          : `No declared domains; included on request`;

        candidates.push({
          sourceId,
          relevanceScore: score,
          available,
          reasoning,
          ...(available ? {} : { unavailableReason: unavailableReason(identity) }),
        });
      }

      candidates.sort((a, b) => b.relevanceScore - a.relevanceScore || a.sourceId.localeCompare(b.sourceId));

      log.debug(
        { query: params.query, kind, candidates: candidates.map((c) => c.sourceId) },
        'Sources selected',
      );

      return { queryKind: kind, candidates };
    },
  };
}
