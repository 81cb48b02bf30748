import type { EntityMatch } from './entity.types.js';
import type { FailureKind, QualityTier } from './source.types.js';

export type ConfidenceBand =
  | 'remote'
  | 'unlikely'
  | 'roughly_even'
  | 'likely'
  | 'very_likely'
  | 'almost_certain';

export interface ConfidenceAssessment {
  readonly band: ConfidenceBand;
  readonly score: number;
  readonly label: string;
  readonly reasoning: string;
  readonly keyFactors: readonly string[];
}

export type QueryKind =
  | 'topic'
  | 'entity'
  | 'country'
  | 'person'
  | 'organization'
  | 'vessel'
  | 'aircraft';

export interface SourceCandidate {
  readonly sourceId: string;
  readonly relevanceScore: number;
  readonly available: boolean;
  readonly reasoning: string;
  readonly unavailableReason?: string;
}

export interface SourceSelection {
  readonly queryKind: QueryKind;
  readonly candidates: readonly SourceCandidate[];
}

export type ClaimValue = string | number | boolean;

export type Provenance = 'direct' | 'triangulated';

export type FindingStatus = 'corroborated' | 'single_source' | 'conflicting';

export interface ConflictingValue {
  readonly sourceId: string;
  readonly value: ClaimValue;
}

export interface AggregatedFinding {
  readonly id: string;
  readonly subject: string;
  readonly attribute: string;
  /** Value reported by the best-quality source of the largest agreeing group. */
  readonly value: ClaimValue;
  readonly sources: readonly string[];
  readonly corroboration: readonly string[];
  readonly conflict: readonly ConflictingValue[];
  readonly status: FindingStatus;
  readonly confidence: ConfidenceBand;
  readonly provenance: Provenance;
  readonly stale: boolean;
  /** Conflicting findings only: the source whose quality tier beats every other reported value's. */
  readonly suggestedAuthority?: string;
  readonly resolutionNote?: string;
}

export type SkipReason = 'unavailable' | 'rate_limited' | 'timeout' | 'errored';

export interface SkippedSource {
  readonly sourceId: string;
  readonly reason: SkipReason;
  readonly failureKind?: FailureKind;
  readonly explanation: string;
}

export interface ConsultedSource {
  readonly sourceId: string;
  readonly outcome: 'success' | 'no_data';
  readonly qualityTier: QualityTier;
  readonly provenance: Provenance;
  readonly fromCache: boolean;
  readonly stale: boolean;
  readonly recordCount: number;
  /** When the source produced the data; earlier than the query for cache reads. */
  readonly fetchedAt: Date;
  readonly sourceUrl?: string;
}

export interface TriangulationSummary {
  readonly triggered: boolean;
  readonly status: 'not_needed' | 'matched' | 'exhausted';
  readonly sourcesQueried: readonly string[];
}

export interface AggregatedResult {
  readonly query: string;
  readonly queryKind: QueryKind;
  readonly entity?: EntityMatch;
  readonly findings: readonly AggregatedFinding[];
  readonly confidence: ConfidenceAssessment;
  readonly sourcesConsulted: readonly ConsultedSource[];
  readonly sourcesSkipped: readonly SkippedSource[];
  readonly triangulation: TriangulationSummary;
  readonly degraded: boolean;
  readonly suggestions: readonly string[];
  readonly durationMs: number;
  readonly completedAt: Date;
}
