export type ResolutionTier = 'exact' | 'normalized' | 'canonical' | 'fuzzy' | 'failed';

export type EntityKind = 'person' | 'organization' | 'country' | 'vessel' | 'aircraft' | 'other';

export interface KnownEntity {
  readonly id: string;
  readonly label: string;
  /** Registry keys, compared literally by the exact tier. */
  readonly names: readonly string[];
  readonly kind: EntityKind;
  readonly canonicalId?: string;
}

export interface EntityQuery {
  readonly name: string;
  readonly altId?: string;
}

export interface EntityMatch {
  readonly originalQuery: string;
  readonly entityId?: string;
  readonly canonicalId?: string;
  readonly matchedLabel?: string;
  readonly kind?: EntityKind;
  readonly tier: ResolutionTier;
  readonly confidence: number;
  readonly evaluatedTiers: readonly Exclude<ResolutionTier, 'failed'>[];
  readonly suggestions: readonly string[];
}
