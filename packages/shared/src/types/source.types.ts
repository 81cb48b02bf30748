export type QualityTier = 'high' | 'medium' | 'low';

export type SourceDomain =
  | 'news'
  | 'economic'
  | 'identity'
  | 'sanctions'
  | 'conflict'
  | 'maritime'
  | 'aviation';

export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
}

export interface QueryParams {
  readonly query: string;
  readonly timeWindow?: TimeWindow;
  readonly includeSources?: readonly string[];
  readonly excludeSources?: readonly string[];
  readonly altIdentifier?: string;
  readonly maxResultsPerSource: number;
  readonly isEntity: boolean;
}

export type FieldValue = string | number | boolean | null | readonly string[];

export type SourceRecord = Readonly<Record<string, FieldValue>>;

export interface SourcePayload {
  readonly records: readonly SourceRecord[];
  readonly sourceUrl?: string;
}

/** What an adapter's `fetch` resolves with. Failures are thrown instead. */
export type RawResponse =
  | { readonly kind: 'records'; readonly records: readonly SourceRecord[]; readonly sourceUrl?: string }
  | { readonly kind: 'empty' }
  | { readonly kind: 'rate_limited'; readonly retryAfterMs?: number };

export type FailureKind = 'rate_limited' | 'timeout' | 'upstream' | 'auth' | 'parse' | 'unknown';

export interface SourceFailure {
  readonly kind: FailureKind;
  readonly transient: boolean;
  readonly attempts: number;
  /** Upstream message, for logs only. */
  readonly message: string;
}

interface SourceResultBase {
  readonly sourceId: string;
  readonly qualityTier: QualityTier;
  readonly fetchedAt: Date;
  readonly fromCache: boolean;
  readonly stale: boolean;
  readonly latencyMs: number;
}

export type SourceResult =
  | (SourceResultBase & { readonly status: 'success'; readonly payload: SourcePayload })
  | (SourceResultBase & { readonly status: 'no_data' })
  | (SourceResultBase & { readonly status: 'rate_limited'; readonly retryAfterMs: number })
  | (SourceResultBase & { readonly status: 'error'; readonly failure: SourceFailure });

export type SourceResultStatus = SourceResult['status'];

export interface SourceIdentity {
  readonly sourceId: string;
  readonly displayName: string;
  readonly qualityTier: QualityTier;
  readonly domains: readonly SourceDomain[];
  readonly configured: boolean;
}

export interface SourceStatus {
  readonly sourceId: string;
  readonly displayName: string;
  readonly configured: boolean;
  readonly lastHealthCheck: { readonly healthy: boolean; readonly checkedAt: Date } | null;
  readonly lastLatencyMs: number | null;
  readonly lastSuccessAt: Date | null;
  readonly lastFailure: { readonly kind: FailureKind; readonly at: Date } | null;
}
