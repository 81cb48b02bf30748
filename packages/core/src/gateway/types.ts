import type {
  QueryParams,
  RawResponse,
  SourceIdentity,
  SourceResult,
  SourceStatus,
} from '@crosscheck/shared/src/types/source.types.js';

/**
 * Contract every external data source satisfies. Failures are thrown,
 * preferably as `AdapterError` subclasses; anything else is classified by
 * its message.
 */
export interface SourceAdapter {
  identify(): SourceIdentity;
  fetch(params: QueryParams, signal: AbortSignal): Promise<RawResponse>;
  healthCheck(signal: AbortSignal): Promise<boolean>;
}

export interface GatewayQueryOptions {
  /** Caller's own cancellation; detaches this caller only. */
  readonly signal?: AbortSignal;
}

export interface AdapterGateway {
  query(sourceId: string, params: QueryParams, options?: GatewayQueryOptions): Promise<SourceResult>;
  /** Explicit allow-stale cache read, used as a fallback after a failed fetch. */
  readCached(sourceId: string, params: QueryParams): Promise<SourceResult | null>;
  healthCheck(sourceId: string): Promise<boolean>;
  isAvailable(sourceId: string): boolean;
  sourceStatus(sourceId: string): SourceStatus;
  sourceStatus(): readonly SourceStatus[];
  listSources(): readonly SourceIdentity[];
}
