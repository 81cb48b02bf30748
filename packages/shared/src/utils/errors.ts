export class CrosscheckError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CrosscheckError';
  }
}

/**
 * Base class for failures raised by a source adapter. The gateway classifies
 * these into a `FailureKind`; anything else an adapter throws is classified
 * by message.
 */
export class AdapterError extends CrosscheckError {
  constructor(
    public readonly sourceId: string,
    message: string,
    code: string,
    cause?: Error,
  ) {
    super(`[${sourceId}] ${message}`, code, cause);
    this.name = 'AdapterError';
  }
}

export class AdapterTimeoutError extends AdapterError {
  constructor(
    sourceId: string,
    public readonly timeoutMs?: number,
  ) {
    super(
      sourceId,
      timeoutMs !== undefined ? `Request timed out after ${String(timeoutMs)}ms` : 'Request timed out',
      'ADAPTER_TIMEOUT',
    );
    this.name = 'AdapterTimeoutError';
  }
}

export class AdapterRateLimitError extends AdapterError {
  constructor(
    sourceId: string,
    public readonly retryAfterMs?: number,
  ) {
    super(sourceId, 'Upstream rate limit exceeded', 'ADAPTER_RATE_LIMITED');
    this.name = 'AdapterRateLimitError';
  }
}

export class AdapterAuthError extends AdapterError {
  constructor(sourceId: string, details?: string) {
    super(
      sourceId,
      details ? `Authentication failed: ${details}` : 'Authentication failed',
      'ADAPTER_AUTH',
    );
    this.name = 'AdapterAuthError';
  }
}

export class AdapterParseError extends AdapterError {
  constructor(sourceId: string, details?: string, cause?: Error) {
    super(
      sourceId,
      details ? `Failed to parse response: ${details}` : 'Failed to parse response',
      'ADAPTER_PARSE',
      cause,
    );
    this.name = 'AdapterParseError';
  }
}

export class AdapterUpstreamError extends AdapterError {
  constructor(
    sourceId: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(
      sourceId,
      status !== undefined ? `Upstream responded with ${String(status)}` : 'Upstream unavailable',
      'ADAPTER_UPSTREAM',
      cause,
    );
    this.name = 'AdapterUpstreamError';
  }
}

export class UnknownSourceError extends CrosscheckError {
  constructor(public readonly sourceId: string) {
    super(`Unknown source: ${sourceId}`, 'UNKNOWN_SOURCE');
    this.name = 'UnknownSourceError';
  }
}

export class AggregationError extends CrosscheckError {
  constructor(
    message: string,
    code: 'NO_AVAILABLE_SOURCES' | 'AGGREGATION_FAILED',
    public readonly details: readonly string[] = [],
  ) {
    super(message, code);
    this.name = 'AggregationError';
  }
}

export class ResolutionError extends CrosscheckError {
  constructor(
    message: string,
    public readonly suggestions: readonly string[] = [],
  ) {
    super(message, 'RESOLUTION_FAILED');
    this.name = 'ResolutionError';
  }
}

export class PersistenceError extends CrosscheckError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SchemaValidationError extends CrosscheckError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends CrosscheckError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
