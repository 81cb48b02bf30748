import type { FailureKind } from '@crosscheck/shared/src/types/source.types.js';
import {
  AdapterAuthError,
  AdapterParseError,
  AdapterRateLimitError,
  AdapterTimeoutError,
  AdapterUpstreamError,
} from '@crosscheck/shared/src/utils/errors.js';

export interface Classification {
  readonly kind: FailureKind;
  readonly transient: boolean;
  readonly retryAfterMs?: number;
}

const TRANSIENT_KINDS: ReadonlySet<FailureKind> = new Set(['rate_limited', 'timeout', 'upstream']);

export function isTransientKind(kind: FailureKind): boolean {
  return TRANSIENT_KINDS.has(kind);
}

const MESSAGE_PATTERNS: readonly (readonly [FailureKind, readonly string[]])[] = [
  ['rate_limited', ['429', 'rate limit', 'too many requests']],
  ['timeout', ['etimedout', 'timed out', 'timeout', 'aborted']],
  ['auth', ['401', '403', 'unauthorized', 'forbidden', 'invalid api key']],
  [
    'upstream',
    [
      '500',
      '502',
      '503',
      '504',
      'internal server error',
      'bad gateway',
      'service unavailable',
      'econnreset',
      'econnrefused',
      'socket hang up',
      'network',
    ],
  ],
  ['parse', ['unexpected token', 'json', 'parse']],
];

function classifyMessage(message: string): FailureKind {
  const lower = message.toLowerCase();
  for (const [kind, patterns] of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => lower.includes(pattern))) {
      return kind;
    }
  }
  return 'unknown';
}

function fromKind(kind: FailureKind, retryAfterMs?: number): Classification {
  return retryAfterMs === undefined
    ? { kind, transient: isTransientKind(kind) }
    : { kind, transient: isTransientKind(kind), retryAfterMs };
}

/** Maps anything an adapter throws onto exactly one failure kind. */
export function classifyError(error: unknown): Classification {
  if (error instanceof AdapterRateLimitError) {
    return fromKind('rate_limited', error.retryAfterMs);
  }
  if (error instanceof AdapterTimeoutError) {
    return fromKind('timeout');
  }
  if (error instanceof AdapterUpstreamError) {
    return fromKind('upstream');
  }
  if (error instanceof AdapterAuthError) {
    return fromKind('auth');
  }
  if (error instanceof AdapterParseError || error instanceof SyntaxError) {
    return fromKind('parse');
  }
  if (error instanceof Error) {
    return fromKind(classifyMessage(error.message));
  }
  return fromKind('unknown');
}
