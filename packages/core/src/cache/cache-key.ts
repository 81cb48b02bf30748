import { createHash } from 'node:crypto';

const DIGEST_LENGTH = 12;

export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ').toLowerCase();
}

function isPlainObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Deterministic JSON: object keys sorted at every depth, `undefined` members
 * dropped, dates as ISO strings, arrays deduplicated and sorted.
 */
export function stableStringify(value: unknown): string {
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    const serialized = new Set(items.filter((item) => item !== undefined).map(stableStringify));
    return `[${[...serialized].sort().join(',')}]`;
  }

  if (isPlainObject(value)) {
    const entries: [string, unknown][] = Object.entries(value);
    const members = entries
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${stableStringify(member)}`);
    return `{${members.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

export function hashParams(params: Readonly<Record<string, unknown>>): string {
  return createHash('sha256').update(stableStringify(params)).digest('hex').slice(0, DIGEST_LENGTH);
}

/** `{sourceId}:{normalized query}:{params digest}` */
export function createCacheKey(
  sourceId: string,
  query: string,
  params: Readonly<Record<string, unknown>> = {},
): string {
  return `${sourceId}:${normalizeQuery(query)}:${hashParams(params)}`;
}
