import { createHash } from 'node:crypto';
import type {
  AggregatedFinding,
  ClaimValue,
  ConflictingValue,
  Provenance,
} from '@crosscheck/shared/src/types/aggregation.types.js';
import type { FieldValue, QualityTier, SourceRecord } from '@crosscheck/shared/src/types/source.types.js';
import { stringField } from '@crosscheck/shared/src/utils/records.js';
import type { FactTypeConfig } from '@crosscheck/schemas/src/crosscheck-config.schema.js';
import { normalizeName } from '../entity/normalize.js';
import { BAND_ORDER, TIER_BASE, bandForScore, shiftBand, tierBase } from './confidence.js';

export const SUMMARY_ATTRIBUTE = 'summary';

const SUBJECT_FIELDS = ['subject', 'entity', 'country'] as const;
const DESCRIPTIVE_FIELDS = ['title', 'name', 'description', 'label'] as const;

/** Everything one source contributed to an aggregate. */
export interface Contribution {
  readonly sourceId: string;
  readonly qualityTier: QualityTier;
  readonly provenance: Provenance;
  readonly stale: boolean;
  readonly records: readonly SourceRecord[];
}

export interface Claim {
  /** `subject::qualifiers::attribute`, plus normalized content for descriptive claims. */
  readonly key: string;
  readonly subject: string;
  readonly attribute: string;
  readonly value: ClaimValue;
  readonly sourceId: string;
  readonly qualityTier: QualityTier;
  readonly provenance: Provenance;
  readonly stale: boolean;
}

export interface ClaimOptions {
  readonly factTypes: Readonly<Record<string, FactTypeConfig>>;
  readonly qualifierFields: readonly string[];
  /** Subject used for records that do not name one. */
  readonly fallbackSubject: string;
}

export interface GroupingOptions {
  readonly factTypes: Readonly<Record<string, FactTypeConfig>>;
  readonly triangulationFactor: number;
}

function toClaimValue(value: FieldValue | undefined, factType: FactTypeConfig): ClaimValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (factType.kind === 'numeric') {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value);
    }
    return undefined;
  }
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}

function qualifierKey(record: SourceRecord, fields: readonly string[]): string {
  const parts: string[] = [];
  for (const field of fields) {
    const value = record[field];
    if (value === undefined || value === null) {
      continue;
    }
    const rendered = Array.isArray(value) ? [...value].sort().join(',') : String(value);
    parts.push(`${field}=${normalizeName(rendered)}`);
  }
  return parts.join('|');
}

function subjectOf(record: SourceRecord, fallback: string): string {
  for (const field of SUBJECT_FIELDS) {
    const value = stringField(record, field);
    if (value) {
      return normalizeName(value);
    }
  }
  return normalizeName(fallback);
}

/** Turns one source's records into claims. */
export function extractClaims(contribution: Contribution, options: ClaimOptions): Claim[] {
  const claims: Claim[] = [];
  const base = {
    sourceId: contribution.sourceId,
    qualityTier: contribution.qualityTier,
    provenance: contribution.provenance,
    stale: contribution.stale,
  };

  for (const record of contribution.records) {
    const subject = subjectOf(record, options.fallbackSubject);
    const qualifiers = qualifierKey(record, options.qualifierFields);
    let factCount = 0;

    for (const [attribute, factType] of Object.entries(options.factTypes)) {
      const field = [attribute, ...factType.aliases].find((name) => record[name] !== undefined);
      const value = field === undefined ? undefined : toClaimValue(record[field], factType);
      if (value === undefined) {
        continue;
      }
      factCount++;
      claims.push({ ...base, key: `${subject}::${qualifiers}::${attribute}`, subject, attribute, value });
    }

    if (factCount > 0) {
      continue;
    }

    const content = DESCRIPTIVE_FIELDS.map((field) => stringField(record, field)).find(
      (text): text is string => text !== undefined,
    );
    if (content) {
      claims.push({
        ...base,
        key: `${subject}::${qualifiers}::${SUMMARY_ATTRIBUTE}::${normalizeName(content)}`,
        subject,
        attribute: SUMMARY_ATTRIBUTE,
        value: content,
      });
    }
  }

  return claims;
}

function withinTolerance(a: number, b: number, factType: Extract<FactTypeConfig, { kind: 'numeric' }>): boolean {
  const difference = Math.abs(a - b);
  if (difference <= factType.absoluteTolerance) {
    return true;
  }
  return difference <= factType.relativeTolerance * Math.max(Math.abs(a), Math.abs(b));
}

function categoricalForm(value: ClaimValue): string {
  return typeof value === 'string' ? normalizeName(value) : String(value);
}

function compareClaims(a: Claim, b: Claim): number {
  const av = typeof a.value === 'number' ? a.value : Number.NaN;
  const bv = typeof b.value === 'number' ? b.value : Number.NaN;
  if (!Number.isNaN(av) && !Number.isNaN(bv) && av !== bv) {
    return av - bv;
  }
  const as = String(a.value);
  const bs = String(b.value);
  if (as !== bs) {
    return as < bs ? -1 : 1;
  }
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

/** Groups one key's sorted claims into clusters of agreeing values. */
function cluster(claims: readonly Claim[], factType: FactTypeConfig | undefined): Claim[][] {
  const clusters: Claim[][] = [];

  for (const claim of claims) {
    const current = clusters[clusters.length - 1];
    const anchor = current?.[0];
    let agrees = false;

    if (current && anchor) {
      if (factType?.kind === 'numeric' && typeof claim.value === 'number' && typeof anchor.value === 'number') {
        agrees = withinTolerance(anchor.value, claim.value, factType);
      } else {
        agrees = categoricalForm(anchor.value) === categoricalForm(claim.value);
      }
    }

    if (current && agrees) {
      current.push(claim);
    } else if (factType?.kind === 'numeric') {
      clusters.push([claim]);
    } else {
      // categorical values are not ordered by agreement, so look for an existing match
      const match = clusters.find((c) => {
        const first = c[0];
        return first !== undefined && categoricalForm(first.value) === categoricalForm(claim.value);
      });
      if (match) {
        match.push(claim);
      } else {
        clusters.push([claim]);
      }
    }
  }

  return clusters;
}

function distinctSources(claims: readonly Claim[]): string[] {
  return [...new Set(claims.map((c) => c.sourceId))].sort();
}

function claimBase(claim: Claim, triangulationFactor: number): number {
  return tierBase(claim.qualityTier, claim.provenance === 'triangulated', triangulationFactor);
}

function bestClaim(claims: readonly Claim[], triangulationFactor: number): Claim | undefined {
  let best: Claim | undefined;
  for (const claim of claims) {
    if (!best || claimBase(claim, triangulationFactor) > claimBase(best, triangulationFactor)) {
      best = claim;
    }
  }
  return best;
}

/**
 * Source to weigh first in a conflict: the top-tier source of the value group
 * whose best quality tier is strictly above every other group's. None on a tie.
 */
function suggestAuthority(clusters: readonly (readonly Claim[])[]): string | undefined {
  const leaders = clusters
    .map((c) => {
      const top = Math.max(...c.map((claim) => TIER_BASE[claim.qualityTier]));
      const sourceId = distinctSources(c.filter((claim) => TIER_BASE[claim.qualityTier] === top))[0];
      return { top, sourceId };
    })
    .sort((a, b) => b.top - a.top);
  const [first, second] = leaders;
  if (!first || (second && second.top >= first.top)) {
    return undefined;
  }
  return first.sourceId;
}

function resolutionNote(conflict: readonly ConflictingValue[]): string {
  return `Conflicting: ${conflict.map((c) => `${c.sourceId} says ${String(c.value)}`).join(', ')}`;
}

function findingId(key: string): string {
  return `f-${createHash('sha256').update(key).digest('hex').slice(0, 12)}`;
}

export interface ClaimGrouping {
  readonly findings: AggregatedFinding[];
  /** Sources that reported a value outside the winning group of at least one finding. */
  readonly dissentingSources: readonly string[];
}

/**
 * Groups claims into findings. Claims are sorted before clustering so the
 * outcome does not depend on the order sources answered in.
 */
export function groupClaims(claims: readonly Claim[], options: GroupingOptions): ClaimGrouping {
  const byKey = new Map<string, Claim[]>();
  for (const claim of [...claims].sort(compareClaims)) {
    const group = byKey.get(claim.key);
    if (group) {
      group.push(claim);
    } else {
      byKey.set(claim.key, [claim]);
    }
  }

  const findings: AggregatedFinding[] = [];
  const dissenting = new Set<string>();

  for (const [key, group] of byKey) {
    const first = group[0];
    if (!first) {
      continue;
    }
    const factType = options.factTypes[first.attribute];
    const clusters = cluster(group, factType);
    const strength = (c: readonly Claim[]): number => {
      const top = bestClaim(c, options.triangulationFactor);
      return top ? claimBase(top, options.triangulationFactor) : 0;
    };
    // clusters arrive in value order, so a stable sort breaks remaining ties by value
    const ranked = [...clusters].sort(
      (a, b) => distinctSources(b).length - distinctSources(a).length || strength(b) - strength(a),
    );
    const winning = ranked[0] ?? group;
    const representative = bestClaim(winning, options.triangulationFactor) ?? first;
    const sources = distinctSources(group);
    const winningSources = distinctSources(winning);

    const status =
      clusters.length > 1 ? 'conflicting' : winningSources.length >= 2 ? 'corroborated' : 'single_source';

    const conflict: ConflictingValue[] = [];
    if (status === 'conflicting') {
      for (const source of sources) {
        if (!winningSources.includes(source)) {
          dissenting.add(source);
        }
      }
      const seen = new Set<string>();
      for (const claim of group) {
        const marker = `${claim.sourceId}\u0000${String(claim.value)}`;
        if (!seen.has(marker)) {
          seen.add(marker);
          conflict.push({ sourceId: claim.sourceId, value: claim.value });
        }
      }
      conflict.sort((a, b) => a.sourceId.localeCompare(b.sourceId) || String(a.value).localeCompare(String(b.value)));
    }

    const authority = status === 'conflicting' ? suggestAuthority(clusters) : undefined;
    const best = bestClaim(group, options.triangulationFactor) ?? first;
    const shift = status === 'corroborated' ? 1 : status === 'conflicting' ? -1 : 0;

    findings.push({
      id: findingId(key),
      subject: first.subject,
      attribute: first.attribute,
      value: representative.value,
      sources,
      corroboration: winningSources.length >= 2 ? winningSources : [],
      conflict,
      status,
      confidence: shiftBand(bandForScore(claimBase(best, options.triangulationFactor)), shift),
      provenance: group.some((c) => c.provenance === 'direct') ? 'direct' : 'triangulated',
      stale: group.some((c) => c.stale),
      ...(authority ? { suggestedAuthority: authority } : {}),
      ...(status === 'conflicting' ? { resolutionNote: resolutionNote(conflict) } : {}),
    });
  }

  findings.sort(
    (a, b) =>
      BAND_ORDER.indexOf(b.confidence) - BAND_ORDER.indexOf(a.confidence) ||
      b.corroboration.length - a.corroboration.length ||
      a.id.localeCompare(b.id),
  );

  return { findings, dissentingSources: [...dissenting].sort() };
}
