import type { ConfidenceAssessment, ConfidenceBand } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { QualityTier } from '@crosscheck/shared/src/types/source.types.js';
import { clamp } from '@crosscheck/shared/src/utils/math.js';

export const BAND_ORDER: readonly ConfidenceBand[] = [
  'remote',
  'unlikely',
  'roughly_even',
  'likely',
  'very_likely',
  'almost_certain',
];

/** Lower bound of each band; a score belongs to the highest band whose bound it reaches. */
const BAND_FLOORS: readonly (readonly [ConfidenceBand, number])[] = [
  ['almost_certain', 0.95],
  ['very_likely', 0.8],
  ['likely', 0.55],
  ['roughly_even', 0.45],
  ['unlikely', 0.2],
];

export const BAND_LABELS: Readonly<Record<ConfidenceBand, string>> = {
  remote: 'Remote',
  unlikely: 'Unlikely',
  roughly_even: 'Roughly even chance',
  likely: 'Likely',
  very_likely: 'Very likely',
  almost_certain: 'Almost certain',
};

export const TIER_BASE: Readonly<Record<QualityTier, number>> = {
  high: 0.8,
  medium: 0.6,
  low: 0.4,
};

const CORROBORATION_STEP = 0.05;
const CORROBORATION_CAP = 0.15;
const CONFLICT_STEP = 0.1;
const CONFLICT_CAP = 0.2;
const STALE_PENALTY = 0.05;
const MIN_SCORE = 0.02;
const MAX_SCORE = 0.98;
const NO_FINDINGS_SCORE = 0.05;

export function bandForScore(score: number): ConfidenceBand {
  // tolerate float noise such as 0.6 * 0.75 + 0.2
  const rounded = Math.round(score * 1e9) / 1e9;
  for (const [band, floor] of BAND_FLOORS) {
    if (rounded >= floor) {
      return band;
    }
  }
  return 'remote';
}

export function shiftBand(band: ConfidenceBand, steps: number): ConfidenceBand {
  const index = clamp(BAND_ORDER.indexOf(band) + steps, 0, BAND_ORDER.length - 1);
  return BAND_ORDER[index] ?? band;
}

export function tierBase(tier: QualityTier, triangulated: boolean, triangulationFactor: number): number {
  return triangulated ? TIER_BASE[tier] * triangulationFactor : TIER_BASE[tier];
}

export interface OverallConfidenceInput {
  /** Best quality tier among contributing sources; undefined when nothing contributed. */
  readonly bestTier?: QualityTier;
  readonly findingCount: number;
  readonly corroboratingSources: number;
  readonly conflictingSources: number;
  readonly allTriangulated: boolean;
  readonly staleContributed: boolean;
  readonly triangulationFactor: number;
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

interface Scored {
  readonly score: number;
  readonly keyFactors: string[];
}

function scoreFor(input: OverallConfidenceInput, bestTier: QualityTier, withConflicts: boolean): Scored {
  const keyFactors: string[] = [`Best source quality: ${bestTier}`];
  let score = TIER_BASE[bestTier];

  if (input.corroboratingSources > 0) {
    const bonus = Math.min(CORROBORATION_CAP, input.corroboratingSources * CORROBORATION_STEP);
    score += bonus;
    keyFactors.push(`Corroborated by ${String(input.corroboratingSources)} additional source(s)`);
  }

  if (withConflicts && input.conflictingSources > 0) {
    const penalty = Math.min(CONFLICT_CAP, input.conflictingSources * CONFLICT_STEP);
    score -= penalty;
    keyFactors.push(`${String(input.conflictingSources)} source(s) report conflicting values`);
  }

  if (input.allTriangulated) {
    score *= input.triangulationFactor;
    keyFactors.push('All findings come from triangulated sources');
  }

  if (input.staleContributed) {
    score -= STALE_PENALTY;
    keyFactors.push('Some data was served from an expired cache entry');
  }

  return { score: round(clamp(score, MIN_SCORE, MAX_SCORE)), keyFactors };
}

/** Highest score still inside `band`. */
function bandCeiling(band: ConfidenceBand): number {
  const above = BAND_ORDER[BAND_ORDER.indexOf(band) + 1];
  const floor = BAND_FLOORS.find(([candidate]) => candidate === above)?.[1];
  return floor === undefined ? MAX_SCORE : round(floor - 0.01);
}

export function assessConfidence(input: OverallConfidenceInput): ConfidenceAssessment {
  if (!input.bestTier || input.findingCount === 0) {
    return {
      band: 'remote',
      score: NO_FINDINGS_SCORE,
      label: BAND_LABELS.remote,
      reasoning: 'No source returned usable information for this query.',
      keyFactors: ['No findings'],
    };
  }

  const scored = scoreFor(input, input.bestTier, true);
  let { score } = scored;

  // conflicts sit at least one band below the score the same sources would earn agreeing
  if (input.conflictingSources > 0) {
    const agreed = bandForScore(scoreFor(input, input.bestTier, false).score);
    score = Math.max(MIN_SCORE, Math.min(score, bandCeiling(shiftBand(agreed, -1))));
  }

  const band = bandForScore(score);
  const { keyFactors } = scored;

  return {
    band,
    score,
    label: BAND_LABELS[band],
    reasoning: `${BAND_LABELS[band]} (${score.toFixed(2)}) based on ${String(input.findingCount)} finding(s); ${keyFactors.join('; ')}.`,
    keyFactors,
  };
}
