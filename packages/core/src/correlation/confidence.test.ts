import { describe, it, expect } from 'vitest';
import { assessConfidence, bandForScore, shiftBand, tierBase } from './confidence.js';

const base = {
  findingCount: 1,
  corroboratingSources: 0,
  conflictingSources: 0,
  allTriangulated: false,
  staleContributed: false,
  triangulationFactor: 0.75,
};

describe('bandForScore', () => {
  it('should map scores onto the six bands', () => {
    expect(bandForScore(0.1)).toBe('remote');
    expect(bandForScore(0.2)).toBe('unlikely');
    expect(bandForScore(0.45)).toBe('roughly_even');
    expect(bandForScore(0.55)).toBe('likely');
    expect(bandForScore(0.8)).toBe('very_likely');
    expect(bandForScore(0.95)).toBe('almost_certain');
  });

  it('should ignore floating point noise at a boundary', () => {
    expect(bandForScore(0.7999999999999999)).toBe('very_likely');
  });
});

describe('shiftBand', () => {
  it('should move one band and stop at the ends', () => {
    expect(shiftBand('likely', 1)).toBe('very_likely');
    expect(shiftBand('likely', -1)).toBe('roughly_even');
    expect(shiftBand('almost_certain', 1)).toBe('almost_certain');
    expect(shiftBand('remote', -1)).toBe('remote');
  });
});

describe('tierBase', () => {
  it('should reduce triangulated contributions', () => {
    expect(tierBase('high', false, 0.75)).toBe(0.8);
    expect(tierBase('high', true, 0.75)).toBeCloseTo(0.6);
  });
});

describe('assessConfidence', () => {
  it('should report remote with no findings', () => {
    const assessment = assessConfidence({ ...base, findingCount: 0 });
    expect(assessment.band).toBe('remote');
    expect(assessment.score).toBe(0.05);
    expect(assessment.keyFactors).toEqual(['No findings']);
  });

  it('should start from the best tier base', () => {
    expect(assessConfidence({ ...base, bestTier: 'high' })).toMatchObject({ band: 'very_likely', score: 0.8 });
    expect(assessConfidence({ ...base, bestTier: 'medium' })).toMatchObject({ band: 'likely', score: 0.6 });
    expect(assessConfidence({ ...base, bestTier: 'low' })).toMatchObject({ band: 'unlikely', score: 0.4 });
  });

  it('should raise the score per corroborating source up to a cap', () => {
    expect(assessConfidence({ ...base, bestTier: 'medium', corroboratingSources: 1 }).score).toBe(0.65);
    expect(assessConfidence({ ...base, bestTier: 'high', corroboratingSources: 5 }).score).toBe(0.95);
  });

  it('should lower the score per conflicting source up to a cap', () => {
    const conflicted = assessConfidence({ ...base, bestTier: 'high', conflictingSources: 1 });
    expect(conflicted).toMatchObject({ band: 'likely', score: 0.7 });
    expect(assessConfidence({ ...base, bestTier: 'high', conflictingSources: 4 }).score).toBe(0.6);
  });

  it('should drop a conflict at least one band even for low-quality sources', () => {
    expect(assessConfidence({ ...base, bestTier: 'low' })).toMatchObject({ band: 'unlikely', score: 0.4 });
    expect(assessConfidence({ ...base, bestTier: 'low', conflictingSources: 1 })).toMatchObject({
      band: 'remote',
      score: 0.19,
    });
    expect(assessConfidence({ ...base, bestTier: 'medium', conflictingSources: 1 })).toMatchObject({
      band: 'roughly_even',
      score: 0.5,
    });
  });

  it('should reduce fully triangulated results', () => {
    expect(assessConfidence({ ...base, bestTier: 'high', allTriangulated: true })).toMatchObject({
      band: 'likely',
      score: 0.6,
    });
  });

  it('should penalise stale data and clamp', () => {
    expect(assessConfidence({ ...base, bestTier: 'high', staleContributed: true }).score).toBe(0.75);
    expect(
      assessConfidence({ ...base, bestTier: 'high', corroboratingSources: 3, staleContributed: false }).score,
    ).toBe(0.95);
  });

  it('should label and explain the assessment', () => {
    const assessment = assessConfidence({ ...base, bestTier: 'high', corroboratingSources: 1 });
    expect(assessment.label).toBe('Very likely');
    expect(assessment.keyFactors).toEqual(['Best source quality: high', 'Corroborated by 1 additional source(s)']);
    expect(assessment.reasoning).toBe(
      'Very likely (0.85) based on 1 finding(s); Best source quality: high; Corroborated by 1 additional source(s).',
    );
  });
});
