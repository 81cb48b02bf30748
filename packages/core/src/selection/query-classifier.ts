import type { QueryKind } from '@crosscheck/shared/src/types/aggregation.types.js';
import type { Lexicon } from '@crosscheck/schemas/src/lexicon.schema.js';

export interface QueryClassification {
  readonly kind: QueryKind;
  /** What triggered the classification, for selection reasoning. */
  readonly signal: string;
}

const VESSEL_PATTERNS: readonly (readonly [RegExp, string])[] = [
  [/\bimo\s*\d+\b/, 'IMO number'],
  [/\bmmsi\s*\d+\b/, 'MMSI number'],
];

const AIRCRAFT_PATTERNS: readonly (readonly [RegExp, string])[] = [
  [/\b[a-z]{2,3}\d{1,4}\b/, 'callsign'],
  [/\bn\d{1,5}[a-z]{0,2}\b/, 'tail number'],
  [/\b[a-z]{1,2}-[a-z0-9]{3,5}\b/, 'tail number'],
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordPattern(words: readonly string[]): RegExp | null {
  if (words.length === 0) {
    return null;
  }
  const alternatives = words
    .map((word) => escapeRegExp(word.toLowerCase().trim()).replace(/\s+/g, '\\s+'))
    .sort((a, b) => b.length - a.length);
  return new RegExp(`(?:^|[^\\p{L}\\p{N}])(${alternatives.join('|')})(?=$|[^\\p{L}\\p{N}])`, 'u');
}

export interface QueryClassifier {
  classify(query: string, isEntity?: boolean): QueryClassification;
}

/** Keyword and pattern based query-kind detection over a lexicon. */
export function createQueryClassifier(lexicon: Lexicon): QueryClassifier {
  const vesselWords = wordPattern(lexicon.vesselKeywords);
  const aircraftWords = wordPattern(lexicon.aircraftKeywords);
  const countryWords = wordPattern([...lexicon.countryKeywords, ...lexicon.countries]);
  const organizationWords = wordPattern(lexicon.organizationKeywords);
  const organizationSuffixes = new Set(lexicon.organizationSuffixes.map((suffix) => suffix.toLowerCase()));
  const personWords = wordPattern(lexicon.personKeywords);

  function firstMatch(pattern: RegExp | null, text: string): string | undefined {
    return pattern?.exec(text)?.[1];
  }

  return {
    classify(query: string, isEntity = false): QueryClassification {
      const text = query.toLowerCase().trim();

      for (const [pattern, label] of VESSEL_PATTERNS) {
        if (pattern.test(text)) {
          return { kind: 'vessel', signal: label };
        }
      }
      const vesselWord = firstMatch(vesselWords, text);
      if (vesselWord) {
        return { kind: 'vessel', signal: `keyword "${vesselWord}"` };
      }

      for (const [pattern, label] of AIRCRAFT_PATTERNS) {
        if (pattern.test(text)) {
          return { kind: 'aircraft', signal: label };
        }
      }
      const aircraftWord = firstMatch(aircraftWords, text);
      if (aircraftWord) {
        return { kind: 'aircraft', signal: `keyword "${aircraftWord}"` };
      }

      const countryWord = firstMatch(countryWords, text);
      if (countryWord) {
        return { kind: 'country', signal: `country term "${countryWord}"` };
      }

      const organizationWord = firstMatch(organizationWords, text);
      if (organizationWord) {
        return { kind: 'organization', signal: `keyword "${organizationWord}"` };
      }
      const suffix = text
        .split(/\s+/)
        .map((word) => word.replace(/[.,]+$/, ''))
        .find((word) => organizationSuffixes.has(word));
      if (suffix) {
        return { kind: 'organization', signal: `legal suffix "${suffix}"` };
      }

      const personWord = firstMatch(personWords, text);
      if (personWord) {
        return { kind: 'person', signal: `keyword "${personWord}"` };
      }

      return isEntity
        ? { kind: 'entity', signal: 'named entity' }
        : { kind: 'topic', signal: 'no specific signal' };
    },
  };
}
