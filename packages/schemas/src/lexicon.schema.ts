import { z } from 'zod';

const WordListSchema = z.array(z.string().min(1)).default([]);

/**
 * Word lists driving query-kind detection. Entries are matched against the
 * lower-cased query on word boundaries.
 */
export const LexiconSchema = z.object({
  countries: WordListSchema,
  countryKeywords: WordListSchema,
  personKeywords: WordListSchema,
  vesselKeywords: WordListSchema,
  aircraftKeywords: WordListSchema,
  organizationKeywords: WordListSchema,
  organizationSuffixes: WordListSchema,
});

export type Lexicon = z.infer<typeof LexiconSchema>;
