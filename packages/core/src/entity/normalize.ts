const COMBINING_MARKS = /\p{M}/gu;

/** NFD-decomposes, strips combining marks, case-folds and collapses whitespace. */
export function normalizeName(value: string): string {
  return value.normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase().trim().replace(/\s+/g, ' ');
}

/** True when the value carries at least one letter or digit. */
export function hasUsableToken(value: string): boolean {
  return /[\p{L}\p{N}]/u.test(value);
}
