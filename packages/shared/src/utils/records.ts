import type { FieldValue, SourceRecord } from '../types/source.types.js';

export function isStringList(value: FieldValue | undefined): value is readonly string[] {
  return Array.isArray(value);
}

/** Non-empty string value of a record field. */
export function stringField(record: SourceRecord, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** String list value of a record field; a single string counts as a list of one. */
export function stringListField(record: SourceRecord, field: string): readonly string[] {
  const value = record[field];
  if (isStringList(value)) {
    return value;
  }
  return typeof value === 'string' ? [value] : [];
}
