import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export type FlatValue = string | number | boolean;
export type FlatRecord = Record<string, FlatValue>;

const flattenValue = (value: unknown): FlatValue => {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => String(flattenValue(item))).join('; ');
  }
  return JSON.stringify(value);
};

/** Sorted union of keys across all records. */
export const collectFields = (records: readonly object[]): string[] =>
  [...new Set(records.flatMap((record) => Object.keys(record)))].sort();

/**
 * Every output record carries the same sorted field set; values a record lacks become `''` and
 * nested values are flattened to text.
 */
export const toFlatRecords = (records: readonly object[]): FlatRecord[] => {
  const fields = collectFields(records);
  return records.map((record) => {
    const source = new Map<string, unknown>(Object.entries(record));
    return Object.fromEntries(fields.map((field) => [field, flattenValue(source.get(field))]));
  });
};

const escapeCsv = (value: FlatValue): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsv = (records: readonly object[]): string => {
  const fields = collectFields(records);
  const rows = toFlatRecords(records).map((record) => fields.map((field) => escapeCsv(record[field] ?? '')).join(','));
  return [fields.map(escapeCsv).join(','), ...rows].join('\n') + '\n';
};

export const writeJson = async (path: string, records: readonly object[]): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(toFlatRecords(records), null, 2)}\n`, 'utf8');
};

export const writeCsv = async (path: string, records: readonly object[]): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, toCsv(records), 'utf8');
};
