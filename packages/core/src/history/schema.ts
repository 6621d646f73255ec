/**
 * History File Schema
 *
 * JSON Lines. The first line is a header naming the schema version and its
 * columns; every other line is one positional row, oldest first. Columns are
 * only ever appended, so a row written under an older schema is a prefix of
 * the current layout and loads with the missing tail set to null.
 */

import { z } from 'zod';
import type { HistoryRecord } from '../types/history.js';

export const HISTORY_COLUMNS = [
  'title',
  'artist',
  'sourceId',
  'sourceUrl',
  'downloadedAt',
  'durationSeconds',
  'album',
] as const;

export type HistoryColumn = typeof HISTORY_COLUMNS[number];

/** Number of columns each schema version wrote */
export const SCHEMA_COLUMN_COUNTS: Readonly<Record<number, number>> = {
  1: 5,
  2: 6,
  3: 7,
};

export const CURRENT_SCHEMA = 3;

export const headerSchema = z.object({
  schema: z.number().int().positive(),
  columns: z.array(z.string()).optional(),
});

export type HistoryHeader = z.infer<typeof headerSchema>;

const cell = z.union([z.string(), z.number(), z.null()]);

export const rowSchema = z.array(cell);

const recordSchema = z.object({
  title: z.string().min(1),
  artist: z.string().min(1),
  sourceId: z.string().min(1),
  sourceUrl: z.string().min(1),
  downloadedAt: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), 'not a timestamp')
    .transform((value) => new Date(value)),
  durationSeconds: z.number().nonnegative().nullable(),
  album: z.string().nullable(),
});

export function currentHeader(): HistoryHeader {
  return { schema: CURRENT_SCHEMA, columns: [...HISTORY_COLUMNS] };
}

/**
 * Map a positional row onto a record, defaulting every column the row's
 * schema did not have
 */
export function decodeRow(row: readonly unknown[], schema: number): HistoryRecord {
  const width = SCHEMA_COLUMN_COUNTS[schema] ?? HISTORY_COLUMNS.length;
  const fields: Record<string, unknown> = {};
  HISTORY_COLUMNS.forEach((column, index) => {
    const value = index < width ? row[index] : undefined;
    fields[column] = value === undefined || value === '' ? null : value;
  });
  return recordSchema.parse(fields);
}

export function encodeRow(record: HistoryRecord): Array<string | number | null> {
  return HISTORY_COLUMNS.map((column) => {
    switch (column) {
      case 'downloadedAt':
        return record.downloadedAt.toISOString();
      case 'durationSeconds':
        return record.durationSeconds;
      case 'album':
        return record.album;
      default:
        return record[column];
    }
  });
}
