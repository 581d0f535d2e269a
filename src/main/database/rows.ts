/**
 * Row decoding for both engines.
 * node-postgres returns BIGINT and aggregates as strings and TIMESTAMPTZ as Date;
 * SQLite returns numbers and `YYYY-MM-DD HH:MM:SS` UTC text.
 */

import { z } from 'zod';
import type { Grouping, OwnerStatistics, User, VocabularyEntry, VocabularyExportRow } from '../../shared/types/core.js';

const SQLITE_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

export function parseTimestamp(value: Date | string | number): Date {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'number') {
    return new Date(value);
  }
  return new Date(SQLITE_TIMESTAMP.test(value) ? `${value.replace(' ', 'T')}Z` : value);
}

const timestamp = z.union([z.date(), z.string(), z.number()]).transform(parseTimestamp);
const identifier = z.coerce.number().int();
const count = z.union([z.number(), z.string(), z.null()]).transform((value) => (value === null ? 0 : Number(value)));
const flag = z.union([z.number(), z.string(), z.boolean(), z.null()]).transform((value) => value === true || Number(value) === 1);
const optionalIdentifier = z.union([z.number(), z.string(), z.null()]).optional()
  .transform((value) => (value === null || value === undefined ? undefined : Number(value)));
const optionalText = z.string().nullable().optional().transform((value) => value ?? undefined);

export const UserRowSchema = z.object({
  user_id: identifier,
  username: optionalText,
  is_admin: flag,
  is_tracked: flag,
  added_at: timestamp,
  notes: optionalText
}).transform((row): User => ({
  userId: row.user_id,
  username: row.username,
  isAdmin: row.is_admin,
  isTracked: row.is_tracked,
  addedAt: row.added_at,
  notes: row.notes
}));

export const GroupingRowSchema = z.object({
  id: identifier,
  name: z.string(),
  user_id: identifier
}).transform((row): Grouping => ({
  id: row.id,
  name: row.name,
  ownerId: row.user_id
}));

export const VocabularyRowSchema = z.object({
  id: identifier,
  user_id: identifier,
  source_text: z.string(),
  target_text: z.string(),
  success_count: count,
  failure_count: count,
  lesson_id: optionalIdentifier,
  category_id: optionalIdentifier,
  created_at: timestamp
}).transform((row): VocabularyEntry => ({
  id: row.id,
  ownerId: row.user_id,
  sourceText: row.source_text,
  targetText: row.target_text,
  successCount: row.success_count,
  failureCount: row.failure_count,
  lessonId: row.lesson_id,
  categoryId: row.category_id,
  createdAt: row.created_at
}));

export const ExportRowSchema = z.object({
  id: identifier,
  source_text: z.string(),
  target_text: z.string(),
  success_count: count,
  failure_count: count,
  lesson_name: z.string().nullable(),
  category_name: z.string().nullable(),
  created_at: timestamp
}).transform((row): VocabularyExportRow => ({
  id: row.id,
  sourceText: row.source_text,
  targetText: row.target_text,
  successCount: row.success_count,
  failureCount: row.failure_count,
  lesson: row.lesson_name,
  category: row.category_name,
  createdAt: row.created_at.toISOString()
}));

export const StatisticsRowSchema = z.object({
  total_entries: count,
  practiced_entries: count,
  total_successes: count,
  total_failures: count
}).transform((row): OwnerStatistics => {
  const attempts = row.total_successes + row.total_failures;
  return {
    totalEntries: row.total_entries,
    practicedEntries: row.practiced_entries,
    totalSuccesses: row.total_successes,
    totalFailures: row.total_failures,
    accuracy: attempts > 0 ? row.total_successes / attempts : 0
  };
});

export const CountRowSchema = z.object({ count });

export const UserIdRowSchema = z.object({ user_id: identifier });

export const IdRowSchema = z.object({ id: identifier });

export function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown[]): z.output<S>[] {
  return rows.map((row) => schema.parse(row));
}

export function parseFirst<S extends z.ZodTypeAny>(schema: S, rows: unknown[]): z.output<S> | null {
  return rows.length > 0 ? schema.parse(rows[0]) : null;
}
