import { z } from 'zod';

import { PRAYER_NAMES } from '../common/types/prayer-name';
import { TRIGGER_OUTCOMES } from '../common/types/trigger-outcome';

const timeOfDay = z.string().regex(/^\d{2}:\d{2}$/);

/**
 * Schema for a prayer that was triggered during the day.
 */
export const consumedEntrySchema = z.object({
  prayer: z.enum(PRAYER_NAMES),

  /** When the trigger ran (ISO string) */
  at: z.string(),

  outcome: z.enum(TRIGGER_OUTCOMES),
});

export type ConsumedEntry = z.infer<typeof consumedEntrySchema>;

/**
 * Schema for the daily cache file (data/cache/YYYY-MM-DD.json).
 */
export const dailyCacheRecordSchema = z.object({
  /** Date of this record (ISO date string: YYYY-MM-DD) */
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),

  /** "City, Country" the times were fetched for */
  location: z.string(),

  /** Source that produced the times ("aladhan", "local") */
  source: z.string(),

  /** Timestamp of the fetch (ISO string) */
  fetchedAt: z.string(),

  times: z.object({
    fajr: timeOfDay,
    dhuhr: timeOfDay,
    asr: timeOfDay,
    maghrib: timeOfDay,
    isha: timeOfDay,
  }),

  consumed: z.array(consumedEntrySchema).default([]),
});

export type DailyCacheRecord = z.infer<typeof dailyCacheRecordSchema>;

/**
 * Validate a daily cache record against the schema.
 */
export function validateDailyCacheRecord(data: unknown, date?: string): DailyCacheRecord {
  const result = dailyCacheRecordSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    const source = date ? ` for ${date}` : '';
    throw new Error(`Invalid daily cache${source}:\n${errors}`);
  }

  return result.data;
}
