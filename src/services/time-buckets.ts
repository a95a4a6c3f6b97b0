import type { CategoryId, CategoryRegistry } from "../domain/categories.js";
import { MINUTES_PER_DAY, formatMinuteOfDay } from "../utils/time.js";

export const MORNING_START_MINUTE = 5 * 60;
export const DAYTIME_START_MINUTE = 8 * 60;
export const NIGHT_START_MINUTE = 22 * 60;

export interface TimeBucket {
  /** Inclusive minute of day. */
  start: number;
  /** Exclusive minute of day; smaller than `start` when the bucket wraps past midnight. */
  end: number;
  category: CategoryId;
}

export type TimeBucketTable = readonly TimeBucket[];

/**
 * Morning owns 05:00-08:00 and evening owns 22:00-05:00. The daytime window is split across
 * the enabled optional categories in canonical order: `floor(window / n)` minutes each, with
 * the leftover minutes handed out one by one from the first bucket on. Without optional
 * categories the morning bucket runs until 22:00.
 */
export function buildTimeBucketTable(registry: CategoryRegistry): TimeBucketTable {
  const optional = registry.enabled;

  if (optional.length === 0) {
    const stretched: TimeBucket[] = [
      { start: MORNING_START_MINUTE, end: NIGHT_START_MINUTE, category: "morning" },
      { start: NIGHT_START_MINUTE, end: MORNING_START_MINUTE, category: "evening" },
    ];
    return Object.freeze(stretched);
  }

  const window = NIGHT_START_MINUTE - DAYTIME_START_MINUTE;
  const base = Math.floor(window / optional.length);
  const remainder = window % optional.length;

  const table: TimeBucket[] = [{ start: MORNING_START_MINUTE, end: DAYTIME_START_MINUTE, category: "morning" }];
  let cursor = DAYTIME_START_MINUTE;
  optional.forEach((category, index) => {
    const length = base + (index < remainder ? 1 : 0);
    table.push({ start: cursor, end: cursor + length, category });
    cursor += length;
  });
  table.push({ start: NIGHT_START_MINUTE, end: MORNING_START_MINUTE, category: "evening" });

  return Object.freeze(table);
}

export function bucketContains(bucket: TimeBucket, minute: number): boolean {
  if (bucket.start < bucket.end) {
    return minute >= bucket.start && minute < bucket.end;
  }
  return minute >= bucket.start || minute < bucket.end;
}

export function findBucket(table: TimeBucketTable, minute: number): TimeBucket | undefined {
  const normalized = ((minute % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return table.find((bucket) => bucketContains(bucket, normalized));
}

export function describeTable(table: TimeBucketTable): Array<{ start: string; end: string; category: CategoryId }> {
  return table.map((bucket) => ({
    start: formatMinuteOfDay(bucket.start),
    end: formatMinuteOfDay(bucket.end),
    category: bucket.category,
  }));
}
