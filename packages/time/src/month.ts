import { MONTHS, WEEKDAYS, type Month, type Weekday } from "./types.js";

/**
 * Type guard for {@link Month}.
 *
 * Accepts unknown runtime values and returns `true` only for the twelve month names.
 */
export function isMonth(value: unknown): value is Month {
  return typeof value === "string" && MONTHS.some((entry) => entry === value);
}

/** 1-based ordinal of a month (`"Jan"` → 1, `"Dec"` → 12). */
export function monthOrdinal(month: Month): number {
  return MONTHS.indexOf(month) + 1;
}

/** Inverse of {@link monthOrdinal}. Throws `RangeError` for anything but an integer in 1..12. */
export function monthFromOrdinal(ordinal: number): Month {
  const month = Number.isInteger(ordinal) ? MONTHS[ordinal - 1] : undefined;
  if (month === undefined) {
    throw new RangeError(`month ordinal must be an integer in 1..12 (got ${ordinal})`);
  }
  return month;
}

/** Weekday for a 0-based index with Sunday = 0. */
export function weekdayFromIndex(index: number): Weekday {
  const weekday = Number.isInteger(index) ? WEEKDAYS[index] : undefined;
  if (weekday === undefined) {
    throw new RangeError(`weekday index must be an integer in 0..6 (got ${index})`);
  }
  return weekday;
}
