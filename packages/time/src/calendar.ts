import { err, invariant, ok, type Result } from "@skyframe/core";

import { monthFromOrdinal, monthOrdinal, weekdayFromIndex } from "./month.js";
import type { CalendarKind, CivilDate, DateFromJulianDayError, DayOfMonth, Weekday } from "./types.js";

/** First Julian day number (integer part of `jd + 0.5`) reckoned in the Gregorian calendar: 1582-10-15. */
export const GREGORIAN_REFORM_JD = 2299161;

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

/** Fold a day of month, wall-clock time and time zone into a decimal day (UT). */
export function decimalDay(day: DayOfMonth): number {
  return (
    day.day +
    day.hour / 24 +
    day.minute / (60 * 24) +
    day.second / (60 * 60 * 24) -
    day.timeZone / 24
  );
}

export function isLeapYear(year: number, calendar: CalendarKind): boolean {
  switch (calendar) {
    case "julian":
      return year % 4 === 0;
    case "gregorian":
      return year % 100 === 0 ? year % 400 === 0 : year % 4 === 0;
  }
}

/**
 * Julian day of a civil date.
 *
 * January and February count as months 13 and 14 of the previous year. The
 * Gregorian correction is applied only when `date.calendar` is `"gregorian"`.
 * Total over all inputs: out-of-range days simply run on into the next month.
 */
export function julianDay(date: CivilDate): number {
  const month = monthOrdinal(date.month);
  const [y, m] = month <= 2 ? [date.year - 1, month + 12] : [date.year, month];

  const a = Math.floor(y / 100);
  const b = date.calendar === "gregorian" ? 2 - a + Math.floor(a / 4) : 0;

  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + date.decimalDay + b - 1524.5;
}

/**
 * Civil date for a Julian day.
 *
 * Days from {@link GREGORIAN_REFORM_JD} on come back in the Gregorian calendar,
 * earlier ones in the Julian calendar; `calendar` on the result says which.
 * Negative input is returned as an error value so batches can keep going.
 */
export function dateFromJulianDay(jd: number): Result<CivilDate, DateFromJulianDayError> {
  if (!Number.isFinite(jd)) {
    return err({
      kind: "non-finite-input",
      jd,
      message: `dateFromJulianDay() requires a finite Julian day (got ${jd})`,
    });
  }
  if (jd < 0) {
    return err({
      kind: "negative-input",
      jd,
      message: `dateFromJulianDay() requires a non-negative Julian day (got ${jd})`,
    });
  }

  const shifted = jd + 0.5;
  const z = Math.trunc(shifted);
  const f = shifted - z;

  let a = z;
  if (z >= GREGORIAN_REFORM_JD) {
    const alpha = Math.floor((z - 1867216.25) / 36524.25);
    a = z + 1 + alpha - Math.floor(alpha / 4);
  }

  const b = a + 1524;
  const c = Math.floor((b - 122.1) / 365.25);
  const d = Math.floor(365.25 * c);
  const e = Math.floor((b - d) / 30.6001);

  const day = b - d - Math.floor(30.6001 * e) + f;

  invariant(e >= 2 && e <= 15, `dateFromJulianDay(): month term out of range (e=${e}, jd=${jd})`);
  const month = e < 14 ? e - 1 : e - 13;
  invariant(month >= 1 && month <= 12, `dateFromJulianDay(): month out of range (${month}, jd=${jd})`);

  const year = month > 2 ? c - 4716 : c - 4715;

  return ok({
    year,
    month: monthFromOrdinal(month),
    decimalDay: day,
    calendar: z < GREGORIAN_REFORM_JD ? "julian" : "gregorian",
  });
}

/** Day of the week for a Julian day (Sunday = 0). */
export function weekdayOfJulianDay(jd: number): Weekday {
  const index = Math.floor(jd + 1.5) % 7;
  return weekdayFromIndex(index < 0 ? index + 7 : index);
}

/**
 * Day of the week of a civil date.
 *
 * The time of day is dropped and the date is reckoned in the Gregorian
 * calendar (0h UT), whatever `date.calendar` says.
 */
export function weekday(date: CivilDate): Weekday {
  return weekdayOfJulianDay(
    julianDay({
      year: date.year,
      month: date.month,
      decimalDay: Math.floor(date.decimalDay),
      calendar: "gregorian",
    }),
  );
}

/** Number of days in `year` under `calendar`. */
export function daysInYear(year: number, calendar: CalendarKind): number {
  return isLeapYear(year, calendar) ? 366 : 365;
}

/**
 * Year with decimals: `year + (daysBeforeMonth + decimalDay) / daysInYear`.
 *
 * For January this is `year + decimalDay / daysInYear`.
 */
export function decimalYear(date: CivilDate): number {
  const month = monthOrdinal(date.month);
  const leap = isLeapYear(date.year, date.calendar);

  let daysBeforeMonth = 0;
  for (let i = 0; i < month - 1; i++) {
    daysBeforeMonth += MONTH_LENGTHS[i] ?? 0;
    if (i === 1 && leap) daysBeforeMonth += 1;
  }

  return date.year + (daysBeforeMonth + date.decimalDay) / (leap ? 366 : 365);
}
