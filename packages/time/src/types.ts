export const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

/** Calendar month. Use {@link monthOrdinal} / {@link monthFromOrdinal} to cross to 1..12. */
export type Month = (typeof MONTHS)[number];

export const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export const CALENDAR_KINDS = ["julian", "gregorian"] as const;

/** Which calendar a {@link CivilDate} is expressed in. Never inferred from the date itself. */
export type CalendarKind = (typeof CALENDAR_KINDS)[number];

/**
 * A civil date with the time of day folded into `decimalDay`.
 *
 * `decimalDay` is the day of the month plus the fraction of the day elapsed
 * (see {@link DayOfMonth} and `decimalDay()`), e.g. `4.81` for the 4th at 19:26:24.
 */
export type CivilDate = {
  readonly year: number;
  readonly month: Month;
  readonly decimalDay: number;
  readonly calendar: CalendarKind;
};

/** Day of month plus wall-clock time, used to build `CivilDate.decimalDay`. */
export type DayOfMonth = {
  /** 1..31 */
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Time zone offset in decimal hours (Pacific Standard Time is `-8`). */
  readonly timeZone: number;
};

/** Failure returned (not thrown) by `dateFromJulianDay()`. */
export type DateFromJulianDayError = {
  readonly kind: "negative-input" | "non-finite-input";
  readonly jd: number;
  readonly message: string;
};

// Radian-valued angles that differ only by the formula that produced them.
// The brands let callers keep mean/true and mean/apparent apart; all of them
// are still plain numbers at runtime and assignable to `number`.

export type MeanObliquity = number & { readonly __skyframeBrand: "MeanObliquity" };
export type TrueObliquity = number & { readonly __skyframeBrand: "TrueObliquity" };
export type MeanSiderealTime = number & { readonly __skyframeBrand: "MeanSiderealTime" };
export type ApparentSiderealTime = number & { readonly __skyframeBrand: "ApparentSiderealTime" };

/** Nutation in longitude (Δψ) and in obliquity (Δε), radians. */
export type Nutation = {
  readonly nutationInLongitude: number;
  readonly nutationInObliquity: number;
};

/** Source of nutation values for a Julian (ephemeris) day. */
export type NutationProvider = (jd: number) => Nutation;
