export type {
  ApparentSiderealTime,
  CalendarKind,
  CivilDate,
  DateFromJulianDayError,
  DayOfMonth,
  MeanObliquity,
  MeanSiderealTime,
  Month,
  Nutation,
  NutationProvider,
  TrueObliquity,
  Weekday,
} from "./types.js";
export { CALENDAR_KINDS, MONTHS, WEEKDAYS } from "./types.js";

export { isMonth, monthFromOrdinal, monthOrdinal, weekdayFromIndex } from "./month.js";
export {
  GREGORIAN_REFORM_JD,
  dateFromJulianDay,
  daysInYear,
  decimalDay,
  decimalYear,
  isLeapYear,
  julianDay,
  weekday,
  weekdayOfJulianDay,
} from "./calendar.js";
export {
  DAYS_PER_JULIAN_CENTURY,
  DAYS_PER_JULIAN_MILLENNIUM,
  DELTA_T_ERA_BOUNDARIES,
  J2000,
  SECONDS_PER_DAY,
  deltaT,
  deltaTAtDecimalYear,
  deltaTDecimalYear,
  julianCentury,
  julianEphemerisDay,
  julianMillennium,
} from "./timeScale.js";
export { SIDEREAL_DEGREES_PER_DAY, apparentSiderealTime, meanSiderealTime } from "./sidereal.js";
export { meanObliquityIau, meanObliquityLaskar, trueObliquity } from "./obliquity.js";
export { lowPrecisionNutation } from "./nutation.js";
export { horner } from "./polynomial.js";
