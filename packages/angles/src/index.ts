export {
  TWO_PI,
  degreesToRadians,
  radiansToDegrees,
  normalizeTo360Degrees,
  normalizeToTwoPi,
  normalizeToMinusPiPi,
  degreesMinutesArcsecondsToDecimalDegrees,
  hoursMinutesSecondsToDecimalHours,
  hoursToRadians,
} from "./angle.js";
export { angularSeparation } from "./separation.js";
