import { degreesMinutesArcsecondsToDecimalDegrees, degreesToRadians, radiansToDegrees } from "@skyframe/angles";

export type AtmosphereOptions = {
  /** Surface pressure in millibars. Defaults to 1010. */
  pressureMillibars?: number;
  /** Surface temperature in °C. Defaults to 10. */
  temperatureCelsius?: number;
};

const STANDARD_PRESSURE_MB = 1010;
const STANDARD_TEMPERATURE_C = 10;

const TAN_COEFFICIENT = degreesToRadians(degreesMinutesArcsecondsToDecimalDegrees(0, 0, 58.294));
const TAN_CUBED_COEFFICIENT = degreesToRadians(degreesMinutesArcsecondsToDecimalDegrees(0, 0, 0.0668));

function atmosphereFactor(options: AtmosphereOptions): number {
  const pressure = options.pressureMillibars ?? STANDARD_PRESSURE_MB;
  const temperature = options.temperatureCelsius ?? STANDARD_TEMPERATURE_C;
  return (pressure / STANDARD_PRESSURE_MB) * (283 / (273 + temperature));
}

function arcminutesToRadians(arcminutes: number): number {
  return degreesToRadians(arcminutes / 60);
}

/**
 * Refraction to subtract from an apparent altitude above 15°, radians.
 *
 * `58.294" tan z − 0.0668" tan³ z` with zenith distance `z = π/2 − h`.
 */
export function refractionFromApparentAltitude15(apparentAltitude: number): number {
  const tanZ = Math.tan(Math.PI / 2 - apparentAltitude);
  return TAN_COEFFICIENT * tanZ - TAN_CUBED_COEFFICIENT * tanZ * tanZ * tanZ;
}

/**
 * Refraction to subtract from an apparent altitude, radians (Bennett).
 *
 * Valid down to the horizon; about 0.07' accurate.
 */
export function refractionFromApparentAltitude(apparentAltitude: number, options: AtmosphereOptions = {}): number {
  const h = radiansToDegrees(apparentAltitude);
  const arcminutes = 1 / Math.tan(degreesToRadians(h + 7.31 / (h + 4.4)));
  return arcminutesToRadians(arcminutes) * atmosphereFactor(options);
}

/** Refraction to add to a true (airless) altitude, radians (Saemundsson). */
export function refractionFromTrueAltitude(trueAltitude: number, options: AtmosphereOptions = {}): number {
  const h = radiansToDegrees(trueAltitude);
  const arcminutes = 1.02 / Math.tan(degreesToRadians(h + 10.3 / (h + 5.11)));
  return arcminutesToRadians(arcminutes) * atmosphereFactor(options);
}
