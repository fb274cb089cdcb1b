export {
  EclipticPoint,
  EquatorialPoint,
  GeographicPoint,
  type GalacticCoordinates,
  type HorizontalCoordinates,
  type HourAngleDeclination,
} from "./points.js";

export {
  declinationFromEcliptic,
  eclipticFromEquatorial,
  eclipticLatitudeFromEquatorial,
  eclipticLongitudeFromEquatorial,
  equatorialFromEcliptic,
  rightAscensionFromEcliptic,
} from "./ecliptic.js";

export type { DeclinationFormula, EquatorialFromHorizontalOptions } from "./horizontal.js";
export {
  DECLINATION_FORMULAS,
  altitudeFromEquatorial,
  azimuthFromEquatorial,
  declinationFromHorizontal,
  equatorialFromHorizontal,
  horizontalFromEquatorial,
  hourAngleFromHorizontal,
} from "./horizontal.js";

export {
  declinationFromGalactic,
  equatorialFromGalactic,
  galacticFromEquatorial,
  galacticLatitudeFromEquatorial,
  galacticLongitudeFromEquatorial,
  rightAscensionFromGalactic,
} from "./galactic.js";

export { hourAngleFromLongitude, hourAngleFromSidereal } from "./hourAngle.js";
