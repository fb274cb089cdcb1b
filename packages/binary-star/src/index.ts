export {
  apparentPositionAngle,
  apparentSeparation,
  eccentricityOfApparentOrbit,
  meanAnnualMotion,
  meanAnomaly,
  radiusVector,
  trueAnomaly,
} from "./orbit.js";
export type { EccentricAnomalyOptions } from "./kepler.js";
export { eccentricAnomaly } from "./kepler.js";
