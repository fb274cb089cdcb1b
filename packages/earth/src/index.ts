export {
  EQUATORIAL_RADIUS_KM,
  FLATTENING,
  POLAR_RADIUS_KM,
  ROTATIONAL_ANGULAR_VELOCITY,
  distanceFromCenter,
  eccentricityOfMeridian,
  geographicGeocentricLatitudeDifference,
  linearVelocityAtLatitude,
  radiusOfCurvature,
  radiusOfParallel,
  rhoSinCosPhi,
  type RhoSinCosPhi,
} from "./ellipsoid.js";
export { MEAN_RADIUS_KM, approximateGeodesicDistance, geodesicDistance } from "./distance.js";
export { angleBetweenDiurnalPathAndHorizon, equationOfTime } from "./solar.js";
