import type { EquatorialPoint, GeographicPoint, HorizontalCoordinates } from "@skyframe/coords";
import { horizontalFromEquatorial, hourAngleFromLongitude } from "@skyframe/coords";
import { refractionFromTrueAltitude, type AtmosphereOptions } from "@skyframe/corrections";
import {
  apparentSiderealTime,
  julianEphemerisDay,
  lowPrecisionNutation,
  meanObliquityLaskar,
  meanSiderealTime,
  trueObliquity,
  type ApparentSiderealTime,
  type MeanSiderealTime,
  type NutationProvider,
} from "@skyframe/time";

import { wrapSkyframeError } from "./errors.js";

export type SiderealTimeOptions = {
  /** Nutation source. Defaults to {@link lowPrecisionNutation}. */
  nutation?: NutationProvider;
  /**
   * ΔT in seconds, used to evaluate nutation and obliquity on the TT scale.
   * Defaults to 0.
   */
  deltaTSeconds?: number;
};

/**
 * Apparent sidereal time at Greenwich for a Julian day (UT), radians.
 *
 * Mean sidereal time plus `Δψ cos ε`, with ε the Laskar mean obliquity plus
 * nutation in obliquity.
 */
export function apparentSiderealTimeAt(jd: number, options: SiderealTimeOptions = {}): ApparentSiderealTime {
  const nutationAt = options.nutation ?? lowPrecisionNutation;
  try {
    const jde = julianEphemerisDay(jd, options.deltaTSeconds ?? 0);
    const nutation = nutationAt(jde);
    const epsilon = trueObliquity(meanObliquityLaskar(jde), nutation.nutationInObliquity);
    return apparentSiderealTime(meanSiderealTime(jd), nutation.nutationInLongitude, epsilon);
  } catch (error) {
    throw wrapSkyframeError("apparentSiderealTimeAt", error);
  }
}

export type HorizontalPositionRequest = SiderealTimeOptions & {
  /** Julian day (UT). */
  jd: number;
  /** Longitude positive west of Greenwich. */
  observer: GeographicPoint;
  target: EquatorialPoint;
  /** Which Greenwich sidereal time to use. Defaults to `"apparent"`. */
  sidereal?: "mean" | "apparent";
  /** When set, the altitude is raised by the refraction for this atmosphere. */
  refraction?: AtmosphereOptions;
};

/**
 * Local horizontal coordinates of a target for an observer at an instant.
 *
 * Sidereal time, then hour angle, then azimuth (westward from south) and
 * altitude.
 */
export function horizontalPositionAt(request: HorizontalPositionRequest): HorizontalCoordinates {
  try {
    const greenwich: MeanSiderealTime | ApparentSiderealTime =
      request.sidereal === "mean" ? meanSiderealTime(request.jd) : apparentSiderealTimeAt(request.jd, request);
    const hourAngle = hourAngleFromLongitude(greenwich, request.observer.longitude, request.target.rightAscension);
    const horizontal = horizontalFromEquatorial(hourAngle, request.target.declination, request.observer.latitude);

    if (request.refraction === undefined) {
      return horizontal;
    }
    return {
      azimuth: horizontal.azimuth,
      altitude: horizontal.altitude + refractionFromTrueAltitude(horizontal.altitude, request.refraction),
    };
  } catch (error) {
    throw wrapSkyframeError("horizontalPositionAt", error);
  }
}
