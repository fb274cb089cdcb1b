import { describe, expect, it } from "vitest";

import {
  SIDEREAL_DEGREES_PER_DAY,
  apparentSiderealTime,
  lowPrecisionNutation,
  meanObliquityIau,
  meanObliquityLaskar,
  meanSiderealTime,
  trueObliquity,
} from "@skyframe/time";

const TWO_PI = 2 * Math.PI;
const ARCSEC = Math.PI / (180 * 3600);

describe("meanSiderealTime", () => {
  it("matches the polynomial at known instants", () => {
    expect(meanSiderealTime(2451545.0)).toBeCloseTo(4.894961212735792, 12);
    expect(meanSiderealTime(2451544.5)).toBeCloseTo(1.744767163243315, 9);
    expect(meanSiderealTime(2460384.75)).toBeCloseTo(4.596096771731286, 9);
  });

  it("stays in [0, 2π)", () => {
    for (let jd = 2451000.5; jd < 2452000; jd += 37.3) {
      const gmst = meanSiderealTime(jd);
      expect(gmst).toBeGreaterThanOrEqual(0);
      expect(gmst).toBeLessThan(TWO_PI);
    }
  });

  it("advances by the sidereal rate", () => {
    const step = 0.25;
    const a = meanSiderealTime(2451545.0);
    const b = meanSiderealTime(2451545.0 + step);
    const advance = (((b - a) % TWO_PI) + TWO_PI) % TWO_PI;
    const expected = ((SIDEREAL_DEGREES_PER_DAY * step) % 360) * (Math.PI / 180);

    expect(advance).toBeCloseTo(expected, 9);
  });

  it("keeps the sidereal rate at every quarter day across several days", () => {
    const step = 0.25;
    const start = 2460380.5;
    let previous = meanSiderealTime(start);

    for (let i = 1; i <= 24; i++) {
      const current = meanSiderealTime(start + i * step);
      const advance = (((current - previous) % TWO_PI) + TWO_PI) % TWO_PI;
      const degreesPerDay = (advance * (180 / Math.PI)) / step;

      expect(degreesPerDay).toBeCloseTo(SIDEREAL_DEGREES_PER_DAY, 6);
      previous = current;
    }
  });
});

describe("apparentSiderealTime", () => {
  it("adds the equation of the equinoxes", () => {
    const eps = 0.4;
    expect(apparentSiderealTime(1, 0.001, eps)).toBeCloseTo(1 + 0.001 * Math.cos(eps), 15);
  });

  it("does not re-normalize", () => {
    expect(apparentSiderealTime(TWO_PI - 1e-6, 1e-4, 0)).toBeGreaterThan(TWO_PI);
  });
});

describe("obliquity", () => {
  it("agrees at J2000.0", () => {
    expect(meanObliquityLaskar(2451545.0)).toBeCloseTo(0.4090928042223289, 15);
    expect(meanObliquityIau(2451545.0)).toBeCloseTo(0.4090928042223289, 15);
  });

  it("stays within an arcsecond of the IAU polynomial over a millennium", () => {
    const jd = 2451545.0 + 36525 * 10;
    expect(meanObliquityLaskar(jd)).toBeCloseTo(0.40683300561085434, 12);
    expect(meanObliquityIau(jd)).toBeCloseTo(0.4068316526061813, 12);
    expect(Math.abs(meanObliquityLaskar(jd) - meanObliquityIau(jd))).toBeLessThan(ARCSEC);
  });

  it("adds nutation in obliquity", () => {
    expect(trueObliquity(0.409, 2e-5)).toBeCloseTo(0.40902, 15);
  });
});

describe("lowPrecisionNutation", () => {
  it("evaluates the four-term series", () => {
    const at2000 = lowPrecisionNutation(2451545.0);
    expect(at2000.nutationInLongitude).toBeCloseTo(-14.031356821395894 * ARCSEC, 12);
    expect(at2000.nutationInObliquity).toBeCloseTo(-5.761367643140871 * ARCSEC, 12);

    const at2024 = lowPrecisionNutation(2460384.75);
    expect(at2024.nutationInLongitude).toBeCloseTo(-4.810143736633247 * ARCSEC, 12);
    expect(at2024.nutationInObliquity).toBeCloseTo(9.248365725658033 * ARCSEC, 12);
  });

  it("stays within twenty arcseconds", () => {
    for (let jd = 2440000.5; jd < 2470000; jd += 997) {
      const { nutationInLongitude, nutationInObliquity } = lowPrecisionNutation(jd);
      expect(Math.abs(nutationInLongitude)).toBeLessThan(20 * ARCSEC);
      expect(Math.abs(nutationInObliquity)).toBeLessThan(11 * ARCSEC);
    }
  });
});
