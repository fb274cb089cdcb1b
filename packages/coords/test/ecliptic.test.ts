import { describe, expect, it } from "vitest";

import { degreesToRadians, normalizeToMinusPiPi } from "@skyframe/angles";
import {
  EclipticPoint,
  eclipticFromEquatorial,
  eclipticLatitudeFromEquatorial,
  eclipticLongitudeFromEquatorial,
  equatorialFromEcliptic,
} from "@skyframe/coords";

const OBLIQUITY = 0.4090928042223289;

describe("equatorial ↔ ecliptic", () => {
  it("keeps the equinox fixed", () => {
    const point = eclipticFromEquatorial(0, 0, OBLIQUITY);
    expect(point.longitude).toBe(0);
    expect(point.latitude).toBe(0);
  });

  it("maps the solstice colure onto ecliptic longitude 90°", () => {
    const point = eclipticFromEquatorial(Math.PI / 2, OBLIQUITY, OBLIQUITY);
    expect(point.longitude).toBeCloseTo(Math.PI / 2, 12);
    expect(point.latitude).toBeCloseTo(0, 12);
  });

  it("converts a star near Pollux and back", () => {
    const epsilon = 0.4090928040284034;
    const ecliptic = eclipticFromEquatorial(2.0303230532615175, 0.4891491701164619, epsilon);
    expect(ecliptic.longitude).toBeCloseTo(1.975985500867403, 9);
    expect(ecliptic.latitude).toBeCloseTo(0.11666077070744198, 9);

    const equatorial = equatorialFromEcliptic(1.975985500867403, 0.11666077070744198, epsilon);
    expect(equatorial.rightAscension).toBeCloseTo(2.0303230532615175, 9);
    expect(equatorial.declination).toBeCloseTo(0.4891491701164619, 9);
  });

  it("pairs the single-component functions", () => {
    const ra = 1.1;
    const dec = -0.3;
    const point = eclipticFromEquatorial(ra, dec, OBLIQUITY);
    expect(point).toBeInstanceOf(EclipticPoint);
    expect(point.longitude).toBe(eclipticLongitudeFromEquatorial(ra, dec, OBLIQUITY));
    expect(point.latitude).toBe(eclipticLatitudeFromEquatorial(ra, dec, OBLIQUITY));
  });

  it("round-trips a grid of directions within 1e-9", () => {
    let checked = 0;
    for (let ra = -170; ra <= 170; ra += 34) {
      for (const dec of [-80, -45, -10, 0, 20, 60, 85]) {
        const ecliptic = eclipticFromEquatorial(degreesToRadians(ra), degreesToRadians(dec), OBLIQUITY);
        const back = equatorialFromEcliptic(ecliptic.longitude, ecliptic.latitude, OBLIQUITY);

        expect(Math.abs(normalizeToMinusPiPi(back.rightAscension - degreesToRadians(ra)))).toBeLessThan(1e-9);
        expect(Math.abs(back.declination - degreesToRadians(dec))).toBeLessThan(1e-9);
        checked++;
      }
    }
    expect(checked).toBeGreaterThanOrEqual(20);
  });

  it("round-trips with an obliquity of zero as the identity", () => {
    const point = equatorialFromEcliptic(0.7, 0.2, 0);
    expect(point.rightAscension).toBeCloseTo(0.7, 15);
    expect(point.declination).toBeCloseTo(0.2, 15);
  });
});
