import { describe, expect, it } from "vitest";

import { degreesToRadians, normalizeToMinusPiPi } from "@skyframe/angles";
import {
  declinationFromHorizontal,
  equatorialFromHorizontal,
  horizontalFromEquatorial,
  hourAngleFromLongitude,
  hourAngleFromSidereal,
} from "@skyframe/coords";

const H = degreesToRadians(30);
const DEC = degreesToRadians(10);
const LAT = degreesToRadians(40);

describe("horizontalFromEquatorial", () => {
  it("puts a meridian transit due south", () => {
    const lat = degreesToRadians(45);
    const horizontal = horizontalFromEquatorial(0, 0, lat);
    expect(horizontal.azimuth).toBe(0);
    expect(horizontal.altitude).toBeCloseTo(lat, 14);
  });

  it("measures azimuth westward from south", () => {
    const horizontal = horizontalFromEquatorial(H, DEC, LAT);
    expect(horizontal.azimuth).toBeCloseTo(0.8702678478959543, 12);
    expect(horizontal.altitude).toBeCloseTo(0.8709700583190851, 12);
  });
});

describe("equatorialFromHorizontal", () => {
  it("inverts horizontalFromEquatorial with the spherical formula", () => {
    for (let ha = -150; ha <= 150; ha += 50) {
      for (const dec of [-30, 0, 25, 60]) {
        const { azimuth, altitude } = horizontalFromEquatorial(degreesToRadians(ha), degreesToRadians(dec), LAT);
        const back = equatorialFromHorizontal(azimuth, altitude, LAT, { declinationFormula: "spherical" });

        expect(Math.abs(normalizeToMinusPiPi(back.hourAngle - degreesToRadians(ha)))).toBeLessThan(1e-9);
        expect(Math.abs(back.declination - degreesToRadians(dec))).toBeLessThan(1e-9);
      }
    }
  });

  it("keeps the legacy declination by default", () => {
    const { azimuth, altitude } = horizontalFromEquatorial(H, DEC, LAT);
    const back = equatorialFromHorizontal(azimuth, altitude, LAT);

    expect(back.hourAngle).toBeCloseTo(H, 12);
    expect(back.declination).toBeCloseTo(0.1742636654767287, 12);
    expect(back.declination).toBe(declinationFromHorizontal(azimuth, altitude, LAT, { declinationFormula: "legacy" }));
  });

  it("returns NaN when the legacy formula leaves the asin domain", () => {
    expect(declinationFromHorizontal(0, -Math.PI / 2, Math.PI / 4)).toBeNaN();
  });
});

describe("hour angle", () => {
  it("subtracts west longitude and right ascension from Greenwich sidereal time", () => {
    expect(hourAngleFromLongitude(3, 0.5, 1)).toBe(1.5);
    expect(hourAngleFromLongitude(4, 1.25, 0.5)).toBe(2.25);
  });

  it("subtracts right ascension from local sidereal time", () => {
    expect(hourAngleFromSidereal(3, 1)).toBe(2);
  });
});
