import { describe, expect, it } from "vitest";

import { MONTHS, isMonth, monthFromOrdinal, monthOrdinal, weekdayFromIndex } from "@skyframe/time";

describe("months", () => {
  it("maps names to ordinals and back", () => {
    expect(monthOrdinal("Jan")).toBe(1);
    expect(monthOrdinal("Dec")).toBe(12);
    for (const month of MONTHS) {
      expect(monthFromOrdinal(monthOrdinal(month))).toBe(month);
    }
  });

  it("rejects ordinals outside 1..12", () => {
    expect(() => monthFromOrdinal(0)).toThrow(RangeError);
    expect(() => monthFromOrdinal(13)).toThrow(RangeError);
    expect(() => monthFromOrdinal(2.5)).toThrow(/1\.\.12/);
  });

  it("guards unknown values", () => {
    expect(isMonth("Feb")).toBe(true);
    expect(isMonth("February")).toBe(false);
    expect(isMonth(2)).toBe(false);
  });
});

describe("weekdays", () => {
  it("counts from Sunday", () => {
    expect(weekdayFromIndex(0)).toBe("Sunday");
    expect(weekdayFromIndex(6)).toBe("Saturday");
    expect(() => weekdayFromIndex(7)).toThrow(RangeError);
  });
});
