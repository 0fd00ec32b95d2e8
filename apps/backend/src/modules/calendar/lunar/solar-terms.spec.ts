import { SOLAR_TERM_NAMES } from "./lunar.constants";
import {
  getSolarTerm,
  getSolarTerms,
  solarTermDate,
  solarTermInstant,
} from "./solar-terms";

const CST = { utcOffsetMinutes: 480 };
const UTC = { utcOffsetMinutes: 0 };

describe("solar terms", () => {
  it("anchors index 0 of 1900 at the epoch instant", () => {
    expect(new Date(solarTermInstant(1900, 0)).toISOString()).toBe(
      "1900-01-06T02:05:00.000Z"
    );
  });

  it("adds whole tropical years and the per-term minute offset", () => {
    // 2024-12-21 15:30:00.863 UTC
    expect(new Date(solarTermInstant(2024, 23)).toISOString()).toBe(
      "2024-12-21T15:30:00.863Z"
    );
  });

  it("computes the civil date in the requested zone", () => {
    expect(solarTermDate(2024, 23, CST)).toEqual({ year: 2024, month: 12, day: 21 });
    expect(solarTermDate(2024, 2, CST)).toEqual({ year: 2024, month: 2, day: 4 });
  });

  it("moves a term across midnight when the zone changes", () => {
    // 2025-12-21 21:18 UTC is already the 22nd in China
    expect(solarTermDate(2025, 23, CST)).toEqual({ year: 2025, month: 12, day: 22 });
    expect(solarTermDate(2025, 23, UTC)).toEqual({ year: 2025, month: 12, day: 21 });
    expect(solarTermDate(2025, 5, CST)).toEqual({ year: 2025, month: 3, day: 21 });
    expect(solarTermDate(2025, 5, UTC)).toEqual({ year: 2025, month: 3, day: 20 });
  });

  it("uses the host zone when no offset is given", () => {
    const instant = new Date(solarTermInstant(2024, 11));
    expect(solarTermDate(2024, 11)).toEqual({
      year: instant.getFullYear(),
      month: instant.getMonth() + 1,
      day: instant.getDate(),
    });
  });

  describe("getSolarTerm", () => {
    it("names the term falling on the day", () => {
      expect(getSolarTerm({ year: 2024, month: 2, day: 4 }, CST)).toBe("立春");
      expect(getSolarTerm({ year: 2024, month: 12, day: 21 }, CST)).toBe("冬至");
      expect(getSolarTerm({ year: 2023, month: 6, day: 22 }, CST)).toBe("夏至");
    });

    it("returns null between terms", () => {
      expect(getSolarTerm({ year: 2024, month: 2, day: 5 }, CST)).toBeNull();
      expect(getSolarTerm({ year: 2024, month: 9, day: 17 }, CST)).toBeNull();
    });

    it("follows the zone at the day boundary", () => {
      expect(getSolarTerm({ year: 2025, month: 12, day: 22 }, CST)).toBe("冬至");
      expect(getSolarTerm({ year: 2025, month: 12, day: 22 }, UTC)).toBeNull();
    });
  });

  describe("getSolarTerms", () => {
    it("returns the 24 terms of a year in order", () => {
      const terms = getSolarTerms(2024, CST);
      expect(terms).toHaveLength(24);
      expect(terms.map((t) => t.name)).toEqual(SOLAR_TERM_NAMES);
      expect(terms[0]).toEqual({
        index: 0,
        name: "小寒",
        date: { year: 2024, month: 1, day: 6 },
      });
      expect(terms[11].date).toEqual({ year: 2024, month: 6, day: 21 });
    });

    it("places every term on a distinct day", () => {
      for (const year of [1900, 1950, 2000, 2024, 2100]) {
        const days = getSolarTerms(year, CST).map(
          (t) => `${t.date.year}-${t.date.month}-${t.date.day}`
        );
        expect(new Set(days).size).toBe(24);
      }
    });
  });
});
