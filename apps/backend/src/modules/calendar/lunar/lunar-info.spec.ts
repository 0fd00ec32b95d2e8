import {
  describeSolarDate,
  fullLunarInfo,
  getLunarInfo,
  getTraditionalFestival,
  lunarDateString,
  pickDisplayText,
} from "./lunar-info";

const CST = { utcOffsetMinutes: 480 };

describe("lunar-info", () => {
  describe("lunarDateString", () => {
    it("joins the month and day names", () => {
      expect(lunarDateString({ year: 2024, month: 2, day: 10 })).toBe("正月初一");
      expect(lunarDateString({ year: 2025, month: 1, day: 28 })).toBe("腊月廿九");
      expect(lunarDateString({ year: 2024, month: 12, day: 21 })).toBe("冬月廿一");
    });

    it("marks leap months", () => {
      expect(lunarDateString({ year: 2023, month: 2, day: 21 })).toBe("闰二月初二");
    });
  });

  describe("getTraditionalFestival", () => {
    it("looks up the lunar month and day", () => {
      expect(getTraditionalFestival({ year: 2024, month: 2, day: 10 })).toBe("春节");
      expect(getTraditionalFestival({ year: 2024, month: 9, day: 17 })).toBe("中秋节");
      expect(getTraditionalFestival({ year: 2023, month: 3, day: 22 })).toBe("龙抬头");
    });

    it("treats both the 29th and 30th of the twelfth month as New Year's Eve", () => {
      expect(getTraditionalFestival({ year: 2025, month: 1, day: 28 })).toBe("除夕");
      expect(getTraditionalFestival({ year: 2024, month: 2, day: 9 })).toBe("除夕");
    });

    it("returns null on ordinary days", () => {
      expect(getTraditionalFestival({ year: 2024, month: 2, day: 11 })).toBeNull();
    });

    it("never reports a festival inside a leap month", () => {
      // leap 2-2, leap 7-7 and leap 7-15
      expect(getTraditionalFestival({ year: 2023, month: 2, day: 21 })).toBeNull();
      expect(getTraditionalFestival({ year: 2006, month: 7, day: 31 })).toBeNull();
      expect(getTraditionalFestival({ year: 2006, month: 8, day: 8 })).toBeNull();
    });
  });

  describe("fullLunarInfo", () => {
    it("prefers a festival over the plain date", () => {
      expect(fullLunarInfo({ year: 2024, month: 9, day: 17 }, CST)).toBe("中秋节");
    });

    it("prefers a solar term over a festival on the same day", () => {
      // lunar 5-5 (端午节) falls on 夏至 in 2023
      expect(fullLunarInfo({ year: 2023, month: 6, day: 22 }, CST)).toBe("夏至");
      expect(fullLunarInfo({ year: 2024, month: 12, day: 21 }, CST)).toBe("冬至");
    });

    it("falls back to the lunar date", () => {
      expect(fullLunarInfo({ year: 2024, month: 2, day: 11 }, CST)).toBe("正月初二");
      expect(fullLunarInfo({ year: 2006, month: 7, day: 31 }, CST)).toBe("闰七月初七");
    });

    it("still shows a solar term inside a leap month", () => {
      expect(fullLunarInfo({ year: 2006, month: 8, day: 8 }, CST)).toBe("立秋");
    });
  });

  it("builds the display aggregate", () => {
    expect(getLunarInfo({ year: 2023, month: 6, day: 22 }, CST)).toEqual({
      lunarDate: "五月初五",
      solarTerm: "夏至",
      festival: "端午节",
    });
  });

  it("picks display text by precedence", () => {
    expect(pickDisplayText({ lunarDate: "正月初一", solarTerm: null, festival: "春节" })).toBe("春节");
    expect(pickDisplayText({ lunarDate: "正月初二", solarTerm: null, festival: null })).toBe("正月初二");
  });

  describe("describeSolarDate", () => {
    it("names the lunar year, not the Gregorian one", () => {
      expect(describeSolarDate({ year: 2025, month: 1, day: 28 }, CST)).toEqual({
        solar: { year: 2025, month: 1, day: 28 },
        lunar: { year: 2024, month: 12, day: 29, isLeapMonth: false },
        yearName: "甲辰",
        zodiac: "龙",
        lunarDate: "腊月廿九",
        solarTerm: null,
        festival: "除夕",
        display: "除夕",
      });
    });

    it("describes New Year's Day", () => {
      const description = describeSolarDate({ year: 2024, month: 2, day: 10 }, CST);
      expect(description.lunar).toEqual({ year: 2024, month: 1, day: 1, isLeapMonth: false });
      expect(description.display).toBe("春节");
      expect(description.zodiac).toBe("龙");
    });
  });
});
