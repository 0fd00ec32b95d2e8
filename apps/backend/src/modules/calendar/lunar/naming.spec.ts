import {
  lunarDayName,
  lunarMonthName,
  yearStemBranch,
  zodiacAnimal,
} from "./naming";

describe("naming", () => {
  it("names years in the sexagenary cycle", () => {
    expect(yearStemBranch(1900)).toBe("庚子");
    expect(yearStemBranch(1984)).toBe("甲子");
    expect(yearStemBranch(2023)).toBe("癸卯");
    expect(yearStemBranch(2024)).toBe("甲辰");
  });

  it("repeats stem-branch names every 60 years", () => {
    for (let year = 1900; year <= 2040; year++) {
      expect(yearStemBranch(year + 60)).toBe(yearStemBranch(year));
    }
  });

  it("repeats zodiac animals every 12 years", () => {
    expect(zodiacAnimal(2024)).toBe("龙");
    expect(zodiacAnimal(2025)).toBe("蛇");
    expect(zodiacAnimal(1900)).toBe("鼠");
    for (let year = 1900; year <= 2088; year++) {
      expect(zodiacAnimal(year + 12)).toBe(zodiacAnimal(year));
    }
  });

  it("keeps the cycle index non-negative before year 4", () => {
    expect(yearStemBranch(3)).toBe("癸亥");
    expect(zodiacAnimal(3)).toBe("猪");
  });

  it("formats month names", () => {
    expect(lunarMonthName(1)).toBe("正月");
    expect(lunarMonthName(11)).toBe("冬月");
    expect(lunarMonthName(12)).toBe("腊月");
    expect(lunarMonthName(2, true)).toBe("闰二月");
    expect(lunarMonthName(13)).toBe("");
  });

  it("formats day names", () => {
    expect(lunarDayName(1)).toBe("初一");
    expect(lunarDayName(10)).toBe("初十");
    expect(lunarDayName(21)).toBe("廿一");
    expect(lunarDayName(30)).toBe("三十");
    expect(lunarDayName(31)).toBe("");
  });
});
