import { SolarDate } from "./lunar.types";

export const FIRST_TABLE_YEAR = 1900;
export const LAST_TABLE_YEAR = 2100;

/** Lunar New Year's Day of 1900; day offsets are counted from here. */
export const LUNAR_EPOCH: Readonly<SolarDate> = Object.freeze({
  year: 1900,
  month: 1,
  day: 31,
});

// 1900-01-06T02:05:00Z, the instant the solar term offsets are measured from
export const SOLAR_TERM_EPOCH_MS = Date.UTC(1900, 0, 6, 2, 5);

// Mean tropical year in milliseconds
export const TROPICAL_YEAR_MS = 31556925974.7;

/** Minutes after SOLAR_TERM_EPOCH_MS (within a year) of each of the 24 terms. */
export const SOLAR_TERM_OFFSET_MINUTES: readonly number[] = Object.freeze([
  0, 21208, 42467, 63836, 85337, 107014, 128867, 150921, 173149, 195551,
  218072, 240693, 263343, 285989, 308563, 331033, 353350, 375494, 397447,
  419210, 440795, 462224, 483532, 504758,
]);

export const SOLAR_TERM_NAMES: readonly string[] = Object.freeze([
  "小寒", "大寒", "立春", "雨水", "惊蛰", "春分",
  "清明", "谷雨", "立夏", "小满", "芒种", "夏至",
  "小暑", "大暑", "立秋", "处暑", "白露", "秋分",
  "寒露", "霜降", "立冬", "小雪", "大雪", "冬至",
]);

export const HEAVENLY_STEMS: readonly string[] = Object.freeze([
  "甲", "乙", "丙", "丁", "戊", "己", "庚", "辛", "壬", "癸",
]);

export const EARTHLY_BRANCHES: readonly string[] = Object.freeze([
  "子", "丑", "寅", "卯", "辰", "巳", "午", "未", "申", "酉", "戌", "亥",
]);

export const ZODIAC_ANIMALS: readonly string[] = Object.freeze([
  "鼠", "牛", "虎", "兔", "龙", "蛇", "马", "羊", "猴", "鸡", "狗", "猪",
]);

export const LUNAR_MONTH_NAMES: readonly string[] = Object.freeze([
  "正", "二", "三", "四", "五", "六", "七", "八", "九", "十", "冬", "腊",
]);

export const LUNAR_DAY_NAMES: readonly string[] = Object.freeze([
  "初一", "初二", "初三", "初四", "初五", "初六", "初七", "初八", "初九", "初十",
  "十一", "十二", "十三", "十四", "十五", "十六", "十七", "十八", "十九", "二十",
  "廿一", "廿二", "廿三", "廿四", "廿五", "廿六", "廿七", "廿八", "廿九", "三十",
]);

export const LEAP_MONTH_PREFIX = "闰";

/**
 * Traditional festivals keyed by "month-day" of a regular (non-leap) lunar month.
 * New Year's Eve is listed under both 12-30 and 12-29 because the twelfth
 * month is sometimes short.
 */
export const TRADITIONAL_FESTIVALS: ReadonlyMap<string, string> = new Map([
  ["1-1", "春节"],
  ["1-15", "元宵节"],
  ["2-2", "龙抬头"],
  ["5-5", "端午节"],
  ["7-7", "七夕"],
  ["7-15", "中元节"],
  ["8-15", "中秋节"],
  ["9-9", "重阳节"],
  ["10-15", "下元节"],
  ["12-8", "腊八节"],
  ["12-23", "小年"],
  ["12-30", "除夕"],
  ["12-29", "除夕"],
]);
