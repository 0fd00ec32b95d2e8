import lunarYearInfo from "./lunar-year-info.json";
import { FIRST_TABLE_YEAR, LAST_TABLE_YEAR } from "./lunar.constants";

/**
 * Packed month data per lunar year, 1900-2100.
 *
 * - bits 0-3: leap month (1-12), 0 when the year has none
 * - bits 4-15: one flag per regular month, month m at bit (16 - m); 1 = 30 days, 0 = 29
 * - bit 16: length flag of the leap month
 */
const YEAR_INFO: readonly number[] = Object.freeze(
  lunarYearInfo.map((hex) => parseInt(hex, 16))
);

const LEAP_MONTH_MASK = 0xf;
const LEAP_MONTH_SIZE_BIT = 0x10000;

/** The month index meaning "this year's leap month". */
export const LEAP_MONTH_INDEX = 13;

export const BIG_MONTH_DAYS = 30;
export const SMALL_MONTH_DAYS = 29;

/** Years outside the table fall back to the 1900 entry. */
export function getLunarYearInfo(year: number): number {
  if (year < FIRST_TABLE_YEAR || year > LAST_TABLE_YEAR) {
    return YEAR_INFO[0];
  }
  return YEAR_INFO[year - FIRST_TABLE_YEAR];
}

export function leapMonth(year: number): number {
  return getLunarYearInfo(year) & LEAP_MONTH_MASK;
}

/**
 * Whether a month has 30 days.
 * @param month 1-12 for a regular month, 13 for the year's leap month
 */
export function isBigMonth(year: number, month: number): boolean {
  const info = getLunarYearInfo(year);
  if (!Number.isInteger(month)) return false;
  if (month >= 1 && month <= 12) {
    return ((info >> (16 - month)) & 0x1) === 1;
  }
  if (month === LEAP_MONTH_INDEX && leapMonth(year) > 0) {
    return (info & LEAP_MONTH_SIZE_BIT) !== 0;
  }
  return false;
}

export function lunarMonthDays(year: number, month: number): number {
  return isBigMonth(year, month) ? BIG_MONTH_DAYS : SMALL_MONTH_DAYS;
}

/** 0 when the year has no leap month. */
export function leapMonthDays(year: number): number {
  if (leapMonth(year) === 0) return 0;
  return lunarMonthDays(year, LEAP_MONTH_INDEX);
}

export function lunarMonthCount(year: number): number {
  return leapMonth(year) > 0 ? 13 : 12;
}

export function lunarYearDays(year: number): number {
  let total = leapMonthDays(year);
  for (let month = 1; month <= 12; month++) {
    total += lunarMonthDays(year, month);
  }
  return total;
}
