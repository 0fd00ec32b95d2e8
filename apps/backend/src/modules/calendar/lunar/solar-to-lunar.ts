import {
  FIRST_TABLE_YEAR,
  LAST_TABLE_YEAR,
  LUNAR_EPOCH,
} from "./lunar.constants";
import { LunarDate, SolarDate } from "./lunar.types";
import {
  leapMonth,
  leapMonthDays,
  lunarMonthDays,
  lunarYearDays,
} from "./month-length";
import { addDays, daysBetween } from "./solar-date";

interface LunarMonthSpan {
  month: number;
  isLeapMonth: boolean;
  days: number;
}

/**
 * Months of a lunar year in walk order. The leap month is visited just
 * before the regular month that shares its number.
 */
export function lunarMonthSpans(year: number): LunarMonthSpan[] {
  const leap = leapMonth(year);
  const spans: LunarMonthSpan[] = [];
  for (let month = 1; month <= 12; month++) {
    if (leap === month) {
      spans.push({ month, isLeapMonth: true, days: leapMonthDays(year) });
    }
    spans.push({ month, isLeapMonth: false, days: lunarMonthDays(year, month) });
  }
  return spans;
}

function sentinel(year: number): LunarDate {
  return { year, month: 1, day: 1, isLeapMonth: false };
}

/** Days before 1900-01-31 have no lunar date in the table. */
export function isBeforeLunarEpoch(date: SolarDate): boolean {
  return daysBetween(LUNAR_EPOCH, date) < 0;
}

/**
 * Converts a Gregorian day to its lunisolar date.
 *
 * Days before 1900-01-31 map to 1900-01-01 (lunar). Days past the end of
 * lunar year 2100 map to the first day of 2101.
 */
export function solarToLunar(date: SolarDate): LunarDate {
  let offset = daysBetween(LUNAR_EPOCH, date);
  if (offset < 0) {
    return sentinel(FIRST_TABLE_YEAR);
  }

  let year = FIRST_TABLE_YEAR;
  while (year <= LAST_TABLE_YEAR) {
    const yearDays = lunarYearDays(year);
    if (offset < yearDays) {
      for (const span of lunarMonthSpans(year)) {
        if (offset < span.days) {
          return {
            year,
            month: span.month,
            day: offset + 1,
            isLeapMonth: span.isLeapMonth,
          };
        }
        offset -= span.days;
      }
    }
    offset -= yearDays;
    year++;
  }

  return sentinel(year);
}

/**
 * Inverse of {@link solarToLunar}, following the same month order.
 * Returns null when the lunar date does not exist in the table.
 */
export function lunarToSolar(date: LunarDate): SolarDate | null {
  const { year, month, day, isLeapMonth } = date;
  if (year < FIRST_TABLE_YEAR || year > LAST_TABLE_YEAR) return null;
  if (!Number.isInteger(day) || day < 1) return null;

  let offset = 0;
  for (let y = FIRST_TABLE_YEAR; y < year; y++) {
    offset += lunarYearDays(y);
  }

  for (const span of lunarMonthSpans(year)) {
    if (span.month === month && span.isLeapMonth === isLeapMonth) {
      if (day > span.days) return null;
      return addDays(LUNAR_EPOCH, offset + day - 1);
    }
    offset += span.days;
  }
  return null;
}
