import {
  EARTHLY_BRANCHES,
  HEAVENLY_STEMS,
  LEAP_MONTH_PREFIX,
  LUNAR_DAY_NAMES,
  LUNAR_MONTH_NAMES,
  ZODIAC_ANIMALS,
} from "./lunar.constants";

// 4 CE was a 甲子 year
const CYCLE_ORIGIN_YEAR = 4;

function cycleIndex(year: number, length: number): number {
  const index = (year - CYCLE_ORIGIN_YEAR) % length;
  return index < 0 ? index + length : index;
}

/** Sexagenary name of a year, e.g. 2024 -> "甲辰". */
export function yearStemBranch(year: number): string {
  return (
    HEAVENLY_STEMS[cycleIndex(year, HEAVENLY_STEMS.length)] +
    EARTHLY_BRANCHES[cycleIndex(year, EARTHLY_BRANCHES.length)]
  );
}

export function zodiacAnimal(year: number): string {
  return ZODIAC_ANIMALS[cycleIndex(year, ZODIAC_ANIMALS.length)];
}

/** "正月", "闰二月"...; empty for a month outside 1-12. */
export function lunarMonthName(month: number, isLeapMonth = false): string {
  if (month < 1 || month > 12) return "";
  const name = `${LUNAR_MONTH_NAMES[month - 1]}月`;
  return isLeapMonth ? `${LEAP_MONTH_PREFIX}${name}` : name;
}

/** "初一" ... "三十"; empty for a day outside 1-30. */
export function lunarDayName(day: number): string {
  if (day < 1 || day > 30) return "";
  return LUNAR_DAY_NAMES[day - 1];
}
