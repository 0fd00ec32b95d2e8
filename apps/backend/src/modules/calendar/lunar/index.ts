export * from "./lunar.types";
export {
  FIRST_TABLE_YEAR,
  LAST_TABLE_YEAR,
  LUNAR_EPOCH,
  SOLAR_TERM_NAMES,
  TRADITIONAL_FESTIVALS,
} from "./lunar.constants";
export {
  LEAP_MONTH_INDEX,
  isBigMonth,
  leapMonth,
  leapMonthDays,
  lunarMonthCount,
  lunarMonthDays,
  lunarYearDays,
} from "./month-length";
export { isBeforeLunarEpoch, lunarToSolar, solarToLunar } from "./solar-to-lunar";
export { getSolarTerm, getSolarTerms, solarTermDate } from "./solar-terms";
export { lunarDayName, lunarMonthName, yearStemBranch, zodiacAnimal } from "./naming";
export {
  describeSolarDate,
  fullLunarInfo,
  getLunarInfo,
  getTraditionalFestival,
  lunarDateString,
} from "./lunar-info";
export {
  addDays,
  daysInSolarMonth,
  formatSolarDate,
  isValidSolarDate,
  toSolarDate,
} from "./solar-date";
