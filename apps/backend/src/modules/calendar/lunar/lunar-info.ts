import { TRADITIONAL_FESTIVALS } from "./lunar.constants";
import {
  LunarInfo,
  SolarDate,
  SolarDateDescription,
  SolarTermOptions,
} from "./lunar.types";
import { lunarDayName, lunarMonthName, yearStemBranch, zodiacAnimal } from "./naming";
import { getSolarTerm } from "./solar-terms";
import { solarToLunar } from "./solar-to-lunar";

export function lunarDateString(date: SolarDate): string {
  const lunar = solarToLunar(date);
  return lunarMonthName(lunar.month, lunar.isLeapMonth) + lunarDayName(lunar.day);
}

/** Festival of the day, never for a day inside a leap month. */
export function getTraditionalFestival(date: SolarDate): string | null {
  const lunar = solarToLunar(date);
  if (lunar.isLeapMonth) {
    return null;
  }
  return TRADITIONAL_FESTIVALS.get(`${lunar.month}-${lunar.day}`) ?? null;
}

export function getLunarInfo(
  date: SolarDate,
  options: SolarTermOptions = {}
): LunarInfo {
  return {
    lunarDate: lunarDateString(date),
    solarTerm: getSolarTerm(date, options),
    festival: getTraditionalFestival(date),
  };
}

/** Solar term, then festival, then the plain lunar date. */
export function pickDisplayText(info: LunarInfo): string {
  return info.solarTerm ?? info.festival ?? info.lunarDate;
}

export function fullLunarInfo(
  date: SolarDate,
  options: SolarTermOptions = {}
): string {
  return pickDisplayText(getLunarInfo(date, options));
}

export function describeSolarDate(
  date: SolarDate,
  options: SolarTermOptions = {}
): SolarDateDescription {
  const lunar = solarToLunar(date);
  const info = getLunarInfo(date, options);
  return {
    solar: { year: date.year, month: date.month, day: date.day },
    lunar,
    yearName: yearStemBranch(lunar.year),
    zodiac: zodiacAnimal(lunar.year),
    ...info,
    display: pickDisplayText(info),
  };
}
