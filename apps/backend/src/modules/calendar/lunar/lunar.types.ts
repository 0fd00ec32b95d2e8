/**
 * A Gregorian calendar day. Time of day never takes part in a conversion.
 */
export interface SolarDate {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
}

/**
 * A day of the Chinese lunisolar calendar.
 * `month` is always 1-12; a leap month is signalled by `isLeapMonth` only.
 */
export interface LunarDate {
  year: number;
  month: number;
  day: number;
  isLeapMonth: boolean;
}

export interface SolarTermOptions {
  /**
   * Minutes east of UTC of the civil zone the term instant is read in.
   * Leave undefined to use the host's local time zone.
   */
  utcOffsetMinutes?: number;
}

export interface SolarTermEntry {
  index: number;
  name: string;
  date: SolarDate;
}

/** Display aggregate handed to the presentation layer. */
export interface LunarInfo {
  lunarDate: string;
  solarTerm: string | null;
  festival: string | null;
}

export interface SolarDateDescription extends LunarInfo {
  solar: SolarDate;
  lunar: LunarDate;
  yearName: string;
  zodiac: string;
  display: string;
}
