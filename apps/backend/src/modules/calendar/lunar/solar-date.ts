import { SolarDate } from "./lunar.types";

const MS_PER_DAY = 86_400_000;

/**
 * Calendar date of a JS Date in the host's local zone; the time of day is dropped.
 */
export function toSolarDate(date: Date): SolarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

/**
 * Whole days between 1970-01-01 and the given date.
 * Counted on the UTC axis so daylight-saving shifts never eat a day.
 */
export function toDayNumber(date: SolarDate): number {
  const utc = new Date(0);
  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  return Math.floor(utc.getTime() / MS_PER_DAY);
}

export function fromDayNumber(dayNumber: number): SolarDate {
  const utc = new Date(dayNumber * MS_PER_DAY);
  return {
    year: utc.getUTCFullYear(),
    month: utc.getUTCMonth() + 1,
    day: utc.getUTCDate(),
  };
}

export function daysBetween(start: SolarDate, end: SolarDate): number {
  return toDayNumber(end) - toDayNumber(start);
}

export function addDays(date: SolarDate, days: number): SolarDate {
  return fromDayNumber(toDayNumber(date) + days);
}

export function daysInSolarMonth(year: number, month: number): number {
  const utc = new Date(0);
  utc.setUTCFullYear(year, month, 0);
  return utc.getUTCDate();
}

/** False for impossible days such as 2023-02-29 or month 13. */
export function isValidSolarDate(date: SolarDate): boolean {
  const { year, month, day } = date;
  if (![year, month, day].every(Number.isInteger)) return false;
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInSolarMonth(year, month);
}

export function isSameSolarDate(a: SolarDate, b: SolarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

/** YYYY-MM-DD */
export function formatSolarDate(date: SolarDate): string {
  const year = String(date.year).padStart(4, "0");
  const month = String(date.month).padStart(2, "0");
  const day = String(date.day).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
