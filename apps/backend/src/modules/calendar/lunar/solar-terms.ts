import {
  SOLAR_TERM_EPOCH_MS,
  SOLAR_TERM_NAMES,
  SOLAR_TERM_OFFSET_MINUTES,
  TROPICAL_YEAR_MS,
} from "./lunar.constants";
import {
  SolarDate,
  SolarTermEntry,
  SolarTermOptions,
} from "./lunar.types";
import { isSameSolarDate, toSolarDate } from "./solar-date";

export const SOLAR_TERM_COUNT = 24;

/** UTC instant (epoch ms) of a term; index 0 is 小寒, 23 is 冬至. */
export function solarTermInstant(year: number, index: number): number {
  return (
    SOLAR_TERM_EPOCH_MS +
    Math.round((year - 1900) * TROPICAL_YEAR_MS) +
    SOLAR_TERM_OFFSET_MINUTES[index] * 60_000
  );
}

/**
 * Civil date on which a term falls. The instant is read in the zone given by
 * `utcOffsetMinutes`, or in the host's local zone when that is omitted.
 */
export function solarTermDate(
  year: number,
  index: number,
  options: SolarTermOptions = {}
): SolarDate {
  const instant = solarTermInstant(year, index);
  const { utcOffsetMinutes } = options;
  if (utcOffsetMinutes === undefined) {
    return toSolarDate(new Date(instant));
  }
  const shifted = new Date(instant + utcOffsetMinutes * 60_000);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

export function getSolarTerms(
  year: number,
  options: SolarTermOptions = {}
): SolarTermEntry[] {
  return SOLAR_TERM_NAMES.map((name, index) => ({
    index,
    name,
    date: solarTermDate(year, index, options),
  }));
}

/** Name of the term falling on this exact day, or null. */
export function getSolarTerm(
  date: SolarDate,
  options: SolarTermOptions = {}
): string | null {
  for (let index = 0; index < SOLAR_TERM_COUNT; index++) {
    if (isSameSolarDate(solarTermDate(date.year, index, options), date)) {
      return SOLAR_TERM_NAMES[index];
    }
  }
  return null;
}
