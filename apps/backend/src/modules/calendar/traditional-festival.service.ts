import { Injectable } from "@nestjs/common";
import {
  LUNAR_EPOCH,
  LunarDate,
  SolarTermOptions,
  addDays,
  formatSolarDate,
  getLunarInfo,
  isBeforeLunarEpoch,
  solarToLunar,
} from "./lunar";

export interface CalendarMarker {
  name: string;
  date: string; // YYYY-MM-DD
  type: "festival" | "solarTerm";
  lunar: LunarDate;
}

@Injectable()
export class TraditionalFestivalService {
  /**
   * Every festival and solar term day of a Gregorian year, in date order.
   * A day that is both yields two markers, solar term first. The scan
   * starts no earlier than 1900-01-31.
   */
  getMarkers(year: number, options: SolarTermOptions = {}): CalendarMarker[] {
    const markers: CalendarMarker[] = [];

    const newYearsDay = { year, month: 1, day: 1 };
    for (
      let date = isBeforeLunarEpoch(newYearsDay) ? { ...LUNAR_EPOCH } : newYearsDay;
      date.year === year;
      date = addDays(date, 1)
    ) {
      const info = getLunarInfo(date, options);
      if (!info.solarTerm && !info.festival) continue;

      const lunar = solarToLunar(date);
      const isoDate = formatSolarDate(date);
      if (info.solarTerm) {
        markers.push({ name: info.solarTerm, date: isoDate, type: "solarTerm", lunar });
      }
      if (info.festival) {
        markers.push({ name: info.festival, date: isoDate, type: "festival", lunar });
      }
    }

    return markers;
  }
}
