import { BadRequestException, Injectable, Logger } from "@nestjs/common";
import { parseSolarDate } from "../../common/utils/date-normalizer.util";
import {
  SolarDate,
  SolarDateDescription,
  daysInSolarMonth,
  formatSolarDate,
  isBeforeLunarEpoch,
} from "./lunar";
import { LunarCalendarService } from "./lunar-calendar.service";
import {
  CalendarMarker,
  TraditionalFestivalService,
} from "./traditional-festival.service";

export interface MonthCell extends SolarDateDescription {
  date: string;
}

@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);

  constructor(
    private readonly festivalService: TraditionalFestivalService,
    private readonly lunarService: LunarCalendarService
  ) {}

  getYearlyFestivals(year: number): { year: number; festivals: CalendarMarker[] } {
    this.lunarService.requireTableYear(year);
    return {
      year,
      festivals: this.festivalService.getMarkers(
        year,
        this.lunarService.solarTermOptions
      ),
    };
  }

  getMonthlyFestivals(
    year: number,
    month: number
  ): { year: number; month: number; festivals: CalendarMarker[] } {
    this.requireMonth(month);
    const prefix = `${formatSolarDate({ year, month, day: 1 }).substring(0, 7)}-`;
    const monthFestivals = this.getYearlyFestivals(year).festivals.filter((m) =>
      m.date.startsWith(prefix)
    );
    return {
      year,
      month,
      festivals: monthFestivals,
    };
  }

  /**
   * One cell per Gregorian day of the month, as a calendar grid shows it.
   * January 1900 starts at the 31st, the first day with a lunar date.
   */
  getMonthView(year: number, month: number): { year: number; month: number; days: MonthCell[] } {
    this.lunarService.requireTableYear(year);
    this.requireMonth(month);
    this.logger.debug(`Building month view for ${year}-${month}`);

    const days: MonthCell[] = [];
    for (let day = 1; day <= daysInSolarMonth(year, month); day++) {
      const solar: SolarDate = { year, month, day };
      if (isBeforeLunarEpoch(solar)) continue;
      days.push({
        date: formatSolarDate(solar),
        ...this.lunarService.describe(solar),
      });
    }
    return { year, month, days };
  }

  convertLunarToSolar(
    year: number,
    month: number,
    day: number,
    isLeapMonth = false
  ) {
    return this.lunarService.lunarToSolar(year, month, day, isLeapMonth);
  }

  convertSolarToLunar(year: number, month: number, day: number) {
    return this.lunarService.solarToLunar(year, month, day);
  }

  describeDate(date: string): SolarDateDescription {
    return this.lunarService.describe(this.parseDate(date));
  }

  isFestival(date: string) {
    const solar = this.parseDate(date);
    const { festival, solarTerm } = this.lunarService.describe(solar);
    return {
      date: formatSolarDate(solar),
      festival,
      solarTerm,
      isFestival: festival !== null,
    };
  }

  get24SolarTerms(year: number) {
    return this.lunarService.get24SolarTerms(year);
  }

  getYearName(year: number) {
    return this.lunarService.getYearName(year);
  }

  private parseDate(date: string): SolarDate {
    const solar = parseSolarDate(date);
    if (!solar) {
      throw new BadRequestException(`Invalid date: ${date}`);
    }
    return solar;
  }

  private requireMonth(month: number): void {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new BadRequestException("Month must be between 1 and 12");
    }
  }
}
