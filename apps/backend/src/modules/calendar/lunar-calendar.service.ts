import { BadRequestException, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  invalidCalendarInputTotal,
  lunarConversionsTotal,
} from "../../common/metrics/calendar-metrics";
import {
  FIRST_TABLE_YEAR,
  LAST_TABLE_YEAR,
  LUNAR_EPOCH,
  LunarDate,
  SolarDate,
  SolarDateDescription,
  SolarTermOptions,
  describeSolarDate,
  formatSolarDate,
  getSolarTerms,
  isBeforeLunarEpoch,
  isValidSolarDate,
  lunarToSolar,
  solarToLunar,
  yearStemBranch,
  zodiacAnimal,
} from "./lunar";

export interface SolarTermView {
  index: number;
  name: string;
  date: string;
}

/**
 * Nest-facing wrapper around the lunar engine.
 * Rejects input the engine would silently clamp, and applies the configured
 * civil time zone to every solar term lookup.
 */
@Injectable()
export class LunarCalendarService {
  private readonly logger = new Logger(LunarCalendarService.name);
  private readonly termOptions: SolarTermOptions;

  constructor(private readonly configService: ConfigService) {
    this.termOptions = {
      utcOffsetMinutes: this.readUtcOffset(),
    };
  }

  get solarTermOptions(): SolarTermOptions {
    return this.termOptions;
  }

  solarToLunar(year: number, month: number, day: number) {
    const solar = this.requireSolarDate({ year, month, day }, "solar-to-lunar");
    const lunar = solarToLunar(solar);
    lunarConversionsTotal.inc({ operation: "solar-to-lunar" });
    return {
      solar,
      lunar,
      yearName: yearStemBranch(lunar.year),
      zodiac: zodiacAnimal(lunar.year),
    };
  }

  lunarToSolar(year: number, month: number, day: number, isLeapMonth = false) {
    const lunar: LunarDate = { year, month, day, isLeapMonth };
    const solar = lunarToSolar(lunar);
    if (!solar) {
      invalidCalendarInputTotal.inc({ operation: "lunar-to-solar" });
      throw new BadRequestException(
        `Lunar date ${year}-${month}-${day}${isLeapMonth ? " (leap)" : ""} does not exist`
      );
    }
    lunarConversionsTotal.inc({ operation: "lunar-to-solar" });
    return { lunar, solar };
  }

  describe(date: SolarDate): SolarDateDescription {
    const solar = this.requireSolarDate(date, "describe");
    lunarConversionsTotal.inc({ operation: "describe" });
    return describeSolarDate(solar, this.termOptions);
  }

  get24SolarTerms(year: number): { year: number; solarTerms: SolarTermView[] } {
    this.requireTableYear(year);
    this.logger.debug(`Computing solar terms for ${year}`);
    const solarTerms = getSolarTerms(year, this.termOptions).map((term) => ({
      index: term.index,
      name: term.name,
      date: formatSolarDate(term.date),
    }));
    return { year, solarTerms };
  }

  getYearName(year: number) {
    this.requireTableYear(year);
    return {
      year,
      stemBranch: yearStemBranch(year),
      zodiac: zodiacAnimal(year),
    };
  }

  requireTableYear(year: number): void {
    if (!Number.isInteger(year) || year < FIRST_TABLE_YEAR || year > LAST_TABLE_YEAR) {
      throw new BadRequestException(
        `Year must be between ${FIRST_TABLE_YEAR} and ${LAST_TABLE_YEAR}`
      );
    }
  }

  private requireSolarDate(date: SolarDate, operation: string): SolarDate {
    this.requireTableYear(date.year);
    if (!isValidSolarDate(date)) {
      invalidCalendarInputTotal.inc({ operation });
      throw new BadRequestException(
        `Invalid date: ${date.year}-${date.month}-${date.day}`
      );
    }
    if (isBeforeLunarEpoch(date)) {
      invalidCalendarInputTotal.inc({ operation });
      throw new BadRequestException(
        `Date must be on or after ${formatSolarDate(LUNAR_EPOCH)}`
      );
    }
    return date;
  }

  private readUtcOffset(): number | undefined {
    const raw = this.configService.get<string>("CALENDAR_UTC_OFFSET_MINUTES");
    if (raw === undefined || raw.trim() === "") {
      return undefined;
    }
    const offset = Number(raw);
    if (!Number.isInteger(offset) || Math.abs(offset) > 14 * 60) {
      this.logger.warn(
        `Ignoring CALENDAR_UTC_OFFSET_MINUTES=${raw}; using the host time zone`
      );
      return undefined;
    }
    return offset;
  }
}
