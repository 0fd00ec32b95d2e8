import { Controller, Get, Query, Param, ParseIntPipe } from "@nestjs/common";
import { ApiOperation, ApiTags } from "@nestjs/swagger";
import { CalendarService } from "./calendar.service";
import { DateQueryDto } from "./dto/date-query.dto";
import { LunarDateQueryDto } from "./dto/lunar-date-query.dto";
import { SolarDateQueryDto } from "./dto/solar-date-query.dto";

@ApiTags("calendar")
@Controller("api/calendar")
export class CalendarController {
  constructor(private readonly calendarService: CalendarService) {}

  @Get("festivals/:year/:month")
  @ApiOperation({ summary: "Festivals and solar terms of one Gregorian month" })
  getMonthFestivals(
    @Param("year", ParseIntPipe) year: number,
    @Param("month", ParseIntPipe) month: number
  ) {
    return this.calendarService.getMonthlyFestivals(year, month);
  }

  @Get("festivals/:year")
  @ApiOperation({ summary: "Festivals and solar terms of one Gregorian year" })
  getFestivals(@Param("year", ParseIntPipe) year: number) {
    return this.calendarService.getYearlyFestivals(year);
  }

  @Get("month/:year/:month")
  @ApiOperation({ summary: "Lunar information for every day of a month" })
  getMonthView(
    @Param("year", ParseIntPipe) year: number,
    @Param("month", ParseIntPipe) month: number
  ) {
    return this.calendarService.getMonthView(year, month);
  }

  @Get("lunar-to-solar")
  @ApiOperation({ summary: "Convert a lunar date to the Gregorian calendar" })
  lunarToSolar(@Query() query: LunarDateQueryDto) {
    return this.calendarService.convertLunarToSolar(
      query.year,
      query.month,
      query.day,
      query.isLeapMonth ?? false
    );
  }

  @Get("solar-to-lunar")
  @ApiOperation({ summary: "Convert a Gregorian date to the lunar calendar" })
  solarToLunar(@Query() query: SolarDateQueryDto) {
    return this.calendarService.convertSolarToLunar(
      query.year,
      query.month,
      query.day
    );
  }

  @Get("lunar-info")
  @ApiOperation({ summary: "Lunar date, solar term and festival of a day" })
  getLunarInfo(@Query() query: DateQueryDto) {
    return this.calendarService.describeDate(query.date);
  }

  @Get("is-festival")
  @ApiOperation({ summary: "Check whether a day is a traditional festival" })
  isFestival(@Query() query: DateQueryDto) {
    return this.calendarService.isFestival(query.date);
  }

  @Get("24-solar-terms/:year")
  @ApiOperation({ summary: "Dates of the 24 solar terms in a year" })
  getSolarTerms(@Param("year", ParseIntPipe) year: number) {
    return this.calendarService.get24SolarTerms(year);
  }

  @Get("year-name/:year")
  @ApiOperation({ summary: "Stem-branch name and zodiac animal of a year" })
  getYearName(@Param("year", ParseIntPipe) year: number) {
    return this.calendarService.getYearName(year);
  }
}
