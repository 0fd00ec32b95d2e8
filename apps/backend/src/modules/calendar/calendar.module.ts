import { Module } from "@nestjs/common";
import { CalendarController } from "./calendar.controller";
import { CalendarService } from "./calendar.service";
import { LunarCalendarService } from "./lunar-calendar.service";
import { TraditionalFestivalService } from "./traditional-festival.service";

@Module({
  controllers: [CalendarController],
  providers: [CalendarService, TraditionalFestivalService, LunarCalendarService],
  exports: [LunarCalendarService],
})
export class CalendarModule {}
