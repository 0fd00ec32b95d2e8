import { Test } from "@nestjs/testing";
import { PrometheusController } from "@willsoto/nestjs-prometheus";
import { register } from "prom-client";
import { AppModule } from "./app.module";
import { METRICS_APP_LABEL } from "./common/common.module";
import { MonitoringController } from "./common/controllers/monitoring.controller";
import { CalendarController } from "./modules/calendar/calendar.controller";
import { LunarCalendarService } from "./modules/calendar/lunar-calendar.service";

describe("AppModule", () => {
  it("wires the calendar and monitoring modules", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    expect(moduleRef.get(CalendarController)).toBeInstanceOf(CalendarController);
    expect(moduleRef.get(MonitoringController)).toBeInstanceOf(MonitoringController);
    expect(moduleRef.get(PrometheusController)).toBeInstanceOf(PrometheusController);
    expect(await register.metrics()).toContain(`app="${METRICS_APP_LABEL}"`);
    expect(moduleRef.get(LunarCalendarService).solarToLunar(1900, 1, 31).lunar).toEqual({
      year: 1900,
      month: 1,
      day: 1,
      isLeapMonth: false,
    });

    await moduleRef.close();
  });
});
