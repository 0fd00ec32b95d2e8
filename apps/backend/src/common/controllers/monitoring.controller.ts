import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiTags } from "@nestjs/swagger";
import {
  FIRST_TABLE_YEAR,
  LAST_TABLE_YEAR,
} from "../../modules/calendar/lunar";

@ApiTags("monitoring")
@Controller("monitoring")
export class MonitoringController {
  @Get("health")
  @ApiOperation({ summary: "Check system health" })
  checkHealth() {
    return {
      status: "healthy",
      supportedYears: { from: FIRST_TABLE_YEAR, to: LAST_TABLE_YEAR },
      uptimeSeconds: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
    };
  }
}
