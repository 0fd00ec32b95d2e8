import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { CommonModule } from "./common/common.module";
import { CalendarModule } from "./modules/calendar/calendar.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      // Local dev runs from the repo root or from apps/backend
      envFilePath: [".env", "apps/backend/.env"],
      expandVariables: true,
    }),
    CommonModule,
    CalendarModule,
  ],
})
export class AppModule {}
