import {
  Global,
  MiddlewareConsumer,
  Module,
  NestModule,
} from "@nestjs/common";
import { APP_FILTER, APP_INTERCEPTOR } from "@nestjs/core";
import { PrometheusModule } from "@willsoto/nestjs-prometheus";
import { MonitoringController } from "./controllers/monitoring.controller";
import { HttpExceptionFilter } from "./filters/http-exception.filter";
import { PrometheusInterceptor } from "./interceptors/prometheus.interceptor";
import { PerformanceLoggerMiddleware } from "./middleware/performance-logger.middleware";

export const METRICS_APP_LABEL = "lunisolar-calendar-api";

@Global()
@Module({
  imports: [
    // Serves GET /metrics from the default prom-client registry
    PrometheusModule.register({
      defaultMetrics: { enabled: true },
      defaultLabels: { app: METRICS_APP_LABEL },
    }),
  ],
  controllers: [MonitoringController],
  providers: [
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
    { provide: APP_INTERCEPTOR, useClass: PrometheusInterceptor },
  ],
})
export class CommonModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(PerformanceLoggerMiddleware).forRoutes("*");
  }
}
