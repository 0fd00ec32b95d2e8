import { Injectable, NestMiddleware, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Request, Response, NextFunction } from "express";

const DEFAULT_SLOW_REQUEST_THRESHOLD_MS = 1000;

@Injectable()
export class PerformanceLoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger("PerformanceLogger");
  private readonly slowRequestThreshold: number;

  constructor(configService: ConfigService) {
    const configured = Number(
      configService.get<string>("SLOW_REQUEST_THRESHOLD_MS")
    );
    this.slowRequestThreshold =
      Number.isFinite(configured) && configured > 0
        ? configured
        : DEFAULT_SLOW_REQUEST_THRESHOLD_MS;
  }

  get thresholdMs(): number {
    return this.slowRequestThreshold;
  }

  use(req: Request, res: Response, next: NextFunction) {
    const startTime = Date.now();
    const { method, originalUrl } = req;

    res.on("finish", () => {
      const duration = Date.now() - startTime;
      const { statusCode } = res;

      if (duration > this.slowRequestThreshold) {
        this.logger.warn(
          `Slow Request: ${method} ${originalUrl} - ${duration}ms - Status: ${statusCode}`
        );
      } else {
        this.logger.verbose(`${method} ${originalUrl} - ${duration}ms - Status: ${statusCode}`);
      }
    });

    next();
  }
}
