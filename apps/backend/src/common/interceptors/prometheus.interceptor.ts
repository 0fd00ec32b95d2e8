import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Counter, Histogram, register } from 'prom-client';

const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [register],
});

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route'],
  registers: [register],
});

/** Route pattern when Express matched one, else the path without its query string. */
export function resolveRoutePath(request: Request): string {
  const route: unknown = request.route;
  if (
    typeof route === 'object' &&
    route !== null &&
    'path' in route &&
    typeof route.path === 'string'
  ) {
    return route.path;
  }
  return request.url ? request.url.split('?')[0] : 'unknown';
}

@Injectable()
export class PrometheusInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const { method } = request;
    const routePath = resolveRoutePath(request);

    const startTime = Date.now();
    const record = (status: number) => {
      const duration = (Date.now() - startTime) / 1000;
      httpRequestDuration.observe({ method, route: routePath }, duration);
      httpRequestsTotal.inc({ method, route: routePath, status });
    };

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode),
        // Exception filters set the final status after this point
        error: () => record(response.statusCode >= 400 ? response.statusCode : 500),
      })
    );
  }
}
