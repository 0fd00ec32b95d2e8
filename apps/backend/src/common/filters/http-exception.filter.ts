import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Request, Response } from "express";

export interface ErrorResponseBody {
  statusCode: number;
  timestamp: string;
  path: string;
  method: string;
  message: string | string[];
  stack?: string;
}

const SENSITIVE_FIELDS = [
  "token",
  "access_token",
  "secret",
  "api_key",
  "apiKey",
  "authorization",
];

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const errorMessage = this.extractMessage(exception);
    const isProduction = process.env.NODE_ENV === "production";
    const stack = exception instanceof Error ? exception.stack : undefined;

    const errorResponse: ErrorResponseBody = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message: errorMessage,
    };

    // Stack traces only leave the process outside production
    if (!isProduction && stack) {
      errorResponse.stack = stack;
    }

    const logContext = {
      stack,
      query: this.sanitizeQuery(request.query),
      params: request.params,
    };
    const summary = `${request.method} ${request.url} - ${status} - ${
      Array.isArray(errorMessage) ? errorMessage.join("; ") : errorMessage
    }`;

    if (status >= 500) {
      this.logger.error(summary, logContext);
    } else {
      this.logger.warn(summary, logContext);
    }

    response.status(status).json(errorResponse);
  }

  private extractMessage(exception: unknown): string | string[] {
    if (!(exception instanceof HttpException)) {
      return "Internal server error";
    }
    const body = exception.getResponse();
    if (typeof body === "string") {
      return body;
    }
    // ValidationPipe puts one message per failed constraint here
    if ("message" in body) {
      const { message } = body;
      if (typeof message === "string") return message;
      if (Array.isArray(message) && message.every((m) => typeof m === "string")) {
        return message;
      }
    }
    return exception.message;
  }

  /**
   * Redact credentials a client may have put in the query string
   */
  private sanitizeQuery(query: Request["query"]): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...query };
    SENSITIVE_FIELDS.forEach((field) => {
      if (sanitized[field] !== undefined) {
        sanitized[field] = "[REDACTED]";
      }
    });
    return sanitized;
  }
}
