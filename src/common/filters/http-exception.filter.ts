import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Minimal view of the platform request/response this filter touches.
interface HttpRequestLike {
  url: string;
}

interface HttpReplyLike {
  status(code: number): { json(body: HttpExceptionResponse): unknown };
}

function extractMessage(body: string | object, fallback: string): string | string[] {
  if (typeof body === 'string') {
    return body;
  }
  if ('message' in body) {
    const { message } = body;
    if (typeof message === 'string' || (Array.isArray(message) && message.every((m) => typeof m === 'string'))) {
      return message;
    }
  }
  return fallback;
}

function extractError(body: string | object): string | undefined {
  if (typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return undefined;
}

/**
 * Renders every HttpException as { statusCode, message, error, timestamp, path }.
 * Validation failures keep class-validator's message list.
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const reply = ctx.getResponse<HttpReplyLike>();
    const statusCode = exception.getStatus();
    const body = exception.getResponse();

    const payload: HttpExceptionResponse = {
      statusCode,
      message: extractMessage(body, exception.message),
      error: extractError(body) ?? exception.name,
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    if (statusCode >= 500) {
      this.logger.error(`${request.url} failed: ${exception.message}`, exception.stack);
    } else {
      this.logger.warn(`${request.url} rejected with ${statusCode}: ${exception.message}`);
    }

    reply.status(statusCode).json(payload);
  }
}
