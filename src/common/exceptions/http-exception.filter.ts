import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { Request, Response } from 'express';
import { Logger } from '../interceptors/logging.interceptor';
import { ErrorDetails, isDomainErrorBody } from './domain.exceptions';

interface ErrorPayload {
  statusCode: number;
  timestamp: string;
  path: string;
  error: string;
  code: string | null;
  message: string | string[];
  details: ErrorDetails | null;
}

function messageOf(body: unknown, fallback: string): string | string[] {
  if (typeof body === 'string') return body;
  if (typeof body === 'object' && body !== null && 'message' in body) {
    const { message } = body;
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
  }
  return fallback;
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const payload: ErrorPayload = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      timestamp: new Date().toISOString(),
      path: request.url,
      error: 'Internal Server Error',
      code: null,
      message: 'Internal server error',
      details: null,
    };

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      payload.statusCode = exception.getStatus();
      payload.error = exception.name;
      payload.message = messageOf(body, exception.message);
      if (isDomainErrorBody(body)) {
        payload.code = body.code;
        payload.details = body.details ?? null;
      }
    }

    const trace = exception instanceof Error ? exception.stack || 'No stack trace available' : '';
    const summary = `${request.method} ${request.url} ${payload.statusCode} - ${JSON.stringify(payload.message)}`;
    if (payload.statusCode >= 500) {
      Logger.error(summary, trace, 'HttpExceptionFilter');
    } else {
      Logger.warn(summary, 'HttpExceptionFilter');
    }

    response.status(payload.statusCode).json(payload);
  }
}
