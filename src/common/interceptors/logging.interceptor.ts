import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function resolveLevel(raw: string | undefined): LogLevel {
  const found = LEVELS.find((l) => l === raw);
  return found ?? 'debug';
}

export class Logger {
  private static logLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

  private static enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  static log(message: string, context?: string) {
    if (this.enabled('info')) {
      console.log(`[LOG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static error(message: string, trace: string, context?: string) {
    console.error(`[ERROR] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    if (trace) {
      console.error(trace);
    }
  }

  static warn(message: string, context?: string) {
    if (this.enabled('warn')) {
      console.warn(`[WARN] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }

  static debug(message: string, context?: string) {
    if (this.enabled('debug')) {
      console.debug(`[DEBUG] ${new Date().toISOString()} [${context || 'App'}] ${message}`);
    }
  }
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url, query, params } = request;

    Logger.debug(
      `Request: ${method} ${url} \nQuery: ${JSON.stringify(query)} \nParams: ${JSON.stringify(params)}`,
      'LoggingInterceptor',
    );

    const now = Date.now();
    return next.handle().pipe(
      tap(() => {
        Logger.debug(`Response: ${method} ${url} ${Date.now() - now}ms`, 'LoggingInterceptor');
      }),
    );
  }
}
