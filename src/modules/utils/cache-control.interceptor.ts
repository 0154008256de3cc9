import {
  CallHandler,
  ExecutionContext,
  NestInterceptor,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable } from 'rxjs';

export const DEFAULT_HTTP_CACHE_MAX_AGE = 300; // 5 minutes

/**
 * Adds a public Cache-Control header to every response
 */
export class CacheControlInterceptor implements NestInterceptor {
  constructor(
    private readonly maxAgeSeconds: number = DEFAULT_HTTP_CACHE_MAX_AGE,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>();

    // Set before the handler runs; headers cannot change once sent
    if (!response.headersSent) {
      response.header('Cache-Control', `public, max-age=${this.maxAgeSeconds}`);
    }

    return next.handle();
  }
}
