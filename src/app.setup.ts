import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CacheControlInterceptor,
  DEFAULT_HTTP_CACHE_MAX_AGE,
} from './modules/utils/cache-control.interceptor';
import { UpstreamExceptionFilter } from './modules/utils/upstream-exception.filter';

/**
 * Global pipes, interceptors and filters shared by the server and e2e tests
 */
export function setupApp(app: INestApplication): void {
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  // Enable global validation pipe with transformation
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  const rawMaxAge = Number(
    configService.get<string | number>(
      'HTTP_CACHE_MAX_AGE',
      DEFAULT_HTTP_CACHE_MAX_AGE,
    ),
  );
  const maxAge =
    Number.isInteger(rawMaxAge) && rawMaxAge >= 0
      ? rawMaxAge
      : DEFAULT_HTTP_CACHE_MAX_AGE;

  app.useGlobalInterceptors(new CacheControlInterceptor(maxAge));
  app.useGlobalFilters(new UpstreamExceptionFilter());

  logger.log(`Cache-Control headers enabled with TTL of ${maxAge} seconds`);
  logger.log('Global validation pipe enabled with transformation');
}
