import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel } from '@nestjs/common';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';

async function bootstrap(): Promise<void> {
  // Configure logging level
  const logLevel = process.env.LOG_LEVEL || 'log';
  const logLevels: LogLevel[] =
    logLevel === 'debug'
      ? ['log', 'error', 'warn', 'debug', 'verbose']
      : ['log', 'error', 'warn'];

  const app = await NestFactory.create(AppModule, {
    logger: logLevels,
  });
  const port = process.env.PORT || 3000;

  setupApp(app);

  await app.listen(port);
  new Logger('Bootstrap').log(`IPMA weather proxy listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error);
  process.exit(1);
});
