import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost, NestFactory } from '@nestjs/core';
import { errorMessage, nestLogLevels } from '@libs/core';
import { NOTIFICATION_SINK, NotificationSink } from '@libs/market-data';
import { AppModule } from './app.module';
import { MarketDataExceptionFilter } from './market-data-exception.filter';

async function bootstrap(): Promise<void> {
  // ConfigService is not up yet; the level is read straight from the environment.
  const app = await NestFactory.create(AppModule, { logger: nestLogLevels(process.env.LOG_LEVEL) });
  app.enableShutdownHooks();
  const { httpAdapter } = app.get(HttpAdapterHost);
  app.useGlobalFilters(new MarketDataExceptionFilter(httpAdapter, app.get<NotificationSink>(NOTIFICATION_SINK)));
  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 8001);
  await app.listen(port, '0.0.0.0');
  Logger.log(JSON.stringify({ event: 'api_listening', port }), 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(JSON.stringify({ event: 'bootstrap_failed', message: errorMessage(error) }), 'Bootstrap');
  process.exit(1);
});
