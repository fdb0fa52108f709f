import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { TelegramModule } from '@libs/telegram';
import { CalendarController } from './calendar.controller';
import { HealthController } from './health.controller';
import { HealthMonitorCron } from './health-monitor.cron';
import { MacroController } from './macro.controller';
import { MarketsController } from './markets.controller';
import { MetadataController } from './metadata.controller';
import { NewsController } from './news.controller';
import { PricesController } from './prices.controller';

@Module({
  imports: [CoreModule, TelegramModule, MarketDataModule, ScheduleModule.forRoot()],
  controllers: [
    HealthController,
    PricesController,
    MarketsController,
    MetadataController,
    NewsController,
    CalendarController,
    MacroController,
  ],
  providers: [HealthMonitorCron],
})
export class AppModule {}
