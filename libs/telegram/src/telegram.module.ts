import { Global, Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { NOTIFICATION_SINK } from '@libs/market-data';
import { TelegramNotifierService } from './telegram.service';

@Global()
@Module({
  imports: [CoreModule],
  providers: [TelegramNotifierService, { provide: NOTIFICATION_SINK, useExisting: TelegramNotifierService }],
  exports: [TelegramNotifierService, NOTIFICATION_SINK],
})
export class TelegramModule {}
