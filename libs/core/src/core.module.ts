import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { envSchemaWithRefinements } from './env.schema';
import { KEY_VALUE_STORE, KeyValueStore } from './key-value-store';
import { RedisService } from './redis.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate:
        process.env.NODE_ENV === 'test'
          ? undefined
          : (config) => envSchemaWithRefinements.parse(config),
    }),
  ],
  providers: [
    {
      provide: KEY_VALUE_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): KeyValueStore | null =>
        configService.get<boolean>('CACHE_ENABLED', true) ? new RedisService(configService) : null,
    },
  ],
  exports: [ConfigModule, KEY_VALUE_STORE],
})
export class CoreModule {}
