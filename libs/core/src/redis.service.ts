import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { errorMessage } from './errors';
import { KeyValueStore } from './key-value-store';
import { priceCacheRedisOptions } from './redis.connection';

@Injectable()
export class RedisService implements KeyValueStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private readonly client: Redis;

  constructor(configService: ConfigService) {
    this.client = new Redis(priceCacheRedisOptions(configService));
    this.client.on('error', (error: Error) => {
      this.logger.warn(JSON.stringify({ event: 'redis_error', message: error.message }));
    });
  }

  async get(key: string): Promise<string | null> {
    await this.ensureConnected();
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.ensureConnected();
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureConnected();
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'redis_ping_failed', message: errorMessage(error) }));
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit();
      return;
    }
    this.client.disconnect();
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.status === 'wait' || this.client.status === 'end') {
      await this.client.connect();
    }
  }
}
