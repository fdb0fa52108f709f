import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { KEY_VALUE_STORE, KeyValueStore } from '@libs/core';
import { AssetClass, PriceRecord } from '../models';
import { priceRecordSchema } from '../schemas';
import { JsonCache } from './json-cache';

const cacheEntrySchema = z.object({
  record: priceRecordSchema,
  cachedAt: z.number(),
});

export interface CachedPrice {
  record: PriceRecord;
  cachedAt: number;
  /** Still inside the asset-class TTL. Stale entries are only a last resort. */
  fresh: boolean;
}

export const getPriceCacheKey = (symbol: string): string => `price:${symbol.trim().toUpperCase()}`;

@Injectable()
export class PriceCacheService {
  private readonly logger = new Logger(PriceCacheService.name);
  private readonly cache: JsonCache;
  private readonly cryptoTtlSeconds: number;
  private readonly traditionalTtlSeconds: number;
  private readonly retentionSeconds: number;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(KEY_VALUE_STORE) store: KeyValueStore | null = null,
  ) {
    const enabled = configService.get<boolean>('CACHE_ENABLED', true) !== false;
    this.cache = new JsonCache(enabled ? store : null, this.logger);
    this.cryptoTtlSeconds = configService.get<number>('CRYPTO_CACHE_TTL_SECONDS', 60);
    this.traditionalTtlSeconds = configService.get<number>('TRADITIONAL_CACHE_TTL_SECONDS', 300);
    this.retentionSeconds = configService.get<number>('STALE_CACHE_RETENTION_SECONDS', 86400);
  }

  get enabled(): boolean {
    return this.cache.enabled;
  }

  ttlFor(assetClass: AssetClass): number {
    return assetClass === 'CRYPTO' ? this.cryptoTtlSeconds : this.traditionalTtlSeconds;
  }

  async get(symbol: string): Promise<CachedPrice | null> {
    const entry = await this.cache.read(getPriceCacheKey(symbol), cacheEntrySchema);
    if (!entry) {
      return null;
    }
    const ageMs = Date.now() - entry.cachedAt;
    return { ...entry, fresh: ageMs < this.ttlFor(entry.record.assetClass) * 1000 };
  }

  async set(record: PriceRecord): Promise<void> {
    // kept past its TTL so it can still answer when every provider is down
    const retention = Math.max(this.retentionSeconds, this.ttlFor(record.assetClass));
    await this.cache.write(getPriceCacheKey(record.symbol), { record, cachedAt: Date.now() }, retention);
  }
}
