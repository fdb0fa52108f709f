import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { KeyValueStore, errorMessage } from '@libs/core';

/**
 * JSON values over an optional key-value store. A missing store, a store
 * error or a payload that fails its schema all read as a miss.
 */
export class JsonCache {
  constructor(
    private readonly store: KeyValueStore | null,
    private readonly logger: Logger,
  ) {}

  get enabled(): boolean {
    return this.store !== null;
  }

  async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    if (!this.store) {
      return null;
    }
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'cache_read_failed', key, message: errorMessage(error) }));
      return null;
    }
    if (!raw) {
      return null;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'cache_entry_corrupt', key, message: errorMessage(error) }));
      return null;
    }
    const parsed = schema.safeParse(payload);
    return parsed.success ? parsed.data : null;
  }

  async write(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    if (!this.store) {
      return;
    }
    try {
      await this.store.set(key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'cache_write_failed', key, message: errorMessage(error) }));
    }
  }

  async getOrLoad<T>(
    key: string,
    ttlSeconds: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    loader: () => Promise<T>,
  ): Promise<T> {
    const cached = await this.read(key, schema);
    if (cached !== null) {
      return cached;
    }
    const value = await loader();
    await this.write(key, value, ttlSeconds);
    return value;
  }
}
