import { describe, expect, it } from 'vitest';
import { envSchemaWithRefinements, nestLogLevels } from '@libs/core';

describe('env schema', () => {
  it('fills defaults for an empty environment', () => {
    const env = envSchemaWithRefinements.parse({});
    expect(env.PORT).toBe(8001);
    expect(env.CACHE_ENABLED).toBe(true);
    expect(env.PROVIDERS_ENABLED).toEqual(['binance', 'mexc', 'ig', 'finnhub', 'fred']);
    expect(env.PROVIDER_PRIORITY_CRYPTO).toEqual(['binance', 'mexc']);
    expect(env.FRED_ASCENDING_ONLY_SERIES).toEqual(['PMI']);
    expect(env.BULK_CONCURRENCY).toBe(5);
    expect(env.CRYPTO_CACHE_TTL_SECONDS).toBe(60);
    expect(env.IG_ACC_TYPE).toBe('LIVE');
  });

  it('coerces string values', () => {
    const env = envSchemaWithRefinements.parse({
      PORT: '9000',
      CACHE_ENABLED: 'off',
      PROVIDERS_ENABLED: 'Binance, IG',
      FRED_ASCENDING_ONLY_SERIES: 'pmi,napm',
      BULK_BATCH_PAUSE_MS: '0',
    });
    expect(env.PORT).toBe(9000);
    expect(env.CACHE_ENABLED).toBe(false);
    expect(env.PROVIDERS_ENABLED).toEqual(['binance', 'ig']);
    expect(env.FRED_ASCENDING_ONLY_SERIES).toEqual(['PMI', 'NAPM']);
    expect(env.BULK_BATCH_PAUSE_MS).toBe(0);
  });

  it('keeps unknown keys', () => {
    const env = envSchemaWithRefinements.parse({ HOSTNAME: 'worker-1' });
    expect(env.HOSTNAME).toBe('worker-1');
  });

  it('rejects partial broker credentials', () => {
    const result = envSchemaWithRefinements.safeParse({ IG_USERNAME: 'test-user', IG_PASSWORD: 'test-secret' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['IG_API_KEY']);
    }
  });

  it('rejects a bot token without a chat id', () => {
    const result = envSchemaWithRefinements.safeParse({ TELEGRAM_BOT_TOKEN: 'test-token' });
    expect(result.success).toBe(false);
    expect(envSchemaWithRefinements.safeParse({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_ENABLED: 'false' }).success).toBe(
      true,
    );
  });

  it('rejects out-of-range numbers', () => {
    expect(envSchemaWithRefinements.safeParse({ PROVIDER_TIMEOUT_MS: '10' }).success).toBe(false);
    expect(envSchemaWithRefinements.safeParse({ PORT: 'abc' }).success).toBe(false);
  });

  it('maps LOG_LEVEL onto Nest logger levels', () => {
    expect(nestLogLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(nestLogLevels(' DEBUG ')).toEqual(['fatal', 'error', 'warn', 'log', 'debug']);
    expect(nestLogLevels(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(nestLogLevels('loud')).toEqual(['fatal', 'error', 'warn', 'log']);
  });
});
