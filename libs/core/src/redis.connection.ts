import { ConfigService } from '@nestjs/config';
import { RedisOptions } from 'ioredis';
import { ConfigurationError } from './errors';

const DEFAULT_REDIS_PORT = 6379;

// The price cache is optional: connect on first use and fail fast instead of queueing commands.
const PRICE_CACHE_CLIENT: RedisOptions = {
  connectionName: 'price-cache',
  lazyConnect: true,
  enableOfflineQueue: false,
  maxRetriesPerRequest: 1,
  connectTimeout: 5000,
};

/** Target of a `redis://` or `rediss://` URL; the path selects the database. */
export const parseRedisUrl = (redisUrl: string): RedisOptions => {
  const { protocol, hostname, port, username, password, pathname } = new URL(redisUrl);
  if (protocol !== 'redis:' && protocol !== 'rediss:') {
    throw new ConfigurationError(`Unsupported Redis URL scheme '${protocol}'`);
  }
  const dbText = pathname.slice(1);
  const db = dbText ? Number(dbText) : 0;
  if (!Number.isInteger(db) || db < 0) {
    throw new ConfigurationError(`Invalid Redis database '${dbText}'`);
  }
  return {
    host: hostname || 'localhost',
    port: port ? Number(port) : DEFAULT_REDIS_PORT,
    username: username ? decodeURIComponent(username) : undefined,
    password: password ? decodeURIComponent(password) : undefined,
    db,
    tls: protocol === 'rediss:' ? {} : undefined,
  };
};

/** `REDIS_URL` wins over the discrete host settings. */
export const priceCacheRedisOptions = (configService: ConfigService): RedisOptions => {
  const redisUrl = configService.get<string>('REDIS_URL');
  const target: RedisOptions = redisUrl
    ? parseRedisUrl(redisUrl)
    : {
        host: configService.get<string>('REDIS_HOST', 'localhost'),
        port: configService.get<number>('REDIS_PORT', DEFAULT_REDIS_PORT),
        password: configService.get<string>('REDIS_PASSWORD', '') || undefined,
      };
  return { ...target, ...PRICE_CACHE_CLIENT };
};
