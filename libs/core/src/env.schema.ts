import { z } from 'zod';

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(s)) return true;
    if (['false', '0', 'no', 'n', 'off'].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s
      .split(',')
      .map((x) => x.trim().toLowerCase())
      .filter(Boolean);
  }, z.array(z.string()));

const port = (def: number) => toInt(def).pipe(z.number().int().min(1).max(65535));
const timeoutMs = (def: number) => toInt(def).pipe(z.number().int().min(100).max(600_000));
const ttlSeconds = (def: number) => toInt(def).pipe(z.number().int().min(1).max(30 * 86400));

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevelName = z.infer<typeof logLevelSchema>;

const envObject = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    LOG_LEVEL: logLevelSchema.default('info'),
    PORT: port(8001),

    CACHE_ENABLED: toBool(true).default(true),
    REDIS_URL: z.string().trim().optional(),
    REDIS_HOST: z.string().trim().default('localhost'),
    REDIS_PORT: port(6379),
    REDIS_PASSWORD: z.string().optional().default(''),
    CRYPTO_CACHE_TTL_SECONDS: ttlSeconds(60),
    TRADITIONAL_CACHE_TTL_SECONDS: ttlSeconds(300),
    STALE_CACHE_RETENTION_SECONDS: ttlSeconds(86400),
    NEWS_CACHE_TTL_SECONDS: ttlSeconds(900),
    MACRO_CACHE_TTL_SECONDS: ttlSeconds(86400),

    MONGODB_URI: z.string().trim().default('mongodb://localhost:27017/market_data'),
    SYMBOL_DIRECTORY_COLLECTION: z.string().trim().default('symbol_directory'),

    PROVIDERS_ENABLED: csv(['binance', 'mexc', 'ig', 'finnhub', 'fred']),
    PROVIDER_PRIORITY_CRYPTO: csv(['binance', 'mexc']),
    PROVIDER_PRIORITY_FOREX: csv(['ig']),
    PROVIDER_PRIORITY_INDEX: csv(['ig']),
    PROVIDER_PRIORITY_COMMODITY: csv(['ig']),
    PROVIDER_PRIORITY_EQUITY: csv(['ig']),
    MARKET_DATA_REST_TIMEOUT_MS: timeoutMs(10000),
    BINANCE_REST_URL: z.string().trim().url().optional(),
    MEXC_REST_URL: z.string().trim().url().optional(),
    IG_REST_URL: z.string().trim().url().optional(),
    FINNHUB_REST_URL: z.string().trim().url().optional(),
    FRED_REST_URL: z.string().trim().url().optional(),

    IG_USERNAME: z.string().trim().optional(),
    IG_PASSWORD: z.string().optional(),
    IG_API_KEY: z.string().trim().optional(),
    IG_ACC_TYPE: z.enum(['LIVE', 'DEMO']).default('LIVE'),

    FINNHUB_API_KEY: z.string().trim().optional(),
    FRED_API_KEY: z.string().trim().optional(),
    FRED_ASCENDING_ONLY_SERIES: z
      .preprocess(
        (v) => (v === undefined || v === null || v === '' ? 'PMI' : v),
        z.string(),
      )
      .transform((v) =>
        v
          .split(',')
          .map((x) => x.trim().toUpperCase())
          .filter(Boolean),
      ),

    PROVIDER_TIMEOUT_MS: timeoutMs(10000),
    HEALTH_CHECK_TIMEOUT_MS: timeoutMs(10000),
    HEALTH_CHECK_TOTAL_TIMEOUT_MS: timeoutMs(30000),
    INIT_TIMEOUT_MS: timeoutMs(45000),
    BULK_CONCURRENCY: toInt(5).pipe(z.number().int().min(1).max(100)),
    BULK_BATCH_SIZE: toInt(10).pipe(z.number().int().min(1).max(500)),
    BULK_BATCH_PAUSE_MS: toInt(1000).pipe(z.number().int().min(0).max(60_000)),
    BULK_RECONNECT_THRESHOLD: toInt(20).pipe(z.number().int().min(1).max(10_000)),
    BULK_TIMEOUT_MS: timeoutMs(120000),
    DISCOVERY_TIMEOUT_MS: timeoutMs(10000),

    TELEGRAM_ENABLED: toBool(true).default(true),
    TELEGRAM_BOT_TOKEN: z.string().trim().optional(),
    TELEGRAM_CHAT_ID: z.string().trim().optional(),
    HEALTH_MONITOR_ENABLED: toBool(true).default(true),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  const igFields = [env.IG_USERNAME, env.IG_PASSWORD, env.IG_API_KEY];
  const igConfigured = igFields.filter(Boolean).length;
  if (igConfigured > 0 && igConfigured < igFields.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['IG_API_KEY'],
      message: 'IG_USERNAME, IG_PASSWORD and IG_API_KEY must be set together',
    });
  }

  if (env.TELEGRAM_ENABLED && Boolean(env.TELEGRAM_BOT_TOKEN) !== Boolean(env.TELEGRAM_CHAT_ID)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TELEGRAM_CHAT_ID'],
      message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together',
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
