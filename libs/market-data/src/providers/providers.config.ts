import { ConfigService } from '@nestjs/config';

export type ProviderName = 'binance' | 'mexc' | 'ig' | 'finnhub' | 'fred';

export interface ProviderEndpoints {
  rest: string;
}

const DEFAULT_ENDPOINTS: Record<ProviderName, ProviderEndpoints> = {
  binance: { rest: 'https://api.binance.com' },
  mexc: { rest: 'https://api.mexc.com' },
  ig: { rest: 'https://api.ig.com/gateway/deal' },
  finnhub: { rest: 'https://finnhub.io/api/v1' },
  fred: { rest: 'https://api.stlouisfed.org/fred' },
};

const IG_DEMO_REST = 'https://demo-api.ig.com/gateway/deal';

export const getProviderEndpoints = (
  configService: ConfigService,
  provider: ProviderName,
): ProviderEndpoints => {
  const restOverride = configService.get<string>(`${provider.toUpperCase()}_REST_URL`);
  if (restOverride) {
    return { rest: restOverride };
  }
  if (provider === 'ig' && configService.get<string>('IG_ACC_TYPE', 'LIVE') === 'DEMO') {
    return { rest: IG_DEMO_REST };
  }
  return DEFAULT_ENDPOINTS[provider];
};

export const getRestTimeoutMs = (configService: ConfigService): number =>
  configService.get<number>('MARKET_DATA_REST_TIMEOUT_MS', 10000);

/** Reads a list setting that may arrive validated (array) or raw (comma-separated). */
export const getListConfig = (configService: ConfigService, key: string, fallback: string[]): string[] => {
  const raw = configService.get<unknown>(key);
  const items = Array.isArray(raw) ? raw.map(String) : typeof raw === 'string' ? raw.split(',') : fallback;
  return items.map((item) => item.trim()).filter(Boolean);
};
