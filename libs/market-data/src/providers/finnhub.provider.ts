import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { KEY_VALUE_STORE, KeyValueStore } from '@libs/core';
import { JsonCache } from '../cache/json-cache';
import { CalendarEvent, NewsItem, PriceRecord } from '../models';
import { calendarEventSchema, newsItemSchema } from '../schemas';
import { createHttpClient } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';
import { getProviderEndpoints, getRestTimeoutMs } from './providers.config';

const COMPANY_NEWS_LIMIT = 10;

const rawNewsSchema = z.array(
  z
    .object({
      headline: z.string().default(''),
      summary: z.string().default(''),
      source: z.string().default('Unknown'),
      url: z.string().default(''),
      datetime: z.number().default(0),
    })
    .passthrough(),
);

const optionalNumber = z.number().nullish().transform((value) => value ?? undefined);

const ipoCalendarSchema = z.object({
  ipoCalendar: z
    .array(
      z.object({
        symbol: z.string().nullish(),
        name: z.string().nullish(),
        date: z.string(),
        exchange: z.string().nullish(),
      }),
    )
    .nullish(),
});

const earningsCalendarSchema = z.object({
  earningsCalendar: z
    .array(
      z.object({
        symbol: z.string(),
        date: z.string(),
        epsEstimate: optionalNumber,
        epsActual: optionalNumber,
      }),
    )
    .nullish(),
});

const isoDate = (date: DateTime): string => date.toFormat('yyyy-LL-dd');

type RawNews = z.infer<typeof rawNewsSchema>[number];

const toNewsItem = (item: RawNews, symbol?: string): NewsItem => ({
  headline: item.headline,
  summary: item.summary,
  source: item.source,
  url: item.url,
  timestamp: new Date(item.datetime * 1000).toISOString(),
  ...(symbol ? { symbol } : {}),
});

/** News and calendar feed. Carries no prices; it sits outside price routing. */
@Injectable()
export class FinnhubProvider extends BaseRestProvider {
  readonly servesPrices = false;
  private readonly restClient: AxiosInstance;
  private readonly apiKey: string;
  private readonly cache: JsonCache;
  private readonly ttlSeconds: number;
  private warnedMissingKey = false;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(KEY_VALUE_STORE) store: KeyValueStore | null = null,
  ) {
    super('finnhub');
    const endpoints = getProviderEndpoints(configService, 'finnhub');
    this.apiKey = configService.get<string>('FINNHUB_API_KEY', '').trim();
    this.restClient = createHttpClient(endpoints.rest, getRestTimeoutMs(configService), {
      'X-Finnhub-Token': this.apiKey,
    });
    this.ttlSeconds = configService.get<number>('NEWS_CACHE_TTL_SECONDS', 900);
    this.cache = new JsonCache(store, this.logger);
  }

  async healthCheck(): Promise<boolean> {
    if (!this.ensureKey()) {
      return false;
    }
    try {
      await this.restClient.get('/stock/market-status', { params: { exchange: 'US' } });
      this.recordSuccess();
      return true;
    } catch (error) {
      this.recordFailure(error);
      return false;
    }
  }

  async getPrice(_symbol: string): Promise<PriceRecord | null> {
    return null;
  }

  async getCompanyNews(symbol: string, days = 1): Promise<NewsItem[]> {
    const upper = symbol.trim().toUpperCase();
    const to = DateTime.utc();
    const from = to.minus({ days });
    return this.cachedList(`news:company:${upper}:${days}`, newsItemSchema, async () => {
      const data = await this.fetch('/company-news', { symbol: upper, from: isoDate(from), to: isoDate(to) });
      return this.parseNews(data, upper).slice(0, COMPANY_NEWS_LIMIT);
    });
  }

  async getMarketNews(category = 'general', limit = 20): Promise<NewsItem[]> {
    const news = await this.cachedList(`news:market:${category}`, newsItemSchema, async () => {
      const data = await this.fetch('/news', { category });
      return this.parseNews(data);
    });
    return news.slice(0, limit);
  }

  async getIpoCalendar(days = 14): Promise<CalendarEvent[]> {
    const from = DateTime.utc();
    const to = from.plus({ days });
    return this.cachedList(`calendar:ipo:${days}`, calendarEventSchema, async () => {
      const data = await this.fetch('/calendar/ipo', { from: isoDate(from), to: isoDate(to) });
      const parsed = ipoCalendarSchema.safeParse(data);
      if (!parsed.success) {
        this.logMalformed('ipo-calendar', parsed.error.issues[0]?.message ?? 'invalid');
        return [];
      }
      return (parsed.data.ipoCalendar ?? []).map((item) => ({
        symbol: item.symbol ?? '',
        eventType: 'ipo' as const,
        date: item.date,
        description: `IPO - ${item.name ?? 'Unknown Company'}${item.exchange ? ` (${item.exchange})` : ''}`,
      }));
    });
  }

  async getEarningsCalendar(days = 7): Promise<CalendarEvent[]> {
    const from = DateTime.utc();
    const to = from.plus({ days });
    return this.cachedList(`calendar:earnings:${days}`, calendarEventSchema, async () => {
      const data = await this.fetch('/calendar/earnings', { from: isoDate(from), to: isoDate(to) });
      const parsed = earningsCalendarSchema.safeParse(data);
      if (!parsed.success) {
        this.logMalformed('earnings-calendar', parsed.error.issues[0]?.message ?? 'invalid');
        return [];
      }
      return (parsed.data.earningsCalendar ?? []).map((item) => ({
        symbol: item.symbol,
        eventType: 'earnings' as const,
        date: item.date,
        description: `Earnings - EPS Est: ${item.epsEstimate ?? 'N/A'}`,
        estimate: item.epsEstimate,
        actual: item.epsActual,
      }));
    });
  }

  private parseNews(data: unknown, symbol?: string): NewsItem[] {
    const parsed = rawNewsSchema.safeParse(data);
    if (!parsed.success) {
      this.logMalformed(symbol ?? 'market-news', parsed.error.issues[0]?.message ?? 'invalid');
      return [];
    }
    return parsed.data.filter((item) => item.headline).map((item) => toNewsItem(item, symbol));
  }

  private async cachedList<T>(
    key: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    loader: () => Promise<T[]>,
  ): Promise<T[]> {
    if (!this.ensureKey()) {
      return [];
    }
    return this.cache.getOrLoad(key, this.ttlSeconds, z.array(itemSchema), loader);
  }

  private async fetch(path: string, params: Record<string, string>): Promise<unknown> {
    try {
      const data = await this.restGet(this.restClient, path, { params, retryDelayMs: 500 });
      this.recordSuccess();
      return data;
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
  }

  private ensureKey(): boolean {
    if (this.apiKey) {
      return true;
    }
    if (!this.warnedMissingKey) {
      this.warnedMissingKey = true;
      this.logger.warn(JSON.stringify({ event: 'finnhub_missing_api_key', provider: this.provider }));
    }
    return false;
  }
}
