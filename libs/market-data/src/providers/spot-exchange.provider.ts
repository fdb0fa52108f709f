import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { classifyAsset, normalizeSymbol } from '../instrument-classifier';
import { PriceRecord } from '../models';
import { httpStatusOf } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';

const QUOTE_SUFFIXES = ['-USDT', '-USD', 'USDT'];

const ticker24hSchema = z.object({
  symbol: z.string(),
  lastPrice: z.coerce.number(),
  priceChange: z.coerce.number(),
  priceChangePercent: z.coerce.number(),
  volume: z.coerce.number().optional(),
});

type Ticker24h = z.infer<typeof ticker24hSchema>;

const tickerListSchema = z.array(z.object({ symbol: z.string() }).passthrough());

/**
 * Spot exchange speaking the `/api/v3` REST dialect. The full 24h ticker set
 * answers any number of symbols with one request.
 */
export abstract class SpotExchangeProvider extends BaseRestProvider {
  readonly supportsBulk = true;

  protected constructor(
    provider: string,
    protected readonly restClient: AxiosInstance,
    private readonly pairOverrides: Record<string, string>,
  ) {
    super(provider);
  }

  toPair(symbol: string): string {
    const normalized = normalizeSymbol(symbol);
    const override = this.pairOverrides[normalized];
    if (override) {
      return override;
    }
    const suffix = QUOTE_SUFFIXES.find((candidate) => normalized.endsWith(candidate));
    const base = suffix ? normalized.slice(0, -suffix.length) : normalized;
    return `${base.replace(/[^A-Z0-9]/g, '')}USDT`;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.restClient.get('/api/v3/ping');
      this.recordSuccess();
      return true;
    } catch (error) {
      this.recordFailure(error);
      return false;
    }
  }

  async getPrice(symbol: string): Promise<PriceRecord | null> {
    const pair = this.toPair(symbol);
    let payload: unknown;
    try {
      payload = await this.restGet(this.restClient, '/api/v3/ticker/24hr', { params: { symbol: pair } });
    } catch (error) {
      // unknown pair
      if (httpStatusOf(error) === 400) {
        return null;
      }
      this.recordFailure(error);
      throw error;
    }

    const parsed = ticker24hSchema.safeParse(payload);
    if (!parsed.success) {
      this.logMalformed(symbol, parsed.error.issues[0]?.message ?? 'invalid ticker');
      return null;
    }
    this.recordSuccess();
    return this.toRecord(symbol, parsed.data);
  }

  async getBulkPrices(symbols: string[]): Promise<Array<PriceRecord | null>> {
    if (!symbols.length) {
      return [];
    }
    const payload = await this.restGet(this.restClient, '/api/v3/ticker/24hr', { retryDelayMs: 500 }).catch(
      (error: unknown) => {
        this.recordFailure(error);
        throw error;
      },
    );

    const list = tickerListSchema.safeParse(payload);
    if (!list.success) {
      this.logMalformed('*', 'ticker list is not an array');
      return symbols.map(() => null);
    }
    this.recordSuccess();

    const byPair = new Map(list.data.map((item) => [item.symbol, item]));
    return symbols.map((symbol) => {
      const raw = byPair.get(this.toPair(symbol));
      if (!raw) {
        return null;
      }
      const parsed = ticker24hSchema.safeParse(raw);
      if (!parsed.success) {
        this.logMalformed(symbol, parsed.error.issues[0]?.message ?? 'invalid ticker');
        return null;
      }
      return this.toRecord(symbol, parsed.data);
    });
  }

  private toRecord(symbol: string, ticker: Ticker24h): PriceRecord | null {
    if (!(ticker.lastPrice > 0)) {
      return null;
    }
    const canonical = normalizeSymbol(symbol);
    return {
      symbol: canonical,
      assetClass: classifyAsset(canonical),
      price: ticker.lastPrice,
      changePercent: ticker.priceChangePercent,
      changeAbsolute: ticker.priceChange,
      volume: ticker.volume,
      timestamp: new Date().toISOString(),
      source: this.provider,
    };
  }
}
