import { Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { errorMessage } from '@libs/core';
import { PriceProvider } from '../interfaces';
import { PriceRecord, ProviderSnapshot } from '../models';
import { runWithConcurrency, sleep } from '../utils/async.util';
import { httpStatusOf, isRetryableHttpError } from '../utils/http.util';

export interface RestGetOptions {
  params?: Record<string, unknown>;
  /** Total tries, counting the first. */
  attempts?: number;
  retryDelayMs?: number;
}

export abstract class BaseRestProvider implements PriceProvider {
  readonly provider: string;
  readonly servesPrices: boolean = true;
  readonly supportsBulk: boolean = false;
  readonly requiresExclusiveSession: boolean = false;
  readonly probeSymbol: string | undefined = undefined;
  protected readonly logger: Logger;
  protected connected = false;
  protected lastMessageTs: number | null = null;
  protected reconnects = 0;
  protected failures = 0;
  protected lastError: string | null = null;

  protected constructor(provider: string, private readonly bulkConcurrency = 3) {
    this.provider = provider;
    this.logger = new Logger(`${provider}-provider`);
  }

  async initialize(): Promise<boolean> {
    this.connected = await this.healthCheck();
    return this.connected;
  }

  abstract healthCheck(): Promise<boolean>;

  abstract getPrice(symbol: string): Promise<PriceRecord | null>;

  /** Loop over `getPrice` for sources without a bulk endpoint; one failure never sinks the batch. */
  async getBulkPrices(symbols: string[]): Promise<Array<PriceRecord | null>> {
    const results: Array<PriceRecord | null> = symbols.map(() => null);
    await runWithConcurrency(symbols, this.bulkConcurrency, async (symbol, index) => {
      try {
        results[index] = await this.getPrice(symbol);
      } catch (error) {
        this.recordFailure(error);
        this.logger.warn(
          JSON.stringify({
            event: 'bulk_item_failed',
            provider: this.provider,
            symbol,
            message: errorMessage(error),
          }),
        );
      }
    });
    return results;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.provider,
      connected: this.connected,
      lastMessageTs: this.lastMessageTs,
      reconnects: this.reconnects,
      failures: this.failures,
      lastError: this.lastError,
    };
  }

  /**
   * GET returning the raw body. Transient failures (network, 429, 5xx) are
   * tried again after a linear pause; anything else surfaces at once.
   */
  protected async restGet(client: AxiosInstance, path: string, options: RestGetOptions = {}): Promise<unknown> {
    const { params, attempts = 2, retryDelayMs = 300 } = options;
    for (let attempt = 1; ; attempt += 1) {
      try {
        const response = await client.get<unknown>(path, { params });
        return response.data;
      } catch (error) {
        if (attempt >= attempts || !isRetryableHttpError(error)) {
          throw error;
        }
        this.logger.warn(
          JSON.stringify({
            event: 'http_retry',
            provider: this.provider,
            path,
            attempt,
            status: httpStatusOf(error) ?? null,
            message: errorMessage(error),
          }),
        );
        await sleep(retryDelayMs * attempt);
      }
    }
  }

  protected recordSuccess(): void {
    this.lastMessageTs = Date.now();
  }

  protected recordFailure(error: unknown): void {
    this.failures += 1;
    this.lastError = errorMessage(error);
  }

  protected logMalformed(symbol: string, detail: string): void {
    this.failures += 1;
    this.lastError = detail;
    this.logger.warn(
      JSON.stringify({ event: 'malformed_response', provider: this.provider, symbol, detail }),
    );
  }
}
