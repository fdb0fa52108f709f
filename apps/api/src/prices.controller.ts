import { Body, Controller, Get, HttpCode, Inject, Logger, Optional, Param, Post } from '@nestjs/common';
import { ProviderUnavailableError, SymbolNotFoundError, errorMessage } from '@libs/core';
import {
  NOTIFICATION_SINK,
  NotificationSink,
  PriceAggregatorService,
  PriceRecord,
  ProviderStatus,
} from '@libs/market-data';
import { bulkPricesSchema, parseOrBadRequest } from './validation';

export const MAJOR_CRYPTO_SYMBOLS = ['BTC', 'ETH', 'SOL', 'AVAX', 'MATIC', 'ADA', 'DOT', 'LINK'] as const;

interface BulkPricesResponse {
  data: PriceRecord[];
  failedSymbols: string[];
  requested: number;
  timestamp: string;
}

@Controller('api/v1/prices')
export class PricesController {
  private readonly logger = new Logger(PricesController.name);

  constructor(
    private readonly aggregator: PriceAggregatorService,
    @Optional() @Inject(NOTIFICATION_SINK) private readonly notifier: NotificationSink | null = null,
  ) {}

  @Get('status/providers')
  providerStatus(): ProviderStatus {
    return this.aggregator.getProviderStatus();
  }

  // Alerts only when fewer than half of the majors resolved.
  @Get('crypto/major')
  async majorCrypto(): Promise<BulkPricesResponse> {
    const response = await this.collect([...MAJOR_CRYPTO_SYMBOLS]);
    if (response.data.length < MAJOR_CRYPTO_SYMBOLS.length / 2) {
      this.logger.warn(
        JSON.stringify({ event: 'major_crypto_degraded', resolved: response.data.length, requested: response.requested }),
      );
      this.notifier
        ?.notifyError('Major crypto prices', `Only ${response.data.length}/${response.requested} symbols resolved`)
        .catch((error: unknown) => {
          this.logger.warn(JSON.stringify({ event: 'notification_failed', message: errorMessage(error) }));
        });
    }
    return response;
  }

  @Get(':symbol')
  async getPrice(@Param('symbol') symbol: string): Promise<PriceRecord> {
    const record = await this.aggregator.getPrice(symbol);
    if (!record) {
      if (!this.aggregator.canServe(symbol)) {
        throw new ProviderUnavailableError('prices', `no ready provider for ${symbol.toUpperCase()}`);
      }
      throw new SymbolNotFoundError(symbol.toUpperCase());
    }
    return record;
  }

  @Post('bulk')
  @HttpCode(200)
  getBulkPrices(@Body() body: unknown): Promise<BulkPricesResponse> {
    const { symbols } = parseOrBadRequest(bulkPricesSchema, body);
    return this.collect(symbols);
  }

  private async collect(symbols: string[]): Promise<BulkPricesResponse> {
    const records = await this.aggregator.getBulkPrices(symbols);
    const data: PriceRecord[] = [];
    const failedSymbols: string[] = [];
    records.forEach((record, index) => {
      if (record) {
        data.push(record);
      } else {
        failedSymbols.push(symbols[index].toUpperCase());
      }
    });
    return { data, failedSymbols, requested: symbols.length, timestamp: new Date().toISOString() };
  }
}
