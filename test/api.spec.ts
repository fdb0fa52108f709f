import { describe, expect, it } from 'vitest';
import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderUnavailableError, SymbolNotFoundError } from '@libs/core';
import {
  AggregatorStatsService,
  FredProvider,
  PriceAggregatorService,
  PriceCacheService,
  ProviderRegistryService,
} from '@libs/market-data';
import { overallStatus } from '../apps/api/src/health.controller';
import { MacroController } from '../apps/api/src/macro.controller';
import { PricesController } from '../apps/api/src/prices.controller';
import { bulkPricesSchema, parseOrBadRequest, symbolListQuerySchema } from '../apps/api/src/validation';
import { FakeProvider, RecordingNotifier } from './support/fake-provider';

const controller = (ready = true, notifier: RecordingNotifier | null = null, prices: Record<string, number> = { BTC: 65000 }) => {
  const config = new ConfigService({ PROVIDERS_ENABLED: 'binance', BULK_BATCH_PAUSE_MS: 0 });
  const binance = new FakeProvider('binance', true);
  for (const [symbol, price] of Object.entries(prices)) {
    binance.prices.set(symbol, price);
  }
  const registry = new ProviderRegistryService(config, [binance]);
  registry.setReady('binance', ready);
  const aggregator = new PriceAggregatorService(
    config,
    registry,
    new PriceCacheService(config, null),
    new AggregatorStatsService(),
    null,
  );
  return new PricesController(aggregator, notifier);
};

describe('api', () => {
  it('derives overall health from provider readiness', () => {
    expect(overallStatus({ binance: true, ig: true })).toBe('healthy');
    expect(overallStatus({ binance: true, ig: false })).toBe('degraded');
    expect(overallStatus({ binance: false })).toBe('unhealthy');
    expect(overallStatus({})).toBe('unhealthy');
  });

  it('validates bulk request bodies', () => {
    expect(parseOrBadRequest(bulkPricesSchema, { symbols: [' btc '] })).toEqual({ symbols: ['btc'] });
    expect(() => parseOrBadRequest(bulkPricesSchema, { symbols: [] })).toThrow(BadRequestException);
    expect(() => parseOrBadRequest(bulkPricesSchema, 'BTC')).toThrow(BadRequestException);
  });

  it('parses directory listing queries', () => {
    expect(parseOrBadRequest(symbolListQuerySchema, { asset_class: 'equity', limit: '5' })).toEqual({
      asset_class: 'EQUITY',
      active_only: true,
      limit: 5,
      offset: 0,
    });
    expect(() => parseOrBadRequest(symbolListQuerySchema, { asset_class: 'bonds' })).toThrow(BadRequestException);
  });

  it('splits bulk results into data and failures', async () => {
    const response = await controller().getBulkPrices({ symbols: ['btc', 'doge'] });
    expect(response.data.map((record) => record.symbol)).toEqual(['BTC']);
    expect(response.failedSymbols).toEqual(['DOGE']);
    expect(response.requested).toBe(2);
  });

  it('reports unknown symbols as not found', async () => {
    await expect(controller().getPrice('NOPE')).rejects.toBeInstanceOf(SymbolNotFoundError);
  });

  it('reports a missing price as unavailable when no provider is ready', async () => {
    await expect(controller(false).getPrice('BTC')).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it('alerts when most major cryptocurrencies are missing', async () => {
    const notifier = new RecordingNotifier();
    const response = await controller(true, notifier).majorCrypto();

    expect(response.requested).toBe(8);
    expect(response.data.map((record) => record.symbol)).toEqual(['BTC']);
    expect(response.failedSymbols).toEqual(['ETH', 'SOL', 'AVAX', 'MATIC', 'ADA', 'DOT', 'LINK']);
    expect(notifier.errors).toEqual(['Major crypto prices: Only 1/8 symbols resolved']);
  });

  it('stays quiet when half of the major cryptocurrencies resolve', async () => {
    const notifier = new RecordingNotifier();
    const prices = { BTC: 65000, ETH: 3200, SOL: 150, AVAX: 30 };
    const response = await controller(true, notifier, prices).majorCrypto();

    expect(response.data).toHaveLength(4);
    expect(notifier.errors).toEqual([]);
  });

  it('answers 404 for series names outside the catalog', async () => {
    const macro = new MacroController(new FredProvider(new ConfigService({ FRED_REST_URL: 'http://fred.test' }), null));
    await expect(macro.series('constructor')).rejects.toBeInstanceOf(NotFoundException);
    await expect(macro.series('__proto__')).rejects.toBeInstanceOf(NotFoundException);
  });
});
