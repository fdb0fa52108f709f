import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { BinancePriceProvider, MexcPriceProvider } from '@libs/market-data';
import { StubReply, stubHttp } from './support/http-stub';

const tickers = [
  { symbol: 'BTCUSDT', lastPrice: '65000.5', priceChange: '-100', priceChangePercent: '-0.15', volume: '1234' },
  { symbol: 'ETHUSDT', lastPrice: '0', priceChange: '0', priceChangePercent: '0', volume: '0' },
  { symbol: 'WAIUSDT', lastPrice: '0.42', priceChange: '0.02', priceChangePercent: '5', volume: '900' },
];

describe('spot exchange providers', () => {
  let restore: () => void = () => undefined;
  let requests: string[] = [];
  let reply: (url: string, params: unknown) => StubReply;

  beforeEach(() => {
    requests = [];
    reply = () => ({ status: 200, data: tickers });
    restore = stubHttp((config) => {
      requests.push(config.url ?? '');
      return reply(config.url ?? '', config.params);
    });
  });

  afterEach(() => {
    restore();
  });

  it('maps symbols to USDT pairs', () => {
    const binance = new BinancePriceProvider(new ConfigService({}));
    expect(binance.toPair('BTC')).toBe('BTCUSDT');
    expect(binance.toPair('pepe-usd')).toBe('PEPEUSDT');
    expect(binance.toPair('ETHUSDT')).toBe('ETHUSDT');
  });

  it('answers a bulk request from one ticker download', async () => {
    const binance = new BinancePriceProvider(new ConfigService({}));
    const records = await binance.getBulkPrices(['btc', 'ETH', 'DOGE']);

    expect(requests).toEqual(['/api/v3/ticker/24hr']);
    expect(records[0]).toMatchObject({
      symbol: 'BTC',
      assetClass: 'CRYPTO',
      price: 65000.5,
      changePercent: -0.15,
      changeAbsolute: -100,
      volume: 1234,
      source: 'binance',
    });
    // zero price
    expect(records[1]).toBeNull();
    expect(records[2]).toBeNull();
  });

  it('returns null for a pair the exchange rejects', async () => {
    reply = () => ({ status: 400, data: { code: -1121, msg: 'Invalid symbol.' } });
    const binance = new BinancePriceProvider(new ConfigService({}));
    await expect(binance.getPrice('NOPE')).resolves.toBeNull();
    expect(requests).toHaveLength(1);
  });

  it('tries once more after a server error', async () => {
    let calls = 0;
    reply = () => {
      calls += 1;
      return calls === 1 ? { status: 503, data: { msg: 'busy' } } : { status: 200, data: tickers[0] };
    };
    const binance = new BinancePriceProvider(new ConfigService({}));
    expect((await binance.getPrice('BTC'))?.price).toBe(65000.5);
    expect(requests).toHaveLength(2);
  });

  it('gives up after the second server error', async () => {
    reply = () => ({ status: 502, data: {} });
    const binance = new BinancePriceProvider(new ConfigService({}));
    await expect(binance.getPrice('BTC')).rejects.toThrow();
    expect(requests).toHaveLength(2);
    expect(binance.getSnapshot().failures).toBe(1);
  });

  it('returns null for a malformed ticker', async () => {
    reply = () => ({ status: 200, data: { symbol: 'BTCUSDT' } });
    const binance = new BinancePriceProvider(new ConfigService({}));
    await expect(binance.getPrice('BTC')).resolves.toBeNull();
  });

  it('uses pair overrides and reports the mexc source', async () => {
    reply = (_url, params) => {
      expect(params).toEqual({ symbol: 'WAIUSDT' });
      return { status: 200, data: tickers[2] };
    };
    const mexc = new MexcPriceProvider(new ConfigService({}));
    const record = await mexc.getPrice('WAI');
    expect(record?.price).toBe(0.42);
    expect(record?.changePercent).toBe(5);
    expect(record?.source).toBe('mexc');
  });
});
