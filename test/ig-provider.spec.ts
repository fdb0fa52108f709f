import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders } from 'axios';
import { AuthExpiredError } from '@libs/core';
import {
  IgClient,
  IgPriceProvider,
  SymbolDirectoryService,
  SymbolDiscoveryService,
  isSessionError,
} from '@libs/market-data';
import { StubReply, stubHttp } from './support/http-stub';
import { InMemorySymbolDirectory } from './support/in-memory-directory';

const igConfig = () =>
  new ConfigService({
    IG_USERNAME: 'test-user',
    IG_PASSWORD: 'test-secret',
    IG_API_KEY: 'test-key',
    IG_REST_URL: 'http://ig.test',
  });

const usdJpyMarket = {
  instrument: { epic: 'CS.D.USDJPY.TODAY.IP', name: 'USD/JPY', type: 'CURRENCIES' },
  snapshot: { bid: 15000, offer: 15002, netChange: 50, percentageChange: 0.33, marketStatus: 'TRADEABLE' },
};

describe('IG provider', () => {
  let restore: () => void = () => undefined;
  let logins = 0;
  let searches = 0;
  let expiredTokens = new Set<string>();
  let marketReply: (epic: string) => StubReply;

  const build = () => {
    const config = igConfig();
    const client = new IgClient(config);
    const directory = new SymbolDirectoryService(new InMemorySymbolDirectory());
    const discovery = new SymbolDiscoveryService(config, client, directory);
    return { client, directory, provider: new IgPriceProvider(client, directory, discovery) };
  };

  beforeEach(() => {
    logins = 0;
    searches = 0;
    expiredTokens = new Set();
    marketReply = () => ({ status: 200, data: usdJpyMarket });
    restore = stubHttp((config) => {
      if (config.method === 'post' && config.url === '/session') {
        logins += 1;
        return {
          status: 200,
          data: {},
          headers: { cst: `cst-${logins}`, 'x-security-token': `xst-${logins}` },
        };
      }
      const cst = String(config.headers.get('CST'));
      if (expiredTokens.has(cst)) {
        return { status: 401, data: { errorCode: 'error.security.client-token-invalid' } };
      }
      if (config.url === '/markets') {
        searches += 1;
        return { status: 200, data: { markets: [] } };
      }
      return marketReply(decodeURIComponent((config.url ?? '').replace('/markets/', '')));
    });
  });

  afterEach(() => {
    restore();
  });

  it('rescales broker quotes', async () => {
    const { provider } = build();
    const record = await provider.getPrice('usdjpy=x');
    expect(record).toMatchObject({
      symbol: 'USDJPY=X',
      assetClass: 'FOREX',
      price: 150,
      changeAbsolute: 0.5,
      changePercent: 0.33,
      source: 'ig',
    });
  });

  it('falls back to the offer and drops non-positive quotes', async () => {
    const { provider } = build();
    marketReply = () => ({
      status: 200,
      data: { ...usdJpyMarket, snapshot: { bid: 0, offer: 15100, netChange: 0, percentageChange: 0 } },
    });
    expect((await provider.getPrice('USDJPY'))?.price).toBe(151);

    marketReply = () => ({ status: 200, data: { ...usdJpyMarket, snapshot: { bid: 0, offer: 0 } } });
    await expect(provider.getPrice('USDJPY')).resolves.toBeNull();
  });

  it('serves nothing for a deactivated mapping and does not rediscover it', async () => {
    const { directory, provider } = build();
    await directory.save({ symbol: 'AAPL', epic: 'UA.D.AAPL.DAILY.IP', displayName: 'Apple', assetClass: 'EQUITY' });
    await directory.deactivate('AAPL');

    await expect(provider.getPrice('AAPL')).resolves.toBeNull();
    expect(searches).toBe(0);
    expect((await directory.find('AAPL'))?.active).toBe(false);
  });

  it('describes an epic with its directory symbol', async () => {
    const { directory, provider } = build();
    await directory.save({ symbol: 'USDJPY=X', epic: 'CS.D.USDJPY.TODAY.IP', displayName: 'USD/JPY', assetClass: 'FOREX' });
    marketReply = () => ({
      status: 200,
      data: {
        ...usdJpyMarket,
        instrument: {
          ...usdJpyMarket.instrument,
          name: 'USD/JPY Cash',
          marketId: 'USDJPY',
          currencies: [
            { code: 'USD', isDefault: false },
            { code: 'JPY', isDefault: true },
          ],
        },
      },
    });

    expect(await provider.getMarketMetadata('CS.D.USDJPY.TODAY.IP')).toMatchObject({
      epic: 'CS.D.USDJPY.TODAY.IP',
      name: 'USD/JPY Cash',
      displayName: 'USD/JPY',
      instrumentType: 'CURRENCIES',
      marketId: 'USDJPY',
      currency: 'JPY',
      country: null,
      symbol: 'USDJPY=X',
      source: 'ig',
    });
  });

  it('returns no metadata for an epic the broker does not list', async () => {
    const { provider } = build();
    marketReply = () => ({ status: 404, data: { errorCode: 'error.service.marketdata.instrument.epic.unavailable' } });
    await expect(provider.getMarketMetadata('IX.D.NOPE.DAILY.IP')).resolves.toBeNull();
  });

  it('logs in once for concurrent requests', async () => {
    const { client, provider } = build();
    const records = await Promise.all(['USDJPY', 'USDJPY=X', 'USDJPY', 'USDJPY=X'].map((s) => provider.getPrice(s)));
    expect(records.every((record) => record?.price === 150)).toBe(true);
    expect(client.logins).toBe(1);
  });

  it('re-authenticates once when the session expires under load', async () => {
    const { client, provider } = build();
    await client.ensureSession();
    expiredTokens.add('cst-1');

    const records = await Promise.all(['USDJPY', 'USDJPY', 'USDJPY'].map((s) => provider.getPrice(s)));

    expect(records.map((record) => record?.price)).toEqual([150, 150, 150]);
    expect(client.logins).toBe(2);
    expect(provider.getSnapshot().reconnects).toBe(3);
  });

  it('surfaces a second auth failure after the single retry', async () => {
    const { client, provider } = build();
    await client.ensureSession();
    expiredTokens.add('cst-1');
    expiredTokens.add('cst-2');
    await expect(provider.getPrice('USDJPY')).rejects.toBeInstanceOf(AuthExpiredError);
    expect(client.logins).toBe(2);
  });

  it('reports unconfigured credentials without calling the broker', async () => {
    const config = new ConfigService({ IG_REST_URL: 'http://ig.test' });
    const client = new IgClient(config);
    const directory = new SymbolDirectoryService(new InMemorySymbolDirectory());
    const provider = new IgPriceProvider(client, directory, new SymbolDiscoveryService(config, client, directory));
    await expect(provider.initialize()).resolves.toBe(false);
    await expect(provider.getPrice('EURUSD')).resolves.toBeNull();
    expect(logins).toBe(0);
  });

  it('treats 401, 403 and token error codes as session loss', () => {
    const response = (status: number, data: unknown) =>
      new AxiosError('failed', 'ERR_BAD_REQUEST', undefined, null, {
        status,
        statusText: String(status),
        data,
        headers: {},
        config: { headers: new AxiosHeaders() },
      });
    expect(isSessionError(response(401, {}))).toBe(true);
    expect(isSessionError(response(403, {}))).toBe(true);
    expect(isSessionError(response(400, { errorCode: 'error.security.oauth-token-invalid' }))).toBe(true);
    expect(isSessionError(response(404, { errorCode: 'error.service.marketdata.instrument.epic.unavailable' }))).toBe(false);
  });
});
