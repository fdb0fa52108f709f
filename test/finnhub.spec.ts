import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { FinnhubProvider } from '@libs/market-data';
import { StubReply, stubHttp } from './support/http-stub';
import { InMemoryKeyValueStore } from './support/in-memory-store';

const article = (index: number) => ({
  headline: `Headline ${index}`,
  summary: 'Summary',
  source: 'Wire',
  url: `https://news.test/${index}`,
  datetime: 1767225600,
});

describe('Finnhub provider', () => {
  let restore: () => void = () => undefined;
  let paths: string[] = [];
  let reply: (path: string) => StubReply;

  const build = () =>
    new FinnhubProvider(
      new ConfigService({ FINNHUB_API_KEY: 'test-key', FINNHUB_REST_URL: 'http://finnhub.test' }),
      new InMemoryKeyValueStore(),
    );

  beforeEach(() => {
    paths = [];
    restore = stubHttp((config) => {
      paths.push(config.url ?? '');
      return reply(config.url ?? '');
    });
  });

  afterEach(() => {
    restore();
  });

  it('limits company news and drops items without a headline', async () => {
    reply = () => ({
      status: 200,
      data: [{ ...article(0), headline: '' }, ...Array.from({ length: 12 }, (_, index) => article(index + 1))],
    });

    const news = await build().getCompanyNews('aapl');

    expect(news).toHaveLength(10);
    expect(news[0]).toEqual({
      headline: 'Headline 1',
      summary: 'Summary',
      source: 'Wire',
      url: 'https://news.test/1',
      timestamp: '2026-01-01T00:00:00.000Z',
      symbol: 'AAPL',
    });
  });

  it('serves repeated market news from the cache', async () => {
    reply = () => ({ status: 200, data: [article(1), article(2), article(3)] });
    const finnhub = build();

    const first = await finnhub.getMarketNews('general', 2);
    const second = await finnhub.getMarketNews('general', 3);

    expect(first.map((item) => item.headline)).toEqual(['Headline 1', 'Headline 2']);
    expect(second).toHaveLength(3);
    expect(second[0]).not.toHaveProperty('symbol');
    expect(paths).toEqual(['/news']);
  });

  it('describes IPO and earnings events', async () => {
    reply = (path) =>
      path === '/calendar/ipo'
        ? {
            status: 200,
            data: {
              ipoCalendar: [
                { symbol: 'NEWCO', name: 'NewCo Inc', date: '2026-10-25', exchange: 'NASDAQ' },
                { symbol: null, name: null, date: '2026-10-30', exchange: null },
              ],
            },
          }
        : {
            status: 200,
            data: {
              earningsCalendar: [
                { symbol: 'AAPL', date: '2026-10-28', epsEstimate: 1.25, epsActual: null },
                { symbol: 'MSFT', date: '2026-10-29', epsEstimate: null },
              ],
            },
          };
    const finnhub = build();

    const ipos = await finnhub.getIpoCalendar();
    const earnings = await finnhub.getEarningsCalendar();

    expect(ipos.map((event) => [event.symbol, event.description])).toEqual([
      ['NEWCO', 'IPO - NewCo Inc (NASDAQ)'],
      ['', 'IPO - Unknown Company'],
    ]);
    expect(earnings.map((event) => event.description)).toEqual([
      'Earnings - EPS Est: 1.25',
      'Earnings - EPS Est: N/A',
    ]);
    expect(earnings[0]?.estimate).toBe(1.25);
  });

  it('returns empty results without an API key', async () => {
    reply = () => ({ status: 200, data: [article(1)] });
    const keyless = new FinnhubProvider(new ConfigService({ FINNHUB_REST_URL: 'http://finnhub.test' }), null);

    expect(await keyless.getMarketNews()).toEqual([]);
    expect(await keyless.healthCheck()).toBe(false);
    expect(paths).toEqual([]);
  });
});
