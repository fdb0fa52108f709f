import { AssetClass } from './models';

const CRYPTO_MARKERS = ['-USD', '-USDT', 'BTC', 'ETH', 'USDT'];

const CRYPTO_BASES = new Set([
  'SOL', 'XRP', 'ADA', 'DOGE', 'DOT', 'AVAX', 'MATIC', 'LINK', 'UNI', 'AAVE',
  'LTC', 'BNB', 'TRX', 'ATOM', 'SHIB', 'PEPE', 'XLM', 'NEAR', 'ARB', 'OP',
]);

const CURRENCIES = new Set([
  'USD', 'EUR', 'GBP', 'JPY', 'CHF', 'AUD', 'CAD', 'NZD', 'SEK', 'NOK', 'DKK',
  'SGD', 'HKD', 'CNH', 'MXN', 'ZAR', 'TRY', 'PLN', 'HUF', 'CZK', 'ILS', 'INR',
]);

const INDEX_TICKERS = new Set(['SPY', 'QQQ', 'IWM', 'VIX', 'DXY']);

const COMMODITY_MARKERS = ['GOLD', 'SILVER', 'OIL', 'BRENT', 'NATGAS', 'COPPER', 'XAUUSD', 'XAGUSD'];

export const normalizeSymbol = (symbol: string): string =>
  symbol.trim().toUpperCase().replace(/^\$/, '');

const isCurrencyPair = (symbol: string): boolean =>
  /^[A-Z]{6}$/.test(symbol) && CURRENCIES.has(symbol.slice(0, 3)) && CURRENCIES.has(symbol.slice(3));

/**
 * Maps a symbol to its asset class from its shape alone. Total and pure:
 * unrecognised input is an equity.
 */
export const classifyAsset = (rawSymbol: string): AssetClass => {
  const symbol = normalizeSymbol(rawSymbol);

  if (CRYPTO_MARKERS.some((marker) => symbol.includes(marker)) || CRYPTO_BASES.has(symbol)) {
    return 'CRYPTO';
  }
  if (symbol.endsWith('=X') || isCurrencyPair(symbol)) {
    return 'FOREX';
  }
  if (symbol.startsWith('^') || INDEX_TICKERS.has(symbol)) {
    return 'INDEX';
  }
  if (
    symbol.endsWith('=F') ||
    COMMODITY_MARKERS.some((marker) => symbol.includes(marker))
  ) {
    return 'COMMODITY';
  }
  return 'EQUITY';
};
