import { classifyAsset, normalizeSymbol } from '../instrument-classifier';
import { AssetClass, MarketSearchResult } from '../models';

const VENUE_SUFFIXES = [/\s+DFB$/i, /\s+CFD$/i, /\s+Cash$/i, /\s+\([^)]*\)$/];

const DISPLAY_NAME_ALIASES: ReadonlyMap<string, string> = new Map([
  ['US 500', 'S&P 500'],
  ['Wall Street', 'Dow Jones'],
  ['US Tech 100', 'Nasdaq 100'],
  ['US Russell 2000', 'Russell 2000'],
  ['Germany 40', 'DAX'],
  ['France 40', 'CAC 40'],
  ['EU Stocks 50', 'Euro Stoxx 50'],
  ['Japan 225', 'Nikkei 225'],
  ['Hong Kong HS50', 'Hang Seng'],
  ['Spot Gold', 'Gold'],
  ['Spot Silver', 'Silver'],
]);

const INSTRUMENT_TYPE_CLASSES: Record<string, AssetClass> = {
  CURRENCIES: 'FOREX',
  INDICES: 'INDEX',
  COMMODITIES: 'COMMODITY',
  SHARES: 'EQUITY',
  CRYPTOCURRENCY: 'CRYPTO',
};

export const cleanDisplayName = (rawName: string): string => {
  let name = rawName.trim();
  let previous = '';
  while (name !== previous) {
    previous = name;
    for (const suffix of VENUE_SUFFIXES) {
      name = name.replace(suffix, '').trim();
    }
  }
  return DISPLAY_NAME_ALIASES.get(name) ?? name;
};

/** Instrument type wins, then the epic's code family, then the ticker's shape. */
export const inferAssetClass = (symbol: string, epic: string, instrumentType?: string): AssetClass => {
  const fromType = instrumentType ? INSTRUMENT_TYPE_CLASSES[instrumentType.toUpperCase()] : undefined;
  if (fromType) {
    return fromType;
  }
  const upperEpic = epic.toUpperCase();
  if (upperEpic.startsWith('IX.D.')) return 'INDEX';
  if (upperEpic.startsWith('CC.D.') || upperEpic.startsWith('MT.D.')) return 'COMMODITY';
  if (upperEpic.startsWith('CS.D.')) {
    return /GOLD|SILVER|COPPER|USC/.test(upperEpic) ? 'COMMODITY' : 'FOREX';
  }
  if (/^(UA|UC|SH)\.D\./.test(upperEpic)) return 'EQUITY';
  return classifyAsset(symbol);
};

export const searchTermFor = (symbol: string): string =>
  normalizeSymbol(symbol).replace(/^\^/, '').replace(/=[XF]$/, '');

/**
 * Picks one tradeable, streaming candidate: an exact (case-insensitive) name
 * match if there is one, otherwise the first in the broker's order.
 */
export const selectCandidate = (
  term: string,
  candidates: MarketSearchResult[],
): MarketSearchResult | null => {
  const eligible = candidates.filter(
    (candidate) => candidate.marketStatus === 'TRADEABLE' && candidate.streamingPricesAvailable,
  );
  const wanted = term.trim().toLowerCase();
  return (
    eligible.find((candidate) => candidate.instrumentName.trim().toLowerCase() === wanted) ??
    eligible[0] ??
    null
  );
};
