const CURRENCY_FAMILY_PREFIX = 'CS.D.';
const CURRENCY_FAMILY_SUFFIXES = ['.TODAY.IP', '.CFD.IP'];
const UNSCALED_CURRENCY_KEYWORDS = ['GOLD', 'SILVER', 'COPPER', 'USC'];
const UNSCALED_PREFIXES = ['IX.D.', 'CC.D.', 'MT.D.'];
const EQUITY_PREFIXES = ['UA.D.', 'UC.D.', 'SH.D.'];
const EQUITY_SUFFIX = '.DAILY.IP';

const isCurrencyFamily = (epic: string): boolean =>
  epic.startsWith(CURRENCY_FAMILY_PREFIX) &&
  CURRENCY_FAMILY_SUFFIXES.some((suffix) => epic.endsWith(suffix));

/**
 * Divisor turning the broker's fixed-point quote into a real price.
 * Rules are ordered; the first that matches wins.
 */
export const normalizationFactor = (epic: string, symbol: string): number => {
  const upperEpic = epic.toUpperCase();
  const upperSymbol = symbol.toUpperCase();

  if (isCurrencyFamily(upperEpic)) {
    if (UNSCALED_CURRENCY_KEYWORDS.some((keyword) => upperEpic.includes(keyword))) {
      return 1;
    }
    if (upperSymbol.includes('USDJPY') || upperEpic.includes('USDJPY')) {
      return 100;
    }
    return 10000;
  }
  if (UNSCALED_PREFIXES.some((prefix) => upperEpic.startsWith(prefix))) {
    return 1;
  }
  if (EQUITY_PREFIXES.some((prefix) => upperEpic.startsWith(prefix)) && upperEpic.endsWith(EQUITY_SUFFIX)) {
    return 100;
  }
  return 1;
};

export const normalizePrice = (raw: number, epic: string, symbol: string): number =>
  raw / normalizationFactor(epic, symbol);
