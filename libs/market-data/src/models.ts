export const ASSET_CLASSES = ['CRYPTO', 'FOREX', 'INDEX', 'COMMODITY', 'EQUITY'] as const;

export type AssetClass = (typeof ASSET_CLASSES)[number];

export const isAssetClass = (value: string): value is AssetClass =>
  ASSET_CLASSES.some((assetClass) => assetClass === value);

/** Canonical quote returned to callers. A price of zero or below never leaves an adapter. */
export interface PriceRecord {
  symbol: string;
  assetClass: AssetClass;
  price: number;
  changePercent: number;
  changeAbsolute: number;
  volume?: number;
  marketCap?: number;
  /** UTC ISO-8601 */
  timestamp: string;
  source: string;
}

export interface InstrumentMapping {
  symbol: string;
  epic: string;
  displayName: string;
  assetClass: AssetClass;
  active: boolean;
  discoveredAt: Date;
  lastUpdated: Date;
}

export type InstrumentMappingInput = Pick<
  InstrumentMapping,
  'symbol' | 'epic' | 'displayName' | 'assetClass'
>;

export interface MarketSearchResult {
  epic: string;
  instrumentName: string;
  instrumentType: string;
  marketStatus: string;
  streamingPricesAvailable: boolean;
  expiry?: string;
  bid?: number;
  offer?: number;
}

/** Broker instrument details for one epic, with the directory symbol mapped to it. */
export interface MarketMetadata {
  epic: string;
  name: string;
  displayName: string;
  instrumentType: string | null;
  marketId: string | null;
  currency: string | null;
  country: string | null;
  symbol: string | null;
  timestamp: string;
  source: string;
}

export interface NewsItem {
  headline: string;
  summary: string;
  source: string;
  url: string;
  timestamp: string;
  symbol?: string;
}

export type CalendarEventType = 'ipo' | 'earnings';

export interface CalendarEvent {
  symbol: string;
  eventType: CalendarEventType;
  date: string;
  description: string;
  estimate?: number;
  actual?: number;
}

export interface MacroObservation {
  date: string;
  value: number;
}

export interface MacroSeries {
  name: string;
  seriesId: string;
  latestValue: number;
  latestDate: string;
  previousValue: number | null;
  changeFromPrevious: number | null;
  percentChangeFromPrevious: number | null;
  percentChangeYearAgo: number | null;
  history: MacroObservation[];
}

export interface ProviderSnapshot {
  provider: string;
  connected: boolean;
  lastMessageTs: number | null;
  reconnects: number;
  failures: number;
  lastError?: string | null;
}

export interface ProviderCounters {
  attempts: number;
  successes: number;
  failures: number;
}

export interface AggregatorStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  staleFallbacks: number;
  providers: Record<string, ProviderCounters>;
}

export type ReadinessMap = Record<string, boolean>;
