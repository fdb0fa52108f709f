import {
  InstrumentMapping,
  InstrumentMappingInput,
  AssetClass,
  MarketSearchResult,
  PriceRecord,
  ProviderSnapshot,
} from './models';

/**
 * Contract every price source implements. `getPrice` resolves `null` when the
 * source has nothing for the symbol and rejects only on transport failures.
 */
export interface PriceProvider {
  readonly provider: string;
  /** False for feeds kept only for their other data (news, macro); routing skips them. */
  readonly servesPrices: boolean;
  /** One upstream call can answer many symbols. */
  readonly supportsBulk: boolean;
  /** Requests share a single upstream session and must not interleave. */
  readonly requiresExclusiveSession: boolean;
  /** Symbol used as a smoke test during initialization. */
  readonly probeSymbol?: string;
  initialize(): Promise<boolean>;
  healthCheck(): Promise<boolean>;
  getPrice(symbol: string): Promise<PriceRecord | null>;
  /** Resolves an array aligned with `symbols`. */
  getBulkPrices(symbols: string[]): Promise<Array<PriceRecord | null>>;
  /** Optional re-login before a large batch. */
  forceReconnect?(): Promise<void>;
  /** Broker-side instrument search, where the source has one. */
  searchMarkets?(term: string): Promise<MarketSearchResult[]>;
  close(): Promise<void>;
  getSnapshot(): ProviderSnapshot;
}

export const NOTIFICATION_SINK = Symbol('NOTIFICATION_SINK');

export interface NotificationSink {
  notifyStartup(readiness: Record<string, boolean>): Promise<void>;
  notifyHealthIssue(title: string, details: string): Promise<void>;
  notifyError(context: string, message: string): Promise<void>;
  sendHeartbeat(summary: Record<string, string | number>): Promise<void>;
}

export interface SymbolListQuery {
  assetClass?: AssetClass;
  activeOnly?: boolean;
  limit?: number;
  offset?: number;
}

export interface UpsertOptions {
  reactivate?: boolean;
}

export const SYMBOL_DIRECTORY_REPOSITORY = Symbol('SYMBOL_DIRECTORY_REPOSITORY');

export interface SymbolDirectoryRepository {
  findBySymbol(symbol: string): Promise<InstrumentMapping | null>;
  findByEpic(epic: string): Promise<InstrumentMapping | null>;
  /**
   * Atomic insert-or-update keyed by symbol. An existing row keeps its
   * `active` flag unless `reactivate` is set.
   */
  upsert(input: InstrumentMappingInput, options?: UpsertOptions): Promise<InstrumentMapping>;
  deactivate(symbol: string): Promise<boolean>;
  list(query: SymbolListQuery): Promise<InstrumentMapping[]>;
  countByAssetClass(): Promise<Partial<Record<AssetClass, number>>>;
  ping(): Promise<boolean>;
}
