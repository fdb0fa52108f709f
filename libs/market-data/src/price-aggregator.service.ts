import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProviderUnavailableError, TimeoutError, errorMessage } from '@libs/core';
import { AggregatorStatsService } from './aggregator-stats.service';
import { CachedPrice, PriceCacheService } from './cache/price-cache.service';
import { classifyAsset, normalizeSymbol } from './instrument-classifier';
import { NOTIFICATION_SINK, NotificationSink, PriceProvider } from './interfaces';
import {
  AggregatorStats,
  MarketSearchResult,
  PriceRecord,
  ProviderSnapshot,
  ReadinessMap,
} from './models';
import { ProviderRegistryService } from './provider-registry.service';
import { Mutex, chunk, runWithConcurrency, sleep, withTimeout } from './utils/async.util';

const isUsable = (record: PriceRecord | null | undefined): record is PriceRecord =>
  record !== null && record !== undefined && record.price > 0;

export interface ProviderStatus {
  readiness: ReadinessMap;
  providers: ProviderSnapshot[];
}

/**
 * Routes price requests across providers by asset class, with per-call
 * timeouts, failover, caching and readiness tracking. Adapter failures never
 * reach callers; they see a record or `null`.
 */
@Injectable()
export class PriceAggregatorService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(PriceAggregatorService.name);
  private readonly sessionLocks = new Map<string, Mutex>();
  private readonly providerTimeoutMs: number;
  private readonly healthCheckTimeoutMs: number;
  private readonly healthCheckTotalTimeoutMs: number;
  private readonly initTimeoutMs: number;
  private readonly bulkConcurrency: number;
  private readonly bulkBatchSize: number;
  private readonly bulkBatchPauseMs: number;
  private readonly bulkReconnectThreshold: number;
  private readonly bulkTimeoutMs: number;
  private initialized = false;

  constructor(
    configService: ConfigService,
    private readonly registry: ProviderRegistryService,
    private readonly cache: PriceCacheService,
    private readonly stats: AggregatorStatsService,
    @Optional() @Inject(NOTIFICATION_SINK) private readonly notifier: NotificationSink | null = null,
  ) {
    this.providerTimeoutMs = configService.get<number>('PROVIDER_TIMEOUT_MS', 10000);
    this.healthCheckTimeoutMs = configService.get<number>('HEALTH_CHECK_TIMEOUT_MS', 10000);
    this.healthCheckTotalTimeoutMs = configService.get<number>('HEALTH_CHECK_TOTAL_TIMEOUT_MS', 30000);
    this.initTimeoutMs = configService.get<number>('INIT_TIMEOUT_MS', 45000);
    this.bulkConcurrency = configService.get<number>('BULK_CONCURRENCY', 5);
    this.bulkBatchSize = configService.get<number>('BULK_BATCH_SIZE', 10);
    this.bulkBatchPauseMs = configService.get<number>('BULK_BATCH_PAUSE_MS', 1000);
    this.bulkReconnectThreshold = configService.get<number>('BULK_RECONNECT_THRESHOLD', 20);
    this.bulkTimeoutMs = configService.get<number>('BULK_TIMEOUT_MS', 120000);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.initialize();
  }

  async onModuleDestroy(): Promise<void> {
    await this.close();
  }

  /** Self-tests every provider concurrently. Partial readiness is a valid outcome. */
  async initialize(): Promise<ReadinessMap> {
    const providers = this.registry.getEnabledProviders();
    const outcomes = new Map<string, boolean>();

    try {
      await withTimeout(
        Promise.all(
          providers.map(async (provider) => {
            outcomes.set(provider.provider, await this.selfTest(provider));
          }),
        ),
        this.initTimeoutMs,
        'aggregator initialization',
      );
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'init_timeout', message: errorMessage(error) }));
    }

    for (const provider of providers) {
      this.registry.setReady(provider.provider, outcomes.get(provider.provider) === true);
    }
    this.initialized = true;

    const readiness = this.registry.getReadiness();
    const ready = Object.keys(readiness).filter((name) => readiness[name]);
    this.logger.log(
      JSON.stringify({
        event: 'aggregator_initialized',
        ready,
        notReady: Object.keys(readiness).filter((name) => !readiness[name]),
      }),
    );
    this.notify((sink) => sink.notifyStartup(readiness));
    return readiness;
  }

  async getPrice(rawSymbol: string): Promise<PriceRecord | null> {
    const symbol = normalizeSymbol(rawSymbol);
    this.stats.recordRequest();

    const cached = await this.cache.get(symbol);
    if (cached?.fresh) {
      this.stats.recordCacheHit();
      this.stats.recordSuccess();
      return cached.record;
    }

    const record = await this.fetchLive(symbol, this.registry.routeFor(classifyAsset(symbol)));
    if (record) {
      await this.cache.set(record);
      this.stats.recordSuccess();
      return record;
    }
    return this.fallback(symbol, cached);
  }

  /**
   * Resolves many symbols at once. The result is aligned with `rawSymbols`;
   * each position is resolved independently.
   */
  async getBulkPrices(rawSymbols: string[]): Promise<Array<PriceRecord | null>> {
    const symbols = rawSymbols.map(normalizeSymbol);
    const unique = [...new Set(symbols)];
    const resolved = new Map<string, PriceRecord>();
    const cachedEntries = new Map<string, CachedPrice>();
    this.stats.recordRequest(unique.length);

    try {
      await withTimeout(
        this.resolveBulk(unique, resolved, cachedEntries),
        this.bulkTimeoutMs,
        'bulk price batch',
      );
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'bulk_timeout' : 'bulk_failed',
          symbols: unique.length,
          resolved: resolved.size,
          message: errorMessage(error),
        }),
      );
    }

    for (const symbol of unique) {
      const record = resolved.get(symbol);
      if (record) {
        this.stats.recordSuccess();
        continue;
      }
      const stale = this.fallback(symbol, cachedEntries.get(symbol) ?? null);
      if (stale) {
        resolved.set(symbol, stale);
      }
    }

    this.logger.log(
      JSON.stringify({ event: 'bulk_completed', requested: unique.length, resolved: resolved.size }),
    );
    return symbols.map((symbol) => resolved.get(symbol) ?? null);
  }

  async searchMarkets(term: string): Promise<MarketSearchResult[]> {
    const provider = this.registry
      .getEnabledProviders()
      .find((candidate) => typeof candidate.searchMarkets === 'function');
    if (!provider?.searchMarkets) {
      throw new ProviderUnavailableError('search', 'no provider offers market search');
    }
    try {
      return await withTimeout(
        provider.searchMarkets(term),
        this.providerTimeoutMs,
        `${provider.provider} market search`,
      );
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'provider_timeout' : 'search_failed',
          provider: provider.provider,
          term,
          message: errorMessage(error),
        }),
      );
      throw new ProviderUnavailableError(provider.provider, errorMessage(error));
    }
  }

  /** Probes every provider and applies readiness transitions. */
  async healthCheck(): Promise<ReadinessMap> {
    const providers = this.registry.getEnabledProviders();
    const outcomes = new Map<string, boolean>();

    try {
      await withTimeout(
        Promise.all(
          providers.map(async (provider) => {
            outcomes.set(provider.provider, await this.probe(provider));
          }),
        ),
        this.healthCheckTotalTimeoutMs,
        'health check',
      );
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'health_check_timeout', message: errorMessage(error) }));
    }

    for (const provider of providers) {
      const healthy = outcomes.get(provider.provider) === true;
      const wasReady = this.registry.setReady(provider.provider, healthy);
      if (wasReady && !healthy) {
        this.logger.warn(JSON.stringify({ event: 'provider_not_ready', provider: provider.provider }));
        this.notify((sink) =>
          sink.notifyHealthIssue(`${provider.provider} unavailable`, 'Health check failed; routing around it.'),
        );
      } else if (!wasReady && healthy) {
        this.logger.log(JSON.stringify({ event: 'provider_recovered', provider: provider.provider }));
      }
    }
    return this.registry.getReadiness();
  }

  /** Whether some ready provider could serve `symbol` right now. */
  canServe(rawSymbol: string): boolean {
    return this.registry.routeFor(classifyAsset(normalizeSymbol(rawSymbol))).length > 0;
  }

  getStats(): AggregatorStats {
    return this.stats.snapshot();
  }

  getProviderStatus(): ProviderStatus {
    return {
      readiness: this.registry.getReadiness(),
      providers: this.registry.getSnapshots(),
    };
  }

  async close(): Promise<void> {
    await Promise.all(
      this.registry.getEnabledProviders().map((provider) =>
        provider.close().catch((error: unknown) => {
          this.logger.warn(
            JSON.stringify({ event: 'provider_close_failed', provider: provider.provider, message: errorMessage(error) }),
          );
        }),
      ),
    );
    this.initialized = false;
  }

  private async selfTest(provider: PriceProvider): Promise<boolean> {
    try {
      const initialized = await withTimeout(
        provider.initialize(),
        this.providerTimeoutMs,
        `${provider.provider} initialize`,
      );
      if (!initialized) {
        return false;
      }
      const healthy = await withTimeout(
        provider.healthCheck(),
        this.healthCheckTimeoutMs,
        `${provider.provider} health check`,
      );
      if (!healthy || !provider.servesPrices || !provider.probeSymbol) {
        return healthy;
      }
      const probe = await withTimeout(
        provider.getPrice(provider.probeSymbol),
        this.providerTimeoutMs,
        `${provider.provider} probe`,
      );
      return isUsable(probe);
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'provider_timeout' : 'provider_self_test_failed',
          provider: provider.provider,
          message: errorMessage(error),
        }),
      );
      return false;
    }
  }

  private async probe(provider: PriceProvider): Promise<boolean> {
    try {
      return await withTimeout(
        provider.healthCheck(),
        this.healthCheckTimeoutMs,
        `${provider.provider} health check`,
      );
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'provider_timeout' : 'health_check_failed',
          provider: provider.provider,
          message: errorMessage(error),
        }),
      );
      return false;
    }
  }

  private async fetchLive(symbol: string, providers: PriceProvider[]): Promise<PriceRecord | null> {
    for (const provider of providers) {
      const record = await this.tryProvider(provider, symbol);
      if (record) {
        return record;
      }
    }
    return null;
  }

  private async tryProvider(provider: PriceProvider, symbol: string): Promise<PriceRecord | null> {
    try {
      const record = await withTimeout(
        provider.getPrice(symbol),
        this.providerTimeoutMs,
        `${provider.provider} getPrice`,
      );
      const ok = isUsable(record);
      this.stats.recordProviderAttempt(provider.provider, ok);
      return ok ? record : null;
    } catch (error) {
      this.stats.recordProviderAttempt(provider.provider, false);
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'provider_timeout' : 'provider_error',
          provider: provider.provider,
          symbol,
          message: errorMessage(error),
        }),
      );
      return null;
    }
  }

  private fallback(symbol: string, cached: CachedPrice | null): PriceRecord | null {
    if (cached) {
      this.stats.recordStaleFallback();
      this.stats.recordSuccess();
      this.logger.warn(
        JSON.stringify({ event: 'stale_cache_served', symbol, cachedAt: new Date(cached.cachedAt).toISOString() }),
      );
      return cached.record;
    }
    this.stats.recordFailure();
    this.logger.warn(JSON.stringify({ event: 'no_price', symbol }));
    return null;
  }

  private async resolveBulk(
    symbols: string[],
    resolved: Map<string, PriceRecord>,
    cachedEntries: Map<string, CachedPrice>,
  ): Promise<void> {
    const pending: string[] = [];
    const fromCache = new Set<string>();
    await Promise.all(
      symbols.map(async (symbol) => {
        const cached = await this.cache.get(symbol);
        if (cached?.fresh) {
          this.stats.recordCacheHit();
          fromCache.add(symbol);
          resolved.set(symbol, cached.record);
          return;
        }
        if (cached) {
          cachedEntries.set(symbol, cached);
        }
        pending.push(symbol);
      }),
    );

    const groups = new Map<PriceProvider, string[]>();
    for (const symbol of pending) {
      const primary = this.registry.routeFor(classifyAsset(symbol))[0];
      if (!primary) {
        continue;
      }
      groups.set(primary, [...(groups.get(primary) ?? []), symbol]);
    }

    const failed: Array<{ symbol: string; primary: PriceProvider }> = [];
    await Promise.all(
      [...groups].map(async ([provider, group]) => {
        const records = await this.fetchGroup(provider, group);
        group.forEach((symbol, index) => {
          const record = records[index];
          if (isUsable(record)) {
            resolved.set(symbol, record);
          } else {
            failed.push({ symbol, primary: provider });
          }
        });
      }),
    );

    // one more pass over the secondaries for whatever the primary missed
    await runWithConcurrency(failed, this.bulkConcurrency, async ({ symbol, primary }) => {
      const secondaries = this.registry
        .routeFor(classifyAsset(symbol))
        .filter((provider) => provider !== primary);
      const record = await this.fetchLive(symbol, secondaries);
      if (record) {
        resolved.set(symbol, record);
      }
    });

    await Promise.all(
      [...resolved]
        .filter(([symbol]) => !fromCache.has(symbol))
        .map(([, record]) => this.cache.set(record)),
    );
  }

  private async fetchGroup(provider: PriceProvider, symbols: string[]): Promise<Array<PriceRecord | null>> {
    if (provider.supportsBulk) {
      try {
        const records = await withTimeout(
          provider.getBulkPrices(symbols),
          this.providerTimeoutMs,
          `${provider.provider} bulk`,
        );
        records.forEach((record) => this.stats.recordProviderAttempt(provider.provider, isUsable(record)));
        return symbols.map((_, index) => records[index] ?? null);
      } catch (error) {
        this.stats.recordProviderAttempt(provider.provider, false);
        this.logger.warn(
          JSON.stringify({
            event: error instanceof TimeoutError ? 'provider_timeout' : 'provider_bulk_failed',
            provider: provider.provider,
            symbols: symbols.length,
            message: errorMessage(error),
          }),
        );
        return symbols.map(() => null);
      }
    }

    if (provider.requiresExclusiveSession) {
      return this.lockFor(provider).runExclusive(() => this.fetchExclusive(provider, symbols));
    }
    return this.fetchFanOut(provider, symbols);
  }

  private async fetchFanOut(provider: PriceProvider, symbols: string[]): Promise<Array<PriceRecord | null>> {
    const records: Array<PriceRecord | null> = symbols.map(() => null);
    await runWithConcurrency(symbols, this.bulkConcurrency, async (symbol, index) => {
      records[index] = await this.tryProvider(provider, symbol);
    });
    return records;
  }

  // Session-bound providers: one batch at a time, fresh session for big
  // batches, and a pause between chunks to stay under the venue's rate limit.
  private async fetchExclusive(provider: PriceProvider, symbols: string[]): Promise<Array<PriceRecord | null>> {
    if (symbols.length >= this.bulkReconnectThreshold && provider.forceReconnect) {
      try {
        await withTimeout(provider.forceReconnect(), this.providerTimeoutMs, `${provider.provider} reconnect`);
      } catch (error) {
        this.logger.warn(
          JSON.stringify({ event: 'forced_reconnect_failed', provider: provider.provider, message: errorMessage(error) }),
        );
      }
    }

    const records: Array<PriceRecord | null> = [];
    const batches = chunk(symbols, this.bulkBatchSize);
    for (const [batchIndex, batch] of batches.entries()) {
      records.push(...(await this.fetchFanOut(provider, batch)));
      if (batchIndex < batches.length - 1 && this.bulkBatchPauseMs > 0) {
        await sleep(this.bulkBatchPauseMs);
      }
    }
    return records;
  }

  private lockFor(provider: PriceProvider): Mutex {
    let lock = this.sessionLocks.get(provider.provider);
    if (!lock) {
      lock = new Mutex();
      this.sessionLocks.set(provider.provider, lock);
    }
    return lock;
  }

  private notify(send: (sink: NotificationSink) => Promise<void>): void {
    if (!this.notifier) {
      return;
    }
    send(this.notifier).catch((error: unknown) => {
      this.logger.warn(JSON.stringify({ event: 'notification_failed', message: errorMessage(error) }));
    });
  }
}
