import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { KEY_VALUE_STORE, KeyValueStore, errorMessage } from '@libs/core';
import { JsonCache } from '../cache/json-cache';
import { MacroObservation, MacroSeries, PriceRecord } from '../models';
import { macroSeriesSchema } from '../schemas';
import { createHttpClient } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';
import { MACRO_SERIES, findMacroSeries } from './macro-series.catalog';
import { getListConfig, getProviderEndpoints, getRestTimeoutMs } from './providers.config';

const OBSERVATION_LIMIT = 25;
const HISTORY_LENGTH = 3;
// monthly series: twelve observations back is a year ago
const YEAR_AGO_INDEX = 12;
const ASCENDING_LOOKBACK_YEARS = 3;

const observationsSchema = z.object({
  observations: z.array(z.object({ date: z.string(), value: z.string() })),
});

const round2 = (value: number): number => Math.round(value * 100) / 100;

const percentChange = (from: number, to: number): number | null =>
  from === 0 ? null : round2(((to - from) / from) * 100);

/**
 * Summarises observations ordered newest first. Missing values (".") are
 * dropped; `null` when nothing usable is left.
 */
export const summarizeSeries = (
  seriesId: string,
  name: string,
  newestFirst: Array<{ date: string; value: string }>,
): MacroSeries | null => {
  const observations: MacroObservation[] = newestFirst
    .filter((obs) => obs.value !== '.')
    .map((obs) => ({ date: obs.date, value: Number(obs.value) }))
    .filter((obs) => Number.isFinite(obs.value));
  const [latest, previous] = observations;
  if (!latest) {
    return null;
  }
  const yearAgo = observations[YEAR_AGO_INDEX];
  return {
    name,
    seriesId,
    latestValue: latest.value,
    latestDate: latest.date,
    previousValue: previous?.value ?? null,
    changeFromPrevious: previous ? round2(latest.value - previous.value) : null,
    percentChangeFromPrevious: previous ? percentChange(previous.value, latest.value) : null,
    percentChangeYearAgo: yearAgo ? percentChange(yearAgo.value, latest.value) : null,
    history: observations.slice(0, HISTORY_LENGTH),
  };
};

/** Economic time series. Carries no prices; it sits outside price routing. */
@Injectable()
export class FredProvider extends BaseRestProvider {
  readonly servesPrices = false;
  private readonly restClient: AxiosInstance;
  private readonly apiKey: string;
  private readonly ascendingOnly: Set<string>;
  private readonly cache: JsonCache;
  private readonly ttlSeconds: number;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(KEY_VALUE_STORE) store: KeyValueStore | null = null,
  ) {
    super('fred');
    const endpoints = getProviderEndpoints(configService, 'fred');
    this.restClient = createHttpClient(endpoints.rest, getRestTimeoutMs(configService));
    this.apiKey = configService.get<string>('FRED_API_KEY', '').trim();
    this.ascendingOnly = new Set(
      getListConfig(configService, 'FRED_ASCENDING_ONLY_SERIES', ['PMI']).map((id) => id.toUpperCase()),
    );
    this.ttlSeconds = configService.get<number>('MACRO_CACHE_TTL_SECONDS', 86400);
    this.cache = new JsonCache(store, this.logger);
  }

  get catalog(): typeof MACRO_SERIES {
    return MACRO_SERIES;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.apiKey) {
      return false;
    }
    try {
      await this.restClient.get('/series', {
        params: { series_id: 'UNRATE', api_key: this.apiKey, file_type: 'json' },
      });
      this.recordSuccess();
      return true;
    } catch (error) {
      this.recordFailure(error);
      return false;
    }
  }

  async getPrice(_symbol: string): Promise<PriceRecord | null> {
    return null;
  }

  /** Named series from the catalog; `null` for unknown names. */
  async getNamedSeries(name: string): Promise<MacroSeries | null> {
    const definition = findMacroSeries(name);
    return definition ? this.getSeries(definition.seriesId, definition.name) : null;
  }

  async getSeries(seriesId: string, name: string): Promise<MacroSeries | null> {
    if (!this.apiKey) {
      this.logger.warn(JSON.stringify({ event: 'fred_missing_api_key', provider: this.provider }));
      return null;
    }
    const key = `fred:${seriesId}`;
    const cached = await this.cache.read(key, macroSeriesSchema);
    if (cached) {
      return cached;
    }
    const observations = await this.fetchNewestFirst(seriesId);
    const summary = summarizeSeries(seriesId, name, observations);
    if (summary) {
      await this.cache.write(key, summary, this.ttlSeconds);
    }
    return summary;
  }

  /** Loads every catalog series; returns how many are now cached. */
  async warmCache(): Promise<number> {
    let warmed = 0;
    for (const definition of MACRO_SERIES.values()) {
      try {
        if (await this.getSeries(definition.seriesId, definition.name)) {
          warmed += 1;
        }
      } catch (error) {
        this.logger.warn(
          JSON.stringify({ event: 'fred_warm_failed', seriesId: definition.seriesId, message: errorMessage(error) }),
        );
      }
    }
    return warmed;
  }

  private async fetchNewestFirst(seriesId: string): Promise<Array<{ date: string; value: string }>> {
    // Some series reject sort_order=desc; fetch a bounded window ascending and take the tail.
    const ascending = this.ascendingOnly.has(seriesId.toUpperCase());
    const params: Record<string, string | number> = {
      series_id: seriesId,
      api_key: this.apiKey,
      file_type: 'json',
    };
    if (ascending) {
      params.sort_order = 'asc';
      params.observation_start = DateTime.utc().minus({ years: ASCENDING_LOOKBACK_YEARS }).toFormat('yyyy-LL-dd');
    } else {
      params.sort_order = 'desc';
      params.limit = OBSERVATION_LIMIT;
    }

    let data: unknown;
    try {
      data = await this.restGet(this.restClient, '/series/observations', { params, retryDelayMs: 500 });
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }

    const parsed = observationsSchema.safeParse(data);
    if (!parsed.success) {
      this.logMalformed(seriesId, parsed.error.issues[0]?.message ?? 'invalid');
      return [];
    }
    this.recordSuccess();
    const observations = parsed.data.observations;
    return ascending ? observations.slice(-OBSERVATION_LIMIT).reverse() : observations;
  }
}
