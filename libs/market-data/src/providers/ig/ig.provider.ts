import { Injectable } from '@nestjs/common';
import {
  AuthExpiredError,
  ConfigurationError,
  MalformedResponseError,
  ProviderUnavailableError,
  errorMessage,
} from '@libs/core';
import staticEpics from '../../data/ig-epics.json';
import { SymbolDirectoryService } from '../../discovery/symbol-directory.service';
import { SymbolDiscoveryService } from '../../discovery/symbol-discovery.service';
import { cleanDisplayName, inferAssetClass } from '../../discovery/instrument-metadata';
import { normalizeSymbol } from '../../instrument-classifier';
import { AssetClass, MarketMetadata, MarketSearchResult, PriceRecord } from '../../models';
import { httpStatusOf } from '../../utils/http.util';
import { BaseRestProvider } from '../base-rest.provider';
import { IgClient } from './ig.client';
import { IgMarketDetails } from './ig.schemas';
import { normalizationFactor } from './ig-price.normalizer';

const STATIC_EPICS: Record<string, string> = staticEpics;

interface ResolvedEpic {
  epic: string;
  assetClass: AssetClass;
}

/**
 * CFD / spread-bet broker. Quotes come back fixed-point scaled and are
 * rescaled by `normalizationFactor` before they leave this class.
 */
@Injectable()
export class IgPriceProvider extends BaseRestProvider {
  readonly requiresExclusiveSession = true;
  readonly probeSymbol = 'EURUSD=X';

  constructor(
    private readonly client: IgClient,
    private readonly directory: SymbolDirectoryService,
    private readonly discovery: SymbolDiscoveryService,
  ) {
    super('ig');
  }

  async initialize(): Promise<boolean> {
    if (!this.client.isConfigured) {
      const error = new ConfigurationError('IG credentials missing; broker prices disabled');
      this.recordFailure(error);
      this.logger.error(JSON.stringify({ event: 'provider_misconfigured', provider: this.provider, message: error.message }));
      return false;
    }
    try {
      await this.client.ensureSession();
      this.connected = true;
      this.recordSuccess();
    } catch (error) {
      this.connected = false;
      this.recordFailure(error);
      this.logger.warn(
        JSON.stringify({ event: 'provider_init_failed', provider: this.provider, message: errorMessage(error) }),
      );
    }
    return this.connected;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.client.isConfigured) {
      return false;
    }
    try {
      const epic = STATIC_EPICS[this.probeSymbol];
      await this.client.getMarket(epic);
      this.connected = true;
      this.recordSuccess();
      return true;
    } catch (error) {
      this.connected = false;
      this.recordFailure(error);
      return false;
    }
  }

  async getPrice(symbol: string): Promise<PriceRecord | null> {
    if (!this.client.isConfigured) {
      return null;
    }
    const canonical = normalizeSymbol(symbol);
    const resolved = await this.resolveEpic(canonical);
    if (!resolved) {
      return null;
    }

    let market: IgMarketDetails;
    try {
      market = await this.fetchMarket(resolved.epic);
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        this.logMalformed(canonical, error.message);
        return null;
      }
      this.recordFailure(error);
      throw error;
    }
    this.recordSuccess();

    const { bid, offer, netChange, percentageChange } = market.snapshot;
    const raw = bid !== undefined && bid > 0 ? bid : offer;
    if (raw === undefined || !(raw > 0)) {
      return null;
    }
    const factor = normalizationFactor(resolved.epic, canonical);
    return {
      symbol: canonical,
      assetClass: resolved.assetClass,
      price: raw / factor,
      changePercent: percentageChange ?? 0,
      changeAbsolute: (netChange ?? 0) / factor,
      timestamp: new Date().toISOString(),
      source: this.provider,
    };
  }

  async forceReconnect(): Promise<void> {
    await this.client.forceReconnect();
    this.reconnects += 1;
    this.connected = true;
  }

  /** Instrument details for `epic`; `null` when the broker does not know it. */
  async getMarketMetadata(epic: string): Promise<MarketMetadata | null> {
    if (!this.client.isConfigured) {
      throw new ProviderUnavailableError(this.provider, 'credentials missing');
    }
    let market: IgMarketDetails;
    try {
      market = await this.fetchMarket(epic);
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return null;
      }
      this.recordFailure(error);
      throw error;
    }
    this.recordSuccess();
    const { instrument } = market;
    const currency = instrument.currencies?.find((entry) => entry.isDefault) ?? instrument.currencies?.[0];
    const mapping = await this.directory.lookupByEpic(instrument.epic);
    return {
      epic: instrument.epic,
      name: instrument.name,
      displayName: cleanDisplayName(instrument.name),
      instrumentType: instrument.type ?? null,
      marketId: instrument.marketId ?? null,
      currency: currency?.code ?? null,
      country: instrument.country ?? null,
      symbol: mapping?.symbol ?? null,
      timestamp: new Date().toISOString(),
      source: this.provider,
    };
  }

  searchMarkets(term: string): Promise<MarketSearchResult[]> {
    return this.client.searchMarkets(term);
  }

  async close(): Promise<void> {
    this.connected = false;
    await this.client.logout();
  }

  /**
   * Static table, then the directory, then a discovery round-trip. A
   * deactivated mapping stays out of use until it is rediscovered explicitly.
   */
  private async resolveEpic(symbol: string): Promise<ResolvedEpic | null> {
    const staticEpic = STATIC_EPICS[symbol];
    if (staticEpic) {
      return { epic: staticEpic, assetClass: inferAssetClass(symbol, staticEpic) };
    }
    const known = await this.directory.find(symbol);
    if (known && !known.active) {
      this.logger.debug(JSON.stringify({ event: 'mapping_inactive', provider: this.provider, symbol }));
      return null;
    }
    const mapping = known ?? (await this.discovery.discover(symbol));
    return mapping ? { epic: mapping.epic, assetClass: mapping.assetClass } : null;
  }

  // A dropped session gets exactly one fresh login before the error surfaces.
  private async fetchMarket(epic: string): Promise<IgMarketDetails> {
    try {
      return await this.client.getMarket(epic);
    } catch (error) {
      if (!(error instanceof AuthExpiredError)) {
        throw error;
      }
      this.connected = false;
      this.reconnects += 1;
      this.logger.warn(JSON.stringify({ event: 'session_expired', provider: this.provider, epic }));
      const market = await this.client.getMarket(epic);
      this.connected = true;
      return market;
    }
  }
}
