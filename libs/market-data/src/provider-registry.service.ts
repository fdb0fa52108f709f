import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '@libs/core';
import { PriceProvider } from './interfaces';
import { ASSET_CLASSES, AssetClass, ProviderSnapshot, ReadinessMap } from './models';
import { getListConfig } from './providers/providers.config';

export const MARKET_DATA_PROVIDERS = Symbol('MARKET_DATA_PROVIDERS');

const DEFAULT_ENABLED = ['binance', 'mexc', 'ig', 'finnhub', 'fred'];

const DEFAULT_PRIORITY: Record<AssetClass, string[]> = {
  CRYPTO: ['binance', 'mexc'],
  FOREX: ['ig'],
  INDEX: ['ig'],
  COMMODITY: ['ig'],
  EQUITY: ['ig'],
};

/**
 * Enabled adapters, their readiness and the per-asset-class routing table.
 * Every provider starts not-ready.
 */
@Injectable()
export class ProviderRegistryService {
  private readonly logger = new Logger(ProviderRegistryService.name);
  private readonly enabled: PriceProvider[];
  private readonly readiness = new Map<string, boolean>();
  private readonly priority: Record<AssetClass, string[]>;

  constructor(
    configService: ConfigService,
    @Inject(MARKET_DATA_PROVIDERS)
    providers: PriceProvider[],
  ) {
    const names = getListConfig(configService, 'PROVIDERS_ENABLED', DEFAULT_ENABLED).map((name) =>
      name.toLowerCase(),
    );
    this.enabled = providers.filter((provider) => names.includes(provider.provider));
    if (!this.enabled.length) {
      throw new ConfigurationError('No market data providers enabled; check PROVIDERS_ENABLED');
    }
    this.enabled.forEach((provider) => this.readiness.set(provider.provider, false));

    const priority = { ...DEFAULT_PRIORITY };
    for (const assetClass of ASSET_CLASSES) {
      priority[assetClass] = getListConfig(
        configService,
        `PROVIDER_PRIORITY_${assetClass}`,
        DEFAULT_PRIORITY[assetClass],
      ).map((name) => name.toLowerCase());
    }
    this.priority = priority;
    this.logger.log(
      JSON.stringify({
        event: 'providers_registered',
        providers: this.enabled.map((provider) => provider.provider),
      }),
    );
  }

  getEnabledProviders(): PriceProvider[] {
    return [...this.enabled];
  }

  getProvider(name: string): PriceProvider | undefined {
    return this.enabled.find((provider) => provider.provider === name);
  }

  isReady(name: string): boolean {
    return this.readiness.get(name) === true;
  }

  /** Returns the previous state. */
  setReady(name: string, ready: boolean): boolean {
    const previous = this.isReady(name);
    this.readiness.set(name, ready);
    return previous;
  }

  getReadiness(): ReadinessMap {
    return Object.fromEntries(this.readiness);
  }

  priorityFor(assetClass: AssetClass): string[] {
    return [...this.priority[assetClass]];
  }

  /**
   * Ready providers for `assetClass` in priority order, or every ready price
   * provider when none of the listed ones is ready.
   */
  routeFor(assetClass: AssetClass): PriceProvider[] {
    const listed = this.priority[assetClass]
      .map((name) => this.getProvider(name))
      .filter((provider): provider is PriceProvider => Boolean(provider))
      .filter((provider) => provider.servesPrices && this.isReady(provider.provider));
    if (listed.length) {
      return listed;
    }
    return this.enabled.filter((provider) => provider.servesPrices && this.isReady(provider.provider));
  }

  getSnapshots(): ProviderSnapshot[] {
    return this.enabled.map((provider) => provider.getSnapshot());
  }
}
