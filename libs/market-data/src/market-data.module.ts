import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { AggregatorStatsService } from './aggregator-stats.service';
import { PriceCacheService } from './cache/price-cache.service';
import { MongoSymbolDirectoryRepository } from './discovery/symbol-directory.repository';
import { SymbolDirectoryService } from './discovery/symbol-directory.service';
import { SymbolDiscoveryService } from './discovery/symbol-discovery.service';
import { SYMBOL_DIRECTORY_REPOSITORY } from './interfaces';
import { PriceAggregatorService } from './price-aggregator.service';
import { MARKET_DATA_PROVIDERS, ProviderRegistryService } from './provider-registry.service';
import { BinancePriceProvider } from './providers/binance.provider';
import { FinnhubProvider } from './providers/finnhub.provider';
import { FredProvider } from './providers/fred.provider';
import { IgClient } from './providers/ig/ig.client';
import { IgPriceProvider } from './providers/ig/ig.provider';
import { MexcPriceProvider } from './providers/mexc.provider';

@Module({
  imports: [CoreModule],
  providers: [
    { provide: SYMBOL_DIRECTORY_REPOSITORY, useClass: MongoSymbolDirectoryRepository },
    SymbolDirectoryService,
    SymbolDiscoveryService,
    IgClient,
    BinancePriceProvider,
    MexcPriceProvider,
    IgPriceProvider,
    FinnhubProvider,
    FredProvider,
    {
      provide: MARKET_DATA_PROVIDERS,
      useFactory: (
        binance: BinancePriceProvider,
        mexc: MexcPriceProvider,
        ig: IgPriceProvider,
        finnhub: FinnhubProvider,
        fred: FredProvider,
      ) => [binance, mexc, ig, finnhub, fred],
      inject: [BinancePriceProvider, MexcPriceProvider, IgPriceProvider, FinnhubProvider, FredProvider],
    },
    ProviderRegistryService,
    PriceCacheService,
    AggregatorStatsService,
    PriceAggregatorService,
  ],
  exports: [
    PriceAggregatorService,
    ProviderRegistryService,
    SymbolDirectoryService,
    SymbolDiscoveryService,
    IgPriceProvider,
    FinnhubProvider,
    FredProvider,
  ],
})
export class MarketDataModule {}
