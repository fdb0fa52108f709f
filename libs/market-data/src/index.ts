export * from './aggregator-stats.service';
export * from './cache/json-cache';
export * from './cache/price-cache.service';
export * from './discovery/instrument-metadata';
export * from './discovery/symbol-directory.repository';
export * from './discovery/symbol-directory.service';
export * from './discovery/symbol-discovery.service';
export * from './instrument-classifier';
export * from './interfaces';
export * from './market-data.module';
export * from './models';
export * from './price-aggregator.service';
export * from './provider-registry.service';
export * from './providers/base-rest.provider';
export * from './providers/binance.provider';
export * from './providers/finnhub.provider';
export * from './providers/fred.provider';
export * from './providers/ig/ig-price.normalizer';
export * from './providers/ig/ig.client';
export * from './providers/ig/ig.provider';
export * from './providers/ig/ig.schemas';
export * from './providers/macro-series.catalog';
export * from './providers/mexc.provider';
export * from './providers/providers.config';
export * from './providers/spot-exchange.provider';
export * from './schemas';
export * from './utils/async.util';
export * from './utils/http.util';
