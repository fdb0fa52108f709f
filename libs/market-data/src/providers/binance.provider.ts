import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHttpClient } from '../utils/http.util';
import { getProviderEndpoints, getRestTimeoutMs } from './providers.config';
import { SpotExchangeProvider } from './spot-exchange.provider';

const BINANCE_PAIRS: Record<string, string> = {
  BTC: 'BTCUSDT',
  ETH: 'ETHUSDT',
  SOL: 'SOLUSDT',
  AVAX: 'AVAXUSDT',
  MATIC: 'MATICUSDT',
  ADA: 'ADAUSDT',
  DOT: 'DOTUSDT',
  LINK: 'LINKUSDT',
  UNI: 'UNIUSDT',
  AAVE: 'AAVEUSDT',
};

@Injectable()
export class BinancePriceProvider extends SpotExchangeProvider {
  readonly probeSymbol = 'BTC';

  constructor(configService: ConfigService) {
    const endpoints = getProviderEndpoints(configService, 'binance');
    super('binance', createHttpClient(endpoints.rest, getRestTimeoutMs(configService)), BINANCE_PAIRS);
  }
}
