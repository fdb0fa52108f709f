import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHttpClient } from '../utils/http.util';
import { getProviderEndpoints, getRestTimeoutMs } from './providers.config';
import { SpotExchangeProvider } from './spot-exchange.provider';

// Listings that trade here but not on the primary exchange.
const MEXC_PAIRS: Record<string, string> = {
  WAI: 'WAIUSDT',
};

@Injectable()
export class MexcPriceProvider extends SpotExchangeProvider {
  readonly probeSymbol = 'ETH';

  constructor(configService: ConfigService) {
    const endpoints = getProviderEndpoints(configService, 'mexc');
    super('mexc', createHttpClient(endpoints.rest, getRestTimeoutMs(configService)), MEXC_PAIRS);
  }
}
