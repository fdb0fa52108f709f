import { Controller, Get, Inject, Optional } from '@nestjs/common';
import { KEY_VALUE_STORE, KeyValueStore } from '@libs/core';
import {
  AggregatorStats,
  PriceAggregatorService,
  ReadinessMap,
  SymbolDirectoryService,
} from '@libs/market-data';

type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

interface HealthResponse {
  status: HealthStatus;
  initialized: boolean;
  providers: ReadinessMap;
  cache: 'ok' | 'down' | 'disabled';
  directory: 'ok' | 'down';
  timestamp: string;
}

export const overallStatus = (readiness: ReadinessMap): HealthStatus => {
  const states = Object.values(readiness);
  const ready = states.filter(Boolean).length;
  if (states.length > 0 && ready === states.length) return 'healthy';
  return ready > 0 ? 'degraded' : 'unhealthy';
};

@Controller('health')
export class HealthController {
  constructor(
    private readonly aggregator: PriceAggregatorService,
    private readonly directory: SymbolDirectoryService,
    @Optional() @Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore | null = null,
  ) {}

  @Get()
  async health(): Promise<HealthResponse> {
    const readiness = this.aggregator.getProviderStatus().readiness;
    const [cacheUp, directoryUp] = await Promise.all([
      this.store ? this.store.ping() : Promise.resolve(null),
      this.directory.ping(),
    ]);
    return {
      status: overallStatus(readiness),
      initialized: this.aggregator.isInitialized,
      providers: readiness,
      cache: cacheUp === null ? 'disabled' : cacheUp ? 'ok' : 'down',
      directory: directoryUp ? 'ok' : 'down',
      timestamp: new Date().toISOString(),
    };
  }

  @Get('stats')
  stats(): AggregatorStats {
    return this.aggregator.getStats();
  }
}
