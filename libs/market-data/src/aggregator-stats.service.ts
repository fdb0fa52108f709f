import { Injectable } from '@nestjs/common';
import { AggregatorStats, ProviderCounters } from './models';

/** Sole owner of request counters; everything else reports through it. */
@Injectable()
export class AggregatorStatsService {
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private cacheHits = 0;
  private staleFallbacks = 0;
  private readonly providers = new Map<string, ProviderCounters>();

  recordRequest(count = 1): void {
    this.totalRequests += count;
  }

  recordSuccess(): void {
    this.successfulRequests += 1;
  }

  recordFailure(): void {
    this.failedRequests += 1;
  }

  recordCacheHit(): void {
    this.cacheHits += 1;
  }

  recordStaleFallback(): void {
    this.staleFallbacks += 1;
  }

  recordProviderAttempt(provider: string, ok: boolean): void {
    const counters = this.providers.get(provider) ?? { attempts: 0, successes: 0, failures: 0 };
    counters.attempts += 1;
    if (ok) {
      counters.successes += 1;
    } else {
      counters.failures += 1;
    }
    this.providers.set(provider, counters);
  }

  snapshot(): AggregatorStats {
    const providers: Record<string, ProviderCounters> = {};
    for (const [name, counters] of this.providers) {
      providers[name] = { ...counters };
    }
    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      cacheHits: this.cacheHits,
      staleFallbacks: this.staleFallbacks,
      providers,
    };
  }
}
