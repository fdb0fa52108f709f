import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { errorMessage } from '@libs/core';
import { NOTIFICATION_SINK, NotificationSink, PriceAggregatorService } from '@libs/market-data';

@Injectable()
export class HealthMonitorCron {
  private readonly logger = new Logger(HealthMonitorCron.name);
  private readonly enabled: boolean;
  private readonly startedAt = Date.now();

  constructor(
    configService: ConfigService,
    private readonly aggregator: PriceAggregatorService,
    @Optional() @Inject(NOTIFICATION_SINK) private readonly notifier: NotificationSink | null = null,
  ) {
    this.enabled = configService.get<boolean>('HEALTH_MONITOR_ENABLED', true) !== false;
  }

  @Cron('*/5 * * * *')
  async checkProviders(): Promise<void> {
    if (!this.enabled || !this.aggregator.isInitialized) return;
    try {
      const readiness = await this.aggregator.healthCheck();
      const down = Object.keys(readiness).filter((name) => !readiness[name]);
      this.logger.log(JSON.stringify({ event: 'health_monitor_tick', down }));
    } catch (error) {
      this.logger.error(JSON.stringify({ event: 'health_monitor_failed', message: errorMessage(error) }));
    }
  }

  @Cron('*/30 * * * *')
  async heartbeat(): Promise<void> {
    if (!this.enabled || !this.notifier) return;
    const stats = this.aggregator.getStats();
    const readiness = this.aggregator.getProviderStatus().readiness;
    const ready = Object.values(readiness).filter(Boolean).length;
    const successRate =
      stats.totalRequests > 0 ? Math.round((stats.successfulRequests / stats.totalRequests) * 1000) / 10 : 100;
    try {
      await this.notifier.sendHeartbeat({
        uptimeMinutes: Math.floor((Date.now() - this.startedAt) / 60000),
        providersReady: `${ready}/${Object.keys(readiness).length}`,
        requests: stats.totalRequests,
        successRate: `${successRate}%`,
        cacheHits: stats.cacheHits,
      });
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'heartbeat_failed', message: errorMessage(error) }));
    }
  }
}
