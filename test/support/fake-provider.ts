import {
  MarketSearchResult,
  NotificationSink,
  PriceProvider,
  PriceRecord,
  ProviderSnapshot,
  classifyAsset,
  sleep,
} from '@libs/market-data';

export class FakeProvider implements PriceProvider {
  readonly servesPrices: boolean = true;
  readonly prices = new Map<string, number>();
  readonly calls: string[] = [];
  readonly bulkCalls: string[][] = [];
  healthy = true;
  failing = false;
  /** Every call stays pending forever. */
  hanging = false;
  delayMs = 0;
  reconnects = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    readonly provider: string,
    readonly supportsBulk = false,
    readonly requiresExclusiveSession = false,
    readonly probeSymbol?: string,
  ) {}

  async initialize(): Promise<boolean> {
    await this.maybeHang();
    return this.healthy;
  }

  async healthCheck(): Promise<boolean> {
    await this.maybeHang();
    return this.healthy;
  }

  async getPrice(symbol: string): Promise<PriceRecord | null> {
    this.calls.push(symbol);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await this.maybeHang();
      if (this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      if (this.failing) {
        throw new Error(`${this.provider} unavailable`);
      }
      const price = this.prices.get(symbol);
      if (price === undefined) {
        return null;
      }
      return {
        symbol,
        assetClass: classifyAsset(symbol),
        price,
        changePercent: 0,
        changeAbsolute: 0,
        timestamp: new Date().toISOString(),
        source: this.provider,
      };
    } finally {
      this.inFlight -= 1;
    }
  }

  async getBulkPrices(symbols: string[]): Promise<Array<PriceRecord | null>> {
    this.bulkCalls.push([...symbols]);
    return Promise.all(symbols.map((symbol) => this.getPrice(symbol)));
  }

  async forceReconnect(): Promise<void> {
    this.reconnects += 1;
  }

  async close(): Promise<void> {
    this.healthy = false;
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.provider,
      connected: this.healthy,
      lastMessageTs: null,
      reconnects: this.reconnects,
      failures: 0,
      lastError: null,
    };
  }

  private async maybeHang(): Promise<void> {
    if (this.hanging) {
      await new Promise<never>(() => undefined);
    }
  }
}

export class SearchableFakeProvider extends FakeProvider {
  readonly markets: MarketSearchResult[] = [];

  async searchMarkets(term: string): Promise<MarketSearchResult[]> {
    if (this.failing) {
      throw new Error('search unavailable');
    }
    return this.markets.filter((market) => market.instrumentName.toLowerCase().includes(term.toLowerCase()));
  }
}

export class RecordingNotifier implements NotificationSink {
  readonly startups: Array<Record<string, boolean>> = [];
  readonly healthIssues: string[] = [];
  readonly errors: string[] = [];
  readonly heartbeats: Array<Record<string, string | number>> = [];

  async notifyStartup(readiness: Record<string, boolean>): Promise<void> {
    this.startups.push(readiness);
  }

  async notifyHealthIssue(title: string): Promise<void> {
    this.healthIssues.push(title);
  }

  async notifyError(context: string, message: string): Promise<void> {
    this.errors.push(`${context}: ${message}`);
  }

  async sendHeartbeat(summary: Record<string, string | number>): Promise<void> {
    this.heartbeats.push(summary);
  }
}
