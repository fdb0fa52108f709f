/**
 * Failure taxonomy shared by adapters, the aggregator and the HTTP layer.
 * Adapters use `null` for "no data"; these are for everything else.
 */
export abstract class MarketDataError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace?.(this, new.target);
  }
}

export class SymbolNotFoundError extends MarketDataError {
  constructor(readonly symbol: string) {
    super(`No data for ${symbol}`);
  }
}

export class ProviderUnavailableError extends MarketDataError {
  constructor(readonly provider: string, reason?: string) {
    super(reason ? `${provider} unavailable: ${reason}` : `${provider} unavailable`);
  }
}

export class TimeoutError extends MarketDataError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class AuthExpiredError extends MarketDataError {
  constructor(readonly provider: string, detail?: string) {
    super(detail ? `${provider} session expired: ${detail}` : `${provider} session expired`);
  }
}

export class MalformedResponseError extends MarketDataError {
  constructor(readonly provider: string, detail: string) {
    super(`${provider} returned a malformed response: ${detail}`);
  }
}

export class ConfigurationError extends MarketDataError {
  constructor(message: string) {
    super(message);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
