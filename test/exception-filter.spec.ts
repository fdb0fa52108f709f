import { describe, expect, it } from 'vitest';
import { BadRequestException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ExpressAdapter } from '@nestjs/platform-express';
import { ProviderUnavailableError, SymbolNotFoundError } from '@libs/core';
import { MarketDataExceptionFilter } from '../apps/api/src/market-data-exception.filter';
import { RecordingNotifier } from './support/fake-provider';

class RecordedResponse {
  headersSent = false;
  statusCode = 0;
  body: unknown = null;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  send(body?: unknown): this {
    this.body = body ?? null;
    return this;
  }

  getHeader(): undefined {
    return undefined;
  }
}

const handle = (exception: unknown, notifier = new RecordingNotifier()) => {
  const response = new RecordedResponse();
  const host = new ExecutionContextHost([{ method: 'GET', url: '/api/v1/prices/BTC' }, response]);
  new MarketDataExceptionFilter(new ExpressAdapter(), notifier).catch(exception, host);
  return { response, notifier };
};

describe('market data exception filter', () => {
  it('maps an unknown symbol to 404', () => {
    const { response, notifier } = handle(new SymbolNotFoundError('NOPE'));
    expect(response.statusCode).toBe(404);
    expect(notifier.errors).toEqual([]);
  });

  it('maps an unavailable provider to 503', () => {
    const { response } = handle(new ProviderUnavailableError('ig', 'credentials missing'));
    expect(response.statusCode).toBe(503);
  });

  it('leaves client errors alone', () => {
    const { response, notifier } = handle(new BadRequestException('symbols must not be empty'));
    expect(response.statusCode).toBe(400);
    expect(notifier.errors).toEqual([]);
  });

  it('reports unexpected failures to the notifier', () => {
    const { response, notifier } = handle(new Error('directory offline'));
    expect(response.statusCode).toBe(500);
    expect(notifier.errors).toEqual(['GET /api/v1/prices/BTC: directory offline']);
  });
});
