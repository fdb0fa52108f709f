import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance, isAxiosError } from 'axios';
import {
  AuthExpiredError,
  ConfigurationError,
  MalformedResponseError,
  errorMessage,
} from '@libs/core';
import { MarketSearchResult } from '../../models';
import { Mutex } from '../../utils/async.util';
import { createHttpClient } from '../../utils/http.util';
import { getProviderEndpoints, getRestTimeoutMs } from '../providers.config';
import { IgMarketDetails, igErrorBodySchema, igMarketDetailsSchema, igSearchResponseSchema } from './ig.schemas';

export interface IgSession {
  cst: string;
  securityToken: string;
  createdAt: number;
}

const AUTH_ERROR_PATTERN = /token|security|session|unauthori[sz]ed/i;
const CONNECTION_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']);

/** Whether a failure means the broker session is gone and a fresh login is needed. */
export const isSessionError = (error: unknown): boolean => {
  if (!isAxiosError(error)) {
    return error instanceof Error && AUTH_ERROR_PATTERN.test(error.message);
  }
  if (!error.response) {
    return error.code !== undefined && CONNECTION_ERROR_CODES.has(error.code);
  }
  const { status, data } = error.response;
  if (status === 401 || status === 403) {
    return true;
  }
  const body = igErrorBodySchema.safeParse(data);
  return body.success && AUTH_ERROR_PATTERN.test(body.data.errorCode);
};

/**
 * Owns the broker's authenticated REST session. Logins are serialized so
 * concurrent callers share a single re-authentication.
 */
@Injectable()
export class IgClient {
  private readonly logger = new Logger(IgClient.name);
  private readonly http: AxiosInstance;
  private readonly username: string;
  private readonly password: string;
  private readonly apiKey: string;
  private readonly sessionLock = new Mutex();
  private session: IgSession | null = null;
  private loginCount = 0;

  constructor(configService: ConfigService) {
    const endpoints = getProviderEndpoints(configService, 'ig');
    this.username = configService.get<string>('IG_USERNAME', '').trim();
    this.password = configService.get<string>('IG_PASSWORD', '');
    this.apiKey = configService.get<string>('IG_API_KEY', '').trim();
    this.http = createHttpClient(endpoints.rest, getRestTimeoutMs(configService), {
      'Content-Type': 'application/json; charset=UTF-8',
      'X-IG-API-KEY': this.apiKey,
    });
  }

  get isConfigured(): boolean {
    return Boolean(this.username && this.password && this.apiKey);
  }

  /** Number of logins performed over the process lifetime. */
  get logins(): number {
    return this.loginCount;
  }

  async ensureSession(): Promise<IgSession> {
    const current = this.session;
    if (current) {
      return current;
    }
    return this.sessionLock.runExclusive(async () => {
      // another caller may have logged in while we waited
      if (this.session) {
        return this.session;
      }
      this.session = await this.login();
      return this.session;
    });
  }

  /** Drops `stale` unless a newer session already replaced it. */
  invalidate(stale?: IgSession): void {
    if (!stale || this.session === stale) {
      this.session = null;
    }
  }

  async forceReconnect(): Promise<void> {
    await this.sessionLock.runExclusive(async () => {
      await this.endSession();
      this.session = await this.login();
    });
  }

  async logout(): Promise<void> {
    await this.sessionLock.runExclusive(() => this.endSession());
  }

  async getMarket(epic: string): Promise<IgMarketDetails> {
    const data = await this.request<unknown>(`/markets/${encodeURIComponent(epic)}`, '3');
    const parsed = igMarketDetailsSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedResponseError('ig', `market ${epic}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async searchMarkets(term: string): Promise<MarketSearchResult[]> {
    const data = await this.request<unknown>('/markets', '1', { searchTerm: term });
    const parsed = igSearchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedResponseError('ig', `search ${term}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data.markets;
  }

  private async request<T>(path: string, version: string, params?: Record<string, string>): Promise<T> {
    const session = await this.ensureSession();
    try {
      const response = await this.http.get<T>(path, {
        params,
        headers: { Version: version, CST: session.cst, 'X-SECURITY-TOKEN': session.securityToken },
      });
      return response.data;
    } catch (error) {
      if (isSessionError(error)) {
        this.invalidate(session);
        throw new AuthExpiredError('ig', errorMessage(error));
      }
      throw error;
    }
  }

  private async login(): Promise<IgSession> {
    if (!this.isConfigured) {
      throw new ConfigurationError('IG_USERNAME, IG_PASSWORD and IG_API_KEY are required');
    }
    const response = await this.http.post(
      '/session',
      { identifier: this.username, password: this.password },
      { headers: { Version: '2' } },
    );
    const cst = response.headers['cst'];
    const securityToken = response.headers['x-security-token'];
    if (typeof cst !== 'string' || typeof securityToken !== 'string') {
      throw new MalformedResponseError('ig', 'session tokens missing from login response');
    }
    this.loginCount += 1;
    this.logger.log(JSON.stringify({ event: 'ig_session_established', logins: this.loginCount }));
    return { cst, securityToken, createdAt: Date.now() };
  }

  private async endSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    try {
      await this.http.delete('/session', {
        headers: { Version: '1', CST: session.cst, 'X-SECURITY-TOKEN': session.securityToken },
      });
    } catch (error) {
      // the server may already have dropped it
      this.logger.warn(JSON.stringify({ event: 'ig_logout_failed', message: errorMessage(error) }));
    }
  }
}
