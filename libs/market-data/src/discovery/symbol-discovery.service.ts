import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TimeoutError, errorMessage } from '@libs/core';
import { normalizeSymbol } from '../instrument-classifier';
import { InstrumentMapping } from '../models';
import { IgClient } from '../providers/ig/ig.client';
import { InFlightRequests, withTimeout } from '../utils/async.util';
import { cleanDisplayName, inferAssetClass, searchTermFor, selectCandidate } from './instrument-metadata';
import { SymbolDirectoryService } from './symbol-directory.service';

/**
 * Resolves unknown symbols against the broker's market search and persists
 * the result. A failed attempt leaves nothing behind, so the next request
 * tries again.
 */
@Injectable()
export class SymbolDiscoveryService {
  private readonly logger = new Logger(SymbolDiscoveryService.name);
  private readonly inFlight = new InFlightRequests<InstrumentMapping | null>();
  private readonly timeoutMs: number;

  constructor(
    configService: ConfigService,
    private readonly igClient: IgClient,
    private readonly directory: SymbolDirectoryService,
  ) {
    this.timeoutMs = configService.get<number>('DISCOVERY_TIMEOUT_MS', 10000);
  }

  discover(symbol: string): Promise<InstrumentMapping | null> {
    const canonical = normalizeSymbol(symbol);
    return this.inFlight.run(canonical, () => this.resolve(canonical, false));
  }

  /**
   * Runs discovery again for a symbol that may already be resolved, and puts a
   * deactivated mapping back into use.
   */
  rediscover(symbol: string): Promise<InstrumentMapping | null> {
    const canonical = normalizeSymbol(symbol);
    return this.inFlight.run(`${canonical}:rediscover`, () => this.resolve(canonical, true));
  }

  private async resolve(symbol: string, reactivate: boolean): Promise<InstrumentMapping | null> {
    const term = searchTermFor(symbol);
    try {
      const candidates = await withTimeout(this.igClient.searchMarkets(term), this.timeoutMs, 'market search');
      const candidate = selectCandidate(term, candidates);
      if (!candidate) {
        this.logger.warn(
          JSON.stringify({ event: 'discovery_no_candidate', symbol, term, candidates: candidates.length }),
        );
        return null;
      }

      const details = await withTimeout(
        this.igClient.getMarket(candidate.epic),
        this.timeoutMs,
        'market details',
      );
      const mapping = await withTimeout(
        this.directory.save({
          symbol,
          epic: candidate.epic,
          displayName: cleanDisplayName(details.instrument.name),
          assetClass: inferAssetClass(symbol, candidate.epic, details.instrument.type ?? candidate.instrumentType),
        }, { reactivate }),
        this.timeoutMs,
        'directory upsert',
      );
      this.logger.log(
        JSON.stringify({
          event: 'symbol_discovered',
          symbol,
          epic: mapping.epic,
          assetClass: mapping.assetClass,
        }),
      );
      return mapping;
    } catch (error) {
      this.logger.warn(
        JSON.stringify({
          event: error instanceof TimeoutError ? 'discovery_timeout' : 'discovery_failed',
          symbol,
          message: errorMessage(error),
        }),
      );
      return null;
    }
  }
}
