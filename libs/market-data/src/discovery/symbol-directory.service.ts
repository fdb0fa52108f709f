import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '@libs/core';
import { normalizeSymbol } from '../instrument-classifier';
import {
  SYMBOL_DIRECTORY_REPOSITORY,
  SymbolDirectoryRepository,
  SymbolListQuery,
  UpsertOptions,
} from '../interfaces';
import { AssetClass, InstrumentMapping, InstrumentMappingInput } from '../models';

@Injectable()
export class SymbolDirectoryService {
  private readonly logger = new Logger(SymbolDirectoryService.name);

  constructor(
    @Inject(SYMBOL_DIRECTORY_REPOSITORY)
    private readonly repository: SymbolDirectoryRepository,
  ) {}

  /** Mapping for `symbol`, active or not; a store failure reads as a miss. */
  async find(symbol: string): Promise<InstrumentMapping | null> {
    try {
      return await this.repository.findBySymbol(normalizeSymbol(symbol));
    } catch (error) {
      this.logger.warn(
        JSON.stringify({ event: 'directory_lookup_failed', symbol, message: errorMessage(error) }),
      );
      return null;
    }
  }

  async lookup(symbol: string): Promise<InstrumentMapping | null> {
    const mapping = await this.find(symbol);
    return mapping?.active ? mapping : null;
  }

  async lookupByEpic(epic: string): Promise<InstrumentMapping | null> {
    try {
      return await this.repository.findByEpic(epic);
    } catch (error) {
      this.logger.warn(
        JSON.stringify({ event: 'directory_lookup_failed', epic, message: errorMessage(error) }),
      );
      return null;
    }
  }

  save(input: InstrumentMappingInput, options?: UpsertOptions): Promise<InstrumentMapping> {
    return this.repository.upsert({ ...input, symbol: normalizeSymbol(input.symbol) }, options);
  }

  deactivate(symbol: string): Promise<boolean> {
    return this.repository.deactivate(normalizeSymbol(symbol));
  }

  list(query: SymbolListQuery): Promise<InstrumentMapping[]> {
    return this.repository.list(query);
  }

  async summary(): Promise<{ total: number; byAssetClass: Partial<Record<AssetClass, number>> }> {
    const byAssetClass = await this.repository.countByAssetClass();
    const total = Object.values(byAssetClass).reduce((sum, count) => sum + count, 0);
    return { total, byAssetClass };
  }

  ping(): Promise<boolean> {
    return this.repository.ping();
  }
}
