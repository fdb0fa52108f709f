import { Controller, Get, HttpCode, NotFoundException, Param, Post, Query } from '@nestjs/common';
import { SymbolNotFoundError } from '@libs/core';
import {
  AssetClass,
  IgPriceProvider,
  InstrumentMapping,
  MarketMetadata,
  SymbolDirectoryService,
  SymbolDiscoveryService,
} from '@libs/market-data';
import { parseOrBadRequest, symbolListQuerySchema } from './validation';

@Controller('api/v1/metadata')
export class MetadataController {
  constructor(
    private readonly directory: SymbolDirectoryService,
    private readonly discovery: SymbolDiscoveryService,
    private readonly broker: IgPriceProvider,
  ) {}

  @Get('epic/:epic')
  async getEpic(@Param('epic') epic: string): Promise<MarketMetadata> {
    const metadata = await this.broker.getMarketMetadata(epic.trim().toUpperCase());
    if (!metadata) {
      throw new NotFoundException(`No metadata found for epic ${epic}`);
    }
    return metadata;
  }

  @Get('symbol/:symbol')
  async getSymbol(@Param('symbol') symbol: string): Promise<InstrumentMapping> {
    const mapping = (await this.directory.find(symbol)) ?? (await this.discovery.discover(symbol));
    if (!mapping) {
      throw new SymbolNotFoundError(symbol.toUpperCase());
    }
    return mapping;
  }

  @Post('symbol/:symbol/rediscover')
  @HttpCode(200)
  async rediscover(@Param('symbol') symbol: string): Promise<InstrumentMapping> {
    const mapping = await this.discovery.rediscover(symbol);
    if (!mapping) {
      throw new SymbolNotFoundError(symbol.toUpperCase());
    }
    return mapping;
  }

  @Get('database/symbols')
  async listSymbols(
    @Query() query: Record<string, string>,
  ): Promise<{ symbols: InstrumentMapping[]; count: number; limit: number; offset: number }> {
    const { asset_class, active_only, limit, offset } = parseOrBadRequest(symbolListQuerySchema, query);
    const symbols = await this.directory.list({ assetClass: asset_class, activeOnly: active_only, limit, offset });
    return { symbols, count: symbols.length, limit, offset };
  }

  @Get('database/summary')
  summary(): Promise<{ total: number; byAssetClass: Partial<Record<AssetClass, number>> }> {
    return this.directory.summary();
  }
}
