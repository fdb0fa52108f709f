import { Controller, Get, Param } from '@nestjs/common';
import { MarketSearchResult, PriceAggregatorService } from '@libs/market-data';

@Controller('api/v1/markets')
export class MarketsController {
  constructor(private readonly aggregator: PriceAggregatorService) {}

  @Get('search/:term')
  search(@Param('term') term: string): Promise<MarketSearchResult[]> {
    return this.aggregator.searchMarkets(term);
  }
}
