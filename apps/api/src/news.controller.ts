import { Controller, Get, Param, Query } from '@nestjs/common';
import { FinnhubProvider, NewsItem } from '@libs/market-data';
import { companyNewsQuerySchema, marketNewsQuerySchema, parseOrBadRequest } from './validation';

@Controller('api/v1/news')
export class NewsController {
  constructor(private readonly finnhub: FinnhubProvider) {}

  @Get('company/:symbol')
  companyNews(@Param('symbol') symbol: string, @Query() query: Record<string, string>): Promise<NewsItem[]> {
    const { days } = parseOrBadRequest(companyNewsQuerySchema, query);
    return this.finnhub.getCompanyNews(symbol, days);
  }

  @Get('market')
  marketNews(@Query() query: Record<string, string>): Promise<NewsItem[]> {
    const { category, limit } = parseOrBadRequest(marketNewsQuerySchema, query);
    return this.finnhub.getMarketNews(category, limit);
  }
}
