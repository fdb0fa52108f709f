import { Controller, Get, Query } from '@nestjs/common';
import { CalendarEvent, FinnhubProvider } from '@libs/market-data';
import { calendarQuerySchema, parseOrBadRequest } from './validation';

const ipoQuerySchema = calendarQuerySchema(14);
const earningsQuerySchema = calendarQuerySchema(7);

@Controller('api/v1/calendar')
export class CalendarController {
  constructor(private readonly finnhub: FinnhubProvider) {}

  @Get('ipo')
  ipo(@Query() query: Record<string, string>): Promise<CalendarEvent[]> {
    return this.finnhub.getIpoCalendar(parseOrBadRequest(ipoQuerySchema, query).days);
  }

  @Get('earnings')
  earnings(@Query() query: Record<string, string>): Promise<CalendarEvent[]> {
    return this.finnhub.getEarningsCalendar(parseOrBadRequest(earningsQuerySchema, query).days);
  }
}
