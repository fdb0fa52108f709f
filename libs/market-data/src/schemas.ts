import { z } from 'zod';
import { ASSET_CLASSES } from './models';

export const priceRecordSchema = z.object({
  symbol: z.string(),
  assetClass: z.enum(ASSET_CLASSES),
  price: z.number(),
  changePercent: z.number(),
  changeAbsolute: z.number(),
  volume: z.number().optional(),
  marketCap: z.number().optional(),
  timestamp: z.string(),
  source: z.string(),
});

export const newsItemSchema = z.object({
  headline: z.string(),
  summary: z.string(),
  source: z.string(),
  url: z.string(),
  timestamp: z.string(),
  symbol: z.string().optional(),
});

export const calendarEventSchema = z.object({
  symbol: z.string(),
  eventType: z.enum(['ipo', 'earnings']),
  date: z.string(),
  description: z.string(),
  estimate: z.number().optional(),
  actual: z.number().optional(),
});

const observationSchema = z.object({ date: z.string(), value: z.number() });

export const macroSeriesSchema = z.object({
  name: z.string(),
  seriesId: z.string(),
  latestValue: z.number(),
  latestDate: z.string(),
  previousValue: z.number().nullable(),
  changeFromPrevious: z.number().nullable(),
  percentChangeFromPrevious: z.number().nullable(),
  percentChangeYearAgo: z.number().nullable(),
  history: z.array(observationSchema),
});
