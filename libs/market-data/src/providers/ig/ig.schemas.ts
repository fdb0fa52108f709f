import { z } from 'zod';

const optionalNumber = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return undefined;
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  });

export const igMarketSnapshotSchema = z.object({
  bid: optionalNumber,
  offer: optionalNumber,
  netChange: optionalNumber,
  percentageChange: optionalNumber,
  marketStatus: z.string().optional(),
  updateTime: z.string().nullish(),
});

export const igMarketDetailsSchema = z.object({
  instrument: z.object({
    epic: z.string(),
    name: z.string(),
    type: z.string().optional(),
    marketId: z.string().nullish(),
    country: z.string().nullish(),
    currencies: z
      .array(z.object({ code: z.string(), isDefault: z.boolean().optional() }))
      .nullish(),
  }),
  snapshot: igMarketSnapshotSchema,
});

export type IgMarketDetails = z.infer<typeof igMarketDetailsSchema>;

export const igSearchResponseSchema = z.object({
  markets: z
    .array(
      z.object({
        epic: z.string(),
        instrumentName: z.string(),
        instrumentType: z.string().default('UNKNOWN'),
        marketStatus: z.string().default('UNKNOWN'),
        streamingPricesAvailable: z.boolean().default(false),
        expiry: z.string().optional(),
        bid: optionalNumber,
        offer: optionalNumber,
      }),
    )
    .nullish()
    .transform((markets) => markets ?? []),
});

export const igErrorBodySchema = z.object({ errorCode: z.string() });
