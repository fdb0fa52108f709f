import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import { ASSET_CLASSES } from '@libs/market-data';

export const parseOrBadRequest = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return parsed.data;
};

const optionalInt = (def: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).optional().default(def);

export const bulkPricesSchema = z.object({
  symbols: z.array(z.string().trim().min(1).max(32)).min(1).max(500),
});

export const symbolListQuerySchema = z.object({
  asset_class: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(ASSET_CLASSES))
    .optional(),
  active_only: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value !== 'false'),
  limit: optionalInt(100, 1, 1000),
  offset: optionalInt(0, 0, 1_000_000),
});

export const companyNewsQuerySchema = z.object({ days: optionalInt(1, 1, 30) });

export const marketNewsQuerySchema = z.object({
  category: z.enum(['general', 'forex', 'crypto', 'merger']).optional().default('general'),
  limit: optionalInt(20, 1, 100),
});

export const calendarQuerySchema = (defaultDays: number) =>
  z.object({ days: optionalInt(defaultDays, 1, 90) });
