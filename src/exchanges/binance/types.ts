import { z } from 'zod';

export const binanceErrorBodySchema = z.object({
  code: z.number().int(),
  msg: z.string()
});

export type BinanceErrorBody = z.infer<typeof binanceErrorBodySchema>;

export const binanceServerTimeSchema = z.object({
  serverTime: z.number()
});

export const binancePayloadSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);
