import { z } from 'zod';
import { TRADING_SYMBOLS } from '@/domain/types';

const SymbolSchema = z.enum(TRADING_SYMBOLS);
const Count = z.number().int().nonnegative().max(10_000);
const Timestamp = z.number().int();

export const SubscribeParamsSchema = z.object({
  channel: z.literal('trades'),
  symbol: SymbolSchema,
});

export const GetRecentTradesParamsSchema = z.object({
  symbol: SymbolSchema,
  count: Count.optional(),
  before: Timestamp.optional(),
});

export const GetTradesSinceParamsSchema = z.object({
  symbol: SymbolSchema,
  count: Count.optional(),
  after: Timestamp,
});

export type SubscribeParams = z.infer<typeof SubscribeParamsSchema>;
export type GetRecentTradesParams = z.infer<typeof GetRecentTradesParamsSchema>;
export type GetTradesSinceParams = z.infer<typeof GetTradesSinceParamsSchema>;
