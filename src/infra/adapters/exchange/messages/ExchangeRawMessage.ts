import { z } from 'zod';

/** 数値、または数値として読める文字列（価格・数量は文字列で届くことがある） */
const NumericSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite()),
]);

/**
 * 取引所 WebSocket API から受信するメッセージのスキーマ。
 * event によって必要なフィールドが変わるので、ここではすべて任意にして
 * 組み立て時（ExchangeMessageParser）に検査する。
 */
export const ExchangeRawMessageSchema = z.object({
  seqnum: z.number().int().nonnegative().optional(),
  event: z.string(),
  channel: z.string().optional(),
  symbol: z.string().optional(),
  timestamp: z.string().optional(),
  side: z.string().optional(),
  qty: NumericSchema.optional(),
  price: NumericSchema.optional(),
  trade_id: z.union([z.string().min(1), z.number().int().transform(String)]).optional(),
});

export type ExchangeRawMessage = z.infer<typeof ExchangeRawMessageSchema>;
