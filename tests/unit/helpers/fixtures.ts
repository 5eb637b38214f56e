import { createTrade, type Trade } from '@/domain/types';

/** 2024-01-01T00:00:00Z のエポックマイクロ秒 */
export const BASE_TIMESTAMP_US = 1_704_067_200_000_000;

/**
 * テスト用の約定を作る。未指定のフィールドは BTC-USD の買い約定で埋める。
 */
export function makeTrade(overrides: Partial<Trade> & Pick<Trade, 'tradeId'>): Trade {
  return createTrade({
    sequenceNumber: 1,
    eventKind: 'updated',
    symbol: 'BTC-USD',
    timestamp: BASE_TIMESTAMP_US,
    side: 'buy',
    quantity: 0.5,
    price: 42000,
    ...overrides,
  });
}
