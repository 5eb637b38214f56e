import type { Trade } from '@/domain/types';

/**
 * 約定の配信先のインターフェイス（インフラ層で実装される）。
 */
export interface TradePublisher {
  /**
   * 約定を1件配信する。
   * @throws 配信先への書き込みに失敗した場合
   */
  publish(trade: Trade): Promise<void>;

  close(): Promise<void>;
}
