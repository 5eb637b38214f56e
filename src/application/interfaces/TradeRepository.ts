import type { Trade, TradingSymbol } from '@/domain/types';

/**
 * 約定キャッシュのインターフェイス（インフラ層で実装される）。
 * タイムスタンプはすべてエポックマイクロ秒。
 */
export interface TradeRepository {
  /**
   * 約定を追加する。
   * @returns 新規に追加された場合は true、同じ tradeId が既にある場合は false
   */
  tryAdd(trade: Trade): boolean;

  /**
   * 新しい順に最大 count 件を返す。beforeTimestamp を指定した場合はそれより厳密に古いものだけ。
   */
  getRecentTrades(symbol: TradingSymbol, count: number, beforeTimestamp?: number): Trade[];

  /**
   * afterTimestamp より厳密に新しい約定のうち、新しい順に最大 count 件を返す。
   */
  getTradesSince(symbol: TradingSymbol, count: number, afterTimestamp: number): Trade[];

  clearTrades(symbol: TradingSymbol): void;

  count(symbol: TradingSymbol): number;
}
