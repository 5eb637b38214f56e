import type { TradeRepository } from '@/application/interfaces/TradeRepository';
import { assertCount } from '@/domain/errors';
import type { Trade, TradingSymbol } from '@/domain/types';
import { CachedTrades, DEFAULT_MAX_TRADES_PER_SYMBOL } from './CachedTrades';

export interface InMemoryTradeCacheOptions {
  /** シンボルごとの保持上限 */
  maxTradesPerSymbol?: number;
}

/**
 * インフラ層: シンボル別の約定キャッシュ
 *
 * エントリは最初の約定で作られる。未知のシンボルへの問い合わせは空配列 / 0 を返す。
 * すべての操作は同期的なので、イベントループ上では互いにアトミック。
 */
export class InMemoryTradeCache implements TradeRepository {
  private readonly entries = new Map<TradingSymbol, CachedTrades>();
  private readonly maxTradesPerSymbol: number;

  constructor(options: InMemoryTradeCacheOptions = {}) {
    this.maxTradesPerSymbol = options.maxTradesPerSymbol ?? DEFAULT_MAX_TRADES_PER_SYMBOL;
  }

  tryAdd(trade: Trade): boolean {
    let entry = this.entries.get(trade.symbol);
    if (!entry) {
      entry = new CachedTrades(this.maxTradesPerSymbol);
      this.entries.set(trade.symbol, entry);
    }
    return entry.tryAdd(trade);
  }

  getRecentTrades(symbol: TradingSymbol, count: number, beforeTimestamp?: number): Trade[] {
    assertCount(count);
    return this.entries.get(symbol)?.getRecentTrades(count, beforeTimestamp) ?? [];
  }

  getTradesSince(symbol: TradingSymbol, count: number, afterTimestamp: number): Trade[] {
    assertCount(count);
    return this.entries.get(symbol)?.getTradesSince(count, afterTimestamp) ?? [];
  }

  clearTrades(symbol: TradingSymbol): void {
    this.entries.get(symbol)?.clear();
  }

  count(symbol: TradingSymbol): number {
    return this.entries.get(symbol)?.count ?? 0;
  }

  /** エントリを持つシンボル */
  symbols(): TradingSymbol[] {
    return [...this.entries.keys()];
  }
}
