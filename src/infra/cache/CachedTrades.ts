import { assertCount } from '@/domain/errors';
import type { Trade } from '@/domain/types';

export const DEFAULT_MAX_TRADES_PER_SYMBOL = 10_000;

/**
 * インフラ層: 1シンボル分の約定キャッシュ
 *
 * 配列はタイムスタンプの降順（新しい順）に保つ。挿入時に二分探索で位置を決めるので、
 * 読み出し時にソートし直すことはない。同じタイムスタンプ同士は到着順に並ぶ。
 *
 * 上限に達した後は、保持中のどの約定よりも新しくないものを受け付けない。追い出された約定は
 * 常に保持中の最古以下なので、同じ tradeId が再送されてもこの条件で弾かれる。
 */
export class CachedTrades {
  private readonly trades: Trade[] = [];
  private readonly tradeIds = new Set<string>();

  /**
   * @param maxTrades 保持する最大件数。超えた分は古いものから捨てる。
   */
  constructor(private readonly maxTrades: number = DEFAULT_MAX_TRADES_PER_SYMBOL) {
    if (!Number.isInteger(maxTrades) || maxTrades < 1) {
      throw new RangeError(`maxTrades must be a positive integer, got ${maxTrades}`);
    }
  }

  get count(): number {
    return this.trades.length;
  }

  /**
   * @returns 追加した場合は true。同じ tradeId が既にある場合と、上限に達していて
   *   挿入位置が保持範囲の外になる場合は何も変更せず false。
   */
  tryAdd(trade: Trade): boolean {
    if (this.tradeIds.has(trade.tradeId)) {
      return false;
    }

    const index = this.indexOfFirstOlderThan(trade.timestamp);
    if (index >= this.maxTrades) {
      return false;
    }
    this.trades.splice(index, 0, trade);
    this.tradeIds.add(trade.tradeId);

    while (this.trades.length > this.maxTrades) {
      const evicted = this.trades.pop();
      if (evicted) {
        this.tradeIds.delete(evicted.tradeId);
      }
    }
    return true;
  }

  /**
   * 新しい順に最大 count 件。beforeTimestamp 指定時は timestamp < beforeTimestamp のものだけ。
   */
  getRecentTrades(count: number, beforeTimestamp?: number): Trade[] {
    assertCount(count);
    const start = beforeTimestamp === undefined ? 0 : this.indexOfFirstOlderThan(beforeTimestamp);
    return this.trades.slice(start, start + count);
  }

  /**
   * timestamp > afterTimestamp のものを新しい順に最大 count 件。
   */
  getTradesSince(count: number, afterTimestamp: number): Trade[] {
    assertCount(count);
    const end = this.indexOfFirstNotNewerThan(afterTimestamp);
    return this.trades.slice(0, Math.min(end, count));
  }

  clear(): void {
    this.trades.length = 0;
    this.tradeIds.clear();
  }

  /** timestamp < ts となる最初の位置 */
  private indexOfFirstOlderThan(ts: number): number {
    let low = 0;
    let high = this.trades.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.trades[mid].timestamp < ts) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }
    return low;
  }

  /** timestamp <= ts となる最初の位置 */
  private indexOfFirstNotNewerThan(ts: number): number {
    let low = 0;
    let high = this.trades.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.trades[mid].timestamp <= ts) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }
    return low;
  }
}
