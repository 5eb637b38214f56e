import type { TradingSymbol } from '@/domain/types';

/**
 * アプリケーション層: シンボル単位の購読参照カウント
 *
 * 責務: 下流の購読・購読解除を数え、上流へ実際に (un)subscribe を送るべきかを判断する。
 * 各メソッドは同期的に完結するため、イベントループ上で1呼び出しずつ直列に実行される。
 */
export class SubscriptionManager {
  private readonly referenceCounts = new Map<TradingSymbol, number>();

  /**
   * 参照カウントを 1 増やす。
   * @returns 0 → 1 に遷移した場合のみ true（呼び出し側は上流に subscribe を送る）
   */
  shouldSubscribeDownstream(symbol: TradingSymbol): boolean {
    const next = this.getReferenceCount(symbol) + 1;
    this.referenceCounts.set(symbol, next);
    return next === 1;
  }

  /**
   * 参照カウントを 1 減らす（0 未満にはならない）。
   * @returns ちょうど 0 に遷移した場合のみ true（呼び出し側は上流に unsubscribe を送る）
   */
  shouldUnsubscribeDownstream(symbol: TradingSymbol): boolean {
    const current = this.getReferenceCount(symbol);
    if (current === 0) {
      return false;
    }

    const next = current - 1;
    if (next === 0) {
      this.referenceCounts.delete(symbol);
      return true;
    }
    this.referenceCounts.set(symbol, next);
    return false;
  }

  getReferenceCount(symbol: TradingSymbol): number {
    return this.referenceCounts.get(symbol) ?? 0;
  }

  /**
   * 参照カウントが 1 以上のシンボル（再接続時の再購読対象）。
   */
  activeSymbols(): TradingSymbol[] {
    return [...this.referenceCounts.keys()];
  }
}
