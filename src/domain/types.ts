/**
 * ドメイン層: 約定データの型定義
 *
 * 注意: Trade は値オブジェクトとして扱い、生成後は変更しない。
 * 生成は必ず createTrade() を経由する（部分的に埋まった Trade を作らないため）。
 */

/**
 * 中継対象の取引ペア。
 */
export const TRADING_SYMBOLS = ['BTC-USD', 'ETH-USD', 'SOL-USD', 'LTC-USD'] as const;

export type TradingSymbol = (typeof TRADING_SYMBOLS)[number];

/**
 * 上流フィードが通知するイベント種別。
 */
export type TradeEventKind = 'subscribed' | 'unsubscribed' | 'rejected' | 'snapshot' | 'updated';

/** 約定方向 */
export type TradeSide = 'buy' | 'sell';

/**
 * 1件の約定。
 * tradeId はシンボル内での重複排除キー（上流は一意性を保証しない）。
 */
export interface Trade {
  /** 上流のシーケンス番号 */
  readonly sequenceNumber: number;
  readonly eventKind: TradeEventKind;
  readonly symbol: TradingSymbol;
  /** 約定時刻（UTC エポックマイクロ秒） */
  readonly timestamp: number;
  readonly side: TradeSide;
  /** 約定数量 */
  readonly quantity: number;
  /** 約定価格 */
  readonly price: number;
  readonly tradeId: string;
}

/**
 * 購読・購読解除に対する上流からの応答。
 */
export interface SubscriptionResponse {
  readonly sequenceNumber: number;
  readonly eventKind: TradeEventKind;
  readonly symbol: TradingSymbol;
}

/**
 * 文字列が中継対象のシンボルかどうかを判定する。
 */
export function isTradingSymbol(value: string): value is TradingSymbol {
  return TRADING_SYMBOLS.some((symbol) => symbol === value);
}

/**
 * 凍結済みの Trade を生成する。
 */
export function createTrade(fields: Trade): Trade {
  return Object.freeze({
    sequenceNumber: fields.sequenceNumber,
    eventKind: fields.eventKind,
    symbol: fields.symbol,
    timestamp: fields.timestamp,
    side: fields.side,
    quantity: fields.quantity,
    price: fields.price,
    tradeId: fields.tradeId,
  });
}
