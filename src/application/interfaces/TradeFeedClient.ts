import type { ListenerRegistry } from '@/application/events/ListenerRegistry';
import type { SubscriptionResponse, Trade, TradingSymbol } from '@/domain/types';
import type { Connectable } from './Connectable';

/**
 * 上流フィードが発行するイベント。
 */
export type TradeFeedEvents = {
  trade: Trade;
  subscriptionConfirmed: SubscriptionResponse;
  /** 意図しない切断を検知した */
  connectionLost: void;
  /** 切断後の接続が確立した（上流は購読を覚えていないので再購読が必要） */
  connectionRestored: void;
};

/**
 * アプリケーション層: 上流の約定フィードクライアントの契約
 *
 * 責務: 取引所ごとのワイヤーフォーマットを隠蔽し、完全な Trade だけを通知する。
 */
export interface TradeFeedClient extends Connectable {
  readonly events: ListenerRegistry<TradeFeedEvents>;

  subscribeToTrades(symbol: TradingSymbol, signal?: AbortSignal): Promise<void>;

  unsubscribeFromTrades(symbol: TradingSymbol, signal?: AbortSignal): Promise<void>;
}
