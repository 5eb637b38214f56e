import type { TradingSymbol } from '@/domain/types';

/**
 * 取引所 WebSocket API に送信するコマンドの型定義。
 * token は API トークンが設定されている場合だけ付与する。
 */
export interface ExchangeSubscribeCommand {
  action: 'subscribe';
  channel: 'trades';
  symbol: TradingSymbol;
  token?: string;
}

export interface ExchangeUnsubscribeCommand {
  action: 'unsubscribe';
  channel: 'trades';
  symbol: TradingSymbol;
  token?: string;
}

export type ExchangeCommand = ExchangeSubscribeCommand | ExchangeUnsubscribeCommand;
