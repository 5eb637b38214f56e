import {
  type Listener,
  ListenerRegistry,
  type ListenerToken,
} from '@/application/events/ListenerRegistry';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TradeFeedClient } from '@/application/interfaces/TradeFeedClient';
import type { TradeRepository } from '@/application/interfaces/TradeRepository';
import type { SubscriptionResponse, Trade, TradingSymbol } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { ConnectionManager } from '@/infra/reconnect/ConnectionManager';
import type { SubscriptionManager } from './SubscriptionManager';

/**
 * 下流の利用者に公開するイベント。
 */
export type TradeDataServiceEvents = {
  /** キャッシュに新規追加された約定（同じ tradeId は2度通知しない） */
  trade: Trade;
  subscriptionConfirmed: SubscriptionResponse;
  connectionLost: void;
  /** 再購読が済んでから通知する */
  connectionRestored: void;
};

export interface TradeDataServiceDeps {
  feedClient: TradeFeedClient;
  connectionManager: ConnectionManager;
  subscriptionManager: SubscriptionManager;
  tradeCache: TradeRepository;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

export const DEFAULT_RECENT_TRADES_COUNT = 100;

/**
 * アプリケーション層: 約定データの中継サービス
 *
 * 責務:
 * - 上流フィードのイベントを受けてキャッシュに積み、新規の約定だけを下流へ流す
 * - 下流の購読を参照カウントし、上流への (un)subscribe を必要なときだけ送る
 * - 再接続後に有効な購読を1回ずつ送り直す
 */
export class TradeDataService {
  readonly events: ListenerRegistry<TradeDataServiceEvents>;

  private readonly feedClient: TradeFeedClient;
  private readonly connectionManager: ConnectionManager;
  private readonly subscriptionManager: SubscriptionManager;
  private readonly tradeCache: TradeRepository;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  private feedTokens: ListenerToken[] = [];
  private running = false;
  /** 上流に subscribe 済み（または送信中）のシンボル */
  private readonly upstreamSubscribed = new Set<TradingSymbol>();
  /** 上流への subscribe が送信中のシンボル。後続の購読者はこれの完了を待つ。 */
  private readonly pendingSubscribes = new Map<TradingSymbol, Promise<void>>();

  constructor(deps: TradeDataServiceDeps) {
    this.feedClient = deps.feedClient;
    this.connectionManager = deps.connectionManager;
    this.subscriptionManager = deps.subscriptionManager;
    this.tradeCache = deps.tradeCache;
    this.logger = deps.logger ?? LoggerFactory.forComponent('TradeDataService');
    this.metricsCollector = deps.metricsCollector;
    this.events = new ListenerRegistry((event, error) => {
      this.logger.error('Consumer listener threw', { event, err: error });
      this.metricsCollector?.incrementError('listener_error');
    });
  }

  get isConnected(): boolean {
    return this.connectionManager.isConnected;
  }

  get isRunning(): boolean {
    return this.running;
  }

  on<K extends keyof TradeDataServiceEvents & string>(
    event: K,
    listener: Listener<TradeDataServiceEvents[K]>
  ): ListenerToken {
    return this.events.on(event, listener);
  }

  off(token: ListenerToken): boolean {
    return this.events.off(token);
  }

  /**
   * フィードのハンドラを登録してから上流に接続する。
   * 接続後、停止中に記録された購読を上流へ送る。
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (!this.running) {
      const feed = this.feedClient.events;
      this.feedTokens = [
        feed.on('trade', (trade) => this.onTrade(trade)),
        feed.on('subscriptionConfirmed', (response) => this.onSubscriptionConfirmed(response)),
        feed.on('connectionLost', () => this.onConnectionLost()),
        feed.on('connectionRestored', () => this.onConnectionRestored()),
      ];
      this.running = true;
    }

    await this.connectionManager.start(signal);

    if (this.running && this.feedClient.isConnected) {
      await this.syncSubscriptions(signal);
    }
  }

  /**
   * ハンドラを先に外してから切断する。以降に届いたフィードのイベントは捨てる。
   */
  async stop(signal?: AbortSignal): Promise<void> {
    this.running = false;
    for (const token of this.feedTokens) {
      this.feedClient.events.off(token);
    }
    this.feedTokens = [];
    this.upstreamSubscribed.clear();
    this.pendingSubscribes.clear();

    await this.connectionManager.stop(signal);
  }

  /**
   * 下流の購読を1件追加する。最初の購読者のときだけ上流に subscribe を送る。
   * 送信中に来た購読者はその完了を待ち、失敗すれば同じく自分の分を戻して例外を投げる。
   * 未接続の場合は参照カウントだけ記録し、接続（復旧）時に送る。
   * @throws {Error} 上流への subscribe に失敗した場合（参照カウントは元に戻す）
   */
  async subscribeToTrades(symbol: TradingSymbol, signal?: AbortSignal): Promise<void> {
    if (!this.subscriptionManager.shouldSubscribeDownstream(symbol)) {
      const pending = this.pendingSubscribes.get(symbol);
      if (pending) {
        try {
          await pending;
        } catch (error) {
          this.subscriptionManager.shouldUnsubscribeDownstream(symbol);
          throw new Error(`Failed to subscribe to trades for ${symbol}`, { cause: error });
        }
      }
      return;
    }

    if (!this.feedClient.isConnected) {
      this.logger.info('Feed not connected, subscription deferred until connect', { symbol });
      return;
    }

    this.upstreamSubscribed.add(symbol);
    const request = this.feedClient.subscribeToTrades(symbol, signal);
    this.pendingSubscribes.set(symbol, request);
    try {
      await request;
    } catch (error) {
      this.subscriptionManager.shouldUnsubscribeDownstream(symbol);
      this.upstreamSubscribed.delete(symbol);
      this.metricsCollector?.incrementError('subscribe_error');
      this.logger.error('Upstream subscribe failed', { symbol, err: error });
      throw new Error(`Failed to subscribe to trades for ${symbol}`, { cause: error });
    } finally {
      if (this.pendingSubscribes.get(symbol) === request) {
        this.pendingSubscribes.delete(symbol);
      }
    }
  }

  /**
   * 下流の購読を1件外す。最後の購読者のときだけ上流に unsubscribe を送る。
   * 上流への送信失敗はログに残すだけで、呼び出し側には返さない。
   */
  async unsubscribeFromTrades(symbol: TradingSymbol, signal?: AbortSignal): Promise<void> {
    if (!this.subscriptionManager.shouldUnsubscribeDownstream(symbol)) {
      return;
    }
    if (!this.upstreamSubscribed.delete(symbol)) {
      return;
    }
    if (!this.feedClient.isConnected) {
      return;
    }

    try {
      await this.feedClient.unsubscribeFromTrades(symbol, signal);
    } catch (error) {
      this.metricsCollector?.incrementError('unsubscribe_error');
      this.logger.warn('Upstream unsubscribe failed', { symbol, err: error });
    }
  }

  getRecentTrades(
    symbol: TradingSymbol,
    count: number = DEFAULT_RECENT_TRADES_COUNT,
    beforeTimestamp?: number
  ): Trade[] {
    return this.tradeCache.getRecentTrades(symbol, count, beforeTimestamp);
  }

  getTradesSince(symbol: TradingSymbol, count: number, afterTimestamp: number): Trade[] {
    return this.tradeCache.getTradesSince(symbol, count, afterTimestamp);
  }

  clearTrades(symbol: TradingSymbol): void {
    this.tradeCache.clearTrades(symbol);
  }

  getReferenceCount(symbol: TradingSymbol): number {
    return this.subscriptionManager.getReferenceCount(symbol);
  }

  private onTrade(trade: Trade): void {
    if (!this.running) {
      return;
    }

    this.metricsCollector?.incrementReceived(trade.symbol);
    if (!this.tradeCache.tryAdd(trade)) {
      this.metricsCollector?.incrementDuplicate(trade.symbol);
      return;
    }
    this.events.emit('trade', trade);
  }

  private onSubscriptionConfirmed(response: SubscriptionResponse): void {
    if (!this.running) {
      return;
    }
    this.logger.debug('Subscription confirmed', {
      symbol: response.symbol,
      event: response.eventKind,
    });
    this.events.emit('subscriptionConfirmed', response);
  }

  private onConnectionLost(): void {
    if (!this.running) {
      return;
    }
    // 上流は切断とともに購読を忘れる
    this.upstreamSubscribed.clear();
    this.events.emit('connectionLost', undefined);
    this.connectionManager.handleConnectionLost();
  }

  private onConnectionRestored(): void {
    if (!this.running) {
      return;
    }
    this.restore().catch((error: unknown) => {
      this.logger.error('Failed to restore subscriptions', { err: error });
    });
  }

  private async restore(): Promise<void> {
    await this.syncSubscriptions();
    if (this.running) {
      this.events.emit('connectionRestored', undefined);
    }
  }

  /**
   * 参照カウントが残っていて、まだ上流に送っていないシンボルを subscribe する。
   * 1シンボルの失敗は記録して次へ進む（次の復旧時に再試行される）。
   */
  private async syncSubscriptions(signal?: AbortSignal): Promise<void> {
    for (const symbol of this.subscriptionManager.activeSymbols()) {
      if (!this.running || !this.feedClient.isConnected) {
        return;
      }
      // 待機中に別経路で送信済み、または購読解除された場合は飛ばす
      if (
        this.upstreamSubscribed.has(symbol) ||
        this.subscriptionManager.getReferenceCount(symbol) === 0
      ) {
        continue;
      }
      this.upstreamSubscribed.add(symbol);
      try {
        await this.feedClient.subscribeToTrades(symbol, signal);
        this.logger.info('Resubscribed to trades', { symbol });
      } catch (error) {
        this.upstreamSubscribed.delete(symbol);
        this.metricsCollector?.incrementError('subscribe_error');
        this.logger.error('Resubscribe failed', { symbol, err: error });
      }
    }
  }
}
