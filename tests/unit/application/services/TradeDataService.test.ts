import { BASE_TIMESTAMP_US, makeTrade } from '@test/unit/helpers/fixtures';
import { FakeTradeFeedClient } from '@test/unit/helpers/mocks/FakeTradeFeedClient';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SubscriptionManager } from '@/application/services/SubscriptionManager';
import { TradeDataService } from '@/application/services/TradeDataService';
import type { Trade } from '@/domain/types';
import { InMemoryTradeCache } from '@/infra/cache/InMemoryTradeCache';
import { ConnectionManager } from '@/infra/reconnect/ConnectionManager';

/**
 * 単体テスト: TradeDataService
 *
 * Application層の中継ロジック（上流はプロセス内のフェイク）
 * - 重複排除した約定だけを下流へ流す
 * - 参照カウントに基づく上流への (un)subscribe
 * - 再接続後の再購読（アクティブなシンボルごとに1回だけ）
 * - 停止後の沈黙
 */
describe('TradeDataService', () => {
  let feed: FakeTradeFeedClient;
  let loggerMock: LoggerMock;
  let metrics: MetricsCollectorMock;
  let subscriptionManager: SubscriptionManager;
  let service: TradeDataService;

  /** 保留中の Promise チェーンをすべて流す */
  const flush = () => vi.advanceTimersByTimeAsync(0);

  beforeEach(() => {
    vi.useFakeTimers();
    feed = new FakeTradeFeedClient();
    loggerMock = new LoggerMock();
    metrics = new MetricsCollectorMock();
    subscriptionManager = new SubscriptionManager();
    const connectionManager = new ConnectionManager(feed, {
      backoff: { initialDelayMs: 1_000, maxDelayMs: 30_000, multiplier: 2 },
      logger: loggerMock,
      metricsCollector: metrics,
    });
    service = new TradeDataService({
      feedClient: feed,
      connectionManager,
      subscriptionManager,
      tradeCache: new InMemoryTradeCache(),
      logger: loggerMock,
      metricsCollector: metrics,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('start()', () => {
    it('フィードのハンドラを登録してから接続する', async () => {
      await service.start();

      expect(feed.connect).toHaveBeenCalledTimes(1);
      expect(feed.events.listenerCount('trade')).toBe(1);
      expect(feed.events.listenerCount('connectionLost')).toBe(1);
      expect(service.isConnected).toBe(true);
    });

    it('2回呼んでもハンドラは二重に登録されない', async () => {
      await service.start();
      await service.start();

      expect(feed.events.listenerCount('trade')).toBe(1);
      expect(feed.connect).toHaveBeenCalledTimes(1);
    });

    it('接続前に記録された購読を接続後に送る', async () => {
      await service.subscribeToTrades('SOL-USD');
      expect(feed.subscribeToTrades).not.toHaveBeenCalled();
      expect(service.getReferenceCount('SOL-USD')).toBe(1);

      await service.start();

      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(1);
      expect(feed.subscribeToTrades).toHaveBeenCalledWith('SOL-USD', undefined);
    });
  });

  describe('約定の受信', () => {
    it('新規の約定だけをキャッシュに積んで trade イベントで流す', async () => {
      const received: Trade[] = [];
      service.on('trade', (trade) => received.push(trade));
      await service.start();
      const trade = makeTrade({ tradeId: 'a-1' });

      feed.emitTrade(trade);
      feed.emitTrade(makeTrade({ tradeId: 'a-1', price: 99999 }));

      expect(received).toEqual([trade]);
      expect(service.getRecentTrades('BTC-USD')).toEqual([trade]);
      expect(metrics.incrementReceived).toHaveBeenCalledTimes(2);
      expect(metrics.incrementDuplicate).toHaveBeenCalledWith('BTC-USD');
    });

    it('例外を投げる利用者がいても取り込みは止まらない', async () => {
      const healthy = vi.fn();
      service.on('trade', () => {
        throw new Error('consumer failed');
      });
      service.on('trade', healthy);
      await service.start();

      feed.emitTrade(makeTrade({ tradeId: 'a-1' }));
      feed.emitTrade(makeTrade({ tradeId: 'a-2' }));

      expect(healthy).toHaveBeenCalledTimes(2);
      expect(service.getRecentTrades('BTC-USD')).toHaveLength(2);
      expect(loggerMock.error).toHaveBeenCalledWith('Consumer listener threw', {
        event: 'trade',
        err: expect.any(Error),
      });
    });

    it('保持上限に達した後、範囲外の古い約定は何度届いても流さない', async () => {
      const bounded = new TradeDataService({
        feedClient: feed,
        connectionManager: new ConnectionManager(feed, {
          backoff: { initialDelayMs: 1_000, maxDelayMs: 30_000, multiplier: 2 },
          logger: loggerMock,
        }),
        subscriptionManager,
        tradeCache: new InMemoryTradeCache({ maxTradesPerSymbol: 2 }),
        logger: loggerMock,
      });
      const received: string[] = [];
      bounded.on('trade', (trade) => received.push(trade.tradeId));
      await bounded.start();

      feed.emitTrade(makeTrade({ tradeId: 't3', timestamp: 300 }));
      feed.emitTrade(makeTrade({ tradeId: 't2', timestamp: 200 }));
      for (let i = 0; i < 3; i++) {
        feed.emitTrade(makeTrade({ tradeId: 't1', timestamp: 100 }));
      }

      expect(received).toEqual(['t3', 't2']);
      expect(bounded.getRecentTrades('BTC-USD').map((t) => t.tradeId)).toEqual(['t3', 't2']);
    });

    it('購読確認を subscriptionConfirmed で流す', async () => {
      const confirmed = vi.fn();
      service.on('subscriptionConfirmed', confirmed);
      await service.start();
      const response = { sequenceNumber: 3, eventKind: 'subscribed', symbol: 'ETH-USD' } as const;

      feed.emitSubscriptionConfirmed(response);

      expect(confirmed).toHaveBeenCalledWith(response);
    });
  });

  describe('subscribeToTrades() / unsubscribeFromTrades()', () => {
    beforeEach(async () => {
      await service.start();
    });

    it('最初の購読者のときだけ上流に subscribe を送る', async () => {
      await service.subscribeToTrades('BTC-USD');
      await service.subscribeToTrades('BTC-USD');

      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(1);
      expect(service.getReferenceCount('BTC-USD')).toBe(2);
    });

    it('最後の購読者が抜けたときだけ上流に unsubscribe を送る', async () => {
      await service.subscribeToTrades('BTC-USD');
      await service.subscribeToTrades('BTC-USD');

      await service.unsubscribeFromTrades('BTC-USD');
      expect(feed.unsubscribeFromTrades).not.toHaveBeenCalled();

      await service.unsubscribeFromTrades('BTC-USD');
      expect(feed.unsubscribeFromTrades).toHaveBeenCalledTimes(1);
      expect(feed.unsubscribeFromTrades).toHaveBeenCalledWith('BTC-USD', undefined);
    });

    it('購読のないシンボルの unsubscribe は何もしない', async () => {
      await service.unsubscribeFromTrades('LTC-USD');

      expect(feed.unsubscribeFromTrades).not.toHaveBeenCalled();
      expect(service.getReferenceCount('LTC-USD')).toBe(0);
    });

    it('上流への subscribe が失敗すると参照カウントを戻して例外を投げる', async () => {
      const transportError = new Error('socket write failed');
      feed.subscribeToTrades.mockRejectedValueOnce(transportError);

      const error = await service.subscribeToTrades('ETH-USD').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(Error);
      expect(error).toHaveProperty('message', 'Failed to subscribe to trades for ETH-USD');
      expect(error).toHaveProperty('cause', transportError);
      expect(service.getReferenceCount('ETH-USD')).toBe(0);
      expect(metrics.incrementError).toHaveBeenCalledWith('subscribe_error');

      // 次の購読者でもう一度上流に送られる
      await service.subscribeToTrades('ETH-USD');
      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(2);
      expect(service.getReferenceCount('ETH-USD')).toBe(1);
    });

    it('送信中に来た購読者は上流の完了を待ってから解決する', async () => {
      let completeSend: () => void = () => {};
      feed.subscribeToTrades.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            completeSend = resolve;
          })
      );
      let secondDone = false;

      const first = service.subscribeToTrades('ETH-USD');
      const second = service.subscribeToTrades('ETH-USD').then(() => {
        secondDone = true;
      });
      await flush();
      expect(secondDone).toBe(false);

      completeSend();
      await Promise.all([first, second]);

      expect(secondDone).toBe(true);
      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(1);
      expect(service.getReferenceCount('ETH-USD')).toBe(2);
    });

    it('送信中の subscribe が失敗すると、待っていた購読者も失敗してカウントが 0 に戻る', async () => {
      let failSend: (error: Error) => void = () => {};
      feed.subscribeToTrades.mockImplementationOnce(
        () =>
          new Promise<void>((_resolve, reject) => {
            failSend = reject;
          })
      );

      const first = service.subscribeToTrades('ETH-USD').catch((e: unknown) => e);
      const second = service.subscribeToTrades('ETH-USD').catch((e: unknown) => e);
      expect(service.getReferenceCount('ETH-USD')).toBe(2);

      failSend(new Error('socket write failed'));
      const [firstError, secondError] = await Promise.all([first, second]);

      expect(firstError).toHaveProperty('message', 'Failed to subscribe to trades for ETH-USD');
      expect(secondError).toHaveProperty('message', 'Failed to subscribe to trades for ETH-USD');
      expect(service.getReferenceCount('ETH-USD')).toBe(0);
      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(1);

      // カウントが 0 から始まるので次の購読者で上流に送り直す
      await service.subscribeToTrades('ETH-USD');
      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(2);
      expect(service.getReferenceCount('ETH-USD')).toBe(1);
    });

    it('上流への unsubscribe の失敗はログに残すだけ', async () => {
      await service.subscribeToTrades('BTC-USD');
      feed.unsubscribeFromTrades.mockRejectedValueOnce(new Error('socket write failed'));

      await expect(service.unsubscribeFromTrades('BTC-USD')).resolves.toBeUndefined();

      expect(loggerMock.warn).toHaveBeenCalledWith('Upstream unsubscribe failed', {
        symbol: 'BTC-USD',
        err: expect.any(Error),
      });
      expect(service.getReferenceCount('BTC-USD')).toBe(0);
    });
  });

  describe('再接続', () => {
    it('切断を通知し、再接続後にアクティブなシンボルを1回ずつ再購読する', async () => {
      const lost = vi.fn();
      const restored = vi.fn();
      service.on('connectionLost', lost);
      service.on('connectionRestored', restored);
      await service.start();
      await service.subscribeToTrades('BTC-USD');
      await service.subscribeToTrades('BTC-USD');
      await service.subscribeToTrades('ETH-USD');
      await service.subscribeToTrades('SOL-USD');
      await service.unsubscribeFromTrades('SOL-USD');
      feed.subscribeToTrades.mockClear();

      feed.dropConnection();
      await flush();

      expect(lost).toHaveBeenCalledTimes(1);
      expect(feed.connect).toHaveBeenCalledTimes(2);
      expect(feed.subscribeToTrades.mock.calls.map(([symbol]) => symbol)).toEqual([
        'BTC-USD',
        'ETH-USD',
      ]);
      expect(restored).toHaveBeenCalledTimes(1);
    });

    it('再購読が終わってから connectionRestored を流す', async () => {
      const order: string[] = [];
      feed.subscribeToTrades.mockImplementation(async (symbol) => {
        order.push(`subscribe:${symbol}`);
      });
      service.on('connectionRestored', () => order.push('restored'));
      await service.start();
      await service.subscribeToTrades('LTC-USD');
      order.length = 0;

      feed.dropConnection();
      await flush();

      expect(order).toEqual(['subscribe:LTC-USD', 'restored']);
    });

    it('再接続に失敗してもバックオフを挟んで繰り返し、成功後に再購読する', async () => {
      await service.start();
      await service.subscribeToTrades('BTC-USD');
      feed.subscribeToTrades.mockClear();
      let failures = 2;
      feed.connectBehavior = async () => {
        if (failures > 0) {
          failures -= 1;
          throw new Error('connection refused');
        }
      };

      feed.dropConnection();
      await flush();
      expect(feed.subscribeToTrades).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1_000);
      expect(feed.subscribeToTrades).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(2_000);
      expect(feed.connect).toHaveBeenCalledTimes(4);
      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(1);
      expect(feed.subscribeToTrades).toHaveBeenCalledWith('BTC-USD', undefined);
    });

    it('再購読の1件が失敗しても残りのシンボルは送る', async () => {
      await service.start();
      await service.subscribeToTrades('BTC-USD');
      await service.subscribeToTrades('ETH-USD');
      feed.subscribeToTrades.mockClear();
      feed.subscribeToTrades.mockRejectedValueOnce(new Error('socket write failed'));

      feed.dropConnection();
      await flush();

      expect(feed.subscribeToTrades).toHaveBeenCalledTimes(2);
      expect(loggerMock.error).toHaveBeenCalledWith('Resubscribe failed', {
        symbol: 'BTC-USD',
        err: expect.any(Error),
      });
    });
  });

  describe('stop()', () => {
    it('ハンドラを外してから切断し、以降の約定は流さない', async () => {
      const received = vi.fn();
      service.on('trade', received);
      await service.start();

      await service.stop();
      feed.emitTrade(makeTrade({ tradeId: 'late' }));

      expect(received).not.toHaveBeenCalled();
      expect(feed.events.listenerCount('trade')).toBe(0);
      expect(feed.disconnect).toHaveBeenCalledTimes(1);
      expect(service.getRecentTrades('BTC-USD')).toEqual([]);
    });

    it('初回接続の再試行中に stop() すると、start() は再試行をやめて解決する', async () => {
      feed.connectBehavior = async () => {
        throw new Error('connection refused');
      };
      const starting = service.start();
      await flush();
      await vi.advanceTimersByTimeAsync(1_000);
      expect(feed.connect).toHaveBeenCalledTimes(2);

      await service.stop();

      await expect(starting).resolves.toBeUndefined();
      await vi.advanceTimersByTimeAsync(60_000);
      expect(feed.connect).toHaveBeenCalledTimes(2);
      expect(service.isRunning).toBe(false);
    });

    it('停止後に切断が通知されても再接続しない', async () => {
      await service.start();
      await service.stop();
      feed.connect.mockClear();

      feed.dropConnection();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(feed.connect).not.toHaveBeenCalled();
    });
  });

  describe('問い合わせ', () => {
    it('getRecentTrades() の既定の件数は 100', async () => {
      await service.start();
      for (let i = 0; i < 101; i++) {
        feed.emitTrade(makeTrade({ tradeId: `t-${i}`, timestamp: BASE_TIMESTAMP_US + i }));
      }

      const trades = service.getRecentTrades('BTC-USD');

      expect(trades).toHaveLength(100);
      expect(trades[0].tradeId).toBe('t-100');
      expect(trades[99].tradeId).toBe('t-1');
    });

    it('getTradesSince() と clearTrades() はキャッシュにそのまま委譲する', async () => {
      await service.start();
      feed.emitTrade(makeTrade({ tradeId: 'old', timestamp: BASE_TIMESTAMP_US }));
      feed.emitTrade(makeTrade({ tradeId: 'new', timestamp: BASE_TIMESTAMP_US + 10 }));

      expect(
        service.getTradesSince('BTC-USD', 10, BASE_TIMESTAMP_US).map((t) => t.tradeId)
      ).toEqual(['new']);

      service.clearTrades('BTC-USD');
      expect(service.getRecentTrades('BTC-USD')).toEqual([]);
    });
  });
});
