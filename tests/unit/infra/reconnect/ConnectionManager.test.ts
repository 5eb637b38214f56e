import { FakeTradeFeedClient, hangUntilAborted } from '@test/unit/helpers/mocks/FakeTradeFeedClient';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { MetricsCollectorMock } from '@test/unit/helpers/mocks/MetricsCollectorMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectionManager, type ConnectionState } from '@/infra/reconnect/ConnectionManager';

/**
 * 単体テスト: ConnectionManager
 *
 * Infrastructure層の状態遷移とバックオフ付き再接続
 * - start() のシングルフライト
 * - 失敗時のバックオフと、成功時のリセット
 * - stop() による中断と、停止後の沈黙
 * - handleConnectionLost() による自律的な再接続
 */
describe('ConnectionManager', () => {
  let feed: FakeTradeFeedClient;
  let loggerMock: LoggerMock;
  let metrics: MetricsCollectorMock;
  let manager: ConnectionManager;
  let states: ConnectionState[];

  beforeEach(() => {
    vi.useFakeTimers();
    feed = new FakeTradeFeedClient();
    loggerMock = new LoggerMock();
    metrics = new MetricsCollectorMock();
    manager = new ConnectionManager(feed, {
      backoff: { initialDelayMs: 1_000, maxDelayMs: 30_000, multiplier: 2 },
      logger: loggerMock,
      metricsCollector: metrics,
    });
    states = [];
    manager.onStateChange((state) => states.push(state));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('start()', () => {
    it('接続済みなら何もしない', async () => {
      feed.connected = true;

      await manager.start();

      expect(feed.connect).not.toHaveBeenCalled();
      expect(states).toEqual([]);
    });

    it('接続に成功すると connecting → connected に遷移する', async () => {
      await manager.start();

      expect(feed.connect).toHaveBeenCalledTimes(1);
      expect(states).toEqual(['connecting', 'connected']);
      expect(manager.state).toBe('connected');
      expect(manager.isConnected).toBe(true);
      expect(metrics.setUpstreamConnected).toHaveBeenLastCalledWith(true);
    });

    it('並行して呼ばれても接続試行は1本だけ', async () => {
      let release: () => void = () => {};
      feed.connectBehavior = () =>
        new Promise<void>((resolve) => {
          release = resolve;
        });

      const first = manager.start();
      const second = manager.start();
      expect(feed.connect).toHaveBeenCalledTimes(1);

      release();
      await Promise.all([first, second]);

      expect(feed.connect).toHaveBeenCalledTimes(1);
      expect(manager.state).toBe('connected');
    });

    it('失敗と再試行を繰り返す間も、並行した start() の接続試行は常に1本だけ', async () => {
      let active = 0;
      let maxActive = 0;
      let failures = 2;
      feed.connectBehavior = async () => {
        active += 1;
        maxActive = Math.max(maxActive, active);
        try {
          await Promise.resolve();
          if (failures > 0) {
            failures -= 1;
            throw new Error('connection refused');
          }
        } finally {
          active -= 1;
        }
      };

      const first = manager.start();
      const second = manager.start();
      await vi.advanceTimersByTimeAsync(0);
      // バックオフ待機中に来た start() も同じ試行に合流する
      const third = manager.start();

      await vi.advanceTimersByTimeAsync(1_000);
      await vi.advanceTimersByTimeAsync(2_000);
      await Promise.all([first, second, third]);

      expect(maxActive).toBe(1);
      expect(feed.connect).toHaveBeenCalledTimes(3);
      expect(metrics.incrementReconnect).toHaveBeenCalledTimes(2);
      expect(manager.state).toBe('connected');
    });

    it('失敗するたびにバックオフが伸び、成功すると初期値に戻る', async () => {
      let failures = 3;
      feed.connectBehavior = async () => {
        if (failures > 0) {
          failures -= 1;
          throw new Error('connection refused');
        }
      };

      const promise = manager.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(manager.currentBackoffDelay).toBe(1_000);
      expect(manager.state).toBe('connecting');

      await vi.advanceTimersByTimeAsync(1_000);
      expect(manager.currentBackoffDelay).toBe(2_000);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(manager.currentBackoffDelay).toBe(4_000);

      await vi.advanceTimersByTimeAsync(4_000);
      await promise;

      expect(feed.connect).toHaveBeenCalledTimes(4);
      expect(manager.currentBackoffDelay).toBe(1_000);
      expect(manager.state).toBe('connected');
      expect(metrics.incrementReconnect).toHaveBeenCalledTimes(3);
      expect(loggerMock.warn).toHaveBeenCalledTimes(3);
    });

    it('中断された start() の後の start() はバックオフを初期値から始める', async () => {
      feed.connectBehavior = async () => {
        throw new Error('connection refused');
      };
      const cancelled = manager.start();
      await vi.advanceTimersByTimeAsync(0);
      await vi.advanceTimersByTimeAsync(1_000);
      expect(manager.currentBackoffDelay).toBe(2_000);

      await manager.stop();
      await cancelled;

      feed.connectBehavior = async () => {};
      await manager.start();

      expect(manager.currentBackoffDelay).toBe(1_000);
      expect(manager.state).toBe('connected');
    });

    it('await していない stop() の直後の start() は新しく接続を試みる', async () => {
      feed.connectBehavior = async () => {
        throw new Error('connection refused');
      };
      const first = manager.start();
      await vi.advanceTimersByTimeAsync(0);

      const stopping = manager.stop();
      feed.connectBehavior = async () => {};
      await manager.start();
      await Promise.all([stopping, first]);

      expect(feed.connect).toHaveBeenCalledTimes(2);
      expect(manager.isConnected).toBe(true);
      expect(manager.state).toBe('connected');
    });

    it('呼び出し側のシグナルで中断されると、エラーにせず disconnected に戻る', async () => {
      const controller = new AbortController();
      feed.connectBehavior = hangUntilAborted;

      const promise = manager.start(controller.signal);
      controller.abort();

      await expect(promise).resolves.toBeUndefined();
      expect(manager.state).toBe('disconnected');
      expect(feed.connect).toHaveBeenCalledTimes(1);
    });
  });

  describe('stop()', () => {
    it('バックオフ待機中の接続ループを中断し、以降は再試行しない', async () => {
      feed.connectBehavior = async () => {
        throw new Error('connection refused');
      };
      const promise = manager.start();
      await vi.advanceTimersByTimeAsync(0);

      await manager.stop();
      await promise;
      await vi.advanceTimersByTimeAsync(60_000);

      expect(feed.connect).toHaveBeenCalledTimes(1);
      expect(manager.state).toBe('disconnected');
      expect(feed.disconnect).not.toHaveBeenCalled();
    });

    it('接続済みなら切断する', async () => {
      await manager.start();

      await manager.stop();

      expect(feed.disconnect).toHaveBeenCalledTimes(1);
      expect(manager.isConnected).toBe(false);
      expect(states).toEqual(['connecting', 'connected', 'disconnected']);
      expect(metrics.setUpstreamConnected).toHaveBeenLastCalledWith(false);
    });

    it('一度も start() していなくても安全に呼べる', async () => {
      await manager.stop();

      expect(feed.disconnect).not.toHaveBeenCalled();
      expect(manager.state).toBe('disconnected');
    });
  });

  describe('handleConnectionLost()', () => {
    it('稼働中なら再接続ループを開始する', async () => {
      await manager.start();
      feed.connected = false;

      manager.handleConnectionLost();
      await vi.advanceTimersByTimeAsync(0);

      expect(feed.connect).toHaveBeenCalledTimes(2);
      expect(manager.state).toBe('connected');
      expect(states).toEqual(['connecting', 'connected', 'disconnected', 'connecting', 'connected']);
    });

    it('再接続に失敗し続けても、バックオフを挟んで試行を続ける', async () => {
      await manager.start();
      feed.connected = false;
      let failures = 2;
      feed.connectBehavior = async () => {
        if (failures > 0) {
          failures -= 1;
          throw new Error('connection refused');
        }
      };

      manager.handleConnectionLost();
      await vi.advanceTimersByTimeAsync(0);
      expect(feed.connect).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(feed.connect).toHaveBeenCalledTimes(3);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(feed.connect).toHaveBeenCalledTimes(4);
      expect(manager.state).toBe('connected');
    });

    it('stop() の後は何もしない', async () => {
      await manager.start();
      await manager.stop();
      feed.connect.mockClear();

      manager.handleConnectionLost();
      await vi.advanceTimersByTimeAsync(60_000);

      expect(feed.connect).not.toHaveBeenCalled();
      expect(manager.state).toBe('disconnected');
    });
  });
});
