import 'dotenv/config';
import process from 'node:process';
import { SubscriptionManager } from '@/application/services/SubscriptionManager';
import { TradeDataService } from '@/application/services/TradeDataService';
import type { TradePublisher } from '@/domain/repositories/TradePublisher';
import { ExchangeWebSocketClient } from '@/infra/adapters/exchange/ExchangeWebSocketClient';
import { InMemoryTradeCache } from '@/infra/cache/InMemoryTradeCache';
import { ConfigError, loadConfig } from '@/infra/config/AppConfig';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { ConnectionManager } from '@/infra/reconnect/ConnectionManager';
import { TradeStreamRepository } from '@/infra/redis/TradeStreamRepository';
import { TradeHub } from '@/presentation/websocket/TradeHub';
import { TradeHubServer } from '@/presentation/websocket/TradeHubServer';

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: 接続・購読・キャッシュの挙動は main.ts に持ち込まず、ここでは配線だけを行う。
 */
async function bootstrap(): Promise<void> {
  const config = loadConfig();
  LoggerFactory.configure({
    level: config.logLevel,
    pretty: config.nodeEnv !== 'production',
  });
  const logger = LoggerFactory.forComponent('main');

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer = new MetricsServer(
    metricsCollector,
    config.metricsPort,
    LoggerFactory.forComponent('MetricsServer')
  );

  // インフラ層: 上流フィードと接続管理
  const feedClient = new ExchangeWebSocketClient({
    url: config.upstream.url,
    apiToken: config.upstream.apiToken,
    metricsCollector,
  });
  const connectionManager = new ConnectionManager(feedClient, {
    backoff: config.backoff,
    metricsCollector,
  });
  connectionManager.onStateChange((state) => {
    logger.info('Upstream connection state changed', { state });
  });

  // アプリケーション層: 中継サービス
  const service = new TradeDataService({
    feedClient,
    connectionManager,
    subscriptionManager: new SubscriptionManager(),
    tradeCache: new InMemoryTradeCache({ maxTradesPerSymbol: config.cache.maxTradesPerSymbol }),
    metricsCollector,
  });

  // Redis Stream への配信（REDIS_URL が設定されている場合のみ）
  let publisher: TradePublisher | null = null;
  if (config.redisUrl) {
    const streamPublisher = new TradeStreamRepository(config.redisUrl, undefined, metricsCollector);
    publisher = streamPublisher;
    service.on('trade', (trade) => {
      streamPublisher.publish(trade).catch((error: unknown) => {
        logger.error('Failed to publish trade to stream', {
          symbol: trade.symbol,
          tradeId: trade.tradeId,
          err: error,
        });
      });
    });
  }

  // プレゼンテーション層: 下流向けハブ
  const hub = new TradeHub(service, undefined, metricsCollector);
  const hubServer = new TradeHubServer(hub, config.hubPort);

  // 上流の初回接続は停止されるまで再試行し続けるので、シグナルのハンドラは接続より先に登録する
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down trade relay...', { signal });

    await hubServer.stop();
    await service.stop();
    await publisher?.close();
    await metricsServer.stop();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { err: error });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  metricsServer.start();
  await hubServer.start();

  // 起動時の購読は参照カウント 1 として保持し続ける
  for (const symbol of config.defaultSymbols) {
    await service.subscribeToTrades(symbol);
  }
  // shutdown() の service.stop() で接続ループごと中断される
  await service.start();
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to bootstrap trade relay:', error);
  }
  process.exit(1);
});
