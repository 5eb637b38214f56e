import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TradePublisher } from '@/domain/repositories/TradePublisher';
import type { Trade } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export const TRADE_STREAM = 'md:trades';

/**
 * インフラ層: Redis Stream への書き込み実装
 *
 * 責務: 新規の約定を Redis Stream に XADD する。
 */
export class TradeStreamRepository implements TradePublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redisUrl: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = logger ?? LoggerFactory.forComponent('TradeStreamRepository');
  }

  async publish(trade: Trade): Promise<void> {
    try {
      await this.redis.xadd(
        TRADE_STREAM,
        '*',
        'symbol',
        trade.symbol,
        'tradeId',
        trade.tradeId,
        'ts',
        trade.timestamp.toString(),
        'data',
        JSON.stringify(trade)
      );

      this.metricsCollector?.incrementPublished(TRADE_STREAM, trade.symbol);
    } catch (error) {
      this.metricsCollector?.incrementError('publish_error');
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
    this.logger.info('Redis connection closed');
  }
}
