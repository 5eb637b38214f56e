import { Counter, Gauge, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンにはしていない。
 *
 * 責務: prom-client を使用してメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly duplicateCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly errorCounter: Counter;
  private readonly reconnectCounter: Counter;
  private readonly connectedGauge: Gauge;

  constructor() {
    this.register = new Registry();

    this.receivedCounter = new Counter({
      name: 'relay_trades_received_total',
      help: 'Total number of trades received from the upstream feed',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.duplicateCounter = new Counter({
      name: 'relay_trades_duplicate_total',
      help: 'Total number of trades dropped because their trade id was already cached',
      labelNames: ['symbol'],
      registers: [this.register],
    });

    this.publishedCounter = new Counter({
      name: 'relay_messages_published_total',
      help: 'Total number of messages published to downstream sinks',
      labelNames: ['sink', 'symbol'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'relay_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'relay_reconnect_attempts_total',
      help: 'Total number of failed upstream connect attempts followed by a backoff',
      registers: [this.register],
    });

    // 1 = 接続中, 0 = 切断中
    this.connectedGauge = new Gauge({
      name: 'relay_upstream_connected',
      help: 'Whether the upstream feed connection is open',
      registers: [this.register],
    });
  }

  incrementReceived(symbol: string): void {
    this.receivedCounter.inc({ symbol });
  }

  incrementDuplicate(symbol: string): void {
    this.duplicateCounter.inc({ symbol });
  }

  incrementPublished(sink: string, symbol: string): void {
    this.publishedCounter.inc({ sink, symbol });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  setUpstreamConnected(connected: boolean): void {
    this.connectedGauge.set(connected ? 1 : 0);
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
