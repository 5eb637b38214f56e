import { createServer, type Server } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/** handleRequest が読むリクエストの部分 */
export interface MetricsRequest {
  readonly url?: string;
  readonly method?: string;
}

/** handleRequest が書き込むレスポンスの部分 */
export interface MetricsResponse {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
}

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics エンドポイントで Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: Server | null = null;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    private readonly logger: Logger
  ) {}

  /**
   * HTTP サーバーを起動
   */
  start(): void {
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('Metrics request failed', { err: error });
      });
    });

    this.server.listen(this.port, () => {
      this.logger.info('Metrics server started', { port: this.port });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * リクエストを処理する（テストからも直接呼び出せるよう公開）。
   */
  async handleRequest(req: MetricsRequest, res: MetricsResponse): Promise<void> {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end('Not Found');
      return;
    }

    try {
      const metrics = await this.metricsCollector.getMetrics();
      res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
      res.statusCode = 200;
      res.end(metrics);
    } catch (error) {
      this.logger.error('Failed to get metrics', { err: error });
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  }
}
