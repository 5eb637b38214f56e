/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: メトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * 上流から受信した約定数をカウント
   * @param symbol シンボル（BTC-USD など）
   */
  incrementReceived(symbol: string): void;

  /**
   * 重複として破棄した約定数をカウント
   * 重複はエラーではないためログには出さず、件数だけを残す。
   */
  incrementDuplicate(symbol: string): void;

  /**
   * 下流へ配信したメッセージ数をカウント
   * @param sink 配信先（hub, md:trades など）
   */
  incrementPublished(sink: string, symbol: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（parse_error, publish_error, connect_error など）
   */
  incrementError(errorType: string): void;

  /** 再接続の試行回数をカウント */
  incrementReconnect(): void;

  /** 上流接続状態を記録 */
  setUpstreamConnected(connected: boolean): void;

  /** Prometheus 形式のメトリクス文字列を取得 */
  getMetrics(): Promise<string>;

  /** メトリクスレジストリを取得（HTTP サーバーで使用） */
  getRegistry(): MetricsRegistry;
}
