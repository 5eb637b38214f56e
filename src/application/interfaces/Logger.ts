/**
 * ロガーインターフェース
 *
 * 構造化ログを出力するためのインターフェース。
 * 実装は pino を使用するが、テストでは LoggerMock に差し替える。
 */
export interface Logger {
  /**
   * デバッグレベルのログを出力
   * @param msg ログメッセージ
   * @param meta 追加のメタデータ（オプション）
   */
  debug(msg: string, meta?: object): void;

  /** 情報レベルのログを出力 */
  info(msg: string, meta?: object): void;

  /** 警告レベルのログを出力 */
  warn(msg: string, meta?: object): void;

  /** エラーレベルのログを出力 */
  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * コンテキスト（component, symbol など）を自動付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
