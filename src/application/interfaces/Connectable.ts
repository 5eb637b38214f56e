/**
 * 接続・切断できる対象の共通インターフェイス。
 * ConnectionManager はこの契約だけに依存する。
 */
export interface Connectable {
  /** 実際のトランスポート状態（キャッシュではなく接続オブジェクトから取得する） */
  readonly isConnected: boolean;

  connect(signal?: AbortSignal): Promise<void>;

  disconnect(signal?: AbortSignal): Promise<void>;
}
