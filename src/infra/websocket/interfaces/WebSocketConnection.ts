/**
 * インフラ層: 取引所非依存の WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: WebSocket 接続の確立・管理・イベント処理を抽象化する。
 * テストではこのインターフェースのフェイクに差し替える。
 */
export interface WebSocketConnection {
  /** 送信可能な状態かどうか */
  readonly isOpen: boolean;

  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * テキストメッセージを受信したときに呼ばれるコールバック
   * バイナリフレームは UTF-8 としてデコードしてから渡す
   */
  onMessage(callback: (data: string) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (code: number, reason: string) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック
   */
  onError(callback: (error: Error) => void): void;

  /**
   * メッセージを送信する
   * @returns 送信がソケットに書き込まれたら解決される
   */
  send(data: string): Promise<void>;

  /**
   * 接続を閉じる
   */
  close(code?: number, reason?: string): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する（close ハンドシェイクを待たない）
   */
  terminate(): void;
}

/** URL から接続オブジェクトを作る（まだ開いていない状態で返す） */
export type WebSocketFactory = (url: string) => WebSocketConnection;
