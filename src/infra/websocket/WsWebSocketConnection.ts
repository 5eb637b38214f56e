import WebSocket from 'ws';
import type { WebSocketConnection, WebSocketFactory } from './interfaces/WebSocketConnection';

/** WsWebSocketConnection が使う ws ソケットの部分 */
export interface WsSocket {
  readonly readyState: number;
  on(event: string, listener: (...args: never[]) => void): unknown;
  send(data: string, cb: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

/**
 * ws ライブラリを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];

  constructor(private readonly socket: WsSocket) {
    // ws のイベントを内部で管理
    this.socket.on('open', () => {
      for (const cb of this.openCallbacks) {
        cb();
      }
    });

    this.socket.on('message', (data: WebSocket.RawData) => {
      const text = rawDataToString(data);
      for (const cb of this.messageCallbacks) {
        cb(text);
      }
    });

    this.socket.on('close', (code: number, reason: Buffer) => {
      const text = reason.toString('utf-8');
      for (const cb of this.closeCallbacks) {
        cb(code, text);
      }
    });

    this.socket.on('error', (error: Error) => {
      for (const cb of this.errorCallbacks) {
        cb(error);
      }
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}

/** 既定のファクトリ */
export const createWsConnection: WebSocketFactory = (url) =>
  new WsWebSocketConnection(new WebSocket(url));

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}
