import { ListenerRegistry } from '@/application/events/ListenerRegistry';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TradeFeedClient, TradeFeedEvents } from '@/application/interfaces/TradeFeedClient';
import { OperationCancelledError } from '@/domain/errors';
import type { TradingSymbol } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type {
  WebSocketConnection,
  WebSocketFactory,
} from '@/infra/websocket/interfaces/WebSocketConnection';
import { createWsConnection } from '@/infra/websocket/WsWebSocketConnection';
import { ExchangeMessageParser } from './ExchangeMessageParser';
import type { ExchangeCommand } from './messages/ExchangeCommand';

export interface ExchangeWebSocketClientOptions {
  /** WebSocket エンドポイント URL */
  url: string;
  /** 設定されている場合は各コマンドに付与する */
  apiToken?: string;
  connectionFactory?: WebSocketFactory;
  parser?: ExchangeMessageParser;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

const NORMAL_CLOSURE = 1000;

/**
 * インフラ層: 取引所 WebSocket の接続・購読・受信
 *
 * 責務: 取引所のプロトコル実装。接続の確立、購読コマンドの送信、受信メッセージの変換を担当する。
 * 再接続はしない（ConnectionManager の責務）。意図しない切断は connectionLost で、
 * その後の接続確立は connectionRestored で通知する。
 */
export class ExchangeWebSocketClient implements TradeFeedClient {
  readonly events: ListenerRegistry<TradeFeedEvents>;

  private readonly url: string;
  private readonly apiToken?: string;
  private readonly connectionFactory: WebSocketFactory;
  private readonly parser: ExchangeMessageParser;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  private connection: WebSocketConnection | null = null;
  /** 意図しない切断の後、まだ再接続していない */
  private lost = false;

  constructor(options: ExchangeWebSocketClientOptions) {
    this.url = options.url;
    this.apiToken = options.apiToken || undefined;
    this.connectionFactory = options.connectionFactory ?? createWsConnection;
    this.logger = options.logger ?? LoggerFactory.forComponent('ExchangeWebSocketClient');
    this.parser = options.parser ?? new ExchangeMessageParser(this.logger);
    this.metricsCollector = options.metricsCollector;
    this.events = new ListenerRegistry((event, error) => {
      this.logger.error('Feed listener threw', { event, err: error });
    });
  }

  get isConnected(): boolean {
    return this.connection?.isOpen ?? false;
  }

  /**
   * WebSocket 接続を確立する。
   * @throws {OperationCancelledError} 接続完了前に signal が中断された場合
   * @throws {Error} 接続に失敗した場合
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (this.isConnected) {
      return;
    }
    if (signal?.aborted) {
      throw new OperationCancelledError('Connect cancelled', { cause: signal.reason });
    }

    this.logger.info('Connecting to upstream', { url: this.url });
    const connection = await this.open(signal);

    connection.onMessage((data) => this.handleMessage(connection, data));
    connection.onClose((code, reason) => this.handleClose(connection, code, reason));
    connection.onError((error) => {
      this.metricsCollector?.incrementError('websocket_error');
      this.logger.error('WebSocket error', { err: error });
    });
    this.connection = connection;
    this.logger.info('Connected to upstream', { url: this.url });

    if (this.lost) {
      this.lost = false;
      this.events.emit('connectionRestored', undefined);
    }
  }

  /**
   * 接続を閉じる。意図した切断なので connectionLost は通知しない。
   */
  async disconnect(_signal?: AbortSignal): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.lost = false;
    if (!connection) {
      return;
    }

    connection.removeAllListeners();
    connection.close(NORMAL_CLOSURE, 'Client disconnecting');
    this.logger.info('Disconnected from upstream', { url: this.url });
  }

  async subscribeToTrades(symbol: TradingSymbol, _signal?: AbortSignal): Promise<void> {
    await this.send({ action: 'subscribe', channel: 'trades', symbol });
    this.logger.info('Subscribed to trades', { symbol });
  }

  async unsubscribeFromTrades(symbol: TradingSymbol, _signal?: AbortSignal): Promise<void> {
    await this.send({ action: 'unsubscribe', channel: 'trades', symbol });
    this.logger.info('Unsubscribed from trades', { symbol });
  }

  private open(signal?: AbortSignal): Promise<WebSocketConnection> {
    return new Promise<WebSocketConnection>((resolve, reject) => {
      const connection = this.connectionFactory(this.url);

      const cleanup = () => {
        signal?.removeEventListener('abort', onAbort);
      };
      const fail = (error: Error) => {
        cleanup();
        connection.removeAllListeners();
        connection.terminate();
        reject(error);
      };
      const onAbort = () => {
        fail(new OperationCancelledError('Connect cancelled', { cause: signal?.reason }));
      };

      connection.onOpen(() => {
        cleanup();
        connection.removeAllListeners();
        resolve(connection);
      });
      connection.onError((error) => {
        fail(new Error('WebSocket connection failed', { cause: error }));
      });
      connection.onClose((code, reason) => {
        fail(new Error(`WebSocket closed before open (code ${code}${reason ? `: ${reason}` : ''})`));
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private async send(command: ExchangeCommand): Promise<void> {
    const connection = this.connection;
    if (!connection?.isOpen) {
      throw new Error('WebSocket not connected');
    }

    const payload: ExchangeCommand = this.apiToken ? { ...command, token: this.apiToken } : command;
    await connection.send(JSON.stringify(payload));
    this.logger.debug('Command sent', { action: command.action, symbol: command.symbol });
  }

  private handleMessage(connection: WebSocketConnection, data: string): void {
    if (connection !== this.connection) {
      return;
    }

    const parsed = this.parser.parse(data);
    if (!parsed) {
      return;
    }
    if (parsed.kind === 'trade') {
      this.events.emit('trade', parsed.trade);
    } else {
      this.events.emit('subscriptionConfirmed', parsed.response);
    }
  }

  private handleClose(connection: WebSocketConnection, code: number, reason: string): void {
    // disconnect() 済み、または既に置き換えられた接続からの通知は無視する
    if (connection !== this.connection) {
      return;
    }

    this.connection = null;
    this.lost = true;
    this.logger.warn('Upstream connection closed unexpectedly', { code, reason });
    this.events.emit('connectionLost', undefined);
  }
}
