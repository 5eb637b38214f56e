import { type Listener, ListenerRegistry, type ListenerToken } from '@/application/events/ListenerRegistry';
import type { Connectable } from '@/application/interfaces/Connectable';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { OperationCancelledError } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import {
  type BackoffOptions,
  type BackoffStrategy,
  DEFAULT_BACKOFF_OPTIONS,
  ExponentialBackoffStrategy,
} from './BackoffStrategy';
import { RetryConnector } from './RetryConnector';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type ConnectionManagerEvents = {
  stateChanged: ConnectionState;
};

export interface ConnectionManagerOptions {
  backoff?: BackoffOptions;
  /** 未指定の場合は backoff から ExponentialBackoffStrategy を生成する */
  backoffStrategy?: BackoffStrategy;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * インフラ層: 上流接続のライフサイクル管理
 *
 * 責務: 接続の開始・停止と、切断後の再接続ループ。
 * start() はシングルフライトで、同時に呼ばれても接続試行のシーケンスは常に1本だけ。
 */
export class ConnectionManager {
  readonly events: ListenerRegistry<ConnectionManagerEvents>;

  private readonly backoff: BackoffOptions;
  private readonly retryConnector: RetryConnector;
  private readonly logger: Logger;
  private readonly metricsCollector?: MetricsCollector;

  private inFlight: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private stopped = true;
  private currentState: ConnectionState = 'disconnected';
  private currentDelayMs: number;

  constructor(
    private readonly connectable: Connectable,
    options: ConnectionManagerOptions = {}
  ) {
    this.backoff = options.backoff ?? DEFAULT_BACKOFF_OPTIONS;
    this.logger = options.logger ?? LoggerFactory.forComponent('ConnectionManager');
    this.metricsCollector = options.metricsCollector;
    this.currentDelayMs = this.backoff.initialDelayMs;
    this.events = new ListenerRegistry((event, error) => {
      this.logger.error('State listener threw', { event, err: error });
    });

    const strategy = options.backoffStrategy ?? new ExponentialBackoffStrategy(this.backoff);
    this.retryConnector = new RetryConnector(strategy, this.logger, (_attempt, delayMs) => {
      this.currentDelayMs = delayMs;
      this.metricsCollector?.incrementReconnect();
      this.metricsCollector?.incrementError('connect_error');
    });
  }

  /** 接続オブジェクトの実際の状態 */
  get isConnected(): boolean {
    return this.connectable.isConnected;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** 次の待機に使われた（使われる）遅延。start と接続成功で初期値に戻る。 */
  get currentBackoffDelay(): number {
    return this.currentDelayMs;
  }

  /** 状態遷移の通知を登録する。解除は events.off(token)。 */
  onStateChange(listener: Listener<ConnectionState>): ListenerToken {
    return this.events.on('stateChanged', listener);
  }

  /**
   * 接続を開始する。
   * 接続済みなら何もしない。接続試行中なら、その試行の完了を待つ。
   * stop() で中断済みの試行が残っている場合は、その終了を待ってから新しく試行を始める。
   * キャンセルされた場合はエラーにせず return する。
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.connectable.isConnected) {
      return;
    }

    this.stopped = false;

    const stale = this.inFlight;
    if (stale && this.controller?.signal.aborted) {
      try {
        await stale;
      } catch (error) {
        this.logger.warn('Previous connect loop failed', { err: error });
      }
      if (this.stopped || this.connectable.isConnected) {
        return;
      }
    }

    if (!this.inFlight) {
      this.inFlight = this.runConnectLoop(signal).finally(() => {
        this.inFlight = null;
      });
    }
    await this.inFlight;
  }

  /**
   * 接続を停止する。
   * 試行中の接続ループを中断して終了を待ってから、接続済みであれば切断する。
   */
  async stop(signal?: AbortSignal): Promise<void> {
    this.stopped = true;
    this.controller?.abort();

    const inFlight = this.inFlight;
    if (inFlight) {
      try {
        await inFlight;
      } catch (error) {
        this.logger.error('Connect loop failed while stopping', { err: error });
      }
    }

    if (this.connectable.isConnected) {
      await this.connectable.disconnect(signal);
    }
    this.setState('disconnected');
  }

  /**
   * 上流の切断を通知する。停止中でなければ再接続ループを開始する。
   */
  handleConnectionLost(): void {
    if (this.stopped) {
      return;
    }

    this.logger.warn('Upstream connection lost, reconnecting');
    this.setState('disconnected');
    this.start().catch((error: unknown) => {
      this.logger.error('Reconnect loop failed', { err: error });
    });
  }

  private async runConnectLoop(signal?: AbortSignal): Promise<void> {
    const controller = new AbortController();
    this.controller = controller;
    const unlink = linkAbort(signal, controller);

    try {
      // 待機中に別経路で接続済みになっている場合がある
      if (this.connectable.isConnected) {
        this.setState('connected');
        return;
      }

      this.currentDelayMs = this.backoff.initialDelayMs;
      this.setState('connecting');

      await this.retryConnector.executeWithRetry(
        () => this.connectable.connect(controller.signal),
        controller.signal
      );

      this.currentDelayMs = this.backoff.initialDelayMs;
      this.setState('connected');
      this.logger.info('Upstream connected');
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        this.logger.info('Connect loop cancelled');
        this.setState('disconnected');
        return;
      }
      this.setState('disconnected');
      throw error;
    } finally {
      unlink();
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }

  private setState(next: ConnectionState): void {
    if (this.currentState === next) {
      return;
    }
    this.currentState = next;
    this.metricsCollector?.setUpstreamConnected(next === 'connected');
    this.events.emit('stateChanged', next);
  }
}

/**
 * 呼び出し側の signal が中断されたら controller も中断する。
 * @returns リスナーを外す関数
 */
function linkAbort(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) {
    return () => {};
  }
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => {};
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}
