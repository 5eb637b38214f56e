import type { Logger } from '@/application/interfaces/Logger';
import { isCancellation, OperationCancelledError } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { BackoffStrategy } from './BackoffStrategy';
import { sleep } from './sleep';

export type RetryListener = (attemptNumber: number, delayMs: number, error: unknown) => void;

/**
 * インフラ層: バックオフ付きリトライ実行
 *
 * 責務: 任意の非同期アクションを成功するかキャンセルされるまで繰り返す。
 * 試行回数の上限は持たない（諦めるタイミングは呼び出し側がキャンセルで決める）。
 */
export class RetryConnector {
  private readonly logger: Logger;

  /**
   * @param backoffStrategy 遅延計算戦略
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param onRetry 失敗して待機に入る直前に呼ばれるコールバック（メトリクス・テスト用）
   */
  constructor(
    private readonly backoffStrategy: BackoffStrategy,
    logger?: Logger,
    private readonly onRetry?: RetryListener
  ) {
    this.logger = logger ?? LoggerFactory.forComponent('RetryConnector');
  }

  /**
   * アクションを成功するまで実行する。
   * @returns アクションの戻り値
   * @throws {OperationCancelledError} 試行前・試行中・待機中に signal が中断された場合
   */
  async executeWithRetry<T>(action: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attemptNumber = 0;

    while (!signal?.aborted) {
      try {
        return await action();
      } catch (error) {
        // 中断後の失敗は原因を問わず再試行として数えない
        if (signal?.aborted) {
          if (!isCancellation(error, signal)) {
            this.logger.debug('Attempt failed after cancellation', { err: error });
          }
          throw toCancelledError(error);
        }

        attemptNumber += 1;
        const delay = this.backoffStrategy.getDelay(attemptNumber);
        this.logger.warn('Attempt failed, retrying after backoff', {
          attempt: attemptNumber,
          delayMs: delay,
          err: error,
        });
        this.onRetry?.(attemptNumber, delay, error);

        await sleep(delay, signal);
      }
    }

    throw new OperationCancelledError('Retry loop cancelled', { cause: signal?.reason });
  }
}

function toCancelledError(error: unknown): OperationCancelledError {
  if (error instanceof OperationCancelledError) {
    return error;
  }
  return new OperationCancelledError('Retry loop cancelled', { cause: error });
}
