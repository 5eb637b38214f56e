import { OperationCancelledError } from '@/domain/errors';

/**
 * 指定時間待機する。signal が中断されたら即座に OperationCancelledError で reject する。
 * @param ms 待機時間（ミリ秒）
 * @param signal キャンセル用シグナル
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError('Sleep cancelled', { cause: signal.reason }));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError('Sleep cancelled', { cause: signal?.reason }));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
