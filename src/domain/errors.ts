/**
 * ドメイン層: エラー種別
 *
 * キャンセルはエラーではなく「中断」として扱う。
 * リトライループはこの型を見てリトライせずに抜ける。
 */
export class OperationCancelledError extends Error {
  override readonly name = 'OperationCancelledError';

  constructor(message = 'Operation was cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * 呼び出し側の引数が不正な場合のエラー（負の件数など）。
 */
export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(
    readonly argument: string,
    message: string
  ) {
    super(`${argument}: ${message}`);
  }
}

/**
 * エラーが、指定されたシグナルによるキャンセルかどうかを判定する。
 * シグナルが中断されていない場合の OperationCancelledError は、呼び出し側のキャンセルではないので false。
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (!signal?.aborted) {
    return false;
  }
  if (error instanceof OperationCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * 件数パラメータを検証する（0 以上の整数のみ許可）。
 * @throws {InvalidArgumentError}
 */
export function assertCount(count: number, argument = 'count'): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError(argument, `must be a non-negative integer, got ${count}`);
  }
}
