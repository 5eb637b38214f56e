import { InvalidArgumentError } from '@/domain/errors';

/**
 * インフラ層: 再接続遅延の計算戦略
 *
 * 試行回数（1 始まり）から遅延（ミリ秒）を求める純粋関数。
 * 状態を持たないので、同じ入力には常に同じ遅延を返す。
 */
export interface BackoffStrategy {
  /**
   * @param attemptNumber 失敗した試行の通し番号（1 始まり）
   * @returns 次の試行までの遅延（ミリ秒）
   */
  getDelay(attemptNumber: number): number;
}

export interface BackoffOptions {
  /** 初回リトライの遅延（ミリ秒） */
  initialDelayMs: number;
  /** 遅延の上限（ミリ秒） */
  maxDelayMs: number;
  /** 1回ごとの倍率（指数バックオフのみ使用） */
  multiplier: number;
}

export const DEFAULT_BACKOFF_OPTIONS: Readonly<BackoffOptions> = Object.freeze({
  initialDelayMs: 5_000,
  maxDelayMs: 300_000,
  multiplier: 2,
});

function assertAttemptNumber(attemptNumber: number): void {
  if (!Number.isInteger(attemptNumber) || attemptNumber < 1) {
    throw new InvalidArgumentError('attemptNumber', `must be a positive integer, got ${attemptNumber}`);
  }
}

function validateOptions(options: BackoffOptions): BackoffOptions {
  if (options.initialDelayMs < 0) {
    throw new InvalidArgumentError('initialDelayMs', 'must not be negative');
  }
  if (options.maxDelayMs < options.initialDelayMs) {
    throw new InvalidArgumentError('maxDelayMs', 'must be greater than or equal to initialDelayMs');
  }
  if (options.multiplier < 1) {
    throw new InvalidArgumentError('multiplier', 'must be at least 1');
  }
  return { ...options };
}

/**
 * 指数バックオフ: min(initial * multiplier^(attempt-1), max)
 */
export class ExponentialBackoffStrategy implements BackoffStrategy {
  private readonly options: BackoffOptions;

  constructor(options: BackoffOptions = DEFAULT_BACKOFF_OPTIONS) {
    this.options = validateOptions(options);
  }

  getDelay(attemptNumber: number): number {
    assertAttemptNumber(attemptNumber);
    const { initialDelayMs, maxDelayMs, multiplier } = this.options;
    return Math.min(initialDelayMs * multiplier ** (attemptNumber - 1), maxDelayMs);
  }
}

/**
 * 線形バックオフ: min(initial * attempt, max)
 */
export class LinearBackoffStrategy implements BackoffStrategy {
  private readonly options: BackoffOptions;

  constructor(options: BackoffOptions = DEFAULT_BACKOFF_OPTIONS) {
    this.options = validateOptions(options);
  }

  getDelay(attemptNumber: number): number {
    assertAttemptNumber(attemptNumber);
    return Math.min(this.options.initialDelayMs * attemptNumber, this.options.maxDelayMs);
  }
}
