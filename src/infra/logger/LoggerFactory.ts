import type { Logger } from '@/application/interfaces/Logger';
import { PinoLogger, type PinoLoggerOptions } from './PinoLogger';

/**
 * ロガーファクトリー
 *
 * アプリケーション全体で1つのルートロガーを共有し、コンポーネントごとに child() で分ける。
 * configure() を呼ばずに使った場合は `LOG_LEVEL` / `NODE_ENV` から生成する。
 */
export class LoggerFactory {
  private static root: Logger | null = null;

  /**
   * 検証済みの設定でルートロガーを作り直す。main.ts で他のコンポーネントより先に呼ぶ。
   */
  static configure(options: PinoLoggerOptions): Logger {
    LoggerFactory.root = new PinoLogger(options);
    return LoggerFactory.root;
  }

  static create(): Logger {
    LoggerFactory.root ??= new PinoLogger({
      level: process.env.LOG_LEVEL,
      pretty: process.env.NODE_ENV !== 'production',
    });
    return LoggerFactory.root;
  }

  /**
   * @param component 出力に `component` として付く名前（例: 'ConnectionManager'）
   */
  static forComponent(component: string): Logger {
    return LoggerFactory.create().child({ component });
  }

  /** テスト用 */
  static reset(): void {
    LoggerFactory.root = null;
  }
}
