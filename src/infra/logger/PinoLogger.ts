import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
}

/**
 * pino を使用したロガー実装
 *
 * 環境変数 `LOG_LEVEL` でログレベルを制御。
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。
 */
export class PinoLogger implements Logger {
  private readonly pinoLogger: pino.Logger;

  constructor(options?: PinoLoggerOptions | pino.Logger) {
    this.pinoLogger = isPinoInstance(options) ? options : PinoLogger.createRoot(options);
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  /**
   * 子ロガーも同じ PinoLogger でラップして返す。
   */
  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }

  private static createRoot(options?: PinoLoggerOptions): pino.Logger {
    const level = options?.level ?? process.env.LOG_LEVEL ?? 'info';
    const isDevelopment = process.env.NODE_ENV !== 'production';
    const usePretty = options?.pretty ?? isDevelopment;

    if (usePretty) {
      // 開発環境: pino-pretty を使用して人間可読形式で出力
      return pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      });
    }

    // 本番環境: JSON 形式で出力
    return pino({ level });
  }
}

function isPinoInstance(value: PinoLoggerOptions | pino.Logger | undefined): value is pino.Logger {
  return value !== undefined && 'child' in value && typeof value.child === 'function';
}
