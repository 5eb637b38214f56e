import { z } from 'zod';
import { TRADING_SYMBOLS, type TradingSymbol } from '@/domain/types';

/** 空文字は未設定とみなす */
const OptionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const Port = z.coerce.number().int().min(1).max(65535);

/**
 * 環境変数のスキーマ
 */
export const EnvConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

    // 上流フィード
    UPSTREAM_WS_URL: z
      .string({ required_error: 'UPSTREAM_WS_URL is required' })
      .url('UPSTREAM_WS_URL must be a URL'),
    UPSTREAM_API_TOKEN: OptionalString,

    // 下流
    HUB_PORT: Port.default(8080),
    METRICS_PORT: Port.default(9100),
    REDIS_URL: OptionalString,

    // 再接続
    INITIAL_BACKOFF_MS: z.coerce.number().int().nonnegative().default(5000),
    MAX_BACKOFF_MS: z.coerce.number().int().nonnegative().default(300000),
    BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),

    CACHE_MAX_TRADES_PER_SYMBOL: z.coerce.number().int().positive().default(10000),

    // 起動時に購読するシンボル（カンマ区切り）
    DEFAULT_SYMBOLS: z
      .string()
      .optional()
      .transform((value) =>
        (value ?? '')
          .split(',')
          .map((symbol) => symbol.trim())
          .filter(Boolean)
      )
      .pipe(z.array(z.enum(TRADING_SYMBOLS))),
  })
  .superRefine((env, ctx) => {
    if (env.MAX_BACKOFF_MS < env.INITIAL_BACKOFF_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MAX_BACKOFF_MS'],
        message: 'MAX_BACKOFF_MS must be greater than or equal to INITIAL_BACKOFF_MS',
      });
    }
  });

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  logLevel: EnvConfig['LOG_LEVEL'];
  upstream: {
    url: string;
    apiToken?: string;
  };
  hubPort: number;
  metricsPort: number;
  redisUrl?: string;
  backoff: {
    initialDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
  };
  cache: {
    maxTradesPerSymbol: number;
  };
  defaultSymbols: TradingSymbol[];
}

/**
 * 設定値の検証エラー。issues は「変数名: 理由」の形式。
 */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid environment variables:\n  ${issues.join('\n  ')}`);
  }
}

/**
 * 環境変数を検証して設定オブジェクトに変換する。
 * `.env` の読み込みは呼び出し側（main.ts の dotenv/config）で済ませておく。
 * @throws {ConfigError} 必須項目の欠落や不正な値がある場合
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    upstream: {
      url: parsed.UPSTREAM_WS_URL,
      apiToken: parsed.UPSTREAM_API_TOKEN,
    },
    hubPort: parsed.HUB_PORT,
    metricsPort: parsed.METRICS_PORT,
    redisUrl: parsed.REDIS_URL,
    backoff: {
      initialDelayMs: parsed.INITIAL_BACKOFF_MS,
      maxDelayMs: parsed.MAX_BACKOFF_MS,
      multiplier: parsed.BACKOFF_MULTIPLIER,
    },
    cache: {
      maxTradesPerSymbol: parsed.CACHE_MAX_TRADES_PER_SYMBOL,
    },
    defaultSymbols: [...new Set(parsed.DEFAULT_SYMBOLS)],
  };
}
