import type { Logger } from '@/application/interfaces/Logger';
import {
  createTrade,
  isTradingSymbol,
  type SubscriptionResponse,
  type Trade,
  type TradeEventKind,
  type TradeSide,
} from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type ExchangeRawMessage, ExchangeRawMessageSchema } from './messages/ExchangeRawMessage';

export type ParsedExchangeMessage =
  | { kind: 'trade'; trade: Trade }
  | { kind: 'subscription'; response: SubscriptionResponse };

const SUBSCRIPTION_EVENTS: ReadonlySet<string> = new Set(['subscribed', 'unsubscribed', 'rejected']);

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * ISO-8601 文字列をエポックマイクロ秒に変換する。
 * 小数秒は 6 桁まで使い、それより下は切り捨てる。タイムゾーン省略時は UTC とみなす。
 * @returns 解釈できない場合は null
 */
export function parseTimestampMicros(iso: string): number | null {
  const match = ISO_TIMESTAMP.exec(iso.trim());
  if (!match) {
    return null;
  }

  const [, date, time, fraction = '', zone = 'Z'] = match;
  const offset = zone.toUpperCase() === 'Z' ? 'Z' : `${zone.slice(0, 3)}:${zone.slice(-2)}`;
  const seconds = Date.parse(`${date}T${time}${offset}`);
  if (Number.isNaN(seconds)) {
    return null;
  }

  const micros = Number(fraction.padEnd(6, '0').slice(0, 6));
  return seconds * 1000 + micros;
}

/**
 * インフラ層: 取引所メッセージ形式のパース処理
 *
 * 責務: 受信した JSON テキスト → Trade / SubscriptionResponse への変換。
 * 必須フィールドが欠けたメッセージは部分的な Trade にせず null を返す。
 */
export class ExchangeMessageParser {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? LoggerFactory.forComponent('ExchangeMessageParser');
  }

  /**
   * @param text 受信したテキストフレーム
   * @returns 変換できない・対象外のメッセージは null
   */
  parse(text: string): ParsedExchangeMessage | null {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Failed to parse message as JSON', { err: error });
      return null;
    }

    const result = ExchangeRawMessageSchema.safeParse(json);
    if (!result.success) {
      this.logger.debug('Message does not match schema', { issues: result.error.issues });
      return null;
    }

    const message = result.data;
    if (SUBSCRIPTION_EVENTS.has(message.event)) {
      return this.toSubscriptionResponse(message);
    }
    if (message.event === 'updated' && message.channel === 'trades') {
      return this.toTrade(message);
    }
    return null;
  }

  private toSubscriptionResponse(message: ExchangeRawMessage): ParsedExchangeMessage | null {
    const eventKind = toEventKind(message.event);
    if (!eventKind || !message.symbol || !isTradingSymbol(message.symbol)) {
      return null;
    }
    return {
      kind: 'subscription',
      response: {
        sequenceNumber: message.seqnum ?? 0,
        eventKind,
        symbol: message.symbol,
      },
    };
  }

  private toTrade(message: ExchangeRawMessage): ParsedExchangeMessage | null {
    const { symbol, trade_id: tradeId, qty, price } = message;
    if (!symbol || !isTradingSymbol(symbol)) {
      this.logger.debug('Trade for unknown symbol dropped', { symbol });
      return null;
    }
    if (!tradeId || qty === undefined || price === undefined) {
      this.logger.warn('Trade missing required fields dropped', { symbol, tradeId });
      return null;
    }

    const side = toSide(message.side);
    const timestamp = message.timestamp === undefined ? null : parseTimestampMicros(message.timestamp);
    if (!side || timestamp === null) {
      this.logger.warn('Trade with invalid side or timestamp dropped', {
        symbol,
        tradeId,
        side: message.side,
        timestamp: message.timestamp,
      });
      return null;
    }

    return {
      kind: 'trade',
      trade: createTrade({
        sequenceNumber: message.seqnum ?? 0,
        eventKind: 'updated',
        symbol,
        timestamp,
        side,
        quantity: qty,
        price,
        tradeId,
      }),
    };
  }
}

function toEventKind(event: string): TradeEventKind | null {
  switch (event) {
    case 'subscribed':
    case 'unsubscribed':
    case 'rejected':
    case 'snapshot':
    case 'updated':
      return event;
    default:
      return null;
  }
}

function toSide(side: string | undefined): TradeSide | null {
  switch (side?.toLowerCase()) {
    case 'buy':
      return 'buy';
    case 'sell':
      return 'sell';
    default:
      return null;
  }
}
