import type { ZodType, ZodTypeDef } from 'zod';
import type { ListenerToken } from '@/application/events/ListenerRegistry';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import {
  DEFAULT_RECENT_TRADES_COUNT,
  type TradeDataService,
} from '@/application/services/TradeDataService';
import { InvalidArgumentError } from '@/domain/errors';
import type { Trade, TradingSymbol } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import {
  extractId,
  failure,
  JsonRpcError,
  JsonRpcErrorCode,
  type JsonRpcRequest,
  JsonRpcRequestSchema,
  type JsonRpcResponse,
  notification,
  success,
} from './JsonRpc';
import {
  GetRecentTradesParamsSchema,
  GetTradesSinceParamsSchema,
  SubscribeParamsSchema,
} from './TradeHubSchemas';

export const TRADES_UPDATE_METHOD = 'trades.update';

/**
 * 下流クライアント1接続分。送信に失敗した場合は例外を投げてよい。
 */
export interface HubClient {
  readonly id: string;
  send(message: string): void;
}

/** TradeHub が使うサービスの操作 */
export type TradeHubService = Pick<
  TradeDataService,
  'on' | 'off' | 'subscribeToTrades' | 'unsubscribeFromTrades' | 'getRecentTrades' | 'getTradesSince'
>;

interface ClientState {
  readonly client: HubClient;
  readonly symbols: Set<TradingSymbol>;
  closed: boolean;
}

type MethodHandler = (state: ClientState, params: unknown) => Promise<unknown> | unknown;

/**
 * プレゼンテーション層: 下流向け JSON-RPC 2.0 ハブ
 *
 * 責務:
 * - クライアントからのリクエストを TradeDataService の操作に振り分ける
 * - 新規の約定を、そのシンボルを購読しているクライアントへ trades.update で配る
 * - 切断されたクライアントの購読をすべて解放する
 *
 * ソケットには依存しない（TradeHubServer が ws と結びつける）。
 */
export class TradeHub {
  private readonly clients = new Map<string, ClientState>();
  private readonly methods: ReadonlyMap<string, MethodHandler>;
  private readonly logger: Logger;
  private tradeToken: ListenerToken | null = null;

  constructor(
    private readonly service: TradeHubService,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = logger ?? LoggerFactory.forComponent('TradeHub');
    this.methods = new Map<string, MethodHandler>([
      ['subscribe', (state, params) => this.subscribe(state, params)],
      ['unsubscribe', (state, params) => this.unsubscribe(state, params)],
      ['getRecentTrades', (_state, params) => this.getRecentTrades(params)],
      ['getTradesSince', (_state, params) => this.getTradesSince(params)],
    ]);
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /** サービスの trade イベントの購読を始める */
  open(): void {
    if (this.tradeToken) {
      return;
    }
    this.tradeToken = this.service.on('trade', (trade) => this.broadcast(trade));
  }

  /**
   * trade イベントの購読をやめ、全クライアントの購読を解放する。
   */
  async close(): Promise<void> {
    if (this.tradeToken) {
      this.service.off(this.tradeToken);
      this.tradeToken = null;
    }
    await Promise.all([...this.clients.values()].map((state) => this.disconnect(state.client)));
  }

  connect(client: HubClient): void {
    this.clients.set(client.id, { client, symbols: new Set(), closed: false });
    this.logger.debug('Client connected', { clientId: client.id });
  }

  /**
   * クライアントが保持していた購読をすべて解放する。
   */
  async disconnect(client: HubClient): Promise<void> {
    const state = this.clients.get(client.id);
    if (!state) {
      return;
    }
    state.closed = true;
    this.clients.delete(client.id);

    const symbols = [...state.symbols];
    state.symbols.clear();
    await Promise.all(symbols.map((symbol) => this.service.unsubscribeFromTrades(symbol)));
    this.logger.debug('Client disconnected', { clientId: client.id, released: symbols });
  }

  /**
   * テキストフレーム1件を処理し、応答が必要なら送る（通知には応答しない）。
   */
  async handleMessage(client: HubClient, text: string): Promise<void> {
    const state = this.clients.get(client.id);
    if (!state) {
      this.logger.warn('Message from unknown client ignored', { clientId: client.id });
      return;
    }

    const response = await this.dispatch(state, text);
    if (response) {
      this.sendTo(state, response);
    }
  }

  /**
   * @returns 応答（通知の場合は null）
   */
  private async dispatch(state: ClientState, text: string): Promise<JsonRpcResponse | null> {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return failure(null, new JsonRpcError(JsonRpcErrorCode.ParseError, 'Parse error'));
    }

    const parsed = JsonRpcRequestSchema.safeParse(json);
    if (!parsed.success) {
      return failure(
        extractId(json),
        new JsonRpcError(JsonRpcErrorCode.InvalidRequest, 'Invalid Request')
      );
    }

    const request = parsed.data;
    const result = await this.invoke(state, request);
    if (request.id === undefined) {
      return null;
    }
    return result instanceof JsonRpcError
      ? failure(request.id, result)
      : success(request.id, result.value);
  }

  private async invoke(
    state: ClientState,
    request: JsonRpcRequest
  ): Promise<{ value: unknown } | JsonRpcError> {
    const handler = this.methods.get(request.method);
    if (!handler) {
      return new JsonRpcError(JsonRpcErrorCode.MethodNotFound, 'Method not found', {
        method: request.method,
      });
    }

    try {
      return { value: await handler(state, request.params) };
    } catch (error) {
      return this.toJsonRpcError(request.method, error);
    }
  }

  private toJsonRpcError(method: string, error: unknown): JsonRpcError {
    if (error instanceof JsonRpcError) {
      return error;
    }
    if (error instanceof InvalidArgumentError) {
      return new JsonRpcError(JsonRpcErrorCode.InvalidParams, 'Invalid params', {
        reason: error.message,
      });
    }
    this.metricsCollector?.incrementError('rpc_error');
    this.logger.error('RPC handler failed', { method, err: error });
    return new JsonRpcError(JsonRpcErrorCode.InternalError, 'Internal error');
  }

  private async subscribe(state: ClientState, params: unknown): Promise<unknown> {
    const { channel, symbol } = parseParams(SubscribeParamsSchema, params);
    if (state.symbols.has(symbol)) {
      return { channel, symbol, subscribed: true };
    }

    await this.service.subscribeToTrades(symbol);

    // 待機中に切断された場合は、ここで解放する
    if (state.closed) {
      await this.service.unsubscribeFromTrades(symbol);
      return { channel, symbol, subscribed: false };
    }
    if (state.symbols.has(symbol)) {
      // 同じクライアントからの並行リクエストで二重に数えた分を戻す
      await this.service.unsubscribeFromTrades(symbol);
    } else {
      state.symbols.add(symbol);
    }
    return { channel, symbol, subscribed: true };
  }

  private async unsubscribe(state: ClientState, params: unknown): Promise<unknown> {
    const { channel, symbol } = parseParams(SubscribeParamsSchema, params);
    if (!state.symbols.delete(symbol)) {
      return { channel, symbol, subscribed: false };
    }
    await this.service.unsubscribeFromTrades(symbol);
    return { channel, symbol, subscribed: false };
  }

  private getRecentTrades(params: unknown): Trade[] {
    const { symbol, count, before } = parseParams(GetRecentTradesParamsSchema, params);
    return this.service.getRecentTrades(symbol, count ?? DEFAULT_RECENT_TRADES_COUNT, before);
  }

  private getTradesSince(params: unknown): Trade[] {
    const { symbol, count, after } = parseParams(GetTradesSinceParamsSchema, params);
    return this.service.getTradesSince(symbol, count ?? DEFAULT_RECENT_TRADES_COUNT, after);
  }

  private broadcast(trade: Trade): void {
    const subscribers = [...this.clients.values()].filter((state) =>
      state.symbols.has(trade.symbol)
    );
    if (subscribers.length === 0) {
      return;
    }

    // 文字列化は1回だけ
    const message = JSON.stringify(
      notification(TRADES_UPDATE_METHOD, { symbol: trade.symbol, trade })
    );
    for (const state of subscribers) {
      if (this.sendRaw(state, message)) {
        this.metricsCollector?.incrementPublished('hub', trade.symbol);
      }
    }
  }

  private sendTo(state: ClientState, response: JsonRpcResponse): void {
    this.sendRaw(state, JSON.stringify(response));
  }

  private sendRaw(state: ClientState, message: string): boolean {
    try {
      state.client.send(message);
      return true;
    } catch (error) {
      this.metricsCollector?.incrementError('client_send_error');
      this.logger.warn('Failed to send to client', { clientId: state.client.id, err: error });
      return false;
    }
  }
}

function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: unknown): T {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    throw new JsonRpcError(JsonRpcErrorCode.InvalidParams, 'Invalid params', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
