import { z } from 'zod';

/** JSON-RPC 2.0 のエラーコード */
export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
} as const;

export type JsonRpcErrorCode = (typeof JsonRpcErrorCode)[keyof typeof JsonRpcErrorCode];

export type JsonRpcId = string | number | null;

export const JsonRpcRequestSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    method: z.string().min(1),
    params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
  })
  .strict();

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  result: unknown;
  id: JsonRpcId;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  error: {
    code: JsonRpcErrorCode;
    message: string;
    data?: unknown;
  };
  id: JsonRpcId;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params: unknown;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/**
 * ハンドラから投げると、そのままエラー応答に変換される。
 */
export class JsonRpcError extends Error {
  override readonly name = 'JsonRpcError';

  constructor(
    readonly code: JsonRpcErrorCode,
    message: string,
    readonly data?: unknown
  ) {
    super(message);
  }
}

export function success(id: JsonRpcId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: '2.0', result, id };
}

export function failure(id: JsonRpcId, error: JsonRpcError): JsonRpcFailure {
  return {
    jsonrpc: '2.0',
    error:
      error.data === undefined
        ? { code: error.code, message: error.message }
        : { code: error.code, message: error.message, data: error.data },
    id,
  };
}

export function notification(method: string, params: unknown): JsonRpcNotification {
  return { jsonrpc: '2.0', method, params };
}

/**
 * 不正なリクエストでも id だけは拾えるなら拾う（応答の id に使う）。
 */
export function extractId(value: unknown): JsonRpcId {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return null;
  }
  const { id } = value;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}
