import { z } from 'zod';

import { JsonRpcMessage, JsonRpcRequest, JsonRpcResponse } from './types.js';

const errorResponseSchema = z.object({
  id: z.number(),
  error: z.object({
    code: z.number(),
    message: z.string(),
    data: z.unknown().optional()
  })
});

const successResponseSchema = z.object({
  id: z.number(),
  result: z.unknown()
});

const notificationSchema = z.object({
  method: z.string(),
  params: z.unknown().optional()
});

export function encodeJsonRpcRequest(id: number, method: string, params?: unknown): string {
  const request: JsonRpcRequest = {
    jsonrpc: '2.0',
    id,
    method,
    params
  };

  return JSON.stringify(request);
}

export function parseJsonRpcMessage(line: string): JsonRpcMessage {
  const parsed: unknown = JSON.parse(line);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Invalid JSON-RPC message payload type');
  }

  const failure = errorResponseSchema.safeParse(parsed);
  if (failure.success) {
    return { jsonrpc: '2.0', id: failure.data.id, error: failure.data.error };
  }

  const success = successResponseSchema.safeParse(parsed);
  if (success.success && 'result' in parsed) {
    return { jsonrpc: '2.0', id: success.data.id, result: success.data.result };
  }

  const notification = notificationSchema.safeParse(parsed);
  if (notification.success && !('id' in parsed)) {
    return { jsonrpc: '2.0', method: notification.data.method, params: notification.data.params };
  }

  throw new Error('Invalid JSON-RPC message shape');
}

export function isResponse(message: JsonRpcMessage): message is JsonRpcResponse {
  return 'id' in message;
}
