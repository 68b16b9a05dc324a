import { Violation } from '@fixgate/domain';

export type JsonRpcId = number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc?: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc?: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export interface JsonRpcNotification {
  jsonrpc?: '2.0';
  method: string;
  params?: unknown;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcResponse | JsonRpcNotification;

export type FixerMethod = 'fix/one' | 'fix/batch' | 'fix/crossFile';

export interface FixOneParams {
  filePath: string | null;
  content: string;
  violation: Violation;
}

export interface FixBatchParams {
  filePath: string | null;
  content: string;
  violations: readonly Violation[];
}

export interface FixCrossFileParams {
  files: Record<string, string>;
  violations: readonly Violation[];
}

/** Anything that can carry a fixer request: the stdio client, or a fake in tests. */
export interface FixerTransport {
  request(method: FixerMethod, params: unknown): Promise<unknown>;
}
