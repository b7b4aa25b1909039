/**
 * Shared JSON-RPC 2.0 type definitions for MCP communication
 */

export type RequestId = string | number;

export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: RequestId;
  method: string;
  params?: JsonRpcParams | undefined;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams | undefined;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: Record<string, unknown> | undefined;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: RequestId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * Classified inbound message. `kind` tags the union so the dispatcher can
 * switch without re-inspecting the envelope.
 */
export type ParsedMessage =
  | { readonly kind: 'request'; readonly message: JsonRpcRequest }
  | { readonly kind: 'notification'; readonly message: JsonRpcNotification }
  | { readonly kind: 'response'; readonly message: JsonRpcResponse }
  | { readonly kind: 'invalid'; readonly failure: ParseFailure };

export interface ParseFailure {
  /** `parse` for unreadable JSON, `invalid-request` for a bad envelope */
  readonly reason: 'parse' | 'invalid-request';
  readonly message: string;
  /** Present only when the envelope carried a usable id */
  readonly id?: RequestId | undefined;
}
