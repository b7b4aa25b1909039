import type {
  JsonRpcError,
  JsonRpcErrorResponse,
  JsonRpcNotification,
  JsonRpcParams,
  JsonRpcSuccessResponse,
  ParsedMessage,
  RequestId,
} from '../../types/jsonrpc.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * `null` counts as absent; any other non string/number id is unusable
 */
function readId(value: unknown): RequestId | undefined | 'invalid' {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return 'invalid';
}

function readParams(value: unknown): JsonRpcParams | undefined | 'invalid' {
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value;
  }
  return isPlainObject(value) ? value : 'invalid';
}

function invalid(
  reason: 'parse' | 'invalid-request',
  message: string,
  id?: RequestId
): ParsedMessage {
  return { kind: 'invalid', failure: { reason, message, id } };
}

function readResponse(
  value: Record<string, unknown>,
  id: RequestId
): ParsedMessage {
  const error = value.error;
  if (isPlainObject(error)) {
    if (typeof error.code !== 'number' || typeof error.message !== 'string') {
      return invalid('invalid-request', 'Malformed error object', id);
    }
    const wireError: JsonRpcError = { code: error.code, message: error.message };
    if (isPlainObject(error.data)) {
      wireError.data = error.data;
    }
    return {
      kind: 'response',
      message: { jsonrpc: '2.0', id, error: wireError },
    };
  }
  if ('result' in value) {
    return {
      kind: 'response',
      message: { jsonrpc: '2.0', id, result: value.result },
    };
  }
  return invalid('invalid-request', 'Response has neither result nor error', id);
}

/**
 * Classify one frame body. Never throws.
 */
export function parseMessage(raw: string): ParsedMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    return invalid(
      'parse',
      `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (Array.isArray(value)) {
    return invalid('parse', 'Batch messages are not supported');
  }
  if (!isPlainObject(value)) {
    return invalid('parse', 'Message must be a JSON object');
  }

  const id = readId(value.id);
  if (id === 'invalid') {
    return invalid('invalid-request', 'Request id must be a string or number');
  }
  if (value.jsonrpc !== '2.0') {
    return invalid('invalid-request', 'jsonrpc must be "2.0"', id);
  }

  const method = value.method;
  if (method !== undefined) {
    if (typeof method !== 'string' || method.length === 0) {
      return invalid('invalid-request', 'method must be a non-empty string', id);
    }
    const params = readParams(value.params);
    if (params === 'invalid') {
      return invalid('invalid-request', 'params must be an object or array', id);
    }
    if (id === undefined) {
      return {
        kind: 'notification',
        message: { jsonrpc: '2.0', method, params },
      };
    }
    return {
      kind: 'request',
      message: { jsonrpc: '2.0', id, method, params },
    };
  }

  if (id !== undefined) {
    return readResponse(value, id);
  }

  return invalid('invalid-request', 'Message has neither method nor id');
}

export function successResponse(
  id: RequestId,
  result: unknown
): JsonRpcSuccessResponse {
  return { jsonrpc: '2.0', id, result };
}

export function errorResponse(
  id: RequestId | null,
  error: JsonRpcError
): JsonRpcErrorResponse {
  return { jsonrpc: '2.0', id, error };
}

export function notification(
  method: string,
  params?: JsonRpcParams
): JsonRpcNotification {
  return params === undefined
    ? { jsonrpc: '2.0', method }
    : { jsonrpc: '2.0', method, params };
}
