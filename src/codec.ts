/**
 * JSON-RPC 2.0 envelope codec.
 *
 * Requests go out as `{"jsonrpc":"2.0","method":...,"params":{...},"id":n}`.
 * Responses come back as `{"id":n,"result":...}` or
 * `{"id":n,"error":{"code":...,"message":...}}`; the arm's server omits the
 * `jsonrpc` tag on responses, so it is optional when decoding.
 */

import { MalformedResponseError } from './errors.js';

export const JSONRPC_VERSION = '2.0';

export type RpcParams = Record<string, unknown>;

export interface RequestEnvelope {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params: RpcParams;
  id: number;
}

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface SuccessEnvelope {
  id: number;
  result: unknown;
}

export interface ErrorEnvelope {
  id: number;
  error: RpcErrorObject;
}

export type ResponseEnvelope = SuccessEnvelope | ErrorEnvelope;

export function isErrorEnvelope(envelope: ResponseEnvelope): envelope is ErrorEnvelope {
  return 'error' in envelope;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedResponseError(`Invalid ${what}: not valid JSON (${reason})`);
  }
}

function checkVersion(value: Record<string, unknown>, what: string): void {
  if ('jsonrpc' in value && value.jsonrpc !== JSONRPC_VERSION) {
    throw new MalformedResponseError(
      `Invalid ${what}: unsupported jsonrpc version ${JSON.stringify(value.jsonrpc)}`,
      'jsonrpc'
    );
  }
}

// ============================================================================
// Requests
// ============================================================================

export function createRequest(id: number, method: string, params: RpcParams = {}): RequestEnvelope {
  return { jsonrpc: JSONRPC_VERSION, method, params, id };
}

export function encodeRequest(envelope: RequestEnvelope): string {
  return JSON.stringify({
    jsonrpc: JSONRPC_VERSION,
    method: envelope.method,
    params: envelope.params,
    id: envelope.id,
  });
}

/**
 * Decodes a request frame. Used by test peers and tooling that sits on the
 * server side of the link.
 */
export function decodeRequest(text: string): RequestEnvelope {
  const value = parseJson(text, 'request');
  if (!isRecord(value)) {
    throw new MalformedResponseError(`Invalid request: expected an object, got ${describe(value)}`);
  }
  checkVersion(value, 'request');

  if (typeof value.method !== 'string' || value.method.length === 0) {
    throw new MalformedResponseError('Invalid request: method must be a non-empty string', 'method');
  }
  if (!isInteger(value.id)) {
    throw new MalformedResponseError('Invalid request: id must be an integer', 'id');
  }

  let params: RpcParams = {};
  if (value.params !== undefined && value.params !== null) {
    if (!isRecord(value.params)) {
      throw new MalformedResponseError('Invalid request: params must be an object', 'params');
    }
    params = value.params;
  }

  return { jsonrpc: JSONRPC_VERSION, method: value.method, params, id: value.id };
}

// ============================================================================
// Responses
// ============================================================================

export function encodeResponse(envelope: ResponseEnvelope): string {
  if (isErrorEnvelope(envelope)) {
    return JSON.stringify({ jsonrpc: JSONRPC_VERSION, id: envelope.id, error: envelope.error });
  }
  // `undefined` would vanish from the JSON text and turn a success into a malformed frame.
  const result = envelope.result === undefined ? null : envelope.result;
  return JSON.stringify({ jsonrpc: JSONRPC_VERSION, id: envelope.id, result });
}

/**
 * Decodes a response frame.
 *
 * @throws MalformedResponseError if the frame is not a well-formed response
 */
export function decodeResponse(text: string): ResponseEnvelope {
  const value = parseJson(text, 'response');
  if (!isRecord(value)) {
    throw new MalformedResponseError(`Invalid response: expected an object, got ${describe(value)}`);
  }
  checkVersion(value, 'response');

  const hasResult = 'result' in value;
  const hasError = 'error' in value;

  if (value.id === null && hasError && isRecord(value.error) && typeof value.error.message === 'string') {
    // The peer could not read one of our requests well enough to find its id.
    throw new MalformedResponseError(`Peer reported an error without a request id: ${value.error.message}`, 'id');
  }
  const id = value.id;
  if (!isInteger(id)) {
    throw new MalformedResponseError('Invalid response: id must be an integer', 'id');
  }

  if (hasResult === hasError) {
    throw new MalformedResponseError(
      `Invalid response ${id}: expected exactly one of result or error`
    );
  }

  if (hasResult) {
    return { id, result: value.result };
  }

  const error = value.error;
  if (!isRecord(error)) {
    throw new MalformedResponseError(`Invalid response ${id}: error must be an object`, 'error');
  }
  const { code, message } = error;
  if (!isInteger(code)) {
    throw new MalformedResponseError(`Invalid response ${id}: error.code must be an integer`, 'error.code');
  }
  if (typeof message !== 'string') {
    throw new MalformedResponseError(`Invalid response ${id}: error.message must be a string`, 'error.message');
  }

  const decoded: RpcErrorObject = { code, message };
  if ('data' in error) {
    decoded.data = error.data;
  }
  return { id, error: decoded };
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
