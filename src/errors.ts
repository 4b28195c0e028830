/**
 * armlink - Error Codes and Error Classes
 *
 * Every failure a caller can observe from the client is one of the classes
 * below, so a single `instanceof ArmlinkError` check covers them all.
 *
 * Error Code Ranges:
 * - 1xxx: Connection errors
 * - 3xxx: Deadline and cancellation errors
 * - 4xxx: Client usage errors
 * - 5xxx: Decoding errors
 * - negative: codes reported by the remote peer (JSON-RPC 2.0)
 */

// ============================================================================
// Standard Error Codes
// ============================================================================

export const ErrorCode = {
  /** Transport could not be established */
  CONNECTION_ERROR: 1001,

  /** Link dropped or was closed while a call was outstanding */
  DISCONNECTED: 1002,

  /** Per-call deadline elapsed */
  TIMEOUT_ERROR: 3001,

  /** Caller aborted the call */
  CANCELLED: 3002,

  /** Identifier registered twice */
  DUPLICATE_REQUEST: 4001,

  /** Frame or result could not be decoded */
  MALFORMED_RESPONSE: 5001,
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Maps error codes to their string names
 */
export const ErrorCodeName: Record<ErrorCodeType, string> = {
  [ErrorCode.CONNECTION_ERROR]: 'CONNECTION_ERROR',
  [ErrorCode.DISCONNECTED]: 'DISCONNECTED',
  [ErrorCode.TIMEOUT_ERROR]: 'TIMEOUT_ERROR',
  [ErrorCode.CANCELLED]: 'CANCELLED',
  [ErrorCode.DUPLICATE_REQUEST]: 'DUPLICATE_REQUEST',
  [ErrorCode.MALFORMED_RESPONSE]: 'MALFORMED_RESPONSE',
};

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all armlink errors.
 *
 * Error Hierarchy:
 * - ArmlinkError (base)
 *   - ConnectionError: endpoint unreachable, reconnect failed
 *   - DisconnectedError: link lost with calls in flight
 *   - RpcError: the arm reported a failure for one call
 *   - TimeoutError: deadline elapsed
 *   - CancelledError: aborted by the caller
 *   - MalformedResponseError: undecodable frame or result
 *   - DuplicateRequestError: identifier already pending
 *
 * @example
 * ```typescript
 * try {
 *   await arm.getJointAngles();
 * } catch (error) {
 *   if (error instanceof ArmlinkError) {
 *     console.log(`[${error.codeName}] ${error.message}`);
 *   }
 * }
 * ```
 */
export class ArmlinkError extends Error {
  constructor(
    message: string,
    public readonly code: number,
    public readonly codeName: string
  ) {
    super(message);
    this.name = 'ArmlinkError';
  }

  toJSON(): { name: string; message: string; code: number; codeName: string } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: this.codeName,
    };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * The transport could not be established.
 *
 * Raised by `open()`, and by a call whose single reconnect attempt failed.
 * `cause` holds the underlying socket error when there is one.
 */
export class ConnectionError extends ArmlinkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.CONNECTION_ERROR, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Issued to every pending call when the link drops or is closed, and to
 * sends attempted with no open link.
 */
export class DisconnectedError extends ArmlinkError {
  constructor(message: string = 'Connection closed') {
    super(message, ErrorCode.DISCONNECTED, 'DISCONNECTED');
    this.name = 'DisconnectedError';
  }
}

/**
 * The arm explicitly reported a failure for one call.
 *
 * `code` is the JSON-RPC error code sent by the peer (e.g. -32000), not one of
 * the local `ErrorCode` values. Never retried automatically.
 *
 * @example
 * ```typescript
 * try {
 *   await arm.getJointAngles();
 * } catch (error) {
 *   if (error instanceof RpcError && error.code === -32000) {
 *     console.log(`${error.method} #${error.requestId}: ${error.message}`);
 *   }
 * }
 * ```
 */
export class RpcError extends ArmlinkError {
  constructor(
    code: number,
    message: string,
    public readonly method?: string,
    public readonly requestId?: number,
    public readonly data?: unknown
  ) {
    super(message, code, 'RPC_ERROR');
    this.name = 'RpcError';
  }

  toJSON(): { name: string; message: string; code: number; codeName: string; method?: string; requestId?: number } {
    return {
      ...super.toJSON(),
      method: this.method,
      requestId: this.requestId,
    };
  }
}

/**
 * A call's deadline elapsed without a response. The pending slot has been
 * released; a late response for the same identifier is dropped.
 */
export class TimeoutError extends ArmlinkError {
  constructor(
    message: string = 'Request timed out',
    public readonly timeoutMs?: number,
    public readonly method?: string,
    public readonly requestId?: number
  ) {
    super(message, ErrorCode.TIMEOUT_ERROR, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

/**
 * The caller aborted the call through its `AbortSignal`.
 */
export class CancelledError extends ArmlinkError {
  constructor(
    message: string = 'Request cancelled',
    public readonly method?: string,
    public readonly requestId?: number
  ) {
    super(message, ErrorCode.CANCELLED, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * A frame could not be decoded into a Response Envelope, or a result did not
 * have the shape its decoder expects. `path` names the offending field.
 */
export class MalformedResponseError extends ArmlinkError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message, ErrorCode.MALFORMED_RESPONSE, 'MALFORMED_RESPONSE');
    this.name = 'MalformedResponseError';
  }
}

/**
 * An identifier was registered while a call with the same identifier was
 * still pending. Indicates a bug in the caller, not in the peer.
 */
export class DuplicateRequestError extends ArmlinkError {
  constructor(public readonly requestId: number) {
    super(`Request id ${requestId} is already pending`, ErrorCode.DUPLICATE_REQUEST, 'DUPLICATE_REQUEST');
    this.name = 'DuplicateRequestError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is an ArmlinkError with a specific error code.
 *
 * @example
 * ```typescript
 * if (isErrorCode(error, ErrorCode.TIMEOUT_ERROR)) {
 *   // Handle timeout specifically
 * }
 * ```
 */
export function isErrorCode(error: unknown, code: number): boolean {
  return error instanceof ArmlinkError && error.code === code;
}

/**
 * Wraps an unknown thrown value into an ArmlinkError. Anything that is not
 * already one is treated as a connection failure, since that is the only
 * place foreign errors enter the client.
 */
export function wrapError(error: unknown): ArmlinkError {
  if (error instanceof ArmlinkError) {
    return error;
  }
  if (error instanceof Error) {
    return new ConnectionError(error.message, { cause: error });
  }
  return new ConnectionError(String(error));
}
