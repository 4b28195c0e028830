/**
 * RpcClient - JSON-RPC 2.0 call/await contract over one connection
 *
 * Any number of callers may `invoke()` concurrently; their requests share the
 * connection and responses are matched strictly by id, never by order.
 */

import { type RpcParams, createRequest, encodeRequest } from './codec.js';
import {
  type ConnectionState,
  type ConnectionStateCallback,
  type DisconnectCallback,
  ConnectionManager,
} from './connection.js';
import { ArmlinkError, CancelledError, DisconnectedError, TimeoutError } from './errors.js';
import { type Logger, consoleLogger } from './logger.js';
import { PendingCallRegistry } from './registry.js';
import type { TransportFactory } from './transports/base.js';
import { webSocketTransportFactory } from './websocket.js';

/**
 * Per-call options
 */
export interface CallOptions {
  /** Deadline in ms for this call; 0 disables it. Defaults to the client's `timeoutMs`. */
  timeoutMs?: number;
  /** Aborting the signal fails the call with `CancelledError` */
  signal?: AbortSignal;
}

/**
 * Client options
 */
export interface RpcClientOptions {
  /** Endpoint URL, e.g. `ws://localhost:8000/ws` */
  url: string;
  /** Default per-call deadline in ms; 0 (the default) means no deadline */
  timeoutMs?: number;
  /** WebSocket handshake deadline in ms */
  connectTimeoutMs?: number;
  /** Extra headers for the WebSocket upgrade request */
  headers?: Record<string, string>;
  /** Replaces the WebSocket transport, e.g. with an in-process one */
  transportFactory?: TransportFactory;
  logger?: Logger;
}

const MAX_REQUEST_ID = Number.MAX_SAFE_INTEGER;

/**
 * RpcClient class
 *
 * @example
 * ```ts
 * const client = new RpcClient({ url: 'ws://localhost:8000/ws' });
 * await client.invoke('set_speed', { percent: 50 });
 * const joints = await client.invoke('get_joint_angles', {}, { timeoutMs: 2000 });
 * ```
 */
export class RpcClient {
  readonly url: string;

  #nextId = 1;
  #timeoutMs: number;
  #logger: Logger;
  #registry: PendingCallRegistry;
  #connection: ConnectionManager;

  constructor(options: RpcClientOptions) {
    this.url = options.url;
    this.#timeoutMs = options.timeoutMs ?? 0;
    this.#logger = options.logger ?? consoleLogger;
    this.#registry = new PendingCallRegistry({ logger: this.#logger });
    this.#connection = new ConnectionManager({
      url: options.url,
      transportFactory:
        options.transportFactory ??
        webSocketTransportFactory({
          connectTimeoutMs: options.connectTimeoutMs,
          headers: options.headers,
          logger: this.#logger,
        }),
      registry: this.#registry,
      logger: this.#logger,
    });
  }

  /**
   * Opens the connection. Calls open it on demand, so this is only needed to
   * fail fast or to connect ahead of the first call.
   *
   * @throws ConnectionError if the endpoint is unreachable
   */
  connect(): Promise<void> {
    return this.#connection.open();
  }

  /**
   * Closes the connection; calls still pending fail with `DisconnectedError`.
   */
  disconnect(): Promise<void> {
    return this.#connection.close();
  }

  isConnected(): boolean {
    return this.#connection.isOpen();
  }

  getState(): ConnectionState {
    return this.#connection.getState();
  }

  /**
   * Number of calls awaiting a response
   */
  pendingCount(): number {
    return this.#registry.size;
  }

  onStateChange(callback: ConnectionStateCallback): () => void {
    return this.#connection.onStateChange(callback);
  }

  onDisconnect(callback: DisconnectCallback): () => void {
    return this.#connection.onDisconnect(callback);
  }

  /**
   * Calls `method` on the arm and resolves with the raw `result` value.
   *
   * If the connection is closed, one reconnect attempt is made first. The
   * deadline and the signal apply to that attempt as well.
   *
   * @throws ConnectionError if that attempt fails
   * @throws RpcError if the arm answered with an error object
   * @throws DisconnectedError if the connection dropped before the answer
   * @throws TimeoutError if the deadline elapsed first
   * @throws CancelledError if `options.signal` was aborted
   */
  async invoke(method: string, params: RpcParams = {}, options: CallOptions = {}): Promise<unknown> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new CancelledError(`Call to ${method} cancelled before it was sent`, method);
    }

    // Until the call is registered, the deadline and the signal fail the
    // connect wait; afterwards they cancel the registry entry.
    let id: number | undefined;
    let interruptOpen: ((error: ArmlinkError) => void) | undefined;
    const interrupt = (toError: (id?: number) => ArmlinkError) => {
      if (id === undefined) {
        interruptOpen?.(toError());
      } else {
        this.#registry.cancel(id, toError(id));
      }
    };

    const timeoutMs = options.timeoutMs ?? this.#timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        interrupt((callId) =>
          callId === undefined
            ? new TimeoutError(`Call to ${method} timed out after ${timeoutMs}ms while connecting`, timeoutMs, method)
            : new TimeoutError(
                `Call to ${method} (id ${callId}) timed out after ${timeoutMs}ms`,
                timeoutMs,
                method,
                callId
              )
        );
      }, timeoutMs);
    }

    const onAbort = () => {
      interrupt((callId) =>
        callId === undefined
          ? new CancelledError(`Call to ${method} cancelled before it was sent`, method)
          : new CancelledError(`Call to ${method} (id ${callId}) cancelled`, method, callId)
      );
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await new Promise<void>((resolve, reject) => {
        interruptOpen = reject;
        this.#connection.ensureOpen().then(resolve, reject);
      });
      interruptOpen = undefined;
      if (signal?.aborted) {
        throw new CancelledError(`Call to ${method} cancelled before it was sent`, method);
      }

      const callId = this.#allocateId();
      id = callId;
      // Registered before the frame goes out, so even an immediate answer finds its slot.
      const call = this.#registry.register(callId, method);
      this.#logger.debug(`-> ${method} #${callId}`, params);

      this.#connection.send(encodeRequest(createRequest(callId, method, params))).catch((err: unknown) => {
        const error =
          err instanceof ArmlinkError
            ? err
            : new DisconnectedError(`Failed to send ${method}: ${err instanceof Error ? err.message : String(err)}`);
        this.#registry.cancel(callId, error);
      });

      const result = await call.promise;
      this.#logger.debug(`<- ${method} #${callId}`);
      return result;
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
    }
  }

  #allocateId(): number {
    let id = this.#nextId;
    // Ids still waiting on an answer are never handed out again.
    while (this.#registry.has(id)) {
      id = id >= MAX_REQUEST_ID ? 1 : id + 1;
    }
    this.#nextId = id >= MAX_REQUEST_ID ? 1 : id + 1;
    return id;
  }
}
