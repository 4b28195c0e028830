// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { type ResponseEnvelope, decodeResponse, isErrorEnvelope } from "./codec.js";
import { ConnectionError, DisconnectedError, RpcError } from "./errors.js";
import { type Logger, consoleLogger } from "./logger.js";
import { PendingCallRegistry } from "./registry.js";
import type { RpcTransport, TransportFactory } from "./transports/base.js";

/**
 * Connection lifecycle states.
 *
 * State transitions:
 * - closed -> opening (open(), or a call on a closed connection)
 * - opening -> open (transport established)
 * - opening -> closed (transport could not be established)
 * - open -> closing (close())
 * - open -> closed (transport failed or the peer went away)
 * - closing -> closed (after pending calls are abandoned)
 */
export type ConnectionState = "closed" | "opening" | "open" | "closing";

export type ConnectionStateCallback = (state: ConnectionState, previous: ConnectionState) => void;

export type DisconnectCallback = (error: DisconnectedError) => void;

export interface ConnectionManagerOptions {
  /** Endpoint URL, e.g. `ws://localhost:8000/ws` */
  url: string;
  /** Opens transports; see `webSocketTransportFactory()` */
  transportFactory: TransportFactory;
  /** Registry that pending calls are resolved into */
  registry: PendingCallRegistry;
  logger?: Logger;
}

/**
 * Owns the single transport to the arm.
 *
 * - `open()` is idempotent and concurrent callers share one attempt.
 * - Writes are chained so exactly one `send()` is in flight on the transport.
 * - One receive loop per transport is the sole reader; it decodes each frame
 *   and resolves the matching pending call.
 * - When the transport fails, every pending call is abandoned with
 *   `DisconnectedError` and the manager returns to `closed`. It does not
 *   reconnect on its own; the next call does, once, through `ensureOpen()`.
 */
export class ConnectionManager {
  readonly url: string;

  #factory: TransportFactory;
  #registry: PendingCallRegistry;
  #logger: Logger;

  #state: ConnectionState = "closed";
  #transport?: RpcTransport;
  #opening?: Promise<void>;
  #closing?: Promise<void>;
  #receiveLoop?: Promise<void>;
  #writeChain: Promise<void> = Promise.resolve();

  // Bumped whenever the current transport is retired, so that a receive loop
  // belonging to an older transport never touches newer state.
  #generation = 0;

  #stateCallbacks: ConnectionStateCallback[] = [];
  #disconnectCallbacks: DisconnectCallback[] = [];

  constructor(options: ConnectionManagerOptions) {
    this.url = options.url;
    this.#factory = options.transportFactory;
    this.#registry = options.registry;
    this.#logger = options.logger ?? consoleLogger;
  }

  getState(): ConnectionState {
    return this.#state;
  }

  isOpen(): boolean {
    return this.#state === "open";
  }

  /**
   * Register a callback to be notified of state changes.
   * @returns A function to unregister the callback
   */
  onStateChange(callback: ConnectionStateCallback): () => void {
    this.#stateCallbacks.push(callback);
    return () => {
      const index = this.#stateCallbacks.indexOf(callback);
      if (index >= 0) {
        this.#stateCallbacks.splice(index, 1);
      }
    };
  }

  /**
   * Register a callback for when the transport drops without `close()`.
   * @returns A function to unregister the callback
   */
  onDisconnect(callback: DisconnectCallback): () => void {
    this.#disconnectCallbacks.push(callback);
    return () => {
      const index = this.#disconnectCallbacks.indexOf(callback);
      if (index >= 0) {
        this.#disconnectCallbacks.splice(index, 1);
      }
    };
  }

  /**
   * Establishes the transport. Resolves immediately if already open.
   *
   * @throws ConnectionError if the endpoint is unreachable
   */
  open(): Promise<void> {
    if (this.#state === "open") {
      return Promise.resolve();
    }
    if (this.#opening) {
      return this.#opening;
    }
    const closing = this.#closing;
    if (closing) {
      return closing.then(() => this.open());
    }

    const opening = this.#doOpen();
    this.#opening = opening;
    const clear = () => {
      if (this.#opening === opening) {
        this.#opening = undefined;
      }
    };
    opening.then(clear, clear);
    return opening;
  }

  /**
   * Opens the connection if it is not open. This is the single bounded retry
   * a call gets on a closed connection: one `open()` attempt, whose failure
   * is the call's failure.
   *
   * @throws ConnectionError if the attempt fails
   */
  async ensureOpen(): Promise<void> {
    if (this.#state === "open") {
      return;
    }
    if (this.#state === "closed") {
      this.#logger.info(`Connection to ${this.url} is closed; reconnecting`);
    }
    await this.open();
  }

  /**
   * Closes the transport and abandons every pending call with
   * `DisconnectedError`. Waits for an in-flight `open()` first, so no caller
   * ever sees a half-open connection. No-op when already closed.
   */
  close(): Promise<void> {
    if (this.#closing) {
      return this.#closing;
    }
    const closing = this.#doClose();
    this.#closing = closing;
    const clear = () => {
      if (this.#closing === closing) {
        this.#closing = undefined;
      }
    };
    closing.then(clear, clear);
    return closing;
  }

  /**
   * Writes one encoded frame. Frames are written strictly one after another.
   *
   * @throws DisconnectedError if there is no open connection
   */
  send(message: string): Promise<void> {
    const transport = this.#transport;
    if (this.#state !== "open" || !transport) {
      return Promise.reject(new DisconnectedError("Not connected"));
    }

    const write = this.#writeChain.then(() => transport.send(message));
    // The chain only orders writes; each write's own failure reaches its
    // caller through `write`.
    this.#writeChain = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  async #doOpen(): Promise<void> {
    this.#setState("opening");

    let transport: RpcTransport;
    try {
      transport = await this.#factory(this.url);
    } catch (err) {
      this.#setState("closed");
      if (err instanceof ConnectionError) {
        throw err;
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConnectionError(`Failed to connect to ${this.url}: ${reason}`, { cause: err });
    }

    const generation = ++this.#generation;
    this.#transport = transport;
    this.#writeChain = Promise.resolve();
    this.#setState("open");
    this.#logger.debug(`Connected to ${this.url}`);
    this.#receiveLoop = this.#runReceiveLoop(transport, generation);
  }

  async #doClose(): Promise<void> {
    const opening = this.#opening;
    if (opening) {
      // Its failure belongs to whoever called open(); here we only need it settled.
      await Promise.allSettled([opening]);
    }

    const transport = this.#transport;
    if (this.#state !== "open" || !transport) {
      return;
    }

    this.#setState("closing");
    this.#retire();

    const error = new DisconnectedError("Connection closed by client");
    transport.abort(error);
    const abandoned = this.#registry.abandonAll(error);
    if (abandoned > 0) {
      this.#logger.info(`Closed connection to ${this.url}; abandoned ${abandoned} pending call(s)`);
    }

    const loop = this.#receiveLoop;
    this.#receiveLoop = undefined;
    if (loop) {
      await loop;
    }

    this.#setState("closed");
  }

  async #runReceiveLoop(transport: RpcTransport, generation: number): Promise<void> {
    for (;;) {
      let frame: string;
      try {
        frame = await transport.receive();
      } catch (err) {
        if (generation === this.#generation) {
          this.#handleTransportFailure(transport, err);
        }
        return;
      }

      if (generation !== this.#generation) {
        return;
      }
      this.#dispatch(frame);
    }
  }

  #dispatch(frame: string): void {
    let envelope: ResponseEnvelope;
    try {
      envelope = decodeResponse(frame);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.#logger.warn(`Ignoring malformed frame from ${this.url}: ${reason}`);
      return;
    }

    if (isErrorEnvelope(envelope)) {
      const { id, error } = envelope;
      const method = this.#registry.describe(id)?.method;
      this.#registry.fail(id, new RpcError(error.code, error.message, method, id, error.data));
    } else {
      this.#registry.resolve(envelope.id, envelope.result);
    }
  }

  #handleTransportFailure(transport: RpcTransport, reason: unknown): void {
    this.#retire();

    const error =
      reason instanceof DisconnectedError
        ? reason
        : new DisconnectedError(`Connection lost: ${reason instanceof Error ? reason.message : String(reason)}`);

    transport.abort(error);
    this.#receiveLoop = undefined;
    this.#setState("closed");

    const abandoned = this.#registry.abandonAll(error);
    this.#logger.warn(`Connection to ${this.url} lost (${error.message}); abandoned ${abandoned} pending call(s)`);

    for (const callback of [...this.#disconnectCallbacks]) {
      callback(error);
    }
  }

  #retire(): void {
    this.#generation++;
    this.#transport = undefined;
  }

  #setState(state: ConnectionState): void {
    const previous = this.#state;
    if (previous === state) {
      return;
    }
    this.#state = state;
    for (const callback of [...this.#stateCallbacks]) {
      callback(state, previous);
    }
  }
}
