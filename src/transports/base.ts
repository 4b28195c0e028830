// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

/**
 * A bidirectional message channel carrying discrete text frames.
 *
 * The connection manager owns exactly one of these at a time and is its only
 * reader; nothing else may call `receive()`.
 */
export interface RpcTransport {
  /** Writes one frame. Rejects if the transport has failed. */
  send(message: string): Promise<void>;

  /**
   * Waits for the next inbound frame. Rejects once the transport has failed
   * or closed and every frame received before that has been drained.
   */
  receive(): Promise<string>;

  /** Closes the transport. Pending and future `receive()` calls reject with `reason`. */
  abort(reason: unknown): void;
}

/**
 * Opens a new transport to `url`. Resolves once frames can be sent.
 */
export type TransportFactory = (url: string) => Promise<RpcTransport>;

/**
 * Abstract base class for transports that provides the receive queue and the
 * error latch. Once the latch is set the transport cannot be reused; the
 * connection manager opens a new one instead.
 *
 * Subclasses must implement:
 * - `doSend(message: string): Promise<void>` - actually send the message
 * - `doAbort(reason: unknown): void` - perform transport-specific close logic
 *
 * and feed inbound frames through `enqueue()` and failures through `setError()`.
 */
export abstract class BaseTransport implements RpcTransport {
  protected receiveQueue: string[] = [];
  protected receiveResolver?: (msg: string) => void;
  protected receiveRejecter?: (err: unknown) => void;
  protected error?: unknown;

  #aborted = false;

  /**
   * Actually send a message over the transport.
   */
  protected abstract doSend(message: string): Promise<void>;

  /**
   * Perform transport-specific cleanup when aborting.
   */
  protected abstract doAbort(reason: unknown): void;

  /**
   * Send a message over the transport.
   * Throws if the transport is in an error state.
   */
  async send(message: string): Promise<void> {
    if (this.error) {
      throw this.error;
    }
    return this.doSend(message);
  }

  /**
   * Receive the next message from the transport.
   * Returns immediately if a message is queued, otherwise waits for one.
   * Throws if the transport is in an error state (after queue is drained).
   */
  async receive(): Promise<string> {
    const queued = this.receiveQueue.shift();
    if (queued !== undefined) {
      return queued;
    } else if (this.error) {
      throw this.error;
    } else {
      return new Promise<string>((resolve, reject) => {
        this.receiveResolver = resolve;
        this.receiveRejecter = reject;
      });
    }
  }

  /**
   * Abort the transport with the given reason.
   * Latches the error, rejects a waiting `receive()` and performs
   * transport-specific cleanup. Also runs after a transport error so the
   * underlying socket is always released.
   */
  abort(reason: unknown): void {
    if (this.#aborted) {
      return;
    }
    this.#aborted = true;

    if (!this.error) {
      this.error = reason;
    }
    this.#rejectReceiver(reason);

    this.doAbort(reason);
  }

  /**
   * Enqueue a received message.
   * If there's a pending receive(), resolve it immediately.
   * Otherwise, add to the queue.
   */
  protected enqueue(message: string): void {
    if (this.receiveResolver) {
      this.receiveResolver(message);
      this.receiveResolver = undefined;
      this.receiveRejecter = undefined;
    } else {
      this.receiveQueue.push(message);
    }
  }

  /**
   * Set the transport into an error state.
   * If there's a pending receive(), reject it.
   * Future receives will throw this error.
   */
  protected setError(error: unknown): void {
    if (!this.error) {
      this.error = error;
      this.#rejectReceiver(error);
    }
  }

  #rejectReceiver(reason: unknown): void {
    if (this.receiveRejecter) {
      this.receiveRejecter(reason);
      this.receiveResolver = undefined;
      this.receiveRejecter = undefined;
    }
  }
}
