// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import {
  BaseTransport,
  ConnectionError,
  DisconnectedError,
  decodeRequest,
  encodeResponse,
  type Logger,
  type RequestEnvelope,
  type RpcParams,
  type TransportFactory,
} from "../src/index.js";

/**
 * Thrown by a handler to make the peer answer with an error object.
 */
export class PeerError extends Error {
  constructor(public readonly code: number, message: string, public readonly data?: unknown) {
    super(message);
  }
}

/** Returned by a handler to leave the request unanswered. */
export const NO_REPLY = Symbol("NO_REPLY");

export type PeerHandler = (params: RpcParams, request: RequestEnvelope) => unknown;

/**
 * A promise that the test settles by hand.
 */
export class Deferred<T = void> {
  promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

/**
 * In-process stand-in for the arm's server. Hands out `FakeArmTransport`s
 * through `factory` and answers each request with the handler registered for
 * its method.
 */
export class FakeArmPeer {
  requests: RequestEnvelope[] = [];
  transports: FakeArmTransport[] = [];
  connectAttempts = 0;
  /** When set, the next connection attempts fail with this message */
  refuseWith?: string;
  /** When set, connection attempts wait for it before completing */
  gate?: Deferred;

  #handlers = new Map<string, PeerHandler>();

  on(method: string, handler: PeerHandler): this {
    this.#handlers.set(method, handler);
    return this;
  }

  get current(): FakeArmTransport | undefined {
    return this.transports[this.transports.length - 1];
  }

  methods(): string[] {
    return this.requests.map((request) => request.method);
  }

  factory: TransportFactory = async (url) => {
    this.connectAttempts++;
    if (this.gate) {
      await this.gate.promise;
    }
    if (this.refuseWith !== undefined) {
      throw new ConnectionError(`Failed to connect to ${url}: ${this.refuseWith}`);
    }
    const transport = new FakeArmTransport(this);
    this.transports.push(transport);
    return transport;
  };

  async handle(frame: string): Promise<string | undefined> {
    const request = decodeRequest(frame);
    this.requests.push(request);

    const handler = this.#handlers.get(request.method);
    if (!handler) {
      return encodeResponse({
        id: request.id,
        error: { code: -32601, message: `Method not found: ${request.method}` },
      });
    }
    try {
      const result = await handler(request.params, request);
      if (result === NO_REPLY) {
        return undefined;
      }
      return encodeResponse({ id: request.id, result });
    } catch (err) {
      if (err instanceof PeerError) {
        const error = err.data === undefined
          ? { code: err.code, message: err.message }
          : { code: err.code, message: err.message, data: err.data };
        return encodeResponse({ id: request.id, error });
      }
      throw err;
    }
  }
}

/**
 * Client side of a link to a `FakeArmPeer`.
 */
export class FakeArmTransport extends BaseTransport {
  sent: string[] = [];
  aborted = false;
  abortReason?: unknown;

  constructor(private readonly peer: FakeArmPeer) {
    super();
  }

  protected async doSend(message: string): Promise<void> {
    this.sent.push(message);
    void this.peer.handle(message).then((reply) => {
      if (reply !== undefined && !this.error) {
        this.enqueue(reply);
      }
    });
  }

  protected doAbort(reason: unknown): void {
    this.aborted = true;
    this.abortReason = reason;
  }

  /** Delivers a raw frame as if the peer had sent it. */
  deliver(frame: string): void {
    this.enqueue(frame);
  }

  /** Simulates the link dropping. */
  drop(message: string = "Peer closed WebSocket: 1006"): void {
    this.setError(new DisconnectedError(message));
  }
}

/**
 * Logger that records every message.
 */
export class RecordingLogger implements Logger {
  entries: Array<{ level: "debug" | "info" | "warn" | "error"; message: string }> = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }
  info(message: string): void {
    this.entries.push({ level: "info", message });
  }
  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }
  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  messages(level: "debug" | "info" | "warn" | "error"): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

/**
 * Lets queued microtasks and promise callbacks run.
 */
export async function flush(rounds: number = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
