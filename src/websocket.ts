// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import WebSocket from "ws";
import { BaseTransport, type TransportFactory } from "./transports/base.js";
import { ConnectionError, DisconnectedError } from "./errors.js";
import { type Logger, consoleLogger } from "./logger.js";

export interface WebSocketConnectOptions {
  /** Handshake deadline in ms; 0 or absent waits for the OS socket timeout */
  connectTimeoutMs?: number;
  /** Extra headers sent with the upgrade request */
  headers?: Record<string, string>;
  /** Receives a warning for each binary frame dropped */
  logger?: Logger;
}

function rawDataLength(data: WebSocket.RawData): number {
  if (Array.isArray(data)) {
    return data.reduce((total, chunk) => total + chunk.length, 0);
  }
  return data.byteLength;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

/**
 * Transport over an open `ws` WebSocket. Each text frame is one message;
 * binary frames are not part of the protocol and are dropped with a warning.
 */
export class WebSocketTransport extends BaseTransport {
  #webSocket: WebSocket;

  constructor(webSocket: WebSocket, logger: Logger = consoleLogger) {
    super();
    this.#webSocket = webSocket;

    webSocket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (this.error) {
        // Ignore further messages.
        return;
      }
      if (isBinary) {
        logger.warn(`Dropping binary frame of ${rawDataLength(data)} byte(s); only text frames carry messages`);
        return;
      }
      this.enqueue(rawDataToString(data));
    });

    webSocket.on("close", (code: number, reason: Buffer) => {
      const detail = reason.length > 0 ? ` ${reason.toString("utf-8")}` : "";
      this.setError(new DisconnectedError(`Peer closed WebSocket: ${code}${detail}`));
    });

    webSocket.on("error", (err: Error) => {
      this.setError(new DisconnectedError(`WebSocket connection failed: ${err.message}`));
    });
  }

  protected doSend(message: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.#webSocket.send(message, (err?: Error) => {
        if (err) {
          reject(new DisconnectedError(`WebSocket send failed: ${err.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  protected doAbort(_reason: unknown): void {
    if (this.#webSocket.readyState === WebSocket.CONNECTING) {
      this.#webSocket.terminate();
    } else {
      this.#webSocket.close(1000);
    }
  }
}

/**
 * Opens a WebSocket to `url` and resolves with a transport once the
 * handshake completes.
 *
 * @throws ConnectionError if the endpoint is unreachable or refuses the upgrade
 */
export function connectWebSocket(url: string, options: WebSocketConnectOptions = {}): Promise<WebSocketTransport> {
  return new Promise<WebSocketTransport>((resolve, reject) => {
    let webSocket: WebSocket;
    try {
      webSocket = new WebSocket(url, {
        headers: options.headers,
        handshakeTimeout: options.connectTimeoutMs ? options.connectTimeoutMs : undefined,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      reject(new ConnectionError(`Failed to connect to ${url}: ${reason}`, { cause: err }));
      return;
    }

    let settled = false;

    webSocket.once("open", () => {
      settled = true;
      // The transport registers its listeners synchronously here, before any
      // frame can be delivered.
      resolve(new WebSocketTransport(webSocket, options.logger));
    });

    webSocket.on("error", (err: Error) => {
      // After the handshake the transport's own listener takes over.
      if (settled) return;
      settled = true;
      webSocket.terminate();
      reject(new ConnectionError(`Failed to connect to ${url}: ${err.message}`, { cause: err }));
    });
  });
}

/**
 * Transport factory for the connection manager.
 */
export function webSocketTransportFactory(options: WebSocketConnectOptions = {}): TransportFactory {
  return (url) => connectWebSocket(url, options);
}
