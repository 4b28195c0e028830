// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

// A small fake arm that the WebSocket tests connect to over a real socket.
//
// This is used as a vitest `globalSetup`, so it runs once, under Node, before any test file.

import { WebSocketServer, type AddressInfo, type RawData } from "ws";
import type { TestProject } from "vitest/node";
import { decodeRequest, encodeResponse, type RequestEnvelope, type ResponseEnvelope } from "../src/index.js";

declare module "vitest" {
  export interface ProvidedContext {
    testServerHost: string;
  }
}

let wsServer: WebSocketServer | undefined;

function answer(request: RequestEnvelope): ResponseEnvelope {
  switch (request.method) {
    case "get_status":
      return { id: request.id, result: { mode: "drag", status: "idle" } };
    case "set_speed":
      return { id: request.id, result: null };
    case "get_joint_angles":
      return { id: request.id, error: { code: -32000, message: "arm not calibrated" } };
    default:
      return { id: request.id, error: { code: -32601, message: `Method not found: ${request.method}` } };
  }
}

export async function setup(project: TestProject) {
  // Bind to 127.0.0.1 explicitly; the default binding formats as '[::]:PORT'.
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  wsServer = server;

  server.on("connection", (ws) => {
    ws.on("message", (data: RawData) => {
      const request = decodeRequest(data.toString());
      if (request.method === "hang_up") {
        ws.close(1011, "bye");
        return;
      }
      if (request.method === "binary_reply") {
        // The same id twice: once as a binary frame, then as text.
        ws.send(Buffer.from(encodeResponse({ id: request.id, result: "binary" })), { binary: true });
        ws.send(encodeResponse({ id: request.id, result: "text" }));
        return;
      }
      ws.send(encodeResponse(answer(request)));
    });
  });

  await new Promise<void>((resolve) => server.once("listening", resolve));
  const addr: AddressInfo | string = server.address();
  const port = typeof addr === "string" ? addr : addr.port;

  project.provide("testServerHost", `127.0.0.1:${port}`);
}

export async function teardown() {
  if (wsServer) {
    // close() waits for every client to disconnect; a test that leaked one would hang shutdown.
    wsServer.close();
    wsServer = undefined;
  }
}
