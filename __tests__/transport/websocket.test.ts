// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { afterEach, describe, expect, inject, it } from "vitest";
import { WebSocketServer, type AddressInfo } from "ws";
import {
  ArmClient,
  ConnectionError,
  DisconnectedError,
  RpcClient,
  RpcError,
  connectWebSocket,
} from "../../src/index.js";
import { RecordingLogger } from "../test-util.js";

/**
 * WebSocket transport against the fake arm in test-server.ts, over a real socket.
 */

const HOST = inject("testServerHost");
const [, PORT] = HOST.split(":");

let clients: RpcClient[] = [];

function createClient(url: string = `ws://${HOST}/ws`, logger: RecordingLogger = new RecordingLogger()): RpcClient {
  const client = new RpcClient({ url, connectTimeoutMs: 2000, logger });
  clients.push(client);
  return client;
}

// Finds a port nothing listens on by binding one and letting it go.
async function unusedPort(): Promise<number> {
  const server = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  await new Promise<void>((resolve) => server.once("listening", resolve));
  const addr: AddressInfo | string = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return typeof addr === "string" ? Number.NaN : addr.port;
}

afterEach(async () => {
  await Promise.all(clients.map((client) => client.disconnect()));
  clients = [];
});

describe("WebSocket transport", () => {
  it("carries a call and its result", async () => {
    const client = createClient();

    await expect(client.invoke("get_status")).resolves.toEqual({ mode: "drag", status: "idle" });
    await expect(client.invoke("set_speed", { percent: 50 })).resolves.toBeNull();
    expect(client.isConnected()).toBe(true);
    expect(client.pendingCount()).toBe(0);
  });

  it("surfaces an error answer as RpcError", async () => {
    const client = createClient();

    const error = await client.invoke("get_joint_angles").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({ code: -32000, message: "arm not calibrated", method: "get_joint_angles", requestId: 1 });
  });

  it("drives an arm client end to end", async () => {
    const arm = new ArmClient(createClient());

    await expect(arm.getStatus()).resolves.toEqual({ mode: "drag", status: "idle" });
    await expect(arm.setSpeed(25)).resolves.toBeUndefined();
  });

  it("fails with ConnectionError when nothing listens", async () => {
    const port = await unusedPort();
    const client = createClient(`ws://127.0.0.1:${port}/ws`);

    const error = await client.invoke("get_status").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty("message", expect.stringContaining(`Failed to connect to ws://127.0.0.1:${port}/ws`));
    expect(client.getState()).toBe("closed");
  });

  it("fails the pending call when the arm hangs up", async () => {
    const client = createClient();
    await client.connect();

    const error = await client.invoke("hang_up").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(error).toHaveProperty("message", "Peer closed WebSocket: 1011 bye");

    await expect(client.invoke("get_status")).resolves.toEqual({ mode: "drag", status: "idle" });
  });

  it("drops binary frames and waits for the text answer", async () => {
    const logger = new RecordingLogger();
    const client = createClient(undefined, logger);

    await expect(client.invoke("binary_reply")).resolves.toBe("text");
    expect(logger.messages("warn")).toEqual([
      "Dropping binary frame of 42 byte(s); only text frames carry messages",
    ]);
  });

  it("closes cleanly on disconnect", async () => {
    const client = createClient();
    await client.connect();
    expect(client.getState()).toBe("open");

    await client.disconnect();
    expect(client.getState()).toBe("closed");
    expect(client.isConnected()).toBe(false);
  });

  it("connects directly with connectWebSocket", async () => {
    const transport = await connectWebSocket(`ws://127.0.0.1:${PORT}/ws`);
    await transport.send('{"jsonrpc":"2.0","method":"set_speed","params":{"percent":10},"id":7}');

    await expect(transport.receive()).resolves.toBe('{"jsonrpc":"2.0","id":7,"result":null}');
    transport.abort(new Error("done"));
  });
});
