// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { describe, expect, it, vi } from "vitest";
import {
  ConnectionManager,
  DisconnectedError,
  PendingCallRegistry,
  RpcClient,
  encodeResponse,
} from "../../src/index.js";
import { Deferred, FakeArmPeer, NO_REPLY, RecordingLogger } from "../test-util.js";

/**
 * Connection lifecycle: drops, the single reconnect a call gets, and
 * open/close races.
 */

const ENDPOINT = "ws://arm.test/ws";

function createClient() {
  const peer = new FakeArmPeer();
  const logger = new RecordingLogger();
  const client = new RpcClient({ url: ENDPOINT, transportFactory: peer.factory, logger });
  const transitions: string[] = [];
  client.onStateChange((state, previous) => transitions.push(`${previous}->${state}`));
  return { peer, client, logger, transitions };
}

describe("after the link drops", () => {
  it("fails the in-flight call and reconnects for the next one", async () => {
    const { peer, client, logger } = createClient();
    peer.on("ping", () => null);
    peer.on("get_tool_pose", () => NO_REPLY);

    await client.invoke("ping");
    await client.invoke("ping");
    const third = client.invoke("get_tool_pose").catch((err: unknown) => err);
    await vi.waitFor(() => expect(peer.requests).toHaveLength(3));
    expect(peer.requests[2].id).toBe(3);

    peer.current?.drop();
    const error = await third;
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(error).toHaveProperty("message", "Peer closed WebSocket: 1006");
    expect(client.getState()).toBe("closed");

    await expect(client.invoke("ping")).resolves.toBeNull();
    expect(peer.connectAttempts).toBe(2);
    expect(peer.requests[3].id).toBe(4);
    expect(logger.messages("warn")).toEqual([
      "Connection to ws://arm.test/ws lost (Peer closed WebSocket: 1006); abandoned 1 pending call(s)",
    ]);
    expect(logger.messages("info")).toEqual([
      "Connection to ws://arm.test/ws is closed; reconnecting",
      "Connection to ws://arm.test/ws is closed; reconnecting",
    ]);
  });

  it("notifies disconnect listeners, but not for a local close", async () => {
    const { peer, client } = createClient();
    const reasons: string[] = [];
    client.onDisconnect((error) => reasons.push(error.message));

    await client.connect();
    peer.current?.drop("Peer closed WebSocket: 1001 going away");
    await vi.waitFor(() => expect(client.getState()).toBe("closed"));

    await client.connect();
    await client.disconnect();
    expect(reasons).toEqual(["Peer closed WebSocket: 1001 going away"]);
  });

  it("ignores frames from a retired transport", async () => {
    const { peer, client } = createClient();
    peer.on("get_status", () => NO_REPLY);

    await client.connect();
    const stale = peer.current;
    stale?.drop();
    await vi.waitFor(() => expect(client.getState()).toBe("closed"));

    const call = client.invoke("get_status");
    await vi.waitFor(() => expect(peer.requests).toHaveLength(1));
    stale?.deliver(encodeResponse({ id: 1, result: "stale" }));
    peer.current?.deliver(encodeResponse({ id: 1, result: "fresh" }));

    await expect(call).resolves.toBe("fresh");
    expect(peer.transports).toHaveLength(2);
  });

  it("walks through the expected states", async () => {
    const { peer, client, transitions } = createClient();
    peer.on("ping", () => null);

    await client.connect();
    peer.current?.drop();
    await vi.waitFor(() => expect(client.getState()).toBe("closed"));
    await client.invoke("ping");
    await client.disconnect();

    expect(transitions).toEqual([
      "closed->opening",
      "opening->open",
      "open->closed",
      "closed->opening",
      "opening->open",
      "open->closing",
      "closing->closed",
    ]);
  });
});

describe("open and close", () => {
  it("is a no-op to open an open connection or close a closed one", async () => {
    const { peer, client, transitions } = createClient();

    await client.disconnect();
    await client.connect();
    await client.connect();

    expect(peer.connectAttempts).toBe(1);
    expect(transitions).toEqual(["closed->opening", "opening->open"]);
  });

  it("lets close wait for an open in flight", async () => {
    const { peer, client, transitions } = createClient();
    const gate = new Deferred();
    peer.gate = gate;

    const opening = client.connect();
    const closing = client.disconnect();
    expect(client.getState()).toBe("opening");

    gate.resolve();
    await opening;
    await closing;

    expect(client.getState()).toBe("closed");
    expect(peer.current?.aborted).toBe(true);
    expect(transitions).toEqual(["closed->opening", "opening->open", "open->closing", "closing->closed"]);
  });

  it("reopens after a close that was in flight", async () => {
    const { peer, client } = createClient();
    await client.connect();

    const closing = client.disconnect();
    const reopening = client.connect();
    await Promise.all([closing, reopening]);

    expect(client.getState()).toBe("open");
    expect(peer.connectAttempts).toBe(2);
    expect(peer.transports[0].aborted).toBe(true);
  });

  it("refuses to send without a connection", async () => {
    const peer = new FakeArmPeer();
    const logger = new RecordingLogger();
    const manager = new ConnectionManager({
      url: ENDPOINT,
      transportFactory: peer.factory,
      registry: new PendingCallRegistry({ logger }),
      logger,
    });

    await expect(manager.send("{}")).rejects.toThrow(DisconnectedError);
    await expect(manager.send("{}")).rejects.toThrow("Not connected");

    await manager.ensureOpen();
    await manager.ensureOpen();
    expect(peer.connectAttempts).toBe(1);
    expect(logger.messages("info")).toEqual(["Connection to ws://arm.test/ws is closed; reconnecting"]);
    await manager.close();
  });
});
