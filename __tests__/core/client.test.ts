// Copyright (c) 2025 Cloudflare, Inc.
// Licensed under the MIT license found in the LICENSE.txt file or at:
//     https://opensource.org/license/mit

import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  ConnectionError,
  DisconnectedError,
  RpcClient,
  RpcError,
  encodeResponse,
  type RpcClientOptions,
} from "../../src/index.js";
import { Deferred, FakeArmPeer, NO_REPLY, PeerError, RecordingLogger } from "../test-util.js";

const ENDPOINT = "ws://arm.test/ws";

function createClient(options: Partial<RpcClientOptions> = {}) {
  const peer = new FakeArmPeer();
  const logger = new RecordingLogger();
  const client = new RpcClient({ url: ENDPOINT, transportFactory: peer.factory, logger, ...options });
  return { peer, client, logger };
}

describe("RpcClient.invoke", () => {
  it("sends the request and resolves with the result", async () => {
    const { peer, client } = createClient();
    peer.on("set_speed", () => null);

    await expect(client.invoke("set_speed", { percent: 50 })).resolves.toBeNull();
    expect(peer.current?.sent).toEqual(['{"jsonrpc":"2.0","method":"set_speed","params":{"percent":50},"id":1}']);
    expect(client.pendingCount()).toBe(0);
  });

  it("turns an error response into an RpcError", async () => {
    const { peer, client } = createClient();
    peer.on("get_status", () => ({ mode: "drag", status: "idle" }));
    peer.on("get_joint_angles", () => {
      throw new PeerError(-32000, "arm not calibrated");
    });
    for (let i = 0; i < 6; i++) {
      await client.invoke("get_status");
    }

    const error = await client.invoke("get_joint_angles").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({
      code: -32000,
      message: "arm not calibrated",
      method: "get_joint_angles",
      requestId: 7,
    });
  });

  it("matches responses by id regardless of their order", async () => {
    const { peer, client } = createClient();
    peer.on("echo", () => NO_REPLY);

    const calls = [1, 2, 3, 4, 5].map((n) => client.invoke("echo", { n }));
    await vi.waitFor(() => expect(peer.requests).toHaveLength(5));

    for (const request of [...peer.requests].reverse()) {
      peer.current?.deliver(encodeResponse({ id: request.id, result: request.params.n }));
    }
    await expect(Promise.all(calls)).resolves.toEqual([1, 2, 3, 4, 5]);
  });

  it("hands out increasing ids", async () => {
    const { peer, client } = createClient();
    peer.on("get_status", (_params, request) => request.id);

    expect(await client.invoke("get_status")).toBe(1);
    expect(await client.invoke("get_status")).toBe(2);
    await client.disconnect();
    expect(await client.invoke("get_status")).toBe(3);
  });

  it("ignores a response for an unknown id", async () => {
    const { peer, client, logger } = createClient();
    peer.on("get_tool_pose", () => NO_REPLY);

    const call = client.invoke("get_tool_pose");
    await vi.waitFor(() => expect(peer.requests).toHaveLength(1));
    peer.current?.deliver(encodeResponse({ id: 42, result: "stray" }));
    await vi.waitFor(() =>
      expect(logger.messages("warn")).toEqual(["Dropping result for request 42: no call with that id is pending"])
    );
    expect(client.pendingCount()).toBe(1);

    peer.current?.deliver(encodeResponse({ id: 1, result: "pose" }));
    await expect(call).resolves.toBe("pose");
  });

  it("skips a malformed frame and keeps going", async () => {
    const { peer, client, logger } = createClient();
    peer.on("verify_scene", () => NO_REPLY);

    const call = client.invoke("verify_scene", { question: "Is the cube red?" });
    await vi.waitFor(() => expect(peer.requests).toHaveLength(1));
    peer.current?.deliver("garbage");
    peer.current?.deliver('{"id":1,"result":true}');

    await expect(call).resolves.toBe(true);
    const [warning] = logger.messages("warn");
    expect(warning).toMatch(/^Ignoring malformed frame from ws:\/\/arm\.test\/ws: Invalid response: not valid JSON \(/);
  });

  it("fails every pending call on disconnect", async () => {
    const { peer, client } = createClient();
    peer.on("record_episode", () => NO_REPLY);

    const calls = [1, 2, 3].map(() => client.invoke("record_episode").catch((err: unknown) => err));
    await vi.waitFor(() => expect(peer.requests).toHaveLength(3));
    await client.disconnect();

    for (const outcome of await Promise.all(calls)) {
      expect(outcome).toBeInstanceOf(DisconnectedError);
      expect(outcome).toHaveProperty("message", "Connection closed by client");
    }
    expect(client.pendingCount()).toBe(0);
    expect(client.getState()).toBe("closed");
    expect(peer.current?.aborted).toBe(true);
  });

  it("opens the connection once for concurrent first calls", async () => {
    const { peer, client } = createClient();
    peer.on("get_status", () => "ok");

    await Promise.all([1, 2, 3, 4].map(() => client.invoke("get_status")));
    expect(peer.connectAttempts).toBe(1);
    expect(client.isConnected()).toBe(true);
  });

  it("fails with ConnectionError when the endpoint is unreachable", async () => {
    const { peer, client } = createClient();
    peer.on("get_status", () => "ok");
    peer.refuseWith = "ECONNREFUSED";

    const error = await client.invoke("get_status").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty("message", "Failed to connect to ws://arm.test/ws: ECONNREFUSED");
    expect(client.getState()).toBe("closed");
    expect(client.pendingCount()).toBe(0);

    peer.refuseWith = undefined;
    await expect(client.invoke("get_status")).resolves.toBe("ok");
    expect(peer.connectAttempts).toBe(2);
  });
});

describe("cancellation", () => {
  it("rejects without sending when the signal is already aborted", async () => {
    const { peer, client } = createClient();
    const controller = new AbortController();
    controller.abort();

    const error = await client.invoke("open_tool", {}, { signal: controller.signal }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toHaveProperty("message", "Call to open_tool cancelled before it was sent");
    expect(peer.connectAttempts).toBe(0);
  });

  it("frees the id of an aborted call and drops its late response", async () => {
    const { peer, client, logger } = createClient();
    peer.on("train", () => NO_REPLY);
    const controller = new AbortController();

    const call = client.invoke("train", { task_name: "pick-cube" }, { signal: controller.signal });
    await vi.waitFor(() => expect(peer.requests).toHaveLength(1));
    controller.abort();

    const error = await call.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ message: "Call to train (id 1) cancelled", method: "train", requestId: 1 });
    expect(client.pendingCount()).toBe(0);

    peer.current?.deliver(encodeResponse({ id: 1, result: null }));
    await vi.waitFor(() =>
      expect(logger.messages("warn")).toEqual(["Dropping result for request 1: no call with that id is pending"])
    );
  });

  it("cancels a call that is still waiting for the connection", async () => {
    const { peer, client } = createClient();
    const gate = new Deferred();
    peer.gate = gate;
    peer.on("get_status", () => ({ mode: "drag", status: "idle" }));
    const controller = new AbortController();

    const call = client.invoke("get_status", {}, { signal: controller.signal }).catch((err: unknown) => err);
    expect(client.getState()).toBe("opening");
    controller.abort();

    const error = await call;
    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toHaveProperty("message", "Call to get_status cancelled before it was sent");

    gate.resolve();
    await client.connect();
    expect(peer.requests).toHaveLength(0);
    expect(client.pendingCount()).toBe(0);
  });
});
