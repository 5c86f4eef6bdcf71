import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { Registry } from "prom-client";
import { FakeBoard, fakeLinkFactory } from "@epg-link/driver-fake";
import { buildServer } from "../src/server";
import { loadBridgeConfig } from "../src/core/config";
import { FakePublisher } from "./helpers";

describe("stream-bridge routes", () => {
  let server: FastifyInstance;
  let board: FakeBoard;
  let publisher: FakePublisher;
  let closed: boolean;

  const status = async (): Promise<{ stream: { state: string; settings: Record<string, unknown> } }> => {
    const res = await server.inject({ method: "GET", url: "/device/status" });
    return res.json();
  };

  beforeEach(async () => {
    closed = false;
    board = new FakeBoard("AA:BB");
    publisher = new FakePublisher();
    server = await buildServer({
      logger: false,
      config: loadBridgeConfig({ DEVICE_ID: "board-1", STREAM_CONFIG_JSON: JSON.stringify({ batchIntervalMs: 5 }) }),
      linkFactory: fakeLinkFactory(board),
      mqttPublisher: publisher,
      registry: new Registry(),
      collectDefaultMetrics: false
    });
  });

  afterEach(async () => {
    if (!closed) await server.close();
  });

  it("reports health", async () => {
    const res = await server.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });

  it("rejects a connect request without an address", async () => {
    const res = await server.inject({ method: "POST", url: "/device/connect", payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "Invalid connect request" });
  });

  it("connects, sends a setting and disconnects", async () => {
    const connect = await server.inject({ method: "POST", url: "/device/connect", payload: { address: "AA:BB" } });
    expect(connect.statusCode).toBe(202);
    expect(connect.json()).toEqual({ accepted: true, address: "AA:BB" });
    await vi.waitFor(async () => expect((await status()).stream.state).toBe("connected"));

    const command = await server.inject({
      method: "POST",
      url: "/device/command",
      payload: { setting: { key: "pga1", value: 3 }, tag: "gain" }
    });
    expect(command.statusCode).toBe(202);
    expect(command.json()).toEqual({ accepted: true, command: "P1:3", tag: "gain" });
    await vi.waitFor(() => expect(board.commands).toEqual(["ON", "START", "P1:3"]));
    await vi.waitFor(() =>
      expect(publisher.onTopic("writes").map((envelope) => envelope.payload)).toEqual([{ ok: true, tag: "gain" }])
    );

    const disconnect = await server.inject({ method: "POST", url: "/device/disconnect" });
    expect(disconnect.statusCode).toBe(202);
    await vi.waitFor(async () => expect((await status()).stream.state).toBe("disconnected"));
    expect(board.disconnectCalls).toBeGreaterThan(0);
  });

  it("sends raw command text", async () => {
    const res = await server.inject({ method: "POST", url: "/device/command", payload: { text: "START", sync: false } });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({ accepted: true, command: "START", tag: "" });
  });

  it("refuses a setting value with no firmware command", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/device/command",
      payload: { setting: { key: "inputResistance", value: "2M" } }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "Unsupported value for inputResistance: 2M" });
  });

  it("applies stream settings", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/device/settings",
      payload: { batchIntervalMs: 20.7, dropPolicy: "newest" }
    });
    expect(res.statusCode).toBe(202);
    expect(res.json()).toEqual({
      accepted: true,
      settings: { batchIntervalMs: 20, dropPolicy: "newest", maxBufferedSeconds: 2, defaultWriteSync: true }
    });
  });

  it("rejects an empty settings request", async () => {
    const res = await server.inject({ method: "POST", url: "/device/settings", payload: {} });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ error: "Invalid settings request" });
  });

  it("exposes prometheus metrics", async () => {
    const res = await server.inject({ method: "GET", url: "/metrics" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^text\/plain/);
    expect(res.body).toContain('epglink_connection_state{device="board-1",state="idle"} 1');
    expect(res.body).toContain("# TYPE epglink_http_requests_total counter");
  });

  it("disconnects the publisher on close", async () => {
    await server.close();
    closed = true;
    expect(publisher.disconnected).toBe(true);
  });
});
