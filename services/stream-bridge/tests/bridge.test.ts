import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Registry } from "prom-client";
import { FakeBoard, fakeLinkFactory } from "@epg-link/driver-fake";
import { StreamHandler } from "@epg-link/driver-ble-line";
import { StreamMetrics } from "@epg-link/metrics";
import { ERROR_HISTORY, MANAGEMENT_HISTORY, StreamBridge } from "../src/core/bridge";
import { FakePublisher, createTestLogger } from "./helpers";

const NOW = new Date("2026-03-01T12:00:00.000Z");

interface Rig {
  bridge: StreamBridge;
  handler: StreamHandler;
  board: FakeBoard;
  publisher: FakePublisher;
  registry: Registry;
  logger: ReturnType<typeof createTestLogger>;
}

const bridges: StreamBridge[] = [];

function createRig(): Rig {
  const board = new FakeBoard("AA:BB");
  const logger = createTestLogger();
  const handler = new StreamHandler({ linkFactory: fakeLinkFactory(board), logger });
  const publisher = new FakePublisher();
  const registry = new Registry();
  const bridge = new StreamBridge({
    handler,
    mqttPublisher: publisher,
    deviceId: "board-1",
    topicPrefix: "epg",
    logger,
    metrics: new StreamMetrics({ registry }),
    clock: () => NOW
  });
  bridge.start();
  bridges.push(bridge);
  return { bridge, handler, board, publisher, registry, logger };
}

const settle = (ms = 0) => vi.advanceTimersByTimeAsync(ms);

describe("StreamBridge", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(async () => {
    await Promise.all(bridges.splice(0).map((bridge) => bridge.close()));
    vi.useRealTimers();
  });

  it("publishes state changes as retained envelopes", async () => {
    const { handler, publisher } = createRig();
    handler.connect("AA:BB");
    await settle();

    expect(publisher.messages.map((message) => [message.topic, message.retain])).toEqual([
      ["epg/board-1/state", true],
      ["epg/board-1/state", true]
    ]);
    expect(publisher.onTopic("state")).toEqual([
      {
        ts: "2026-03-01T12:00:00.000Z",
        origin: { deviceId: "board-1", address: "AA:BB" },
        topic: "state",
        payload: { state: "connecting" }
      },
      {
        ts: "2026-03-01T12:00:00.000Z",
        origin: { deviceId: "board-1", address: "AA:BB" },
        topic: "state",
        payload: { state: "connected" }
      }
    ]);
  });

  it("relays sample batches and counts them", async () => {
    const { handler, board, publisher, registry } = createRig();
    handler.connect("AA:BB");
    await settle();

    board.emit("12,34\r\n13,-35\r\n");
    await settle(10);

    const samples = publisher.onTopic("samples");
    expect(samples).toHaveLength(1);
    expect(samples[0].payload).toEqual({ timestamps: [12, 13], values: [34, -35] });
    const output = await registry.metrics();
    expect(output).toContain('epglink_samples_total{device="board-1"} 2');
    expect(output).toContain('epglink_connection_state{device="board-1",state="connected"} 1');
  });

  it("keeps the most recent management lines newest first", async () => {
    const { bridge, handler, board, publisher } = createRig();
    handler.connect("AA:BB");
    await settle();

    const lines = Array.from({ length: MANAGEMENT_HISTORY + 5 }, (_, idx) => `status ${idx}`);
    board.emit(lines.map((line) => `${line}\r\n`).join(""));
    await settle(10);

    const management = bridge.status().management;
    expect(management).toHaveLength(MANAGEMENT_HISTORY);
    expect(management[0]).toEqual({ at: "2026-03-01T12:00:00.000Z", message: "status 54", meta: undefined });
    expect(management[MANAGEMENT_HISTORY - 1].message).toBe("status 5");
    expect(publisher.onTopic("management")[0].payload).toEqual({ lines });
  });

  it("records write failures as errors and write outcomes", async () => {
    const { bridge, handler, board, publisher, registry } = createRig();
    handler.connect("AA:BB");
    await settle();

    board.setFailWrites(true);
    handler.sendCommand("P1:3", "gain", true);
    await settle();

    const [recorded] = bridge.status().errors;
    expect(recorded.message).toMatch(/^BLE write failed: .*GATT write rejected$/);
    expect(recorded.meta).toEqual({ code: 6 });
    expect(publisher.onTopic("writes").map((envelope) => envelope.payload)).toEqual([{ ok: false, tag: "gain" }]);
    expect(publisher.onTopic("errors")[0].payload).toEqual({ message: recorded.message, code: 6 });
    expect(await registry.metrics()).toContain('epglink_writes_total{device="board-1",ok="false"} 1');
  });

  it("bounds the error history", async () => {
    const { bridge, handler, board } = createRig();
    handler.connect("AA:BB");
    await settle();

    board.setFailWrites(true);
    for (let idx = 0; idx < ERROR_HISTORY + 3; idx += 1) {
      handler.sendCommand(`D0:${idx}`, `t${idx}`, false);
    }
    await settle();

    expect(bridge.status().errors).toHaveLength(ERROR_HISTORY);
  });

  it("counts malformed data lines from the handler counters", async () => {
    const { handler, board, registry } = createRig();
    handler.connect("AA:BB");
    await settle();

    board.emit("1,+-2\r\n5,6\r\n");
    await settle(10);

    expect(await registry.metrics()).toContain('epglink_malformed_lines_total{device="board-1"} 1');
  });

  it("keeps streaming when the broker rejects messages", async () => {
    const { bridge, handler, publisher, logger } = createRig();
    publisher.failWith = new Error("broker down");
    handler.connect("AA:BB");
    await settle();

    expect(handler.state).toBe("connected");
    expect(bridge.stats).toEqual({ messagesPublished: 0, publishFailures: 2, lastError: "broker down" });
    expect(logger.warn).toHaveBeenCalledWith(
      { err: publisher.failWith, topic: "state" },
      "stream-bridge: publish failed"
    );
  });

  it("publishes the final states on close and stops accepting work", async () => {
    const { bridge, handler, publisher } = createRig();
    handler.connect("AA:BB");
    await settle();

    const closing = bridge.close();
    await settle();
    await closing;

    expect(bridge.accepting).toBe(false);
    expect(publisher.onTopic("state").map((envelope) => envelope.payload)).toEqual([
      { state: "connecting" },
      { state: "connected" },
      { state: "disconnecting" },
      { state: "disconnected" }
    ]);
    expect(bridge.stats.messagesPublished).toBe(4);
  });
});
