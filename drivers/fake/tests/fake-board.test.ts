import { afterEach, describe, expect, it, vi } from "vitest";
import { FakeBoard, FakeBoardPool } from "../src/fake-board";

const decoder = new TextDecoder();

function collect(board: FakeBoard): { text: () => string; chunks: Uint8Array[] } {
  const chunks: Uint8Array[] = [];
  return {
    chunks,
    text: () => chunks.map((chunk) => decoder.decode(chunk)).join("")
  };
}

function command(text: string): Uint8Array {
  return new TextEncoder().encode(`${text}\0`);
}

describe("FakeBoard", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("produces the same samples for the same seed", async () => {
    const a = new FakeBoard("AA", { seed: 42 });
    const b = new FakeBoard("AA", { seed: 42 });
    for (const board of [a, b]) {
      await board.connect();
      await board.startNotify("notify", () => undefined);
    }
    expect(a.emitSamples(5)).toEqual(b.emitSamples(5));
  });

  it("steps timestamps by the sample period", async () => {
    const board = new FakeBoard("AA", { seed: 1, sampleRateHz: 500, startTimestampMs: 100 });
    await board.connect();
    await board.startNotify("notify", () => undefined);
    const lines = board.emitSamples(3);
    expect(lines.map((line) => line.split(",")[0])).toEqual(["100", "102", "104"]);
  });

  it("splits notifications into small chunks", async () => {
    const board = new FakeBoard("AA", { maxChunkBytes: 4 });
    const sink = collect(board);
    await board.connect();
    await board.startNotify("notify", (chunk) => sink.chunks.push(chunk));
    board.emit("0123456789");
    expect(sink.chunks.map((chunk) => chunk.length)).toEqual([4, 4, 2]);
    expect(sink.text()).toBe("0123456789");
  });

  it("acknowledges commands with status lines", async () => {
    const board = new FakeBoard("AA");
    const sink = collect(board);
    await board.connect();
    await board.startNotify("notify", (chunk) => sink.chunks.push(chunk));
    await board.write("write", command("P1:3"), true);
    await board.write("write", command("DDSA:1.5"), true);
    await board.write("write", command("BOGUS"), true);
    expect(board.commands).toEqual(["P1:3", "DDSA:1.5", "BOGUS"]);
    expect(sink.text()).toBe(
      "Setting PGA 1 to value 3\r\nSetting DDS amplification to 1.50x\r\nInvalid command!\r\n"
    );
  });

  it("streams after START when auto streaming", async () => {
    vi.useFakeTimers();
    const board = new FakeBoard("AA", { autoStream: true, sampleRateHz: 1000, tickMs: 10, seed: 3 });
    const sink = collect(board);
    await board.connect();
    await board.startNotify("notify", (chunk) => sink.chunks.push(chunk));
    await board.write("write", command("START"), false);
    expect(board.isStreaming).toBe(true);

    await vi.advanceTimersByTimeAsync(20);
    const dataLines = sink
      .text()
      .split("\r\n")
      .filter((line) => /^\d+,-?\d+$/.test(line));
    expect(dataLines).toHaveLength(20);

    board.dropLink();
    expect(board.isStreaming).toBe(false);
    expect(board.isConnected).toBe(false);
  });

  it("follows the queued connect outcomes", async () => {
    const board = new FakeBoard("AA", { connectOutcomes: ["fail"] });
    await expect(board.connect()).rejects.toThrow("peripheral not found");
    await expect(board.connect()).resolves.toBeUndefined();
    expect(board.connectCalls).toBe(2);
  });

  it("hangs until aborted", async () => {
    const board = new FakeBoard("AA", { connectOutcomes: ["hang"] });
    const controller = new AbortController();
    const pending = board.connect(controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow("aborted");
    expect(board.isConnected).toBe(false);
  });

  it("rejects writes when told to", async () => {
    const board = new FakeBoard("AA", { failWrites: true });
    await board.connect();
    await expect(board.write("write", command("ON"), true)).rejects.toThrow("GATT write rejected");
  });
});

describe("FakeBoardPool", () => {
  it("reuses the board for an address", () => {
    const pool = new FakeBoardPool({ seed: 7 });
    const first = pool.factory("AA");
    expect(pool.factory("AA")).toBe(first);
    expect(pool.factory("BB")).not.toBe(first);
    expect(pool.list()).toHaveLength(2);
  });
});
