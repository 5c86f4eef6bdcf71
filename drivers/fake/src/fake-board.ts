import type { BleLink, BleLinkFactory, NotificationListener } from "@epg-link/driver-core";

export type StepOutcome = "ok" | "fail" | "hang";

export interface FakeBoardOptions {
  seed?: number;
  sampleRateHz?: number;
  tickMs?: number;
  /** Start emitting samples once START arrives. */
  autoStream?: boolean;
  maxChunkBytes?: number;
  startTimestampMs?: number;
  connectOutcomes?: StepOutcome[];
  subscribeOutcome?: StepOutcome;
  failWrites?: boolean;
  /** Delay before a host-side disconnect completes. */
  disconnectDelayMs?: number;
}

type Rng = () => number;

function createRng(seed: number | undefined): Rng {
  let state = (seed ?? Date.now()) >>> 0;
  if (state === 0) state = 0x1abcdef;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0xffffffff;
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("aborted");
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const REPLIES: Array<[RegExp, (match: RegExpExecArray) => string]> = [
  [/^ON$/, () => "Power up complete!"],
  [/^OFF$/, () => "Powering down the system..."],
  [/^START$/, () => ">> START command received, starting ADC thread"],
  [/^P([12]):(\d+)$/, (m) => `Setting PGA ${m[1]} to value ${m[2]}`],
  [/^D([0-3]):(\d+)$/, (m) => `Setting Digipot ${m[1]} to value ${m[2]}`],
  [/^M:([0-7])$/, (m) => `Setting Mux to setting ${m[1]}`],
  [/^DDSA:(-?[\d.]+)$/, (m) => `Setting DDS amplification to ${Number(m[1]).toFixed(2)}x`],
  [/^DDSO:(-?[\d.]+)$/, (m) => `Setting DDS offset to ${Number(m[1]).toFixed(2)}V`],
  [/^SCA:(-?[\d.]+)$/, (m) => `Setting signal chain amplification to ${Number(m[1]).toFixed(2)}x`],
  [/^SCO:(-?[\d.]+)$/, (m) => `Setting signal chain offset to ${Number(m[1]).toFixed(2)}V`],
  [/^SDDS:\d+$/, () => "Starting DDS output"],
  [/^DDSOFF$/, () => "Stopping DDS output"]
];

/**
 * In-process stand-in for an EPG board. Replies to commands with the status
 * lines the firmware prints and, when streaming, sends `ts,mv` lines split
 * into notification-sized chunks.
 */
export class FakeBoard implements BleLink {
  readonly commands: string[] = [];
  connectCalls = 0;
  disconnectCalls = 0;

  private connected = false;
  private listener: NotificationListener | null = null;
  private streamTimer?: ReturnType<typeof setInterval>;
  private clockMs: number;
  private readonly rng: Rng;
  private readonly connectOutcomes: StepOutcome[];
  private subscribeOutcome: StepOutcome;
  private failWrites: boolean;
  private readonly sampleRateHz: number;
  private readonly tickMs: number;
  private readonly autoStream: boolean;
  private readonly maxChunkBytes: number;
  private readonly disconnectDelayMs: number;
  private hanging = 0;

  constructor(readonly address: string, options: FakeBoardOptions = {}) {
    this.rng = createRng(options.seed);
    this.sampleRateHz = options.sampleRateHz ?? 1000;
    this.tickMs = options.tickMs ?? 10;
    this.autoStream = options.autoStream ?? false;
    this.maxChunkBytes = options.maxChunkBytes ?? 20;
    this.clockMs = options.startTimestampMs ?? 0;
    this.connectOutcomes = [...(options.connectOutcomes ?? [])];
    this.subscribeOutcome = options.subscribeOutcome ?? "ok";
    this.failWrites = options.failWrites ?? false;
    this.disconnectDelayMs = options.disconnectDelayMs ?? 0;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get isStreaming(): boolean {
    return this.streamTimer !== undefined;
  }

  /** Hung steps still waiting on their abort signal. */
  get pendingSteps(): number {
    return this.hanging;
  }

  get isSubscribed(): boolean {
    return this.listener !== null;
  }

  /** Outcomes for the next connect calls; once used up every connect succeeds. */
  queueConnectOutcomes(...outcomes: StepOutcome[]): void {
    this.connectOutcomes.push(...outcomes);
  }

  setSubscribeOutcome(outcome: StepOutcome): void {
    this.subscribeOutcome = outcome;
  }

  setFailWrites(fail: boolean): void {
    this.failWrites = fail;
  }

  async connect(signal?: AbortSignal): Promise<void> {
    this.connectCalls += 1;
    const outcome = this.connectOutcomes.shift() ?? "ok";
    await this.step(outcome, "peripheral not found", signal);
    this.connected = true;
  }

  async startNotify(_characteristicId: string, onData: NotificationListener): Promise<void> {
    if (!this.connected) throw new Error("not connected");
    await this.step(this.subscribeOutcome, "notify characteristic unavailable");
    this.listener = onData;
  }

  async stopNotify(_characteristicId: string): Promise<void> {
    this.listener = null;
    this.stopStreaming();
  }

  async write(_characteristicId: string, payload: Uint8Array, _withResponse: boolean): Promise<void> {
    if (!this.connected) throw new Error("not connected");
    if (this.failWrites) throw new Error("GATT write rejected");
    const end = payload[payload.length - 1] === 0 ? payload.length - 1 : payload.length;
    const text = decoder.decode(payload.subarray(0, end));
    this.commands.push(text);
    this.reply(text);
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls += 1;
    if (this.disconnectDelayMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.disconnectDelayMs));
    }
    this.connected = false;
    this.listener = null;
    this.stopStreaming();
  }

  /** Sends raw text to the subscriber, chunked like radio notifications. */
  emit(text: string): void {
    const listener = this.listener;
    if (!listener) return;
    const bytes = encoder.encode(text);
    for (let offset = 0; offset < bytes.length; offset += this.maxChunkBytes) {
      listener(bytes.slice(offset, offset + this.maxChunkBytes));
    }
  }

  /** Sends `count` samples immediately and returns the lines sent. */
  emitSamples(count: number): string[] {
    const lines: string[] = [];
    const stepMs = Math.max(1, Math.round(1000 / this.sampleRateHz));
    for (let i = 0; i < count; i += 1) {
      const phase = (2 * Math.PI * 5 * this.clockMs) / 1000;
      const noise = (this.rng() - 0.5) * 40;
      const millivolts = Math.round(clamp(500 * Math.sin(phase) + noise, -2500, 2500));
      lines.push(`${this.clockMs},${millivolts}`);
      this.clockMs += stepMs;
    }
    this.emit(lines.map((line) => `${line}\r\n`).join(""));
    return lines;
  }

  /** Simulates the radio going away without a disconnect from the host. */
  dropLink(): void {
    this.connected = false;
    this.listener = null;
    this.stopStreaming();
  }

  private reply(command: string): void {
    for (const [pattern, render] of REPLIES) {
      const match = pattern.exec(command);
      if (match) {
        this.emit(`${render(match)}\r\n`);
        if (command === "START" && this.autoStream) this.startStreaming();
        if (command === "OFF") this.stopStreaming();
        return;
      }
    }
    this.emit("Invalid command!\r\n");
  }

  private startStreaming(): void {
    if (this.streamTimer) return;
    const perTick = Math.max(1, Math.round((this.sampleRateHz * this.tickMs) / 1000));
    this.streamTimer = setInterval(() => {
      this.emitSamples(perTick);
    }, this.tickMs);
  }

  private stopStreaming(): void {
    if (this.streamTimer) {
      clearInterval(this.streamTimer);
      this.streamTimer = undefined;
    }
  }

  private step(outcome: StepOutcome, failure: string, signal?: AbortSignal): Promise<void> {
    if (outcome === "ok") return Promise.resolve();
    if (outcome === "fail") return Promise.reject(new Error(failure));
    if (signal?.aborted) return Promise.reject(abortReason(signal));
    this.hanging += 1;
    return new Promise<void>((_resolve, reject) => {
      signal?.addEventListener(
        "abort",
        () => {
          this.hanging -= 1;
          reject(abortReason(signal));
        },
        { once: true }
      );
    });
  }
}

/** Hands out one board per address, created on first use. */
export class FakeBoardPool {
  private readonly boards = new Map<string, FakeBoard>();

  constructor(private readonly options: FakeBoardOptions = {}) {}

  readonly factory: BleLinkFactory = (address: string) => this.get(address);

  get(address: string): FakeBoard {
    let board = this.boards.get(address);
    if (!board) {
      board = new FakeBoard(address, this.options);
      this.boards.set(address, board);
    }
    return board;
  }

  list(): FakeBoard[] {
    return Array.from(this.boards.values());
  }
}

export function fakeLinkFactory(board: FakeBoard): BleLinkFactory {
  return () => board;
}
