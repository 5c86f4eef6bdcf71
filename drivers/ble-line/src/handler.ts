import type { ConnectionState } from "@epg-link/schemas";
import type { BleLinkFactory, DriverLogger } from "@epg-link/driver-core";
import { ReconnectPolicy } from "./backoff";
import { dropOldest, resolveBackpressurePolicy, type BackpressurePolicy } from "./backpressure";
import { encodeCommand } from "./commands";
import {
  MIN_BATCH_INTERVAL_MS,
  MIN_BUFFERED_SECONDS,
  StreamHandlerConfigSchema,
  type StreamHandlerConfig,
  type StreamHandlerConfigInput
} from "./config";
import { CancelledError, ConfigurationError, StreamErrorCode, codeForFailure, errorMessage } from "./errors";
import { StreamEventHub, type StreamListener } from "./events";
import { createDriverLogger } from "./logger";
import { emptyCounters, type StreamCounters, type StreamStatus } from "./metrics";
import { FrameParser } from "./parser";
import { DeviceSession } from "./session";
import { WorkerContext, sleep, type Task } from "./worker";

export interface StreamHandlerOptions {
  linkFactory: BleLinkFactory;
  config?: StreamHandlerConfigInput;
  logger?: DriverLogger;
}

interface Target {
  address: string;
  notifyCharacteristicId: string;
  writeCharacteristicId: string;
}

/** Snapshot taken when a connect or reconnect sequence starts. */
interface Generation {
  address: string;
  epoch: number;
}

interface TerminalReason {
  message: string;
  code: StreamErrorCode;
}

/**
 * Owns the connection state machine for one board. Public methods only queue
 * work and return; results arrive as events through `subscribe`.
 *
 * Control work (connect, disconnect, settings) runs on one serial lane and
 * command writes on another, so a slow acknowledged write never holds up a
 * disconnect. Connect attempts, reconnect loops, batching, throughput and the
 * link watchdog run as cancellable tasks.
 */
export class StreamHandler {
  private readonly config: StreamHandlerConfig;
  private readonly logger: DriverLogger;
  private readonly hub: StreamEventHub;
  private readonly control: WorkerContext;
  private readonly commands: WorkerContext;
  private readonly parser: FrameParser;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly linkFactory: BleLinkFactory;

  private current: ConnectionState = "idle";
  private target: Target | null = null;
  private sticky = false;
  private epoch = 0;
  private session: DeviceSession | null = null;

  private connectTask?: Task;
  private reconnectTask?: Task;
  private batchTask?: Task;
  private throughputTask?: Task;
  private watchTask?: Task;

  private batchIntervalMs: number;
  private dropPolicy: BackpressurePolicy;
  private maxBufferedSeconds: number;
  private defaultWriteSync: boolean;

  private counters: StreamCounters = emptyCounters();
  private windowSamples = 0;

  constructor(options: StreamHandlerOptions) {
    this.config = StreamHandlerConfigSchema.parse(options.config ?? {});
    this.logger = options.logger ?? createDriverLogger();
    this.linkFactory = options.linkFactory;
    this.hub = new StreamEventHub(this.logger);
    const onFailure = (err: unknown, source: string): void => this.onInternalFailure(err, source);
    this.control = new WorkerContext(onFailure);
    this.commands = new WorkerContext(onFailure);
    this.parser = new FrameParser(this.config.maxPendingBytes);
    this.reconnectPolicy = new ReconnectPolicy(this.config.reconnectBackoffMs);
    this.batchIntervalMs = this.config.batchIntervalMs;
    this.dropPolicy = resolveBackpressurePolicy(this.config.dropPolicy) ?? dropOldest;
    this.maxBufferedSeconds = this.config.maxBufferedSeconds;
    this.defaultWriteSync = this.config.defaultWriteSync;
  }

  get state(): ConnectionState {
    return this.current;
  }

  subscribe(listener: StreamListener): () => void {
    return this.hub.subscribe(listener);
  }

  connect(address: string, notifyCharacteristicId?: string, writeCharacteristicId?: string): void {
    const target: Target = {
      address: address.trim(),
      notifyCharacteristicId: notifyCharacteristicId ?? this.config.notifyCharacteristicId,
      writeCharacteristicId: writeCharacteristicId ?? this.config.writeCharacteristicId
    };
    this.submit(this.control, "connect", () => this.connectSequence(target));
  }

  disconnect(): void {
    this.submit(this.control, "disconnect", () => this.disconnectSequence(null, true));
  }

  /** `sync` falls back to the default write mode at the time the write runs. */
  sendCommand(text: string, tag = "", sync?: boolean): void {
    this.submit(this.commands, "command", () => this.writeCommand(text, tag, sync ?? this.defaultWriteSync));
  }

  setBatchIntervalMs(ms: number): void {
    this.submit(this.control, "set-batch-interval", () => {
      if (!Number.isFinite(ms)) {
        this.logger.warn({ ms }, "ble-line: ignoring non-numeric batch interval");
        return;
      }
      this.batchIntervalMs = Math.max(MIN_BATCH_INTERVAL_MS, Math.floor(ms));
    });
  }

  setDropPolicy(name: string): void {
    this.submit(this.control, "set-drop-policy", () => {
      const policy = resolveBackpressurePolicy(name.trim().toLowerCase());
      if (!policy) {
        this.logger.warn({ policy: name }, "ble-line: unknown drop policy, using oldest");
      }
      this.dropPolicy = policy ?? dropOldest;
    });
  }

  setMaxBufferedSeconds(seconds: number): void {
    this.submit(this.control, "set-max-buffered", () => {
      if (!Number.isFinite(seconds)) {
        this.logger.warn({ seconds }, "ble-line: ignoring non-numeric buffer window");
        return;
      }
      this.maxBufferedSeconds = Math.max(MIN_BUFFERED_SECONDS, seconds);
    });
  }

  setDefaultWriteSync(sync: boolean): void {
    this.submit(this.commands, "set-write-mode", () => {
      this.defaultWriteSync = sync;
    });
  }

  getStatus(): StreamStatus {
    return {
      state: this.current,
      address: this.target?.address ?? null,
      sticky: this.sticky,
      pendingBytes: this.parser.pendingBytes,
      settings: {
        batchIntervalMs: this.batchIntervalMs,
        dropPolicy: this.dropPolicy.name,
        maxBufferedSeconds: this.maxBufferedSeconds,
        defaultWriteSync: this.defaultWriteSync
      },
      counters: { ...this.counters, parserOverflows: this.parser.overflowCount }
    };
  }

  /** Resolves once every queued job has run. */
  async whenIdle(): Promise<void> {
    await Promise.all([this.control.drained(), this.commands.drained()]);
  }

  /** Disconnects and refuses further work. */
  async shutdown(): Promise<void> {
    if (this.control.isClosed) return;
    this.submit(this.control, "shutdown", () => this.disconnectSequence(null, true));
    await Promise.all([this.commands.close(), this.control.close()]);
  }

  private submit(lane: WorkerContext, name: string, job: () => Promise<void> | void): void {
    if (!lane.submit(name, job)) {
      this.logger.debug({ job: name }, "ble-line: handler shut down, request ignored");
    }
  }

  // ---------- sequences (run on the control lane) ----------

  private async connectSequence(target: Target): Promise<void> {
    this.target = target;
    this.sticky = true;
    this.epoch += 1;

    await this.cancelTasks();
    await this.closeSession();
    this.parser.reset();

    if (!target.address || !target.notifyCharacteristicId || !target.writeCharacteristicId) {
      this.target = null;
      this.sticky = false;
      const err = new ConfigurationError("Cannot connect: no target address or characteristic ids set");
      this.logger.error({ address: target.address }, `ble-line: ${err.message}`);
      this.emitError(err.message, codeForFailure(err));
      this.setState("error");
      return;
    }

    const generation: Generation = { address: target.address, epoch: this.epoch };
    this.connectTask = this.control.spawn("connect", (signal) => this.connectLoop(generation, signal));
  }

  private async disconnectSequence(reason: TerminalReason | null, announce: boolean): Promise<void> {
    const quiet = (this.current === "idle" || this.current === "disconnected") && !this.sticky && !this.session;
    if (announce && quiet) return;

    this.sticky = false;
    this.target = null;
    this.epoch += 1;
    if (announce) this.setState("disconnecting");

    await this.cancelTasks();
    await this.closeSession();
    this.parser.reset();
    this.windowSamples = 0;
    this.counters = emptyCounters();

    this.setState("disconnected");
    if (reason) this.emitError(reason.message, reason.code);
  }

  private async cancelTasks(): Promise<void> {
    const tasks = [this.reconnectTask, this.connectTask, this.batchTask, this.throughputTask, this.watchTask];
    this.reconnectTask = undefined;
    this.connectTask = undefined;
    this.batchTask = undefined;
    this.throughputTask = undefined;
    this.watchTask = undefined;
    for (const task of tasks) {
      if (task) await task.cancel();
    }
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) await session.stop();
  }

  private preempted(generation: Generation): boolean {
    return (
      !this.sticky ||
      this.target === null ||
      this.target.address !== generation.address ||
      this.epoch !== generation.epoch
    );
  }

  // ---------- tasks ----------

  private async connectLoop(generation: Generation, signal: AbortSignal): Promise<void> {
    if (signal.aborted || this.preempted(generation)) return;
    this.setState("connecting");
    const session = await this.attempt(generation, signal);
    if (this.preempted(generation)) return;

    if (session) {
      this.onConnected(generation, session);
      return;
    }
    if (this.sticky) {
      this.startReconnect(generation);
    } else {
      this.setState("disconnected");
    }
  }

  private async reconnectLoop(generation: Generation, signal: AbortSignal): Promise<void> {
    for (let attempt = 0; ; attempt += 1) {
      const delayMs = this.reconnectPolicy.delayFor(attempt);
      if (delayMs === null) break;
      if (this.preempted(generation)) return;

      this.setState("reconnecting");
      this.counters.reconnectAttempts += 1;
      this.hub.emit({ type: "reconnect", attempt: attempt + 1, delayMs });
      await sleep(delayMs, signal);
      if (this.preempted(generation)) return;

      const session = await this.attempt(generation, signal);
      if (this.preempted(generation)) return;
      if (session) {
        this.onConnected(generation, session);
        return;
      }
    }

    this.logger.warn(
      { address: generation.address, attempts: this.reconnectPolicy.maxAttempts },
      "ble-line: reconnect attempts exhausted"
    );
    this.submit(this.control, "reconnect-exhausted", async () => {
      if (this.preempted(generation)) return;
      await this.disconnectSequence(
        { message: "Reconnect attempts exhausted", code: StreamErrorCode.ReconnectExhausted },
        false
      );
    });
  }

  private async attempt(generation: Generation, signal: AbortSignal): Promise<DeviceSession | null> {
    const target = this.target;
    if (!target) return null;

    let session: DeviceSession | null = null;
    try {
      session = new DeviceSession({
        link: this.linkFactory(generation.address),
        notifyCharacteristicId: target.notifyCharacteristicId,
        writeCharacteristicId: target.writeCharacteristicId,
        timeouts: this.config.timeouts,
        logger: this.logger
      });
      const opened = session;
      this.session = opened;
      await opened.connect(signal);
      await opened.startNotifications((chunk) => this.onNotify(opened, chunk), signal);
      return opened;
    } catch (err) {
      if (session) {
        if (this.session === session) this.session = null;
        await session.stop();
      }
      if (err instanceof CancelledError) throw err;
      this.logger.warn({ err, address: generation.address }, "ble-line: connection attempt failed");
      this.emitError(`BLE connection attempt failed: ${errorMessage(err)}`, codeForFailure(err));
      return null;
    }
  }

  private onConnected(generation: Generation, session: DeviceSession): void {
    this.batchTask = this.control.spawn("batch", (signal) => this.batchLoop(signal));
    if (this.config.throughput.enabled) {
      this.windowSamples = 0;
      this.throughputTask = this.control.spawn("throughput", (signal) => this.throughputLoop(signal));
    }
    this.watchTask = this.control.spawn("link-watch", (signal) => this.watchLoop(generation, session, signal));
    this.logger.info({ address: generation.address }, "ble-line: connected");
    this.setState("connected");
    for (const text of this.config.sessionStartCommands) {
      this.sendCommand(text, "session-start", false);
    }
  }

  private startReconnect(generation: Generation): void {
    this.reconnectTask = this.control.spawn("reconnect", (signal) => this.reconnectLoop(generation, signal));
  }

  private async watchLoop(generation: Generation, session: DeviceSession, signal: AbortSignal): Promise<void> {
    for (;;) {
      await sleep(this.config.linkCheckIntervalMs, signal);
      if (this.preempted(generation) || this.session !== session) return;
      if (session.isConnected) continue;
      await this.onLinkLost(generation, session);
      return;
    }
  }

  private async onLinkLost(generation: Generation, session: DeviceSession): Promise<void> {
    this.logger.warn({ address: generation.address }, "ble-line: link lost");
    const batch = this.batchTask;
    const throughput = this.throughputTask;
    this.batchTask = undefined;
    this.throughputTask = undefined;
    if (batch) await batch.cancel();
    if (throughput) await throughput.cancel();
    if (this.preempted(generation) || this.session !== session) return;

    this.flushBatch();
    this.session = null;
    await session.stop();
    if (this.preempted(generation)) return;
    this.parser.reset();
    this.emitError("BLE link lost", StreamErrorCode.LinkLost);

    if (this.sticky) {
      this.startReconnect(generation);
    } else {
      this.setState("disconnected");
    }
  }

  private async batchLoop(signal: AbortSignal): Promise<void> {
    for (;;) {
      await sleep(this.batchIntervalMs, signal);
      this.flushBatch();
    }
  }

  private async throughputLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.throughput.intervalMs;
    for (;;) {
      await sleep(intervalMs, signal);
      const count = this.windowSamples;
      this.windowSamples = 0;
      this.hub.emit({ type: "throughput", samplesPerSecond: (count * 1000) / intervalMs });
    }
  }

  // ---------- data path ----------

  private onNotify(session: DeviceSession, chunk: Uint8Array): void {
    if (this.session !== session) return;
    this.counters.bytesReceived += chunk.length;
    this.parser.feed(chunk);
  }

  private flushBatch(): void {
    const { dataFrames, managementFrames, malformed } = this.parser.drain();
    if (malformed > 0) {
      this.counters.malformedLines += malformed;
      this.logger.debug({ malformed }, "ble-line: skipped malformed data lines");
    }
    if (managementFrames.length > 0) {
      this.counters.managementLines += managementFrames.length;
      this.hub.emit({ type: "management", lines: managementFrames.map((frame) => frame.payload) });
    }
    if (dataFrames.length === 0) return;

    const { kept, dropped } = this.dropPolicy.apply(dataFrames, this.maxBufferedSeconds * 1000);
    if (dropped > 0) {
      this.counters.droppedSamples += dropped;
      this.hub.emit({ type: "dropped", count: dropped });
    }
    if (kept.length === 0) return;

    const timestamps = new Float64Array(kept.length);
    const values = new Int32Array(kept.length);
    kept.forEach((frame, idx) => {
      timestamps[idx] = frame.timestampMs;
      values[idx] = frame.millivolts;
    });
    this.counters.samplesDelivered += kept.length;
    this.counters.batchesEmitted += 1;
    this.windowSamples += kept.length;
    this.hub.emit({ type: "batch", timestamps, values });
  }

  // ---------- command path (runs on the command lane) ----------

  private async writeCommand(text: string, tag: string, expectAck: boolean): Promise<void> {
    const session = this.session;
    if (!session || !session.isConnected) {
      if (expectAck) {
        this.hub.emit({ type: "write", ok: false, tag });
      } else {
        this.logger.debug({ tag }, "ble-line: not connected, command dropped");
      }
      return;
    }

    try {
      await session.write(encodeCommand(text), expectAck);
      this.counters.writesSucceeded += 1;
      if (expectAck) this.hub.emit({ type: "write", ok: true, tag });
    } catch (err) {
      this.counters.writesFailed += 1;
      this.logger.warn({ err, tag }, "ble-line: write failed");
      this.emitError(`BLE write failed: ${errorMessage(err)}`, StreamErrorCode.WriteFailed);
      if (expectAck) this.hub.emit({ type: "write", ok: false, tag });
    }
  }

  // ---------- events ----------

  private setState(next: ConnectionState): void {
    this.current = next;
    this.hub.emit({ type: "state", state: next });
  }

  private emitError(message: string, code: StreamErrorCode): void {
    this.counters.lastError = message;
    this.hub.emit({ type: "error", message, code });
  }

  private onInternalFailure(err: unknown, source: string): void {
    this.logger.error({ err, source }, "ble-line: unexpected failure");
    this.emitError(`Internal error in ${source}: ${errorMessage(err)}`, StreamErrorCode.Internal);
  }
}
