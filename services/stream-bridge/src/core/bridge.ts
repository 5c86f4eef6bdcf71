import {
  StreamEnvelopeSchema,
  type StreamEnvelope,
  type StreamTopic
} from "@epg-link/schemas";
import type { DriverLogger } from "@epg-link/driver-core";
import type { StreamEvent, StreamHandler, StreamStatus } from "@epg-link/driver-ble-line";
import type { StreamMetrics } from "@epg-link/metrics";
import type { MqttPublisher } from "../mqtt/publisher";
import { RecentLog, type RecordedEntry } from "./recent-log";

export const MANAGEMENT_HISTORY = 50;
export const ERROR_HISTORY = 20;

export interface BridgeStats {
  messagesPublished: number;
  publishFailures: number;
  lastPublishedAt?: string;
  lastError?: string;
}

export interface BridgeStatus {
  deviceId: string;
  accepting: boolean;
  stream: StreamStatus;
  bridge: BridgeStats;
  management: RecordedEntry[];
  errors: RecordedEntry[];
}

interface BridgeDependencies {
  handler: StreamHandler;
  mqttPublisher: MqttPublisher;
  deviceId: string;
  topicPrefix: string;
  logger: DriverLogger;
  metrics?: StreamMetrics;
  clock?: () => Date;
}

type PayloadFor<T extends StreamTopic> = Extract<StreamEnvelope, { topic: T }>["payload"];

/**
 * Relays one StreamHandler's events to MQTT and keeps what the HTTP surface
 * reports. Publishing failures are counted and logged; they never reach the
 * handler.
 */
export class StreamBridge {
  readonly stats: BridgeStats = { messagesPublished: 0, publishFailures: 0 };
  private readonly management: RecentLog;
  private readonly errors: RecentLog;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly clock: () => Date;
  private unsubscribe: (() => void) | null = null;
  private malformedSeen = 0;
  private closed = false;

  constructor(private readonly deps: BridgeDependencies) {
    this.clock = deps.clock ?? (() => new Date());
    this.management = new RecentLog(MANAGEMENT_HISTORY, this.clock);
    this.errors = new RecentLog(ERROR_HISTORY, this.clock);
  }

  get handler(): StreamHandler {
    return this.deps.handler;
  }

  get accepting(): boolean {
    return !this.closed;
  }

  start(): void {
    if (this.unsubscribe || this.closed) return;
    this.unsubscribe = this.deps.handler.subscribe((event) => this.onEvent(event));
    this.deps.metrics?.setState(this.deps.deviceId, this.deps.handler.state);
  }

  /** Shuts the handler down, publishes what it emitted on the way out, then detaches. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.deps.handler.shutdown();
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.flushed();
  }

  /** Resolves once every publish started so far has settled. */
  async flushed(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  status(): BridgeStatus {
    return {
      deviceId: this.deps.deviceId,
      accepting: this.accepting,
      stream: this.deps.handler.getStatus(),
      bridge: { ...this.stats },
      management: this.management.list(),
      errors: this.errors.list()
    };
  }

  private onEvent(event: StreamEvent): void {
    const { deviceId, metrics, logger } = this.deps;
    switch (event.type) {
      case "state":
        metrics?.setState(deviceId, event.state);
        this.publish("state", { state: event.state }, true);
        break;
      case "batch":
        metrics?.recordBatch(deviceId, event.values.length);
        this.publish("samples", {
          timestamps: Array.from(event.timestamps),
          values: Array.from(event.values)
        });
        break;
      case "management":
        for (const line of event.lines) {
          this.management.push(line);
        }
        metrics?.recordManagement(deviceId, event.lines.length);
        this.publish("management", { lines: [...event.lines] });
        break;
      case "error":
        this.errors.push(event.message, { code: event.code });
        metrics?.recordError(deviceId, event.code);
        logger.warn({ code: event.code }, `stream-bridge: ${event.message}`);
        this.publish("errors", { message: event.message, code: event.code });
        break;
      case "write":
        metrics?.recordWrite(deviceId, event.ok);
        this.publish("writes", { ok: event.ok, tag: event.tag });
        break;
      case "dropped":
        metrics?.recordDropped(deviceId, event.count);
        this.publish("dropped", { count: event.count });
        break;
      case "throughput":
        metrics?.setThroughput(deviceId, event.samplesPerSecond);
        this.publish("throughput", { samplesPerSecond: event.samplesPerSecond });
        break;
      case "reconnect":
        metrics?.recordReconnect(deviceId);
        logger.info({ attempt: event.attempt, delayMs: event.delayMs }, "stream-bridge: reconnect scheduled");
        break;
    }
    this.syncMalformed();
  }

  // the handler only exposes malformed lines as a counter, which resets on disconnect
  private syncMalformed(): void {
    const { metrics, deviceId } = this.deps;
    if (!metrics) return;
    const total = this.deps.handler.getStatus().counters.malformedLines;
    if (total < this.malformedSeen) {
      this.malformedSeen = 0;
    }
    if (total > this.malformedSeen) {
      metrics.recordMalformed(deviceId, total - this.malformedSeen);
      this.malformedSeen = total;
    }
  }

  private publish<T extends StreamTopic>(topic: T, payload: PayloadFor<T>, retain = false): void {
    const { deviceId, topicPrefix, mqttPublisher, logger } = this.deps;
    const address = this.deps.handler.getStatus().address;
    const parsed = StreamEnvelopeSchema.safeParse({
      ts: this.clock().toISOString(),
      origin: address === null ? { deviceId } : { deviceId, address },
      topic,
      payload
    });
    if (!parsed.success) {
      this.recordFailure(`invalid ${topic} envelope`);
      logger.error({ topic, issues: parsed.error.issues }, "stream-bridge: dropping invalid envelope");
      return;
    }

    const envelope = parsed.data;
    const pending = mqttPublisher
      .publish(`${topicPrefix}/${deviceId}/${topic}`, JSON.stringify(envelope), { retain })
      .then(
        () => {
          this.stats.messagesPublished += 1;
          this.stats.lastPublishedAt = envelope.ts;
        },
        (err: unknown) => {
          this.recordFailure(err instanceof Error ? err.message : String(err));
          logger.warn({ err, topic }, "stream-bridge: publish failed");
        }
      )
      .finally(() => {
        this.inFlight.delete(pending);
      });
    this.inFlight.add(pending);
  }

  private recordFailure(message: string): void {
    this.stats.publishFailures += 1;
    this.stats.lastError = message;
  }
}
