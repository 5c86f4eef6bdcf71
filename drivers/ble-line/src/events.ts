import type { ConnectionState } from "@epg-link/schemas";
import type { DriverLogger } from "@epg-link/driver-core";
import type { StreamErrorCode } from "./errors";

export type StreamEvent =
  | { type: "state"; state: ConnectionState }
  | { type: "error"; message: string; code: StreamErrorCode }
  | { type: "batch"; timestamps: Float64Array; values: Int32Array }
  | { type: "dropped"; count: number }
  | { type: "write"; ok: boolean; tag: string }
  | { type: "management"; lines: string[] }
  | { type: "throughput"; samplesPerSecond: number }
  | { type: "reconnect"; attempt: number; delayMs: number };

export type StreamEventType = StreamEvent["type"];
export type StreamListener = (event: StreamEvent) => void;

export class StreamEventHub {
  private readonly listeners = new Set<StreamListener>();

  constructor(private readonly logger: DriverLogger) {}

  subscribe(listener: StreamListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: StreamEvent): void {
    const frozen = Object.freeze(event);
    for (const listener of this.listeners) {
      try {
        listener(frozen);
      } catch (err) {
        this.logger.error({ err, event: event.type }, "ble-line: listener threw");
      }
    }
  }

  get size(): number {
    return this.listeners.size;
  }
}
