import { register, type Counter, type Gauge, type Registry } from 'prom-client';
import { createCounter, createGauge } from './helpers';

export interface StreamMetricsConfig {
  registry?: Registry;
  prefix?: string;
}

type DeviceLabel = 'device';

/**
 * Counters fed from a stream handler's events. Every series carries the
 * device id so several boards can share one registry.
 */
export class StreamMetrics {
  private readonly samples: Counter<DeviceLabel>;
  private readonly batches: Counter<DeviceLabel>;
  private readonly dropped: Counter<DeviceLabel>;
  private readonly malformed: Counter<DeviceLabel>;
  private readonly managementLines: Counter<DeviceLabel>;
  private readonly reconnects: Counter<DeviceLabel>;
  private readonly writes: Counter<DeviceLabel | 'ok'>;
  private readonly errors: Counter<DeviceLabel | 'code'>;
  private readonly state: Gauge<DeviceLabel | 'state'>;
  private readonly throughput: Gauge<DeviceLabel>;
  private readonly currentState = new Map<string, string>();

  constructor(config: StreamMetricsConfig = {}) {
    const registry = config.registry ?? register;
    const prefix = config.prefix ?? 'epglink';

    this.samples = createCounter({
      name: `${prefix}_samples_total`,
      help: 'Samples delivered in batches',
      labelNames: ['device'] as const,
      registry,
    });
    this.batches = createCounter({
      name: `${prefix}_batches_total`,
      help: 'Sample batches delivered',
      labelNames: ['device'] as const,
      registry,
    });
    this.dropped = createCounter({
      name: `${prefix}_dropped_samples_total`,
      help: 'Samples discarded by the backpressure policy',
      labelNames: ['device'] as const,
      registry,
    });
    this.malformed = createCounter({
      name: `${prefix}_malformed_lines_total`,
      help: 'Data lines that failed to parse',
      labelNames: ['device'] as const,
      registry,
    });
    this.managementLines = createCounter({
      name: `${prefix}_management_lines_total`,
      help: 'Management text lines received from the board',
      labelNames: ['device'] as const,
      registry,
    });
    this.reconnects = createCounter({
      name: `${prefix}_reconnect_attempts_total`,
      help: 'Reconnect attempts scheduled',
      labelNames: ['device'] as const,
      registry,
    });
    this.writes = createCounter({
      name: `${prefix}_writes_total`,
      help: 'Command writes by outcome',
      labelNames: ['device', 'ok'] as const,
      registry,
    });
    this.errors = createCounter({
      name: `${prefix}_errors_total`,
      help: 'Stream errors by code',
      labelNames: ['device', 'code'] as const,
      registry,
    });
    this.state = createGauge({
      name: `${prefix}_connection_state`,
      help: 'Current connection state (1 for the active state)',
      labelNames: ['device', 'state'] as const,
      registry,
    });
    this.throughput = createGauge({
      name: `${prefix}_throughput_samples_per_second`,
      help: 'Most recent throughput report',
      labelNames: ['device'] as const,
      registry,
    });
  }

  recordBatch(device: string, sampleCount: number): void {
    this.batches.inc({ device });
    if (sampleCount > 0) {
      this.samples.inc({ device }, sampleCount);
    }
  }

  recordDropped(device: string, count: number): void {
    this.dropped.inc({ device }, count);
  }

  recordMalformed(device: string, count: number): void {
    this.malformed.inc({ device }, count);
  }

  recordManagement(device: string, lineCount: number): void {
    this.managementLines.inc({ device }, lineCount);
  }

  recordReconnect(device: string): void {
    this.reconnects.inc({ device });
  }

  recordWrite(device: string, ok: boolean): void {
    this.writes.inc({ device, ok: String(ok) });
  }

  recordError(device: string, code: number): void {
    this.errors.inc({ device, code: String(code) });
  }

  setState(device: string, state: string): void {
    const previous = this.currentState.get(device);
    if (previous !== undefined && previous !== state) {
      this.state.set({ device, state: previous }, 0);
    }
    this.state.set({ device, state }, 1);
    this.currentState.set(device, state);
  }

  setThroughput(device: string, samplesPerSecond: number): void {
    this.throughput.set({ device }, samplesPerSecond);
  }
}
