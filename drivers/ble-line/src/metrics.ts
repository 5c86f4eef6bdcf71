import type { ConnectionState, DropPolicyName } from "@epg-link/schemas";

export interface StreamCounters {
  bytesReceived: number;
  samplesDelivered: number;
  batchesEmitted: number;
  droppedSamples: number;
  malformedLines: number;
  managementLines: number;
  parserOverflows: number;
  reconnectAttempts: number;
  writesSucceeded: number;
  writesFailed: number;
  lastError?: string;
}

export interface StreamSettingsSnapshot {
  batchIntervalMs: number;
  dropPolicy: DropPolicyName;
  maxBufferedSeconds: number;
  defaultWriteSync: boolean;
}

export interface StreamStatus {
  state: ConnectionState;
  address: string | null;
  sticky: boolean;
  pendingBytes: number;
  settings: StreamSettingsSnapshot;
  counters: StreamCounters;
}

export function emptyCounters(): StreamCounters {
  return {
    bytesReceived: 0,
    samplesDelivered: 0,
    batchesEmitted: 0,
    droppedSamples: 0,
    malformedLines: 0,
    managementLines: 0,
    parserOverflows: 0,
    reconnectAttempts: 0,
    writesSucceeded: 0,
    writesFailed: 0
  };
}
