import type { BaseLogger } from "pino";

export type NotificationListener = (chunk: Uint8Array) => void;

/**
 * One BLE peripheral as seen by the host. Implementations own the radio
 * details; callers only connect, subscribe, write and disconnect.
 */
export interface BleLink {
  readonly address: string;
  readonly isConnected: boolean;
  connect(signal?: AbortSignal): Promise<void>;
  startNotify(characteristicId: string, onData: NotificationListener): Promise<void>;
  stopNotify(characteristicId: string): Promise<void>;
  /** `withResponse` waits for the GATT acknowledgement. */
  write(characteristicId: string, payload: Uint8Array, withResponse: boolean): Promise<void>;
  disconnect(): Promise<void>;
}

export type BleLinkFactory = (address: string) => BleLink;

export type DriverLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;
