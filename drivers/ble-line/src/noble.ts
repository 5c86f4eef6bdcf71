import { createRequire } from "node:module";
import type { BleLink, BleLinkFactory, NotificationListener } from "@epg-link/driver-core";

const require = createRequire(import.meta.url);

export type NobleCharacteristic = {
  uuid: string;
  subscribeAsync(): Promise<void>;
  unsubscribeAsync(): Promise<void>;
  writeAsync(data: Buffer, withoutResponse: boolean): Promise<void>;
  on(event: "data", listener: (data: Buffer, isNotification: boolean) => void): unknown;
  removeAllListeners(event: "data"): unknown;
};

export type NoblePeripheral = {
  id: string;
  address: string;
  state: string;
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverSomeServicesAndCharacteristicsAsync(
    serviceUUIDs: string[],
    characteristicUUIDs: string[]
  ): Promise<{ characteristics: NobleCharacteristic[] }>;
};

export type NobleModule = {
  state: string;
  on(event: "stateChange", listener: (state: string) => void): unknown;
  on(event: "discover", listener: (peripheral: NoblePeripheral) => void): unknown;
  removeListener(event: "stateChange", listener: (state: string) => void): unknown;
  removeListener(event: "discover", listener: (peripheral: NoblePeripheral) => void): unknown;
  startScanningAsync(serviceUUIDs?: string[], allowDuplicates?: boolean): Promise<void>;
  stopScanningAsync(): Promise<void>;
};

let cached: NobleModule | null = null;

export function loadNoble(): NobleModule {
  if (!cached) {
    // eslint-disable-next-line @typescript-eslint/no-var-requires
    cached = require("@abandonware/noble") as NobleModule;
  }
  return cached;
}

/** noble reports UUIDs and addresses in lower case without dashes or colons. */
export function normalizeUuid(uuid: string): string {
  return uuid.replace(/-/g, "").toLowerCase();
}

function matchesAddress(peripheral: NoblePeripheral, address: string): boolean {
  const wanted = address.replace(/[:-]/g, "").toLowerCase();
  return (
    peripheral.address.replace(/[:-]/g, "").toLowerCase() === wanted ||
    peripheral.id.toLowerCase() === wanted
  );
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error("aborted");
}

export class NobleLink implements BleLink {
  private peripheral: NoblePeripheral | null = null;
  private readonly characteristics = new Map<string, NobleCharacteristic>();

  constructor(readonly address: string, private readonly noble: NobleModule = loadNoble()) {}

  get isConnected(): boolean {
    return this.peripheral?.state === "connected";
  }

  async connect(signal?: AbortSignal): Promise<void> {
    await this.waitForPoweredOn(signal);
    const peripheral = await this.scan(signal);
    this.peripheral = peripheral;
    await peripheral.connectAsync();
    const { characteristics } = await peripheral.discoverSomeServicesAndCharacteristicsAsync([], []);
    this.characteristics.clear();
    for (const characteristic of characteristics) {
      this.characteristics.set(normalizeUuid(characteristic.uuid), characteristic);
    }
  }

  async startNotify(characteristicId: string, onData: NotificationListener): Promise<void> {
    const characteristic = this.characteristic(characteristicId);
    characteristic.on("data", (data) => onData(new Uint8Array(data)));
    await characteristic.subscribeAsync();
  }

  async stopNotify(characteristicId: string): Promise<void> {
    const characteristic = this.characteristic(characteristicId);
    characteristic.removeAllListeners("data");
    await characteristic.unsubscribeAsync();
  }

  async write(characteristicId: string, payload: Uint8Array, withResponse: boolean): Promise<void> {
    await this.characteristic(characteristicId).writeAsync(Buffer.from(payload), !withResponse);
  }

  async disconnect(): Promise<void> {
    const peripheral = this.peripheral;
    this.peripheral = null;
    this.characteristics.clear();
    if (peripheral) {
      await peripheral.disconnectAsync();
    }
  }

  private characteristic(characteristicId: string): NobleCharacteristic {
    const characteristic = this.characteristics.get(normalizeUuid(characteristicId));
    if (!characteristic) {
      throw new Error(`characteristic ${characteristicId} not found on ${this.address}`);
    }
    return characteristic;
  }

  private waitForPoweredOn(signal?: AbortSignal): Promise<void> {
    if (this.noble.state === "poweredOn") return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      const onState = (state: string): void => {
        if (state !== "poweredOn") return;
        cleanup();
        resolve();
      };
      const onAbort = (): void => {
        cleanup();
        reject(signal ? abortReason(signal) : new Error("aborted"));
      };
      const cleanup = (): void => {
        this.noble.removeListener("stateChange", onState);
        signal?.removeEventListener("abort", onAbort);
      };
      this.noble.on("stateChange", onState);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private async scan(signal?: AbortSignal): Promise<NoblePeripheral> {
    const found = new Promise<NoblePeripheral>((resolve, reject) => {
      const onDiscover = (peripheral: NoblePeripheral): void => {
        if (!matchesAddress(peripheral, this.address)) return;
        cleanup();
        resolve(peripheral);
      };
      const onAbort = (): void => {
        cleanup();
        reject(signal ? abortReason(signal) : new Error("aborted"));
      };
      const cleanup = (): void => {
        this.noble.removeListener("discover", onDiscover);
        signal?.removeEventListener("abort", onAbort);
      };
      this.noble.on("discover", onDiscover);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
    try {
      const [peripheral] = await Promise.all([found, this.noble.startScanningAsync([], false)]);
      return peripheral;
    } finally {
      await this.noble.stopScanningAsync();
    }
  }
}

export const createNobleLink: BleLinkFactory = (address: string) => new NobleLink(address);
