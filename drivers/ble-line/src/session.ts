import type { BleLink, DriverLogger, NotificationListener } from "@epg-link/driver-core";
import type { SessionTimeouts } from "./config";
import {
  CancelledError,
  TransportError,
  TransportTimeoutError,
  errorMessage,
  type SessionOperation
} from "./errors";
import { runWithTimeout } from "./worker";

export interface DeviceSessionOptions {
  link: BleLink;
  notifyCharacteristicId: string;
  writeCharacteristicId: string;
  timeouts: SessionTimeouts;
  logger: DriverLogger;
}

/**
 * One connect, subscribe, write, disconnect lifecycle over a single link.
 * Every step has its own time budget; link failures surface as
 * `TransportError` and budget overruns as `TransportTimeoutError`.
 */
export class DeviceSession {
  private subscribed = false;
  private stopping?: Promise<void>;

  constructor(private readonly options: DeviceSessionOptions) {}

  get address(): string {
    return this.options.link.address;
  }

  get isConnected(): boolean {
    return !this.stopping && this.options.link.isConnected;
  }

  get isStopped(): boolean {
    return this.stopping !== undefined;
  }

  async connect(signal?: AbortSignal): Promise<void> {
    if (this.stopping) {
      throw new TransportError("connect", "session already stopped");
    }
    await this.guard(
      "connect",
      this.options.timeouts.connectMs,
      (operationSignal) => this.options.link.connect(operationSignal),
      signal
    );
  }

  async startNotifications(onData: NotificationListener, signal?: AbortSignal): Promise<void> {
    this.assertConnected("subscribe");
    const { link, notifyCharacteristicId } = this.options;
    await this.guard(
      "subscribe",
      this.options.timeouts.subscribeMs,
      () => link.startNotify(notifyCharacteristicId, onData),
      signal
    );
    this.subscribed = true;
  }

  async write(payload: Uint8Array, expectAck: boolean, signal?: AbortSignal): Promise<void> {
    this.assertConnected("write");
    const { link, writeCharacteristicId } = this.options;
    await this.guard(
      "write",
      this.options.timeouts.writeMs,
      () => link.write(writeCharacteristicId, payload, expectAck),
      signal
    );
  }

  /** Idempotent; every call resolves once the first teardown has finished. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown();
    }
    return this.stopping;
  }

  private async teardown(): Promise<void> {
    const { link, notifyCharacteristicId, logger, timeouts } = this.options;
    if (this.subscribed) {
      this.subscribed = false;
      try {
        await this.guard("unsubscribe", timeouts.disconnectMs, () => link.stopNotify(notifyCharacteristicId));
      } catch (err) {
        logger.debug({ err, address: link.address }, "ble-line: unsubscribe failed during stop");
      }
    }
    try {
      await this.guard("disconnect", timeouts.disconnectMs, () => link.disconnect());
    } catch (err) {
      logger.debug({ err, address: link.address }, "ble-line: disconnect failed during stop");
    }
  }

  private assertConnected(operation: SessionOperation): void {
    if (!this.isConnected) {
      throw new TransportError(operation, `${operation} failed: not connected`);
    }
  }

  private async guard<T>(
    operation: SessionOperation,
    budgetMs: number,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    // aborted on caller cancel or budget overrun
    const operationController = new AbortController();
    const forward = (): void => operationController.abort(new CancelledError());
    if (signal?.aborted) {
      forward();
    } else {
      signal?.addEventListener("abort", forward, { once: true });
    }

    try {
      return await runWithTimeout(
        () => fn(operationController.signal),
        budgetMs,
        () => new TransportTimeoutError(operation, budgetMs),
        signal
      );
    } catch (err) {
      if (!operationController.signal.aborted) {
        operationController.abort(err instanceof Error ? err : new Error(errorMessage(err)));
      }
      if (err instanceof TransportError || err instanceof CancelledError) throw err;
      throw new TransportError(operation, `${operation} failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      signal?.removeEventListener("abort", forward);
    }
  }
}
