import pino from "pino";
import type { DriverLogger } from "@epg-link/driver-core";

export function createDriverLogger(level: string = process.env.LOG_LEVEL ?? "info"): DriverLogger {
  return pino({ name: "ble-line", level });
}
