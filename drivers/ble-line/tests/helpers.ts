import { vi } from "vitest";
import type { DriverLogger } from "@epg-link/driver-core";

export function createTestLogger(): DriverLogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function frames(...pairs: Array<[number, number]>): Array<{ timestampMs: number; millivolts: number }> {
  return pairs.map(([timestampMs, millivolts]) => ({ timestampMs, millivolts }));
}
