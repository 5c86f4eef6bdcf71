import type { BleLinkFactory } from "@epg-link/driver-core";
import { createFakeLinkFactory } from "@epg-link/driver-fake";
import { createNobleLink } from "@epg-link/driver-ble-line";
import { z } from "zod";

export const TransportNameSchema = z.enum(["fake", "noble"]);
export type TransportName = z.infer<typeof TransportNameSchema>;

const TRANSPORTS: Record<TransportName, () => BleLinkFactory> = {
  fake: () => createFakeLinkFactory({ autoStream: true }),
  noble: () => createNobleLink
};

export function loadTransport(name: string): BleLinkFactory {
  const parsed = TransportNameSchema.safeParse(name.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Transport not found: ${name}`);
  }
  return TRANSPORTS[parsed.data]();
}
