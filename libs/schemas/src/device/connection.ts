import { z } from "zod";
import { NonEmptyStringSchema } from "../common/scalars";

export const DEFAULT_NOTIFY_CHARACTERISTIC_ID = "445817D2-9E86-1078-1F76-703DC002EF42";
export const DEFAULT_WRITE_CHARACTERISTIC_ID = "445817D2-9E86-1078-1F76-703DC002EF43";

export const ConnectionStateSchema = z.enum([
  "idle",
  "connecting",
  "connected",
  "reconnecting",
  "disconnecting",
  "disconnected",
  "error"
]);

export const DropPolicySchema = z.enum(["oldest", "newest", "block"]);

export const DeviceTargetSchema = z.object({
  address: NonEmptyStringSchema,
  notifyCharacteristicId: NonEmptyStringSchema.default(DEFAULT_NOTIFY_CHARACTERISTIC_ID),
  writeCharacteristicId: NonEmptyStringSchema.default(DEFAULT_WRITE_CHARACTERISTIC_ID)
});

export type ConnectionState = z.infer<typeof ConnectionStateSchema>;
export type DropPolicyName = z.infer<typeof DropPolicySchema>;
export type DeviceTarget = z.infer<typeof DeviceTargetSchema>;
