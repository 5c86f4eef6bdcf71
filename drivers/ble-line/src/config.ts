import { z } from "zod";
import {
  DEFAULT_NOTIFY_CHARACTERISTIC_ID,
  DEFAULT_WRITE_CHARACTERISTIC_ID,
  DropPolicySchema
} from "@epg-link/schemas";

export const MIN_BATCH_INTERVAL_MS = 1;
export const MIN_BUFFERED_SECONDS = 0.1;
export const DEFAULT_MAX_PENDING_BYTES = 1024 * 1024;

export const SessionTimeoutsSchema = z
  .object({
    connectMs: z.number().int().positive().default(10_000),
    subscribeMs: z.number().int().positive().default(5_000),
    writeMs: z.number().int().positive().default(2_000),
    disconnectMs: z.number().int().positive().default(2_000)
  })
  .default({});

export const StreamHandlerConfigSchema = z.object({
  batchIntervalMs: z.number().min(MIN_BATCH_INTERVAL_MS).default(10),
  dropPolicy: DropPolicySchema.default("oldest"),
  maxBufferedSeconds: z.number().min(MIN_BUFFERED_SECONDS).default(2),
  timeouts: SessionTimeoutsSchema,
  reconnectBackoffMs: z.array(z.number().int().nonnegative()).default([1_000, 2_000, 5_000, 10_000]),
  defaultWriteSync: z.boolean().default(true),
  linkCheckIntervalMs: z.number().int().positive().default(100),
  throughput: z
    .object({
      enabled: z.boolean().default(false),
      intervalMs: z.number().int().positive().default(1_000)
    })
    .default({}),
  notifyCharacteristicId: z.string().default(DEFAULT_NOTIFY_CHARACTERISTIC_ID),
  writeCharacteristicId: z.string().default(DEFAULT_WRITE_CHARACTERISTIC_ID),
  sessionStartCommands: z.array(z.string().min(1)).default([]),
  maxPendingBytes: z.number().int().positive().default(DEFAULT_MAX_PENDING_BYTES)
});

export type SessionTimeouts = z.infer<typeof SessionTimeoutsSchema>;
export type StreamHandlerConfig = z.infer<typeof StreamHandlerConfigSchema>;
export type StreamHandlerConfigInput = z.input<typeof StreamHandlerConfigSchema>;
