import { z } from "zod";
import { NonEmptyStringSchema, PositiveNumberSchema } from "../common/scalars";
import { DropPolicySchema } from "./connection";

export const ControlKeySchema = z.enum([
  "inputResistance",
  "pga1",
  "pga2",
  "signalChainAmplification",
  "signalChainOffset",
  "ddsAmplification",
  "ddsOffset",
  "digipotChannel0",
  "digipotChannel1",
  "digipotChannel2",
  "digipotChannel3",
  "excitationFrequency"
]);

export const ControlSettingSchema = z.object({
  key: ControlKeySchema,
  value: z.union([z.string(), z.number()])
});

const CommandOptionsSchema = z.object({
  tag: z.string().default(""),
  sync: z.boolean().optional()
});

export const RawCommandRequestSchema = CommandOptionsSchema.extend({
  text: NonEmptyStringSchema
});

export const SettingCommandRequestSchema = CommandOptionsSchema.extend({
  setting: ControlSettingSchema
});

export const CommandRequestSchema = z.union([RawCommandRequestSchema, SettingCommandRequestSchema]);

export const StreamSettingsSchema = z
  .object({
    batchIntervalMs: PositiveNumberSchema.optional(),
    dropPolicy: DropPolicySchema.optional(),
    maxBufferedSeconds: PositiveNumberSchema.optional(),
    defaultWriteSync: z.boolean().optional()
  })
  .refine((value) => Object.values(value).some((entry) => entry !== undefined), {
    message: "at least one setting is required"
  });

export type ControlKey = z.infer<typeof ControlKeySchema>;
export type ControlSetting = z.infer<typeof ControlSettingSchema>;
export type CommandRequest = z.infer<typeof CommandRequestSchema>;
export type StreamSettings = z.infer<typeof StreamSettingsSchema>;
