import { z } from "zod";
import {
  IdentifierSchema,
  IsoDateTimeSchema,
  NonNegativeIntSchema,
  NonNegativeNumberSchema
} from "../common/scalars";
import { ConnectionStateSchema } from "./connection";

export const StreamOriginSchema = z.object({
  deviceId: IdentifierSchema,
  address: z.string().optional()
});

export const StreamTopicSchema = z.enum([
  "state",
  "samples",
  "management",
  "errors",
  "writes",
  "dropped",
  "throughput"
]);

export const StatePayloadSchema = z.object({ state: ConnectionStateSchema });

export const SamplesPayloadSchema = z
  .object({
    timestamps: z.array(NonNegativeNumberSchema),
    values: z.array(z.number().int())
  })
  .refine((value) => value.timestamps.length === value.values.length, {
    message: "timestamps and values must pair up"
  });

export const ManagementPayloadSchema = z.object({ lines: z.array(z.string()).min(1) });
export const ErrorPayloadSchema = z.object({ message: z.string(), code: NonNegativeIntSchema });
export const WritePayloadSchema = z.object({ ok: z.boolean(), tag: z.string() });
export const DroppedPayloadSchema = z.object({ count: z.number().int().positive() });
export const ThroughputPayloadSchema = z.object({ samplesPerSecond: NonNegativeNumberSchema });

const envelope = <T extends z.infer<typeof StreamTopicSchema>, P extends z.ZodTypeAny>(topic: T, payload: P) =>
  z.object({
    ts: IsoDateTimeSchema,
    origin: StreamOriginSchema,
    topic: z.literal(topic),
    payload
  });

export const StreamEnvelopeSchema = z.discriminatedUnion("topic", [
  envelope("state", StatePayloadSchema),
  envelope("samples", SamplesPayloadSchema),
  envelope("management", ManagementPayloadSchema),
  envelope("errors", ErrorPayloadSchema),
  envelope("writes", WritePayloadSchema),
  envelope("dropped", DroppedPayloadSchema),
  envelope("throughput", ThroughputPayloadSchema)
]);

export type StreamOrigin = z.infer<typeof StreamOriginSchema>;
export type StreamTopic = z.infer<typeof StreamTopicSchema>;
export type StreamEnvelope = z.infer<typeof StreamEnvelopeSchema>;
