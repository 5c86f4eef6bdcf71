import { z } from "zod";
import { IdentifierSchema } from "@epg-link/schemas";
import type { DriverLogger } from "@epg-link/driver-core";
import {
  SESSION_START_COMMANDS,
  StreamHandlerConfigSchema,
  type StreamHandlerConfig
} from "@epg-link/driver-ble-line";
import { TransportNameSchema, type TransportName } from "./transports";

export const BridgeConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(4010),
  HOST: z.string().min(1).default("0.0.0.0"),
  MQTT_URL: z.string().min(1).default("mqtt://127.0.0.1:1883"),
  MQTT_TOPIC_PREFIX: z.string().min(1).default("epg"),
  DEVICE_ID: IdentifierSchema.default("epg-board"),
  LINK_KIND: TransportNameSchema.default("fake"),
  STREAM_CONFIG_JSON: z.string().optional()
});

export interface BridgeConfig {
  port: number;
  host: string;
  mqttUrl: string;
  topicPrefix: string;
  deviceId: string;
  linkKind: TransportName;
  stream: StreamHandlerConfig;
}

export class BridgeConfigError extends Error {
  constructor(message: string, readonly issues: z.ZodIssue[] = []) {
    super(message);
    this.name = "BridgeConfigError";
  }
}

/**
 * Reads the service settings from the environment. A STREAM_CONFIG_JSON that
 * is not JSON is logged and ignored; one that is JSON but fails validation
 * stops startup.
 */
export function loadBridgeConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger?: DriverLogger
): BridgeConfig {
  const parsed = BridgeConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new BridgeConfigError("Invalid stream-bridge environment", parsed.error.issues);
  }
  const vars = parsed.data;

  const raw = readStreamJson(vars.STREAM_CONFIG_JSON, logger);
  // the service powers the board up and starts acquisition unless told otherwise
  const input = isRecord(raw) ? { sessionStartCommands: [...SESSION_START_COMMANDS], ...raw } : raw;
  const stream = StreamHandlerConfigSchema.safeParse(input);
  if (!stream.success) {
    throw new BridgeConfigError("Invalid STREAM_CONFIG_JSON", stream.error.issues);
  }

  return {
    port: vars.PORT,
    host: vars.HOST,
    mqttUrl: vars.MQTT_URL,
    topicPrefix: vars.MQTT_TOPIC_PREFIX.replace(/\/+$/, ""),
    deviceId: vars.DEVICE_ID,
    linkKind: vars.LINK_KIND,
    stream: stream.data
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStreamJson(raw: string | undefined, logger?: DriverLogger): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch (err) {
    logger?.warn({ err }, "stream-bridge: STREAM_CONFIG_JSON is not valid JSON, using defaults");
    return {};
  }
}
