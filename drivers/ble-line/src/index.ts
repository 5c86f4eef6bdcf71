export { StreamHandler, type StreamHandlerOptions } from "./handler";
export { FrameParser, DECODE_ERROR_PAYLOAD } from "./parser";
export type { DataFrame, DrainResult, ManagementFrame } from "./parser";
export { DeviceSession, type DeviceSessionOptions } from "./session";
export { ReconnectPolicy } from "./backoff";
export {
  dropNewest,
  dropOldest,
  isDropPolicyName,
  keepAll,
  resolveBackpressurePolicy,
  type BackpressurePolicy,
  type BackpressureResult
} from "./backpressure";
export { SESSION_START_COMMANDS, commandForSetting, encodeCommand } from "./commands";
export {
  StreamHandlerConfigSchema,
  type StreamHandlerConfig,
  type StreamHandlerConfigInput
} from "./config";
export {
  CancelledError,
  ConfigurationError,
  StreamErrorCode,
  TransportError,
  TransportTimeoutError
} from "./errors";
export type { StreamEvent, StreamEventType, StreamListener } from "./events";
export type { StreamCounters, StreamStatus } from "./metrics";
export { createDriverLogger } from "./logger";
export { NobleLink, createNobleLink } from "./noble";
