export * from "./common/scalars";
export * from "./device/connection";
export * from "./device/commands";
export * from "./device/stream-events";
