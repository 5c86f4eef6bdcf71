import { fileURLToPath } from "node:url";
import { buildServer } from "./server";
import { loadBridgeConfig } from "./core/config";

async function main(): Promise<void> {
  try {
    const config = loadBridgeConfig();
    const server = await buildServer({ config });
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`stream-bridge listening on ${config.host}:${String(config.port)} for ${config.deviceId}`);

    const shutdown = (signal: NodeJS.Signals): void => {
      server.log.info({ signal }, "stream-bridge: shutting down");
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error(err, "stream-bridge: close failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`stream-bridge failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}

export { buildServer } from "./server";
export { StreamBridge, type BridgeStatus, type BridgeStats } from "./core/bridge";
export { loadBridgeConfig, BridgeConfigSchema, type BridgeConfig } from "./core/config";
