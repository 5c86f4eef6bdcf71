import type { FastifyInstance } from "fastify";
import type { StreamBridge } from "../core/bridge";

interface StatusDeps {
  bridge: StreamBridge;
}

export function registerStatusRoute(app: FastifyInstance, deps: StatusDeps): void {
  const { bridge } = deps;

  app.get("/device/status", () => bridge.status());
}
