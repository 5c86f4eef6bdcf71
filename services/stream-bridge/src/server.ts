import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { StreamHandler } from "@epg-link/driver-ble-line";
import type { BleLinkFactory } from "@epg-link/driver-core";
import { StreamMetrics, initializeMetrics, register, type Registry } from "@epg-link/metrics";
import { StreamBridge } from "./core/bridge";
import { loadBridgeConfig, type BridgeConfig } from "./core/config";
import { loadTransport } from "./core/transports";
import { RealMqttPublisher, type MqttPublisher } from "./mqtt/publisher";
import { registerCommandRoute } from "./routes/command";
import { registerConnectionRoutes } from "./routes/connection";
import { registerHealthRoute } from "./routes/health";
import { registerMetricsRoute } from "./routes/metrics";
import { registerSettingsRoute } from "./routes/settings";
import { registerStatusRoute } from "./routes/status";

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  config?: BridgeConfig;
  linkFactory?: BleLinkFactory;
  mqttPublisher?: MqttPublisher;
  handler?: StreamHandler;
  /** Defaults to the global prom-client registry. */
  registry?: Registry;
  collectDefaultMetrics?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const config = options.config ?? loadBridgeConfig(process.env, app.log);
  const registry = options.registry ?? register;

  const httpMetrics = initializeMetrics({
    serviceName: "stream-bridge",
    registry,
    collectDefaultMetrics: options.collectDefaultMetrics ?? true
  });
  app.addHook("onRequest", httpMetrics.hook("stream-bridge"));

  const mqttPublisher =
    options.mqttPublisher ??
    new RealMqttPublisher({ url: config.mqttUrl, clientId: `epg-link-${config.deviceId}`, logger: app.log });
  const handler =
    options.handler ??
    new StreamHandler({
      linkFactory: options.linkFactory ?? loadTransport(config.linkKind),
      config: config.stream,
      logger: app.log
    });
  const bridge = new StreamBridge({
    handler,
    mqttPublisher,
    deviceId: config.deviceId,
    topicPrefix: config.topicPrefix,
    logger: app.log,
    metrics: new StreamMetrics({ registry })
  });
  bridge.start();

  registerHealthRoute(app);
  registerMetricsRoute(app, { registry });
  registerStatusRoute(app, { bridge });
  registerConnectionRoutes(app, { bridge });
  registerCommandRoute(app, { bridge });
  registerSettingsRoute(app, { bridge });

  app.addHook("onClose", async () => {
    try {
      await bridge.close();
    } catch (err) {
      app.log.error(err, "stream-bridge: failed closing the stream handler");
    }
    await mqttPublisher.disconnect().catch((err: unknown) => {
      app.log.error(err, "stream-bridge: failed to disconnect MQTT publisher");
    });
  });

  return app;
}
