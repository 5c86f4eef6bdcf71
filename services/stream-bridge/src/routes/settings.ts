import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { StreamSettingsSchema } from "@epg-link/schemas";
import type { StreamBridge } from "../core/bridge";

interface SettingsDeps {
  bridge: StreamBridge;
}

export function registerSettingsRoute(app: FastifyInstance, deps: SettingsDeps): void {
  const { bridge } = deps;

  app.post("/device/settings", async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = StreamSettingsSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid settings request", issues: parsed.error.issues });
    }
    if (!bridge.accepting) {
      return reply.status(409).send({ error: "Bridge is shutting down" });
    }

    const { handler } = bridge;
    const settings = parsed.data;
    if (settings.batchIntervalMs !== undefined) handler.setBatchIntervalMs(settings.batchIntervalMs);
    if (settings.dropPolicy !== undefined) handler.setDropPolicy(settings.dropPolicy);
    if (settings.maxBufferedSeconds !== undefined) handler.setMaxBufferedSeconds(settings.maxBufferedSeconds);
    if (settings.defaultWriteSync !== undefined) handler.setDefaultWriteSync(settings.defaultWriteSync);

    await handler.whenIdle();
    return reply.status(202).send({ accepted: true, settings: handler.getStatus().settings });
  });
}
