import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { DeviceTargetSchema } from "@epg-link/schemas";
import type { StreamBridge } from "../core/bridge";

interface ConnectionDeps {
  bridge: StreamBridge;
}

export function registerConnectionRoutes(app: FastifyInstance, deps: ConnectionDeps): void {
  const { bridge } = deps;

  app.post("/device/connect", async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = DeviceTargetSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid connect request", issues: parsed.error.issues });
    }
    if (!bridge.accepting) {
      return reply.status(409).send({ error: "Bridge is shutting down" });
    }

    const { address, notifyCharacteristicId, writeCharacteristicId } = parsed.data;
    bridge.handler.connect(address, notifyCharacteristicId, writeCharacteristicId);
    return reply.status(202).send({ accepted: true, address });
  });

  app.post("/device/disconnect", async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!bridge.accepting) {
      return reply.status(409).send({ error: "Bridge is shutting down" });
    }
    bridge.handler.disconnect();
    return reply.status(202).send({ accepted: true });
  });
}
