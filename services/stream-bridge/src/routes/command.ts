import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { CommandRequestSchema } from "@epg-link/schemas";
import { commandForSetting } from "@epg-link/driver-ble-line";
import type { StreamBridge } from "../core/bridge";

interface CommandDeps {
  bridge: StreamBridge;
}

export function registerCommandRoute(app: FastifyInstance, deps: CommandDeps): void {
  const { bridge } = deps;

  app.post("/device/command", async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const parsed = CommandRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "Invalid command request", issues: parsed.error.issues });
    }
    if (!bridge.accepting) {
      return reply.status(409).send({ error: "Bridge is shutting down" });
    }

    const command = parsed.data;
    let text: string;
    if ("setting" in command) {
      const mapped = commandForSetting(command.setting.key, command.setting.value);
      if (mapped === null) {
        return reply.status(400).send({
          error: `Unsupported value for ${command.setting.key}: ${String(command.setting.value)}`
        });
      }
      text = mapped;
    } else {
      text = command.text;
    }

    bridge.handler.sendCommand(text, command.tag, command.sync);
    return reply.status(202).send({ accepted: true, command: text, tag: command.tag });
  });
}
