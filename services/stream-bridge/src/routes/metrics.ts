import type { FastifyInstance } from "fastify";
import { metricsHandler, type Registry } from "@epg-link/metrics";

interface MetricsDeps {
  registry: Registry;
}

export function registerMetricsRoute(app: FastifyInstance, deps: MetricsDeps): void {
  const { registry } = deps;

  app.get("/metrics", async (_request, reply) => {
    const body = await metricsHandler(registry);
    return reply.type(registry.contentType).send(body);
  });
}
