/**
 * @epg-link/metrics
 *
 * Prometheus instrumentation shared by the link services: request metrics for
 * the HTTP surface and stream counters for a StreamHandler.
 */

import { register, collectDefaultMetrics, Registry, Counter, Histogram } from 'prom-client';
import type { FastifyRequest, FastifyReply } from 'fastify';

export { Registry, register };

export const DEFAULT_METRICS_PREFIX = 'epglink';

export interface MetricsConfig {
  /** Service name (used as label) */
  serviceName: string;
  /** Whether to collect default Node.js process metrics */
  collectDefaultMetrics?: boolean;
  /** Defaults to the global registry */
  registry?: Registry;
  prefix?: string;
}

export class HttpMetrics {
  private readonly requestsTotal: Counter<'service' | 'method' | 'route' | 'status_code'>;
  private readonly requestDuration: Histogram<'service' | 'method' | 'route' | 'status_code'>;

  constructor(config: MetricsConfig) {
    const registry = config.registry ?? register;
    const prefix = config.prefix ?? DEFAULT_METRICS_PREFIX;

    this.requestsTotal = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'Total number of HTTP requests',
      labelNames: ['service', 'method', 'route', 'status_code'],
      registers: [registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      labelNames: ['service', 'method', 'route', 'status_code'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
      registers: [registry],
    });
  }

  /**
   * onRequest hook; the sample is recorded once the response finishes.
   */
  hook(serviceName: string) {
    return async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
      const route = request.routeOptions.url ?? request.url;
      const method = request.method;
      const end = this.requestDuration.startTimer({ service: serviceName, method, route });

      reply.raw.on('finish', () => {
        const statusCode = reply.statusCode.toString();
        end({ status_code: statusCode });
        this.requestsTotal.inc({ service: serviceName, method, route, status_code: statusCode });
      });
    };
  }
}

export function initializeMetrics(config: MetricsConfig): HttpMetrics {
  const registry = config.registry ?? register;

  if (config.collectDefaultMetrics !== false) {
    collectDefaultMetrics({
      register: registry,
      prefix: `${config.prefix ?? DEFAULT_METRICS_PREFIX}_`,
      labels: { service: config.serviceName },
    });
  }

  return new HttpMetrics(config);
}

/**
 * Handler for /metrics endpoint
 */
export async function metricsHandler(registry: Registry = register): Promise<string> {
  return registry.metrics();
}

export { createCounter, createGauge } from './helpers';
export * from './stream-metrics';
