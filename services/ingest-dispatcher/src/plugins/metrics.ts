import fp from 'fastify-plugin';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

declare module 'fastify' {
  interface FastifyInstance {
    metrics: {
      registry: Registry;
      enabled: boolean;
    };
  }

  interface FastifyRequest {
    metricsStart?: bigint;
  }
}

type MetricsPluginOptions = {
  enabled: boolean;
  registry: Registry;
};

export const metricsPlugin = fp<MetricsPluginOptions>(async (app, options) => {
  const { registry, enabled } = options;

  app.decorate('metrics', { registry, enabled });

  if (!enabled) {
    app.get('/metrics', async (_request, reply) => {
      return reply.code(503).type('text/plain').send('metrics disabled');
    });
    return;
  }

  collectDefaultMetrics({ register: registry, prefix: 'ingest_dispatcher_' });

  const httpRequestsTotal = new Counter({
    name: 'ingest_dispatcher_http_requests_total',
    help: 'Total number of HTTP requests received by the ingest dispatcher',
    labelNames: ['method', 'route', 'status'],
    registers: [registry]
  });

  const httpRequestDurationSeconds = new Histogram({
    name: 'ingest_dispatcher_http_request_duration_seconds',
    help: 'Duration of HTTP requests processed by the ingest dispatcher',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry]
  });

  app.addHook('onRequest', async (request) => {
    request.metricsStart = process.hrtime.bigint();
  });

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions?.url ?? request.raw.url ?? 'unknown';
    const status = String(reply.statusCode);
    httpRequestsTotal.labels(request.method, route, status).inc();

    const start = request.metricsStart;
    if (start) {
      const durationSeconds = Number(process.hrtime.bigint() - start) / 1_000_000_000;
      httpRequestDurationSeconds.labels(request.method, route, status).observe(durationSeconds);
    }
  });

  app.get('/metrics', async (_request, reply) => {
    reply.type('text/plain; version=0.0.4');
    return registry.metrics();
  });
});
