import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import { Registry } from 'prom-client';
import { loadIngestConfig, loadServerConfig, type ServerConfig } from './config/serviceConfig';
import { Dispatcher } from './dispatcher';
import { IngestClientInitializer } from './ingest/clientInitializer';
import { createLoggerOptions } from './logger';
import { createKustoIngestClient } from './ingest/kustoClient';
import type { IngestClientFactory, IngestConfigProvider } from './ingest/types';
import { createDispatchMetrics } from './observability/metrics';
import { metricsPlugin } from './plugins/metrics';
import { registerEventRoutes } from './routes/events';
import { registerSystemRoutes } from './routes/system';

export type BuildAppOptions = {
  config?: ServerConfig;
  logger?: FastifyBaseLogger;
  loadConfig?: IngestConfigProvider;
  createClient?: IngestClientFactory;
};

export async function buildApp(options?: BuildAppOptions): Promise<{
  app: FastifyInstance;
  config: ServerConfig;
  initializer: IngestClientInitializer;
  dispatcher: Dispatcher;
}> {
  const config = options?.config ?? loadServerConfig();
  const app: FastifyInstance = options?.logger
    ? Fastify({ logger: options.logger })
    : Fastify({ logger: createLoggerOptions(config.logLevel) });

  const registry = new Registry();
  await app.register(metricsPlugin, { enabled: config.metricsEnabled, registry });
  const metrics = createDispatchMetrics({ enabled: app.metrics.enabled, registry: app.metrics.registry });

  const coreLogger = app.log.child({ component: 'dispatcher' });
  const initializer = new IngestClientInitializer({
    loadConfig: options?.loadConfig ?? (() => loadIngestConfig()),
    createClient:
      options?.createClient ?? ((credentials) => createKustoIngestClient(credentials, coreLogger.child({ component: 'kusto' }))),
    logger: coreLogger,
    metrics
  });
  const dispatcher = new Dispatcher({ initializer, logger: coreLogger, metrics });

  await registerSystemRoutes(app, { initializer });
  await registerEventRoutes(app, { dispatcher, webhookSecret: config.webhookSecret });

  return { app, config, initializer, dispatcher };
}
