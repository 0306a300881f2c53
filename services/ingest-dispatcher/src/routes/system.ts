import type { FastifyInstance } from 'fastify';
import type { IngestClientInitializer } from '../ingest/clientInitializer';
import { resolveMappingKind } from '../ingest/mappingKind';

export type SystemRouteDependencies = {
  initializer: IngestClientInitializer;
};

export async function registerSystemRoutes(app: FastifyInstance, deps: SystemRouteDependencies): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/status', async () => {
    const config = deps.initializer.currentConfig();
    return {
      client: deps.initializer.state(),
      ingest: config
        ? {
            ingestUrl: config.credentials.ingestUrl,
            database: config.database,
            table: config.table,
            mappingKind: resolveMappingKind(config.mappingKind),
            mappingReference: config.mappingReference,
            minimumDate: config.minimumDate.toISOString(),
            pathDateMarker: config.pathDateMarker,
            pathDatePattern: config.pathDatePattern,
            blacklist: config.blacklist,
            deleteSourceOnSuccess: config.deleteSourceOnSuccess
          }
        : null
    };
  });
}
