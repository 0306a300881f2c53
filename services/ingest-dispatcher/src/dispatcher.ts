import type { FastifyBaseLogger } from 'fastify';
import type { Notification } from './events/notification';
import { evaluateNotification, type RejectReason } from './filter/eventFilter';
import { buildIngestCommand } from './ingest/commandBuilder';
import type { IngestClientInitializer, NotReadyReason } from './ingest/clientInitializer';
import type { IngestCommand } from './ingest/types';
import type { DispatchMetrics } from './observability/metrics';
import { toError } from './errors';

export type DispatchOutcome =
  | { status: 'skipped'; reason: RejectReason }
  | { status: 'submitted'; command: IngestCommand }
  | { status: 'failed'; stage: 'initialize'; reason: NotReadyReason; error: Error }
  | { status: 'failed'; stage: 'submit'; error: Error };

export type DispatcherOptions = {
  initializer: IngestClientInitializer;
  logger: FastifyBaseLogger;
  metrics?: DispatchMetrics;
};

export class Dispatcher {
  private readonly options: DispatcherOptions;

  constructor(options: DispatcherOptions) {
    this.options = options;
  }

  async dispatch(notification: Notification): Promise<DispatchOutcome> {
    const outcome = await this.run(notification);
    this.options.metrics?.recordOutcome(outcome);
    return outcome;
  }

  private async run(notification: Notification): Promise<DispatchOutcome> {
    const logger = this.options.logger.child({ eventId: notification.id });

    const readiness = await this.options.initializer.ensureReady();
    if (readiness.status === 'not-ready') {
      logger.error({ reason: readiness.reason }, 'could not initialize, cancelling request');
      return {
        status: 'failed',
        stage: 'initialize',
        reason: readiness.reason,
        error: readiness.error ?? new Error(`Ingest client is not ready (${readiness.reason})`)
      };
    }

    const { client, config } = readiness;
    const decision = evaluateNotification(notification, {
      blacklist: config.blacklist,
      minimumDate: config.minimumDate,
      pathDateMarker: config.pathDateMarker,
      pathDatePattern: config.pathDatePattern,
      logger
    });
    if (!decision.accepted) {
      return { status: 'skipped', reason: decision.reason };
    }

    const command = buildIngestCommand({
      config,
      timestamp: decision.timestamp,
      objectUrl: decision.objectUrl,
      contentLength: notification.contentLength
    });

    logger.trace(
      {
        objectUrl: decision.objectUrl,
        sizeBytes: command.sourceSizeBytes,
        creationTime: decision.timestamp.toISOString()
      },
      'submitting ingest command'
    );

    try {
      await client.ingestFromStorage(command);
    } catch (err) {
      const error = toError(err);
      logger.error({ err: error, objectUrl: decision.objectUrl }, 'error while submitting object for ingestion');
      return { status: 'failed', stage: 'submit', error };
    }

    logger.info({ objectUrl: decision.objectUrl, table: command.table }, 'ingestion queued');
    return { status: 'submitted', command };
  }
}
