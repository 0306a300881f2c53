import type { FastifyBaseLogger } from 'fastify';
import type { IngestConfig, StoreCredentials } from '../config/serviceConfig';
import { toError } from '../errors';
import type { DispatchMetrics } from '../observability/metrics';
import type {
  CompleteStoreCredentials,
  IngestClient,
  IngestClientFactory,
  IngestConfigProvider
} from './types';

export type InitializerState = 'uninitialized' | 'ready';

export type NotReadyReason = 'configuration-invalid' | 'configuration-missing' | 'client-unavailable';

export type Readiness =
  | { status: 'ready'; client: IngestClient; config: IngestConfig }
  | { status: 'not-ready'; reason: NotReadyReason; missing?: (keyof StoreCredentials)[]; error?: Error };

export type IngestClientInitializerOptions = {
  loadConfig: IngestConfigProvider;
  createClient: IngestClientFactory;
  logger: FastifyBaseLogger;
  metrics?: DispatchMetrics;
};

const REQUIRED_CREDENTIALS: (keyof StoreCredentials)[] = ['ingestUrl', 'clientId', 'clientSecret', 'tenantId'];

function findMissingCredentials(credentials: StoreCredentials): (keyof StoreCredentials)[] {
  return REQUIRED_CREDENTIALS.filter((key) => {
    const value = credentials[key];
    return !value || value.trim().length === 0;
  });
}

function toCompleteCredentials(credentials: StoreCredentials): CompleteStoreCredentials | null {
  const { ingestUrl, clientId, clientSecret, tenantId } = credentials;
  if (!ingestUrl || !clientId || !clientSecret || !tenantId) {
    return null;
  }
  return { ingestUrl, clientId, clientSecret, tenantId };
}

/**
 * Owns the single ingest client of the process. The client is built on the first
 * successful `ensureReady()` call; failed attempts leave the initializer
 * uninitialized so the next notification tries again.
 */
export class IngestClientInitializer {
  private readonly options: IngestClientInitializerOptions;
  private session: { client: IngestClient; config: IngestConfig } | null = null;
  private lock: Promise<void> = Promise.resolve();

  constructor(options: IngestClientInitializerOptions) {
    this.options = options;
  }

  state(): InitializerState {
    return this.session ? 'ready' : 'uninitialized';
  }

  /** Configuration the live client was built with, once there is one. */
  currentConfig(): Readonly<IngestConfig> | null {
    return this.session?.config ?? null;
  }

  async ensureReady(): Promise<Readiness> {
    const release = await this.acquireLock();
    try {
      if (this.session) {
        return { status: 'ready', ...this.session };
      }
      return this.initialize();
    } finally {
      release();
    }
  }

  private initialize(): Readiness {
    const { logger, metrics } = this.options;

    let config: IngestConfig;
    try {
      config = this.options.loadConfig();
    } catch (err) {
      const error = toError(err);
      logger.error({ err: error }, 'ingest configuration is invalid, cannot initialize the ingest client');
      metrics?.recordInitialization('configuration-invalid');
      return { status: 'not-ready', reason: 'configuration-invalid', error };
    }

    const missing = findMissingCredentials(config.credentials);
    const credentials = toCompleteCredentials(config.credentials);
    if (missing.length > 0 || !credentials) {
      logger.error(
        {
          missing,
          ingestUrl: config.credentials.ingestUrl,
          clientId: config.credentials.clientId,
          tenantId: config.credentials.tenantId
        },
        'could not initialize the ingest client because connection parameters are missing'
      );
      metrics?.recordInitialization('configuration-missing');
      return { status: 'not-ready', reason: 'configuration-missing', missing };
    }

    let client: IngestClient | null;
    try {
      client = this.options.createClient(credentials);
    } catch (err) {
      const error = toError(err);
      logger.warn({ err: error }, 'ingest client construction failed');
      metrics?.recordInitialization('client-unavailable');
      return { status: 'not-ready', reason: 'client-unavailable', error };
    }

    if (!client) {
      logger.warn('ingest client factory returned no client');
      metrics?.recordInitialization('client-unavailable');
      return { status: 'not-ready', reason: 'client-unavailable' };
    }

    this.session = { client, config };
    logger.info({ ingestUrl: credentials.ingestUrl, database: config.database, table: config.table }, 'ingest client initialized');
    metrics?.recordInitialization('ready');
    return { status: 'ready', client, config };
  }

  private async acquireLock(): Promise<() => void> {
    const existing = this.lock;
    let release!: () => void;
    this.lock = existing.then(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );

    await existing;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      release();
    };
  }
}
