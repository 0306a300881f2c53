import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { IngestConfig } from '../src/config/serviceConfig';
import type { Notification } from '../src/events/notification';
import type { IngestClient, IngestCommand } from '../src/ingest/types';

export const OBJECT_URL = 'https://acct.blob.core.windows.net/c/date=2023-06-01/part-0.json';

export function createTestLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export function buildIngestConfig(overrides: Partial<IngestConfig> = {}): IngestConfig {
  return {
    credentials: {
      ingestUrl: 'https://ingest-test.example.net',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      tenantId: 'test-tenant'
    },
    database: 'telemetry',
    table: 'events',
    mappingKind: 'json',
    mappingReference: 'events_json_mapping',
    minimumDate: new Date('2023-01-01T00:00:00.000Z'),
    minimumDatePattern: 'yyyy-MM-dd',
    pathDateMarker: 'date=',
    pathDatePattern: 'yyyy-MM-dd',
    blacklist: 'azuretmpfolder',
    deleteSourceOnSuccess: false,
    accessTokenSuffix: '',
    ...overrides
  };
}

export function buildNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    id: 'evt-1',
    eventKind: 'Microsoft.Storage.BlobCreated',
    objectUrl: OBJECT_URL,
    contentLength: 1024,
    raw: {},
    ...overrides
  };
}

export class RecordingIngestClient implements IngestClient {
  readonly commands: IngestCommand[] = [];
  failure: Error | null = null;

  async ingestFromStorage(command: IngestCommand): Promise<void> {
    this.commands.push(command);
    if (this.failure) {
      throw this.failure;
    }
  }
}
