import type { FastifyBaseLogger } from 'fastify';
import { KustoConnectionStringBuilder } from 'azure-kusto-data';
import {
  BlobDescriptor,
  DataFormat,
  IngestionMappingKind,
  IngestionProperties,
  IngestClient as QueuedIngestClient
} from 'azure-kusto-ingest';
import type { MappingKind } from './mappingKind';
import type { CompleteStoreCredentials, IngestClient, IngestCommand } from './types';

const MAPPING_FORMATS: Record<MappingKind, { format: DataFormat; mappingKind: IngestionMappingKind }> = {
  json: { format: DataFormat.JSON, mappingKind: IngestionMappingKind.JSON },
  csv: { format: DataFormat.CSV, mappingKind: IngestionMappingKind.CSV },
  avro: { format: DataFormat.AVRO, mappingKind: IngestionMappingKind.AVRO }
};

export function toIngestionProperties(command: IngestCommand): IngestionProperties {
  const { format, mappingKind } = MAPPING_FORMATS[command.mappingKind];
  return new IngestionProperties({
    database: command.database,
    table: command.table,
    format,
    ingestionMappingKind: mappingKind,
    ingestionMappingReference: command.mappingReference,
    additionalTags: [...command.tags],
    additionalProperties: { ...command.additionalProperties }
  });
}

/** The part of the queued ingest client the dispatcher calls. */
export type BlobIngestor = {
  ingestFromBlob(blob: BlobDescriptor, properties: IngestionProperties): Promise<unknown>;
};

export class KustoIngestClient implements IngestClient {
  private readonly ingestor: BlobIngestor;
  private readonly logger: FastifyBaseLogger;
  private retentionNoticeLogged = false;

  constructor(ingestor: BlobIngestor, logger: FastifyBaseLogger) {
    this.ingestor = ingestor;
    this.logger = logger;
  }

  async ingestFromStorage(command: IngestCommand): Promise<void> {
    if (command.deleteSourceOnSuccess && !this.retentionNoticeLogged) {
      // The queued ingestion message always asks the service to retain the source blob.
      this.logger.warn('queued ingestion keeps source blobs; use a storage lifecycle rule to remove ingested objects');
      this.retentionNoticeLogged = true;
    }
    const blob = new BlobDescriptor(command.sourceUrl, command.sourceSizeBytes);
    await this.ingestor.ingestFromBlob(blob, toIngestionProperties(command));
  }
}

export function createKustoIngestClient(credentials: CompleteStoreCredentials, logger: FastifyBaseLogger): IngestClient {
  const connection = KustoConnectionStringBuilder.withAadApplicationKeyAuthentication(
    credentials.ingestUrl,
    credentials.clientId,
    credentials.clientSecret,
    credentials.tenantId
  );
  return new KustoIngestClient(new QueuedIngestClient(connection), logger);
}
