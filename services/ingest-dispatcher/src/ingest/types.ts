import type { IngestConfig, StoreCredentials } from '../config/serviceConfig';
import type { MappingKind } from './mappingKind';

export type IngestCommand = {
  database: string;
  table: string;
  mappingKind: MappingKind;
  mappingReference: string;
  sourceUrl: string;
  sourceSizeBytes: number;
  deleteSourceOnSuccess: boolean;
  tags: string[];
  additionalProperties: Record<string, string>;
};

/**
 * Queued ingestion into the analytical store. Resolves once the store has
 * accepted the command into its ingestion queue, not when the data is loaded.
 */
export interface IngestClient {
  ingestFromStorage(command: IngestCommand): Promise<void>;
}

export type CompleteStoreCredentials = {
  [K in keyof StoreCredentials]: NonNullable<StoreCredentials[K]>;
};

export type IngestClientFactory = (credentials: CompleteStoreCredentials) => IngestClient | null;

export type IngestConfigProvider = () => IngestConfig;
