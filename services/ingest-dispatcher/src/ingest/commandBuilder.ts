import type { IngestConfig } from '../config/serviceConfig';
import type { ParsedTimestamp } from '../time/timeExtractor';
import { resolveMappingKind } from './mappingKind';
import type { IngestCommand } from './types';

/** Ingestion property the store uses as the creation time of the new extent. */
export const CREATION_TIME_PROPERTY = 'creationTime';

export type BuildIngestCommandInput = {
  config: IngestConfig;
  timestamp: ParsedTimestamp;
  objectUrl: string;
  contentLength: number;
};

export function buildIngestCommand(input: BuildIngestCommandInput): IngestCommand {
  const { config, timestamp, objectUrl, contentLength } = input;
  const stamp = timestamp.toISOString();

  return {
    database: config.database,
    table: config.table,
    mappingKind: resolveMappingKind(config.mappingKind),
    mappingReference: config.mappingReference,
    // The access token already carries its own query-string prefix.
    sourceUrl: `${objectUrl}${config.accessTokenSuffix}`,
    sourceSizeBytes: contentLength,
    deleteSourceOnSuccess: config.deleteSourceOnSuccess,
    tags: [stamp],
    additionalProperties: {
      [CREATION_TIME_PROPERTY]: stamp
    }
  };
}
