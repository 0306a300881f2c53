import { z } from 'zod';
import { booleanVar, hostVar, loadEnvConfig, portVar, stringVar, type EnvSource } from '@tidemark/shared';
import { parseDatePattern } from '../time/datePattern';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type ServerConfig = {
  host: string;
  port: number;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  webhookSecret: string | null;
};

export type StoreCredentials = {
  ingestUrl: string | null;
  clientId: string | null;
  clientSecret: string | null;
  tenantId: string | null;
};

export type IngestConfig = {
  credentials: StoreCredentials;
  database: string;
  table: string;
  /** Raw configured value; resolved to a mapping kind when a command is built. */
  mappingKind: string | null;
  mappingReference: string;
  minimumDate: Date;
  minimumDatePattern: string;
  pathDateMarker: string;
  pathDatePattern: string;
  blacklist: string;
  deleteSourceOnSuccess: boolean;
  accessTokenSuffix: string;
};

const DEFAULT_DATE_PATTERN = 'yyyy-MM-dd';
const DEFAULT_BLACKLIST = 'azuretmpfolder';

const serverEnvSchema = z.object({
  HOST: hostVar({ defaultHost: '0.0.0.0' }),
  PORT: portVar({ defaultPort: 4320 }),
  LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true }).refine(
    (value) => value === undefined || LOG_LEVELS.some((level) => level === value),
    { message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}` }
  ),
  INGEST_METRICS_ENABLED: booleanVar({ defaultValue: true }),
  INGEST_WEBHOOK_SECRET: stringVar()
});

const ingestEnvSchema = z
  .object({
    KUSTO_INGEST_URL: stringVar(),
    KUSTO_CLIENT_ID: stringVar(),
    KUSTO_CLIENT_SECRET: stringVar(),
    KUSTO_TENANT_ID: stringVar(),
    KUSTO_DATABASE: stringVar({ required: true }),
    KUSTO_TABLE: stringVar({ required: true }),
    KUSTO_MAPPING_KIND: stringVar(),
    KUSTO_MAPPING_REF: stringVar({ required: true }),
    INGEST_MIN_DATE: stringVar({ required: true }),
    INGEST_MIN_DATE_PATTERN: stringVar({ defaultValue: DEFAULT_DATE_PATTERN, trim: false }),
    INGEST_PATH_DATE_MARKER: stringVar({ required: true, trim: false }),
    INGEST_PATH_DATE_PATTERN: stringVar({ defaultValue: DEFAULT_DATE_PATTERN, trim: false }),
    INGEST_BLACKLIST: stringVar({ defaultValue: DEFAULT_BLACKLIST }),
    INGEST_DELETE_SOURCE_ON_SUCCESS: booleanVar({ defaultValue: false }),
    INGEST_SOURCE_ACCESS_TOKEN: stringVar({ trim: false })
  })
  .transform((env, ctx) => {
    const raw = env.INGEST_MIN_DATE ?? '';
    const pattern = env.INGEST_MIN_DATE_PATTERN ?? DEFAULT_DATE_PATTERN;
    const minimumDate = parseDatePattern(raw, pattern);
    if (!minimumDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['INGEST_MIN_DATE'],
        message: `'${raw}' does not match the pattern '${pattern}'`
      });
      return z.NEVER;
    }
    return { ...env, minimumDate };
  });

export function loadServerConfig(env?: EnvSource): ServerConfig {
  const parsed = loadEnvConfig(serverEnvSchema, { env, context: 'ingest-dispatcher:server' });
  const logLevel = LOG_LEVELS.find((level) => level === parsed.LOG_LEVEL) ?? 'info';
  return {
    host: parsed.HOST ?? '0.0.0.0',
    port: parsed.PORT ?? 4320,
    logLevel,
    metricsEnabled: parsed.INGEST_METRICS_ENABLED ?? true,
    webhookSecret: parsed.INGEST_WEBHOOK_SECRET ?? null
  } satisfies ServerConfig;
}

/**
 * Reads the ingest settings afresh on every call. The client initializer keeps
 * the first configuration that produced a working client for the rest of the
 * process lifetime.
 */
export function loadIngestConfig(env?: EnvSource): IngestConfig {
  const parsed = loadEnvConfig(ingestEnvSchema, { env, context: 'ingest-dispatcher:ingest' });

  return {
    credentials: {
      ingestUrl: parsed.KUSTO_INGEST_URL ?? null,
      clientId: parsed.KUSTO_CLIENT_ID ?? null,
      clientSecret: parsed.KUSTO_CLIENT_SECRET ?? null,
      tenantId: parsed.KUSTO_TENANT_ID ?? null
    },
    database: parsed.KUSTO_DATABASE ?? '',
    table: parsed.KUSTO_TABLE ?? '',
    mappingKind: parsed.KUSTO_MAPPING_KIND ?? null,
    mappingReference: parsed.KUSTO_MAPPING_REF ?? '',
    minimumDate: parsed.minimumDate,
    minimumDatePattern: parsed.INGEST_MIN_DATE_PATTERN ?? DEFAULT_DATE_PATTERN,
    pathDateMarker: parsed.INGEST_PATH_DATE_MARKER ?? '',
    pathDatePattern: parsed.INGEST_PATH_DATE_PATTERN ?? DEFAULT_DATE_PATTERN,
    blacklist: parsed.INGEST_BLACKLIST ?? DEFAULT_BLACKLIST,
    deleteSourceOnSuccess: parsed.INGEST_DELETE_SOURCE_ON_SUCCESS ?? false,
    accessTokenSuffix: parsed.INGEST_SOURCE_ACCESS_TOKEN ?? ''
  } satisfies IngestConfig;
}
