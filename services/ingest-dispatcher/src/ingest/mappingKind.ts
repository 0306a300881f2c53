export const MAPPING_KINDS = ['json', 'csv', 'avro'] as const;

export type MappingKind = (typeof MAPPING_KINDS)[number];

export const DEFAULT_MAPPING_KIND: MappingKind = 'json';

function isMappingKind(value: string): value is MappingKind {
  return MAPPING_KINDS.some((kind) => kind === value);
}

export function resolveMappingKind(raw: string | null | undefined): MappingKind {
  const normalized = raw?.trim().toLowerCase() ?? '';
  if (isMappingKind(normalized)) {
    return normalized;
  }
  // Unknown or missing kinds ingest with the json mapping.
  return DEFAULT_MAPPING_KIND;
}
