import type { FastifyBaseLogger } from 'fastify';
import { parseDatePattern } from './datePattern';

const MIN_TIME_MS = -8_640_000_000_000_000;

export type ParsedTimestamp = Date;

/**
 * Stand-in for a timestamp that could not be read from an object path. It is the
 * earliest instant a `Date` can hold, so any staleness cutoff rejects it.
 */
export function unparsedTimestamp(): ParsedTimestamp {
  return new Date(MIN_TIME_MS);
}

export function isUnparsedTimestamp(value: Date): boolean {
  return value.getTime() === MIN_TIME_MS;
}

export type TimestampRule = {
  marker: string;
  pattern: string;
};

/**
 * Reads the timestamp that follows the first occurrence of `rule.marker` in the
 * object URL. The text after the marker is cut to the length of the pattern and
 * parsed strictly; the sentinel is returned when the marker is missing or the
 * text does not parse.
 *
 * A marker that also appears earlier in the path as part of an unrelated segment
 * wins over the real date segment. The slice width counts every pattern
 * character, so path patterns cannot use quoted or escaped literals.
 */
export function extractTimestamp(objectUrl: string, rule: TimestampRule, logger?: FastifyBaseLogger): ParsedTimestamp {
  const { marker, pattern } = rule;
  if (!marker || !objectUrl) {
    logger?.error({ objectUrl, marker }, 'object url does not contain the date marker');
    return unparsedTimestamp();
  }

  const markerIndex = objectUrl.indexOf(marker);
  if (markerIndex === -1) {
    logger?.error({ objectUrl, marker }, 'object url does not contain the date marker');
    return unparsedTimestamp();
  }

  const start = markerIndex + marker.length;
  const candidate = objectUrl.slice(start, start + pattern.length);
  const parsed = parseDatePattern(candidate, pattern);
  if (!parsed) {
    logger?.error({ objectUrl, candidate, pattern }, 'path timestamp could not be parsed');
    return unparsedTimestamp();
  }
  return parsed;
}
