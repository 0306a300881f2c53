import type { FastifyBaseLogger } from 'fastify';
import type { Notification } from '../events/notification';
import { extractTimestamp, type ParsedTimestamp } from '../time/timeExtractor';

export const BLOB_CREATED_EVENT = 'Microsoft.Storage.BlobCreated';

export type RejectReason = 'unsupported-event-kind' | 'blacklisted-path' | 'stale-object' | 'empty-object-event';

export type FilterDecision =
  | { accepted: true; objectUrl: string; timestamp: ParsedTimestamp }
  | { accepted: false; reason: RejectReason };

export type EventFilterOptions = {
  blacklist: string;
  minimumDate: Date;
  pathDateMarker: string;
  pathDatePattern: string;
  logger: FastifyBaseLogger;
};

const ESCAPE_RUN = /(?:%[0-9A-Fa-f]{2})+/g;

function utf8SequenceLength(leadByte: number): number {
  if (leadByte >= 0xf0) {
    return 4;
  }
  if (leadByte >= 0xe0) {
    return 3;
  }
  return leadByte >= 0xc0 ? 2 : 1;
}

function decodeEscapeRun(run: string): string {
  const escapes = run.match(/%[0-9A-Fa-f]{2}/g) ?? [];
  let decoded = '';
  let index = 0;
  while (index < escapes.length) {
    const length = utf8SequenceLength(Number.parseInt(escapes[index].slice(1), 16));
    const sequence = escapes.slice(index, index + length).join('');
    try {
      decoded += decodeURIComponent(sequence);
      index += length;
    } catch {
      // Not a valid UTF-8 sequence; keep this byte encoded and resume after it.
      decoded += escapes[index];
      index += 1;
    }
  }
  return decoded;
}

/**
 * Percent-decodes an object URL one run of escapes at a time. A malformed
 * escape such as a bare `%` stays as received and does not stop the rest of the
 * URL from being decoded.
 */
export function decodeObjectUrl(objectUrl: string): string {
  return objectUrl.replace(ESCAPE_RUN, decodeEscapeRun);
}

/**
 * Runs the ingestion guards in order and stops at the first one that rejects.
 * Rejections are the normal outcome for most of the event stream and are only
 * logged.
 */
export function evaluateNotification(notification: Notification, options: EventFilterOptions): FilterDecision {
  const { logger } = options;

  if (notification.eventKind !== BLOB_CREATED_EVENT) {
    logger.warn({ eventKind: notification.eventKind }, 'event kind is not supported');
    return { accepted: false, reason: 'unsupported-event-kind' };
  }

  const objectUrl = decodeObjectUrl(notification.objectUrl);
  logger.trace({ objectUrl }, 'object url found');

  if (options.blacklist && objectUrl.includes(options.blacklist)) {
    logger.info({ objectUrl, blacklist: options.blacklist }, 'nothing to ingest, the object path is blacklisted');
    return { accepted: false, reason: 'blacklisted-path' };
  }

  const timestamp = extractTimestamp(
    objectUrl,
    { marker: options.pathDateMarker, pattern: options.pathDatePattern },
    logger
  );

  // An unreadable path date is the earliest instant and always fails this check.
  if (timestamp.getTime() < options.minimumDate.getTime()) {
    logger.warn(
      { objectUrl, minimumDate: options.minimumDate.toISOString(), timestamp: timestamp.toISOString() },
      'object is older than the configured minimum date'
    );
    return { accepted: false, reason: 'stale-object' };
  }

  if (notification.contentLength === 0) {
    // Storage raises BlobCreated once at zero length and again when the write completes.
    logger.warn({ objectUrl }, 'ignoring created event for an empty object');
    return { accepted: false, reason: 'empty-object-event' };
  }

  return { accepted: true, objectUrl, timestamp };
}
