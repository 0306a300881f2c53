import { z } from 'zod';
import { DispatcherError } from '../errors';
import type { Notification } from './notification';

export const SUBSCRIPTION_VALIDATION_EVENT = 'Microsoft.EventGrid.SubscriptionValidationEvent';

const eventGridEventSchema = z
  .object({
    id: z.string().min(1),
    eventType: z.string().min(1),
    subject: z.string().optional(),
    eventTime: z.string().optional(),
    topic: z.string().optional(),
    data: z.unknown().optional()
  })
  .passthrough();

const cloudEventSchema = z
  .object({
    specversion: z.string().min(1),
    id: z.string().min(1),
    type: z.string().min(1),
    source: z.string().min(1),
    subject: z.string().optional(),
    time: z.string().optional(),
    data: z.unknown().optional()
  })
  .passthrough();

const storageEventDataSchema = z
  .object({
    url: z.string().optional(),
    contentLength: z.number().int().nonnegative().optional()
  })
  .passthrough();

const validationDataSchema = z
  .object({
    validationCode: z.string().min(1)
  })
  .passthrough();

type IncomingEvent = { id: string; type: string; data: unknown; raw: unknown };

export type EventDelivery =
  | { kind: 'validation'; validationCode: string }
  | { kind: 'notifications'; notifications: Notification[] };

function normalizeEvent(candidate: unknown, index: number): IncomingEvent {
  const asCloudEvent = cloudEventSchema.safeParse(candidate);
  if (asCloudEvent.success) {
    const event = asCloudEvent.data;
    return { id: event.id, type: event.type, data: event.data, raw: candidate };
  }
  const asEventGrid = eventGridEventSchema.safeParse(candidate);
  if (asEventGrid.success) {
    const event = asEventGrid.data;
    return { id: event.id, type: event.eventType, data: event.data, raw: candidate };
  }
  throw new DispatcherError('Event payload is neither an Event Grid event nor a CloudEvent', 'INVALID_EVENT_PAYLOAD', {
    index,
    issues: asEventGrid.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
  });
}

function toNotification(event: IncomingEvent): Notification {
  const data = storageEventDataSchema.safeParse(event.data ?? {});
  if (!data.success) {
    throw new DispatcherError(`Event ${event.id} carries malformed storage data`, 'INVALID_EVENT_PAYLOAD', {
      id: event.id,
      issues: data.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    });
  }
  return {
    id: event.id,
    eventKind: event.type,
    objectUrl: data.data.url ?? '',
    contentLength: data.data.contentLength ?? 0,
    raw: event.raw
  };
}

/**
 * Reads a webhook body in either Event Grid or CloudEvents 1.0 form, single or
 * batched. A delivery that carries a subscription validation event is answered
 * as a handshake and nothing in it is dispatched.
 */
export function parseEventDelivery(body: unknown): EventDelivery {
  const candidates = Array.isArray(body) ? body : [body];
  if (candidates.length === 0) {
    throw new DispatcherError('Event delivery is empty', 'INVALID_EVENT_PAYLOAD');
  }

  const events = candidates.map((candidate, index) => normalizeEvent(candidate, index));

  const validation = events.find((event) => event.type === SUBSCRIPTION_VALIDATION_EVENT);
  if (validation) {
    const data = validationDataSchema.safeParse(validation.data);
    if (!data.success) {
      throw new DispatcherError('Subscription validation event is missing its validation code', 'INVALID_EVENT_PAYLOAD');
    }
    return { kind: 'validation', validationCode: data.data.validationCode };
  }

  return { kind: 'notifications', notifications: events.map(toNotification) };
}
