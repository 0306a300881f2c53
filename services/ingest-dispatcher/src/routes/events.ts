import { timingSafeEqual } from 'node:crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Dispatcher, DispatchOutcome } from '../dispatcher';
import { DispatcherError } from '../errors';
import { parseEventDelivery } from '../events/eventGrid';

export type EventRouteDependencies = {
  dispatcher: Dispatcher;
  webhookSecret: string | null;
};

type OutcomeSummary = {
  id: string;
  status: DispatchOutcome['status'];
  reason?: string;
  error?: string;
};

function summarize(id: string, outcome: DispatchOutcome): OutcomeSummary {
  switch (outcome.status) {
    case 'skipped':
      return { id, status: outcome.status, reason: outcome.reason };
    case 'submitted':
      return { id, status: outcome.status };
    case 'failed':
      return { id, status: outcome.status, reason: outcome.stage, error: outcome.error.message };
  }
}

function secretsMatch(expected: string, provided: string): boolean {
  const expectedBuffer = Buffer.from(expected);
  const providedBuffer = Buffer.from(provided);
  return expectedBuffer.length === providedBuffer.length && timingSafeEqual(expectedBuffer, providedBuffer);
}

function readProvidedSecret(request: FastifyRequest): string | null {
  const header = request.headers['x-webhook-secret'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  const query = request.query;
  if (query && typeof query === 'object' && 'code' in query && typeof query.code === 'string') {
    return query.code;
  }
  return null;
}

function sendError(reply: FastifyReply, statusCode: number, error: string, message: string) {
  return reply.status(statusCode).send({ error, message });
}

export async function registerEventRoutes(app: FastifyInstance, deps: EventRouteDependencies): Promise<void> {
  const authorize = (request: FastifyRequest): void => {
    if (!deps.webhookSecret) {
      return;
    }
    const provided = readProvidedSecret(request);
    if (!provided || !secretsMatch(deps.webhookSecret, provided)) {
      throw new DispatcherError('Webhook secret is missing or invalid', 'UNAUTHORIZED');
    }
  };

  // CloudEvents webhook abuse-protection handshake.
  app.options('/api/events', async (request, reply) => {
    const origin = request.headers['webhook-request-origin'];
    if (typeof origin !== 'string' || origin.length === 0) {
      return sendError(reply, 400, 'invalid_request', 'WebHook-Request-Origin header is required');
    }
    reply.header('WebHook-Allowed-Origin', origin);
    reply.header('WebHook-Allowed-Rate', '*');
    return reply.status(200).send();
  });

  app.post('/api/events', async (request, reply) => {
    try {
      authorize(request);
      const delivery = parseEventDelivery(request.body);

      if (delivery.kind === 'validation') {
        request.log.info('answering event subscription validation');
        return reply.status(200).send({ validationResponse: delivery.validationCode });
      }

      const outcomes = await Promise.all(
        delivery.notifications.map(async (notification) =>
          summarize(notification.id, await deps.dispatcher.dispatch(notification))
        )
      );

      // Any failure fails the whole delivery so the event source redelivers it.
      const failed = outcomes.some((outcome) => outcome.status === 'failed');
      return reply.status(failed ? 500 : 200).send({ outcomes });
    } catch (err) {
      if (err instanceof DispatcherError) {
        if (err.code === 'UNAUTHORIZED') {
          return sendError(reply, 401, 'unauthorized', err.message);
        }
        request.log.warn({ err, details: err.details }, 'rejected malformed event delivery');
        return sendError(reply, 400, 'invalid_event_payload', err.message);
      }
      throw err;
    }
  });
}
