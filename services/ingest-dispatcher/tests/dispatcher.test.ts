import test from 'node:test';
import assert from 'node:assert/strict';
import { Registry } from 'prom-client';
import { Dispatcher } from '../src/dispatcher';
import { IngestClientInitializer } from '../src/ingest/clientInitializer';
import { createDispatchMetrics, type DispatchMetrics } from '../src/observability/metrics';
import type { IngestConfig } from '../src/config/serviceConfig';
import { buildIngestConfig, buildNotification, createTestLogger, RecordingIngestClient } from './testUtils';

function createDispatcher(config: IngestConfig, metrics?: DispatchMetrics) {
  const client = new RecordingIngestClient();
  const logger = createTestLogger();
  const initializer = new IngestClientInitializer({
    loadConfig: () => config,
    createClient: () => client,
    logger,
    metrics
  });
  return { dispatcher: new Dispatcher({ initializer, logger, metrics }), client };
}

test('skips objects under the blacklisted folder', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(
    buildNotification({ objectUrl: 'https://acct.blob.core.windows.net/c/azuretmpfolder/data/2023-06-01_001.json' })
  );
  assert.deepEqual(outcome, { status: 'skipped', reason: 'blacklisted-path' });
  assert.equal(client.commands.length, 0);
});

test('skips blacklisted objects whose url also carries a malformed escape', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(
    buildNotification({ objectUrl: 'https://acct.blob.core.windows.net/c/azure%74mpfolder/date=2023-06-01/100%.json' })
  );
  assert.deepEqual(outcome, { status: 'skipped', reason: 'blacklisted-path' });
  assert.equal(client.commands.length, 0);
});

test('skips event kinds other than object creation once the client is ready', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(buildNotification({ eventKind: 'Microsoft.Storage.BlobDeleted' }));
  assert.deepEqual(outcome, { status: 'skipped', reason: 'unsupported-event-kind' });
  assert.equal(client.commands.length, 0);
});

test('skips objects whose path carries no readable date', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(
    buildNotification({ objectUrl: 'https://acct.blob.core.windows.net/c/part-0.json' })
  );
  assert.deepEqual(outcome, { status: 'skipped', reason: 'stale-object' });
  assert.equal(client.commands.length, 0);
});

test('submits an object newer than the minimum date', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(buildNotification());

  assert.equal(outcome.status, 'submitted');
  assert.ok(outcome.status === 'submitted');
  assert.equal(outcome.command.mappingReference, 'events_json_mapping');
  assert.deepEqual(outcome.command.tags, ['2023-06-01T00:00:00.000Z']);
  assert.equal(outcome.command.sourceSizeBytes, 1024);
  assert.deepEqual(client.commands, [outcome.command]);
});

test('skips an object older than the minimum date', async () => {
  const { dispatcher, client } = createDispatcher(
    buildIngestConfig({ minimumDate: new Date('2024-01-01T00:00:00.000Z') })
  );
  const outcome = await dispatcher.dispatch(buildNotification());
  assert.deepEqual(outcome, { status: 'skipped', reason: 'stale-object' });
  assert.equal(client.commands.length, 0);
});

test('submits with the json mapping when the mapping kind is unrecognised', async () => {
  const { dispatcher } = createDispatcher(buildIngestConfig({ mappingKind: 'xml' }));
  const outcome = await dispatcher.dispatch(buildNotification());

  assert.ok(outcome.status === 'submitted');
  assert.equal(outcome.command.mappingKind, 'json');
  assert.equal(outcome.command.mappingReference, 'events_json_mapping');
});

test('skips the zero-length created event', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  const outcome = await dispatcher.dispatch(buildNotification({ contentLength: 0 }));
  assert.deepEqual(outcome, { status: 'skipped', reason: 'empty-object-event' });
  assert.equal(client.commands.length, 0);
});

test('reports a failed submission', async () => {
  const { dispatcher, client } = createDispatcher(buildIngestConfig());
  client.failure = new Error('ingestion queue rejected the message');

  const outcome = await dispatcher.dispatch(buildNotification());

  assert.ok(outcome.status === 'failed');
  assert.equal(outcome.stage, 'submit');
  assert.equal(outcome.error.message, 'ingestion queue rejected the message');
});

test('fails without filtering when the client cannot be initialized', async () => {
  const { dispatcher } = createDispatcher(
    buildIngestConfig({
      credentials: { ingestUrl: null, clientId: null, clientSecret: null, tenantId: null }
    })
  );

  const outcome = await dispatcher.dispatch(buildNotification({ eventKind: 'Microsoft.Storage.BlobDeleted' }));

  assert.ok(outcome.status === 'failed' && outcome.stage === 'initialize');
  assert.equal(outcome.reason, 'configuration-missing');
  assert.equal(outcome.error.message, 'Ingest client is not ready (configuration-missing)');
});

test('counts outcomes and initializations', async () => {
  const registry = new Registry();
  const metrics = createDispatchMetrics({ enabled: true, registry, prefix: 'test_' });
  const { dispatcher } = createDispatcher(buildIngestConfig(), metrics);

  await dispatcher.dispatch(buildNotification());
  await dispatcher.dispatch(buildNotification({ contentLength: 0 }));

  const notifications = await registry.getSingleMetric('test_notifications_total')?.get();
  assert.deepEqual(
    notifications?.values.map((entry) => ({ labels: entry.labels, value: entry.value })),
    [
      { labels: { outcome: 'submitted', reason: 'none' }, value: 1 },
      { labels: { outcome: 'skipped', reason: 'empty-object-event' }, value: 1 }
    ]
  );

  const initializations = await registry.getSingleMetric('test_client_initializations_total')?.get();
  assert.deepEqual(
    initializations?.values.map((entry) => ({ labels: entry.labels, value: entry.value })),
    [{ labels: { result: 'ready' }, value: 1 }]
  );
});

test('disabled metrics register nothing', () => {
  const registry = new Registry();
  const metrics = createDispatchMetrics({ enabled: false, registry });
  metrics.recordInitialization('ready');
  assert.equal(registry.getMetricsAsArray().length, 0);
});
