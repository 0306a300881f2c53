import { Counter, type Registry } from 'prom-client';
import type { DispatchOutcome } from '../dispatcher';
import type { NotReadyReason } from '../ingest/clientInitializer';

type InitializationResult = 'ready' | NotReadyReason;

export interface DispatchMetrics {
  readonly enabled: boolean;
  recordOutcome(outcome: DispatchOutcome): void;
  recordInitialization(result: InitializationResult): void;
}

export interface DispatchMetricsOptions {
  enabled: boolean;
  registry?: Registry | null;
  prefix?: string;
}

const DEFAULT_PREFIX = 'ingest_dispatcher_';

function outcomeReason(outcome: DispatchOutcome): string {
  switch (outcome.status) {
    case 'skipped':
      return outcome.reason;
    case 'failed':
      return outcome.stage;
    case 'submitted':
      return 'none';
  }
}

export function createDispatchMetrics(options: DispatchMetricsOptions): DispatchMetrics {
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const registers = options.registry ? [options.registry] : [];

  const notifications = options.enabled
    ? new Counter({
        name: `${prefix}notifications_total`,
        help: 'Storage notifications handled grouped by outcome and reason',
        labelNames: ['outcome', 'reason'],
        registers
      })
    : null;

  const initializations = options.enabled
    ? new Counter({
        name: `${prefix}client_initializations_total`,
        help: 'Ingest client initialization attempts grouped by result',
        labelNames: ['result'],
        registers
      })
    : null;

  return {
    enabled: options.enabled,
    recordOutcome(outcome) {
      notifications?.labels(outcome.status, outcomeReason(outcome)).inc();
    },
    recordInitialization(result) {
      initializations?.labels(result).inc();
    }
  };
}
