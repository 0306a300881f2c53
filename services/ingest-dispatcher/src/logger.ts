import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: { service: 'ingest-dispatcher' },
  timestamp: stdTimeFunctions.isoTime
});
