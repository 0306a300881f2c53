export type DispatcherErrorCode = 'INVALID_EVENT_PAYLOAD' | 'UNAUTHORIZED';

export class DispatcherError extends Error {
  public readonly code: DispatcherErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: DispatcherErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DispatcherError';
    this.code = code;
    this.details = details;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

