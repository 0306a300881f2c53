export type Notification = {
  readonly id: string;
  readonly eventKind: string;
  /** Object URL as delivered, still percent-encoded. */
  readonly objectUrl: string;
  readonly contentLength: number;
  readonly raw: unknown;
};
