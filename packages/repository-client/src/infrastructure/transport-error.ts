export type TransportErrorDetails = {
  url: string;
  status: number | null;
  cause?: unknown;
};

export class TransportError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "TransportError";
    this.url = details.url;
    this.status = details.status;
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : "Unknown transport error";
