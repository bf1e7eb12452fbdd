/**
 * Error taxonomy shared by the batch and stream pipelines.
 *
 * `retriable` tells the orchestrator and the consumer loop whether the next tick
 * (or redelivery) may succeed without operator action.
 */
export class SyncError extends Error {
  readonly retriable: boolean;

  constructor(message: string, retriable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
    this.retriable = retriable;
  }
}

/** Source, destination, broker or Connect endpoint unreachable. */
export class ConnectionError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
    this.name = "ConnectionError";
  }
}

/** An extraction query or a load write exceeded its bound. */
export class TimeoutError extends ConnectionError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The source rejected an extraction query. */
export class SourceQueryError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
    this.name = "SourceQueryError";
  }
}

/** The destination rejected a write. Nothing of the batch counts as committed. */
export class WriteError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
    this.name = "WriteError";
  }
}

/** A change event could not be parsed or validated. */
export class DecodeError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, false, options);
    this.name = "DecodeError";
  }
}

/** Missing or invalid required setting. Fatal at startup. */
export class ConfigurationError extends SyncError {
  constructor(message: string) {
    super(message, false);
    this.name = "ConfigurationError";
  }
}

export const isRetriable = (error: unknown): boolean =>
  error instanceof SyncError ? error.retriable : true;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Node socket error codes that mean the peer could not be reached. */
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
  "EAI_AGAIN",
]);

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === "string" ? code : undefined;
};

export const isConnectionFailure = (error: unknown): boolean => {
  const code = errorCode(error);
  return code !== undefined && CONNECTION_CODES.has(code);
};
