export type ErrorKind = 'unsupported_model' | 'timeout' | 'connection' | 'unexpected' | 'persistence';

export class BenchError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * The codename is unknown, or its identifier does not match any provider.
 * Raised before any request is made.
 */
export class UnsupportedModelError extends BenchError {
  constructor(message: string) {
    super('unsupported_model', message);
  }
}

/** Base for the three outcomes a chat call can fail with. */
export class ChatError extends BenchError {}

export class TimeoutError extends ChatError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super('timeout', `Request timed out after ${timeoutMs}ms`, options);
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionFailureError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
  }
}

export class UnexpectedFailureError extends ChatError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('unexpected', message, options);
    this.status = options?.status;
  }
}

export class PersistenceFailureError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('persistence', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Anything that is not already a chat error becomes an unexpected failure. */
export function toChatError(error: unknown): ChatError {
  if (error instanceof ChatError) {
    return error;
  }
  return new UnexpectedFailureError(errorMessage(error), { cause: error });
}
