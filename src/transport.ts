/**
 * HTTP plumbing shared by every backend adapter.
 *
 * Each call runs under a hard timeout enforced with an AbortController, and
 * every failure leaves this module as one of the three chat error kinds:
 *   - the timer fired                    -> TimeoutError
 *   - fetch rejected (refused, DNS, ...) -> ConnectionFailureError
 *   - non-2xx status or unreadable body  -> UnexpectedFailureError
 */

import {
  ChatError,
  ConnectionFailureError,
  TimeoutError,
  UnexpectedFailureError,
  errorMessage
} from './errors';

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export type ResponseBody = NonNullable<Response['body']>;

function describeFetchError(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return errorMessage(error);
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 300);
  } catch (error) {
    return `<unreadable body: ${errorMessage(error)}>`;
  }
}

/**
 * Send one request and hand the successful response to `read`. The timeout
 * covers both the request and reading the body.
 */
export async function request<T>(
  url: string,
  options: RequestOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method ?? 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...options.headers
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal
      });
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(options.timeoutMs, { cause: error });
      }
      throw new ConnectionFailureError(`Connection to ${url} failed: ${describeFetchError(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await readErrorBody(response);
      if (timedOut) {
        throw new TimeoutError(options.timeoutMs);
      }
      throw new UnexpectedFailureError(`HTTP ${response.status}: ${errorText}`, { status: response.status });
    }

    try {
      return await read(response);
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(options.timeoutMs, { cause: error });
      }
      if (error instanceof ChatError) {
        throw error;
      }
      throw new UnexpectedFailureError(`Invalid response from ${url}: ${errorMessage(error)}`, { cause: error });
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Yield the non-empty lines of a streamed body (newline-delimited JSON).
 */
export async function* readLines(stream: ResponseBody): AsyncGenerator<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder('utf-8');
  let buffer = '';
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) yield trimmed;
      }
    }

    buffer += decoder.decode();
    if (buffer.trim()) {
      yield buffer.trim();
    }
  } finally {
    if (!finished) {
      // Close the body when the consumer stops early. A body that already
      // errored rejects here with the error that is propagating anyway.
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}
