/**
 * HTTP transport for vendor requests. The codecs describe what to send;
 * the transport owns the wire: body encoding headers, timeouts, and
 * releasing the connection when a consumer stops reading a stream.
 */

import type { ReadableStream } from 'node:stream/web';
import { LlmError } from '@llm-unify/core';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  /** JSON text; absent for GET */
  body?: string;
  stream: boolean;
  /** Covers connecting and receiving the response head; for non-streaming requests also reading the body */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  /** Read the whole body as text. For error responses and non-streaming calls. */
  text(): Promise<string>;
  /** Body bytes in arrival order. Returning early cancels the underlying reader. */
  body(): AsyncIterable<Uint8Array>;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/** Headers only the transport may set */
export const TRANSPORT_HEADERS: readonly string[] = ['content-type', 'accept', 'content-length', 'host'];

/**
 * Lower-case header names and add the transport's own headers. A name that
 * appears twice (in any case) or collides with a transport header is a
 * configuration error.
 */
export function finalizeHeaders(
  headers: Record<string, string>,
  stream: boolean,
  hasBody = true,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (TRANSPORT_HEADERS.includes(lower)) {
      throw new LlmError(`Header "${name}" is set by the transport and cannot be overridden`, 'config');
    }
    if (lower in result) {
      throw new LlmError(`Header "${name}" is set more than once`, 'config');
    }
    result[lower] = value;
  }

  if (hasBody) result['content-type'] = 'application/json';
  result.accept = stream ? 'text/event-stream' : 'application/json';
  return result;
}

interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  /** Stop the timer; the caller's signal still aborts the request */
  clearTimer(): void;
  /** Stop the timer and detach from the caller's signal */
  clear(): void;
}

function createDeadline(timeoutMs: number | undefined, outer: AbortSignal | undefined): Deadline {
  const controller = new AbortController();
  let expired = false;

  const onOuterAbort = () => controller.abort(outer?.reason);
  if (outer) {
    if (outer.aborted) controller.abort(outer.reason);
    else outer.addEventListener('abort', onOuterAbort, { once: true });
  }

  const timer = timeoutMs !== undefined && timeoutMs > 0
    ? setTimeout(() => {
      expired = true;
      controller.abort();
    }, timeoutMs)
    : undefined;

  const clearTimer = () => {
    if (timer !== undefined) clearTimeout(timer);
  };

  return {
    signal: controller.signal,
    timedOut: () => expired,
    clearTimer,
    clear: () => {
      clearTimer();
      outer?.removeEventListener('abort', onOuterAbort);
    },
  };
}

function toTransportError(err: unknown, url: string, deadline: Deadline, timeoutMs: number | undefined): LlmError {
  if (err instanceof LlmError) return err;
  if (deadline.timedOut()) {
    return new LlmError(`Request to ${url} timed out after ${timeoutMs}ms`, 'timeout', { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new LlmError(`Request to ${url} failed: ${message}`, 'transport', { cause: err });
}

async function* readBody(
  body: ReadableStream<Uint8Array>,
  onError: (err: unknown) => LlmError,
  onClose: () => void,
): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        break;
      }
      yield value;
    }
  } catch (err) {
    finished = true;
    throw onError(err);
  } finally {
    if (!finished) {
      // Consumer stopped early; release the connection
      await reader.cancel().catch((err: unknown) => {
        console.debug('[transport] body cancel failed:', err);
      });
    }
    reader.releaseLock();
    onClose();
  }
}

/**
 * Transport over the global fetch.
 */
export class FetchTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const deadline = createDeadline(request.timeoutMs, request.signal);
    const fail = (err: unknown) => toTransportError(err, request.url, deadline, request.timeoutMs);

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: finalizeHeaders(request.headers, request.stream, request.body !== undefined),
        body: request.body,
        signal: deadline.signal,
      });
    } catch (err) {
      deadline.clear();
      throw fail(err);
    }

    // The timeout does not cover reading a stream; the caller's signal does
    if (request.stream) deadline.clearTimer();

    return {
      status: response.status,
      text: async () => {
        try {
          return await response.text();
        } catch (err) {
          throw fail(err);
        } finally {
          deadline.clear();
        }
      },
      body: () => {
        if (!response.body) {
          deadline.clear();
          throw new LlmError(`Response from ${request.url} has no body`, 'transport');
        }
        return readBody(response.body, fail, deadline.clear);
      },
    };
  }
}
