import type { SSEEvent } from '../types/provider.js';
import { SSEParser } from './sse-parser.js';

export type ByteSource = AsyncIterable<Uint8Array | string>;

/**
 * Decode a byte stream into SSE events as they complete.
 *
 * Errors raised by the source propagate unchanged. Data still buffered when
 * the source ends without a terminating blank line is dropped.
 */
export async function* readSSEEvents(source: ByteSource): AsyncGenerator<SSEEvent> {
  const parser = new SSEParser();
  const decoder = new TextDecoder();

  for await (const chunk of source) {
    const text = typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    for (const event of parser.feed(text)) {
      yield event;
    }
  }

  const tail = decoder.decode();
  if (tail) {
    for (const event of parser.feed(tail)) {
      yield event;
    }
  }
}
