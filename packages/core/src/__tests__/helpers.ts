import type { StreamChunk } from '../types/events.js';

const encoder = new TextEncoder();

/** Yield each piece as UTF-8 bytes, in order. */
export async function* bytes(...pieces: string[]): AsyncGenerator<Uint8Array> {
  for (const piece of pieces) {
    yield encoder.encode(piece);
  }
}

/** Frame JSON payloads as data-only SSE events. */
export function sseData(...payloads: unknown[]): string {
  return payloads
    .map(p => `data: ${typeof p === 'string' ? p : JSON.stringify(p)}\n\n`)
    .join('');
}

/** Frame payloads as tagged SSE events, using each payload's `type` as the tag. */
export function sseTagged(...payloads: Array<{ type: string; [key: string]: unknown }>): string {
  return payloads.map(p => `event: ${p.type}\ndata: ${JSON.stringify(p)}\n\n`).join('');
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

export function textOf(chunks: StreamChunk[]): string {
  return chunks.map(c => (c.type === 'text_delta' ? c.text : '')).join('');
}
