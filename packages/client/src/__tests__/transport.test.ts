import { describe, it, expect, vi, afterEach } from 'vitest';
import { ReadableStream } from 'node:stream/web';
import { FetchTransport, finalizeHeaders, type HttpRequest } from '../transport.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function httpRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    method: 'POST',
    url: 'https://llm.example.com/v1/chat',
    headers: { authorization: 'Bearer test-secret' },
    body: '{"model":"m"}',
    stream: false,
    ...overrides,
  };
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe('finalizeHeaders', () => {
  it('lower-cases names and adds the body headers', () => {
    expect(finalizeHeaders({ 'X-Api-Key': 'test-secret' }, false)).toEqual({
      'x-api-key': 'test-secret',
      'content-type': 'application/json',
      accept: 'application/json',
    });
    expect(finalizeHeaders({}, true).accept).toBe('text/event-stream');
  });

  it('rejects transport-owned headers', () => {
    expect(() => finalizeHeaders({ 'Content-Type': 'text/plain' }, false))
      .toThrow(expect.objectContaining({ kind: 'config' }));
    expect(() => finalizeHeaders({ Host: 'elsewhere' }, false))
      .toThrow(expect.objectContaining({ kind: 'config' }));
  });

  it('rejects a name given twice in different case', () => {
    expect(() => finalizeHeaders({ 'X-Trace': 'a', 'x-trace': 'b' }, false))
      .toThrow(expect.objectContaining({ kind: 'config', message: 'Header "x-trace" is set more than once' }));
  });
});

describe('FetchTransport', () => {
  it('posts the request and reads the whole body', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"ok":true}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchTransport().send(httpRequest());

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('{"ok":true}');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.example.com/v1/chat');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"model":"m"}');
    expect(init?.headers).toEqual({
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
      accept: 'application/json',
    });
  });

  it('sends a GET without a body or content-type', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{"data":[]}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new FetchTransport().send(httpRequest({ method: 'GET', url: 'https://llm.example.com/v1/models', body: undefined }));

    const [, init] = fetchMock.mock.calls[0];
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({ authorization: 'Bearer test-secret', accept: 'application/json' });
  });

  it('returns error statuses without throwing', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"error":"nope"}', { status: 429 })));

    const response = await new FetchTransport().send(httpRequest());

    expect(response.status).toBe(429);
    expect(await response.text()).toBe('{"error":"nope"}');
  });

  it('streams body bytes in order', async () => {
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('data: 1\n\n'));
        controller.enqueue(encoder.encode('data: 2\n\n'));
        controller.close();
      },
    });
    vi.stubGlobal('fetch', vi.fn(async () => new Response(stream, { status: 200 })));

    const response = await new FetchTransport().send(httpRequest({ stream: true }));
    let text = '';
    for await (const chunk of response.body()) {
      text += decoder.decode(chunk, { stream: true });
    }

    expect(text).toBe('data: 1\n\ndata: 2\n\n');
  });

  it('cancels the body when the consumer stops early', async () => {
    const cancel = vi.fn();
    let sent = 0;
    const stream = new ReadableStream<Uint8Array>({
      pull(controller) {
        sent++;
        controller.enqueue(encoder.encode(`data: ${sent}\n\n`));
      },
      cancel,
    });
    vi.stubGlobal('fetch', vi.fn(async () => new Response(stream, { status: 200 })));

    const response = await new FetchTransport().send(httpRequest({ stream: true }));
    for await (const chunk of response.body()) {
      expect(decoder.decode(chunk)).toBe('data: 1\n\n');
      break;
    }

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('aborts a stream being read when the caller aborts', async () => {
    let fetchSignal: AbortSignal | undefined;
    vi.stubGlobal('fetch', vi.fn(async (_url: string, init?: RequestInit) => {
      fetchSignal = init?.signal ?? undefined;
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode('data: 1\n\n'));
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted by caller')));
        },
      });
      return new Response(stream, { status: 200 });
    }));
    const controller = new AbortController();

    const response = await new FetchTransport().send(
      httpRequest({ stream: true, signal: controller.signal, timeoutMs: 60_000 }),
    );
    const received: string[] = [];
    const reading = (async () => {
      for await (const chunk of response.body()) {
        received.push(decoder.decode(chunk));
        controller.abort();
      }
    })();

    await expect(reading).rejects.toMatchObject({ kind: 'transport' });
    expect(fetchSignal?.aborted).toBe(true);
    expect(received).toEqual(['data: 1\n\n']);
  });

  it('throws a transport error when the connection fails', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    await expect(new FetchTransport().send(httpRequest())).rejects.toMatchObject({
      kind: 'transport',
      message: 'Request to https://llm.example.com/v1/chat failed: fetch failed',
    });
  });

  it('throws a timeout error when the response head does not arrive in time', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
    })));

    await expect(new FetchTransport().send(httpRequest({ timeoutMs: 20 }))).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Request to https://llm.example.com/v1/chat timed out after 20ms',
    });
  });

  it('reports a caller abort as a transport error', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted by caller')));
    })));
    const controller = new AbortController();

    const pending = new FetchTransport().send(httpRequest({ signal: controller.signal, timeoutMs: 60_000 }));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: 'transport' });
  });

  it('rejects a streamed response without a body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(null, { status: 200 })));

    const response = await new FetchTransport().send(httpRequest({ stream: true }));

    expect(() => response.body()).toThrow(expect.objectContaining({ kind: 'transport' }));
  });
});
