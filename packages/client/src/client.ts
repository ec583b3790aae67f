import {
  LlmError,
  getCodec,
  getVendor,
  streamChatChunks,
  type ChatRequest,
  type ChatResponse,
  type ModelListing,
  type ProtocolCodec,
  type RequestTarget,
  type StreamChunk,
  type VendorId,
  type VendorProfile,
} from '@llm-unify/core';
import type { LlmUnifyConfig } from './config.js';
import { FetchTransport, TRANSPORT_HEADERS, type HttpRequest, type HttpResponse, type HttpTransport } from './transport.js';

export const DEFAULT_TIMEOUT_MS = 60_000;

export interface ChatClientOptions {
  vendor: VendorId;
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Sent with every request; must not collide with codec or transport headers */
  headers?: Record<string, string>;
  transport?: HttpTransport;
  /** Log one `[llm-unify]` line per request */
  debug?: boolean;
}

export interface CallOptions {
  signal?: AbortSignal;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * One vendor, one set of credentials. Every call builds the request with
 * the vendor's codec and sends it through the transport.
 */
export class ChatClient {
  readonly vendor: VendorProfile;
  private readonly codec: ProtocolCodec;
  private readonly target: RequestTarget;
  private readonly transport: HttpTransport;
  private readonly extraHeaders: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly debug: boolean;

  constructor(options: ChatClientOptions) {
    this.vendor = getVendor(options.vendor);
    this.codec = getCodec(this.vendor);

    const apiKey = options.apiKey?.trim() || undefined;
    if (this.vendor.requiresApiKey && !apiKey) {
      throw new LlmError(`${this.vendor.displayName} requires an API key`, 'config', { vendor: this.vendor.id });
    }

    this.target = {
      vendor: this.vendor,
      credentials: apiKey ? { apiKey } : {},
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    };
    this.extraHeaders = this.validateHeaders(options.headers ?? {});
    this.transport = options.transport ?? new FetchTransport();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.debug = options.debug ?? false;
  }

  /**
   * Build a client from loaded configuration. `vendor` defaults to the
   * configured default vendor; `overrides` win over the file.
   */
  static fromConfig(
    config: LlmUnifyConfig,
    vendor: VendorId = config.defaultVendor,
    overrides: Partial<Omit<ChatClientOptions, 'vendor'>> = {},
  ): ChatClient {
    const settings = config.providers[vendor] ?? {};
    return new ChatClient({
      vendor,
      apiKey: settings.apiKey,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs ?? config.timeoutMs,
      headers: settings.headers,
      debug: config.debug,
      ...overrides,
    });
  }

  async chat(request: ChatRequest, options: CallOptions = {}): Promise<ChatResponse> {
    const response = await this.send(request, false, options);
    const body = await response.text();
    if (!isSuccess(response.status)) {
      throw this.codec.parseError(response.status, body, this.vendor.id);
    }
    return this.codec.parseResponse(body, { vendor: this.vendor.id, model: request.model });
  }

  /**
   * Stream the response as canonical chunks. The sequence ends with one
   * `finish` chunk or throws an `LlmError`. Breaking out of the loop
   * cancels the underlying HTTP body.
   */
  async *chatStream(request: ChatRequest, options: CallOptions = {}): AsyncGenerator<StreamChunk> {
    const response = await this.send(request, true, options);
    if (!isSuccess(response.status)) {
      throw this.codec.parseError(response.status, await response.text(), this.vendor.id);
    }
    yield* streamChatChunks(response.body(), this.codec.createEventMapper(this.vendor.id));
  }

  /**
   * Model ids the vendor offers to this key. Vendors without a listing
   * endpoint throw an `unsupported` error before any request is sent.
   */
  async listModels(options: CallOptions = {}): Promise<string[]> {
    const listing = this.modelListing();
    const wire = listing.request(this.target);

    if (this.debug) {
      console.debug(`[llm-unify] ${this.vendor.id} GET ${wire.url}`);
    }

    const response = await this.transport.send({
      method: 'GET',
      url: wire.url,
      headers: { ...wire.headers, ...this.extraHeaders },
      stream: false,
      timeoutMs: this.timeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
    });
    const body = await response.text();
    if (!isSuccess(response.status)) {
      throw this.codec.parseError(response.status, body, this.vendor.id);
    }
    return listing.parse(body, this.vendor.id);
  }

  private modelListing(): ModelListing {
    if (!this.vendor.listsModels || !this.codec.models) {
      throw new LlmError(`${this.vendor.displayName} does not support model listing`, 'unsupported', {
        vendor: this.vendor.id,
      });
    }
    return this.codec.models;
  }

  private async send(request: ChatRequest, stream: boolean, options: CallOptions): Promise<HttpResponse> {
    const wire = this.codec.buildRequest(request, this.target, stream);
    const httpRequest: HttpRequest = {
      ...wire,
      headers: { ...wire.headers, ...this.extraHeaders },
      stream,
      timeoutMs: this.timeoutMs,
      ...(options.signal ? { signal: options.signal } : {}),
    };

    if (this.debug) {
      console.debug(`[llm-unify] ${this.vendor.id} POST ${wire.url} model=${request.model} stream=${stream}`);
    }

    return this.transport.send(httpRequest);
  }

  /**
   * Lower-case caller headers and reject any that would silently replace a
   * header the codec or the transport sets.
   */
  private validateHeaders(headers: Record<string, string>): Record<string, string> {
    const reserved = new Set<string>([
      ...TRANSPORT_HEADERS,
      ...Object.keys(this.codec.authHeaders({ apiKey: 'placeholder' })),
      ...Object.keys(this.codec.protocolHeaders(true)),
      ...Object.keys(this.codec.protocolHeaders(false)),
    ]);

    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers)) {
      const lower = name.toLowerCase();
      if (reserved.has(lower)) {
        throw new LlmError(`Header "${name}" collides with a header set for ${this.vendor.id}`, 'config', {
          vendor: this.vendor.id,
        });
      }
      if (lower in result) {
        throw new LlmError(`Header "${name}" is given more than once`, 'config', { vendor: this.vendor.id });
      }
      result[lower] = value;
    }
    return result;
  }
}
