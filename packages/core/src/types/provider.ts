import type { ChatRequest } from './messages.js';
import type { ChatResponse } from './response.js';
import type { VendorEvent } from './events.js';
import type { LlmError } from '../errors.js';

export interface SSEEvent {
  event?: string;
  data: string;
}

export type ProtocolId = 'openai' | 'anthropic' | 'gemini' | 'aliyun';

export type VendorId =
  | 'openai'
  | 'deepseek'
  | 'moonshot'
  | 'zhipu'
  | 'volcengine'
  | 'ollama'
  | 'anthropic'
  | 'gemini'
  | 'aliyun';

export type ImageSupport = 'full' | 'inline_only' | 'none';

export interface VendorProfile {
  id: VendorId;
  displayName: string;
  protocol: ProtocolId;
  defaultBaseUrl: string;
  images: ImageSupport;
  /** False only for local servers that accept unauthenticated requests */
  requiresApiKey: boolean;
  /** The vendor serves a model list through its protocol's listing endpoint */
  listsModels: boolean;
}

export interface Credentials {
  apiKey?: string;
}

export interface RequestTarget {
  vendor: VendorProfile;
  /** Overrides the vendor's default base URL */
  baseUrl?: string;
  credentials: Credentials;
}

/**
 * A request ready for the transport. Header names are lower-case and never
 * include content-type, which the transport derives from the body.
 */
export interface WireRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: string;
}

/** A GET for the vendor's model list */
export interface ModelsRequest {
  url: string;
  headers: Record<string, string>;
}

export interface ModelListing {
  request(target: RequestTarget): ModelsRequest;
  /** Model ids as the chat endpoint accepts them */
  parse(body: string, vendor: VendorId): string[];
}

export interface ResponseContext {
  vendor: VendorId;
  /** The requested model, used when the vendor does not echo one */
  model: string;
}

export interface VendorEventMapper {
  readonly protocol: ProtocolId;
  map(event: SSEEvent): VendorEvent[];
}

export interface ProtocolCodec {
  readonly protocol: ProtocolId;
  buildRequest(request: ChatRequest, target: RequestTarget, stream: boolean): WireRequest;
  authHeaders(credentials: Credentials): Record<string, string>;
  /** Headers the protocol needs beyond authentication (API version, SSE switches). */
  protocolHeaders(stream: boolean): Record<string, string>;
  parseResponse(body: string, context: ResponseContext): ChatResponse;
  parseError(status: number, body: string, vendor: VendorId): LlmError;
  /** A fresh mapper; its state belongs to exactly one stream. */
  createEventMapper(vendor: VendorId): VendorEventMapper;
  /** Absent for protocols without a model-list endpoint */
  readonly models?: ModelListing;
}
