import type { ContentBlock, Message, ToolCall } from '../types/messages.js';
import type { TokenUsage } from '../types/response.js';
import type { ImageSupport, RequestTarget, VendorId } from '../types/provider.js';
import { LlmError, errorKindFromStatus, errorKindFromVendorType, excerpt, type LlmErrorKind } from '../errors.js';
import { getRecords, getString, isRecord, tryParseJson, type JsonRecord } from '../utils/json.js';

export function resolveBaseUrl(target: RequestTarget): string {
  const base = target.baseUrl ?? target.vendor.defaultBaseUrl;
  return base.replace(/\/+$/, '');
}

export function bearerAuth(apiKey: string | undefined): Record<string, string> {
  return apiKey ? { authorization: `Bearer ${apiKey}` } : {};
}

/**
 * Text stand-in for an image block a vendor cannot accept.
 */
export function imagePlaceholder(block: ContentBlock): string {
  switch (block.type) {
    case 'image_url':
      return `[image: ${block.url}]`;
    case 'image_data':
      return `[image: ${block.mediaType}]`;
    default:
      return '';
  }
}

export function canSendImage(block: ContentBlock, images: ImageSupport): boolean {
  if (block.type === 'image_url') return images === 'full';
  if (block.type === 'image_data') return images !== 'none';
  return false;
}

/**
 * Flatten a message to one string. Images become placeholders.
 */
export function flattenContent(content: readonly ContentBlock[]): string {
  return content
    .map(block => (block.type === 'text' ? block.text : imagePlaceholder(block)))
    .filter(part => part !== '')
    .join('\n');
}

export function hasImages(message: Message): boolean {
  return message.content.some(block => block.type !== 'text');
}

export function dataUrl(mediaType: string, data: string): string {
  return `data:${mediaType};base64,${data}`;
}

/**
 * Tool-call arguments as an object, for vendors that take structured input
 * rather than the raw JSON text.
 */
export function parseArguments(call: ToolCall, vendor: VendorId): JsonRecord {
  if (call.function.arguments.trim() === '') return {};
  const parsed = tryParseJson(call.function.arguments);
  if (!parsed.ok || !isRecord(parsed.value)) {
    throw new LlmError(
      `Arguments of tool call ${call.id} (${call.function.name}) are not a JSON object`,
      'invalid_request',
      { vendor },
    );
  }
  return parsed.value;
}

/**
 * Arguments as JSON text. Most vendors send a string; a few send the object.
 */
export function argumentsText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return JSON.stringify(value);
}

/**
 * Merge adjacent messages that share a role. Used for vendors that
 * require strict user/assistant alternation.
 */
export function mergeAdjacentByRole<T extends { role: string }>(
  messages: T[],
  merge: (into: T, from: T) => void,
): T[] {
  const result: T[] = [];
  for (const message of messages) {
    const last = result[result.length - 1];
    if (last && last.role === message.role) {
      merge(last, message);
    } else {
      result.push(message);
    }
  }
  return result;
}

export function makeUsage(prompt: number | undefined, completion: number | undefined, total?: number): TokenUsage {
  const promptTokens = prompt ?? 0;
  const completionTokens = completion ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: total ?? promptTokens + completionTokens,
  };
}

/**
 * Parse a complete response body. Invalid JSON (or JSON that is not an
 * object) is a malformed response; missing fields are not.
 */
export function parseJsonBody(body: string, vendor: VendorId): JsonRecord {
  const parsed = tryParseJson(body);
  if (!parsed.ok || !isRecord(parsed.value)) {
    throw new LlmError(`${vendor}: response body is not a JSON object`, 'malformed_response', { vendor, body });
  }
  return parsed.value;
}

/**
 * Model ids from a `{ data: [{ id }] }` list, the shape OpenAI and
 * Anthropic both use.
 */
export function parseModelList(body: string, vendor: VendorId): string[] {
  return getRecords(parseJsonBody(body, vendor), 'data')
    .map(model => getString(model, 'id'))
    .filter((id): id is string => id !== undefined && id !== '');
}

/**
 * Build the error for a non-2xx response. The status decides the kind unless
 * it is generic (400 or unmapped), in which case the vendor's own error type
 * may refine it.
 */
export function httpError(
  status: number,
  body: string,
  vendor: VendorId,
  details: { message?: string; type?: string },
): LlmError {
  const message = details.message || excerpt(body.trim()) || `HTTP ${status}`;
  let kind: LlmErrorKind = errorKindFromStatus(status, message);
  if ((kind === 'invalid_request' || kind === 'api') && details.type) {
    kind = errorKindFromVendorType(details.type, message) ?? kind;
  }
  return new LlmError(`${vendor}: ${message}`, kind, { status, vendor, body });
}

/**
 * Build the error for an error reported inside a 200 body or a stream.
 */
export function vendorError(vendor: VendorId | undefined, message: string, type?: string, body?: string): LlmError {
  const kind = (type && errorKindFromVendorType(type, message)) || 'api';
  return new LlmError(vendor ? `${vendor}: ${message}` : message, kind, { vendor, body });
}

/**
 * An error body as JSON, or undefined for non-JSON bodies (proxies, HTML
 * error pages), which keep their raw text as the message.
 */
export function errorEnvelope(body: string): JsonRecord | undefined {
  const parsed = tryParseJson(body);
  return parsed.ok && isRecord(parsed.value) ? parsed.value : undefined;
}
