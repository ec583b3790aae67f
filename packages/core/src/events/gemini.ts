import type { ToolCallDelta, VendorEvent } from '../types/events.js';
import type { FinishReason, TokenUsage } from '../types/response.js';
import type { SSEEvent, VendorEventMapper, VendorId } from '../types/provider.js';
import { makeUsage, vendorError } from '../codecs/shared.js';
import { getNumber, getRecord, getRecords, getString, type JsonRecord } from '../utils/json.js';
import { decodePayload, isKnownTag } from './shared.js';

// streamGenerateContent sends untagged events; proxies may tag them "message"
const KNOWN_TAGS = ['message'] as const;

export function mapGeminiFinishReason(reason: string, sawToolCalls: boolean): FinishReason {
  switch (reason) {
    case 'STOP':
      // Gemini uses STOP for both text completion and tool calls
      return sawToolCalls ? 'tool_calls' : 'stop';
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
    case 'RECITATION':
    case 'BLOCKLIST':
    case 'PROHIBITED_CONTENT':
    case 'SPII':
    case 'IMAGE_SAFETY':
      return 'content_filter';
    case 'MALFORMED_FUNCTION_CALL':
      return 'error';
    default:
      return 'stop';
  }
}

export function geminiUsage(usage: JsonRecord): TokenUsage {
  return makeUsage(
    getNumber(usage, 'promptTokenCount'),
    getNumber(usage, 'candidatesTokenCount'),
    getNumber(usage, 'totalTokenCount'),
  );
}

/**
 * A functionCall part as a complete fragment. Gemini never splits a call
 * across chunks, and only newer models send an id.
 */
export function geminiCallDelta(call: JsonRecord, index: number): ToolCallDelta {
  const delta: ToolCallDelta = {
    index,
    id: getString(call, 'id') || `gemini_call_${index}`,
    type: 'function',
    arguments: JSON.stringify(getRecord(call, 'args') ?? {}),
  };
  const name = getString(call, 'name');
  if (name) delta.name = name;
  return delta;
}

/**
 * Event mapper for streamGenerateContent with `alt=sse`. Every chunk is a
 * full GenerateContentResponse; the stream has no terminal marker, so the
 * finish reason is delivered when the bytes end.
 */
export function createGeminiEventMapper(vendor: VendorId = 'gemini'): VendorEventMapper {
  let started = false;
  let toolCallCounter = 0;
  // Gemini can split functionCall and finishReason into separate chunks
  let sawToolCalls = false;

  return {
    protocol: 'gemini',

    map(event: SSEEvent): VendorEvent[] {
      if (!isKnownTag(event, KNOWN_TAGS)) return [];

      const decoded = decodePayload(event, vendor);
      if (decoded.kind === 'done') return [{ type: 'done' }];
      if (decoded.kind === 'error') return [decoded.event];
      const p = decoded.payload;

      const error = getRecord(p, 'error');
      if (error) {
        return [{
          type: 'error',
          error: vendorError(vendor, getString(error, 'message') ?? 'stream error', getString(error, 'status'), event.data),
        }];
      }

      const events: VendorEvent[] = [];

      const responseId = getString(p, 'responseId');
      if (!started && responseId) {
        started = true;
        const model = getString(p, 'modelVersion');
        events.push(model ? { type: 'message_start', id: responseId, model } : { type: 'message_start', id: responseId });
      }

      const candidate = getRecords(p, 'candidates')[0];
      for (const part of getRecords(getRecord(candidate, 'content'), 'parts')) {
        const text = getString(part, 'text');
        if (text) {
          events.push(part.thought === true
            ? { type: 'reasoning_delta', text }
            : { type: 'text_delta', text });
        }

        const call = getRecord(part, 'functionCall');
        // A call without a name can never become a ToolCall
        if (call && getString(call, 'name')) {
          sawToolCalls = true;
          events.push({ type: 'tool_call_fragment', delta: geminiCallDelta(call, toolCallCounter++) });
        }
      }

      const finishReason = getString(candidate, 'finishReason');
      if (finishReason) {
        events.push({ type: 'finish', reason: mapGeminiFinishReason(finishReason, sawToolCalls) });
      } else if (getString(getRecord(p, 'promptFeedback'), 'blockReason')) {
        // The prompt itself was blocked; no candidates follow
        events.push({ type: 'finish', reason: 'content_filter' });
      }

      const usage = getRecord(p, 'usageMetadata');
      if (usage) {
        events.push({ type: 'usage', usage: geminiUsage(usage) });
      }

      return events;
    },
  };
}
