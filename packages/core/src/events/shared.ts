import type { SSEEvent, VendorId } from '../types/provider.js';
import type { ToolCallDelta, VendorEvent } from '../types/events.js';
import { LlmError } from '../errors.js';
import { argumentsText } from '../codecs/shared.js';
import { getNumber, getRecord, getString, isRecord, tryParseJson, type JsonRecord } from '../utils/json.js';

export type PayloadResult =
  | { kind: 'json'; payload: JsonRecord }
  | { kind: 'done' }
  | { kind: 'error'; event: VendorEvent };

/**
 * Decode an SSE data payload. `[DONE]` is the terminal marker used by the
 * OpenAI family; anything else must be a JSON object.
 */
export function decodePayload(event: SSEEvent, vendor: VendorId): PayloadResult {
  const data = event.data.trim();
  if (data === '[DONE]') return { kind: 'done' };

  const parsed = tryParseJson(data);
  if (!parsed.ok || !isRecord(parsed.value)) {
    return {
      kind: 'error',
      event: {
        type: 'error',
        error: new LlmError(`${vendor}: stream payload is not a JSON object`, 'malformed_response', {
          vendor,
          body: event.data,
        }),
      },
    };
  }
  return { kind: 'json', payload: parsed.value };
}

/**
 * Fragments from an OpenAI-shaped `tool_calls` array. Vendors that omit
 * `index` get the array position; vendors that omit `type` get "function"
 * on the fragment that starts the call.
 */
export function openAIToolCallFragments(toolCalls: unknown[]): VendorEvent[] {
  const events: VendorEvent[] = [];
  toolCalls.forEach((raw, position) => {
    if (!isRecord(raw)) return;
    const fn = getRecord(raw, 'function');
    const delta: ToolCallDelta = { index: getNumber(raw, 'index') ?? position };

    const id = getString(raw, 'id');
    const name = getString(fn, 'name');
    const type = getString(raw, 'type');
    const args = argumentsText(fn?.arguments);

    if (id) delta.id = id;
    if (name) delta.name = name;
    if (type) delta.type = type;
    else if (id || name) delta.type = 'function';
    if (args) delta.arguments = args;

    events.push({ type: 'tool_call_fragment', delta });
  });
  return events;
}

export function isKnownTag(event: SSEEvent, tags: readonly string[]): boolean {
  return event.event === undefined || tags.includes(event.event);
}
