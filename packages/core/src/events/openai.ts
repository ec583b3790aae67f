import type { VendorEvent } from '../types/events.js';
import type { FinishReason } from '../types/response.js';
import type { SSEEvent, VendorEventMapper, VendorId } from '../types/provider.js';
import { makeUsage, vendorError } from '../codecs/shared.js';
import { getArray, getNumber, getRecord, getRecords, getString } from '../utils/json.js';
import { decodePayload, isKnownTag, openAIToolCallFragments } from './shared.js';

// Chat Completions streams carry no event tags; some compatible servers tag every event "message"
const KNOWN_TAGS = ['message', 'error'] as const;

export function mapOpenAIFinishReason(reason: string, sawToolCalls: boolean): FinishReason {
  switch (reason) {
    case 'stop':
      // Some compatible servers report "stop" after emitting tool calls
      return sawToolCalls ? 'tool_calls' : 'stop';
    case 'length':
      return 'length';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'content_filter':
    case 'sensitive':
      return 'content_filter';
    case 'network_error':
      return 'error';
    default:
      return 'stop';
  }
}

/**
 * Event mapper for the Chat Completions stream shared by OpenAI and the
 * compatible vendors (DeepSeek, Moonshot, Zhipu, Volcengine, Ollama).
 */
export function createOpenAIEventMapper(vendor: VendorId): VendorEventMapper {
  let started = false;
  let sawToolCalls = false;

  return {
    protocol: 'openai',

    map(event: SSEEvent): VendorEvent[] {
      if (!isKnownTag(event, KNOWN_TAGS)) return [];

      const decoded = decodePayload(event, vendor);
      if (decoded.kind === 'done') return [{ type: 'done' }];
      if (decoded.kind === 'error') return [decoded.event];
      const p = decoded.payload;

      const error = getRecord(p, 'error');
      if (error || event.event === 'error') {
        const message = getString(error, 'message') ?? getString(p, 'message') ?? 'stream error';
        const type = getString(error, 'code') ?? getString(error, 'type');
        return [{ type: 'error', error: vendorError(vendor, message, type, event.data) }];
      }

      const events: VendorEvent[] = [];

      const id = getString(p, 'id');
      if (!started && id) {
        started = true;
        const model = getString(p, 'model');
        events.push(model ? { type: 'message_start', id, model } : { type: 'message_start', id });
      }

      const choice = getRecords(p, 'choices')[0];
      const delta = getRecord(choice, 'delta');
      if (delta) {
        const reasoning = getString(delta, 'reasoning_content') ?? getString(delta, 'reasoning');
        if (reasoning) {
          events.push({ type: 'reasoning_delta', text: reasoning });
        }

        const content = getString(delta, 'content');
        if (content) {
          events.push({ type: 'text_delta', text: content });
        }

        const toolCalls = getArray(delta, 'tool_calls');
        if (toolCalls && toolCalls.length > 0) {
          sawToolCalls = true;
          events.push(...openAIToolCallFragments(toolCalls));
        }
      }

      const finishReason = getString(choice, 'finish_reason');
      if (finishReason) {
        events.push({ type: 'finish', reason: mapOpenAIFinishReason(finishReason, sawToolCalls) });
      }

      // With stream_options.include_usage the last chunk has usage and no choices
      const usage = getRecord(p, 'usage');
      if (usage) {
        events.push({
          type: 'usage',
          usage: makeUsage(
            getNumber(usage, 'prompt_tokens'),
            getNumber(usage, 'completion_tokens'),
            getNumber(usage, 'total_tokens'),
          ),
        });
      }

      return events;
    },
  };
}
