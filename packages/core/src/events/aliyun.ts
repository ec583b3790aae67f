import type { VendorEvent } from '../types/events.js';
import type { FinishReason, TokenUsage } from '../types/response.js';
import type { SSEEvent, VendorEventMapper, VendorId } from '../types/provider.js';
import { makeUsage, vendorError } from '../codecs/shared.js';
import { getArray, getNumber, getRecord, getRecords, getString, type JsonRecord } from '../utils/json.js';
import { mapOpenAIFinishReason } from './openai.js';
import { decodePayload, isKnownTag, openAIToolCallFragments } from './shared.js';

const KNOWN_TAGS = ['result', 'error'] as const;

/**
 * DashScope reports "null" (the string) on every chunk until the last.
 */
export function mapAliyunFinishReason(reason: string | undefined, sawToolCalls: boolean): FinishReason | undefined {
  if (!reason || reason === 'null') return undefined;
  return mapOpenAIFinishReason(reason, sawToolCalls);
}

export function aliyunUsage(usage: JsonRecord): TokenUsage {
  return makeUsage(
    getNumber(usage, 'input_tokens'),
    getNumber(usage, 'output_tokens'),
    getNumber(usage, 'total_tokens'),
  );
}

/**
 * Event mapper for DashScope text-generation with `x-dashscope-sse: enable`
 * and `incremental_output`. Events are tagged "result"; the stream ends
 * without a terminal marker after the chunk carrying the finish reason.
 */
export function createAliyunEventMapper(vendor: VendorId = 'aliyun'): VendorEventMapper {
  let started = false;
  let sawToolCalls = false;

  return {
    protocol: 'aliyun',

    map(event: SSEEvent): VendorEvent[] {
      if (!isKnownTag(event, KNOWN_TAGS)) return [];

      const decoded = decodePayload(event, vendor);
      if (decoded.kind === 'done') return [{ type: 'done' }];
      if (decoded.kind === 'error') return [decoded.event];
      const p = decoded.payload;

      const code = getString(p, 'code');
      if (event.event === 'error' || (code && !getRecord(p, 'output'))) {
        return [{
          type: 'error',
          error: vendorError(vendor, getString(p, 'message') ?? 'stream error', code, event.data),
        }];
      }

      const events: VendorEvent[] = [];

      const requestId = getString(p, 'request_id');
      if (!started && requestId) {
        started = true;
        events.push({ type: 'message_start', id: requestId });
      }

      const choice = getRecords(getRecord(p, 'output'), 'choices')[0];
      const message = getRecord(choice, 'message');
      if (message) {
        const reasoning = getString(message, 'reasoning_content');
        if (reasoning) events.push({ type: 'reasoning_delta', text: reasoning });

        const content = getString(message, 'content');
        if (content) events.push({ type: 'text_delta', text: content });

        const toolCalls = getArray(message, 'tool_calls');
        if (toolCalls && toolCalls.length > 0) {
          sawToolCalls = true;
          events.push(...openAIToolCallFragments(toolCalls));
        }
      }

      const reason = mapAliyunFinishReason(getString(choice, 'finish_reason'), sawToolCalls);
      if (reason) events.push({ type: 'finish', reason });

      const usage = getRecord(p, 'usage');
      if (usage) events.push({ type: 'usage', usage: aliyunUsage(usage) });

      return events;
    },
  };
}
