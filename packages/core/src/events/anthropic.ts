import type { VendorEvent } from '../types/events.js';
import type { FinishReason } from '../types/response.js';
import type { SSEEvent, VendorEventMapper, VendorId } from '../types/provider.js';
import { makeUsage, vendorError } from '../codecs/shared.js';
import { getNumber, getRecord, getString, type JsonRecord } from '../utils/json.js';
import { decodePayload, isKnownTag } from './shared.js';

const KNOWN_TAGS = [
  'message_start',
  'content_block_start',
  'content_block_delta',
  'content_block_stop',
  'message_delta',
  'message_stop',
  'ping',
  'error',
] as const;

export function mapAnthropicStopReason(reason: string): FinishReason {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
    case 'pause_turn':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    case 'refusal':
      return 'content_filter';
    default:
      return 'stop';
  }
}

// State for one Messages stream
interface StreamState {
  // content block index -> tool-call ordinal
  toolBlocks: Map<number, number>;
  nextToolIndex: number;
  // Per-call usage, merged across message_start and message_delta
  inputTokens: number;
  outputTokens: number;
}

function createStreamState(): StreamState {
  return {
    toolBlocks: new Map(),
    nextToolIndex: 0,
    inputTokens: 0,
    outputTokens: 0,
  };
}

function mergeUsage(state: StreamState, usage: JsonRecord | undefined): void {
  if (!usage) return;
  state.inputTokens = Math.max(state.inputTokens, getNumber(usage, 'input_tokens') ?? 0);
  state.outputTokens = Math.max(state.outputTokens, getNumber(usage, 'output_tokens') ?? 0);
}

/**
 * Event mapper for the Anthropic Messages stream. Tool-use blocks are
 * numbered in the order they start, so tool-call indices stay dense even
 * when text or thinking blocks sit between them.
 */
export function createAnthropicEventMapper(vendor: VendorId = 'anthropic'): VendorEventMapper {
  const state = createStreamState();

  return {
    protocol: 'anthropic',

    map(event: SSEEvent): VendorEvent[] {
      if (!isKnownTag(event, KNOWN_TAGS)) return [];

      const decoded = decodePayload(event, vendor);
      if (decoded.kind === 'done') return [{ type: 'done' }];
      if (decoded.kind === 'error') return [decoded.event];
      const p = decoded.payload;

      // The data's own type field is authoritative; the SSE tag mirrors it
      const type = getString(p, 'type') ?? event.event;
      const events: VendorEvent[] = [];

      switch (type) {
        case 'message_start': {
          const message = getRecord(p, 'message');
          mergeUsage(state, getRecord(message, 'usage'));
          const id = getString(message, 'id');
          if (id) {
            const model = getString(message, 'model');
            events.push(model ? { type: 'message_start', id, model } : { type: 'message_start', id });
          }
          break;
        }

        case 'content_block_start': {
          const block = getRecord(p, 'content_block');
          const blockIndex = getNumber(p, 'index') ?? 0;
          if (getString(block, 'type') === 'tool_use') {
            const index = state.nextToolIndex++;
            state.toolBlocks.set(blockIndex, index);
            const id = getString(block, 'id');
            const name = getString(block, 'name');
            events.push({
              type: 'tool_call_fragment',
              delta: {
                index,
                type: 'function',
                ...(id ? { id } : {}),
                ...(name ? { name } : {}),
              },
            });
          } else if (getString(block, 'type') === 'text') {
            const text = getString(block, 'text');
            if (text) events.push({ type: 'text_delta', text });
          }
          break;
        }

        case 'content_block_delta': {
          const delta = getRecord(p, 'delta');
          switch (getString(delta, 'type')) {
            case 'text_delta': {
              const text = getString(delta, 'text');
              if (text) events.push({ type: 'text_delta', text });
              break;
            }
            case 'thinking_delta': {
              const text = getString(delta, 'thinking');
              if (text) events.push({ type: 'reasoning_delta', text });
              break;
            }
            case 'input_json_delta': {
              const index = state.toolBlocks.get(getNumber(p, 'index') ?? 0);
              const partial = getString(delta, 'partial_json');
              if (index !== undefined && partial) {
                events.push({ type: 'tool_call_fragment', delta: { index, arguments: partial } });
              }
              break;
            }
          }
          break;
        }

        case 'message_delta': {
          mergeUsage(state, getRecord(p, 'usage'));
          events.push({ type: 'usage', usage: makeUsage(state.inputTokens, state.outputTokens) });
          const stopReason = getString(getRecord(p, 'delta'), 'stop_reason');
          if (stopReason) {
            events.push({ type: 'finish', reason: mapAnthropicStopReason(stopReason) });
          }
          break;
        }

        case 'message_stop':
          events.push({ type: 'done' });
          break;

        case 'error': {
          const error = getRecord(p, 'error');
          events.push({
            type: 'error',
            error: vendorError(
              vendor,
              getString(error, 'message') ?? 'stream error',
              getString(error, 'type'),
              event.data,
            ),
          });
          break;
        }

        // ping, content_block_stop and types added later carry nothing to report
      }

      return events;
    },
  };
}
