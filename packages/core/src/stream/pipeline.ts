import type { StreamChunk } from '../types/events.js';
import type { FinishReason } from '../types/response.js';
import type { VendorEventMapper } from '../types/provider.js';
import { LlmError } from '../errors.js';
import { readSSEEvents, type ByteSource } from './sse-reader.js';
import { ToolCallAccumulator } from './tool-call-accumulator.js';

/**
 * Turn a vendor's SSE byte stream into canonical chunks.
 *
 * The sequence ends with exactly one `finish` chunk or throws. A vendor's
 * finish signal is held back until its terminal marker (or the end of the
 * bytes) so that trailing usage events still arrive before `finish`.
 *
 * Pacing is pull-based: nothing is read from `source` until the consumer
 * asks for the next chunk. Returning early from the iteration returns the
 * source iterator, which is how the transport releases the connection.
 */
export async function* streamChatChunks(
  source: ByteSource,
  mapper: VendorEventMapper,
): AsyncGenerator<StreamChunk> {
  const accumulator = new ToolCallAccumulator();
  let finishReason: FinishReason | undefined;

  for await (const sseEvent of readSSEEvents(source)) {
    for (const event of mapper.map(sseEvent)) {
      switch (event.type) {
        case 'tool_call_fragment': {
          const toolCall = accumulator.push(event.delta);
          if (toolCall) {
            yield { type: 'tool_call_delta', toolCall };
          }
          break;
        }
        case 'finish':
          finishReason = event.reason;
          break;
        case 'done':
          yield { type: 'finish', reason: finishReason ?? 'stop' };
          return;
        case 'error':
          throw event.error;
        default:
          yield event;
      }
    }
  }

  if (finishReason === undefined) {
    throw new LlmError('Stream ended before a finish signal', 'transport');
  }
  yield { type: 'finish', reason: finishReason };
}
