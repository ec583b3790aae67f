import type { ToolCall } from '../types/messages.js';
import type { StreamChunk } from '../types/events.js';
import type { ChatResponse, FinishReason, TokenUsage } from '../types/response.js';
import { emptyUsage } from '../types/response.js';

/**
 * Fold a chunk stream into the response a non-streaming call would return.
 * Keeps the latest value per tool-call index and the latest usage report.
 */
export async function collectStream(
  chunks: AsyncIterable<StreamChunk>,
  model: string,
): Promise<ChatResponse> {
  let id: string | undefined;
  let responseModel = model;
  let content = '';
  let reasoning = '';
  let usage: TokenUsage = emptyUsage();
  let finishReason: FinishReason = 'stop';
  const toolCalls = new Map<number, ToolCall>();

  for await (const chunk of chunks) {
    switch (chunk.type) {
      case 'message_start':
        id = chunk.id;
        if (chunk.model) responseModel = chunk.model;
        break;
      case 'text_delta':
        content += chunk.text;
        break;
      case 'reasoning_delta':
        reasoning += chunk.text;
        break;
      case 'tool_call_delta':
        toolCalls.set(chunk.toolCall.index, chunk.toolCall);
        break;
      case 'usage':
        usage = chunk.usage;
        break;
      case 'finish':
        finishReason = chunk.reason;
        break;
    }
  }

  const response: ChatResponse = {
    model: responseModel,
    content,
    toolCalls: [...toolCalls.values()].sort((a, b) => a.index - b.index),
    finishReason,
    usage,
  };
  if (id !== undefined) response.id = id;
  if (reasoning) response.reasoningContent = reasoning;
  return response;
}
