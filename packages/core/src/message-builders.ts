import type { ContentBlock, Message, Role, ToolCall } from './types/messages.js';
import { LlmError } from './errors.js';

type ContentInput = string | ContentBlock | readonly ContentBlock[];

function isBlockList(content: ContentInput): content is readonly ContentBlock[] {
  return Array.isArray(content);
}

function toBlocks(content: ContentInput): ContentBlock[] {
  if (typeof content === 'string') return [{ type: 'text', text: content }];
  if (isBlockList(content)) return content.map(block => ({ ...block }));
  return [{ ...content }];
}

/**
 * Build an immutable message. A message always has at least one content
 * block; an assistant turn that only calls tools carries an empty text block.
 */
export function createMessage(
  role: Role,
  content: ContentInput,
  extra: { toolCalls?: readonly ToolCall[]; toolCallId?: string; name?: string } = {},
): Message {
  const blocks = toBlocks(content);
  if (blocks.length === 0) {
    throw new LlmError(`A ${role} message needs at least one content block`, 'invalid_request');
  }

  const message: {
    role: Role;
    content: readonly ContentBlock[];
    toolCalls?: readonly ToolCall[];
    toolCallId?: string;
    name?: string;
  } = {
    role,
    content: Object.freeze(blocks.map(block => Object.freeze(block))),
  };
  if (extra.toolCalls && extra.toolCalls.length > 0) {
    message.toolCalls = Object.freeze(extra.toolCalls.map(call => Object.freeze({
      ...call,
      function: Object.freeze({ ...call.function }),
    })));
  }
  if (extra.toolCallId !== undefined) message.toolCallId = extra.toolCallId;
  if (extra.name !== undefined) message.name = extra.name;

  return Object.freeze(message);
}

export function systemMessage(content: ContentInput): Message {
  return createMessage('system', content);
}

export function userMessage(content: ContentInput): Message {
  return createMessage('user', content);
}

export function assistantMessage(content: ContentInput, toolCalls?: readonly ToolCall[]): Message {
  return createMessage('assistant', content, toolCalls ? { toolCalls } : {});
}

/**
 * The answer to one tool call. `name` is the function name, which some
 * vendors (Gemini) key results by.
 */
export function toolResultMessage(toolCallId: string, content: ContentInput, name?: string): Message {
  return createMessage('tool', content, name === undefined ? { toolCallId } : { toolCallId, name });
}
